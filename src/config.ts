import { z } from 'zod';
import { ConfigurationSource } from './host';
import { HighlightError, HighlightErrorCode } from './errors';
import { HighlighterConfig } from './types';
import { STANDARD_PALETTE, lightenPalette } from './utils';

/** Settings section read from the host */
export const CONFIG_SECTION = 'csvColumnHighlighter';

const PaletteSchema = z.array(z.string().trim().min(1, 'color must not be empty')).min(1, 'palette must not be empty');

export const HighlighterConfigSchema = z.object({
    useLighterPalette: z.boolean().default(true),
    standardPalette: PaletteSchema.default([...STANDARD_PALETTE]),
    // Derived from the standard palette when unset
    lighterPalette: PaletteSchema.optional(),
    maxLinesForWholeFile: z.number().int().nonnegative().default(10000),
});

export type HighlighterConfigInput = z.input<typeof HighlighterConfigSchema>;

/**
 * Validate raw settings and fill in defaults.
 * Throws INVALID_CONFIGURATION listing every failing key.
 */
export function parseConfiguration(raw: unknown): HighlighterConfig {
    const result = HighlighterConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new HighlightError(
            HighlightErrorCode.INVALID_CONFIGURATION,
            `Invalid ${CONFIG_SECTION} configuration: ${issues.join('; ')}`,
            { issues }
        );
    }

    const { useLighterPalette, standardPalette, lighterPalette, maxLinesForWholeFile } = result.data;
    return {
        useLighterPalette,
        standardPalette,
        lighterPalette: lighterPalette ?? lightenPalette(standardPalette),
        maxLinesForWholeFile
    };
}

/**
 * Get current configuration from the host settings
 */
export function readConfiguration(source: ConfigurationSource): HighlighterConfig {
    return parseConfiguration({
        useLighterPalette: source.get('useLighterPalette'),
        standardPalette: source.get('standardPalette'),
        lighterPalette: source.get('lighterPalette'),
        maxLinesForWholeFile: source.get('maxLinesForWholeFile')
    });
}
