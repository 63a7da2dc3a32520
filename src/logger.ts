/**
 * Shared pino logger.
 *
 * Writes JSON lines to stderr so hosts that own stdout (language servers,
 * terminal viewers) are not disturbed. CSV_HIGHLIGHT_LOG_LEVEL sets the level
 * (default "info").
 */

import pino from 'pino';

export type Logger = pino.Logger;

const DEFAULT_LEVEL = 'info';

/**
 * Unknown level names fall back to "info" instead of making pino throw
 */
export function resolveLogLevel(level: string | undefined): string {
    if (!level) {
        return DEFAULT_LEVEL;
    }
    const normalized = level.trim().toLowerCase();
    if (normalized === 'silent' || pino.levels.values[normalized] !== undefined) {
        return normalized;
    }
    return DEFAULT_LEVEL;
}

const LOG_LEVEL = resolveLogLevel(process.env.CSV_HIGHLIGHT_LOG_LEVEL);

export function createLogger(name: string, level: string = LOG_LEVEL): Logger {
    return pino({ name, level: resolveLogLevel(level) }, pino.destination(2));
}

export const logger = createLogger('csv-column-highlighter');
