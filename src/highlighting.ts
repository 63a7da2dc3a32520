import { AnnotationStore, ColumnStyle, HighlightDocument, StyleProvider, TextLine } from './host';
import { Logger, logger as defaultLogger } from './logger';
import { DEFAULT_DELIMITER, scanFields } from './scanner';
import { AnnotationIndex } from './state';
import { HighlightAnnotation, HighlightResult, Palette, PaletteConfig, Region } from './types';
import { NEUTRAL_COLOR, getActivePalette, getColumnColor } from './utils';

/** Tag carried by every annotation this driver creates */
export const ANNOTATION_TAG = 'csv-column';

const isOwnAnnotation = (tag: string): boolean => tag === ANNOTATION_TAG;

/** Style cache: color to the host style rendering it */
export type StyleMap = Map<string, ColumnStyle>;

export interface HighlightDriverOptions {
    delimiter?: string;
    logger?: Logger;
}

/**
 * Colors the fields of one document by column.
 *
 * The host calls `onRegionDirty` (or `applyHighlights`) whenever a region must
 * be painted; each line in the region has its previous annotations removed
 * and one annotation per field created, so repeated calls on the same region
 * render the same colors.
 */
export class HighlightDriver {
    private readonly index = new AnnotationIndex();
    private styleMap: StyleMap = new Map();
    private palette: Palette;
    private warnedEmptyPalette: boolean = false;
    private readonly delimiter: string;
    private readonly logger: Logger;

    constructor(
        private readonly document: HighlightDocument,
        private readonly store: AnnotationStore,
        private readonly styles: StyleProvider,
        private config: PaletteConfig,
        options: HighlightDriverOptions = {}
    ) {
        this.palette = getActivePalette(config);
        this.delimiter = options.delimiter ?? DEFAULT_DELIMITER;
        this.logger = (options.logger ?? defaultLogger).child({ uri: document.uri });
    }

    /**
     * Re-highlight every line touched by `[regionStart, regionEnd)`.
     * The line containing `regionStart` is always processed, even for an empty region.
     */
    applyHighlights(regionStart: number, regionEnd: number): HighlightResult {
        const result: HighlightResult = { linesProcessed: 0, annotationsCreated: 0, failedLines: [] };
        const lineCount = this.document.lineCount;
        if (lineCount === 0) {
            return result;
        }

        this.forgetLinesPast(lineCount);

        const start = this.clampOffset(Math.min(regionStart, regionEnd));
        const end = this.clampOffset(Math.max(regionStart, regionEnd));
        const firstLine = this.document.lineNumberAt(start);

        for (let line = firstLine; line < lineCount; line++) {
            const textLine = this.document.lineAt(line);
            if (line > firstLine && textLine.start >= end) {
                break;
            }
            this.highlightLineSafely(textLine, result);
        }

        this.logger.debug({ start, end, ...result }, 'applied column highlights');
        return result;
    }

    onRegionDirty(region: Region): void {
        this.applyHighlights(region.start, region.end);
    }

    /**
     * Swap in a new palette configuration (or reload the current one) and
     * recolor every line highlighted so far. Field boundaries are recomputed
     * from the text, not carried over.
     */
    refresh(config: PaletteConfig = this.config): HighlightResult {
        this.config = config;
        this.palette = getActivePalette(config);
        this.warnedEmptyPalette = false;
        this.disposeStyles();

        const result: HighlightResult = { linesProcessed: 0, annotationsCreated: 0, failedLines: [] };
        this.forgetLinesPast(this.document.lineCount);
        for (const line of this.index.lineNumbers()) {
            this.highlightLineSafely(this.document.lineAt(line), result);
        }
        return result;
    }

    /**
     * Remove every annotation this driver created
     */
    clear(): void {
        try {
            const end = Math.max(this.document.length, this.index.maxEnd());
            this.store.removeMatching({ start: 0, end }, isOwnAnnotation);
        } catch (err) {
            this.logger.warn({ err }, 'failed to remove column highlights');
        }
        this.index.clear();
    }

    dispose(): void {
        this.clear();
        this.disposeStyles();
    }

    getAnnotations(line: number): readonly HighlightAnnotation[] {
        return this.index.get(line);
    }

    get annotationCount(): number {
        return this.index.size;
    }

    get activePalette(): Palette {
        return this.palette;
    }

    private highlightLineSafely(textLine: TextLine, result: HighlightResult): void {
        try {
            result.annotationsCreated += this.highlightLine(textLine);
            result.linesProcessed++;
        } catch (err) {
            // A store failure on one line must not stop the rest of the region
            result.failedLines.push(textLine.lineNumber);
            this.logger.warn({ err, line: textLine.lineNumber }, 'failed to highlight line');
        }
    }

    private highlightLine(textLine: TextLine): number {
        const { lineNumber } = textLine;

        this.index.evict(lineNumber);
        this.store.removeMatching({ start: textLine.start, end: textLine.end }, isOwnAnnotation);

        const palette = this.getPalette();
        const entries = scanFields(textLine.text, this.delimiter, textLine.start).map((field, column) => ({
            start: field.start,
            end: field.end,
            column,
            color: getColumnColor(palette, column)
        }));

        const annotations = this.index.insert(lineNumber, entries);
        try {
            for (const annotation of annotations) {
                this.store.create(
                    { start: annotation.start, end: annotation.end },
                    this.getStyle(annotation.color),
                    ANNOTATION_TAG
                );
            }
        } catch (err) {
            // Leave a failed line with no annotations at all, in the index and the store
            this.index.evict(lineNumber);
            this.store.removeMatching({ start: textLine.start, end: textLine.end }, isOwnAnnotation);
            throw err;
        }
        return annotations.length;
    }

    /**
     * Drop lines the document no longer has, from the index and the store
     */
    private forgetLinesPast(lineCount: number): void {
        for (const annotation of this.index.truncate(lineCount)) {
            try {
                this.store.removeMatching({ start: annotation.start, end: annotation.end }, isOwnAnnotation);
            } catch (err) {
                this.logger.warn({ err, line: annotation.line }, 'failed to remove highlight of deleted line');
            }
        }
    }

    private getPalette(): Palette {
        if (this.palette.length > 0) {
            return this.palette;
        }
        if (!this.warnedEmptyPalette) {
            this.warnedEmptyPalette = true;
            this.logger.warn({ color: NEUTRAL_COLOR }, 'active palette is empty, using neutral color');
        }
        return [NEUTRAL_COLOR];
    }

    /**
     * Styles are created on first use and kept until the palette changes
     */
    private getStyle(color: string): ColumnStyle {
        let style = this.styleMap.get(color);
        if (!style) {
            style = this.styles.createStyle({ foreground: color });
            this.styleMap.set(color, style);
        }
        return style;
    }

    private disposeStyles(): void {
        this.styleMap.forEach(style => style.dispose());
        this.styleMap.clear();
    }

    private clampOffset(offset: number): number {
        return Math.min(Math.max(0, offset), this.document.length);
    }
}
