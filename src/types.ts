/**
 * Shared type definitions for the csv-column-highlighter
 */

/** Ordered list of colors cycled across columns */
export type Palette = readonly string[];

/** Half-open offset range `[start, end)` into a document */
export interface OffsetRange {
    start: number;
    end: number;
}

/** Region of a document that must be (re)painted */
export type Region = OffsetRange;

/** One CSV value on one line, exclusive of its quotes and trailing delimiter */
export interface FieldSpan extends OffsetRange {
    quoted: boolean;
}

/** Palette selection as read from configuration */
export interface PaletteConfig {
    useLighterPalette: boolean;
    standardPalette: Palette;
    lighterPalette: Palette;
}

/** Full highlighter configuration */
export interface HighlighterConfig extends PaletteConfig {
    /** Documents with at most this many lines are highlighted in full when enabled (0 = never) */
    maxLinesForWholeFile: number;
}

/** A range-to-color binding created by the driver */
export interface HighlightAnnotation extends OffsetRange {
    readonly id: string;
    readonly line: number;
    readonly column: number;
    readonly color: string;
}

/** What the driver wants to place on a line, before it gets an identity */
export type AnnotationEntry = Omit<HighlightAnnotation, 'id' | 'line'>;

/** Outcome of one `applyHighlights` call */
export interface HighlightResult {
    linesProcessed: number;
    annotationsCreated: number;
    failedLines: number[];
}

/** Annotation index type: line number to the annotations placed on it */
export type AnnotationMap = Map<number, HighlightAnnotation[]>;
