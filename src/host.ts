import { OffsetRange, Region } from './types';

/**
 * Interfaces the embedding editor implements. They cover the small slice of an
 * editor API the highlighter needs: reading lines, placing tagged annotations,
 * creating foreground styles, reading settings and scheduling redraws.
 */

export interface Disposable {
    dispose(): void;
}

/** One line of a document, with absolute offsets (end excludes the line break) */
export interface TextLine {
    readonly lineNumber: number;
    readonly text: string;
    readonly start: number;
    readonly end: number;
}

export interface HighlightDocument {
    readonly uri: string;
    readonly lineCount: number;
    /** Total length in characters */
    readonly length: number;
    lineAt(line: number): TextLine;
    /** Line containing `offset`; offsets past the end map to the last line */
    lineNumberAt(offset: number): number;
}

/** Renderable style object for a foreground color */
export interface ColumnStyle extends Disposable {
    readonly foreground: string;
}

export interface StyleProvider {
    createStyle(options: { foreground: string }): ColumnStyle;
}

/** Annotation/overlay store of one document */
export interface AnnotationStore {
    create(range: OffsetRange, style: ColumnStyle, tag: string): void;
    /** Remove every annotation lying within `range` whose tag satisfies `predicate` */
    removeMatching(range: OffsetRange, predicate: (tag: string) => boolean): void;
}

/** Settings of one section; unset keys read as undefined */
export interface ConfigurationSource {
    get(key: string): unknown;
}

export type RegionListener = (region: Region) => void;

export interface HighlightHost {
    readonly styles: StyleProvider;
    getConfiguration(section: string): ConfigurationSource;
    getAnnotationStore(document: HighlightDocument): AnnotationStore;
    /** Register the redraw hook: the host calls `listener` whenever a region of `document` must be painted */
    onRegionDirty(document: HighlightDocument, listener: RegionListener): Disposable;
    onDidChangeConfiguration(listener: () => void): Disposable;
}
