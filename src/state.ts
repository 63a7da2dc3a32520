import { AnnotationEntry, AnnotationMap, HighlightAnnotation } from './types';

/**
 * Per-document record of the annotations the driver has placed, keyed by line.
 * Clearing and recreating a line is the two-phase `evict` / `insert`.
 */
export class AnnotationIndex {
    private lines: AnnotationMap = new Map();

    // Bumped on every insert so recreated annotations get a fresh identity
    private generation: number = 0;

    /**
     * Drop a line's annotations and return them (empty when there were none)
     */
    evict(line: number): HighlightAnnotation[] {
        const removed = this.lines.get(line) ?? [];
        this.lines.delete(line);
        return removed;
    }

    /**
     * Record the annotations for a line, replacing whatever it held
     */
    insert(line: number, entries: AnnotationEntry[]): HighlightAnnotation[] {
        const generation = ++this.generation;
        const annotations = entries.map(entry => ({
            ...entry,
            id: `${line}:${entry.column}:${generation}`,
            line
        }));
        this.lines.set(line, annotations);
        return annotations;
    }

    get(line: number): readonly HighlightAnnotation[] {
        return this.lines.get(line) ?? [];
    }

    has(line: number): boolean {
        return this.lines.has(line);
    }

    /** Highlighted line numbers, ascending */
    lineNumbers(): number[] {
        return Array.from(this.lines.keys()).sort((a, b) => a - b);
    }

    /**
     * Forget lines at or beyond `lineCount` (the document shrank)
     */
    truncate(lineCount: number): HighlightAnnotation[] {
        const removed: HighlightAnnotation[] = [];
        this.lines.forEach((annotations, line) => {
            if (line >= lineCount) {
                removed.push(...annotations);
                this.lines.delete(line);
            }
        });
        return removed;
    }

    /** Largest end offset recorded, 0 when empty */
    maxEnd(): number {
        let end = 0;
        this.lines.forEach(annotations => {
            annotations.forEach(annotation => {
                end = Math.max(end, annotation.end);
            });
        });
        return end;
    }

    get size(): number {
        let count = 0;
        this.lines.forEach(annotations => {
            count += annotations.length;
        });
        return count;
    }

    clear(): void {
        this.lines.clear();
    }
}
