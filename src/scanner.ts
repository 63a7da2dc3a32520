import { FieldSpan } from './types';

export const DEFAULT_DELIMITER = ',';
const QUOTE = '"';

/** Scanner states; the cursor always sits on the first unread character */
type ScanState = 'fieldStart' | 'inUnquoted' | 'inQuoted' | 'afterQuoteClose';

/**
 * Splits one line of CSV text into field spans.
 *
 * Quoted fields exclude their quotes, `""` inside a quoted field is an escaped
 * quote and does not end it, and an unterminated quote runs to line end.
 * Characters between a closing quote and the next delimiter belong to no
 * field. A delimiter ending the line yields a trailing empty field; an empty
 * line yields no fields. An empty delimiter falls back to the comma. Never throws.
 *
 * @param offset Absolute offset of `text[0]`; added to every returned span.
 */
export function scanFields(text: string, delimiter: string = DEFAULT_DELIMITER, offset: number = 0): FieldSpan[] {
    // An empty delimiter would never advance the cursor
    if (delimiter.length === 0) {
        delimiter = DEFAULT_DELIMITER;
    }
    const fields: FieldSpan[] = [];
    const length = text.length;
    if (length === 0) {
        return fields;
    }

    let state: ScanState = 'fieldStart';
    let cursor = 0;
    let fieldStart = 0;
    // Set after consuming a delimiter: a field must follow, even an empty one at line end
    let expectField = true;

    const emit = (start: number, end: number, quoted: boolean) => {
        fields.push({ start: offset + start, end: offset + end, quoted });
        expectField = false;
    };

    while (cursor < length || expectField) {
        switch (state) {
            case 'fieldStart':
                if (text[cursor] === QUOTE) {
                    cursor++;
                    fieldStart = cursor;
                    state = 'inQuoted';
                } else {
                    fieldStart = cursor;
                    state = 'inUnquoted';
                }
                break;

            case 'inUnquoted': {
                const next = text.indexOf(delimiter, cursor);
                const end = next === -1 ? length : next;
                emit(fieldStart, end, false);
                cursor = end;
                if (next !== -1) {
                    cursor += delimiter.length;
                    expectField = true;
                }
                state = 'fieldStart';
                break;
            }

            case 'inQuoted': {
                const close = text.indexOf(QUOTE, cursor);
                if (close === -1) {
                    emit(fieldStart, length, true);
                    cursor = length;
                    state = 'fieldStart';
                } else if (text[close + 1] === QUOTE) {
                    cursor = close + 2;
                } else {
                    emit(fieldStart, close, true);
                    cursor = close + 1;
                    state = 'afterQuoteClose';
                }
                break;
            }

            case 'afterQuoteClose': {
                const next = text.indexOf(delimiter, cursor);
                if (next === -1) {
                    cursor = length;
                } else {
                    cursor = next + delimiter.length;
                    expectField = true;
                }
                state = 'fieldStart';
                break;
            }
        }
    }

    return fields;
}

/**
 * Value of a scanned field, with escaped quotes collapsed for quoted fields.
 * `offset` must be the one passed to `scanFields`.
 */
export function fieldValue(text: string, span: FieldSpan, offset: number = 0): string {
    const raw = text.slice(span.start - offset, span.end - offset);
    return span.quoted ? raw.split(QUOTE + QUOTE).join(QUOTE) : raw;
}

/** Scan a line and return the values of its fields */
export function readFields(text: string, delimiter: string = DEFAULT_DELIMITER): string[] {
    return scanFields(text, delimiter).map(span => fieldValue(text, span));
}

