import * as assert from 'assert';
import * as fc from 'fast-check';
import { readFields, scanFields } from '../scanner';

const unquotedLine = fc.stringOf(fc.constantFrom('a', 'b', '7', ' ', ','), { minLength: 1, maxLength: 40 });
const anyLine = fc.stringOf(fc.constantFrom('a', 'b', ',', '"', ' '), { maxLength: 40 });

suite('Scanner Property Test Suite', () => {

    test('quote-free lines split into one field more than their delimiters', () => {
        fc.assert(fc.property(unquotedLine, line => {
            const delimiters = line.split('').filter(c => c === ',').length;
            assert.strictEqual(scanFields(line).length, delimiters + 1);
        }));
    });

    test('quote-free fields rejoin to the original line', () => {
        fc.assert(fc.property(unquotedLine, line => {
            assert.strictEqual(readFields(line).join(','), line);
        }));
    });

    test('fields are ordered, disjoint and within the line', () => {
        fc.assert(fc.property(anyLine, fc.nat(1000), (line, offset) => {
            let previousEnd = offset;
            for (const field of scanFields(line, ',', offset)) {
                assert.ok(field.start >= previousEnd, `field starts at ${field.start} before ${previousEnd}`);
                assert.ok(field.end >= field.start);
                assert.ok(field.end <= offset + line.length);
                previousEnd = field.end;
            }
        }));
    });

    test('only the empty line has no fields', () => {
        fc.assert(fc.property(anyLine, line => {
            assert.strictEqual(scanFields(line).length === 0, line.length === 0);
        }));
    });
});
