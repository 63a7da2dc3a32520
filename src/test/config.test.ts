import * as assert from 'assert';
import { parseConfiguration, readConfiguration } from '../config';
import { HighlightError, HighlightErrorCode } from '../errors';
import { STANDARD_PALETTE, lightenPalette } from '../utils';
import { MemoryConfiguration } from './fakes';

suite('Config Test Suite', () => {

    test('should fill in defaults for unset keys', () => {
        const config = readConfiguration(new MemoryConfiguration());
        assert.strictEqual(config.useLighterPalette, true);
        assert.deepStrictEqual(config.standardPalette, [...STANDARD_PALETTE]);
        assert.deepStrictEqual(config.lighterPalette, lightenPalette(STANDARD_PALETTE));
        assert.strictEqual(config.maxLinesForWholeFile, 10000);
    });

    test('should derive the lighter palette from a custom standard palette', () => {
        const config = parseConfiguration({ standardPalette: ['#ff0000', 'teal'] });
        assert.deepStrictEqual(config.lighterPalette, ['#ff9999', 'teal']);
    });

    test('should keep an explicit lighter palette', () => {
        const config = parseConfiguration({
            useLighterPalette: false,
            standardPalette: ['#000000'],
            lighterPalette: [' #cccccc ']
        });
        assert.strictEqual(config.useLighterPalette, false);
        assert.deepStrictEqual(config.lighterPalette, ['#cccccc']);
    });

    test('should reject an empty palette', () => {
        assert.throws(
            () => parseConfiguration({ standardPalette: [] }),
            (err: unknown) => {
                assert.ok(err instanceof HighlightError);
                assert.strictEqual(err.code, HighlightErrorCode.INVALID_CONFIGURATION);
                assert.deepStrictEqual(err.details?.issues, ['standardPalette: palette must not be empty']);
                return true;
            }
        );
    });

    test('should list every invalid key', () => {
        assert.throws(
            () => parseConfiguration({ useLighterPalette: 'yes', maxLinesForWholeFile: -1 }),
            (err: unknown) => {
                assert.ok(err instanceof HighlightError);
                assert.strictEqual(err.details?.issues?.length, 2);
                return true;
            }
        );
    });

    test('should serialise errors', () => {
        const err = new HighlightError(HighlightErrorCode.DOCUMENT_NOT_ENABLED, 'not enabled', { uri: 'file:///a.csv' });
        assert.deepStrictEqual(err.toJSON(), {
            error: {
                code: 'DOCUMENT_NOT_ENABLED',
                message: 'not enabled',
                details: { uri: 'file:///a.csv' }
            }
        });
    });
});
