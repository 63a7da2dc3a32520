export { scanFields, fieldValue, readFields, DEFAULT_DELIMITER } from './scanner';
export { HighlightDriver, ANNOTATION_TAG } from './highlighting';
export type { HighlightDriverOptions, StyleMap } from './highlighting';
export { AnnotationIndex } from './state';
export { CsvColumnHighlighter, activate, deactivate } from './extension';
export { CONFIG_SECTION, HighlighterConfigSchema, parseConfiguration, readConfiguration } from './config';
export { HighlightError, HighlightErrorCode, isHighlightError } from './errors';
export { createLogger, logger, resolveLogLevel } from './logger';
export type { Logger } from './logger';
export {
    NEUTRAL_COLOR,
    LIGHTER_PERCENT,
    STANDARD_PALETTE,
    lighten,
    lightenPalette,
    getActivePalette,
    getColumnColor
} from './utils';
export * from './host';
export * from './types';
