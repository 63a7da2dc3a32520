/**
 * Highlighter error types
 */

export enum HighlightErrorCode {
    INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
    DOCUMENT_NOT_ENABLED = 'DOCUMENT_NOT_ENABLED',
}

interface HighlightErrorDetails {
    issues?: string[];
    uri?: string;
}

export class HighlightError extends Error {
    code: HighlightErrorCode;
    details?: HighlightErrorDetails;

    constructor(code: HighlightErrorCode, message: string, details?: HighlightErrorDetails) {
        super(message);
        this.code = code;
        if (details !== undefined) {
            this.details = details;
        }
        this.name = 'HighlightError';
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        return {
            error: {
                code: this.code,
                message: this.message,
                details: this.details,
            },
        };
    }
}

export function isHighlightError(error: unknown): error is HighlightError {
    return error instanceof HighlightError;
}
