/**
 * Base error class for trace errors
 */
export class TraceError extends Error {
    readonly code: string;

    constructor(message: string, code: string) {
        super(message);
        this.name = 'TraceError';
        this.code = code;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Error thrown when the capture mechanism behind a source breaks.
 * Fatal to the trace loop.
 */
export class SourceError extends TraceError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, 'SOURCE');
        this.name = 'SourceError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Error thrown when the card file-system description is invalid
 */
export class ProfileError extends TraceError {
    constructor(message: string) {
        super(message, 'PROFILE');
        this.name = 'ProfileError';
    }
}

/**
 * Error thrown for APDU bytes that cannot be split into header, data and status word
 */
export class ApduFormatError extends TraceError {
    constructor(message: string) {
        super(message, 'APDU_FORMAT');
        this.name = 'ApduFormatError';
    }
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
