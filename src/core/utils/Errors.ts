/**
 * Base class for every error the tool reports to the user.
 */
export class ChaptagError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed Timestamp, Chapter, NumberInSet or data URI token.
 * `token` is the offending substring.
 */
export class FormatError extends ChaptagError {
    constructor(message: string, public readonly token: string) {
        super(`${message}: ${token}`);
    }
}

/** File open, read or write failure. */
export class IOError extends ChaptagError {
    constructor(message: string, public readonly path: string, options?: { cause?: unknown }) {
        super(`${message} ${path}`, options);
    }
}

/** Artwork download failure (timeout, non-2xx, transport). */
export class NetworkError extends ChaptagError {
    constructor(message: string, public readonly url: string, options?: { cause?: unknown }) {
        super(`${message} ${url}`, options);
    }
}

/** Unknown image extension or MIME type. */
export class UnsupportedFormatError extends ChaptagError {
    constructor(message: string, public readonly source: string) {
        super(`${message}: ${source}`);
    }
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.cause instanceof Error ? `${error.message}: ${error.cause.message}` : error.message;
    }
    return String(error);
}
