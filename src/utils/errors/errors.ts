// src/utils/errors/errors.ts

/**
 * Invalid user input: a malformed or out-of-bounds range, unusable settings.
 * Aborts the whole run.
 */
export class InputError extends Error {
    override readonly name = 'InputError';
}

/**
 * Transport-level failure: DNS, connection reset, timeout, interrupted body.
 */
export class NetworkError extends Error {
    override readonly name = 'NetworkError';

    constructor(
        readonly url: string,
        message: string,
        options?: ErrorOptions,
    ) {
        super(message, options);
    }
}

export class HttpStatusError extends Error {
    override readonly name = 'HttpStatusError';

    constructor(
        readonly url: string,
        readonly status: number,
        statusText = '',
    ) {
        super(`HTTP ${status}${statusText ? ` ${statusText}` : ''} for ${url}`);
    }
}

/**
 * A deep-zoom descriptor that lacks a field or carries a non-numeric one.
 */
export class MetadataParseError extends Error {
    override readonly name = 'MetadataParseError';
}

/**
 * The manifest body is not JSON or does not have the expected shape. Fatal for the run.
 */
export class ManifestError extends Error {
    override readonly name = 'ManifestError';
}

export class TileDecodeError extends Error {
    override readonly name = 'TileDecodeError';
}

/**
 * Only transport failures and HTTP status errors are worth another attempt.
 */
export function isRetryableError(error: unknown): boolean {
    return error instanceof NetworkError || error instanceof HttpStatusError;
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Renders an error followed by every `cause` below it, one per line.
 */
export function describeErrorChain(error: unknown): string {
    const lines: string[] = [];
    const seen = new Set<unknown>();
    let current: unknown = error;
    while (current !== undefined && current !== null && !seen.has(current)) {
        seen.add(current);
        const err = toError(current);
        lines.push(lines.length === 0 ? `${err.name}: ${err.message}` : `  caused by ${err.name}: ${err.message}`);
        current = current instanceof Error ? current.cause : undefined;
    }
    return lines.join('\n');
}
