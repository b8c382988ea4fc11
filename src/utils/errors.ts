/**
 * src/utils/errors.ts
 *
 * Error taxonomy for the scrape pipeline.
 *
 *   FetchError       retryable   content could not be retrieved in time
 *   ExtractionError  retryable   content did not yield items (layout drift?)
 *   ParseError       per-item    malformed price / missing field, skipped
 *   OutOfOrderError  per-item    observation older than the series head
 *   NotFoundError    returned    missing job, label or product
 *   HandlerError     isolated    a callback threw; logged, never propagated
 *   ConfigError      fatal       invalid environment or job file
 *
 * Only errors with `retryable === true` drive the scheduler's backoff.
 */

export type ErrorCode =
    | 'FETCH_FAILED'
    | 'EXTRACTION_FAILED'
    | 'PARSE_FAILED'
    | 'OUT_OF_ORDER'
    | 'NOT_FOUND'
    | 'HANDLER_FAILED'
    | 'CONFIG_INVALID';

export abstract class PagewatchError extends Error {
    abstract readonly code: ErrorCode;
    abstract readonly retryable: boolean;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class FetchError extends PagewatchError {
    readonly code = 'FETCH_FAILED';
    readonly retryable = true;
    readonly url: string;
    /** HTTP status when the server answered, null on network error or timeout. */
    readonly statusCode: number | null;

    constructor(message: string, url: string, statusCode: number | null = null, options?: { cause?: unknown }) {
        super(message, options);
        this.url = url;
        this.statusCode = statusCode;
    }
}

export class ExtractionError extends PagewatchError {
    readonly code = 'EXTRACTION_FAILED';
    readonly retryable = true;
    /** True when the selector matched nothing on a page that did load. */
    readonly layoutDrift: boolean;

    constructor(message: string, layoutDrift = false, options?: { cause?: unknown }) {
        super(message, options);
        this.layoutDrift = layoutDrift;
    }
}

export class ParseError extends PagewatchError {
    readonly code = 'PARSE_FAILED';
    readonly retryable = false;
    readonly itemIndex: number;
    readonly field: string;
    readonly raw: string;

    constructor(message: string, itemIndex: number, field: string, raw: string) {
        super(message);
        this.itemIndex = itemIndex;
        this.field = field;
        this.raw = raw;
    }
}

export class OutOfOrderError extends PagewatchError {
    readonly code = 'OUT_OF_ORDER';
    readonly retryable = false;
}

export class NotFoundError extends PagewatchError {
    readonly code = 'NOT_FOUND';
    readonly retryable = false;
    readonly resource: string;
    readonly key: string;

    constructor(resource: string, key: string) {
        super(`${resource} not found: ${key}`);
        this.resource = resource;
        this.key = key;
    }
}

export class HandlerError extends PagewatchError {
    readonly code = 'HANDLER_FAILED';
    readonly retryable = false;
    readonly eventKind: string;
    readonly handlerIndex: number;

    constructor(eventKind: string, handlerIndex: number, cause: unknown) {
        super(`Handler #${handlerIndex} for ${eventKind} failed: ${toErrorMessage(cause)}`, { cause });
        this.eventKind = eventKind;
        this.handlerIndex = handlerIndex;
    }
}

export class ConfigError extends PagewatchError {
    readonly code = 'CONFIG_INVALID';
    readonly retryable = false;
}

export function isRetryable(err: unknown): boolean {
    return err instanceof PagewatchError && err.retryable;
}

export function toErrorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
