export class SourceTimeoutError extends Error {
    readonly code = 'SOURCE_TIMEOUT';

    constructor(
        readonly source: string,
        readonly timeoutMs: number
    ) {
        super(`${source} did not answer within ${timeoutMs}ms.`);
        this.name = 'SourceTimeoutError';
    }
}

export class SourceUnreachableError extends Error {
    readonly code = 'SOURCE_UNREACHABLE';

    constructor(
        readonly source: string,
        detail: string,
        readonly status?: number,
        readonly retryable: boolean = true
    ) {
        super(`${source} unreachable: ${detail}`);
        this.name = 'SourceUnreachableError';
    }
}

export class MalformedResponseError extends Error {
    readonly code = 'MALFORMED_RESPONSE';

    constructor(
        readonly source: string,
        detail: string
    ) {
        super(`${source} returned an unexpected payload: ${detail}`);
        this.name = 'MalformedResponseError';
    }
}

export class RateLimitedError extends Error {
    readonly code = 'RATE_LIMITED';

    constructor(
        readonly source: string,
        readonly retryAfterMs?: number
    ) {
        super(
            retryAfterMs === undefined
                ? `${source} rate limit reached.`
                : `${source} rate limit reached; retry after ${retryAfterMs}ms.`
        );
        this.name = 'RateLimitedError';
    }
}

export class UnknownRateSourceError extends Error {
    readonly code = 'UNKNOWN_RATE_SOURCE';

    constructor(
        readonly selector: string,
        readonly available: string[]
    ) {
        super(`Unknown rate source '${selector}'. Available: ${available.join(', ')}.`);
        this.name = 'UnknownRateSourceError';
    }
}

/** Timeouts, transport failures, 5xx answers and rate limiting are worth another attempt. */
export function isRetryableSourceError(error: unknown): boolean {
    if (error instanceof SourceTimeoutError || error instanceof RateLimitedError) {
        return true;
    }
    return error instanceof SourceUnreachableError && error.retryable;
}

export function retryAfterHint(error: unknown): number | undefined {
    return error instanceof RateLimitedError ? error.retryAfterMs : undefined;
}
