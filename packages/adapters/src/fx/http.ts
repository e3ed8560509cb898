import { MalformedResponseError, RateLimitedError, SourceTimeoutError, SourceUnreachableError } from './errors.js';

export interface FetchJsonOptions {
    source: string;
    timeoutMs: number;
    signal?: AbortSignal;
    headers?: Record<string, string>;
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(header: string | null, now: Date = new Date()): number | undefined {
    if (!header) {
        return undefined;
    }

    const seconds = Number(header);
    if (Number.isFinite(seconds) && seconds >= 0) {
        return Math.round(seconds * 1000);
    }

    const date = Date.parse(header);
    if (Number.isNaN(date)) {
        return undefined;
    }
    return Math.max(date - now.getTime(), 0);
}

function failureFor(error: unknown, options: FetchJsonOptions, timeout: AbortSignal): Error {
    if (options.signal?.aborted) {
        const reason: unknown = options.signal.reason;
        return reason instanceof Error ? reason : new SourceTimeoutError(options.source, options.timeoutMs);
    }
    if (timeout.aborted) {
        return new SourceTimeoutError(options.source, options.timeoutMs);
    }
    const detail = error instanceof Error ? error.message : String(error);
    return new SourceUnreachableError(options.source, detail);
}

/**
 * GET a JSON document, mapping every failure onto the source error taxonomy.
 * Each call carries its own request timeout on top of the caller's signal.
 */
export async function fetchJson(url: string, options: FetchJsonOptions): Promise<unknown> {
    const timeout = AbortSignal.timeout(options.timeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    let response: Response;
    try {
        response = await fetch(url, {
            method: 'GET',
            headers: { accept: 'application/json', ...options.headers },
            signal
        });
    } catch (error) {
        throw failureFor(error, options, timeout);
    }

    if (response.status === 429) {
        throw new RateLimitedError(options.source, parseRetryAfter(response.headers.get('retry-after')));
    }

    if (!response.ok) {
        throw new SourceUnreachableError(
            options.source,
            `responded with status ${response.status}`,
            response.status,
            response.status >= 500
        );
    }

    let text: string;
    try {
        text = await response.text();
    } catch (error) {
        throw failureFor(error, options, timeout);
    }

    try {
        return JSON.parse(text) as unknown;
    } catch {
        throw new MalformedResponseError(options.source, 'body is not valid JSON');
    }
}
