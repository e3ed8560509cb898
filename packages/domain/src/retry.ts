/**
 * Retry utility with exponential backoff + jitter.
 *
 * Wraps rate source calls, where timeouts, 5xx answers and rate limiting
 * are expected. Waits between attempts are abortable so a run deadline
 * also cuts a pending backoff short.
 */

export interface RetryOptions {
    /** Maximum number of attempts (including the initial call). */
    maxAttempts: number;
    /** Base delay in ms before the first retry (default: 200). */
    baseDelayMs?: number;
    /** Maximum delay cap in ms (default: 30_000). */
    maxDelayMs?: number;
    /** Jitter factor 0-1; 0.25 adds up to 25% random jitter. */
    jitterFactor?: number;
    /** Return true if the error is retryable. All other errors are thrown immediately. */
    isRetryable: (error: unknown) => boolean;
    /** Lower bound for the next wait taken from the error itself, e.g. a Retry-After header. */
    retryAfterMs?: (error: unknown) => number | undefined;
    /** Optional callback fired before each retry wait. */
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
    /** Aborting stops further attempts; the abort reason is thrown. */
    signal?: AbortSignal;
}

export interface RetryResult<T> {
    value: T;
    attempts: number;
}

/**
 * Calculate the delay for a given attempt using exponential backoff + jitter.
 * Formula:  min(baseDelay * 2^(attempt-1), maxDelay) * (1 + random * jitterFactor)
 */
export function calculateBackoff(attempt: number, baseDelayMs: number, maxDelayMs: number, jitterFactor: number): number {
    const exponential = Math.min(baseDelayMs * Math.pow(2, attempt - 1), maxDelayMs);
    const jitter = 1 + Math.random() * jitterFactor;
    return Math.round(exponential * jitter);
}

function abortReason(signal: AbortSignal): unknown {
    return signal.reason ?? new Error('Operation aborted.');
}

/** Promise-based sleep that rejects with the abort reason. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
        if (signal?.aborted) {
            reject(abortReason(signal));
            return;
        }

        const onAbort = (): void => {
            clearTimeout(timer);
            reject(signal ? abortReason(signal) : new Error('Operation aborted.'));
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

/**
 * Execute `fn` with retry logic.
 *
 * @returns The result value and the number of attempts made.
 * @throws The last error if all attempts are exhausted, any non-retryable error
 *         immediately, or the abort reason once `signal` fires.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<RetryResult<T>> {
    const {
        maxAttempts,
        baseDelayMs = 200,
        maxDelayMs = 30_000,
        jitterFactor = 0.25,
        isRetryable,
        retryAfterMs,
        onRetry,
        signal
    } = options;

    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (signal?.aborted) {
            throw abortReason(signal);
        }

        try {
            const value = await fn(attempt);
            return { value, attempts: attempt };
        } catch (error) {
            lastError = error;

            if (signal?.aborted) {
                throw abortReason(signal);
            }

            if (!isRetryable(error)) {
                throw error;
            }

            if (attempt < maxAttempts) {
                const backoff = calculateBackoff(attempt, baseDelayMs, maxDelayMs, jitterFactor);
                const delay = Math.min(Math.max(backoff, retryAfterMs?.(error) ?? 0), maxDelayMs);
                onRetry?.(attempt, error, delay);
                await sleep(delay, signal);
            }
        }
    }

    // All attempts exhausted; rethrow the last retryable error.
    throw lastError;
}
