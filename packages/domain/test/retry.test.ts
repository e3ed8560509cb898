import { describe, expect, it } from 'vitest';
import { calculateBackoff, sleep, withRetry } from '../src/retry.js';

class TransientSourceError extends Error {
    constructor(
        message: string,
        readonly retryAfterMs?: number
    ) {
        super(message);
        this.name = 'TransientSourceError';
    }
}

class PayloadError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PayloadError';
    }
}

const isTransient = (e: unknown): boolean => e instanceof TransientSourceError;

describe('calculateBackoff', () => {
    it('returns base delay for first attempt', () => {
        expect(calculateBackoff(1, 200, 30000, 0)).toBe(200);
    });

    it('doubles delay for each subsequent attempt', () => {
        expect(calculateBackoff(2, 200, 30000, 0)).toBe(400);
        expect(calculateBackoff(3, 200, 30000, 0)).toBe(800);
    });

    it('caps delay at maxDelayMs', () => {
        expect(calculateBackoff(20, 200, 5000, 0)).toBe(5000);
    });

    it('adds jitter within expected range', () => {
        const delays = Array.from({ length: 100 }, () => calculateBackoff(1, 1000, 30000, 0.5));
        for (const d of delays) {
            expect(d).toBeGreaterThanOrEqual(1000);
            expect(d).toBeLessThanOrEqual(1500);
        }
    });
});

describe('withRetry', () => {
    it('returns on first success', async () => {
        const result = await withRetry(async () => 'ok', { maxAttempts: 3, isRetryable: () => true, baseDelayMs: 1 });

        expect(result).toEqual({ value: 'ok', attempts: 1 });
    });

    it('retries transient failures and passes the attempt number', async () => {
        const seenAttempts: number[] = [];
        const result = await withRetry(
            async (attempt) => {
                seenAttempts.push(attempt);
                if (attempt < 3) {
                    throw new TransientSourceError('timeout');
                }
                return 'recovered';
            },
            { maxAttempts: 5, isRetryable: isTransient, baseDelayMs: 1 }
        );

        expect(result.value).toBe('recovered');
        expect(result.attempts).toBe(3);
        expect(seenAttempts).toEqual([1, 2, 3]);
    });

    it('throws immediately on non-retryable error', async () => {
        let calls = 0;
        await expect(
            withRetry(
                async () => {
                    calls += 1;
                    throw new PayloadError('unexpected payload');
                },
                { maxAttempts: 5, isRetryable: isTransient, baseDelayMs: 1 }
            )
        ).rejects.toBeInstanceOf(PayloadError);

        expect(calls).toBe(1);
    });

    it('throws last error when all attempts exhausted', async () => {
        let calls = 0;
        await expect(
            withRetry(
                async () => {
                    calls += 1;
                    throw new TransientSourceError(`fail-${calls}`);
                },
                { maxAttempts: 3, isRetryable: isTransient, baseDelayMs: 1 }
            )
        ).rejects.toThrow('fail-3');

        expect(calls).toBe(3);
    });

    it('raises the wait to the retry-after hint, capped at maxDelayMs', async () => {
        const delays: number[] = [];
        let calls = 0;

        await withRetry(
            async () => {
                calls += 1;
                if (calls === 1) {
                    throw new TransientSourceError('rate limited', 40);
                }
                if (calls === 2) {
                    throw new TransientSourceError('rate limited', 10_000);
                }
                return 'done';
            },
            {
                maxAttempts: 3,
                baseDelayMs: 1,
                maxDelayMs: 50,
                jitterFactor: 0,
                isRetryable: isTransient,
                retryAfterMs: (e) => (e instanceof TransientSourceError ? e.retryAfterMs : undefined),
                onRetry: (_attempt, _error, delayMs) => delays.push(delayMs)
            }
        );

        expect(delays).toEqual([40, 50]);
    });

    it('stops retrying once the signal aborts and throws the abort reason', async () => {
        const controller = new AbortController();
        const reason = new Error('deadline reached');
        let calls = 0;

        const pending = withRetry(
            async () => {
                calls += 1;
                throw new TransientSourceError('timeout');
            },
            { maxAttempts: 10, baseDelayMs: 5_000, isRetryable: isTransient, signal: controller.signal }
        );

        setTimeout(() => controller.abort(reason), 10);

        await expect(pending).rejects.toBe(reason);
        expect(calls).toBe(1);
    });

    it('does not call fn when the signal is already aborted', async () => {
        const controller = new AbortController();
        controller.abort(new Error('cancelled'));
        let calls = 0;

        await expect(
            withRetry(
                async () => {
                    calls += 1;
                    return 'never';
                },
                { maxAttempts: 3, isRetryable: () => true, signal: controller.signal }
            )
        ).rejects.toThrow('cancelled');

        expect(calls).toBe(0);
    });
});

describe('sleep', () => {
    it('resolves after the delay', async () => {
        await expect(sleep(1)).resolves.toBeUndefined();
    });
});
