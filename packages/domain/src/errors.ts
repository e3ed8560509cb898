/**
 * Error codes shared by the rate service and its clients.
 *
 * Domain failures are typed classes carrying a stable `code`; the HTTP layer
 * maps codes to statuses through `ERRORS`.
 */

export interface ApiErrorDefinition {
    code: string;
    status: number;
    message: string;
}

/** Structured API error that can be thrown from any route handler. */
export class ApiError extends Error {
    readonly code: string;
    readonly status: number;
    readonly details?: unknown;

    constructor(def: ApiErrorDefinition, details?: unknown, message?: string) {
        super(message ?? def.message);
        this.name = 'ApiError';
        this.code = def.code;
        this.status = def.status;
        this.details = details;
    }

    toJSON(): { error: { code: string; message: string; details?: unknown } } {
        const error: { code: string; message: string; details?: unknown } = {
            code: this.code,
            message: this.message
        };
        if (this.details !== undefined) {
            error.details = this.details;
        }
        return { error };
    }
}

export const ERRORS = {
    // ── Validation ──
    INVALID_PAYLOAD: { code: 'INVALID_PAYLOAD', status: 400, message: 'Invalid request payload.' },
    INVALID_QUERY: { code: 'INVALID_QUERY', status: 400, message: 'Invalid query parameters.' },
    INVALID_CURRENCY_PAIR: { code: 'INVALID_CURRENCY_PAIR', status: 400, message: 'Invalid currency pair.' },
    UNKNOWN_CURRENCY: { code: 'UNKNOWN_CURRENCY', status: 400, message: 'Unknown currency code.' },
    UNKNOWN_RATE_SOURCE: { code: 'UNKNOWN_RATE_SOURCE', status: 400, message: 'Unknown rate source.' },

    // ── Rates ──
    RATE_NOT_FOUND: { code: 'RATE_NOT_FOUND', status: 404, message: 'No rate available for this pair.' },
    STALE_RATE: { code: 'STALE_RATE', status: 409, message: 'Cached rate is older than its time-to-live.' },
    RATE_OUT_OF_BOUNDS: { code: 'RATE_OUT_OF_BOUNDS', status: 422, message: 'Rate outside the accepted range.' },

    // ── Refresh ──
    NO_SOURCES_AVAILABLE: { code: 'NO_SOURCES_AVAILABLE', status: 503, message: 'Every rate source failed.' },
    NO_VALID_RATES: { code: 'NO_VALID_RATES', status: 502, message: 'Sources answered but no rate passed validation.' },
    RUN_CANCELLED: { code: 'RUN_CANCELLED', status: 503, message: 'Refresh was cancelled before it was persisted.' },
    PERSISTENCE_ERROR: { code: 'PERSISTENCE_ERROR', status: 500, message: 'Rate snapshot could not be written.' },

    // ── Internal ──
    INTERNAL_ERROR: { code: 'INTERNAL_ERROR', status: 500, message: 'An unexpected internal error occurred.' }
} as const satisfies Record<string, ApiErrorDefinition>;

export type ErrorCode = keyof typeof ERRORS;

export function isErrorCode(code: string): code is ErrorCode {
    return Object.prototype.hasOwnProperty.call(ERRORS, code);
}

export class InvalidCurrencyPairError extends Error {
    readonly code = 'INVALID_CURRENCY_PAIR';

    constructor(reason: string) {
        super(`Invalid currency pair: ${reason}`);
        this.name = 'InvalidCurrencyPairError';
    }
}

export class UnknownCurrencyError extends Error {
    readonly code = 'UNKNOWN_CURRENCY';

    constructor(readonly currency: string) {
        super(`Unknown currency '${currency}'.`);
        this.name = 'UnknownCurrencyError';
    }
}

export class RateOutOfBoundsError extends Error {
    readonly code = 'RATE_OUT_OF_BOUNDS';

    constructor(
        readonly pair: string,
        readonly rate: number,
        readonly bounds: { min: number; max: number }
    ) {
        super(`Rate ${rate} for ${pair} is outside (${bounds.min}, ${bounds.max}).`);
        this.name = 'RateOutOfBoundsError';
    }
}

export class RateNotFoundError extends Error {
    readonly code = 'RATE_NOT_FOUND';

    constructor(readonly pair: string) {
        super(`No rate available for ${pair}.`);
        this.name = 'RateNotFoundError';
    }
}

export class StaleRateError extends Error {
    readonly code = 'STALE_RATE';

    constructor(
        readonly pair: string,
        readonly ageMs: number,
        readonly ttlMs: number
    ) {
        super(`Rate for ${pair} is ${Math.round(ageMs / 1000)}s old; time-to-live is ${Math.round(ttlMs / 1000)}s.`);
        this.name = 'StaleRateError';
    }
}

export interface ErrorSummary {
    code: string;
    message: string;
}

/** Normalize anything thrown into a `{ code, message }` pair for results and logs. */
export function toErrorSummary(error: unknown): ErrorSummary {
    if (error instanceof Error) {
        const code = 'code' in error && typeof error.code === 'string' ? error.code : 'INTERNAL_ERROR';
        return { code, message: error.message };
    }
    return { code: 'INTERNAL_ERROR', message: String(error) };
}
