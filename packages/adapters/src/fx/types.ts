import type { CurrencyClass } from '@fxhub/domain';

export interface SourceQuote {
    rate: number;
    /** When the provider observed the rate; falls back to the fetch time. */
    observedAt: Date;
}

export interface SourceBatch {
    source: string;
    fetchedAt: Date;
    /** Keyed by `FROM_TO`. */
    rates: Map<string, SourceQuote>;
}

/**
 * One external provider. A source covers a single currency domain and never
 * assumes it is the only source for its pairs.
 */
export interface RateSource {
    readonly name: string;
    readonly domain: CurrencyClass;
    /** Provider a placeholder source stands in for, so selectors by provider name still match. */
    readonly standsInFor?: string;
    fetch(signal?: AbortSignal): Promise<SourceBatch>;
}

export interface RateSourceOptions {
    baseCurrency: string;
    currencies: readonly string[];
    requestTimeoutMs: number;
    now?: () => Date;
}
