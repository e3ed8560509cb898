import { formatPairKey, type CurrencyClass } from '@fxhub/domain';
import { log } from '@fxhub/observability';
import type { RateSource, RateSourceOptions, SourceBatch, SourceQuote } from './types.js';

/** Placeholder USD prices used when a provider has no credentials. */
export const PLACEHOLDER_USD_RATES: Readonly<Record<string, number>> = {
    USD: 1,
    EUR: 1.0786,
    GBP: 1.2543,
    RUB: 0.01016,
    JPY: 0.0067,
    CHF: 1.1312,
    CAD: 0.7321,
    AUD: 0.6598,
    CNY: 0.1384,
    BTC: 59337.21,
    ETH: 3720.0,
    SOL: 145.12,
    BNB: 585.4,
    XRP: 0.5231,
    ADA: 0.4512,
    DOGE: 0.1235,
    DOT: 7.12
};

export interface MockRateSourceOptions extends RateSourceOptions {
    domain: CurrencyClass;
    standsInFor?: string;
    rates?: Readonly<Record<string, number>>;
}

/**
 * Deterministic source for a currency domain. Keeps the pipeline producing a
 * table when a provider has no API key; every quote is stamped at fetch time.
 */
export class MockRateSource implements RateSource {
    readonly name: string;
    readonly domain: CurrencyClass;
    readonly standsInFor?: string;

    private readonly usdRates: Readonly<Record<string, number>>;
    private readonly now: () => Date;
    private fetchCount = 0;

    constructor(private readonly options: MockRateSourceOptions) {
        this.name = `mock-${options.domain}`;
        this.domain = options.domain;
        if (options.standsInFor) {
            this.standsInFor = options.standsInFor;
        }
        this.usdRates = options.rates ?? PLACEHOLDER_USD_RATES;
        this.now = options.now ?? (() => new Date());
    }

    async fetch(): Promise<SourceBatch> {
        this.fetchCount++;
        const fetchedAt = this.now();
        const base = this.options.baseCurrency;
        const baseInUsd = this.usdRates[base];
        const rates = new Map<string, SourceQuote>();

        if (baseInUsd === undefined) {
            log('warn', '[MockRates] No placeholder price for base currency', { source: this.name, base });
            return { source: this.name, fetchedAt, rates };
        }

        for (const code of this.options.currencies) {
            const codeInUsd = this.usdRates[code];
            if (codeInUsd === undefined || code === base) {
                continue;
            }
            rates.set(formatPairKey({ from: code, to: base }), { rate: codeInUsd / baseInUsd, observedAt: fetchedAt });
        }

        log('info', '[MockRates] Placeholder rates served', { source: this.name, count: rates.size });
        return { source: this.name, fetchedAt, rates };
    }

    /** Number of fetches served (for test assertions). */
    getFetchCount(): number {
        return this.fetchCount;
    }
}
