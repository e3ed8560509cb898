export type { RateSource, RateSourceOptions, SourceBatch, SourceQuote } from './types.js';
export {
    MalformedResponseError,
    RateLimitedError,
    SourceTimeoutError,
    SourceUnreachableError,
    UnknownRateSourceError,
    isRetryableSourceError,
    retryAfterHint
} from './errors.js';
export { fetchJson, parseRetryAfter, type FetchJsonOptions } from './http.js';
export { COINGECKO_IDS, CoinGeckoRateSource, type CoinGeckoOptions } from './coingecko.js';
export { ExchangeRateApiSource, type ExchangeRateApiOptions } from './exchange-rate-api.js';
export { MockRateSource, PLACEHOLDER_USD_RATES, type MockRateSourceOptions } from './mock.js';

import { log } from '@fxhub/observability';
import { CoinGeckoRateSource } from './coingecko.js';
import { UnknownRateSourceError } from './errors.js';
import { ExchangeRateApiSource } from './exchange-rate-api.js';
import { MockRateSource } from './mock.js';
import type { RateSource } from './types.js';

/** Structurally satisfied by `ParserConfig`. */
export interface RateSourceFactoryConfig {
    baseCurrency: string;
    fiatCurrencies: readonly string[];
    cryptoCurrencies: readonly string[];
    requestTimeoutMs: number;
    coingecko: { url: string; apiKey?: string | undefined };
    exchangeRateApi: { url: string; apiKey?: string | undefined };
}

/**
 * One source per tracked domain: the real provider when its API key is
 * configured, otherwise the placeholder source for that domain.
 */
export function createRateSources(config: RateSourceFactoryConfig, now?: () => Date): RateSource[] {
    const sources: RateSource[] = [];
    const common = {
        baseCurrency: config.baseCurrency,
        requestTimeoutMs: config.requestTimeoutMs,
        ...(now ? { now } : {})
    };

    if (config.cryptoCurrencies.length > 0) {
        if (config.coingecko.apiKey) {
            sources.push(
                new CoinGeckoRateSource({
                    ...common,
                    currencies: config.cryptoCurrencies,
                    baseUrl: config.coingecko.url,
                    apiKey: config.coingecko.apiKey
                })
            );
        } else {
            log('warn', 'COINGECKO_API_KEY not set; crypto rates come from placeholder data');
            sources.push(
                new MockRateSource({ ...common, currencies: config.cryptoCurrencies, domain: 'crypto', standsInFor: 'coingecko' })
            );
        }
    }

    if (config.fiatCurrencies.length > 0) {
        if (config.exchangeRateApi.apiKey) {
            sources.push(
                new ExchangeRateApiSource({
                    ...common,
                    currencies: config.fiatCurrencies,
                    baseUrl: config.exchangeRateApi.url,
                    apiKey: config.exchangeRateApi.apiKey
                })
            );
        } else {
            log('warn', 'EXCHANGERATE_API_KEY not set; fiat rates come from placeholder data');
            sources.push(
                new MockRateSource({ ...common, currencies: config.fiatCurrencies, domain: 'fiat', standsInFor: 'exchangerate-api' })
            );
        }
    }

    return sources;
}

function matchesSelector(source: RateSource, selector: string): boolean {
    return selector === source.name || selector === source.standsInFor || selector === source.domain;
}

/**
 * Narrow `sources` by name, provider stood in for, or domain (`fiat`/`crypto`).
 * `all` or an empty selection keeps every source.
 */
export function selectRateSources(sources: readonly RateSource[], selectors: readonly string[] = []): RateSource[] {
    const wanted = selectors.map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0);
    if (wanted.length === 0 || wanted.includes('all')) {
        return [...sources];
    }

    for (const selector of wanted) {
        if (!sources.some((source) => matchesSelector(source, selector))) {
            const available = new Set<string>(['all']);
            for (const source of sources) {
                available.add(source.name);
                available.add(source.domain);
                if (source.standsInFor) available.add(source.standsInFor);
            }
            throw new UnknownRateSourceError(selector, [...available]);
        }
    }

    return sources.filter((source) => wanted.some((selector) => matchesSelector(source, selector)));
}
