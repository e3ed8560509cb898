import { formatPairKey } from '@fxhub/domain';
import { log } from '@fxhub/observability';
import { z } from 'zod';
import { MalformedResponseError } from './errors.js';
import { fetchJson } from './http.js';
import type { RateSource, RateSourceOptions, SourceBatch, SourceQuote } from './types.js';

/** CoinGecko coin ids for the tracked tickers. */
export const COINGECKO_IDS: Readonly<Record<string, string>> = {
    BTC: 'bitcoin',
    ETH: 'ethereum',
    SOL: 'solana',
    BNB: 'binancecoin',
    XRP: 'ripple',
    ADA: 'cardano',
    DOGE: 'dogecoin',
    DOT: 'polkadot'
};

const simplePriceSchema = z.record(
    z.string(),
    z.object({ last_updated_at: z.number().optional() }).catchall(z.number())
);

export interface CoinGeckoOptions extends RateSourceOptions {
    baseUrl: string;
    apiKey: string;
    idMap?: Readonly<Record<string, string>>;
}

/**
 * Crypto → base rates from CoinGecko's `/simple/price` endpoint.
 * Provider `last_updated_at` stamps become each quote's `observedAt`.
 */
export class CoinGeckoRateSource implements RateSource {
    readonly name = 'coingecko';
    readonly domain = 'crypto' as const;

    private readonly idMap: Readonly<Record<string, string>>;
    private readonly now: () => Date;

    constructor(private readonly options: CoinGeckoOptions) {
        this.idMap = options.idMap ?? COINGECKO_IDS;
        this.now = options.now ?? (() => new Date());
    }

    async fetch(signal?: AbortSignal): Promise<SourceBatch> {
        const base = this.options.baseCurrency;
        const codesById = new Map<string, string>();
        for (const code of this.options.currencies) {
            const id = this.idMap[code];
            if (id) {
                codesById.set(id, code);
            } else {
                log('warn', 'No CoinGecko id for tracked currency', { currency: code });
            }
        }

        if (codesById.size === 0) {
            return { source: this.name, fetchedAt: this.now(), rates: new Map() };
        }

        const vsCurrency = base.toLowerCase();
        const query = new URLSearchParams({
            ids: [...codesById.keys()].join(','),
            vs_currencies: vsCurrency,
            include_last_updated_at: 'true'
        });

        const payload = await fetchJson(`${this.options.baseUrl}/simple/price?${query.toString()}`, {
            source: this.name,
            timeoutMs: this.options.requestTimeoutMs,
            headers: { 'x-cg-demo-api-key': this.options.apiKey },
            ...(signal ? { signal } : {})
        });
        const fetchedAt = this.now();

        const parsed = simplePriceSchema.safeParse(payload);
        if (!parsed.success) {
            throw new MalformedResponseError(this.name, parsed.error.issues[0]?.message ?? 'invalid price map');
        }

        const rates = new Map<string, SourceQuote>();
        for (const [id, entry] of Object.entries(parsed.data)) {
            const code = codesById.get(id);
            const rate = entry[vsCurrency];
            if (!code || rate === undefined) {
                continue;
            }

            rates.set(formatPairKey({ from: code, to: base }), {
                rate,
                observedAt: entry.last_updated_at ? new Date(entry.last_updated_at * 1000) : fetchedAt
            });
        }

        if (rates.size === 0) {
            throw new MalformedResponseError(this.name, `no ${vsCurrency} prices for the requested ids`);
        }

        return { source: this.name, fetchedAt, rates };
    }
}
