import { formatPairKey } from '@fxhub/domain';
import { log } from '@fxhub/observability';
import { z } from 'zod';
import { MalformedResponseError, RateLimitedError, SourceUnreachableError } from './errors.js';
import { fetchJson } from './http.js';
import type { RateSource, RateSourceOptions, SourceBatch, SourceQuote } from './types.js';

const latestSchema = z.object({
    result: z.string(),
    'error-type': z.string().optional(),
    base_code: z.string().optional(),
    time_last_update_unix: z.number().optional(),
    // v6 keyed endpoint uses conversion_rates; the open endpoint uses rates.
    conversion_rates: z.record(z.string(), z.number()).optional(),
    rates: z.record(z.string(), z.number()).optional()
});

type LatestPayload = z.infer<typeof latestSchema>;

export interface ExchangeRateApiOptions extends RateSourceOptions {
    baseUrl: string;
    apiKey: string;
}

/**
 * Fiat → base rates from ExchangeRate-API (`/<key>/latest/<BASE>`).
 *
 * The provider quotes how many units of each currency one BASE buys, so a
 * quote of `EUR: 0.93` becomes `EUR_USD = 1 / 0.93`.
 */
export class ExchangeRateApiSource implements RateSource {
    readonly name = 'exchangerate-api';
    readonly domain = 'fiat' as const;

    private readonly now: () => Date;

    constructor(private readonly options: ExchangeRateApiOptions) {
        this.now = options.now ?? (() => new Date());
    }

    async fetch(signal?: AbortSignal): Promise<SourceBatch> {
        const base = this.options.baseCurrency;
        const url = `${this.options.baseUrl}/${encodeURIComponent(this.options.apiKey)}/latest/${base}`;

        const payload = await fetchJson(url, {
            source: this.name,
            timeoutMs: this.options.requestTimeoutMs,
            ...(signal ? { signal } : {})
        });
        const fetchedAt = this.now();

        const parsed = latestSchema.safeParse(payload);
        if (!parsed.success) {
            throw new MalformedResponseError(this.name, parsed.error.issues[0]?.message ?? 'invalid latest payload');
        }

        const data = parsed.data;
        if (data.result !== 'success') {
            throw this.providerError(data);
        }

        if (data.base_code && data.base_code !== base) {
            throw new MalformedResponseError(this.name, `base ${data.base_code} does not match requested ${base}`);
        }

        const quotes = data.conversion_rates ?? data.rates;
        if (!quotes) {
            throw new MalformedResponseError(this.name, 'missing conversion_rates');
        }

        const observedAt = data.time_last_update_unix ? new Date(data.time_last_update_unix * 1000) : fetchedAt;
        const rates = new Map<string, SourceQuote>();
        for (const code of this.options.currencies) {
            const unitsPerBase = quotes[code];
            if (unitsPerBase === undefined || code === base) {
                continue;
            }
            rates.set(formatPairKey({ from: code, to: base }), { rate: 1 / unitsPerBase, observedAt });
        }

        const missing = this.options.currencies.filter((code) => quotes[code] === undefined);
        if (missing.length > 0) {
            log('warn', 'ExchangeRate-API omitted tracked currencies', { missing });
        }

        return { source: this.name, fetchedAt, rates };
    }

    private providerError(data: LatestPayload): Error {
        const errorType = data['error-type'] ?? 'unknown-error';
        switch (errorType) {
            case 'quota-reached':
                return new RateLimitedError(this.name);
            case 'invalid-key':
            case 'inactive-account':
                return new SourceUnreachableError(this.name, `provider rejected credentials (${errorType})`, undefined, false);
            default:
                return new MalformedResponseError(this.name, `provider reported ${errorType}`);
        }
    }
}
