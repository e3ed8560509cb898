import {
  BRIDGE_SOURCE_PREFIX,
  RateNotFoundError,
  assertCurrencyPair,
  assertFresh,
  formatPairKey,
  isFresh,
  rateAgeMs,
  type CurrencyRegistry,
  type RateQuote,
  type RateTable
} from '@fxhub/domain';
import type { RateDescription, RateListOptions, RateListing, RateView } from './types.js';

type PartialQuote = Omit<RateQuote, 'from' | 'to'>;

function storedOrInverse(table: RateTable, from: string, to: string): PartialQuote | null {
  const direct = table.pairs.get(formatPairKey({ from, to }));
  if (direct) {
    return { rate: direct.rate, updatedAt: direct.updatedAt, source: direct.source, via: 'direct' };
  }

  const inverse = table.pairs.get(formatPairKey({ from: to, to: from }));
  if (inverse) {
    return { rate: 1 / inverse.rate, updatedAt: inverse.updatedAt, source: inverse.source, via: 'inverse' };
  }

  return null;
}

/**
 * Resolve `from → to` against a table: direct key, then stored inverse, then
 * a bridge through `baseCurrency` stamped with the older leg's time.
 */
export function resolveRate(table: RateTable, from: string, to: string, baseCurrency: string): RateQuote | null {
  const stored = storedOrInverse(table, from, to);
  if (stored) {
    return { from, to, ...stored };
  }

  if (from === baseCurrency || to === baseCurrency) {
    return null;
  }

  const first = storedOrInverse(table, from, baseCurrency);
  const second = storedOrInverse(table, baseCurrency, to);
  if (!first || !second) {
    return null;
  }

  return {
    from,
    to,
    rate: first.rate * second.rate,
    updatedAt: first.updatedAt.getTime() <= second.updatedAt.getTime() ? first.updatedAt : second.updatedAt,
    source: `${BRIDGE_SOURCE_PREFIX}${baseCurrency}`,
    via: 'bridge'
  };
}

export interface RateReader {
  load(): Promise<RateTable>;
  get(from: string, to: string): Promise<RateQuote | null>;
}

export interface RateLookupOptions {
  registry: CurrencyRegistry;
  baseCurrency: string;
  ttlMs: number;
  now?: () => Date;
}

/** Freshness-gated reads for trading callers and the HTTP surface. */
export class RateLookupService {
  private readonly now: () => Date;

  constructor(
    private readonly cache: RateReader,
    private readonly options: RateLookupOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  /** A rate safe to trade on: throws RateNotFoundError or StaleRateError otherwise. */
  async getUsableRate(from: string, to: string): Promise<RateQuote> {
    const quote = await this.resolve(from, to);
    assertFresh({ pair: { from: quote.from, to: quote.to }, updatedAt: quote.updatedAt }, this.options.ttlMs, this.now());
    return quote;
  }

  /** Like `getUsableRate`, but reports staleness instead of throwing. */
  async describeRate(from: string, to: string): Promise<RateDescription> {
    const quote = await this.resolve(from, to);
    const now = this.now();

    return {
      from: quote.from,
      to: quote.to,
      rate: quote.rate,
      reverseRate: 1 / quote.rate,
      updatedAt: quote.updatedAt,
      source: quote.source,
      via: quote.via,
      fresh: isFresh(quote, this.options.ttlMs, now),
      ageSeconds: Math.max(Math.round(rateAgeMs(quote, now) / 1000), 0),
      ttlSeconds: Math.round(this.options.ttlMs / 1000)
    };
  }

  /** Stored pairs sorted by key, or the `top` highest rates. */
  async listRates(options: RateListOptions = {}): Promise<RateListing> {
    const table = await this.cache.load();
    const now = this.now();

    let rates: RateView[] = [...table.pairs.entries()]
      .filter(([, record]) => !options.currency || record.pair.from === options.currency || record.pair.to === options.currency)
      .map(([key, record]) => ({
        pair: key,
        from: record.pair.from,
        to: record.pair.to,
        rate: record.rate,
        updatedAt: record.updatedAt,
        source: record.source,
        origin: record.origin,
        fresh: isFresh(record, this.options.ttlMs, now),
        ageSeconds: Math.max(Math.round(rateAgeMs(record, now) / 1000), 0)
      }));

    if (options.top !== undefined) {
      rates = rates.sort((a, b) => b.rate - a.rate || a.pair.localeCompare(b.pair)).slice(0, options.top);
    } else {
      rates = rates.sort((a, b) => a.pair.localeCompare(b.pair));
    }

    return {
      baseCurrency: this.options.baseCurrency,
      lastRefresh: table.lastRefresh,
      ttlSeconds: Math.round(this.options.ttlMs / 1000),
      rates
    };
  }

  private async resolve(from: string, to: string): Promise<RateQuote> {
    const pair = assertCurrencyPair(from, to, this.options.registry);
    const quote = await this.cache.get(pair.from, pair.to);
    if (!quote) {
      throw new RateNotFoundError(formatPairKey(pair));
    }
    return quote;
  }
}
