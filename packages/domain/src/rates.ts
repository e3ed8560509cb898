import { RATE_EPSILON, SNAPSHOT_SOURCE, type RateOrigin } from './constants.js';
import { formatPairKey, invertPair, type CurrencyPair } from './currency.js';
import { RateOutOfBoundsError } from './errors.js';

export interface RateBounds {
  min: number;
  max: number;
}

export interface RateRecord {
  pair: CurrencyPair;
  rate: number;
  updatedAt: Date;
  source: string;
  origin: RateOrigin;
}

export interface RateTable {
  pairs: Map<string, RateRecord>;
  lastRefresh: Date | null;
  source: string;
}

export interface HistoryEntry {
  id: string;
  from: string;
  to: string;
  rate: number;
  timestamp: Date;
  source: string;
  meta: Record<string, unknown>;
}

export type LookupPath = 'direct' | 'inverse' | 'bridge';

/** Result of resolving a pair against a rate table. */
export interface RateQuote {
  from: string;
  to: string;
  rate: number;
  updatedAt: Date;
  source: string;
  via: LookupPath;
}

export function emptyRateTable(source: string = SNAPSHOT_SOURCE): RateTable {
  return { pairs: new Map(), lastRefresh: null, source };
}

/** Strictly inside the bounds; non-finite and non-positive rates never pass. */
export function isRateInBounds(rate: number, bounds: RateBounds): boolean {
  return Number.isFinite(rate) && rate > 0 && rate > bounds.min && rate < bounds.max;
}

export function assertRateInBounds(pair: CurrencyPair, rate: number, bounds: RateBounds): void {
  if (!isRateInBounds(rate, bounds)) {
    throw new RateOutOfBoundsError(formatPairKey(pair), rate, bounds);
  }
}

export function invertRecord(record: RateRecord): RateRecord {
  return {
    pair: invertPair(record.pair),
    rate: 1 / record.rate,
    updatedAt: record.updatedAt,
    source: record.source,
    origin: record.origin === 'bridge' ? 'bridge' : 'inverse'
  };
}

export function ratesApproximatelyEqual(a: number, b: number, relativeTolerance = RATE_EPSILON): boolean {
  return Math.abs(a - b) <= relativeTolerance * Math.max(Math.abs(a), Math.abs(b));
}
