import { formatPairKey, type CurrencyPair } from './currency.js';
import { StaleRateError } from './errors.js';

export interface Timestamped {
  pair?: CurrencyPair;
  updatedAt: Date;
}

export function rateAgeMs(record: Timestamped, now: Date = new Date()): number {
  return now.getTime() - record.updatedAt.getTime();
}

/** Fresh iff strictly younger than the TTL; an age equal to the TTL is stale. */
export function isFresh(record: Timestamped, ttlMs: number, now: Date = new Date()): boolean {
  return rateAgeMs(record, now) < ttlMs;
}

export function assertFresh(record: Timestamped, ttlMs: number, now: Date = new Date()): void {
  if (!isFresh(record, ttlMs, now)) {
    const pair = record.pair ? formatPairKey(record.pair) : 'rate';
    throw new StaleRateError(pair, rateAgeMs(record, now), ttlMs);
  }
}
