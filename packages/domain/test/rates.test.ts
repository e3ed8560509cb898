import { describe, expect, it } from 'vitest';
import {
  RATE_EPSILON,
  RateOutOfBoundsError,
  StaleRateError,
  assertFresh,
  assertRateInBounds,
  invertRecord,
  isFresh,
  isRateInBounds,
  ratesApproximatelyEqual,
  type RateRecord
} from '../src/index.js';

const bounds = { min: 1e-6, max: 1e6 };

describe('rate bounds', () => {
  it('accepts rates strictly inside the bounds', () => {
    expect(isRateInBounds(0.93, bounds)).toBe(true);
  });

  it.each([0, -1, 1e-6, 1e6, 2e6, 1e-7, Number.NaN, Number.POSITIVE_INFINITY])('rejects %s', (rate) => {
    expect(isRateInBounds(rate, bounds)).toBe(false);
  });

  it('throws with the pair and bounds attached', () => {
    try {
      assertRateInBounds({ from: 'BTC', to: 'USD' }, 5e6, bounds);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(RateOutOfBoundsError);
      expect(error).toMatchObject({ code: 'RATE_OUT_OF_BOUNDS', pair: 'BTC_USD', rate: 5e6 });
    }
  });
});

describe('invertRecord', () => {
  it('flips the pair and the rate and keeps provenance', () => {
    const record: RateRecord = {
      pair: { from: 'BTC', to: 'USD' },
      rate: 50_000,
      updatedAt: new Date('2026-01-01T00:00:00.000Z'),
      source: 'coingecko',
      origin: 'fetched'
    };

    expect(invertRecord(record)).toEqual({
      pair: { from: 'USD', to: 'BTC' },
      rate: 0.00002,
      updatedAt: record.updatedAt,
      source: 'coingecko',
      origin: 'inverse'
    });
  });
});

describe('ratesApproximatelyEqual', () => {
  it('uses a relative tolerance', () => {
    expect(ratesApproximatelyEqual(53763.44086021505, 53763.440860215)).toBe(true);
    expect(ratesApproximatelyEqual(1.0753, 1.0754)).toBe(false);
  });

  it('defaults to RATE_EPSILON', () => {
    const within = 1 + RATE_EPSILON / 2;
    const beyond = 1 + RATE_EPSILON * 4;

    expect(ratesApproximatelyEqual(1, within)).toBe(ratesApproximatelyEqual(1, within, RATE_EPSILON));
    expect(ratesApproximatelyEqual(1, within)).toBe(true);
    expect(ratesApproximatelyEqual(1, beyond)).toBe(false);
  });
});

describe('isFresh', () => {
  const updatedAt = new Date('2026-03-01T12:00:00.000Z');
  const ttlMs = 300_000;

  it('is fresh just before the TTL', () => {
    expect(isFresh({ updatedAt }, ttlMs, new Date('2026-03-01T12:04:59.999Z'))).toBe(true);
  });

  it('is stale exactly at the TTL', () => {
    expect(isFresh({ updatedAt }, ttlMs, new Date('2026-03-01T12:05:00.000Z'))).toBe(false);
  });

  it('assertFresh throws StaleRateError carrying age and ttl', () => {
    expect(() =>
      assertFresh({ pair: { from: 'EUR', to: 'USD' }, updatedAt }, ttlMs, new Date('2026-03-01T12:10:00.000Z'))
    ).toThrow(StaleRateError);

    try {
      assertFresh({ pair: { from: 'EUR', to: 'USD' }, updatedAt }, ttlMs, new Date('2026-03-01T12:10:00.000Z'));
    } catch (error) {
      expect(error).toMatchObject({ code: 'STALE_RATE', pair: 'EUR_USD', ageMs: 600_000, ttlMs });
    }
  });
});
