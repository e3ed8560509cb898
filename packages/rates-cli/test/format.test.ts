import { describe, expect, it } from 'vitest';
import { formatRate, formatRateDescription, formatUpdateResult } from '../src/format.js';

describe('formatRate', () => {
  it('scales precision with magnitude', () => {
    expect(formatRate(0.00002)).toBe('0.00002000');
    expect(formatRate(0.01)).toBe('0.010000');
    expect(formatRate(0.93)).toBe('0.930000');
    expect(formatRate(1.0786)).toBe('1.0786');
    expect(formatRate(999.5)).toBe('999.5000');
    expect(formatRate(1000)).toBe('1,000.00');
    expect(formatRate(53763.44086)).toBe('53,763.44');
  });
});

describe('formatRateDescription', () => {
  const description = {
    from: 'BTC',
    to: 'USD',
    rate: 50000,
    reverseRate: 0.00002,
    updatedAt: '2024-05-01T12:00:00.000Z',
    source: 'coingecko',
    via: 'direct',
    fresh: true,
    ageSeconds: 42,
    ttlSeconds: 300
  };

  it('shows both directions and provenance', () => {
    expect(formatRateDescription(description)).toBe(
      [
        '1 BTC = 50,000.00 USD',
        '1 USD = 0.00002000 BTC',
        'Source: coingecko (direct), updated 2024-05-01T12:00:00.000Z (42s ago)'
      ].join('\n')
    );
  });

  it('adds a refresh hint when the rate is stale', () => {
    const lines = formatRateDescription({ ...description, fresh: false, ageSeconds: 900 }).split('\n');
    expect(lines[3]).toBe('Rate is stale (older than 300s). Run `rates-cli update-rates` to refresh.');
  });
});

describe('formatUpdateResult', () => {
  it('summarizes counts and failed sources', () => {
    const output = formatUpdateResult({
      runId: 'run_1',
      trigger: 'manual',
      success: true,
      elapsedMs: 120,
      lastRefresh: '2024-05-01T12:00:00.000Z',
      sources: [
        { source: 'coingecko', ok: true, fetched: 2, attempts: 1, elapsedMs: 80 },
        {
          source: 'exchangerate-api',
          ok: false,
          fetched: 0,
          attempts: 3,
          elapsedMs: 110,
          error: { code: 'SOURCE_TIMEOUT', message: 'exchangerate-api did not answer within 10ms.' }
        }
      ],
      counts: {
        fiat: { fetched: 0, saved: 0, rejected: 0 },
        crypto: { fetched: 2, saved: 4, rejected: 0 }
      },
      totals: { fetched: 2, saved: 4, rejected: 0 }
    });

    expect(output.split('\n')).toEqual([
      'Update succeeded in 120ms (run run_1)',
      '  fiat: fetched 0, saved 0, rejected 0',
      '  crypto: fetched 2, saved 4, rejected 0',
      '  coingecko: ok, 2 rates, 1 attempt(s)',
      '  exchangerate-api: failed SOURCE_TIMEOUT after 3 attempt(s)'
    ]);
  });
});
