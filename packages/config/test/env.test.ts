import path from 'node:path';
import { DEFAULT_MAX_RATE, DEFAULT_MIN_RATE } from '@fxhub/domain';
import { describe, expect, it } from 'vitest';
import { loadParserConfig, loadRatesServiceEnv } from '../src/index.js';

describe('loadRatesServiceEnv', () => {
  it('applies defaults for an empty environment', () => {
    const env = loadRatesServiceEnv({});

    expect(env.RATES_BASE_CURRENCY).toBe('USD');
    expect(env.RATES_FIAT_CURRENCIES).toEqual(['EUR', 'GBP', 'RUB', 'JPY', 'CHF', 'CAD', 'AUD', 'CNY']);
    expect(env.RATES_CRYPTO_CURRENCIES).toEqual(['BTC', 'ETH', 'SOL', 'BNB', 'XRP', 'ADA', 'DOGE', 'DOT']);
    expect(env.RATES_TTL_SECONDS).toBe(300);
    expect(env.RATES_SCHEDULER_ENABLED).toBe(true);
    expect(env.EXCHANGERATE_API_KEY).toBeUndefined();
  });

  it('defaults the valid-rate bounds to the domain constants', () => {
    const config = loadParserConfig({});

    expect(config.bounds).toEqual({ min: DEFAULT_MIN_RATE, max: DEFAULT_MAX_RATE });
  });

  it('normalizes currency lists and treats blank keys as absent', () => {
    const env = loadRatesServiceEnv({
      RATES_BASE_CURRENCY: ' usd ',
      RATES_FIAT_CURRENCIES: 'eur, gbp,,',
      RATES_CRYPTO_CURRENCIES: 'btc',
      EXCHANGERATE_API_KEY: '   ',
      RATES_SCHEDULER_ENABLED: 'false'
    });

    expect(env.RATES_BASE_CURRENCY).toBe('USD');
    expect(env.RATES_FIAT_CURRENCIES).toEqual(['EUR', 'GBP']);
    expect(env.RATES_CRYPTO_CURRENCIES).toEqual(['BTC']);
    expect(env.EXCHANGERATE_API_KEY).toBeUndefined();
    expect(env.RATES_SCHEDULER_ENABLED).toBe(false);
  });

  it('rejects malformed currency codes', () => {
    expect(() => loadRatesServiceEnv({ RATES_FIAT_CURRENCIES: 'EUR,EURO123' })).toThrow(/2-5 uppercase letters/);
  });

  it('rejects inverted rate bounds', () => {
    expect(() => loadRatesServiceEnv({ RATES_MIN_VALID: '10', RATES_MAX_VALID: '1' })).toThrow(
      /RATES_MIN_VALID must be lower than RATES_MAX_VALID/
    );
  });

  it('rejects a base currency that is also tracked', () => {
    expect(() => loadRatesServiceEnv({ RATES_FIAT_CURRENCIES: 'EUR,USD' })).toThrow(/must not appear in the tracked/);
  });
});

describe('loadParserConfig', () => {
  it('builds a frozen config with derived durations and paths', () => {
    const config = loadParserConfig({
      RATES_TTL_SECONDS: '60',
      RATES_UPDATE_INTERVAL_SECONDS: '120',
      RATES_DATA_DIR: '/var/lib/fxhub',
      EXCHANGERATE_API_KEY: 'test-secret'
    });

    expect(config.ttlMs).toBe(60_000);
    expect(config.updateIntervalMs).toBe(120_000);
    expect(config.snapshotPath).toBe(path.resolve('/var/lib/fxhub', 'rates.json'));
    expect(config.historyPath).toBe(path.resolve('/var/lib/fxhub', 'exchange_rates.json'));
    expect(config.exchangeRateApi.apiKey).toBe('test-secret');
    expect(config.coingecko.apiKey).toBeUndefined();
    expect(config.bounds).toEqual({ min: 1e-9, max: 1e9 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.retry)).toBe(true);
  });
});
