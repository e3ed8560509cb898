import { describe, expect, it } from 'vitest';
import {
  CurrencyRegistry,
  InvalidCurrencyPairError,
  UnknownCurrencyError,
  assertCurrencyPair,
  canonicalPairKey,
  createCurrencyRegistry,
  formatPairKey,
  pairClass,
  parsePairKey
} from '../src/index.js';

describe('parsePairKey', () => {
  it('parses FROM_TO keys', () => {
    expect(parsePairKey('BTC_USD')).toEqual({ from: 'BTC', to: 'USD' });
  });

  it('uppercases codes', () => {
    expect(parsePairKey('eur_usd')).toEqual({ from: 'EUR', to: 'USD' });
  });

  it.each(['BTCUSD', 'BTC_USD_EUR', '_USD', 'B_USD', 'BITCOIN_USD', 'USD_USD', 'BT1_USD'])('rejects %s', (key) => {
    expect(() => parsePairKey(key)).toThrow(InvalidCurrencyPairError);
  });
});

describe('assertCurrencyPair', () => {
  const registry = new CurrencyRegistry();

  it('accepts registered currencies', () => {
    expect(formatPairKey(assertCurrencyPair(' btc ', 'eur', registry))).toBe('BTC_EUR');
  });

  it('rejects currencies outside the registry', () => {
    expect(() => assertCurrencyPair('XYZ', 'USD', registry)).toThrow(UnknownCurrencyError);
  });

  it('rejects identical codes', () => {
    expect(() => assertCurrencyPair('USD', 'usd', registry)).toThrow(/cannot be converted to itself/);
  });
});

describe('createCurrencyRegistry', () => {
  it('adds configured codes that are not built in', () => {
    const registry = createCurrencyRegistry({
      baseCurrency: 'USD',
      fiatCurrencies: ['EUR', 'NOK'],
      cryptoCurrencies: ['AVAX']
    });

    expect(registry.classify('NOK')).toBe('fiat');
    expect(registry.classify('AVAX')).toBe('crypto');
    expect(registry.classify('BTC')).toBe('crypto');
    expect(registry.list('crypto').map((c) => c.code)).toContain('AVAX');
  });
});

describe('pair helpers', () => {
  const registry = new CurrencyRegistry();

  it('maps both directions to one canonical key', () => {
    expect(canonicalPairKey({ from: 'USD', to: 'BTC' })).toBe('BTC_USD');
    expect(canonicalPairKey({ from: 'BTC', to: 'USD' })).toBe('BTC_USD');
  });

  it('classifies a pair touching crypto as crypto', () => {
    expect(pairClass({ from: 'USD', to: 'ETH' }, registry)).toBe('crypto');
    expect(pairClass({ from: 'EUR', to: 'USD' }, registry)).toBe('fiat');
  });
});
