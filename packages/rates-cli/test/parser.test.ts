import { describe, expect, it } from 'vitest';
import { parseCommand } from '../src/parser.js';

describe('parseCommand', () => {
  it('parses update-rates with repeated and comma separated sources', () => {
    expect(parseCommand(['update-rates', '--source', 'coingecko,fiat', '--source', 'mock-crypto'])).toEqual({
      kind: 'update-rates',
      sources: ['coingecko', 'fiat', 'mock-crypto']
    });
  });

  it('parses update-rates without a source as a full refresh', () => {
    expect(parseCommand(['update-rates'])).toEqual({ kind: 'update-rates', sources: [] });
  });

  it('normalizes the show-rates currency filter', () => {
    expect(parseCommand(['show-rates', '--currency', 'btc', '--top', '5'])).toEqual({
      kind: 'show-rates',
      currency: 'BTC',
      top: 5
    });
  });

  it('rejects a non-positive --top', () => {
    expect(() => parseCommand(['show-rates', '--top', '0'])).toThrow(/Invalid --top value/);
  });

  it('requires both sides for get-rate', () => {
    expect(() => parseCommand(['get-rate', '--from', 'BTC'])).toThrow(/Usage: rates-cli get-rate/);
  });

  it('rejects converting a currency to itself', () => {
    expect(() => parseCommand(['get-rate', '--from', 'usd', '--to', 'USD'])).toThrow('USD cannot be converted to itself.');
  });

  it('parses history filters', () => {
    expect(parseCommand(['history', '--currency', 'eur', '--limit', '20'])).toEqual({
      kind: 'history',
      currency: 'EUR',
      limit: 20
    });
  });

  it('parses scheduler status', () => {
    expect(parseCommand(['scheduler', 'status'])).toEqual({ kind: 'scheduler-status' });
  });

  it('rejects a flag with no value', () => {
    expect(() => parseCommand(['show-rates', '--currency'])).toThrow('Missing value for --currency.');
  });

  it('rejects unknown commands', () => {
    expect(() => parseCommand(['transfers', 'list'])).toThrow('Unknown command: transfers list');
  });
});
