import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import type { RateSource, SourceBatch } from '@fxhub/adapters';
import { loadParserConfig, type ParserConfig } from '@fxhub/config';
import type { CurrencyClass, RateRecord } from '@fxhub/domain';
import { createServiceLogger, type ServiceLogger } from '@fxhub/observability';

export class FakeRateSource implements RateSource {
  calls = 0;

  constructor(
    readonly name: string,
    readonly domain: CurrencyClass,
    private readonly behaviour: (signal: AbortSignal | undefined, call: number) => Promise<SourceBatch>
  ) {}

  async fetch(signal?: AbortSignal): Promise<SourceBatch> {
    this.calls += 1;
    return this.behaviour(signal, this.calls);
  }
}

export function batchOf(source: string, rates: Record<string, number>, observedAt: Date): SourceBatch {
  return {
    source,
    fetchedAt: observedAt,
    rates: new Map(Object.entries(rates).map(([key, rate]) => [key, { rate, observedAt }]))
  };
}

export function staticSource(name: string, domain: CurrencyClass, rates: Record<string, number>, observedAt: Date): FakeRateSource {
  return new FakeRateSource(name, domain, async () => batchOf(name, rates, observedAt));
}

export function failingSource(name: string, domain: CurrencyClass, error: Error): FakeRateSource {
  return new FakeRateSource(name, domain, async () => {
    throw error;
  });
}

/** Never settles and ignores its signal. */
export function hangingSource(name: string, domain: CurrencyClass): FakeRateSource {
  return new FakeRateSource(name, domain, () => new Promise<SourceBatch>(() => undefined));
}

export function record(key: string, rate: number, updatedAt: Date, source = 'test-feed', origin: RateRecord['origin'] = 'fetched'): RateRecord {
  const [from = '', to = ''] = key.split('_');
  return { pair: { from, to }, rate, updatedAt, source, origin };
}

export function testConfig(dataDir: string, overrides: NodeJS.ProcessEnv = {}): ParserConfig {
  return loadParserConfig({
    RATES_DATA_DIR: dataDir,
    RATES_FIAT_CURRENCIES: 'EUR,GBP',
    RATES_CRYPTO_CURRENCIES: 'BTC,ETH',
    RATES_RETRY_MAX_ATTEMPTS: '2',
    RATES_RETRY_BASE_DELAY_MS: '1',
    RATES_RETRY_MAX_DELAY_MS: '5',
    RATES_SOURCE_DEADLINE_MS: '1000',
    RATES_SOURCE_PRIORITY: 'fiat-feed,crypto-feed',
    ...overrides
  });
}

export function testLogger(): ServiceLogger {
  return createServiceLogger({ service: 'rates-service-test', minLevel: 'error' });
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(os.tmpdir(), 'fxhub-rates-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}
