import { afterEach, describe, expect, it } from 'vitest';
import { createServiceLogger, redactMetadata, setLogSink, withTiming, type LogEntry } from '../src/index.js';

function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogSink((entry) => entries.push(entry));
  return entries;
}

afterEach(() => {
  setLogSink(null);
});

describe('createServiceLogger', () => {
  it('tags every line with the service name and child bindings', () => {
    const entries = captureLogs();
    const logger = createServiceLogger({ service: 'rates-service', minLevel: 'info' }).child({ runId: 'run_1' });

    logger.warn('source failed', { source: 'coingecko' });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.level).toBe('warn');
    expect(entries[0]?.message).toBe('source failed');
    expect(entries[0]?.metadata).toEqual({ service: 'rates-service', runId: 'run_1', source: 'coingecko' });
  });

  it('drops lines below the minimum level', () => {
    const entries = captureLogs();
    const logger = createServiceLogger({ service: 'rates-service', minLevel: 'warn' });

    logger.debug('noise');
    logger.info('still noise');
    logger.error('kept');

    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });

  it('emits debug lines on the info channel with a debug marker', () => {
    const entries = captureLogs();
    const logger = createServiceLogger({ service: 'rates-service', minLevel: 'debug' });

    logger.debug('merge detail', { pairs: 4 });

    expect(entries[0]?.level).toBe('info');
    expect(entries[0]?.metadata).toEqual({ service: 'rates-service', pairs: 4, debug: true });
  });
});

describe('redactMetadata', () => {
  it('redacts credential keys at any depth', () => {
    expect(
      redactMetadata({
        source: 'exchangerate-api',
        config: { exchangeRateApiKey: 'test-secret', timeoutMs: 1000 }
      })
    ).toEqual({
      source: 'exchangerate-api',
      config: { exchangeRateApiKey: '[REDACTED]', timeoutMs: 1000 }
    });
  });
});

describe('withTiming', () => {
  it('returns the value with a non-negative duration', async () => {
    const timed = await withTiming(async () => 42);
    expect(timed.value).toBe(42);
    expect(timed.elapsedMs).toBeGreaterThanOrEqual(0);
  });

  it('reports the error to onSettled and rethrows', async () => {
    const seen: unknown[] = [];
    await expect(
      withTiming(
        async () => {
          throw new Error('boom');
        },
        (_elapsed, error) => seen.push(error)
      )
    ).rejects.toThrow('boom');

    expect(seen).toHaveLength(1);
    expect((seen[0] as Error).message).toBe('boom');
  });
});
