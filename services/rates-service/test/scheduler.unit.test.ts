import { setLogSink } from '@fxhub/observability';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RateRefreshScheduler, type RefreshRunner } from '../src/jobs/rate-refresh.js';
import type { RunOptions, UpdateResult } from '../src/modules/aggregator/index.js';
import { testLogger } from './support.js';

const at = new Date('2024-05-01T12:00:00.000Z');

function resultOf(success: boolean, options: RunOptions = {}): UpdateResult {
  const empty = { fetched: 0, saved: 0, rejected: 0 };
  return {
    runId: 'run_test',
    trigger: options.trigger ?? 'manual',
    success,
    startedAt: at,
    finishedAt: at,
    elapsedMs: 0,
    lastRefresh: success ? at : null,
    sources: [],
    counts: { fiat: empty, crypto: empty },
    totals: empty,
    rejected: [],
    ...(success ? {} : { error: { code: 'NO_SOURCES_AVAILABLE', message: 'Every rate source failed: fiat-feed.' } })
  };
}

function runnerOf(run: (options: RunOptions) => Promise<UpdateResult>) {
  const spy = vi.fn(run);
  const runner: RefreshRunner = { run: (options = {}) => spy(options) };
  return { runner, spy };
}

function schedulerFor(runner: RefreshRunner): RateRefreshScheduler {
  return new RateRefreshScheduler(runner, { intervalMs: 1_000, ttlMs: 300_000, logger: testLogger(), now: () => at });
}

beforeEach(() => {
  setLogSink(() => undefined);
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
  setLogSink(null);
});

describe('RateRefreshScheduler', () => {
  it('runs once at startup and then on every interval', async () => {
    const { runner, spy } = runnerOf(async (options) => resultOf(true, options));
    const scheduler = schedulerFor(runner);

    scheduler.start();
    await vi.advanceTimersByTimeAsync(3_000);

    expect(spy.mock.calls.map(([options]) => options.trigger)).toEqual(['startup', 'scheduled', 'scheduled', 'scheduled']);
    expect(scheduler.getStatus()).toMatchObject({
      running: true,
      scheduledRuns: 4,
      successfulRuns: 4,
      failedRuns: 0,
      inFlight: false,
      lastSuccessAt: at
    });
    await scheduler.stop();
  });

  it('skips a tick while the previous scheduled run is still going', async () => {
    let finish: () => void = () => undefined;
    const { runner, spy } = runnerOf(
      (options) =>
        new Promise<UpdateResult>((resolve) => {
          finish = () => resolve(resultOf(true, options));
        })
    );
    const scheduler = schedulerFor(runner);

    scheduler.start({ runImmediately: false });
    await vi.advanceTimersByTimeAsync(3_000);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(scheduler.getStatus().inFlight).toBe(true);

    finish();
    await vi.advanceTimersByTimeAsync(1_000);
    expect(spy).toHaveBeenCalledTimes(2);
    finish();
    await scheduler.stop();
  });

  it('counts failed and throwing runs', async () => {
    let call = 0;
    const { runner } = runnerOf(async (options) => {
      call += 1;
      if (call === 2) {
        throw new Error('disk on fire');
      }
      return resultOf(false, options);
    });
    const scheduler = schedulerFor(runner);

    scheduler.start({ runImmediately: false });
    await vi.advanceTimersByTimeAsync(2_000);

    expect(scheduler.getStatus()).toMatchObject({ scheduledRuns: 2, successfulRuns: 0, failedRuns: 2, lastRunAt: at, lastSuccessAt: null });
    await scheduler.stop();
  });

  it('cancels the in-flight run on stop', async () => {
    const seen: { signal?: AbortSignal } = {};
    const { runner } = runnerOf(
      (options) =>
        new Promise<UpdateResult>((resolve) => {
          seen.signal = options.signal;
          options.signal?.addEventListener('abort', () => resolve(resultOf(false, options)), { once: true });
        })
    );
    const scheduler = schedulerFor(runner);

    scheduler.start();
    const drained = await scheduler.stop();

    expect(drained).toBe(true);
    expect(seen.signal?.aborted).toBe(true);
    expect(scheduler.getStatus()).toMatchObject({ running: false, nextRunAt: null, failedRuns: 1 });
  });

  it('gives up waiting for a run that ignores cancellation', async () => {
    const { runner } = runnerOf(() => new Promise<UpdateResult>(() => undefined));
    const scheduler = schedulerFor(runner);

    scheduler.start();
    const stopping = scheduler.stop(100);
    await vi.advanceTimersByTimeAsync(100);

    expect(await stopping).toBe(false);
  });

  it('runs on demand with the requested sources', async () => {
    const { runner, spy } = runnerOf(async (options) => resultOf(true, options));
    const scheduler = schedulerFor(runner);

    const result = await scheduler.runNow('manual', ['coingecko']);

    expect(result.trigger).toBe('manual');
    expect(spy).toHaveBeenCalledWith({ trigger: 'manual', sources: ['coingecko'] });
    expect(scheduler.getStatus()).toMatchObject({ running: false, scheduledRuns: 0, successfulRuns: 1 });
  });

  it('lets on-demand errors reach the caller', async () => {
    const { runner } = runnerOf(async () => Promise.reject(new Error('boom')));
    const scheduler = schedulerFor(runner);

    await expect(scheduler.runNow()).rejects.toThrow('boom');
    expect(scheduler.getStatus().failedRuns).toBe(1);
  });
});
