import { randomUUID } from 'node:crypto';
import {
  SourceTimeoutError,
  isRetryableSourceError,
  retryAfterHint,
  selectRateSources,
  type RateSource,
  type SourceBatch
} from '@fxhub/adapters';
import {
  BRIDGE_SOURCE_PREFIX,
  RateOutOfBoundsError,
  SNAPSHOT_SOURCE,
  formatPairKey,
  invertRecord,
  isRateInBounds,
  pairClass,
  parsePairKey,
  toErrorSummary,
  withRetry,
  type CurrencyClass,
  type CurrencyPair,
  type CurrencyRegistry,
  type RateBounds,
  type RateRecord,
  type RateTable
} from '@fxhub/domain';
import { withTiming, type RateMetrics, type ServiceLogger } from '@fxhub/observability';
import type { SaveOptions } from '../cache/index.js';
import { deriveBridges } from './bridge.js';
import { NoSourcesAvailableError, NoValidRatesError, RunCancelledError } from './errors.js';
import { mergeCandidates, priorityResolver, toFetchedRecord, type Candidate } from './merge.js';
import type { ClassCounts, RejectedRate, RunOptions, SourceOutcome, UpdateResult, UpdateTrigger } from './types.js';

export interface RateStore {
  load(): Promise<RateTable>;
  save(table: RateTable, options: SaveOptions): Promise<void>;
}

export interface RateAggregatorOptions {
  sources: readonly RateSource[];
  cache: RateStore;
  registry: CurrencyRegistry;
  baseCurrency: string;
  bounds: RateBounds;
  sourcePriority: readonly string[];
  sourceDeadlineMs: number;
  retry: { maxAttempts: number; baseDelayMs: number; maxDelayMs: number };
  logger: ServiceLogger;
  metrics?: RateMetrics;
  now?: () => Date;
}

interface FetchedSource {
  source: RateSource;
  outcome: SourceOutcome;
  batch?: SourceBatch;
}

type PairCheck = { ok: true; pair: CurrencyPair } | { ok: false; message: string };

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function emptyCounts(): Record<CurrencyClass, ClassCounts> {
  return {
    fiat: { fetched: 0, saved: 0, rejected: 0 },
    crypto: { fetched: 0, saved: 0, rejected: 0 }
  };
}

function sumCounts(counts: Record<CurrencyClass, ClassCounts>): ClassCounts {
  return {
    fetched: counts.fiat.fetched + counts.crypto.fetched,
    saved: counts.fiat.saved + counts.crypto.saved,
    rejected: counts.fiat.rejected + counts.crypto.rejected
  };
}

function metricOutcome(code: string | undefined): string {
  return code ? code.toLowerCase() : 'success';
}

/**
 * One refresh run: fetch every selected source concurrently, validate,
 * merge newest-wins, derive base bridges, then persist the new table.
 */
export class RateAggregator {
  private readonly now: () => Date;
  private readonly priorityOf: (source: string) => number;

  constructor(private readonly options: RateAggregatorOptions) {
    this.now = options.now ?? (() => new Date());
    this.priorityOf = priorityResolver(options.sourcePriority);
  }

  get sources(): readonly RateSource[] {
    return this.options.sources;
  }

  async run(runOptions: RunOptions = {}): Promise<UpdateResult> {
    const selected = selectRateSources(this.options.sources, runOptions.sources ?? []);
    const run = {
      runId: `run_${randomUUID()}`,
      trigger: runOptions.trigger ?? 'manual',
      startedAt: this.now(),
      startedMark: performance.now()
    };
    const logger = this.options.logger.child({ runId: run.runId, trigger: run.trigger });
    const signal = runOptions.signal;

    logger.info('Rate refresh started', { sources: selected.map((source) => source.name) });

    const fetched = await Promise.all(selected.map((source) => this.fetchSource(source, logger, signal)));
    const outcomes = fetched.map((entry) => entry.outcome);
    const counts = emptyCounts();
    const rejected: RejectedRate[] = [];

    const finish = async (error?: Error): Promise<UpdateResult> => {
      const summary = error ? toErrorSummary(error) : undefined;
      const lastRefresh = await this.options.cache.load().then(
        (table) => table.lastRefresh,
        (loadError: unknown) => {
          logger.warn('Could not read current snapshot for run result', { error: toErrorSummary(loadError) });
          return null;
        }
      );
      return this.complete(run, logger, outcomes, counts, rejected, lastRefresh, summary);
    };

    if (signal?.aborted) {
      return finish(new RunCancelledError());
    }

    const succeeded = fetched.filter((entry): entry is FetchedSource & { batch: SourceBatch } => entry.batch !== undefined);
    if (succeeded.length === 0) {
      return finish(new NoSourcesAvailableError(selected.map((source) => source.name)));
    }

    let sequence = 0;
    const candidates: Candidate[] = [];
    for (const { source, batch } of succeeded) {
      for (const [key, quote] of batch.rates) {
        counts[source.domain].fetched += 1;

        const check = this.checkPair(key);
        if (!check.ok) {
          this.reject(rejected, counts, { pair: key, source: source.name, rate: quote.rate, currencyClass: source.domain, reason: 'invalid_pair', message: check.message });
          continue;
        }

        if (!isRateInBounds(quote.rate, this.options.bounds) || !isRateInBounds(1 / quote.rate, this.options.bounds)) {
          const message = new RateOutOfBoundsError(key, quote.rate, this.options.bounds).message;
          this.reject(rejected, counts, { pair: key, source: source.name, rate: quote.rate, currencyClass: source.domain, reason: 'out_of_bounds', message });
          continue;
        }

        candidates.push({
          pair: check.pair,
          rate: quote.rate,
          observedAt: quote.observedAt,
          source: source.name,
          priority: this.priorityOf(source.name),
          sequence: sequence++
        });
      }
    }

    if (rejected.length > 0) {
      logger.warn('Rates rejected during validation', {
        count: rejected.length,
        pairs: rejected.map((entry) => `${entry.source}:${entry.pair}`)
      });
    }

    if (candidates.length === 0) {
      return finish(new NoValidRatesError(rejected.length));
    }

    const winners = [...mergeCandidates(candidates).values()].map(toFetchedRecord);
    const pairs = new Map<string, RateRecord>();
    const put = (record: RateRecord): void => {
      pairs.set(formatPairKey(record.pair), record);
    };

    for (const record of winners) {
      put(record);
      put(invertRecord(record));
    }

    if (selected.length < this.options.sources.length) {
      for (const record of await this.carriedForward(selected)) {
        const key = formatPairKey(record.pair);
        if (pairs.has(key) || pairs.has(formatPairKey(invertRecord(record).pair))) {
          continue;
        }

        const rejection = { pair: key, source: record.source, rate: record.rate, currencyClass: pairClass(record.pair, this.options.registry) };
        const check = this.checkPair(key);
        if (!check.ok) {
          this.reject(rejected, counts, { ...rejection, reason: 'invalid_pair', message: check.message });
          continue;
        }
        if (!isRateInBounds(record.rate, this.options.bounds) || !isRateInBounds(1 / record.rate, this.options.bounds)) {
          const message = new RateOutOfBoundsError(key, record.rate, this.options.bounds).message;
          this.reject(rejected, counts, { ...rejection, reason: 'out_of_bounds', message });
          continue;
        }

        put(record);
        put(invertRecord(record));
      }
    }

    const bridges = deriveBridges(pairs, this.options.baseCurrency, this.options.bounds);
    bridges.derived.forEach(put);
    for (const entry of bridges.rejected) {
      const pair = parsePairKey(entry.pair);
      this.reject(rejected, counts, {
        pair: entry.pair,
        source: `${BRIDGE_SOURCE_PREFIX}${this.options.baseCurrency}`,
        rate: entry.rate,
        currencyClass: pairClass(pair, this.options.registry),
        reason: 'out_of_bounds',
        message: new RateOutOfBoundsError(entry.pair, entry.rate, this.options.bounds).message
      });
    }

    if (signal?.aborted) {
      logger.warn('Rate refresh cancelled before persisting');
      return finish(new RunCancelledError());
    }

    const table: RateTable = { pairs, lastRefresh: this.now(), source: SNAPSHOT_SOURCE };
    try {
      await this.options.cache.save(table, { runId: run.runId, historyRecords: winners });
    } catch (error) {
      const elapsedMs = Math.round(performance.now() - run.startedMark);
      logger.error('Rate snapshot could not be persisted', { error: toErrorSummary(error) });
      this.options.metrics?.refreshRuns.labels(run.trigger, 'persistence_error').inc();
      this.options.metrics?.refreshDurationMs.labels('persistence_error').observe(elapsedMs);
      throw error;
    }

    for (const record of pairs.values()) {
      counts[pairClass(record.pair, this.options.registry)].saved += 1;
    }
    this.options.metrics?.cachedPairs.set(pairs.size);
    this.options.metrics?.lastSuccessfulRefresh.set(Math.floor((table.lastRefresh?.getTime() ?? 0) / 1000));

    return this.complete(run, logger, outcomes, counts, rejected, table.lastRefresh, undefined);
  }

  private complete(
    run: { runId: string; trigger: UpdateTrigger; startedAt: Date; startedMark: number },
    logger: ServiceLogger,
    sources: SourceOutcome[],
    counts: Record<CurrencyClass, ClassCounts>,
    rejected: RejectedRate[],
    lastRefresh: Date | null,
    error: UpdateResult['error']
  ): UpdateResult {
    const elapsedMs = Math.round(performance.now() - run.startedMark);
    const result: UpdateResult = {
      runId: run.runId,
      trigger: run.trigger,
      success: error === undefined,
      startedAt: run.startedAt,
      finishedAt: this.now(),
      elapsedMs,
      lastRefresh,
      sources,
      counts,
      totals: sumCounts(counts),
      rejected,
      ...(error ? { error } : {})
    };

    const outcome = metricOutcome(error?.code);
    this.options.metrics?.refreshRuns.labels(run.trigger, outcome).inc();
    this.options.metrics?.refreshDurationMs.labels(outcome).observe(elapsedMs);

    if (error) {
      logger.error('Rate refresh failed; cache left untouched', { error, elapsedMs });
    } else {
      logger.info('Rate refresh completed', { totals: result.totals, elapsedMs });
    }
    return result;
  }

  private checkPair(key: string): PairCheck {
    try {
      const pair = parsePairKey(key);
      this.options.registry.require(pair.from);
      this.options.registry.require(pair.to);
      return { ok: true, pair };
    } catch (error) {
      return { ok: false, message: error instanceof Error ? error.message : String(error) };
    }
  }

  private reject(rejected: RejectedRate[], counts: Record<CurrencyClass, ClassCounts>, entry: RejectedRate): void {
    rejected.push(entry);
    counts[entry.currencyClass].rejected += 1;
    this.options.metrics?.ratesRejected.labels(entry.currencyClass, entry.reason).inc();
  }

  /** Fetched records of sources outside this run, kept so a partial refresh does not erase them. */
  private async carriedForward(selected: readonly RateSource[]): Promise<RateRecord[]> {
    const names = new Set(selected.map((source) => source.name));
    const previous = await this.options.cache.load();
    return [...previous.pairs.values()]
      .filter((record) => record.origin === 'fetched' && !names.has(record.source))
      .sort((a, b) => formatPairKey(a.pair).localeCompare(formatPairKey(b.pair)));
  }

  private async fetchSource(source: RateSource, logger: ServiceLogger, runSignal?: AbortSignal): Promise<FetchedSource> {
    const deadlineMs = this.options.sourceDeadlineMs;
    const deadline = new AbortController();
    const timer = setTimeout(() => deadline.abort(new SourceTimeoutError(source.name, deadlineMs)), deadlineMs);
    const signal = runSignal ? AbortSignal.any([runSignal, deadline.signal]) : deadline.signal;

    let attempts = 0;
    let elapsedMs = 0;
    try {
      const {
        value: { value: batch }
      } = await withTiming(
        () =>
          raceAbort(
            withRetry(
              (attempt) => {
                attempts = attempt;
                return source.fetch(signal);
              },
              {
                ...this.options.retry,
                isRetryable: isRetryableSourceError,
                retryAfterMs: retryAfterHint,
                signal,
                onRetry: (attempt, error, delayMs) => {
                  logger.warn('Rate source retry', { source: source.name, attempt, delayMs, error: toErrorSummary(error) });
                }
              }
            ),
            signal
          ),
        (elapsed) => {
          elapsedMs = elapsed;
        }
      );

      this.options.metrics?.sourceFetches.labels(source.name, 'ok').inc();
      logger.debug('Rate source answered', { source: source.name, count: batch.rates.size, attempts, elapsedMs });
      return {
        source,
        batch,
        outcome: { source: source.name, domain: source.domain, ok: true, fetched: batch.rates.size, attempts, elapsedMs }
      };
    } catch (error) {
      const summary = toErrorSummary(error);
      this.options.metrics?.sourceFetches.labels(source.name, summary.code.toLowerCase()).inc();
      logger.warn('Rate source failed', { source: source.name, attempts, elapsedMs, error: summary });
      return {
        source,
        outcome: { source: source.name, domain: source.domain, ok: false, fetched: 0, attempts, elapsedMs, error: summary }
      };
    } finally {
      clearTimeout(timer);
    }
  }
}
