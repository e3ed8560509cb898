import { toErrorSummary } from '@fxhub/domain';
import type { ServiceLogger } from '@fxhub/observability';

export interface HistoryPruner {
  pruneHistory(olderThan: Date): Promise<number>;
}

export interface HistoryRetentionConfig {
  retentionDays: number;
}

export interface HistoryRetentionResult {
  cutoff: Date;
  removed: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export async function runHistoryRetention(
  cache: HistoryPruner,
  config: HistoryRetentionConfig,
  logger: ServiceLogger,
  now: Date = new Date()
): Promise<HistoryRetentionResult> {
  const cutoff = new Date(now.getTime() - config.retentionDays * DAY_MS);
  const removed = await cache.pruneHistory(cutoff);
  logger.info('History retention run completed', { cutoff: cutoff.toISOString(), removed });
  return { cutoff, removed };
}

/** Run retention every `intervalMs`; failures are logged and the next tick still runs. Returns a stop function. */
export function scheduleHistoryRetention(
  cache: HistoryPruner,
  config: HistoryRetentionConfig,
  logger: ServiceLogger,
  intervalMs: number
): () => void {
  const timer = setInterval(() => {
    void runHistoryRetention(cache, config, logger).catch((error: unknown) => {
      logger.error('History retention run failed', { error: toErrorSummary(error) });
    });
  }, intervalMs);
  return () => clearInterval(timer);
}
