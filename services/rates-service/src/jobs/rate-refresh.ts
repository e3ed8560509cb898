import { toErrorSummary } from '@fxhub/domain';
import type { ServiceLogger } from '@fxhub/observability';
import type { RunOptions, UpdateResult, UpdateTrigger } from '../modules/aggregator/index.js';

export interface RefreshRunner {
  run(options?: RunOptions): Promise<UpdateResult>;
}

export interface RateRefreshSchedulerOptions {
  intervalMs: number;
  ttlMs: number;
  logger: ServiceLogger;
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  intervalMs: number;
  ttlSeconds: number;
  scheduledRuns: number;
  successfulRuns: number;
  failedRuns: number;
  inFlight: boolean;
  lastRunAt: Date | null;
  lastSuccessAt: Date | null;
  nextRunAt: Date | null;
}

/**
 * Periodic refresh owning its timer and cancellation. A tick that finds the
 * previous scheduled run still going is skipped; manual runs may overlap.
 */
export class RateRefreshScheduler {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private scheduledInFlight = false;
  private readonly inFlight = new Set<Promise<unknown>>();
  private readonly now: () => Date;

  private scheduledRuns = 0;
  private successfulRuns = 0;
  private failedRuns = 0;
  private lastRunAt: Date | null = null;
  private lastSuccessAt: Date | null = null;
  private nextRunAt: Date | null = null;

  constructor(
    private readonly runner: RefreshRunner,
    private readonly options: RateRefreshSchedulerOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  start(startOptions: { runImmediately?: boolean } = {}): void {
    if (this.timer) {
      return;
    }

    this.controller = new AbortController();
    this.timer = setInterval(() => this.tick('scheduled'), this.options.intervalMs);
    this.nextRunAt = new Date(this.now().getTime() + this.options.intervalMs);
    this.options.logger.info('Rate refresh scheduler started', { intervalMs: this.options.intervalMs });

    if (startOptions.runImmediately ?? true) {
      this.tick('startup');
    }
  }

  /**
   * Stop ticking, cancel in-flight runs and wait for them up to `timeoutMs`.
   * Resolves `true` when every run settled in time.
   */
  async stop(timeoutMs = 5_000): Promise<boolean> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    this.controller?.abort(new Error('Rate refresh scheduler stopped.'));
    this.controller = null;

    if (this.inFlight.size === 0) {
      this.options.logger.info('Rate refresh scheduler stopped');
      return true;
    }

    let timeout: NodeJS.Timeout | undefined;
    const drained = await Promise.race([
      Promise.allSettled([...this.inFlight]).then(() => true),
      new Promise<boolean>((resolve) => {
        timeout = setTimeout(() => resolve(false), timeoutMs);
      })
    ]);
    clearTimeout(timeout);

    if (drained) {
      this.options.logger.info('Rate refresh scheduler stopped');
    } else {
      this.options.logger.warn('Rate refresh scheduler stopped with a run still in flight', { timeoutMs });
    }
    return drained;
  }

  /** Run once now, outside the schedule. Errors reach the caller. */
  async runNow(trigger: UpdateTrigger = 'manual', sources?: readonly string[]): Promise<UpdateResult> {
    return this.track(trigger, sources);
  }

  getStatus(): SchedulerStatus {
    return {
      running: this.timer !== null,
      intervalMs: this.options.intervalMs,
      ttlSeconds: Math.round(this.options.ttlMs / 1000),
      scheduledRuns: this.scheduledRuns,
      successfulRuns: this.successfulRuns,
      failedRuns: this.failedRuns,
      inFlight: this.inFlight.size > 0,
      lastRunAt: this.lastRunAt,
      lastSuccessAt: this.lastSuccessAt,
      nextRunAt: this.nextRunAt
    };
  }

  private tick(trigger: 'scheduled' | 'startup'): void {
    if (this.timer) {
      this.nextRunAt = new Date(this.now().getTime() + this.options.intervalMs);
    }

    if (this.scheduledInFlight) {
      this.options.logger.warn('Skipping scheduled rate refresh; previous run still in flight');
      return;
    }

    this.scheduledInFlight = true;
    this.scheduledRuns += 1;
    void this.track(trigger)
      .catch((error: unknown) => {
        this.options.logger.error('Scheduled rate refresh threw', { error: toErrorSummary(error) });
      })
      .finally(() => {
        this.scheduledInFlight = false;
      });
  }

  private async track(trigger: UpdateTrigger, sources?: readonly string[]): Promise<UpdateResult> {
    const signal = this.controller?.signal;
    const run = this.runner.run({
      trigger,
      ...(sources && sources.length > 0 ? { sources } : {}),
      ...(signal ? { signal } : {})
    });
    this.inFlight.add(run);

    try {
      const result = await run;
      this.record(result.success);
      return result;
    } catch (error) {
      this.record(false);
      throw error;
    } finally {
      this.inFlight.delete(run);
    }
  }

  private record(success: boolean): void {
    const at = this.now();
    this.lastRunAt = at;
    if (success) {
      this.successfulRuns += 1;
      this.lastSuccessAt = at;
    } else {
      this.failedRuns += 1;
    }
  }
}
