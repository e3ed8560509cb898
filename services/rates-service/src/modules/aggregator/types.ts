import type { CurrencyClass, ErrorSummary } from '@fxhub/domain';

export type UpdateTrigger = 'scheduled' | 'manual' | 'startup';

export type RejectionReason = 'out_of_bounds' | 'invalid_pair';

export interface RunOptions {
  /** Source selectors (name, provider, domain or `all`); empty runs every source. */
  sources?: readonly string[];
  trigger?: UpdateTrigger;
  signal?: AbortSignal;
}

export interface SourceOutcome {
  source: string;
  domain: CurrencyClass;
  ok: boolean;
  fetched: number;
  attempts: number;
  elapsedMs: number;
  error?: ErrorSummary;
}

export interface ClassCounts {
  fetched: number;
  saved: number;
  rejected: number;
}

export interface RejectedRate {
  pair: string;
  source: string;
  rate: number;
  currencyClass: CurrencyClass;
  reason: RejectionReason;
  message: string;
}

export interface UpdateResult {
  runId: string;
  trigger: UpdateTrigger;
  success: boolean;
  startedAt: Date;
  finishedAt: Date;
  elapsedMs: number;
  /** Refresh time of the table now on disk; unchanged by a failed run. */
  lastRefresh: Date | null;
  sources: SourceOutcome[];
  counts: Record<CurrencyClass, ClassCounts>;
  totals: ClassCounts;
  rejected: RejectedRate[];
  error?: ErrorSummary;
}
