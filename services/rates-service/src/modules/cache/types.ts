import type { RateRecord } from '@fxhub/domain';

export interface HistoryFilter {
  /** Matches either side of the pair. */
  currency?: string;
  from?: string;
  to?: string;
  source?: string;
  since?: Date;
}

export interface SaveOptions {
  runId: string;
  /** Records to append to history; defaults to every `fetched` record in the table. */
  historyRecords?: readonly RateRecord[];
}

export interface RateCacheOptions {
  snapshotPath: string;
  historyPath: string;
  baseCurrency: string;
  now?: () => Date;
}

export interface RateListOptions {
  currency?: string;
  top?: number;
}

export interface RateView {
  pair: string;
  from: string;
  to: string;
  rate: number;
  updatedAt: Date;
  source: string;
  origin: RateRecord['origin'];
  fresh: boolean;
  ageSeconds: number;
}

export interface RateListing {
  baseCurrency: string;
  lastRefresh: Date | null;
  ttlSeconds: number;
  rates: RateView[];
}

export interface RateDescription {
  from: string;
  to: string;
  rate: number;
  reverseRate: number;
  updatedAt: Date;
  source: string;
  via: string;
  fresh: boolean;
  ageSeconds: number;
  ttlSeconds: number;
}
