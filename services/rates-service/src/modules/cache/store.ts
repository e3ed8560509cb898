import { randomUUID } from 'node:crypto';
import { emptyRateTable, type HistoryEntry, type RateQuote, type RateRecord, type RateTable } from '@fxhub/domain';
import { decodeHistory, decodeSnapshot, encodeHistory, encodeSnapshot } from './codec.js';
import { readIfExists, writeFileAtomic } from './files.js';
import { WriteLock } from './lock.js';
import { resolveRate } from './lookup.js';
import type { HistoryFilter, RateCacheOptions, SaveOptions } from './types.js';

function matchesFilter(entry: HistoryEntry, filter: HistoryFilter): boolean {
  if (filter.currency && entry.from !== filter.currency && entry.to !== filter.currency) return false;
  if (filter.from && entry.from !== filter.from) return false;
  if (filter.to && entry.to !== filter.to) return false;
  if (filter.source && entry.source !== filter.source) return false;
  if (filter.since && entry.timestamp.getTime() < filter.since.getTime()) return false;
  return true;
}

function toHistoryEntry(record: RateRecord, runId: string, timestamp: Date): HistoryEntry {
  return {
    id: `h_${randomUUID()}`,
    from: record.pair.from,
    to: record.pair.to,
    rate: record.rate,
    timestamp,
    source: record.source,
    meta: { runId, observed_at: record.updatedAt.toISOString() }
  };
}

/**
 * Durable rate table plus append-only history, both replaced atomically.
 * Writers serialize through one lock; readers go straight to the files.
 */
export class RateCache {
  private readonly lock = new WriteLock();
  private readonly now: () => Date;

  constructor(private readonly options: RateCacheOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get snapshotPath(): string {
    return this.options.snapshotPath;
  }

  get historyPath(): string {
    return this.options.historyPath;
  }

  /**
   * Replace the snapshot, then append the fetched records to history. A
   * history failure still throws, with the new snapshot already in place.
   */
  async save(table: RateTable, options: SaveOptions): Promise<void> {
    await this.lock.runExclusive(async () => {
      await writeFileAtomic(this.options.snapshotPath, encodeSnapshot(table));

      const records = options.historyRecords ?? [...table.pairs.values()].filter((record) => record.origin === 'fetched');
      if (records.length === 0) {
        return;
      }

      const timestamp = table.lastRefresh ?? this.now();
      const existing = await this.readHistory();
      const appended = records.map((record) => toHistoryEntry(record, options.runId, timestamp));
      await writeFileAtomic(this.options.historyPath, encodeHistory([...existing, ...appended]));
    });
  }

  /** Current table; empty when nothing was saved yet. */
  async load(): Promise<RateTable> {
    const raw = await readIfExists(this.options.snapshotPath);
    return raw === null ? emptyRateTable() : decodeSnapshot(raw, this.options.snapshotPath);
  }

  /** Direct pair, stored inverse, then a bridge through the base currency. */
  async get(from: string, to: string): Promise<RateQuote | null> {
    return resolveRate(await this.load(), from, to, this.options.baseCurrency);
  }

  /** Newest first. */
  async history(filter: HistoryFilter = {}, limit?: number): Promise<HistoryEntry[]> {
    const entries = (await this.readHistory()).filter((entry) => matchesFilter(entry, filter));
    const newestFirst = entries.reverse().sort((a, b) => b.timestamp.getTime() - a.timestamp.getTime());
    return limit === undefined ? newestFirst : newestFirst.slice(0, limit);
  }

  /** Drop history entries older than `olderThan`; the snapshot is untouched. */
  async pruneHistory(olderThan: Date): Promise<number> {
    return this.lock.runExclusive(async () => {
      const entries = await this.readHistory();
      const kept = entries.filter((entry) => entry.timestamp.getTime() >= olderThan.getTime());
      const removed = entries.length - kept.length;

      if (removed > 0) {
        await writeFileAtomic(this.options.historyPath, encodeHistory(kept));
      }
      return removed;
    });
  }

  private async readHistory(): Promise<HistoryEntry[]> {
    const raw = await readIfExists(this.options.historyPath);
    return raw === null ? [] : decodeHistory(raw, this.options.historyPath);
  }
}
