import {
  BRIDGE_SOURCE_PREFIX,
  RATE_ORIGINS,
  formatPairKey,
  parsePairKey,
  type CurrencyPair,
  type HistoryEntry,
  type RateOrigin,
  type RateTable
} from '@fxhub/domain';
import { z } from 'zod';
import { PersistenceError } from './errors.js';

const timestamp = z.string().refine((value) => !Number.isNaN(Date.parse(value)), 'not a parseable timestamp');

const snapshotRecordSchema = z.object({
  rate: z.number().positive(),
  updated_at: timestamp,
  source: z.string(),
  origin: z.enum(RATE_ORIGINS).optional()
});

const snapshotSchema = z.object({
  pairs: z.record(z.string(), snapshotRecordSchema),
  last_refresh: timestamp.nullable().optional(),
  source: z.string().default('rates-service')
});

const historyEntrySchema = z.object({
  id: z.string(),
  from_currency: z.string(),
  to_currency: z.string(),
  rate: z.number(),
  timestamp,
  source: z.string(),
  meta: z.record(z.string(), z.unknown()).default({})
});

const historyFileSchema = z.array(historyEntrySchema);

export type SnapshotFile = z.input<typeof snapshotSchema>;
export type HistoryFileEntry = z.input<typeof historyEntrySchema>;

/** Snapshots written before `origin` existed only mark bridges through their source. */
function inferOrigin(source: string): RateOrigin {
  return source.startsWith(BRIDGE_SOURCE_PREFIX) ? 'bridge' : 'fetched';
}

function parseJson(raw: string, filePath: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new PersistenceError('decode', filePath, 'file is not valid JSON', { cause: error });
  }
}

function decodePairKey(key: string, filePath: string): CurrencyPair {
  try {
    return parsePairKey(key);
  } catch (error) {
    throw new PersistenceError('decode', filePath, `invalid pair key '${key}'`, { cause: error });
  }
}

export function encodeSnapshot(table: RateTable): string {
  const pairs: Record<string, z.input<typeof snapshotRecordSchema>> = {};
  for (const key of [...table.pairs.keys()].sort()) {
    const record = table.pairs.get(key);
    if (!record) continue;
    pairs[key] = {
      rate: record.rate,
      updated_at: record.updatedAt.toISOString(),
      source: record.source,
      origin: record.origin
    };
  }

  const file: SnapshotFile = {
    pairs,
    last_refresh: table.lastRefresh?.toISOString() ?? null,
    source: table.source
  };
  return `${JSON.stringify(file, null, 2)}\n`;
}

export function decodeSnapshot(raw: string, filePath: string): RateTable {
  const parsed = snapshotSchema.safeParse(parseJson(raw, filePath));
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new PersistenceError('decode', filePath, `${issue?.path.join('.') ?? ''} ${issue?.message ?? 'invalid snapshot'}`.trim());
  }

  const table: RateTable = {
    pairs: new Map(),
    lastRefresh: parsed.data.last_refresh ? new Date(parsed.data.last_refresh) : null,
    source: parsed.data.source
  };

  for (const [key, record] of Object.entries(parsed.data.pairs)) {
    const pair = decodePairKey(key, filePath);
    table.pairs.set(formatPairKey(pair), {
      pair,
      rate: record.rate,
      updatedAt: new Date(record.updated_at),
      source: record.source,
      origin: record.origin ?? inferOrigin(record.source)
    });
  }

  return table;
}

export function encodeHistory(entries: readonly HistoryEntry[]): string {
  const file: HistoryFileEntry[] = entries.map((entry) => ({
    id: entry.id,
    from_currency: entry.from,
    to_currency: entry.to,
    rate: entry.rate,
    timestamp: entry.timestamp.toISOString(),
    source: entry.source,
    meta: entry.meta
  }));
  return `${JSON.stringify(file, null, 2)}\n`;
}

export function decodeHistory(raw: string, filePath: string): HistoryEntry[] {
  const parsed = historyFileSchema.safeParse(parseJson(raw, filePath));
  if (!parsed.success) {
    throw new PersistenceError('decode', filePath, parsed.error.issues[0]?.message ?? 'invalid history file');
  }

  return parsed.data.map((entry) => ({
    id: entry.id,
    from: entry.from_currency,
    to: entry.to_currency,
    rate: entry.rate,
    timestamp: new Date(entry.timestamp),
    source: entry.source,
    meta: entry.meta
  }));
}
