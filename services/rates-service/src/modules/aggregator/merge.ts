import { canonicalPairKey, type CurrencyPair, type RateRecord } from '@fxhub/domain';

export interface Candidate {
  pair: CurrencyPair;
  rate: number;
  observedAt: Date;
  source: string;
  /** Lower wins ties on `observedAt`. */
  priority: number;
  /** Order of arrival; breaks the remaining ties. */
  sequence: number;
}

function beats(challenger: Candidate, holder: Candidate): boolean {
  const byTime = challenger.observedAt.getTime() - holder.observedAt.getTime();
  if (byTime !== 0) return byTime > 0;
  if (challenger.priority !== holder.priority) return challenger.priority < holder.priority;
  return challenger.sequence < holder.sequence;
}

/**
 * One winner per unordered pair: newest observation, then source priority,
 * then first arrival. Winners keep the direction they were quoted in.
 */
export function mergeCandidates(candidates: readonly Candidate[]): Map<string, Candidate> {
  const winners = new Map<string, Candidate>();
  for (const candidate of candidates) {
    const key = canonicalPairKey(candidate.pair);
    const holder = winners.get(key);
    if (!holder || beats(candidate, holder)) {
      winners.set(key, candidate);
    }
  }
  return winners;
}

export function toFetchedRecord(candidate: Candidate): RateRecord {
  return {
    pair: candidate.pair,
    rate: candidate.rate,
    updatedAt: candidate.observedAt,
    source: candidate.source,
    origin: 'fetched'
  };
}

/** Rank by position in the configured order; unlisted sources come after every listed one. */
export function priorityResolver(order: readonly string[]): (source: string) => number {
  const ranks = new Map(order.map((name, index) => [name, index] as const));
  return (source) => ranks.get(source) ?? order.length;
}
