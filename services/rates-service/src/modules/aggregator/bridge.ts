import {
  BRIDGE_SOURCE_PREFIX,
  formatPairKey,
  invertRecord,
  isRateInBounds,
  type RateBounds,
  type RateRecord
} from '@fxhub/domain';

export interface BridgeRejection {
  pair: string;
  rate: number;
}

export interface BridgeResult {
  derived: RateRecord[];
  rejected: BridgeRejection[];
}

/**
 * Cross rates for every two currencies quoted against `base` with no stored
 * direct pair: `rate(A,B) = rate(A,base) * rate(base,B)`. Each derived pair
 * comes with its inverse and carries the older leg's timestamp.
 */
export function deriveBridges(pairs: ReadonlyMap<string, RateRecord>, base: string, bounds: RateBounds): BridgeResult {
  const legs = new Map<string, RateRecord>();
  for (const record of pairs.values()) {
    if (record.pair.to === base && record.origin !== 'bridge') {
      legs.set(record.pair.from, record);
    }
  }

  const codes = [...legs.keys()].sort();
  const derived: RateRecord[] = [];
  const rejected: BridgeRejection[] = [];

  for (let i = 0; i < codes.length; i += 1) {
    for (let j = i + 1; j < codes.length; j += 1) {
      const from = codes[i];
      const to = codes[j];
      if (!from || !to) continue;

      const key = formatPairKey({ from, to });
      if (pairs.has(key) || pairs.has(formatPairKey({ from: to, to: from }))) continue;

      const fromLeg = legs.get(from);
      const toLeg = legs.get(to);
      if (!fromLeg || !toLeg) continue;

      // rate(base, to) is the inverse of the stored to→base leg.
      const rate = fromLeg.rate * (1 / toLeg.rate);
      if (!isRateInBounds(rate, bounds) || !isRateInBounds(1 / rate, bounds)) {
        rejected.push({ pair: key, rate });
        continue;
      }

      const record: RateRecord = {
        pair: { from, to },
        rate,
        updatedAt: fromLeg.updatedAt.getTime() <= toLeg.updatedAt.getTime() ? fromLeg.updatedAt : toLeg.updatedAt,
        source: `${BRIDGE_SOURCE_PREFIX}${base}`,
        origin: 'bridge'
      };
      derived.push(record, invertRecord(record));
    }
  }

  return { derived, rejected };
}
