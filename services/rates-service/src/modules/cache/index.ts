export { decodeHistory, decodeSnapshot, encodeHistory, encodeSnapshot } from './codec.js';
export { PersistenceError, type PersistenceOperation } from './errors.js';
export { readIfExists, writeFileAtomic } from './files.js';
export { WriteLock } from './lock.js';
export { RateLookupService, resolveRate, type RateLookupOptions, type RateReader } from './lookup.js';
export { RateCache } from './store.js';
export type {
  HistoryFilter,
  RateCacheOptions,
  RateDescription,
  RateListOptions,
  RateListing,
  RateView,
  SaveOptions
} from './types.js';
