export { deriveBridges, type BridgeRejection, type BridgeResult } from './bridge.js';
export { NoSourcesAvailableError, NoValidRatesError, RunCancelledError } from './errors.js';
export { mergeCandidates, priorityResolver, toFetchedRecord, type Candidate } from './merge.js';
export { RateAggregator, type RateAggregatorOptions, type RateStore } from './service.js';
export type {
  ClassCounts,
  RejectedRate,
  RejectionReason,
  RunOptions,
  SourceOutcome,
  UpdateResult,
  UpdateTrigger
} from './types.js';
