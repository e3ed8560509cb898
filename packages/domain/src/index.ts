export {
  BRIDGE_SOURCE_PREFIX,
  DEFAULT_MAX_RATE,
  DEFAULT_MIN_RATE,
  RATE_EPSILON,
  RATE_ORIGINS,
  SNAPSHOT_SOURCE,
  type RateOrigin
} from './constants.js';
export {
  CURRENCY_CODE_PATTERN,
  CurrencyRegistry,
  DEFAULT_CURRENCIES,
  assertCurrencyPair,
  canonicalPairKey,
  createCurrencyRegistry,
  formatPairKey,
  invertPair,
  makePair,
  normalizeCurrencyCode,
  pairClass,
  parsePairKey,
  type CurrencyClass,
  type CurrencyDefinition,
  type CurrencyPair
} from './currency.js';
export {
  ApiError,
  ERRORS,
  InvalidCurrencyPairError,
  RateNotFoundError,
  RateOutOfBoundsError,
  StaleRateError,
  UnknownCurrencyError,
  isErrorCode,
  toErrorSummary,
  type ApiErrorDefinition,
  type ErrorCode,
  type ErrorSummary
} from './errors.js';
export { assertFresh, isFresh, rateAgeMs, type Timestamped } from './freshness.js';
export {
  assertRateInBounds,
  emptyRateTable,
  invertRecord,
  isRateInBounds,
  ratesApproximatelyEqual,
  type HistoryEntry,
  type LookupPath,
  type RateBounds,
  type RateQuote,
  type RateRecord,
  type RateTable
} from './rates.js';
export { calculateBackoff, sleep, withRetry, type RetryOptions, type RetryResult } from './retry.js';
