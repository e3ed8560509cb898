export const DEFAULT_MIN_RATE = 1e-9;
export const DEFAULT_MAX_RATE = 1e9;

/** `source` written at the top level of every snapshot. */
export const SNAPSHOT_SOURCE = 'rates-service';

/** Derived records carry `bridge:<BASE>` as their source. */
export const BRIDGE_SOURCE_PREFIX = 'bridge:';

export const RATE_ORIGINS = ['fetched', 'inverse', 'bridge'] as const;
export type RateOrigin = (typeof RATE_ORIGINS)[number];

/** Relative tolerance used when comparing derived floating-point rates. */
export const RATE_EPSILON = 1e-9;
