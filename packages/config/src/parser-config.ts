import path from 'node:path';
import type { RateBounds } from '@fxhub/domain';
import { loadRatesServiceEnv, type RatesServiceEnv } from './env.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

/**
 * Static configuration for rate ingestion. Built once per process; callers
 * that want new values call `loadParserConfig()` again.
 */
export interface ParserConfig {
  readonly baseCurrency: string;
  readonly fiatCurrencies: readonly string[];
  readonly cryptoCurrencies: readonly string[];
  readonly coingecko: { readonly url: string; readonly apiKey?: string | undefined };
  readonly exchangeRateApi: { readonly url: string; readonly apiKey?: string | undefined };
  readonly requestTimeoutMs: number;
  readonly sourceDeadlineMs: number;
  readonly ttlMs: number;
  readonly updateIntervalMs: number;
  readonly retry: Readonly<RetryPolicy>;
  readonly bounds: Readonly<RateBounds>;
  readonly sourcePriority: readonly string[];
  readonly snapshotPath: string;
  readonly historyPath: string;
  readonly historyRetentionDays: number;
}

export function toParserConfig(env: RatesServiceEnv): ParserConfig {
  const config: ParserConfig = {
    baseCurrency: env.RATES_BASE_CURRENCY,
    fiatCurrencies: Object.freeze([...env.RATES_FIAT_CURRENCIES]),
    cryptoCurrencies: Object.freeze([...env.RATES_CRYPTO_CURRENCIES]),
    coingecko: Object.freeze({ url: env.COINGECKO_URL, apiKey: env.COINGECKO_API_KEY }),
    exchangeRateApi: Object.freeze({ url: env.EXCHANGERATE_API_URL, apiKey: env.EXCHANGERATE_API_KEY }),
    requestTimeoutMs: env.RATES_REQUEST_TIMEOUT_MS,
    sourceDeadlineMs: env.RATES_SOURCE_DEADLINE_MS,
    ttlMs: env.RATES_TTL_SECONDS * 1000,
    updateIntervalMs: env.RATES_UPDATE_INTERVAL_SECONDS * 1000,
    retry: Object.freeze({
      maxAttempts: env.RATES_RETRY_MAX_ATTEMPTS,
      baseDelayMs: env.RATES_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RATES_RETRY_MAX_DELAY_MS
    }),
    bounds: Object.freeze({ min: env.RATES_MIN_VALID, max: env.RATES_MAX_VALID }),
    sourcePriority: Object.freeze([...env.RATES_SOURCE_PRIORITY]),
    snapshotPath: path.resolve(env.RATES_DATA_DIR, env.RATES_SNAPSHOT_FILE),
    historyPath: path.resolve(env.RATES_DATA_DIR, env.RATES_HISTORY_FILE),
    historyRetentionDays: env.RATES_HISTORY_RETENTION_DAYS
  };

  return Object.freeze(config);
}

export function loadParserConfig(input: NodeJS.ProcessEnv = process.env): ParserConfig {
  return toParserConfig(loadRatesServiceEnv(input));
}
