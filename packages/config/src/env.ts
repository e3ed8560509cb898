import { DEFAULT_MAX_RATE, DEFAULT_MIN_RATE } from '@fxhub/domain';
import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const boolFromString = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform((value) => value === 'true');

const currencyCode = z.string().regex(/^[A-Z]{2,5}$/, 'Currency codes must be 2-5 uppercase letters.');

const currencyList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((code) => code.trim().toUpperCase())
        .filter((code) => code.length > 0)
    )
    .pipe(z.array(currencyCode));

const nameList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    );

export const DEFAULT_FIAT_CURRENCIES = 'EUR,GBP,RUB,JPY,CHF,CAD,AUD,CNY';
export const DEFAULT_CRYPTO_CURRENCIES = 'BTC,ETH,SOL,BNB,XRP,ADA,DOGE,DOT';

const ratesServiceSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    RATES_BASE_CURRENCY: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toUpperCase() : value),
      currencyCode.default('USD')
    ),
    RATES_FIAT_CURRENCIES: currencyList(DEFAULT_FIAT_CURRENCIES),
    RATES_CRYPTO_CURRENCIES: currencyList(DEFAULT_CRYPTO_CURRENCIES),
    COINGECKO_API_KEY: optionalNonEmptyString,
    COINGECKO_URL: z.string().url().default('https://api.coingecko.com/api/v3'),
    EXCHANGERATE_API_KEY: optionalNonEmptyString,
    EXCHANGERATE_API_URL: z.string().url().default('https://v6.exchangerate-api.com/v6'),
    RATES_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    RATES_SOURCE_DEADLINE_MS: z.coerce.number().int().positive().default(30_000),
    RATES_TTL_SECONDS: z.coerce.number().int().positive().default(300),
    RATES_UPDATE_INTERVAL_SECONDS: z.coerce.number().int().positive().default(300),
    RATES_MIN_VALID: z.coerce.number().positive().default(DEFAULT_MIN_RATE),
    RATES_MAX_VALID: z.coerce.number().positive().default(DEFAULT_MAX_RATE),
    RATES_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
    RATES_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(500),
    RATES_RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(5_000),
    RATES_SOURCE_PRIORITY: nameList('exchangerate-api,coingecko,mock-fiat,mock-crypto'),
    RATES_DATA_DIR: z.preprocess(emptyStringToUndefined, z.string().default('data')),
    RATES_SNAPSHOT_FILE: z.string().min(1).default('rates.json'),
    RATES_HISTORY_FILE: z.string().min(1).default('exchange_rates.json'),
    RATES_HISTORY_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
    RATES_SCHEDULER_ENABLED: boolFromString('true'),
    RATES_RETENTION_INTERVAL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
    RATES_SERVICE_PORT: z.coerce.number().int().min(1).max(65_535).default(3010),
    RATES_SERVICE_HOST: z.string().min(1).default('0.0.0.0'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional()
  })
  .superRefine((value, context) => {
    if (value.RATES_MIN_VALID >= value.RATES_MAX_VALID) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RATES_MIN_VALID'],
        message: 'RATES_MIN_VALID must be lower than RATES_MAX_VALID.'
      });
    }

    const tracked = [...value.RATES_FIAT_CURRENCIES, ...value.RATES_CRYPTO_CURRENCIES];
    if (tracked.includes(value.RATES_BASE_CURRENCY)) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RATES_BASE_CURRENCY'],
        message: `Base currency ${value.RATES_BASE_CURRENCY} must not appear in the tracked currency lists.`
      });
    }

    const overlap = value.RATES_FIAT_CURRENCIES.filter((code) => value.RATES_CRYPTO_CURRENCIES.includes(code));
    if (overlap.length > 0) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['RATES_CRYPTO_CURRENCIES'],
        message: `Currencies tracked as both fiat and crypto: ${overlap.join(', ')}.`
      });
    }
  });

export type RatesServiceEnv = z.infer<typeof ratesServiceSchema>;

export function loadRatesServiceEnv(input: NodeJS.ProcessEnv = process.env): RatesServiceEnv {
  return ratesServiceSchema.parse(input);
}
