export {
  DEFAULT_CRYPTO_CURRENCIES,
  DEFAULT_FIAT_CURRENCIES,
  loadRatesServiceEnv,
  type RatesServiceEnv
} from './env.js';
export { loadParserConfig, toParserConfig, type ParserConfig, type RetryPolicy } from './parser-config.js';
