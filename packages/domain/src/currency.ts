/**
 * Currency registry and currency pair helpers.
 *
 * Pairs are ordered `(from, to)` and serialize as `FROM_TO`. Both codes must
 * be 2–5 uppercase letters known to the registry, and must differ.
 */

import { InvalidCurrencyPairError, UnknownCurrencyError } from './errors.js';

export type CurrencyClass = 'fiat' | 'crypto';

export interface CurrencyDefinition {
    /** ISO 4217 code for fiat, ticker for crypto. */
    code: string;
    name: string;
    kind: CurrencyClass;
}

export interface CurrencyPair {
    from: string;
    to: string;
}

export const CURRENCY_CODE_PATTERN = /^[A-Z]{2,5}$/;

// ── Currency Registry ──

export const DEFAULT_CURRENCIES: readonly CurrencyDefinition[] = [
    { code: 'USD', name: 'US Dollar', kind: 'fiat' },
    { code: 'EUR', name: 'Euro', kind: 'fiat' },
    { code: 'GBP', name: 'British Pound', kind: 'fiat' },
    { code: 'RUB', name: 'Russian Ruble', kind: 'fiat' },
    { code: 'JPY', name: 'Japanese Yen', kind: 'fiat' },
    { code: 'CHF', name: 'Swiss Franc', kind: 'fiat' },
    { code: 'CAD', name: 'Canadian Dollar', kind: 'fiat' },
    { code: 'AUD', name: 'Australian Dollar', kind: 'fiat' },
    { code: 'CNY', name: 'Chinese Yuan', kind: 'fiat' },
    { code: 'BTC', name: 'Bitcoin', kind: 'crypto' },
    { code: 'ETH', name: 'Ethereum', kind: 'crypto' },
    { code: 'SOL', name: 'Solana', kind: 'crypto' },
    { code: 'BNB', name: 'BNB', kind: 'crypto' },
    { code: 'XRP', name: 'XRP', kind: 'crypto' },
    { code: 'ADA', name: 'Cardano', kind: 'crypto' },
    { code: 'DOGE', name: 'Dogecoin', kind: 'crypto' },
    { code: 'DOT', name: 'Polkadot', kind: 'crypto' }
];

export class CurrencyRegistry {
    private readonly byCode = new Map<string, CurrencyDefinition>();

    constructor(definitions: readonly CurrencyDefinition[] = DEFAULT_CURRENCIES) {
        for (const definition of definitions) {
            this.register(definition);
        }
    }

    register(definition: CurrencyDefinition): void {
        const code = normalizeCurrencyCode(definition.code);
        this.byCode.set(code, { ...definition, code });
    }

    has(code: string): boolean {
        return this.byCode.has(code);
    }

    get(code: string): CurrencyDefinition | undefined {
        return this.byCode.get(code);
    }

    require(code: string): CurrencyDefinition {
        const definition = this.byCode.get(code);
        if (!definition) {
            throw new UnknownCurrencyError(code);
        }
        return definition;
    }

    classify(code: string): CurrencyClass {
        return this.require(code).kind;
    }

    list(kind?: CurrencyClass): CurrencyDefinition[] {
        const all = [...this.byCode.values()];
        return kind ? all.filter((c) => c.kind === kind) : all;
    }
}

/**
 * Registry holding the defaults plus every configured code, so a tracked
 * currency outside the built-in list is still a valid pair member.
 */
export function createCurrencyRegistry(tracked: {
    baseCurrency: string;
    fiatCurrencies: readonly string[];
    cryptoCurrencies: readonly string[];
}): CurrencyRegistry {
    const registry = new CurrencyRegistry();
    const ensure = (code: string, kind: CurrencyClass): void => {
        if (!registry.has(code)) {
            registry.register({ code, name: code, kind });
        }
    };

    ensure(tracked.baseCurrency, 'fiat');
    tracked.fiatCurrencies.forEach((code) => ensure(code, 'fiat'));
    tracked.cryptoCurrencies.forEach((code) => ensure(code, 'crypto'));
    return registry;
}

// ── Helpers ──

export function normalizeCurrencyCode(raw: string): string {
    const code = raw.trim().toUpperCase();
    if (!CURRENCY_CODE_PATTERN.test(code)) {
        throw new InvalidCurrencyPairError(`'${raw}' is not a 2-5 letter currency code`);
    }
    return code;
}

export function formatPairKey(pair: CurrencyPair): string {
    return `${pair.from}_${pair.to}`;
}

export function parsePairKey(key: string): CurrencyPair {
    const parts = key.split('_');
    if (parts.length !== 2 || !parts[0] || !parts[1]) {
        throw new InvalidCurrencyPairError(`'${key}' is not in FROM_TO form`);
    }
    return makePair(parts[0], parts[1]);
}

export function makePair(from: string, to: string): CurrencyPair {
    const pair = { from: normalizeCurrencyCode(from), to: normalizeCurrencyCode(to) };
    if (pair.from === pair.to) {
        throw new InvalidCurrencyPairError(`${pair.from} cannot be converted to itself`);
    }
    return pair;
}

/** Normalize and validate a pair against the registry. */
export function assertCurrencyPair(from: string, to: string, registry: CurrencyRegistry): CurrencyPair {
    const pair = makePair(from, to);
    registry.require(pair.from);
    registry.require(pair.to);
    return pair;
}

export function invertPair(pair: CurrencyPair): CurrencyPair {
    return { from: pair.to, to: pair.from };
}

/** Direction-independent key: both `BTC_USD` and `USD_BTC` map to `BTC_USD`. */
export function canonicalPairKey(pair: CurrencyPair): string {
    return pair.from < pair.to ? formatPairKey(pair) : formatPairKey(invertPair(pair));
}

/** A pair touching any crypto currency counts as crypto. */
export function pairClass(pair: CurrencyPair, registry: CurrencyRegistry): CurrencyClass {
    return registry.get(pair.from)?.kind === 'crypto' || registry.get(pair.to)?.kind === 'crypto' ? 'crypto' : 'fiat';
}
