import { normalizeCurrencyCode } from '@fxhub/domain';
import type { ParsedCommand } from './types.js';

function readFlag(args: string[], name: string): string | undefined {
  const index = args.indexOf(`--${name}`);
  if (index < 0) {
    return undefined;
  }

  const value = args[index + 1];
  if (!value || value.startsWith('--')) {
    throw new Error(`Missing value for --${name}.`);
  }
  return value;
}

function readAllFlags(args: string[], name: string): string[] {
  const values: string[] = [];
  args.forEach((arg, index) => {
    if (arg !== `--${name}`) {
      return;
    }
    const value = args[index + 1];
    if (!value || value.startsWith('--')) {
      throw new Error(`Missing value for --${name}.`);
    }
    values.push(...value.split(',').map((part) => part.trim()).filter((part) => part.length > 0));
  });
  return values;
}

function parsePositiveInt(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid --${flag} value. It must be a positive integer.`);
  }
  return value;
}

function parseCurrency(raw: string | undefined): string | undefined {
  return raw === undefined ? undefined : normalizeCurrencyCode(raw);
}

export function parseCommand(argv: string[]): ParsedCommand {
  const [scope, action] = argv;

  if (scope === 'update-rates') {
    return { kind: 'update-rates', sources: readAllFlags(argv, 'source') };
  }

  if (scope === 'show-rates') {
    const currency = parseCurrency(readFlag(argv, 'currency'));
    const top = parsePositiveInt(readFlag(argv, 'top'), 'top');

    return {
      kind: 'show-rates',
      ...(currency ? { currency } : {}),
      ...(top !== undefined ? { top } : {})
    };
  }

  if (scope === 'get-rate') {
    const from = readFlag(argv, 'from');
    const to = readFlag(argv, 'to');
    if (!from || !to) {
      throw new Error('Usage: rates-cli get-rate --from <CODE> --to <CODE>');
    }

    const pair = { from: normalizeCurrencyCode(from), to: normalizeCurrencyCode(to) };
    if (pair.from === pair.to) {
      throw new Error(`${pair.from} cannot be converted to itself.`);
    }
    return { kind: 'get-rate', ...pair };
  }

  if (scope === 'history') {
    const currency = parseCurrency(readFlag(argv, 'currency'));
    const source = readFlag(argv, 'source');
    const limit = parsePositiveInt(readFlag(argv, 'limit'), 'limit');

    return {
      kind: 'history',
      ...(currency ? { currency } : {}),
      ...(source ? { source } : {}),
      ...(limit !== undefined ? { limit } : {})
    };
  }

  if (scope === 'scheduler' && action === 'status') {
    return { kind: 'scheduler-status' };
  }

  throw new Error(`Unknown command: ${argv.join(' ') || '(none)'}`);
}
