#!/usr/bin/env node
import { executeCommand } from './commands.js';
import { renderResponse } from './format.js';
import { parseCommand } from './parser.js';

function readFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  if (idx < 0) {
    return undefined;
  }

  return args[idx + 1];
}

function stripGlobalOptions(args: string[]): string[] {
  const out: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const current = args[i];
    const next = args[i + 1];

    if (!current || current === '--json') {
      continue;
    }

    if (current === '--api-url') {
      if (!next) {
        throw new Error(`Missing value for ${current}.`);
      }
      i += 1;
      continue;
    }

    out.push(current);
  }

  return out;
}

function usage(): string {
  return [
    'Usage:',
    '  rates-cli update-rates [--source <name|fiat|crypto|all>] [--api-url <url>] [--json]',
    '  rates-cli show-rates [--currency <CODE>] [--top <n>] [--api-url <url>] [--json]',
    '  rates-cli get-rate --from <CODE> --to <CODE> [--api-url <url>] [--json]',
    '  rates-cli history [--currency <CODE>] [--source <name>] [--limit <n>] [--api-url <url>] [--json]',
    '  rates-cli scheduler status [--api-url <url>] [--json]'
  ].join('\n');
}

async function main(): Promise<void> {
  const rawArgs = process.argv.slice(2);

  if (rawArgs.length === 0 || rawArgs.includes('--help') || rawArgs.includes('-h')) {
    console.log(usage());
    process.exit(0);
  }

  const baseUrl = readFlag(rawArgs, 'api-url') ?? process.env.RATES_API_URL ?? 'http://localhost:3010';
  const json = rawArgs.includes('--json');

  const commandArgs = stripGlobalOptions(rawArgs);
  const command = parseCommand(commandArgs);
  const response = await executeCommand(command, {
    baseUrl,
    commandText: commandArgs.join(' ')
  });

  console.log(json ? JSON.stringify(response.body, null, 2) : renderResponse(response));

  if (response.kind === 'update-rates' && !response.body.success) {
    process.exit(2);
  }
}

main().catch((error: unknown) => {
  console.error(`rates-cli error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
