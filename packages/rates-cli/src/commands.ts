import type { z } from 'zod';
import { requestJson } from './client.js';
import {
  historySchema,
  rateDescriptionSchema,
  rateListSchema,
  schedulerStatusSchema,
  updateResultSchema,
  type CommandResponse
} from './responses.js';
import type { CliOptions, ParsedCommand } from './types.js';

function queryString(params: Record<string, string | number | undefined>): string {
  const query = new URLSearchParams();

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) {
      continue;
    }

    query.set(key, String(value));
  }

  const encoded = query.toString();
  return encoded.length > 0 ? `?${encoded}` : '';
}

function expectShape<T>(schema: z.ZodType<T>, payload: unknown, path: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new Error(`Unexpected response from ${path}: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
  }
  return parsed.data;
}

async function get<T>(options: CliOptions, path: string, schema: z.ZodType<T>): Promise<T> {
  return expectShape(schema, await requestJson({ options, method: 'GET', path }), path);
}

export async function executeCommand(command: ParsedCommand, options: CliOptions): Promise<CommandResponse> {
  if (command.kind === 'update-rates') {
    const path = '/internal/v1/rates/refresh';
    const payload = await requestJson({
      options,
      method: 'POST',
      path,
      body: command.sources.length > 0 ? { source: command.sources } : {}
    });
    return { kind: 'update-rates', body: expectShape(updateResultSchema, payload, path) };
  }

  if (command.kind === 'show-rates') {
    const path = `/v1/rates${queryString({ currency: command.currency, top: command.top })}`;
    return { kind: 'show-rates', body: await get(options, path, rateListSchema) };
  }

  if (command.kind === 'get-rate') {
    const path = `/v1/rates/${encodeURIComponent(command.from)}/${encodeURIComponent(command.to)}`;
    return { kind: 'get-rate', body: await get(options, path, rateDescriptionSchema) };
  }

  if (command.kind === 'history') {
    const path = `/v1/rates/history${queryString({ currency: command.currency, source: command.source, limit: command.limit })}`;
    return { kind: 'history', body: await get(options, path, historySchema) };
  }

  return {
    kind: 'scheduler-status',
    body: await get(options, '/internal/v1/rates/scheduler', schedulerStatusSchema)
  };
}
