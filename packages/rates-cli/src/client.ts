import type { CliOptions } from './types.js';

export class ApiRequestError extends Error {
  constructor(
    readonly status: number,
    readonly code: string,
    message: string
  ) {
    super(`HTTP ${status} ${code}: ${message}`);
    this.name = 'ApiRequestError';
  }
}

function describeFailure(parsed: unknown): { code: string; message: string } {
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    const error: unknown = parsed.error;
    if (typeof error === 'object' && error !== null && 'code' in error && 'message' in error) {
      return { code: String(error.code), message: String(error.message) };
    }
  }
  return { code: 'UNKNOWN', message: JSON.stringify(parsed) };
}

export async function requestJson(params: {
  options: CliOptions;
  method: 'GET' | 'POST';
  path: string;
  body?: Record<string, unknown>;
}): Promise<unknown> {
  const headers: Record<string, string> = {
    accept: 'application/json',
    'x-rates-command': params.options.commandText
  };

  const init: RequestInit = {
    method: params.method,
    headers
  };

  if (params.body) {
    headers['content-type'] = 'application/json';
    init.body = JSON.stringify(params.body);
  }

  const response = await fetch(`${params.options.baseUrl}${params.path}`, init);

  const text = await response.text();
  let parsed: unknown;

  try {
    parsed = text.length > 0 ? JSON.parse(text) : {};
  } catch {
    parsed = {
      raw: text
    };
  }

  if (!response.ok) {
    const failure = describeFailure(parsed);
    throw new ApiRequestError(response.status, failure.code, failure.message);
  }

  return parsed;
}
