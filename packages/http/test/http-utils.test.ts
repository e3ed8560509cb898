import { ApiError, ERRORS, RateNotFoundError, StaleRateError } from '@fxhub/domain';
import { setLogSink } from '@fxhub/observability';
import Fastify from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { errorEnvelope, registerErrorHandler, toApiError } from '../src/errors.js';
import { registerServiceMetrics } from '../src/metrics.js';

beforeEach(() => {
  setLogSink(() => undefined);
});

afterEach(() => {
  setLogSink(null);
});

describe('errorEnvelope', () => {
  it('includes request id and details payload', () => {
    const envelope = errorEnvelope({ id: 'req_1' }, 'INVALID_QUERY', 'Invalid query.', { field: 'top' });
    expect(envelope).toEqual({
      error: {
        code: 'INVALID_QUERY',
        message: 'Invalid query.',
        requestId: 'req_1',
        details: { field: 'top' }
      }
    });
  });

  it('omits details when none are given', () => {
    expect(errorEnvelope({ id: 'req_2' }, 'RATE_NOT_FOUND', 'Missing.')).toEqual({
      error: { code: 'RATE_NOT_FOUND', message: 'Missing.', requestId: 'req_2' }
    });
  });
});

describe('toApiError', () => {
  it('keeps the code and message of registered domain errors', () => {
    const mapped = toApiError(new RateNotFoundError('EUR_JPY'));
    expect(mapped.code).toBe('RATE_NOT_FOUND');
    expect(mapped.status).toBe(404);
    expect(mapped.message).toBe('No rate available for EUR_JPY.');
  });

  it('passes ApiError through untouched', () => {
    const original = new ApiError(ERRORS.INVALID_QUERY, { field: 'limit' });
    expect(toApiError(original)).toBe(original);
  });

  it('hides unexpected errors behind INTERNAL_ERROR', () => {
    const mapped = toApiError(new Error('disk on fire'));
    expect(mapped.code).toBe('INTERNAL_ERROR');
    expect(mapped.status).toBe(500);
    expect(mapped.message).toBe('An unexpected internal error occurred.');
  });
});

describe('registerErrorHandler', () => {
  it('renders thrown domain errors as envelopes with their status', async () => {
    const app = Fastify({ logger: false });
    registerErrorHandler(app, 'test-service');
    app.get('/stale', async () => {
      throw new StaleRateError('BTC_USD', 600_000, 300_000);
    });

    const response = await app.inject({ method: 'GET', url: '/stale' });
    const body: unknown = response.json();

    expect(response.statusCode).toBe(409);
    expect(body).toMatchObject({ error: { code: 'STALE_RATE', message: 'Rate for BTC_USD is 600s old; time-to-live is 300s.' } });
    await app.close();
  });

  it('answers unknown routes with NOT_FOUND', async () => {
    const app = Fastify({ logger: false });
    registerErrorHandler(app, 'test-service');

    const response = await app.inject({ method: 'GET', url: '/nowhere' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({ error: { code: 'NOT_FOUND' } });
    await app.close();
  });
});

describe('registerServiceMetrics', () => {
  it('counts requests by route and status and serves the registry', async () => {
    const app = Fastify({ logger: false });
    registerServiceMetrics(app, 'test-service');
    app.get('/ping', async () => ({ ok: true }));

    await app.inject({ method: 'GET', url: '/ping' });
    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('test_service_request_total{method="GET",route="/ping",status="200"} 1');
    await app.close();
  });
});
