import { createServiceMetrics, type ServiceMetrics } from '@fxhub/observability';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Registry } from 'prom-client';

export function registerServiceMetrics(app: FastifyInstance, serviceName: string, registry?: Registry): ServiceMetrics {
  const metrics = createServiceMetrics(serviceName, registry);
  const startedAt = new WeakMap<FastifyRequest, number>();

  app.addHook('onRequest', async (request) => {
    startedAt.set(request, performance.now());
  });

  app.addHook('onResponse', async (request, reply) => {
    const start = startedAt.get(request) ?? performance.now();
    const duration = Math.max(performance.now() - start, 0);
    const route = request.routeOptions.url ?? 'unmatched';
    const status = String(reply.statusCode);

    metrics.requestDurationMs.labels(request.method, route, status).observe(duration);
    metrics.requestCount.labels(request.method, route, status).inc();

    if (reply.statusCode >= 400) {
      metrics.errorCount.labels(status).inc();
    }
  });

  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', metrics.registry.contentType);
    return metrics.registry.metrics();
  });

  return metrics;
}
