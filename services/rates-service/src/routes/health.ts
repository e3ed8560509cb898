import { deny } from '@fxhub/http';
import { toErrorSummary } from '@fxhub/domain';
import type { ServiceLogger } from '@fxhub/observability';
import type { FastifyInstance } from 'fastify';
import type { RateCache } from '../modules/cache/index.js';

export function registerHealthRoutes(app: FastifyInstance, deps: { cache: RateCache; logger: ServiceLogger }): void {
  app.get('/healthz', async () => ({ ok: true, service: 'rates-service' }));

  app.get('/readyz', async (request, reply) => {
    try {
      const table = await deps.cache.load();
      return reply.send({ ok: true, pairs: table.pairs.size, lastRefresh: table.lastRefresh });
    } catch (error) {
      const summary = toErrorSummary(error);
      deps.logger.warn('Readiness check failed', { error: summary });
      return deny({ request, reply, code: summary.code, message: summary.message, status: 503 });
    }
  });
}
