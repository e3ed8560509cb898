import { deny } from '@fxhub/http';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { RateRefreshScheduler } from '../jobs/rate-refresh.js';

const refreshSchema = z.object({
  source: z.union([z.string().min(1), z.array(z.string().min(1))]).optional()
});

export function registerInternalRoutes(app: FastifyInstance, deps: { scheduler: RateRefreshScheduler }): void {
  app.post('/internal/v1/rates/refresh', async (request, reply) => {
    const parsed = refreshSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return deny({
        request,
        reply,
        code: 'INVALID_PAYLOAD',
        message: parsed.error.issues[0]?.message ?? 'Invalid payload.',
        status: 400,
        details: parsed.error.issues
      });
    }

    const source = parsed.data.source;
    const sources = source === undefined ? [] : Array.isArray(source) ? source : [source];
    return reply.send(await deps.scheduler.runNow('manual', sources));
  });

  app.get('/internal/v1/rates/scheduler', async () => deps.scheduler.getStatus());
}
