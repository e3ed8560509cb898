import { CURRENCY_CODE_PATTERN } from '@fxhub/domain';
import { deny } from '@fxhub/http';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { RateCache, RateLookupService } from '../modules/cache/index.js';

const currencyCode = z.string().trim().toUpperCase().regex(CURRENCY_CODE_PATTERN, 'must be a 2-5 letter currency code');

const listQuerySchema = z.object({
  currency: currencyCode.optional(),
  top: z.coerce.number().int().positive().max(1_000).optional()
});

const historyQuerySchema = z.object({
  currency: currencyCode.optional(),
  source: z.string().min(1).optional(),
  since: z.string().datetime({ offset: true }).optional(),
  limit: z.coerce.number().int().positive().max(1_000).default(50)
});

const pairParamsSchema = z.object({
  from: z.string(),
  to: z.string()
});

const pairQuerySchema = z.object({
  requireFresh: z.enum(['true', 'false']).default('false')
});

function invalidQuery(request: FastifyRequest, reply: FastifyReply, error: z.ZodError): FastifyReply {
  return deny({
    request,
    reply,
    code: 'INVALID_QUERY',
    message: error.issues[0]?.message ?? 'Invalid query parameters.',
    status: 400,
    details: error.issues
  });
}

export function registerRateRoutes(app: FastifyInstance, deps: { cache: RateCache; lookup: RateLookupService }): void {
  app.get('/v1/rates', async (request, reply) => {
    const parsed = listQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return invalidQuery(request, reply, parsed.error);
    }

    return reply.send(await deps.lookup.listRates(parsed.data));
  });

  app.get('/v1/rates/history', async (request, reply) => {
    const parsed = historyQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return invalidQuery(request, reply, parsed.error);
    }

    const { limit, since, ...filter } = parsed.data;
    const entries = await deps.cache.history({ ...filter, ...(since ? { since: new Date(since) } : {}) }, limit);
    return reply.send({ entries });
  });

  app.get('/v1/rates/:from/:to', async (request, reply) => {
    const params = pairParamsSchema.safeParse(request.params);
    const query = pairQuerySchema.safeParse(request.query);
    if (!params.success) {
      return invalidQuery(request, reply, params.error);
    }
    if (!query.success) {
      return invalidQuery(request, reply, query.error);
    }

    const { from, to } = params.data;
    if (query.data.requireFresh === 'true') {
      await deps.lookup.getUsableRate(from, to);
    }
    return reply.send(await deps.lookup.describeRate(from, to));
  });
}
