import { createRateSources, type RateSource } from '@fxhub/adapters';
import { loadParserConfig, type ParserConfig } from '@fxhub/config';
import { createCurrencyRegistry } from '@fxhub/domain';
import { registerErrorHandler, registerServiceMetrics } from '@fxhub/http';
import { createRateMetrics, createServiceLogger, type ServiceLogger } from '@fxhub/observability';
import Fastify, { type FastifyInstance } from 'fastify';
import type { Registry } from 'prom-client';
import { RateRefreshScheduler } from './jobs/rate-refresh.js';
import { RateAggregator } from './modules/aggregator/index.js';
import { RateCache, RateLookupService } from './modules/cache/index.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerInternalRoutes } from './routes/internal.js';
import { registerRateRoutes } from './routes/rates.js';

export const SERVICE_NAME = 'rates-service';

export interface RatesServiceOptions {
  config?: ParserConfig;
  sources?: RateSource[];
  cache?: RateCache;
  logger?: ServiceLogger;
  registry?: Registry;
  now?: () => Date;
}

export interface RatesService {
  app: FastifyInstance;
  config: ParserConfig;
  cache: RateCache;
  aggregator: RateAggregator;
  lookup: RateLookupService;
  scheduler: RateRefreshScheduler;
  logger: ServiceLogger;
}

/** Wire config, sources, cache, aggregator and scheduler into one Fastify app. Nothing starts ticking here. */
export async function buildRatesServiceApp(options: RatesServiceOptions = {}): Promise<RatesService> {
  const config = options.config ?? loadParserConfig();
  const logger = options.logger ?? createServiceLogger({ service: SERVICE_NAME });
  const now = options.now ?? (() => new Date());
  const registry = createCurrencyRegistry(config);

  const app = Fastify({ logger: false });
  const metrics = registerServiceMetrics(app, SERVICE_NAME, options.registry);
  const rateMetrics = createRateMetrics(metrics.registry, SERVICE_NAME);
  registerErrorHandler(app, SERVICE_NAME);

  const cache =
    options.cache ??
    new RateCache({
      snapshotPath: config.snapshotPath,
      historyPath: config.historyPath,
      baseCurrency: config.baseCurrency,
      now
    });

  const aggregator = new RateAggregator({
    sources: options.sources ?? createRateSources(config, now),
    cache,
    registry,
    baseCurrency: config.baseCurrency,
    bounds: config.bounds,
    sourcePriority: config.sourcePriority,
    sourceDeadlineMs: config.sourceDeadlineMs,
    retry: config.retry,
    logger: logger.child({ component: 'aggregator' }),
    metrics: rateMetrics,
    now
  });

  const lookup = new RateLookupService(cache, {
    registry,
    baseCurrency: config.baseCurrency,
    ttlMs: config.ttlMs,
    now
  });

  const scheduler = new RateRefreshScheduler(aggregator, {
    intervalMs: config.updateIntervalMs,
    ttlMs: config.ttlMs,
    logger: logger.child({ component: 'scheduler' }),
    now
  });

  registerHealthRoutes(app, { cache, logger });
  registerRateRoutes(app, { cache, lookup });
  registerInternalRoutes(app, { scheduler });

  app.addHook('onClose', async () => {
    await scheduler.stop();
  });

  return { app, config, cache, aggregator, lookup, scheduler, logger };
}
