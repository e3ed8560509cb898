import { Counter, Gauge, Histogram, Registry } from 'prom-client';

function metricPrefix(serviceName: string): string {
  return serviceName.replaceAll('-', '_');
}

export interface ServiceMetrics {
  registry: Registry;
  requestDurationMs: Histogram<string>;
  requestCount: Counter<string>;
  errorCount: Counter<string>;
  buildInfo: Gauge<string>;
}

export function createServiceMetrics(serviceName: string, registry: Registry = new Registry()): ServiceMetrics {
  const prefix = metricPrefix(serviceName);

  const requestDurationMs = new Histogram({
    name: `${prefix}_request_duration_ms`,
    help: 'Request duration in milliseconds',
    labelNames: ['method', 'route', 'status'] as const,
    buckets: [10, 25, 50, 100, 250, 500, 1000, 2000],
    registers: [registry]
  });

  const requestCount = new Counter({
    name: `${prefix}_request_total`,
    help: 'Total HTTP requests',
    labelNames: ['method', 'route', 'status'] as const,
    registers: [registry]
  });

  const errorCount = new Counter({
    name: `${prefix}_error_total`,
    help: 'Total errors',
    labelNames: ['code'] as const,
    registers: [registry]
  });

  const buildInfo = new Gauge({
    name: `${prefix}_build_info`,
    help: 'Build and deployment metadata for this running service',
    labelNames: ['release_id', 'git_sha', 'environment'] as const,
    registers: [registry]
  });

  buildInfo
    .labels(
      process.env.RELEASE_ID ?? 'dev',
      process.env.GIT_SHA ?? 'local',
      process.env.ENVIRONMENT ?? process.env.NODE_ENV ?? 'development'
    )
    .set(1);

  return {
    registry,
    requestDurationMs,
    requestCount,
    errorCount,
    buildInfo
  };
}

export interface RateMetrics {
  refreshRuns: Counter<string>;
  refreshDurationMs: Histogram<string>;
  sourceFetches: Counter<string>;
  ratesRejected: Counter<string>;
  cachedPairs: Gauge<string>;
  lastSuccessfulRefresh: Gauge<string>;
}

export function createRateMetrics(registry: Registry, serviceName: string): RateMetrics {
  const prefix = metricPrefix(serviceName);

  return {
    refreshRuns: new Counter({
      name: `${prefix}_refresh_runs_total`,
      help: 'Aggregation runs by trigger and outcome',
      labelNames: ['trigger', 'outcome'] as const,
      registers: [registry]
    }),
    refreshDurationMs: new Histogram({
      name: `${prefix}_refresh_duration_ms`,
      help: 'Aggregation run duration in milliseconds',
      labelNames: ['outcome'] as const,
      buckets: [50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
      registers: [registry]
    }),
    sourceFetches: new Counter({
      name: `${prefix}_source_fetch_total`,
      help: 'Rate source fetches by source and outcome code',
      labelNames: ['source', 'outcome'] as const,
      registers: [registry]
    }),
    ratesRejected: new Counter({
      name: `${prefix}_rates_rejected_total`,
      help: 'Rates dropped during validation',
      labelNames: ['currency_class', 'reason'] as const,
      registers: [registry]
    }),
    cachedPairs: new Gauge({
      name: `${prefix}_cached_pairs`,
      help: 'Pairs in the last persisted rate snapshot',
      registers: [registry]
    }),
    lastSuccessfulRefresh: new Gauge({
      name: `${prefix}_last_successful_refresh_seconds`,
      help: 'Unix time of the last successful aggregation run',
      registers: [registry]
    })
  };
}
