import { loadRatesServiceEnv, toParserConfig } from '@fxhub/config';
import { runService } from '@fxhub/http';
import { createServiceLogger } from '@fxhub/observability';
import { SERVICE_NAME, buildRatesServiceApp } from './app.js';
import { scheduleHistoryRetention } from './jobs/history-retention.js';

async function main(): Promise<void> {
  const env = loadRatesServiceEnv();
  const logger = createServiceLogger({ service: SERVICE_NAME, minLevel: env.LOG_LEVEL });
  const service = await buildRatesServiceApp({ config: toParserConfig(env), logger });

  await runService({
    serviceName: SERVICE_NAME,
    port: env.RATES_SERVICE_PORT,
    host: env.RATES_SERVICE_HOST,
    buildApp: async () => service.app,
    onReady: () => {
      if (env.RATES_SCHEDULER_ENABLED) {
        service.scheduler.start({ runImmediately: true });
      } else {
        logger.warn('Rate refresh scheduler disabled');
      }

      const stopRetention = scheduleHistoryRetention(
        service.cache,
        { retentionDays: service.config.historyRetentionDays },
        logger,
        env.RATES_RETENTION_INTERVAL_MS
      );

      return async () => {
        stopRetention();
        await service.scheduler.stop();
      };
    }
  });
}

main().catch((error: unknown) => {
  console.error(`${SERVICE_NAME} failed to start: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
