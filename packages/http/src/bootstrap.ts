import { log } from '@fxhub/observability';
import type { FastifyInstance } from 'fastify';

type CleanupFn = () => Promise<void> | void;

export interface ServiceBootstrapOptions {
  serviceName: string;
  buildApp: () => Promise<FastifyInstance>;
  port: number;
  host: string;
  /** Runs after the app is built; a returned function runs on shutdown before the app closes. */
  onReady?: (app: FastifyInstance) => Promise<void | CleanupFn> | void | CleanupFn;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function runService(options: ServiceBootstrapOptions): Promise<void> {
  const app = await options.buildApp();
  const extraCleanup = await options.onReady?.(app);

  await app.listen({ port: options.port, host: options.host });
  log('info', `${options.serviceName} listening`, { host: options.host, port: options.port });

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    log('warn', `${options.serviceName} shutting down`, { signal });

    if (extraCleanup) {
      await extraCleanup();
    }

    await app.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log('error', `${options.serviceName} shutdown failed`, { error: errorMessage(error) });
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}
