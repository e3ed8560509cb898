export { log, setLogSink, type LogEntry, type LogLevel, type LogSink } from './logger.js';
export {
  createServiceLogger,
  redactMetadata,
  type ExtendedLogLevel,
  type ServiceLogger,
  type ServiceLoggerConfig
} from './service-logger.js';
export { createRateMetrics, createServiceMetrics, type RateMetrics, type ServiceMetrics } from './metrics.js';
export { withTiming, type Timed } from './timing.js';
