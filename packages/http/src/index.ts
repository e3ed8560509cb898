export { deny, errorEnvelope, registerErrorHandler, sendError, toApiError, type ErrorBody } from './errors.js';
export { registerServiceMetrics } from './metrics.js';
export { runService, type ServiceBootstrapOptions } from './bootstrap.js';
