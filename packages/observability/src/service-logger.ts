/**
 * Structured logger bound to one service.
 *
 * Adds the service name to every line, a debug level gated by `minLevel`,
 * and redaction of credential-bearing metadata keys (provider API keys
 * travel through config objects that are sometimes logged whole).
 */

import { log as baseLog, type LogLevel } from './logger.js';

export type ExtendedLogLevel = LogLevel | 'debug';

export interface ServiceLoggerConfig {
    /** Service name injected into every log line. */
    service: string;
    /** Minimum log level (default: 'info' in production, 'debug' elsewhere). */
    minLevel?: ExtendedLogLevel;
    /** Fields to redact from metadata. */
    redactFields?: string[];
}

export interface ServiceLogger {
    debug(message: string, metadata?: Record<string, unknown>): void;
    info(message: string, metadata?: Record<string, unknown>): void;
    warn(message: string, metadata?: Record<string, unknown>): void;
    error(message: string, metadata?: Record<string, unknown>): void;
    child(bindings: Record<string, unknown>): ServiceLogger;
}

const LOG_LEVEL_ORDER: Record<ExtendedLogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3
};

const DEFAULT_REDACT_FIELDS = ['password', 'token', 'secret', 'authorization', 'apiKey', 'api_key'];

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export function redactMetadata(
    metadata: Record<string, unknown>,
    redactFields: string[] = DEFAULT_REDACT_FIELDS
): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(metadata)) {
        if (redactFields.some((f) => key.toLowerCase().includes(f.toLowerCase()))) {
            result[key] = '[REDACTED]';
        } else if (isRecord(value)) {
            result[key] = redactMetadata(value, redactFields);
        } else {
            result[key] = value;
        }
    }
    return result;
}

export function createServiceLogger(config: ServiceLoggerConfig, bindings: Record<string, unknown> = {}): ServiceLogger {
    const env = process.env.NODE_ENV ?? 'development';
    const minLevel = config.minLevel ?? (env === 'production' ? 'info' : 'debug');
    const minLevelOrder = LOG_LEVEL_ORDER[minLevel];
    const redactFields = config.redactFields ?? DEFAULT_REDACT_FIELDS;

    const emit = (level: ExtendedLogLevel, message: string, metadata?: Record<string, unknown>): void => {
        if (LOG_LEVEL_ORDER[level] < minLevelOrder) return;

        const enriched = redactMetadata(
            {
                service: config.service,
                ...bindings,
                ...(metadata ?? {})
            },
            redactFields
        );

        // The base logger has no debug channel.
        baseLog(level === 'debug' ? 'info' : level, message, level === 'debug' ? { ...enriched, debug: true } : enriched);
    };

    return {
        debug: (message, metadata) => emit('debug', message, metadata),
        info: (message, metadata) => emit('info', message, metadata),
        warn: (message, metadata) => emit('warn', message, metadata),
        error: (message, metadata) => emit('error', message, metadata),
        child: (extra) => createServiceLogger(config, { ...bindings, ...extra })
    };
}
