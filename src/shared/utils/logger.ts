import pino, { type DestinationStream, type Logger } from 'pino';
import type { LogContext, LogLevel, ProviderOperation } from '../types/common.types';

export type { Logger } from 'pino';

/**
 * Logger construction options
 */
export interface LoggerOptions {
    /** Minimum level to emit (default: info) */
    level?: LogLevel | undefined;
    /** Pretty-print through pino-pretty (development only) */
    pretty?: boolean | undefined;
    /** Base fields attached to every line */
    base?: Record<string, unknown> | undefined;
    /** Where JSON lines go when not pretty-printing (default: stdout) */
    destination?: DestinationStream | undefined;
}

/**
 * Create a logger instance with appropriate configuration
 */
export function createLogger(options: LoggerOptions = {}): Logger {
    const baseConfig = {
        level: options.level ?? 'info',
        base: {
            sdk: 'location-sdk',
            ...options.base,
        },
        timestamp: pino.stdTimeFunctions.isoTime,
    };

    if (options.pretty) {
        return pino({
            ...baseConfig,
            transport: {
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    translateTime: 'HH:MM:ss Z',
                    ignore: 'pid,hostname',
                },
            },
        });
    }

    return options.destination ? pino(baseConfig, options.destination) : pino(baseConfig);
}

/**
 * Logger used by providers that were not handed one.
 * The SDK stays quiet unless the host application opts in.
 */
export const silentLogger: Logger = pino({ level: 'silent' });

/**
 * Create a child logger with context
 *
 * @param logger - Parent logger
 * @param context - Additional context to include in all logs
 * @returns Child logger with context
 *
 * @example
 * const providerLogger = createContextLogger(logger, { provider: 'geoapify' });
 * providerLogger.info('Provider ready');
 */
export function createContextLogger(logger: Logger, context: LogContext): Logger {
    return logger.child(context);
}

/**
 * Log an outgoing provider operation
 */
export function logProviderRequest(logger: Logger, data: {
    provider: string;
    operation: ProviderOperation;
    [key: string]: unknown;
}) {
    logger.debug({
        ...data,
        event: `location.${data.operation}.request`,
    }, `Calling ${data.provider} ${data.operation}`);
}

/**
 * Log a completed provider operation
 */
export function logProviderResponse(logger: Logger, data: {
    provider: string;
    operation: ProviderOperation;
    durationMs: number;
    resultCount?: number | undefined;
}) {
    logger.debug({
        event: `location.${data.operation}.success`,
        provider: data.provider,
        durationMs: data.durationMs,
        resultCount: data.resultCount,
    }, `${data.provider} ${data.operation} completed`);
}

/**
 * Log a failed provider operation
 */
export function logProviderFailure(logger: Logger, data: {
    provider: string;
    operation: ProviderOperation;
    durationMs: number;
    error: Error;
}) {
    logger.warn({
        event: `location.${data.operation}.failed`,
        provider: data.provider,
        durationMs: data.durationMs,
        error: {
            name: data.error.name,
            message: data.error.message,
        },
    }, `${data.provider} ${data.operation} failed`);
}
