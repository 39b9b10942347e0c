import type { LogLevel } from '../types/common.types';
import { validateEnv } from '../utils/validators';
import type { Logger } from '../utils/logger';

/**
 * SDK configuration built from environment variables.
 * Returned as a value; nothing is cached at module level.
 */
export interface LocationSDKConfig {
    env: 'development' | 'production' | 'test';
    isDevelopment: boolean;

    logging: {
        level: LogLevel;
    };

    geoapify: {
        apiKey: string;
        baseUrl: string | undefined;
        timeoutMs: number;
    };
}

/**
 * Load and validate configuration
 *
 * @param env - Environment to read (default: process.env)
 * @throws {ValidationError} If a required variable is missing or malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LocationSDKConfig {
    const validated = validateEnv(env);

    return {
        env: validated.NODE_ENV,
        isDevelopment: validated.NODE_ENV === 'development',
        logging: {
            level: validated.LOG_LEVEL,
        },
        geoapify: {
            apiKey: validated.GEOAPIFY_API_KEY,
            baseUrl: validated.GEOAPIFY_BASE_URL,
            timeoutMs: validated.LOCATION_SDK_TIMEOUT_MS,
        },
    };
}

/**
 * Log configuration summary (without sensitive data)
 */
export function logConfigSummary(logger: Logger, config: LocationSDKConfig) {
    logger.info({
        event: 'config.loaded',
        env: config.env,
        logging: config.logging,
        geoapify: {
            baseUrl: config.geoapify.baseUrl ?? 'default',
            timeoutMs: config.geoapify.timeoutMs,
            apiKeyConfigured: config.geoapify.apiKey.length > 0,
        },
    }, 'Configuration loaded');
}
