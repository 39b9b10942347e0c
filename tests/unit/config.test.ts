import { describe, it, expect } from 'vitest';
import { loadConfig, logConfigSummary } from '@/shared/config/config';
import { ValidationError } from '@/services/location/errors';
import { createLogger } from '@/shared/utils/logger';

/**
 * Unit tests for environment configuration
 */

describe('loadConfig', () => {
    it('should apply defaults', () => {
        const config = loadConfig({ GEOAPIFY_API_KEY: 'test-api-key' });

        expect(config).toEqual({
            env: 'production',
            isDevelopment: false,
            logging: { level: 'info' },
            geoapify: {
                apiKey: 'test-api-key',
                baseUrl: undefined,
                timeoutMs: 10000,
            },
        });
    });

    it('should read overrides', () => {
        const config = loadConfig({
            NODE_ENV: 'development',
            LOG_LEVEL: 'debug',
            GEOAPIFY_API_KEY: 'test-api-key',
            GEOAPIFY_BASE_URL: 'http://localhost:8080/v1',
            LOCATION_SDK_TIMEOUT_MS: '2500',
        });

        expect(config.isDevelopment).toBe(true);
        expect(config.logging.level).toBe('debug');
        expect(config.geoapify.baseUrl).toBe('http://localhost:8080/v1');
        expect(config.geoapify.timeoutMs).toBe(2500);
    });

    it('should reject a missing API key', () => {
        expect(() => loadConfig({})).toThrow(ValidationError);
    });

    it.each(['0', '-5', 'soon', '1.5'])('should reject timeout %j', (timeout) => {
        expect(() => loadConfig({ GEOAPIFY_API_KEY: 'test-api-key', LOCATION_SDK_TIMEOUT_MS: timeout }))
            .toThrow(ValidationError);
    });

    it('should not log the API key', () => {
        const lines: string[] = [];
        const logger = createLogger({
            level: 'info',
            destination: { write: (line: string) => lines.push(line) },
        });

        logConfigSummary(logger, loadConfig({ GEOAPIFY_API_KEY: 'test-api-key' }));

        expect(lines).toHaveLength(1);
        expect(lines[0]).not.toContain('test-api-key');
        expect(JSON.parse(lines[0] ?? '{}').geoapify).toEqual({
            baseUrl: 'default',
            timeoutMs: 10000,
            apiKeyConfigured: true,
        });
    });
});
