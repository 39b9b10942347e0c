import { z } from 'zod';
import { ValidationError } from '@/services/location/errors';

/**
 * Coordinate validation schema (WGS-84)
 */
export const coordinateSchema = z.object({
    latitude: z
        .number({ invalid_type_error: 'Latitude must be a number' })
        .finite()
        .min(-90, 'Latitude must be between -90 and 90')
        .max(90, 'Latitude must be between -90 and 90'),
    longitude: z
        .number({ invalid_type_error: 'Longitude must be a number' })
        .finite()
        .min(-180, 'Longitude must be between -180 and 180')
        .max(180, 'Longitude must be between -180 and 180'),
});

/**
 * Free-text query schema; the trimmed value is what gets sent
 */
const querySchema = z
    .string({ required_error: 'Query is required', invalid_type_error: 'Query must be a string' })
    .trim()
    .min(1, 'Query must be a non-empty string');

/**
 * Autocomplete limit schema (upper bound depends on the provider)
 */
export function autocompleteLimitSchema(max: number) {
    return z
        .number({ invalid_type_error: 'Limit must be a number' })
        .int('Limit must be an integer')
        .min(1, 'Limit must be a positive integer')
        .max(max, `Limit must not exceed ${max}`);
}

/**
 * Shared HTTP provider options schema
 */
export const providerOptionsSchema = z.object({
    apiKey: z
        .string({ required_error: 'API key is required', invalid_type_error: 'API key must be a string' })
        .trim()
        .min(1, 'API key must be a non-empty string'),
    baseUrl: z.string().url('Base URL must be a valid URL'),
    timeoutMs: z.number().int().positive('Timeout must be a positive number of milliseconds'),
});

/**
 * Environment variables validation schema
 */
const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),

    // Geoapify
    GEOAPIFY_API_KEY: z.string().min(1, 'Geoapify API key is required'),
    GEOAPIFY_BASE_URL: z.string().url().optional(),

    // Transport
    LOCATION_SDK_TIMEOUT_MS: z
        .string()
        .default('10000')
        .transform(Number)
        .pipe(z.number().int().positive()),
});

/**
 * Format zod issues as "path: message" lines
 */
function formatIssues(error: z.ZodError, prefix?: string): string[] {
    return error.issues.map((issue) => {
        const path = [prefix, ...issue.path.map(String)].filter(Boolean).join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Parse a value or raise ValidationError carrying every issue
 *
 * @param schema - Zod schema to apply
 * @param value - Untrusted input
 * @param label - Name of the input, used as message prefix
 */
export function parseOrThrow<T extends z.ZodTypeAny>(
    schema: T,
    value: unknown,
    label: string
): z.output<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const issues = formatIssues(result.error, label);
        throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`, issues);
    }
    return result.data;
}

/**
 * Validate a coordinate-like value
 */
export function validateCoordinate(value: unknown, label: string = 'coordinate') {
    return parseOrThrow(coordinateSchema, value, label);
}

/**
 * Validate a free-text query
 */
export function validateQuery(value: unknown, label: string = 'query') {
    return parseOrThrow(querySchema, value, label);
}

/**
 * Validate environment variables
 */
export function validateEnv(env: NodeJS.ProcessEnv) {
    return parseOrThrow(envSchema, env, 'environment');
}
