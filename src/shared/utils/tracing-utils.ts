import { type Span, SpanStatusCode, trace, context } from '@opentelemetry/api';
import { APIError, AuthenticationError, RateLimitError } from '@/services/location/errors';
import type { ProviderOperation } from '../types/common.types';
import { tracer } from './tracing';

/**
 * Tracing Utility Functions
 *
 * Every provider operation runs in a span named `location.<operation>`.
 * Attributes live under the `location.` namespace.
 */

export type SpanAttributeValue = string | number | boolean | null | undefined;

/**
 * Identifies the provider call a span covers
 */
export interface ProviderSpanOptions {
    provider: string;
    operation: ProviderOperation;
    /** Request details, recorded as `location.<key>` */
    attributes?: Record<string, SpanAttributeValue> | undefined;
}

/**
 * Run a provider call inside a span
 *
 * On failure the span records the exception and the error kind, then the
 * error is rethrown unchanged.
 *
 * @example
 * await withProviderSpan({ provider: 'geoapify', operation: 'geocode', attributes: { query } }, async (span) => {
 *     const results = await fetchResults();
 *     addSpanAttributes(span, { 'location.result_count': results.length });
 *     return results;
 * });
 */
export async function withProviderSpan<T>(
    options: ProviderSpanOptions,
    fn: (span: Span) => Promise<T>
): Promise<T> {
    const span = tracer.startSpan(`location.${options.operation}`);

    addSpanAttributes(span, {
        'location.provider': options.provider,
        'location.operation': options.operation,
    });
    for (const [key, value] of Object.entries(options.attributes ?? {})) {
        addSpanAttributes(span, { [`location.${key}`]: value });
    }

    try {
        const result = await context.with(trace.setSpan(context.active(), span), () => fn(span));
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
    } catch (error) {
        recordProviderError(span, error);
        throw error;
    } finally {
        span.end();
    }
}

/**
 * Add structured attributes to a span, skipping empty values
 */
export function addSpanAttributes(span: Span, attributes: Record<string, SpanAttributeValue>): void {
    for (const [key, value] of Object.entries(attributes)) {
        if (value !== null && value !== undefined) {
            span.setAttribute(key, value);
        }
    }
}

/**
 * Mark a span as failed with the SDK error kind and vendor details
 */
function recordProviderError(span: Span, error: unknown): void {
    if (error instanceof Error) {
        span.recordException(error);
    } else {
        span.recordException({
            name: 'UnknownError',
            message: String(error),
        });
    }

    addSpanAttributes(span, {
        'location.error.kind': error instanceof Error ? error.name : 'UnknownError',
        'location.error.status_code': statusCodeOf(error),
        'location.error.vendor_code': error instanceof APIError ? error.vendorCode : undefined,
        'location.error.retry_after_s': error instanceof RateLimitError ? error.retryAfterSeconds : undefined,
    });

    span.setStatus({
        code: SpanStatusCode.ERROR,
        message: error instanceof Error ? error.message : 'Unknown error',
    });
}

function statusCodeOf(error: unknown): number | undefined {
    if (error instanceof APIError || error instanceof AuthenticationError || error instanceof RateLimitError) {
        return error.statusCode;
    }
    return undefined;
}
