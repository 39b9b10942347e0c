import { describe, it, expect, beforeAll, beforeEach, afterAll } from 'vitest';
import { SpanStatusCode, trace } from '@opentelemetry/api';
import {
    BasicTracerProvider,
    InMemorySpanExporter,
    SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';
import { addSpanAttributes, withProviderSpan } from '@/shared/utils/tracing-utils';
import { GeoapifyAdapter } from '@/services/location/adapters/geoapify/geoapify.adapter';
import { APIError } from '@/services/location/errors';
import { createFakeFetch, jsonResponse } from '../helpers/fake-fetch';

/**
 * Unit tests for provider spans
 *
 * An in-memory exporter collects finished spans so their names,
 * attributes and status can be asserted.
 */

const exporter = new InMemorySpanExporter();

function finishedSpan(index: number = 0) {
    const span = exporter.getFinishedSpans()[index];
    if (!span) {
        throw new Error(`No span finished at index ${index}`);
    }
    return span;
}

describe('withProviderSpan', () => {
    beforeAll(() => {
        const provider = new BasicTracerProvider();
        provider.addSpanProcessor(new SimpleSpanProcessor(exporter));
        trace.setGlobalTracerProvider(provider);
    });

    beforeEach(() => {
        exporter.reset();
    });

    afterAll(() => {
        trace.disable();
    });

    it('should name the span after the operation and namespace its attributes', async () => {
        const result = await withProviderSpan(
            { provider: 'geoapify', operation: 'autocomplete', attributes: { query: 'Ber', limit: 3, skipped: undefined } },
            async (span) => {
                addSpanAttributes(span, { 'location.result_count': 2 });
                return 'done';
            }
        );

        expect(result).toBe('done');
        const span = finishedSpan();
        expect(span.name).toBe('location.autocomplete');
        expect(span.status.code).toBe(SpanStatusCode.OK);
        expect(span.attributes).toEqual({
            'location.provider': 'geoapify',
            'location.operation': 'autocomplete',
            'location.query': 'Ber',
            'location.limit': 3,
            'location.result_count': 2,
        });
    });

    it('should record the error kind and vendor code, then rethrow the same error', async () => {
        const failure = new APIError('Geoapify request to routing timed out after 10ms', { vendorCode: 'TIMEOUT' });

        await expect(withProviderSpan({ provider: 'geoapify', operation: 'route' }, async () => {
            throw failure;
        })).rejects.toBe(failure);

        const span = finishedSpan();
        expect(span.status).toEqual({
            code: SpanStatusCode.ERROR,
            message: 'Geoapify request to routing timed out after 10ms',
        });
        expect(span.attributes['location.error.kind']).toBe('APIError');
        expect(span.attributes['location.error.vendor_code']).toBe('TIMEOUT');
        expect(span.attributes['location.error.status_code']).toBeUndefined();
        expect(span.events.map((event) => event.name)).toEqual(['exception']);
    });

    it('should trace adapter calls with the normalized error', async () => {
        const { fetch } = createFakeFetch(() =>
            jsonResponse({ message: 'Too many requests' }, 429, { 'retry-after': '7' })
        );
        const adapter = new GeoapifyAdapter({ apiKey: 'test-api-key', baseUrl: 'https://geo.test/v1', fetch });

        await expect(adapter.geocode('Paris')).rejects.toThrow('Geoapify rate limit exceeded: Too many requests');

        const span = finishedSpan();
        expect(span.name).toBe('location.geocode');
        expect(span.attributes).toEqual({
            'location.provider': 'geoapify',
            'location.operation': 'geocode',
            'location.query': 'Paris',
            'location.error.kind': 'RateLimitError',
            'location.error.status_code': 429,
            'location.error.retry_after_s': 7,
        });
    });
});
