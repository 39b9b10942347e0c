import { trace } from '@opentelemetry/api';

/**
 * OpenTelemetry tracer for the SDK
 *
 * Spans are no-ops until the host application registers an OpenTelemetry SDK
 * (e.g., NodeSDK with an OTLP exporter). The SDK itself never starts one.
 */

const TRACER_NAME = 'location-sdk';
const TRACER_VERSION = '1.0.0';

export const tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
