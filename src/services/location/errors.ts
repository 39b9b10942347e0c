/**
 * Location SDK error taxonomy
 *
 * Adapters translate every vendor failure into exactly one of
 * ValidationError, AuthenticationError, RateLimitError or APIError.
 * Callers can catch LocationSDKError to handle all of them at once.
 */

/**
 * Base class for every error raised by the SDK
 */
export class LocationSDKError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'LocationSDKError';
    }
}

/**
 * Caller-supplied input violates a precondition.
 * Always raised before any network call.
 */
export class ValidationError extends LocationSDKError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

/**
 * Vendor rejected the credentials (HTTP 401/403)
 */
export class AuthenticationError extends LocationSDKError {
    constructor(
        message: string,
        public readonly statusCode?: number | undefined,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'AuthenticationError';
    }
}

/**
 * Vendor quota exhausted (HTTP 429)
 */
export class RateLimitError extends LocationSDKError {
    constructor(
        message: string,
        public readonly retryAfterSeconds?: number | undefined,
        public readonly statusCode?: number | undefined,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = 'RateLimitError';
    }
}

/**
 * Details attached to an APIError for diagnostics
 */
export interface APIErrorDetails {
    /** HTTP status returned by the vendor, if any */
    statusCode?: number | undefined;
    /** Vendor error code or SDK failure code (e.g., TIMEOUT) */
    vendorCode?: string | undefined;
    /** Parsed response body, if any */
    responseBody?: unknown;
    /** Underlying transport or parsing failure */
    cause?: unknown;
}

/**
 * Any other vendor-side or transport failure
 */
export class APIError extends LocationSDKError {
    public readonly statusCode: number | undefined;
    public readonly vendorCode: string | undefined;
    public readonly responseBody: unknown;

    constructor(message: string, details: APIErrorDetails = {}) {
        super(message, details.cause === undefined ? undefined : { cause: details.cause });
        this.name = 'APIError';
        this.statusCode = details.statusCode;
        this.vendorCode = details.vendorCode;
        this.responseBody = details.responseBody;
    }
}

/**
 * The vendor answered but found no path between the two points.
 * A legitimate outcome rather than a transport failure.
 */
export class NoRouteError extends APIError {
    constructor(message: string, details: Omit<APIErrorDetails, 'vendorCode'> = {}) {
        super(message, { ...details, vendorCode: 'NO_ROUTE' });
        this.name = 'NoRouteError';
    }
}

/**
 * Type guard for SDK errors
 */
export function isLocationSDKError(value: unknown): value is LocationSDKError {
    return value instanceof LocationSDKError;
}

/**
 * Non-2xx HTTP response handed to the classifier
 */
export interface HttpFailure {
    /** Vendor name used in messages */
    vendor: string;
    status: number;
    statusText?: string | undefined;
    headers: Headers;
    /** Parsed JSON body, raw text, or undefined when empty */
    body: unknown;
}

/**
 * Map a non-2xx vendor response onto the taxonomy
 *
 * @returns Exactly one error kind; never throws
 */
export function classifyHttpFailure(failure: HttpFailure): LocationSDKError {
    const vendorMessage = extractVendorMessage(failure.body);
    const suffix = vendorMessage ? `: ${vendorMessage}` : '';

    if (failure.status === 401 || failure.status === 403) {
        return new AuthenticationError(
            `${failure.vendor} rejected the credentials (HTTP ${failure.status})${suffix}`,
            failure.status
        );
    }

    if (failure.status === 429) {
        const retryAfterSeconds = parseRetryAfter(failure.headers.get('retry-after'));
        return new RateLimitError(
            `${failure.vendor} rate limit exceeded${suffix}`,
            retryAfterSeconds,
            failure.status
        );
    }

    return new APIError(
        `${failure.vendor} request failed with status ${failure.status}${suffix}`,
        {
            statusCode: failure.status,
            vendorCode: extractVendorCode(failure.body),
            responseBody: failure.body,
        }
    );
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date)
 *
 * @param value - Raw header value
 * @param now - Reference time in milliseconds
 * @returns Whole seconds to wait, or undefined when absent/unparseable
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
    if (value === null || value.trim() === '') {
        return undefined;
    }

    const trimmed = value.trim();
    if (/^\d+$/.test(trimmed)) {
        return Number(trimmed);
    }

    const date = Date.parse(trimmed);
    if (Number.isNaN(date)) {
        return undefined;
    }

    return Math.max(0, Math.ceil((date - now) / 1000));
}

function extractVendorMessage(body: unknown): string | undefined {
    if (typeof body === 'string') {
        return body.trim() || undefined;
    }
    if (body && typeof body === 'object') {
        if ('message' in body && typeof body.message === 'string') {
            return body.message;
        }
        if ('error' in body && typeof body.error === 'string') {
            return body.error;
        }
    }
    return undefined;
}

function extractVendorCode(body: unknown): string | undefined {
    if (body && typeof body === 'object' && 'error' in body && typeof body.error === 'string') {
        return body.error;
    }
    return undefined;
}
