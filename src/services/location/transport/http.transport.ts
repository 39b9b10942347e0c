import ky, { TimeoutError, type KyInstance } from 'ky';
import type { Logger } from '@/shared/utils/logger';
import { APIError, classifyHttpFailure } from '../errors';

/**
 * fetch-compatible function; lets tests and hosts swap the network layer
 */
export type FetchLike = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

export type QueryParams = Record<string, string | number | boolean>;

export interface HttpTransportOptions {
    /** Vendor name used in error messages */
    vendor: string;
    baseUrl: string;
    timeoutMs: number;
    logger: Logger;
    /** Query parameters sent with every request (e.g., API key); never logged */
    defaultSearchParams?: QueryParams | undefined;
    fetch?: FetchLike | undefined;
}

/**
 * JSON-over-HTTP transport used by the adapters.
 *
 * One call performs exactly one HTTP exchange: ky retries are disabled and
 * HTTP errors are classified here instead of thrown by ky. Safe to share
 * between concurrent calls, but close() aborts every request in flight.
 */
export class HttpTransport {
    private readonly client: KyInstance;
    private readonly controller = new AbortController();
    private readonly vendor: string;
    private readonly timeoutMs: number;
    private readonly logger: Logger;
    private readonly defaultSearchParams: QueryParams;

    constructor(options: HttpTransportOptions) {
        this.vendor = options.vendor;
        this.timeoutMs = options.timeoutMs;
        this.logger = options.logger;
        this.defaultSearchParams = options.defaultSearchParams ?? {};

        this.client = ky.create({
            prefixUrl: options.baseUrl,
            timeout: options.timeoutMs,
            retry: 0,
            throwHttpErrors: false,
            headers: {
                Accept: 'application/json',
            },
            ...(options.fetch ? { fetch: options.fetch } : {}),
        });
    }

    get isClosed(): boolean {
        return this.controller.signal.aborted;
    }

    /**
     * GET a JSON resource
     *
     * @param path - Path relative to the base URL, without leading slash
     * @param searchParams - Query parameters for this call
     */
    async getJson(path: string, searchParams: QueryParams = {}): Promise<unknown> {
        return this.send('get', path, searchParams);
    }

    /**
     * POST a JSON body and read a JSON response
     */
    async postJson(path: string, body: unknown, searchParams: QueryParams = {}): Promise<unknown> {
        return this.send('post', path, searchParams, body);
    }

    /**
     * Abort in-flight requests and refuse new ones. Idempotent.
     */
    close(): void {
        if (!this.controller.signal.aborted) {
            this.controller.abort();
            this.logger.debug({ event: 'transport.closed', vendor: this.vendor }, 'HTTP transport closed');
        }
    }

    private async send(
        method: 'get' | 'post',
        path: string,
        searchParams: QueryParams,
        body?: unknown
    ): Promise<unknown> {
        if (this.isClosed) {
            throw new APIError(`${this.vendor} transport is closed`, { vendorCode: 'TRANSPORT_CLOSED' });
        }

        this.logger.debug({ event: 'transport.request', vendor: this.vendor, method, path }, 'Sending request');

        let response: Response;
        try {
            response = await this.client(path, {
                method,
                // Default params (API key) go out with every call but never into logs
                searchParams: { ...this.defaultSearchParams, ...searchParams },
                signal: this.controller.signal,
                ...(body === undefined ? {} : { json: body }),
            });
        } catch (error) {
            throw this.wrapTransportError(error, path);
        }

        this.logger.debug({
            event: 'transport.response',
            vendor: this.vendor,
            method,
            path,
            status: response.status,
        }, 'Received response');

        // ky hands back non-2xx responses (throwHttpErrors: false)
        if (!response.ok) {
            throw classifyHttpFailure({
                vendor: this.vendor,
                status: response.status,
                statusText: response.statusText,
                headers: response.headers,
                body: await readBody(response),
            });
        }

        const text = await response.text();
        try {
            return JSON.parse(text);
        } catch (error) {
            throw new APIError(`${this.vendor} returned a response that is not valid JSON`, {
                statusCode: response.status,
                vendorCode: 'MALFORMED_RESPONSE',
                responseBody: text,
                cause: error,
            });
        }
    }

    private wrapTransportError(error: unknown, path: string): APIError {
        if (error instanceof TimeoutError) {
            return new APIError(`${this.vendor} request to ${path} timed out after ${this.timeoutMs}ms`, {
                vendorCode: 'TIMEOUT',
                cause: error,
            });
        }

        // Aborted by close()
        if (this.isClosed) {
            return new APIError(`${this.vendor} request to ${path} was aborted because the transport closed`, {
                vendorCode: 'TRANSPORT_CLOSED',
                cause: error,
            });
        }

        const message = error instanceof Error ? error.message : String(error);
        return new APIError(`${this.vendor} request to ${path} failed: ${message}`, {
            vendorCode: 'NETWORK_ERROR',
            cause: error,
        });
    }
}

/**
 * Read an error body as JSON when possible, falling back to text
 */
async function readBody(response: Response): Promise<unknown> {
    const text = await response.text();
    if (text === '') {
        return undefined;
    }
    try {
        return JSON.parse(text);
    } catch {
        return text;
    }
}
