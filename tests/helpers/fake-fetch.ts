import { vi } from 'vitest';

/**
 * Build a JSON response the way a vendor would send it
 */
export function jsonResponse(
    body: unknown,
    status: number = 200,
    headers: Record<string, string> = {}
): Response {
    return new Response(JSON.stringify(body), {
        status,
        headers: { 'content-type': 'application/json', ...headers },
    });
}

/**
 * In-process stand-in for the network: every request is recorded and
 * answered by `handler`, nothing leaves the process.
 */
export function createFakeFetch(handler: (request: Request) => Response | Promise<Response>) {
    const requests: Request[] = [];
    const fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
        const request = input instanceof Request ? input : new Request(input, init);
        requests.push(request);
        return handler(request);
    });
    return { fetch, requests };
}

/**
 * URL of the nth recorded request
 */
export function requestUrl(requests: Request[], index: number = 0): URL {
    const request = requests[index];
    if (!request) {
        throw new Error(`No request recorded at index ${index}`);
    }
    return new URL(request.url);
}
