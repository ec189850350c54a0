import { OperationAbortedError, RemoteCallError, TransientError } from '../types/errors.js';
import { logRequest } from '../utils/logger.js';

export type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE' | 'PATCH';

export type FetchFn = typeof fetch;

export interface HttpRequest {
    method: HttpMethod;
    url: string;
    headers?: Record<string, string>;
    /** Objects are sent as JSON; buffers and strings as-is. */
    body?: Buffer | string | object;
    token?: string;
    signal?: AbortSignal;
    /** Per-request timeout in ms. @default 120000 */
    timeoutMs?: number;
    fetchFn?: FetchFn;
}

export interface HttpResponse<T = unknown> {
    status: number;
    headers: Headers;
    /** Parsed JSON body, or `undefined` for empty and non-JSON bodies. */
    data: T | undefined;
    text: string;
}

const DEFAULT_TIMEOUT_MS = 120_000;
const MAX_BODY_IN_ERROR = 4096;

/** Pull `error.code` out of a JSON error body, when the service sent one. */
export function extractErrorCode(text: string): string | undefined {
    try {
        const parsed: unknown = JSON.parse(text);
        if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
            const inner = parsed.error;
            if (typeof inner === 'object' && inner !== null && 'code' in inner) {
                return typeof inner.code === 'string' ? inner.code : undefined;
            }
        }
    } catch {
        const match = /<Code>([^<]+)<\/Code>/.exec(text);
        return match?.[1];
    }
    return undefined;
}

function networkErrorCode(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    if (error.name === 'TimeoutError') return 'TimeoutError';
    const cause = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause) {
        return typeof cause.code === 'string' ? cause.code : undefined;
    }
    return undefined;
}

function encodeBody(body: HttpRequest['body'], headers: Record<string, string>): RequestInit['body'] {
    if (body === undefined) return undefined;
    if (Buffer.isBuffer(body)) {
        headers['Content-Length'] ??= String(body.length);
        return new Uint8Array(body.buffer, body.byteOffset, body.byteLength);
    }
    if (typeof body === 'string') return body;
    headers['Content-Type'] ??= 'application/json';
    return JSON.stringify(body);
}

function parseJson<T>(text: string): T | undefined {
    if (!text) return undefined;
    try {
        return JSON.parse(text) as T;
    } catch {
        return undefined;
    }
}

/** True for a 404 from a remote call, also when wrapped by the executor's error. */
export function isNotFound(error: unknown): boolean {
    const cause = error instanceof Error && error.cause instanceof RemoteCallError ? error.cause : error;
    return cause instanceof RemoteCallError && cause.status === 404;
}

/**
 * Send one HTTP request. A response outside 2xx, or a network failure, is thrown as
 * {@link RemoteCallError} carrying the status and the raw response body. A connection lost
 * while the body streams in is a {@link TransientError}.
 */
export async function sendRequest<T = unknown>(request: HttpRequest): Promise<HttpResponse<T>> {
    const fetchFn = request.fetchFn ?? fetch;
    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers };
    if (request.token) {
        headers.Authorization = `Bearer ${request.token}`;
    }
    const body = encodeBody(request.body, headers);

    const timeout = AbortSignal.timeout(request.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    const signal = request.signal ? AbortSignal.any([request.signal, timeout]) : timeout;
    const displayUrl = request.url.split('?')[0] ?? request.url;
    const start = Date.now();

    let response: Response;
    try {
        response = await fetchFn(request.url, { method: request.method, headers, body, signal });
    } catch (error) {
        if (request.signal?.aborted) {
            throw new OperationAbortedError();
        }
        void logRequest(request.method, displayUrl, undefined, Date.now() - start);
        const message = error instanceof Error ? error.message : String(error);
        throw new RemoteCallError(`${request.method} ${displayUrl} failed before a response: ${message}`, {
            code: networkErrorCode(error),
            method: request.method,
            url: displayUrl,
            cause: error,
        });
    }

    let text = '';
    if (request.method !== 'HEAD') {
        try {
            text = await response.text();
        } catch (error) {
            if (request.signal?.aborted) {
                throw new OperationAbortedError();
            }
            void logRequest(request.method, displayUrl, response.status, Date.now() - start);
            const message = error instanceof Error ? error.message : String(error);
            throw new TransientError(`${request.method} ${displayUrl} failed while reading the response: ${message}`, {
                status: response.status,
                code: networkErrorCode(error),
                method: request.method,
                url: displayUrl,
                cause: error,
            });
        }
    }
    void logRequest(request.method, displayUrl, response.status, Date.now() - start);

    if (!response.ok) {
        const errorBody = text.length > MAX_BODY_IN_ERROR ? `${text.slice(0, MAX_BODY_IN_ERROR)}…` : text;
        throw new RemoteCallError(`${request.method} ${displayUrl} returned ${response.status}`, {
            status: response.status,
            body: errorBody,
            code: extractErrorCode(text) ?? response.headers.get('x-ms-error-code') ?? undefined,
            method: request.method,
            url: displayUrl,
        });
    }

    return {
        status: response.status,
        headers: response.headers,
        data: parseJson<T>(text),
        text,
    };
}
