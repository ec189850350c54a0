import { ResourceNotFoundError } from '../types/errors.js';
import type { AttemptContext, ExecutionContext } from '../types/reliability.js';
import { RequestExecutor } from '../utils/retry.js';
import { isNotFound, sendRequest, type FetchFn, type HttpMethod, type HttpResponse } from './http-client.js';

export const COMPUTE_API_VERSION = '2022-08-01';
export const GALLERY_API_VERSION = '2022-03-03';

export type ResourceProvider = 'Microsoft.Compute' | 'Microsoft.Storage';

export interface ManagementClientOptions {
    subscriptionId: string;
    resourceGroup: string;
    /** Executor carrying a management-scoped credential provider. */
    executor: RequestExecutor;
    endpoint?: string;
    fetchFn?: FetchFn;
}

export interface ResourceRequest {
    method: HttpMethod;
    provider: ResourceProvider;
    /** Path below the provider, e.g. `images/my-image`. */
    query: string;
    apiVersion: string;
    resourceGroup?: string;
    body?: object;
    signal?: AbortSignal;
}

/**
 * Resource-manager calls for one subscription. Every request runs through the executor,
 * so the caller gets retries and one token refresh on 401 for free.
 */
export class ManagementClient {
    readonly subscriptionId: string;
    readonly resourceGroup: string;
    readonly executor: RequestExecutor;
    readonly #endpoint: string;
    readonly #fetchFn?: FetchFn;

    constructor(options: ManagementClientOptions) {
        this.subscriptionId = options.subscriptionId;
        this.resourceGroup = options.resourceGroup;
        this.executor = options.executor;
        this.#endpoint = (options.endpoint ?? 'https://management.azure.com').replace(/\/+$/, '');
        this.#fetchFn = options.fetchFn;
    }

    generateUrl(provider: ResourceProvider, query: string, apiVersion: string, resourceGroup?: string): string {
        return (
            `${this.#endpoint}/subscriptions/${this.subscriptionId}` +
            `/resourceGroups/${resourceGroup ?? this.resourceGroup}` +
            `/providers/${provider}/${query}?api-version=${apiVersion}`
        );
    }

    /** One attempt, with no retry; used by status probes that already run inside the executor. */
    send<T = unknown>(request: ResourceRequest, attempt: AttemptContext): Promise<HttpResponse<T>> {
        return sendRequest<T>({
            method: request.method,
            url: this.generateUrl(request.provider, request.query, request.apiVersion, request.resourceGroup),
            token: attempt.token,
            body: request.body,
            signal: attempt.signal,
            fetchFn: this.#fetchFn,
        });
    }

    async request<T = unknown>(request: ResourceRequest, context: ExecutionContext = {}): Promise<HttpResponse<T>> {
        return this.executor.run(
            (attempt) => this.send<T>(request, attempt),
            { label: context.label ?? `${request.method} ${request.query}`, signal: request.signal ?? context.signal },
        );
    }

    /** GET a resource; a 404 becomes {@link ResourceNotFoundError}. */
    async getResource<T = unknown>(request: Omit<ResourceRequest, 'method' | 'body'>): Promise<T> {
        try {
            const response = await this.request<T>({ ...request, method: 'GET' });
            if (response.data === undefined) {
                throw new ResourceNotFoundError(`Resource ${request.query} returned an empty body.`);
            }
            return response.data;
        } catch (error) {
            if (isNotFound(error)) {
                throw new ResourceNotFoundError(`Resource not found: ${request.query}`, { cause: error });
            }
            throw error;
        }
    }

    async resourceExists(request: Omit<ResourceRequest, 'method' | 'body'>): Promise<boolean> {
        try {
            await this.getResource(request);
            return true;
        } catch (error) {
            if (error instanceof ResourceNotFoundError) return false;
            throw error;
        }
    }
}
