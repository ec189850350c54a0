import { MissingArgumentError } from '../types/errors.js';
import type { OperationKind, OperationOutcome, ProbeResult } from '../types/operation.js';
import type { ExecutionContext } from '../types/reliability.js';
import { RequestExecutor } from '../utils/retry.js';
import { logActivity } from '../utils/logger.js';
import { sendRequest, type FetchFn, type HttpMethod, type HttpResponse } from './http-client.js';
import { OperationWaiter, type StatusProbe } from './operation-waiter.js';
import type { OfferDocument } from './offer-document.js';

export const CLOUD_PARTNER_API_VERSION = '2017-10-31';
const DEFAULT_ENDPOINT = 'https://cloudpartner.azure.com';

export type OfferAction = 'publish' | 'golive' | 'status';

/** Body of an operation or status resource; only the fields read here are typed. */
export interface CloudPartnerStatus {
    status?: string;
    steps?: Array<{ stepName?: string; status?: string; [key: string]: unknown }>;
    [key: string]: unknown;
}

export interface CloudPartnerClientOptions {
    /** Executor carrying a cloud-partner-scoped credential provider. */
    executor: RequestExecutor;
    endpoint?: string;
    fetchFn?: FetchFn;
    pollIntervalMs?: number;
    timeoutMs?: number;
}

export interface OfferOperationOptions {
    wait?: boolean;
    signal?: AbortSignal;
}

/** Result of starting a publish or go-live: the operation path, and the outcome when waited on. */
export interface OfferOperationResult {
    operation: string;
    outcome?: OperationOutcome<CloudPartnerStatus>;
}

/** Map a cloud partner operation status onto the waiter's vocabulary. */
export function operationProbeResult(body: CloudPartnerStatus): ProbeResult<CloudPartnerStatus> {
    switch (body.status?.toLowerCase()) {
        case 'complete':
        case 'completed':
        case 'succeeded':
            return { status: 'Succeeded', payload: body };
        case 'failed':
            return { status: 'Failed', payload: body, detail: `operation status ${body.status}` };
        case 'canceled':
        case 'cancelled':
            return { status: 'Canceled', payload: body, detail: `operation status ${body.status}` };
        default:
            return { status: 'InProgress', payload: body };
    }
}

/**
 * Client for the cloud partner portal offer API: offer documents, publish, go-live and
 * offer status.
 */
export class CloudPartnerClient {
    readonly #executor: RequestExecutor;
    readonly #endpoint: string;
    readonly #fetchFn?: FetchFn;
    readonly #pollIntervalMs?: number;
    readonly #timeoutMs?: number;

    constructor(options: CloudPartnerClientOptions) {
        this.#executor = options.executor;
        this.#endpoint = (options.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, '');
        this.#fetchFn = options.fetchFn;
        this.#pollIntervalMs = options.pollIntervalMs;
        this.#timeoutMs = options.timeoutMs;
    }

    offerUrl(offerId: string, publisherId: string, action?: OfferAction): string {
        const suffix = action ? `/${action}` : '';
        return (
            `${this.#endpoint}/api/publishers/${publisherId}/offers/${offerId}${suffix}` +
            `?api-version=${CLOUD_PARTNER_API_VERSION}`
        );
    }

    async getOfferDocument(offerId: string, publisherId: string, context: ExecutionContext = {}): Promise<OfferDocument> {
        const response = await this.#call<OfferDocument>('GET', this.offerUrl(offerId, publisherId), context);
        return response.data ?? {};
    }

    async putOfferDocument(
        offerId: string,
        publisherId: string,
        doc: OfferDocument,
        context: ExecutionContext = {},
    ): Promise<OfferDocument | undefined> {
        const response = await this.#call<OfferDocument>('PUT', this.offerUrl(offerId, publisherId), context, {
            body: doc,
            headers: { 'If-Match': '*' },
        });
        void logActivity(`[Offer] Uploaded offer document for ${publisherId}/${offerId}.`);
        return response.data;
    }

    async publishOffer(
        offerId: string,
        publisherId: string,
        notificationEmails: string,
        options: OfferOperationOptions = {},
    ): Promise<OfferOperationResult> {
        if (!notificationEmails) {
            throw new MissingArgumentError('notificationEmails', 'Publishing requires at least one notification address.');
        }
        const response = await this.#call('POST', this.offerUrl(offerId, publisherId, 'publish'), options, {
            body: { metadata: { 'notification-emails': notificationEmails } },
        });
        return this.#followOperation('offer-publish', response, options);
    }

    async goLive(offerId: string, publisherId: string, options: OfferOperationOptions = {}): Promise<OfferOperationResult> {
        const response = await this.#call('POST', this.offerUrl(offerId, publisherId, 'golive'), options);
        return this.#followOperation('offer-go-live', response, options);
    }

    /**
     * Current offer status. A running publish parked on the publisher sign-off step reports
     * `waitingForPublisherReview`, meaning the offer is ready for go-live.
     */
    async getOfferStatus(offerId: string, publisherId: string, context: ExecutionContext = {}): Promise<string> {
        const response = await this.#call<CloudPartnerStatus>(
            'GET',
            this.offerUrl(offerId, publisherId, 'status'),
            context,
        );
        const body = response.data ?? {};
        const status = body.status ?? 'unknown';

        if (status === 'running') {
            const signoff = body.steps?.find((step) => step.stepName === 'publisher-signoff');
            if (signoff?.status === 'waitingForPublisherReview') {
                return 'waitingForPublisherReview';
            }
        }
        return status;
    }

    /** GET an operation by the path returned in a `Location` header. */
    getOperation(operation: string, context: ExecutionContext = {}): Promise<HttpResponse<CloudPartnerStatus>> {
        return this.#call<CloudPartnerStatus>('GET', this.#operationUrl(operation), context);
    }

    #operationUrl(operation: string): string {
        return /^https?:\/\//.test(operation) ? operation : `${this.#endpoint}${operation}`;
    }

    async #followOperation(
        kind: OperationKind,
        response: HttpResponse,
        options: OfferOperationOptions,
    ): Promise<OfferOperationResult> {
        const operation = response.headers.get('location') ?? '';
        void logActivity(`[Offer] ${kind} accepted; operation ${operation || '(none)'}.`);

        if (!operation || options.wait !== true) {
            return { operation };
        }

        const url = this.#operationUrl(operation);
        const probe: StatusProbe<CloudPartnerStatus> = async ({ token, signal }) => {
            const result = await sendRequest<CloudPartnerStatus>({ method: 'GET', url, token, signal, fetchFn: this.#fetchFn });
            return operationProbeResult(result.data ?? {});
        };
        const waiter = new OperationWaiter<CloudPartnerStatus>({ handle: operation, kind }, probe, {
            executor: this.#executor,
            pollIntervalMs: this.#pollIntervalMs,
            timeoutMs: this.#timeoutMs,
            signal: options.signal,
        });
        return { operation, outcome: await waiter.wait() };
    }

    #call<T = unknown>(
        method: HttpMethod,
        url: string,
        context: ExecutionContext,
        extra: { body?: object; headers?: Record<string, string> } = {},
    ): Promise<HttpResponse<T>> {
        return this.#executor.run(
            ({ token, signal }) =>
                sendRequest<T>({ method, url, token, signal, body: extra.body, headers: extra.headers, fetchFn: this.#fetchFn }),
            { label: context.label ?? `${method} ${url.split('?')[0]}`, signal: context.signal },
        );
    }
}
