import { ValidationError } from '../types/errors.js';
import type { BlobTransport, Chunk, TransportCallContext } from '../types/upload.js';
import { sendRequest, type FetchFn, type HttpMethod, type HttpResponse } from './http-client.js';

export const STORAGE_API_VERSION = '2021-08-06';
export const PAGE_SIZE = 512;
export const MAX_PAGE_WRITE = 4 * 1024 * 1024;
export const MAX_BLOCKS = 50_000;

/** How storage requests authenticate: a SAS query string, or the executor's bearer token. */
export type StorageAuth = { kind: 'sas'; token: string } | { kind: 'bearer' };

export interface BlobLocation {
    storageAccount: string;
    container: string;
    blobName: string;
}

/**
 * Address of one blob plus the request plumbing every storage call shares.
 */
export class BlobEndpoint {
    readonly location: BlobLocation;
    readonly #auth: StorageAuth;
    readonly #fetchFn?: FetchFn;

    constructor(location: BlobLocation, auth: StorageAuth, fetchFn?: FetchFn) {
        this.location = location;
        this.#auth = auth;
        this.#fetchFn = fetchFn;
    }

    /** Public URL of the blob, without credentials. */
    get url(): string {
        const { storageAccount, container, blobName } = this.location;
        const encodedName = blobName.split('/').map(encodeURIComponent).join('/');
        return `https://${storageAccount}.blob.core.windows.net/${container}/${encodedName}`;
    }

    buildUrl(query: Record<string, string> = {}): string {
        const params = new URLSearchParams(query).toString();
        const sas = this.#auth.kind === 'sas' ? this.#auth.token.replace(/^\?/, '') : '';
        const search = [params, sas].filter(Boolean).join('&');
        return search ? `${this.url}?${search}` : this.url;
    }

    request(
        method: HttpMethod,
        context: TransportCallContext,
        options: { query?: Record<string, string>; headers?: Record<string, string>; body?: Buffer | string } = {},
    ): Promise<HttpResponse> {
        return sendRequest({
            method,
            url: this.buildUrl(options.query),
            headers: { 'x-ms-version': STORAGE_API_VERSION, ...options.headers },
            body: options.body,
            token: this.#auth.kind === 'bearer' ? context.token : undefined,
            signal: context.signal,
            fetchFn: this.#fetchFn,
        });
    }
}

/** Fixed-width block id, base64-encoded, so every id in a blob has the same length. */
export function blockIdFor(index: number): string {
    return Buffer.from(`block-${String(index).padStart(6, '0')}`).toString('base64');
}

/**
 * Block blob: chunks are staged as blocks and sealed by a block list in index order.
 */
export class BlockBlobTransport implements BlobTransport {
    readonly kind = 'block' as const;
    readonly #endpoint: BlobEndpoint;

    constructor(endpoint: BlobEndpoint) {
        this.#endpoint = endpoint;
    }

    validatePlan(totalSize: number, chunkSize: number): void {
        const blocks = Math.ceil(totalSize / chunkSize);
        if (blocks > MAX_BLOCKS) {
            throw new ValidationError(
                `A block blob holds at most ${MAX_BLOCKS} blocks; ${totalSize} bytes in ${chunkSize}-byte chunks needs ${blocks}.`,
                ['Increase the chunk size.'],
            );
        }
    }

    async prepare(): Promise<void> {
        // block blobs come into existence at commit time
    }

    async uploadChunk(chunk: Chunk, data: Buffer, context: TransportCallContext): Promise<void> {
        await this.#endpoint.request('PUT', context, {
            query: { comp: 'block', blockid: blockIdFor(chunk.index) },
            body: data,
        });
    }

    async finalize(chunks: readonly Chunk[], context: TransportCallContext): Promise<void> {
        const latest = [...chunks]
            .sort((a, b) => a.index - b.index)
            .map((chunk) => `<Latest>${blockIdFor(chunk.index)}</Latest>`)
            .join('');
        await this.#endpoint.request('PUT', context, {
            query: { comp: 'blocklist' },
            headers: { 'Content-Type': 'application/xml' },
            body: `<?xml version="1.0" encoding="utf-8"?><BlockList>${latest}</BlockList>`,
        });
    }

    async uploadWhole(data: Buffer, context: TransportCallContext): Promise<void> {
        await this.#endpoint.request('PUT', context, {
            headers: { 'x-ms-blob-type': 'BlockBlob' },
            body: data,
        });
    }
}

/**
 * Page blob: created at full size up front, chunks written as page ranges, then marked
 * complete through blob metadata.
 */
export class PageBlobTransport implements BlobTransport {
    readonly kind = 'page' as const;
    readonly #endpoint: BlobEndpoint;

    constructor(endpoint: BlobEndpoint) {
        this.#endpoint = endpoint;
    }

    validatePlan(totalSize: number, chunkSize: number): void {
        const hints: string[] = [];
        if (totalSize % PAGE_SIZE !== 0) {
            hints.push(`Image size ${totalSize} is not a multiple of ${PAGE_SIZE} bytes.`);
        }
        if (chunkSize % PAGE_SIZE !== 0) {
            hints.push(`Chunk size ${chunkSize} is not a multiple of ${PAGE_SIZE} bytes.`);
        }
        if (chunkSize > MAX_PAGE_WRITE) {
            hints.push(`Chunk size ${chunkSize} exceeds the ${MAX_PAGE_WRITE}-byte page write limit.`);
        }
        if (hints.length > 0) {
            throw new ValidationError('Image cannot be uploaded as a page blob.', hints);
        }
    }

    async prepare(totalSize: number, context: TransportCallContext): Promise<void> {
        await this.#endpoint.request('PUT', context, {
            headers: {
                'x-ms-blob-type': 'PageBlob',
                'x-ms-blob-content-length': String(totalSize),
                'Content-Length': '0',
            },
        });
    }

    async uploadChunk(chunk: Chunk, data: Buffer, context: TransportCallContext): Promise<void> {
        await this.#endpoint.request('PUT', context, {
            query: { comp: 'page' },
            headers: {
                'x-ms-page-write': 'update',
                'x-ms-range': `bytes=${chunk.offset}-${chunk.offset + chunk.length - 1}`,
            },
            body: data,
        });
    }

    async finalize(_chunks: readonly Chunk[], context: TransportCallContext): Promise<void> {
        await this.#endpoint.request('PUT', context, {
            query: { comp: 'metadata' },
            headers: { 'x-ms-meta-upload_state': 'complete', 'Content-Length': '0' },
        });
    }
}
