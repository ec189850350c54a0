import path from 'node:path';
import { PublisherError, ResourceExistsError } from '../types/errors.js';
import type { ExecutionContext, RetryOptions } from '../types/reliability.js';
import type { UploadProgress, UploadReport } from '../types/upload.js';
import { RequestExecutor } from '../utils/retry.js';
import { logActivity } from '../utils/logger.js';
import { BlobEndpoint, BlockBlobTransport, PageBlobTransport, type StorageAuth } from './blob-transport.js';
import { openImageSource } from './chunk-source.js';
import { ConcurrentUploader, UploadSession } from './concurrent-uploader.js';
import { isNotFound, type FetchFn } from './http-client.js';

export interface BlobServiceOptions {
    storageAccount: string;
    container: string;
    auth: StorageAuth;
    /** Executor for single calls; carries the storage-scoped credential provider under bearer auth. */
    executor?: RequestExecutor;
    fetchFn?: FetchFn;
}

export interface UploadImageBlobOptions {
    blobName?: string;
    forceReplace?: boolean;
    /** Page blobs by default, as the compute services expect for VHDs. */
    pageBlob?: boolean;
    /** Decompress an XZ image before upload; other files go up unchanged. */
    expandImage?: boolean;
    maxWorkers?: number;
    maxAttempts?: number;
    chunkSize?: number;
    retry?: Omit<RetryOptions, 'maxAttempts'>;
    signal?: AbortSignal;
    onProgress?: (progress: UploadProgress) => void;
}

export interface UploadImageBlobResult {
    blobName: string;
    url: string;
    report: UploadReport;
}

/**
 * Blob operations in one storage container: existence checks, deletes and chunked image
 * uploads.
 */
export class BlobService {
    readonly storageAccount: string;
    readonly container: string;
    readonly #auth: StorageAuth;
    readonly #executor: RequestExecutor;
    readonly #fetchFn?: FetchFn;

    constructor(options: BlobServiceOptions) {
        this.storageAccount = options.storageAccount;
        this.container = options.container;
        this.#auth = options.auth;
        this.#executor = options.executor ?? new RequestExecutor();
        this.#fetchFn = options.fetchFn;
    }

    endpoint(blobName: string): BlobEndpoint {
        return new BlobEndpoint(
            { storageAccount: this.storageAccount, container: this.container, blobName },
            this.#auth,
            this.#fetchFn,
        );
    }

    async blobExists(blobName: string, context: ExecutionContext = {}): Promise<boolean> {
        const endpoint = this.endpoint(blobName);
        try {
            await this.#executor.run((attempt) => endpoint.request('HEAD', attempt), {
                label: `HEAD ${blobName}`,
                signal: context.signal,
            });
            return true;
        } catch (error) {
            if (isNotFound(error)) return false;
            throw error;
        }
    }

    /** Deletes the blob; false when there was nothing to delete. */
    async deleteBlob(blobName: string, context: ExecutionContext = {}): Promise<boolean> {
        const endpoint = this.endpoint(blobName);
        try {
            await this.#executor.run((attempt) => endpoint.request('DELETE', attempt), {
                label: `DELETE ${blobName}`,
                signal: context.signal,
            });
        } catch (error) {
            if (isNotFound(error)) {
                void logActivity(`[Blob] ${blobName} not found; nothing deleted.`, 'debug');
                return false;
            }
            throw error;
        }
        void logActivity(`[Blob] Deleted ${blobName} from ${this.container}.`);
        return true;
    }

    async uploadImageBlob(imageFile: string, options: UploadImageBlobOptions = {}): Promise<UploadImageBlobResult> {
        const blobName = options.blobName || path.basename(imageFile);
        const context = { signal: options.signal };

        if (await this.blobExists(blobName, context)) {
            if (!options.forceReplace) {
                throw new ResourceExistsError(
                    `Image ${blobName} already exists. To replace an existing image use the force replace option.`,
                );
            }
            await this.deleteBlob(blobName, context);
        }

        const source = await openImageSource(imageFile, { expand: options.expandImage, signal: options.signal });
        const endpoint = this.endpoint(blobName);
        const transport = options.pageBlob === false ? new BlockBlobTransport(endpoint) : new PageBlobTransport(endpoint);

        try {
            const session = new UploadSession({
                totalSize: source.size,
                chunkSize: options.chunkSize,
                concurrencyLimit: options.maxWorkers,
                maxAttemptsPerChunk: options.maxAttempts,
            });
            const uploader = new ConcurrentUploader({
                transport,
                source,
                executor: this.#executor,
                retry: options.retry,
                label: blobName,
            });

            void logActivity(
                `[Blob] Uploading ${imageFile} to ${this.container}/${blobName} as a ${transport.kind} blob ` +
                    `(${session.chunks.length} chunk(s), ${session.concurrencyLimit} worker(s)).`,
            );
            const report = await uploader.upload(session, { signal: options.signal, onProgress: options.onProgress });
            return { blobName, url: endpoint.url, report };
        } catch (error) {
            if (error instanceof PublisherError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new PublisherError(`Unable to upload image: ${message}`, { cause: error });
        } finally {
            await source.close();
        }
    }
}
