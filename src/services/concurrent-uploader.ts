import { randomUUID } from 'node:crypto';
import { planChunks } from './chunk-planner.js';
import { OperationAbortedError, RemoteCallError, UploadError, ValidationError, type FailedChunk } from '../types/errors.js';
import type {
    BlobTransport,
    Chunk,
    ChunkSource,
    TransportCallContext,
    UploadProgress,
    UploadReport,
    UploadSessionStatus,
} from '../types/upload.js';
import { RequestExecutor, createRetryPolicy } from '../utils/retry.js';
import type { RetryOptions } from '../types/reliability.js';
import { logActivity } from '../utils/logger.js';

/** Upper bound on workers when the caller leaves concurrency unbounded. */
export const MAX_UPLOAD_WORKERS = 32;
export const DEFAULT_CHUNK_SIZE = 4 * 1024 * 1024;
export const DEFAULT_ATTEMPTS_PER_CHUNK = 5;

export interface UploadSessionOptions {
    totalSize: number;
    chunkSize?: number;
    /** Max simultaneous InFlight chunks. Unset means unbounded, capped at {@link MAX_UPLOAD_WORKERS}. */
    concurrencyLimit?: number;
    maxAttemptsPerChunk?: number;
}

function positiveInteger(value: number | undefined, fallback: number, field: string): number {
    if (value === undefined) return fallback;
    if (!Number.isInteger(value) || value < 1) {
        throw new ValidationError(`Upload ${field} must be a positive integer, got ${value}.`);
    }
    return value;
}

/**
 * Ordered chunks of one source file bound for one destination blob.
 * A session owns its chunks and is used for a single upload.
 */
export class UploadSession {
    readonly id: string = randomUUID();
    readonly totalSize: number;
    readonly chunkSize: number;
    readonly concurrencyLimit: number;
    readonly maxAttemptsPerChunk: number;
    readonly chunks: readonly Chunk[];

    constructor(options: UploadSessionOptions) {
        this.totalSize = options.totalSize;
        this.chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
        this.chunks = planChunks(this.totalSize, this.chunkSize);
        this.concurrencyLimit = Math.min(
            MAX_UPLOAD_WORKERS,
            positiveInteger(options.concurrencyLimit, MAX_UPLOAD_WORKERS, 'concurrencyLimit'),
        );
        this.maxAttemptsPerChunk = positiveInteger(
            options.maxAttemptsPerChunk,
            DEFAULT_ATTEMPTS_PER_CHUNK,
            'maxAttemptsPerChunk',
        );
    }

    get status(): UploadSessionStatus {
        if (this.chunks.some((chunk) => chunk.status === 'Failed')) return 'Failed';
        if (this.chunks.every((chunk) => chunk.status === 'Committed')) return 'Succeeded';
        if (this.chunks.every((chunk) => chunk.status === 'Pending')) return 'Pending';
        return 'InProgress';
    }

    get committedBytes(): number {
        return this.chunks
            .filter((chunk) => chunk.status === 'Committed')
            .reduce((sum, chunk) => sum + chunk.length, 0);
    }
}

export interface ConcurrentUploaderOptions {
    transport: BlobTransport;
    source: ChunkSource;
    /** Executor whose credentials are reused; its policy is replaced per session. */
    executor?: RequestExecutor;
    /** Backoff shape for chunk retries; `maxAttempts` always comes from the session. */
    retry?: Omit<RetryOptions, 'maxAttempts'>;
    label?: string;
}

export interface UploadRunOptions {
    signal?: AbortSignal;
    onProgress?: (progress: UploadProgress) => void;
}

/**
 * Uploads an {@link UploadSession} through a bounded pool of async workers.
 *
 * Workers share one dispatch cursor and claim chunks in index order; completion order is
 * not fixed. The first chunk that fails permanently stops further dispatch, in-flight chunks
 * finish, and the upload rejects with {@link UploadError} without finalizing. Finalize runs
 * only once every chunk is Committed.
 */
export class ConcurrentUploader {
    readonly #transport: BlobTransport;
    readonly #source: ChunkSource;
    readonly #executor: RequestExecutor;
    readonly #retry: Omit<RetryOptions, 'maxAttempts'>;
    readonly #label: string;

    constructor(options: ConcurrentUploaderOptions) {
        this.#transport = options.transport;
        this.#source = options.source;
        this.#executor = options.executor ?? new RequestExecutor();
        this.#retry = options.retry ?? {};
        this.#label = options.label ?? 'upload';
    }

    async upload(session: UploadSession, options: UploadRunOptions = {}): Promise<UploadReport> {
        const start = Date.now();
        const { signal } = options;
        const executor = this.#executor.withPolicy(
            createRetryPolicy({ ...this.#retry, maxAttempts: session.maxAttemptsPerChunk }),
        );

        this.#transport.validatePlan(session.totalSize, session.chunkSize);

        const singleChunk = session.chunks.length === 1 ? session.chunks[0] : undefined;
        const uploadWhole = this.#transport.uploadWhole;
        if (singleChunk && uploadWhole) {
            const put = (data: Buffer, context: TransportCallContext) => uploadWhole.call(this.#transport, data, context);
            return this.#uploadSingleShot(session, singleChunk, put, executor, options, start);
        }

        await executor.run(
            ({ token, signal: attemptSignal }) => this.#transport.prepare(session.totalSize, { token, signal: attemptSignal }),
            { label: `${this.#label}:prepare`, signal },
        );

        let cursor = 0;
        let halted = false;
        let attempts = 0;
        const abortedChunks = new Set<number>();

        const worker = async (): Promise<void> => {
            while (!halted && !signal?.aborted) {
                const chunk = session.chunks[cursor];
                if (!chunk) return;
                cursor += 1;

                chunk.status = 'InFlight';
                const result = await executor.execute(
                    async ({ token, signal: attemptSignal }) => {
                        chunk.attempts += 1;
                        const data = await this.#source.read(chunk.offset, chunk.length);
                        await this.#transport.uploadChunk(chunk, data, { token, signal: attemptSignal });
                    },
                    { label: `${this.#label}:chunk-${chunk.index}`, signal },
                );
                attempts += result.attempts;

                if (result.ok) {
                    chunk.status = 'Committed';
                    this.#reportProgress(session, options);
                    continue;
                }

                chunk.status = 'Failed';
                chunk.lastError = result.error.message;
                const remote = result.error.cause;
                if (remote instanceof RemoteCallError) {
                    chunk.lastStatus = remote.status;
                    chunk.lastBody = remote.body;
                }
                if (result.error instanceof OperationAbortedError) {
                    abortedChunks.add(chunk.index);
                } else {
                    halted = true;
                    void logActivity(
                        `[Uploader] ${this.#label} chunk ${chunk.index} failed after ${chunk.attempts} attempt(s); halting dispatch.`,
                    );
                }
            }
        };

        const workerCount = Math.min(session.concurrencyLimit, session.chunks.length);
        await Promise.all(Array.from({ length: workerCount }, () => worker()));

        const failed = session.chunks.filter(
            (chunk) => chunk.status === 'Failed' && !abortedChunks.has(chunk.index),
        );
        if (failed.length > 0) {
            throw new UploadError(failed.map(toFailedChunk), true);
        }
        if (signal?.aborted || abortedChunks.size > 0) {
            throw new OperationAbortedError(`Upload ${session.id} aborted by caller.`);
        }
        if (session.status !== 'Succeeded') {
            const unfinished = session.chunks.filter((chunk) => chunk.status !== 'Committed');
            throw new UploadError(
                unfinished.map((chunk) => ({ ...toFailedChunk(chunk), error: chunk.lastError ?? `left ${chunk.status}` })),
                true,
            );
        }

        await executor.run(
            ({ token, signal: attemptSignal }) => this.#transport.finalize(session.chunks, { token, signal: attemptSignal }),
            { label: `${this.#label}:finalize`, signal },
        );

        const durationMs = Date.now() - start;
        void logActivity(
            `[Uploader] ${this.#label} committed ${session.chunks.length} chunk(s), ${session.totalSize} bytes in ${durationMs}ms.`,
        );

        return {
            sessionId: session.id,
            status: session.status,
            chunks: session.chunks.length,
            bytes: session.totalSize,
            attempts,
            finalized: true,
            durationMs,
        };
    }

    async #uploadSingleShot(
        session: UploadSession,
        chunk: Chunk,
        put: (data: Buffer, context: TransportCallContext) => Promise<void>,
        executor: RequestExecutor,
        options: UploadRunOptions,
        start: number,
    ): Promise<UploadReport> {
        chunk.status = 'InFlight';

        const result = await executor.execute(
            async ({ token, signal }) => {
                chunk.attempts += 1;
                const data = await this.#source.read(chunk.offset, chunk.length);
                await put(data, { token, signal });
            },
            { label: `${this.#label}:single`, signal: options.signal },
        );

        if (!result.ok) {
            chunk.status = 'Failed';
            chunk.lastError = result.error.message;
            if (result.error instanceof OperationAbortedError) {
                throw result.error;
            }
            const remote = result.error.cause;
            if (remote instanceof RemoteCallError) {
                chunk.lastStatus = remote.status;
                chunk.lastBody = remote.body;
            }
            throw new UploadError([toFailedChunk(chunk)], false);
        }

        chunk.status = 'Committed';
        this.#reportProgress(session, options);

        return {
            sessionId: session.id,
            status: session.status,
            chunks: 1,
            bytes: session.totalSize,
            attempts: result.attempts,
            finalized: false,
            durationMs: Date.now() - start,
        };
    }

    #reportProgress(session: UploadSession, options: UploadRunOptions): void {
        if (!options.onProgress) return;
        options.onProgress({
            committedChunks: session.chunks.filter((chunk) => chunk.status === 'Committed').length,
            totalChunks: session.chunks.length,
            committedBytes: session.committedBytes,
            totalBytes: session.totalSize,
        });
    }
}

function toFailedChunk(chunk: Chunk): FailedChunk {
    return {
        index: chunk.index,
        offset: chunk.offset,
        length: chunk.length,
        attempts: chunk.attempts,
        status: chunk.status,
        error: chunk.lastError ?? 'unknown error',
        httpStatus: chunk.lastStatus,
        body: chunk.lastBody,
    };
}
