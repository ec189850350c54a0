import type { ChunkStatus } from './upload.js';
import type { OperationKind, OperationStatus } from './operation.js';

/** Base class for every error raised by the publisher. */
export class PublisherError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PublisherError';
    }
}

export interface RemoteCallErrorDetails {
    status?: number;
    body?: string;
    code?: string;
    method?: string;
    url?: string;
    cause?: unknown;
}

/**
 * A single failed remote call: an HTTP response outside 2xx, or a network failure before any
 * response arrived (no `status`, usually a `code`).
 */
export class RemoteCallError extends PublisherError {
    readonly status?: number;
    readonly body?: string;
    readonly code?: string;
    readonly method?: string;
    readonly url?: string;

    constructor(message: string, details: RemoteCallErrorDetails = {}) {
        super(message, { cause: details.cause });
        this.name = 'RemoteCallError';
        this.status = details.status;
        this.body = details.body;
        this.code = details.code;
        this.method = details.method;
        this.url = details.url;
    }
}

/** Marks a failure as retryable regardless of its status. */
export class TransientError extends RemoteCallError {
    constructor(message: string, details: RemoteCallErrorDetails = {}) {
        super(message, details);
        this.name = 'TransientError';
    }
}

/** The identity endpoint refused to issue a token. */
export class AuthenticationError extends RemoteCallError {
    constructor(message: string, details: RemoteCallErrorDetails = {}) {
        super(message, details);
        this.name = 'AuthenticationError';
    }
}

function describeRemote(error: unknown): string {
    if (error instanceof RemoteCallError) {
        const parts = [error.message];
        if (error.status !== undefined) parts.push(`status ${error.status}`);
        if (error.code) parts.push(`code ${error.code}`);
        if (error.body) parts.push(`body: ${error.body}`);
        return parts.join('; ');
    }
    return error instanceof Error ? error.message : String(error);
}

/** Surfaced by the executor for a failure it must not retry. */
export class PermanentError extends PublisherError {
    readonly attempts: number;
    readonly status?: number;
    readonly body?: string;

    constructor(attempts: number, cause: unknown) {
        super(`Request failed permanently after ${attempts} attempt(s): ${describeRemote(cause)}`, { cause });
        this.name = 'PermanentError';
        this.attempts = attempts;
        if (cause instanceof RemoteCallError) {
            this.status = cause.status;
            this.body = cause.body;
        }
    }
}

/** Surfaced by the executor once the retry budget is spent on transient failures. */
export class ExhaustedRetriesError extends PublisherError {
    readonly attempts: number;
    readonly lastError: unknown;
    readonly status?: number;
    readonly body?: string;

    constructor(attempts: number, lastError: unknown) {
        super(`Retries exhausted after ${attempts} attempt(s): ${describeRemote(lastError)}`, { cause: lastError });
        this.name = 'ExhaustedRetriesError';
        this.attempts = attempts;
        this.lastError = lastError;
        if (lastError instanceof RemoteCallError) {
            this.status = lastError.status;
            this.body = lastError.body;
        }
    }
}

/** The caller's abort signal fired while a call, upload or wait was suspended. */
export class OperationAbortedError extends PublisherError {
    constructor(message = 'Operation aborted by caller.') {
        super(message);
        this.name = 'OperationAbortedError';
    }
}

export interface FailedChunk {
    index: number;
    offset: number;
    length: number;
    attempts: number;
    status: ChunkStatus;
    error: string;
    httpStatus?: number;
    body?: string;
}

/** One or more chunks of an upload session failed permanently; the blob was not finalized. */
export class UploadError extends PublisherError {
    readonly partial: boolean;
    readonly failedChunks: FailedChunk[];

    constructor(failedChunks: FailedChunk[], partial = true) {
        const summary = failedChunks
            .map((chunk) => `chunk ${chunk.index} (offset ${chunk.offset}, ${chunk.attempts} attempt(s)): ${chunk.error}`)
            .join(' | ');
        super(`Upload failed for ${failedChunks.length} chunk(s): ${summary}`);
        this.name = 'UploadError';
        this.partial = partial;
        this.failedChunks = failedChunks;
    }
}

/** The operation was still non-terminal when its deadline passed. */
export class WaitTimeoutError extends PublisherError {
    readonly handle: string;
    readonly kind: OperationKind;
    readonly lastStatus: OperationStatus;
    readonly probes: number;

    constructor(handle: string, kind: OperationKind, lastStatus: OperationStatus, probes: number, timeoutMs: number) {
        super(`Timed out after ${timeoutMs}ms waiting for ${kind} operation ${handle}; last status ${lastStatus} after ${probes} probe(s).`);
        this.name = 'WaitTimeoutError';
        this.handle = handle;
        this.kind = kind;
        this.lastStatus = lastStatus;
        this.probes = probes;
    }
}

/** The remote side reported the operation as Failed or Canceled. */
export class RemoteOperationFailedError extends PublisherError {
    readonly handle: string;
    readonly kind: OperationKind;
    readonly status: 'Failed' | 'Canceled';
    readonly detail?: string;
    readonly payload?: unknown;

    constructor(handle: string, kind: OperationKind, status: 'Failed' | 'Canceled', detail?: string, payload?: unknown) {
        super(`${kind} operation ${handle} ended as ${status}${detail ? `: ${detail}` : '.'}`);
        this.name = 'RemoteOperationFailedError';
        this.handle = handle;
        this.kind = kind;
        this.status = status;
        this.detail = detail;
        this.payload = payload;
    }
}

/** A value the operation needs was never supplied. */
export class MissingArgumentError extends PublisherError {
    readonly field: string;

    constructor(field: string, hint?: string) {
        super(`Missing required argument '${field}'.${hint ? ` ${hint}` : ''}`);
        this.name = 'MissingArgumentError';
        this.field = field;
    }
}

export class ValidationError extends PublisherError {
    readonly hints: string[];

    constructor(message: string, hints: string[] = []) {
        super(message);
        this.name = 'ValidationError';
        this.hints = hints;
    }
}

export class ResourceExistsError extends PublisherError {
    constructor(message: string) {
        super(message);
        this.name = 'ResourceExistsError';
    }
}

export class ResourceNotFoundError extends PublisherError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ResourceNotFoundError';
    }
}

export class OfferDocumentError extends PublisherError {
    constructor(message: string) {
        super(message);
        this.name = 'OfferDocumentError';
    }
}
