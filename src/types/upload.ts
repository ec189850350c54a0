/** Lifecycle of a single chunk within one upload session. */
export type ChunkStatus = 'Pending' | 'InFlight' | 'Committed' | 'Failed';

/** Aggregate state of an upload session, derived from its chunks. */
export type UploadSessionStatus = 'Pending' | 'InProgress' | 'Succeeded' | 'Failed';

/** A contiguous byte range of the source file, uploaded independently. */
export interface Chunk {
    /** 0-based position; defines the order of the committed blob. */
    readonly index: number;
    readonly offset: number;
    readonly length: number;
    status: ChunkStatus;
    attempts: number;
    lastError?: string;
    lastStatus?: number;
    lastBody?: string;
}

/** Reads byte ranges of the image being uploaded. */
export interface ChunkSource {
    readonly size: number;
    read(offset: number, length: number): Promise<Buffer>;
    close(): Promise<void>;
}

export interface TransportCallContext {
    token?: string;
    signal?: AbortSignal;
}

/** Wire calls a blob type needs to receive a chunked upload. */
export interface BlobTransport {
    readonly kind: 'block' | 'page';
    /** Validates the plan before anything is sent. */
    validatePlan(totalSize: number, chunkSize: number): void;
    /** Creates the destination before chunks are written, where the blob type needs one. */
    prepare(totalSize: number, context: TransportCallContext): Promise<void>;
    uploadChunk(chunk: Chunk, data: Buffer, context: TransportCallContext): Promise<void>;
    /** Seals the blob. Runs once, after every chunk is Committed. */
    finalize(chunks: readonly Chunk[], context: TransportCallContext): Promise<void>;
    /** Single-shot put used when the session holds exactly one chunk. */
    uploadWhole?(data: Buffer, context: TransportCallContext): Promise<void>;
}

export interface UploadProgress {
    committedChunks: number;
    totalChunks: number;
    committedBytes: number;
    totalBytes: number;
}

export interface UploadReport {
    sessionId: string;
    status: UploadSessionStatus;
    chunks: number;
    bytes: number;
    attempts: number;
    finalized: boolean;
    durationMs: number;
}
