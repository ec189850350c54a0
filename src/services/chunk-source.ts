import { createReadStream, createWriteStream } from 'node:fs';
import { mkdtemp, open, rm, type FileHandle } from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import lzma from 'lzma-native';
import { OperationAbortedError, PublisherError, ValidationError } from '../types/errors.js';
import type { ChunkSource } from '../types/upload.js';
import { logActivity } from '../utils/logger.js';

/** Stream header of the XZ container format. */
export const XZ_MAGIC = Buffer.from([0xfd, 0x37, 0x7a, 0x58, 0x5a, 0x00]);

/** Reads byte ranges straight from an open file. */
export class FileChunkSource implements ChunkSource {
    readonly size: number;
    readonly #handle: FileHandle;
    readonly #path: string;

    private constructor(handle: FileHandle, size: number, path: string) {
        this.#handle = handle;
        this.size = size;
        this.#path = path;
    }

    static async open(filePath: string): Promise<FileChunkSource> {
        let handle: FileHandle;
        try {
            handle = await open(filePath, 'r');
        } catch (error) {
            const fsError = error instanceof Error && 'code' in error ? error.code : undefined;
            if (fsError === 'ENOENT') {
                throw new PublisherError(
                    `Image file ${filePath} not found. Ensure the path to the file is correct.`,
                    { cause: error },
                );
            }
            throw error;
        }

        const stats = await handle.stat();
        return new FileChunkSource(handle, stats.size, filePath);
    }

    async read(offset: number, length: number): Promise<Buffer> {
        const buffer = Buffer.alloc(length);
        let filled = 0;
        while (filled < length) {
            const { bytesRead } = await this.#handle.read(buffer, filled, length - filled, offset + filled);
            if (bytesRead === 0) {
                throw new PublisherError(`Unexpected end of ${this.#path} at byte ${offset + filled}.`);
            }
            filled += bytesRead;
        }
        return buffer;
    }

    async close(): Promise<void> {
        await this.#handle.close();
    }
}

/** In-memory source, used for small payloads and by tests. */
export class BufferChunkSource implements ChunkSource {
    readonly size: number;
    readonly #data: Buffer;

    constructor(data: Buffer) {
        this.#data = data;
        this.size = data.length;
    }

    async read(offset: number, length: number): Promise<Buffer> {
        if (offset < 0 || offset + length > this.size) {
            throw new ValidationError(`Range ${offset}+${length} is outside a ${this.size}-byte buffer.`);
        }
        return this.#data.subarray(offset, offset + length);
    }

    async close(): Promise<void> {
        // nothing to release
    }
}

/** A file expanded into a scratch directory; closing the source removes the directory. */
export class ExpandedFileChunkSource implements ChunkSource {
    readonly size: number;
    readonly expandedPath: string;
    readonly #inner: FileChunkSource;
    readonly #scratchDir: string;

    private constructor(inner: FileChunkSource, expandedPath: string, scratchDir: string) {
        this.#inner = inner;
        this.expandedPath = expandedPath;
        this.#scratchDir = scratchDir;
        this.size = inner.size;
    }

    static async expand(filePath: string, signal?: AbortSignal): Promise<ExpandedFileChunkSource> {
        const scratchDir = await mkdtemp(path.join(os.tmpdir(), 'imgpub-expand-'));
        const target = path.join(scratchDir, path.basename(filePath).replace(/\.xz$/i, ''));
        try {
            await pipeline(createReadStream(filePath), lzma.createDecompressor(), createWriteStream(target), { signal });
            const inner = await FileChunkSource.open(target);
            void logActivity(`[Blob] Expanded ${filePath} to ${target} (${inner.size} bytes).`, 'debug');
            return new ExpandedFileChunkSource(inner, target, scratchDir);
        } catch (error) {
            await rm(scratchDir, { recursive: true, force: true });
            if (signal?.aborted) throw new OperationAbortedError();
            if (error instanceof PublisherError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new PublisherError(`Unable to expand image file ${filePath}: ${message}`, { cause: error });
        }
    }

    read(offset: number, length: number): Promise<Buffer> {
        return this.#inner.read(offset, length);
    }

    async close(): Promise<void> {
        try {
            await this.#inner.close();
        } finally {
            await rm(this.#scratchDir, { recursive: true, force: true });
        }
    }
}

export async function isXzCompressed(source: ChunkSource): Promise<boolean> {
    if (source.size < XZ_MAGIC.length) return false;
    const header = await source.read(0, XZ_MAGIC.length);
    return header.equals(XZ_MAGIC);
}

/**
 * Opens an image for upload. With `expand`, an XZ-compressed file is decompressed first and
 * its expanded bytes are uploaded; any other file is uploaded as it is.
 */
export async function openImageSource(
    filePath: string,
    options: { expand?: boolean; signal?: AbortSignal } = {},
): Promise<ChunkSource> {
    const source = await FileChunkSource.open(filePath);
    if (!options.expand) return source;

    let compressed: boolean;
    try {
        compressed = await isXzCompressed(source);
    } catch (error) {
        await source.close();
        throw error;
    }
    if (!compressed) return source;

    await source.close();
    return ExpandedFileChunkSource.expand(filePath, options.signal);
}
