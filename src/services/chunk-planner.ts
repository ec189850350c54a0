import { ValidationError } from '../types/errors.js';
import type { Chunk } from '../types/upload.js';

/**
 * Split a file of `fileSize` bytes into `ceil(fileSize / chunkSize)` Pending chunks.
 *
 * Chunk `i` covers `[i * chunkSize, min((i + 1) * chunkSize, fileSize))`; only the last
 * chunk may be shorter. The same inputs always produce the same plan.
 */
export function planChunks(fileSize: number, chunkSize: number): Chunk[] {
    if (!Number.isSafeInteger(fileSize) || fileSize < 0) {
        throw new ValidationError(`File size must be a non-negative integer, got ${fileSize}.`);
    }
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
        throw new ValidationError(`Chunk size must be a positive integer, got ${chunkSize}.`);
    }

    const count = Math.ceil(fileSize / chunkSize);
    const chunks: Chunk[] = [];

    for (let index = 0; index < count; index++) {
        const offset = index * chunkSize;
        chunks.push({
            index,
            offset,
            length: Math.min(chunkSize, fileSize - offset),
            status: 'Pending',
            attempts: 0,
        });
    }

    return chunks;
}
