declare module 'lzma-native' {
    import type { Transform } from 'node:stream';

    interface LzmaStreamOptions {
        preset?: number;
        threads?: number;
        memlimit?: number;
        synchronous?: boolean;
    }

    interface Lzma {
        createCompressor(options?: LzmaStreamOptions): Transform;
        createDecompressor(options?: LzmaStreamOptions): Transform;
    }

    const lzma: Lzma;
    export = lzma;
}
