import { createHash } from 'node:crypto';

import { createRangeStream } from './rangeUtils.js';
import type { BlobPath, ByteSource, ContentBlob } from './types.js';

const DEFAULT_CHUNK_SIZE = 64 * 1024;

export interface ReaderSourceOptions {
    /** Открывает новый поток с нулевого байта; вызывается на каждое чтение */
    open: () => ReadableStream<Uint8Array>;
    /**
     * true — источник поддерживает Range: streamRange открывает новый поток
     * и пропускает байты до начала диапазона. По умолчанию false.
     */
    seekable?: boolean;
}

export function createReaderSource(options: ReaderSourceOptions): ByteSource {
    const { open, seekable = false } = options;
    const source: ByteSource = { stream: open };
    if (seekable) {
        source.streamRange = (range) => createRangeStream(open(), range);
    }
    return source;
}

/** Поток по массиву байтов, нарезанный на чанки chunkSize. */
export function createChunkedStream(
    data: Uint8Array,
    chunkSize = DEFAULT_CHUNK_SIZE
): ReadableStream<Uint8Array> {
    let offset = 0;
    return new ReadableStream<Uint8Array>({
        pull(controller): void {
            if (offset >= data.length) {
                controller.close();
                return;
            }
            const end = Math.min(offset + chunkSize, data.length);
            controller.enqueue(data.slice(offset, end));
            offset = end;
        },
    });
}

/** Идентификатор git blob-а: sha1 от "blob <size>\0" + содержимое. */
export function gitBlobId(data: Uint8Array): string {
    return createHash('sha1')
        .update(`blob ${data.length}\0`)
        .update(data)
        .digest('hex');
}

export interface MemoryBlobOptions {
    /** По умолчанию вычисляется как git blob id */
    id?: string;
    path: BlobPath;
    data: Uint8Array;
    /** Размер чанков потока (по умолчанию 64KB) */
    chunkSize?: number;
    /** По умолчанию true */
    seekable?: boolean;
}

/**
 * Blob в памяти: для тестов и для содержимого, уже загруженного из хранилища.
 */
export function createMemoryBlob(options: MemoryBlobOptions): ContentBlob {
    const { path, data, chunkSize = DEFAULT_CHUNK_SIZE, seekable = true } =
        options;
    const id = options.id ?? gitBlobId(data);

    return {
        id,
        path,
        size: data.length,
        open: () =>
            Promise.resolve({
                ...createReaderSource({
                    open: () => createChunkedStream(data, chunkSize),
                    seekable,
                }),
                // освобождать нечего
                close: () => Promise.resolve(),
            }),
    };
}
