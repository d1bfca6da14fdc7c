import { EventEmitter } from 'node:events';

import { describe, it, expect, vi } from 'vitest';

import { serveBlob } from '../src/blobServer.js';
import { errorToResponse } from '../src/errorResponse.js';
import {
    MalformedRangeError,
    SourceReadError,
    WriteError,
} from '../src/errors.js';
import { type ResponseSink, sendResponse } from '../src/nodeResponse.js';
import { resolveServeOptions } from '../src/options.js';
import {
    createChunkedStream,
    createReaderSource,
} from '../src/readerSource.js';
import { createLogger, sequence } from './helpers.js';

interface FakeSinkOptions {
    /** Сколько записей пройдёт, прежде чем write вернёт ошибку */
    failAfterWrites?: number;
    /** Клиент отключается на end(): 'close' без 'finish' */
    dropOnEnd?: boolean;
}

class FakeSink extends EventEmitter implements ResponseSink {
    statusCode = 0;
    readonly headers = new Map<string, string>();
    readonly chunks: Uint8Array[] = [];
    ended = false;
    destroyed = false;

    private readonly failAfterWrites: number;
    private readonly dropOnEnd: boolean;

    constructor({
        failAfterWrites = Infinity,
        dropOnEnd = false,
    }: FakeSinkOptions = {}) {
        super();
        this.failAfterWrites = failAfterWrites;
        this.dropOnEnd = dropOnEnd;
    }

    setHeader(name: string, value: string): void {
        this.headers.set(name, value);
    }

    write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean {
        if (this.chunks.length >= this.failAfterWrites) {
            queueMicrotask(() => callback(new Error('EPIPE')));
            return false;
        }
        this.chunks.push(chunk);
        queueMicrotask(() => callback());
        return true;
    }

    end(): void {
        this.ended = true;
        queueMicrotask(() => {
            if (this.dropOnEnd) {
                this.destroy();
                return;
            }
            this.emit('finish');
            this.emit('close');
        });
    }

    destroy(): void {
        if (this.destroyed) {
            return;
        }
        this.destroyed = true;
        queueMicrotask(() => this.emit('close'));
    }

    body(): Uint8Array {
        const total = this.chunks.reduce((sum, c) => sum + c.length, 0);
        const result = new Uint8Array(total);
        let offset = 0;
        for (const chunk of this.chunks) {
            result.set(chunk, offset);
            offset += chunk.length;
        }
        return result;
    }
}

function endlessStream(cancel: () => void): ReadableStream<Uint8Array> {
    return new ReadableStream<Uint8Array>({
        pull(controller): void {
            controller.enqueue(new Uint8Array(10));
        },
        cancel,
    });
}

describe('sendResponse', () => {
    it('пишет статус, заголовки и тело', async () => {
        const sink = new FakeSink();
        const response = new Response(new Uint8Array([1, 2, 3]), {
            status: 200,
            headers: { 'Content-Type': 'application/octet-stream' },
        });

        await sendResponse(sink, response);

        expect(sink.statusCode).toBe(200);
        expect(sink.headers.get('content-type')).toBe(
            'application/octet-stream'
        );
        expect(sink.body()).toEqual(new Uint8Array([1, 2, 3]));
        expect(sink.ended).toBe(true);
        expect(sink.destroyed).toBe(false);
    });

    it('ответ без тела', async () => {
        const sink = new FakeSink();
        await sendResponse(
            sink,
            new Response(null, { status: 304, headers: { ETag: '"x"' } })
        );

        expect(sink.statusCode).toBe(304);
        expect(sink.headers.get('etag')).toBe('"x"');
        expect(sink.chunks).toHaveLength(0);
        expect(sink.ended).toBe(true);
    });

    it('ошибка записи — WriteError, тело отменяется', async () => {
        const cancel = vi.fn();
        const sink = new FakeSink({ failAfterWrites: 2 });

        await expect(
            sendResponse(sink, new Response(endlessStream(cancel)))
        ).rejects.toBeInstanceOf(WriteError);
        expect(cancel).toHaveBeenCalledTimes(1);
        expect(sink.chunks).toHaveLength(2);
        expect(sink.destroyed).toBe(true);
        expect(sink.ended).toBe(false);
    });

    it('ошибка отмены тела не подменяет WriteError', async () => {
        const sink = new FakeSink({ failAfterWrites: 0 });
        const body = new ReadableStream<Uint8Array>({
            pull(controller): void {
                controller.enqueue(new Uint8Array(10));
            },
            cancel(): void {
                throw new Error('cancel failed');
            },
        });

        await expect(
            sendResponse(sink, new Response(body))
        ).rejects.toBeInstanceOf(WriteError);
        expect(sink.destroyed).toBe(true);
    });

    it('клиент отключился до завершения ответа — WriteError', async () => {
        const sink = new FakeSink({ dropOnEnd: true });

        await expect(
            sendResponse(sink, new Response(new Uint8Array([1, 2, 3])))
        ).rejects.toThrow(
            new WriteError('Connection closed before the response was finished')
        );
        expect(sink.chunks).toHaveLength(1);
        expect(sink.ended).toBe(true);
    });

    it('уже закрытое соединение — WriteError без ожидания', async () => {
        const sink = new FakeSink();
        sink.destroy();

        await expect(
            sendResponse(sink, new Response(null, { status: 304 }))
        ).rejects.toBeInstanceOf(WriteError);
        expect(sink.ended).toBe(false);
    });

    it('после успешной отправки не оставляет слушателей', async () => {
        const sink = new FakeSink();
        await sendResponse(sink, new Response(new Uint8Array([1])));

        expect(sink.listenerCount('finish')).toBe(0);
        expect(sink.listenerCount('close')).toBe(0);
    });

    it('ошибка чтения тела пробрасывается как есть', async () => {
        const sink = new FakeSink();
        const readError = new SourceReadError('Failed to read content');
        const body = new ReadableStream<Uint8Array>({
            pull(controller): void {
                controller.error(readError);
            },
        });

        await expect(sendResponse(sink, new Response(body))).rejects.toBe(
            readError
        );
        expect(sink.destroyed).toBe(true);
    });

    it('ошибка записи закрывает reader blob-а', async () => {
        const data = sequence(4096);
        const close = vi.fn(() => Promise.resolve());
        const response = await serveBlob(
            new Request('http://localhost/raw/data.bin'),
            {
                id: 'abc',
                path: 'data.bin',
                size: data.length,
                open: () =>
                    Promise.resolve({
                        ...createReaderSource({
                            open: () => createChunkedStream(data, 512),
                        }),
                        close,
                    }),
            },
            resolveServeOptions({ logger: createLogger() })
        );

        await expect(
            sendResponse(new FakeSink({ failAfterWrites: 1 }), response)
        ).rejects.toBeInstanceOf(WriteError);
        expect(close).toHaveBeenCalledTimes(1);
    });

    it('тело blob-а доходит до клиента целиком', async () => {
        const data = sequence(4096);
        const sink = new FakeSink();
        const response = await serveBlob(
            new Request('http://localhost/raw/data.bin'),
            {
                id: 'abc',
                path: 'data.bin',
                size: data.length,
                open: () =>
                    Promise.resolve({
                        ...createReaderSource({
                            open: () => createChunkedStream(data, 700),
                        }),
                        close: () => Promise.resolve(),
                    }),
            },
            resolveServeOptions({ logger: createLogger() })
        );

        await sendResponse(sink, response);

        expect(sink.statusCode).toBe(200);
        expect(sink.headers.get('content-length')).toBe('4096');
        expect(sink.body()).toEqual(data);
    });
});

describe('errorToResponse', () => {
    it('MalformedRangeError — 416 с Content-Range', async () => {
        const response = errorToResponse(
            new MalformedRangeError('Range is not satisfiable', 'bytes=5000-', 1000)
        );

        expect(response.status).toBe(416);
        expect(response.headers.get('content-range')).toBe('bytes */1000');
        expect(await response.text()).toBe('Requested Range Not Satisfiable');
    });

    it('прочие ошибки — 500', async () => {
        const response = errorToResponse(new SourceReadError('disk failure'));

        expect(response.status).toBe(500);
        expect(await response.text()).toBe('Internal Server Error');
    });
});
