import { HEADER_RANGE } from '@budarin/http-constants/headers';

import { respondContent } from './contentResponder.js';
import { SourceReadError } from './errors.js';
import { handleETagCache } from './etagCache.js';
import {
    type ResolvedServeOptions,
    type ServeOptions,
    resolveServeOptions,
} from './options.js';
import type { BlobReader, ContentBlob } from './types.js';

export const HEADER_IF_RANGE = 'If-Range';
/** Query-параметр, которым пользователь просит отдать файл как текст. */
export const RENDER_QUERY_PARAM = 'render';

const TRUE_FLAG_VALUES = new Set(['1', 't', 'T', 'true', 'TRUE', 'True']);

export function parseBooleanFlag(value: string | null): boolean {
    return value !== null && TRUE_FLAG_VALUES.has(value);
}

/**
 * Оборачивает тело так, чтобы release вызвался, когда поток дочитан,
 * упал с ошибкой или был отменён клиентом.
 */
export function releaseOnSettle(
    body: ReadableStream<Uint8Array>,
    release: () => Promise<void>
): ReadableStream<Uint8Array> {
    const reader = body.getReader();

    return new ReadableStream<Uint8Array>({
        async pull(controller): Promise<void> {
            let chunk: ReadableStreamReadResult<Uint8Array>;
            try {
                chunk = await reader.read();
            } catch (readError) {
                await release();
                controller.error(readError);
                return;
            }
            if (chunk.done) {
                await release();
                controller.close();
                return;
            }
            controller.enqueue(chunk.value);
        },
        async cancel(reason): Promise<void> {
            try {
                await reader.cancel(reason);
            } finally {
                await release();
            }
        },
    });
}

/**
 * Отдаёт blob: 304 по ETag, иначе открывает reader и передаёт его в respondContent.
 * Reader закрывается ровно один раз на любом пути; ошибка закрытия только логируется.
 *
 * @throws MalformedRangeError, SourceReadError — те же ошибки, что и у respondContent
 */
export async function serveBlob(
    request: Request,
    blob: ContentBlob,
    options: ResolvedServeOptions
): Promise<Response> {
    const { cacheControl, enableLogging, logger } = options;
    const etag = `"${blob.id}"`;

    const notModified = handleETagCache(request, etag, cacheControl);
    if (notModified) {
        if (enableLogging) {
            logger.debug(`serveBlob: 304 for ${blob.path} (${etag})`);
        }
        return notModified;
    }

    let reader: BlobReader;
    try {
        reader = await blob.open();
    } catch (openError) {
        throw new SourceReadError(`Failed to open blob ${blob.path}`, {
            cause: openError,
        });
    }

    let released = false;
    const release = async (): Promise<void> => {
        if (released) {
            return;
        }
        released = true;
        try {
            await reader.close();
        } catch (closeError) {
            logger.error(`serveBlob: Close: ${blob.path}`, closeError);
        }
    };

    let response: Response;
    try {
        response = await respondContent(
            {
                name: blob.path,
                declaredSize: blob.size,
                rangeHeader: request.headers.get(HEADER_RANGE) ?? undefined,
                ifRangeHeader: request.headers.get(HEADER_IF_RANGE) ?? undefined,
                etag,
                render: parseBooleanFlag(
                    new URL(request.url).searchParams.get(RENDER_QUERY_PARAM)
                ),
            },
            reader,
            options
        );
    } catch (error) {
        await release();
        throw error;
    }

    if (!response.body) {
        await release();
        return response;
    }

    return new Response(releaseOnSettle(response.body, release), {
        status: response.status,
        headers: response.headers,
    });
}

export interface BlobServer {
    serve: (request: Request, blob: ContentBlob) => Promise<Response>;
    readonly options: ResolvedServeOptions;
}

/**
 * Создаёт сервер blob-ов с разрешёнными один раз опциями.
 *
 * @param options - Опции конфигурации (таблица MIME, SVG, Cache-Control, логирование)
 */
export function createBlobServer(options: ServeOptions = {}): BlobServer {
    const resolved = resolveServeOptions(options);

    return {
        serve: (request, blob) => serveBlob(request, blob, resolved),
        options: resolved,
    };
}
