import { HEADER_CONTENT_LENGTH } from '@budarin/http-constants/headers';
import {
    HTTP_STATUS_OK,
    HTTP_STATUS_PARTIAL_CONTENT,
} from '@budarin/http-constants/statuses';

import { addCacheHeaders } from './addCacheHeaders.js';
import {
    DEFAULT_CHARSET,
    decideContentHeaders,
    lookupMappedMimeType,
    normalizeFileName,
    shouldRenderAsText,
} from './contentPolicy.js';
import type { ResolvedServeOptions } from './options.js';
import {
    addRangeResponseHeaders,
    advertiseRangeSupport,
} from './rangeResponse.js';
import { ifRangeMatches, parseRangeHeader } from './rangeUtils.js';
import { createBodyStream, readSample } from './sampleStream.js';
import { SNIFF_SAMPLE_SIZE } from './typeSniffer.js';
import type { ByteSource, ContentRequest, Range } from './types.js';

/**
 * Решает, отдавать ли часть файла. Range учитывается только у источников
 * с произвольным доступом и известным размером; иначе отдаётся всё тело с 200.
 *
 * @throws MalformedRangeError
 */
function resolveRange(
    req: ContentRequest,
    source: ByteSource,
    headers: Headers,
    options: ResolvedServeOptions
): Range | undefined {
    const { enableLogging, logger } = options;

    if (!source.streamRange || req.declaredSize < 0) {
        if (req.rangeHeader && enableLogging) {
            logger.debug(
                `serveBlob: ignoring Range for ${req.name} (source is not seekable or size is unknown)`
            );
        }
        return undefined;
    }

    advertiseRangeSupport(headers);

    if (!req.rangeHeader) {
        return undefined;
    }
    if (req.ifRangeHeader && !ifRangeMatches(req.ifRangeHeader, req.etag)) {
        if (enableLogging) {
            logger.debug(
                `serveBlob: If-Range does not match for ${req.name}, sending full content`
            );
        }
        return undefined;
    }

    const range = parseRangeHeader(req.rangeHeader, req.declaredSize);
    if (enableLogging) {
        logger.debug(
            `serveBlob: ${req.rangeHeader} start:${range.start} end:${range.end} len:${range.length}`
        );
    }
    return range;
}

function resolveCharset(
    sample: Uint8Array,
    fileName: string,
    options: ResolvedServeOptions
): string {
    try {
        return options.detectCharset(sample);
    } catch (error) {
        options.logger.error(
            `serveBlob: detect charset of ${fileName} failed, using ${DEFAULT_CHARSET} by default:`,
            error
        );
        return DEFAULT_CHARSET;
    }
}

interface SniffedBody {
    sample: Uint8Array;
    body: ReadableStream<Uint8Array>;
}

/**
 * Для полного ответа образец читается из того же потока, что и тело, и отдаётся первым.
 * Для частичного — отдельным чтением начала файла, тело берётся из streamRange.
 */
async function sniffAndOpenBody(
    req: ContentRequest,
    source: ByteSource,
    range: Range | undefined
): Promise<SniffedBody> {
    if (range && source.streamRange) {
        const sampleLength = Math.min(SNIFF_SAMPLE_SIZE, req.declaredSize);
        const sampleReader = source
            .streamRange({ start: 0, end: sampleLength - 1, length: sampleLength })
            .getReader();
        const { sample } = await readSample(sampleReader, SNIFF_SAMPLE_SIZE);
        await sampleReader.cancel();

        const body = createBodyStream(
            new Uint8Array(0),
            source.streamRange(range).getReader()
        );
        return { sample, body };
    }

    const reader = source.stream().getReader();
    const { head, sample } = await readSample(reader, SNIFF_SAMPLE_SIZE);
    return { sample, body: createBodyStream(head, reader) };
}

/**
 * Определяет тип содержимого, собирает заголовки и возвращает ответ с потоковым телом.
 * Все заголовки выставляются до того, как тело отдано наружу.
 *
 * @throws MalformedRangeError — Range не разобран (ответить 416)
 * @throws SourceReadError — не удалось прочитать начало содержимого
 */
export async function respondContent(
    req: ContentRequest,
    source: ByteSource,
    options: ResolvedServeOptions
): Promise<Response> {
    const { cacheControl, logger, mimeTypeMap, svgEnabled } = options;
    const headers = new Headers();

    const range = resolveRange(req, source, headers, options);
    const { sample, body } = await sniffAndOpenBody(req, source, range);

    addCacheHeaders(headers, cacheControl, req.etag);

    if (range) {
        addRangeResponseHeaders(headers, range, req.declaredSize);
    } else if (req.declaredSize >= 0) {
        headers.set(HEADER_CONTENT_LENGTH, String(req.declaredSize));
    } else {
        logger.error(
            `serveBlob: called to serve ${req.name} with size < 0: ${req.declaredSize}`
        );
    }

    const fileName = normalizeFileName(req.name);
    const sniffed = options.detectContentType(sample);
    const charset = shouldRenderAsText(sniffed, req.render)
        ? resolveCharset(sample, fileName, options)
        : undefined;

    const contentHeaders = decideContentHeaders({
        sniffed,
        render: req.render,
        mappedMimeType: lookupMappedMimeType(fileName, mimeTypeMap),
        svgEnabled,
        charset,
        fileName,
    });
    contentHeaders.forEach((value, name) => {
        headers.set(name, value);
    });

    return new Response(body, {
        status: range ? HTTP_STATUS_PARTIAL_CONTENT : HTTP_STATUS_OK,
        headers,
    });
}
