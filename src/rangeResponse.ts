import {
    HEADER_CONTENT_LENGTH,
    HEADER_CONTENT_RANGE,
} from '@budarin/http-constants/headers';

import type { Range } from './types.js';

/** Заголовок, сообщающий клиенту, что сервер поддерживает range-запросы. */
export const HEADER_ACCEPT_RANGES = 'Accept-Ranges';

export function advertiseRangeSupport(headers: Headers): Headers {
    headers.set(HEADER_ACCEPT_RANGES, 'bytes');
    return headers;
}

/**
 * Выставляет заголовки 206-ответа: Content-Range и длину выбранного куска.
 */
export function addRangeResponseHeaders(
    headers: Headers,
    range: Range,
    size: number
): Headers {
    headers.set(
        HEADER_CONTENT_RANGE,
        `bytes ${range.start}-${range.end}/${size}`
    );
    headers.set(HEADER_CONTENT_LENGTH, String(range.length));
    return headers;
}

/** Content-Range для 416: диапазон не указывается, только полный размер. */
export function unsatisfiedContentRange(size: number): string {
    return `bytes */${size}`;
}
