import { HTTP_STATUS_NOT_MODIFIED } from '@budarin/http-constants/statuses';

import { addCacheHeaders } from './addCacheHeaders.js';
import type { ETagValue } from './types.js';

export const HEADER_IF_NONE_MATCH = 'If-None-Match';

/** Убирает признак слабого валидатора: If-None-Match сравнивается слабо. */
function weakTag(value: string): string {
    return value.trim().replace(/^W\//, '');
}

/**
 * Совпадает ли If-None-Match с ETag. Поддерживаются список через запятую и "*".
 */
export function ifNoneMatchMatches(
    ifNoneMatch: string,
    etag: ETagValue
): boolean {
    const tags = ifNoneMatch.split(',').map((tag) => tag.trim());
    if (tags.includes('*')) {
        return true;
    }
    const expected = weakTag(etag);
    return tags.some((tag) => tag !== '' && weakTag(tag) === expected);
}

/**
 * Если у клиента актуальная копия — возвращает готовый 304 без тела.
 * undefined — нужно отдавать содержимое.
 */
export function handleETagCache(
    request: Request,
    etag: ETagValue,
    cacheControl: string
): Response | undefined {
    const ifNoneMatch = request.headers.get(HEADER_IF_NONE_MATCH);
    if (!ifNoneMatch || !ifNoneMatchMatches(ifNoneMatch, etag)) {
        return undefined;
    }

    return new Response(null, {
        status: HTTP_STATUS_NOT_MODIFIED,
        headers: addCacheHeaders(new Headers(), cacheControl, etag),
    });
}
