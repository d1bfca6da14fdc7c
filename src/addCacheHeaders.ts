import {
    HEADER_CACHE_CONTROL,
    HEADER_ETAG,
} from '@budarin/http-constants/headers';

import type { ETagValue } from './types.js';

/**
 * Выставляет Cache-Control (если задан) и ETag.
 */
export function addCacheHeaders(
    headers: Headers,
    cacheControl: string,
    etag?: ETagValue
): Headers {
    if (cacheControl) {
        headers.set(HEADER_CACHE_CONTROL, cacheControl);
    }
    if (etag) {
        headers.set(HEADER_ETAG, etag);
    }

    return headers;
}
