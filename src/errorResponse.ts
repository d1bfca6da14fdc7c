import { HEADER_CONTENT_RANGE } from '@budarin/http-constants/headers';
import {
    HTTP_STATUS_INTERNAL_SERVER_ERROR,
    HTTP_STATUS_RANGE_NOT_SATISFIABLE,
} from '@budarin/http-constants/statuses';

import { MalformedRangeError } from './errors.js';
import { unsatisfiedContentRange } from './rangeResponse.js';

/**
 * Переводит ошибку из serveBlob/respondContent в HTTP-ответ.
 * Логировать ошибку — забота вызывающего.
 */
export function errorToResponse(error: unknown): Response {
    if (error instanceof MalformedRangeError) {
        return new Response('Requested Range Not Satisfiable', {
            status: HTTP_STATUS_RANGE_NOT_SATISFIABLE,
            headers: {
                [HEADER_CONTENT_RANGE]: unsatisfiedContentRange(error.size),
            },
        });
    }
    return new Response('Internal Server Error', {
        status: HTTP_STATUS_INTERNAL_SERVER_ERROR,
    });
}
