import type { RangeHeaderValue } from './types.js';

export type ServeErrorCode =
    | 'MALFORMED_RANGE'
    | 'SOURCE_READ'
    | 'WRITE_FAILED'
    | 'CHARSET_DETECTION';

export abstract class ServeError extends Error {
    constructor(
        readonly code: ServeErrorCode,
        message: string,
        options?: ErrorOptions
    ) {
        super(message, options);
    }
}

/**
 * Заголовок Range не разобран или диапазон не попадает в файл.
 * Отвечать нужно 416, а не полным телом.
 */
export class MalformedRangeError extends ServeError {
    constructor(
        message: string,
        readonly rangeHeader: RangeHeaderValue,
        readonly size: number
    ) {
        super('MALFORMED_RANGE', `${message}: ${rangeHeader}`);
        this.name = 'MalformedRangeError';
    }
}

/** Ошибка чтения содержимого blob-а. */
export class SourceReadError extends ServeError {
    constructor(message: string, options?: ErrorOptions) {
        super('SOURCE_READ', message, options);
        this.name = 'SourceReadError';
    }
}

/** Клиент отключился или запись в ответ не удалась. */
export class WriteError extends ServeError {
    constructor(message: string, options?: ErrorOptions) {
        super('WRITE_FAILED', message, options);
        this.name = 'WriteError';
    }
}

export class CharsetDetectionError extends ServeError {
    constructor(message: string, options?: ErrorOptions) {
        super('CHARSET_DETECTION', message, options);
        this.name = 'CharsetDetectionError';
    }
}
