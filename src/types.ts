/**
 * Семантические алиасы и контракты, общие для BlobServer и ContentResponder.
 */

/** Значение заголовка Range (например, "bytes=0-1023"). */
export type RangeHeaderValue = string;

/** Значение ETag вместе с кавычками (например, "\"3b18e512dba79e4c8300dd08aeb37f8e728b8dad\""). */
export type ETagValue = string;

/** Путь в дереве репозитория или отображаемое имя файла. */
export type BlobPath = string;

/** Расширение файла в нижнем регистре с точкой (".md"), ключ таблицы MIME. */
export type FileExtension = string;

/** Диапазон байтов, включительно с обеих сторон. */
export interface Range {
    start: number;
    end: number;
    /** end - start + 1, всегда > 0 */
    length: number;
}

/**
 * Источник байтов. stream() всегда читает с нулевого байта.
 * streamRange есть только у источников с произвольным доступом (аналог seek).
 */
export interface ByteSource {
    stream(): ReadableStream<Uint8Array>;
    streamRange?: (range: Range) => ReadableStream<Uint8Array>;
}

/** Открытый reader blob-а. close() обязан вызвать тот, кто открыл. */
export interface BlobReader extends ByteSource {
    close(): Promise<void>;
}

/** Неизменяемый blob из хранилища объектов. */
export interface ContentBlob {
    /** Хеш содержимого, из него строится ETag */
    id: string;
    path: BlobPath;
    size: number;
    open(): Promise<BlobReader>;
}

/** Параметры одного ответа. Не меняются до конца запроса. */
export interface ContentRequest {
    /** Отображаемое имя или путь; используется только базовое имя */
    name: BlobPath;
    /** Размер в байтах; -1 — неизвестен */
    declaredSize: number;
    rangeHeader?: RangeHeaderValue | undefined;
    ifRangeHeader?: string | undefined;
    /** Текущий ETag ресурса, с ним сверяется If-Range */
    etag?: ETagValue | undefined;
    /** Пользователь просит отдать содержимое как текст (?render=1) */
    render: boolean;
}

export type ContentKind = 'text' | 'image' | 'svg' | 'pdf' | 'binary';

/** Результат определения типа по первым байтам. svg считается изображением. */
export interface SniffedType {
    kind: ContentKind;
    mimeType: string;
}

export type ContentSniffer = (sample: Uint8Array) => SniffedType;

/** Возвращает имя кодировки или выбрасывает, если определить не удалось. */
export type CharsetDetector = (sample: Uint8Array) => string;

/** Таблица расширение → MIME из конфигурации. */
export interface MimeTypeMapSetting {
    enabled: boolean;
    map: Record<FileExtension, string>;
}

export interface Logger {
    trace: (...args: unknown[]) => void;
    debug: (...args: unknown[]) => void;
    info: (...args: unknown[]) => void;
    warn: (...args: unknown[]) => void;
    error: (...args: unknown[]) => void;
}
