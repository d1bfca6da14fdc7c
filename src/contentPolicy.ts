import { HEADER_CONTENT_TYPE } from '@budarin/http-constants/headers';
import { posix } from 'node:path';

import { SVG_MIME_TYPE, TEXT_MIME_TYPE, isImage } from './typeSniffer.js';
import type {
    BlobPath,
    FileExtension,
    MimeTypeMapSetting,
    SniffedType,
} from './types.js';

export const HEADER_CONTENT_DISPOSITION = 'Content-Disposition';
export const HEADER_ACCESS_CONTROL_EXPOSE_HEADERS =
    'Access-Control-Expose-Headers';
export const HEADER_CONTENT_SECURITY_POLICY = 'Content-Security-Policy';
export const HEADER_X_CONTENT_TYPE_OPTIONS = 'X-Content-Type-Options';

/** CSP для SVG: никаких скриптов и внешних ресурсов, только inline-стили. */
export const SVG_CONTENT_SECURITY_POLICY =
    "default-src 'none'; style-src 'unsafe-inline'; sandbox";

export const DEFAULT_CHARSET = 'utf-8';

export type DispositionType = 'inline' | 'attachment';

export interface ContentPolicyInput {
    sniffed: SniffedType;
    /** ?render=1 — отдать как текст независимо от типа */
    render: boolean;
    /** MIME из таблицы расширений; '' — нет сопоставления */
    mappedMimeType: string;
    svgEnabled: boolean;
    /** Кодировка; нужна только для текстовой ветки */
    charset?: string | undefined;
    /** Уже нормализованное имя (см. normalizeFileName) */
    fileName: string;
}

/**
 * Базовое имя без каталогов; запятые заменяются пробелами,
 * потому что Chrome не принимает их в Content-Disposition.
 */
export function normalizeFileName(name: BlobPath): string {
    return posix.basename(name).replaceAll(',', ' ');
}

/** Расширение от последней точки включительно, в нижнем регистре; '' если точки нет. */
export function fileExtension(fileName: string): FileExtension {
    const dot = fileName.lastIndexOf('.');
    return dot >= 0 ? fileName.slice(dot).toLowerCase() : '';
}

export function lookupMappedMimeType(
    fileName: string,
    mimeTypeMap: MimeTypeMapSetting
): string {
    if (!mimeTypeMap.enabled) {
        return '';
    }
    return mimeTypeMap.map[fileExtension(fileName)] ?? '';
}

export function shouldRenderAsText(
    sniffed: SniffedType,
    render: boolean
): boolean {
    return sniffed.kind === 'text' || render;
}

function escapeQuoted(value: string): string {
    return value.replace(/["\\]/g, '\\$&');
}

function encodeRfc5987(value: string): string {
    return encodeURIComponent(value).replace(
        /['()*]/g,
        (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
    );
}

/**
 * Значение Content-Disposition. Значения заголовков должны быть ByteString,
 * поэтому имя вне печатного ASCII уходит в filename*, а в filename — замена на '_'.
 */
export function formatContentDisposition(
    type: DispositionType,
    fileName: string
): string {
    if (/^[\x20-\x7e]*$/.test(fileName)) {
        return `${type}; filename="${escapeQuoted(fileName)}"`;
    }
    const fallback = fileName.replace(/[^\x20-\x7e]/g, '_');
    return `${type}; filename="${escapeQuoted(fallback)}"; filename*=UTF-8''${encodeRfc5987(fileName)}`;
}

/**
 * Таблица решений по типу содержимого: какие Content-Type, Content-Disposition
 * и защитные заголовки выставить. Без ввода-вывода.
 */
export function decideContentHeaders(input: ContentPolicyInput): Headers {
    const { sniffed, render, mappedMimeType, svgEnabled, charset, fileName } =
        input;
    const headers = new Headers();

    const isSvg = sniffed.kind === 'svg';
    // SVG может содержать скрипты: защитные заголовки ставятся при любой ветке
    if (isSvg) {
        headers.set(HEADER_CONTENT_SECURITY_POLICY, SVG_CONTENT_SECURITY_POLICY);
        headers.set(HEADER_X_CONTENT_TYPE_OPTIONS, 'nosniff');
    }

    if (shouldRenderAsText(sniffed, render)) {
        const mimeType = mappedMimeType || TEXT_MIME_TYPE;
        const cs = (charset ?? DEFAULT_CHARSET).toLowerCase();
        headers.set(HEADER_CONTENT_TYPE, `${mimeType}; charset=${cs}`);
        return headers;
    }

    headers.set(
        HEADER_ACCESS_CONTROL_EXPOSE_HEADERS,
        HEADER_CONTENT_DISPOSITION
    );
    if (isSvg) {
        headers.set(HEADER_CONTENT_TYPE, SVG_MIME_TYPE);
    } else if (mappedMimeType) {
        headers.set(HEADER_CONTENT_TYPE, mappedMimeType);
    }

    const inlineable = isImage(sniffed) || sniffed.kind === 'pdf';
    const disposition: DispositionType =
        inlineable && (svgEnabled || !isSvg) ? 'inline' : 'attachment';
    headers.set(
        HEADER_CONTENT_DISPOSITION,
        formatContentDisposition(disposition, fileName)
    );

    return headers;
}
