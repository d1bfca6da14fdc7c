import { MIME_APPLICATION_OCTET_STREAM } from '@budarin/http-constants/mime-types';

import type { SniffedType } from './types.js';

/** Сколько первых байтов читается для определения типа. */
export const SNIFF_SAMPLE_SIZE = 1024;

export const SVG_MIME_TYPE = 'image/svg+xml';
export const PDF_MIME_TYPE = 'application/pdf';
export const TEXT_MIME_TYPE = 'text/plain';

interface MagicSignature {
    mimeType: string;
    offset: number;
    bytes: readonly number[];
}

/** Сигнатуры изображений. WebP и BMP проверяются отдельно: у них две части. */
const IMAGE_SIGNATURES: readonly MagicSignature[] = [
    {
        mimeType: 'image/png',
        offset: 0,
        bytes: [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
    },
    { mimeType: 'image/jpeg', offset: 0, bytes: [0xff, 0xd8, 0xff] },
    {
        mimeType: 'image/gif',
        offset: 0,
        bytes: [0x47, 0x49, 0x46, 0x38, 0x37, 0x61],
    },
    {
        mimeType: 'image/gif',
        offset: 0,
        bytes: [0x47, 0x49, 0x46, 0x38, 0x39, 0x61],
    },
    { mimeType: 'image/x-icon', offset: 0, bytes: [0x00, 0x00, 0x01, 0x00] },
];

const PDF_SIGNATURE = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const RIFF_SIGNATURE = [0x52, 0x49, 0x46, 0x46];
const WEBP_SIGNATURE = [0x57, 0x45, 0x42, 0x50];
const BMP_SIGNATURE = [0x42, 0x4d];
// зарезервированные байты 6-9 заголовка BMP, иначе под "BM" попадает обычный текст
const BMP_RESERVED = [0x00, 0x00, 0x00, 0x00];

// XML-пролог, комментарии и DOCTYPE в любом порядке, затем корневой <svg
const SVG_TAG_REGEX =
    /^\s*(?:(?:<!--[\s\S]*?-->|<!DOCTYPE[^>]*>|<\?xml[\s\S]*?\?>)\s*)*<svg[\s>/]/i;

function startsWith(
    sample: Uint8Array,
    bytes: readonly number[],
    offset = 0
): boolean {
    if (sample.length < offset + bytes.length) {
        return false;
    }
    return bytes.every((byte, i) => sample[offset + i] === byte);
}

/** Управляющие байты, которых не бывает в тексте (по WHATWG MIME Sniffing). */
function isBinaryControlByte(byte: number): boolean {
    return (
        byte <= 0x08 ||
        byte === 0x0b ||
        (byte >= 0x0e && byte <= 0x1a) ||
        (byte >= 0x1c && byte <= 0x1f)
    );
}

function hasUtf16Bom(sample: Uint8Array): boolean {
    return startsWith(sample, [0xfe, 0xff]) || startsWith(sample, [0xff, 0xfe]);
}

function looksLikeSvg(sample: Uint8Array): boolean {
    const text = new TextDecoder().decode(sample);
    return SVG_TAG_REGEX.test(text);
}

/**
 * Определяет тип содержимого по первым байтам (не более SNIFF_SAMPLE_SIZE).
 * Пустой образец считается текстом.
 */
export function detectContentType(sample: Uint8Array): SniffedType {
    if (startsWith(sample, PDF_SIGNATURE)) {
        return { kind: 'pdf', mimeType: PDF_MIME_TYPE };
    }

    for (const signature of IMAGE_SIGNATURES) {
        if (startsWith(sample, signature.bytes, signature.offset)) {
            return { kind: 'image', mimeType: signature.mimeType };
        }
    }
    if (
        startsWith(sample, RIFF_SIGNATURE) &&
        startsWith(sample, WEBP_SIGNATURE, 8)
    ) {
        return { kind: 'image', mimeType: 'image/webp' };
    }
    if (
        startsWith(sample, BMP_SIGNATURE) &&
        startsWith(sample, BMP_RESERVED, 6)
    ) {
        return { kind: 'image', mimeType: 'image/bmp' };
    }

    if (hasUtf16Bom(sample)) {
        return { kind: 'text', mimeType: TEXT_MIME_TYPE };
    }
    if (sample.some(isBinaryControlByte)) {
        return { kind: 'binary', mimeType: MIME_APPLICATION_OCTET_STREAM };
    }

    if (looksLikeSvg(sample)) {
        return { kind: 'svg', mimeType: SVG_MIME_TYPE };
    }
    return { kind: 'text', mimeType: TEXT_MIME_TYPE };
}

export function isImage(sniffed: SniffedType): boolean {
    return sniffed.kind === 'image' || sniffed.kind === 'svg';
}
