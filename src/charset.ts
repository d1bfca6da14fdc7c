import { detect } from 'chardet';

import { CharsetDetectionError } from './errors.js';

const UTF8_BOM = [0xef, 0xbb, 0xbf];

/** Длина последовательности UTF-8 по ведущему байту; 0 — байт не может начинать символ. */
function utf8SequenceLength(lead: number): number {
    if (lead < 0x80) return 1;
    if (lead >= 0xc2 && lead <= 0xdf) return 2;
    if (lead >= 0xe0 && lead <= 0xef) return 3;
    if (lead >= 0xf0 && lead <= 0xf4) return 4;
    return 0;
}

/**
 * Образец обрезан по границе SNIFF_SAMPLE_SIZE, поэтому последний символ
 * может оказаться неполным. Отрезаем его перед строгой проверкой.
 */
function trimIncompleteTail(sample: Uint8Array): Uint8Array {
    const from = Math.max(0, sample.length - 3);
    for (let i = sample.length - 1; i >= from; i--) {
        const byte = sample[i] ?? 0;
        if ((byte & 0xc0) === 0x80) {
            continue;
        }
        const expected = utf8SequenceLength(byte);
        return expected > sample.length - i ? sample.subarray(0, i) : sample;
    }
    return sample;
}

function isValidUtf8(sample: Uint8Array): boolean {
    try {
        new TextDecoder('utf-8', { fatal: true }).decode(
            trimIncompleteTail(sample)
        );
        return true;
    } catch {
        return false;
    }
}

/**
 * Определяет кодировку текста по образцу. UTF-8 проверяется напрямую,
 * остальное отдаётся статистическому детектору chardet.
 *
 * @throws CharsetDetectionError — кодировку определить не удалось
 */
export function detectCharset(sample: Uint8Array): string {
    if (UTF8_BOM.every((byte, i) => sample[i] === byte) || isValidUtf8(sample)) {
        return 'UTF-8';
    }

    const detected = detect(sample);
    if (!detected) {
        throw new CharsetDetectionError(
            `Unable to detect charset of ${sample.length} bytes`
        );
    }
    return detected;
}
