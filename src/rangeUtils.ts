import { MalformedRangeError } from './errors.js';
import type { ETagValue, Range, RangeHeaderValue } from './types.js';

/**
 * Чистые функции для парсинга Range, проверки If-Range и нарезки потока.
 * Вынесены для unit-тестов.
 */

function toRange(start: number, end: number): Range {
    return { start, end, length: end - start + 1 };
}

/**
 * Парсит заголовок Range и возвращает диапазон байтов.
 * Конец диапазона обрезается до size - 1. Несколько диапазонов через запятую не поддерживаются.
 *
 * @throws MalformedRangeError — формат не распознан или диапазон не попадает в файл
 */
export function parseRangeHeader(
    rangeHeader: RangeHeaderValue,
    size: number
): Range {
    const trimmedHeader = rangeHeader.trim();

    const suffixMatch = /^bytes=-(\d+)$/.exec(trimmedHeader);
    if (suffixMatch) {
        const suffixLength = Number.parseInt(suffixMatch[1] ?? '', 10);
        if (!Number.isSafeInteger(suffixLength) || suffixLength <= 0) {
            throw new MalformedRangeError(
                'Invalid suffix range value',
                rangeHeader,
                size
            );
        }
        if (size <= 0) {
            throw new MalformedRangeError(
                'Range is not satisfiable',
                rangeHeader,
                size
            );
        }
        return toRange(Math.max(0, size - suffixLength), size - 1);
    }

    const rangeMatch = /^bytes=(\d+)-(\d*)$/.exec(trimmedHeader);
    if (!rangeMatch) {
        throw new MalformedRangeError(
            'Invalid or unsupported range header format',
            rangeHeader,
            size
        );
    }

    const start = Number.parseInt(rangeMatch[1] ?? '', 10);
    const requestedEnd = rangeMatch[2]
        ? Number.parseInt(rangeMatch[2], 10)
        : size - 1;

    if (!Number.isSafeInteger(start) || !Number.isSafeInteger(requestedEnd)) {
        throw new MalformedRangeError(
            'Invalid range values',
            rangeHeader,
            size
        );
    }
    if (requestedEnd < start) {
        throw new MalformedRangeError(
            'Range end is before start',
            rangeHeader,
            size
        );
    }

    const range = toRange(start, Math.min(requestedEnd, size - 1));
    if (range.length <= 0) {
        throw new MalformedRangeError(
            'Range is not satisfiable',
            rangeHeader,
            size
        );
    }

    return range;
}

/**
 * Проверяет If-Range против текущего ETag. Сравнение строгое:
 * слабые валидаторы (W/) и даты не совпадают никогда, тогда Range игнорируется.
 */
export function ifRangeMatches(
    ifRangeValue: string,
    etag: ETagValue | undefined
): boolean {
    const value = ifRangeValue.trim();
    if (!value || !etag || value.startsWith('W/') || etag.startsWith('W/')) {
        return false;
    }
    return value === etag;
}

/**
 * Создаёт ReadableStream, отдающий только указанный диапазон байтов из исходного потока.
 * Байты до начала диапазона читаются и отбрасываются; после конца диапазона источник отменяется.
 */
export function createRangeStream(
    sourceStream: ReadableStream<Uint8Array>,
    range: Range
): ReadableStream<Uint8Array> {
    const reader = sourceStream.getReader();
    let position = 0;

    const finish = async (
        controller: ReadableStreamDefaultController<Uint8Array>
    ): Promise<void> => {
        controller.close();
        await reader.cancel();
    };

    return new ReadableStream<Uint8Array>({
        async pull(controller): Promise<void> {
            // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
            while (true) {
                const { done, value } = await reader.read();
                if (done) {
                    controller.close();
                    return;
                }
                const chunkStart = position;
                const chunkEnd = position + value.length;
                position = chunkEnd;

                if (chunkEnd <= range.start) {
                    continue;
                }
                if (chunkStart > range.end) {
                    await finish(controller);
                    return;
                }
                const start = Math.max(range.start - chunkStart, 0);
                const end = Math.min(range.end - chunkStart + 1, value.length);
                controller.enqueue(value.slice(start, end));
                if (chunkEnd > range.end) {
                    await finish(controller);
                }
                return;
            }
        },
        async cancel(reason): Promise<void> {
            await reader.cancel(reason);
        },
    });
}
