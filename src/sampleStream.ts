import { SourceReadError } from './errors.js';

export interface SampleReadResult {
    /** Все прочитанные байты; может быть длиннее size, если последний чанк был большим */
    head: Uint8Array;
    /** Первые size байтов head — образец для определения типа */
    sample: Uint8Array;
}

function concatChunks(chunks: Uint8Array[], total: number): Uint8Array {
    if (chunks.length === 1 && chunks[0]) {
        return chunks[0];
    }
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        result.set(chunk, offset);
        offset += chunk.length;
    }
    return result;
}

/**
 * Читает из reader-а не меньше size байтов (или до конца потока).
 * Прочитанное нельзя вернуть в поток: его нужно отдать клиенту первым (см. createBodyStream).
 *
 * @throws SourceReadError
 */
export async function readSample(
    reader: ReadableStreamDefaultReader<Uint8Array>,
    size: number
): Promise<SampleReadResult> {
    const chunks: Uint8Array[] = [];
    let total = 0;

    while (total < size) {
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
            chunk = await reader.read();
        } catch (readError) {
            throw new SourceReadError('Failed to read content sample', {
                cause: readError,
            });
        }
        if (chunk.done) {
            break;
        }
        chunks.push(chunk.value);
        total += chunk.value.length;
    }

    const head = concatChunks(chunks, total);
    return { head, sample: head.subarray(0, size) };
}

/**
 * Тело ответа: сначала уже прочитанные байты head, затем остаток reader-а без изменений.
 * Ошибка чтения превращается в SourceReadError; отмена тела отменяет источник.
 */
export function createBodyStream(
    head: Uint8Array,
    reader: ReadableStreamDefaultReader<Uint8Array>
): ReadableStream<Uint8Array> {
    let pending: Uint8Array | undefined = head.length > 0 ? head : undefined;

    return new ReadableStream<Uint8Array>({
        async pull(controller): Promise<void> {
            if (pending) {
                controller.enqueue(pending);
                pending = undefined;
                return;
            }
            let chunk: ReadableStreamReadResult<Uint8Array>;
            try {
                chunk = await reader.read();
            } catch (readError) {
                controller.error(
                    new SourceReadError('Failed to read content', {
                        cause: readError,
                    })
                );
                return;
            }
            if (chunk.done) {
                controller.close();
                return;
            }
            controller.enqueue(chunk.value);
        },
        async cancel(reason): Promise<void> {
            await reader.cancel(reason);
        },
    });
}
