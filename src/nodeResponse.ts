import { WriteError } from './errors.js';

const CLOSED_BEFORE_FINISH = 'Connection closed before the response was finished';

/**
 * Минимум от http.ServerResponse, который нужен для отдачи Response.
 * ServerResponse подходит без обёрток; в тестах достаточно фейка.
 */
export interface ResponseSink {
    statusCode: number;
    readonly destroyed: boolean;
    setHeader(name: string, value: string): unknown;
    write(chunk: Uint8Array, callback: (error?: Error | null) => void): boolean;
    end(): unknown;
    destroy(error?: Error): unknown;
    once(event: 'finish' | 'close', listener: () => void): unknown;
    off(event: 'finish' | 'close', listener: () => void): unknown;
}

function writeChunk(sink: ResponseSink, chunk: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        sink.write(chunk, (error) => {
            if (error) {
                reject(
                    new WriteError('Failed to write response body', {
                        cause: error,
                    })
                );
                return;
            }
            resolve();
        });
    });
}

/**
 * Завершает ответ. 'close' без 'finish' значит, что клиент ушёл раньше,
 * чем ответ был дописан.
 */
function endResponse(sink: ResponseSink): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (sink.destroyed) {
            reject(new WriteError(CLOSED_BEFORE_FINISH));
            return;
        }

        const onFinish = (): void => {
            sink.off('close', onClose);
            resolve();
        };
        const onClose = (): void => {
            sink.off('finish', onFinish);
            reject(new WriteError(CLOSED_BEFORE_FINISH));
        };

        sink.once('finish', onFinish);
        sink.once('close', onClose);
        sink.end();
    });
}

/**
 * Пишет Response в Node-ответ: статус и заголовки, затем тело по чанкам,
 * дожидаясь записи каждого. Отправленное до ошибки не отзывается.
 *
 * @throws WriteError — запись не удалась или клиент отключился до конца ответа;
 *   тело отменено, reader источника освобождён
 * @throws SourceReadError — ошибка чтения тела (как её выдал поток)
 */
export async function sendResponse(
    sink: ResponseSink,
    response: Response
): Promise<void> {
    sink.statusCode = response.status;
    response.headers.forEach((value, name) => {
        sink.setHeader(name, value);
    });

    if (!response.body) {
        await endResponse(sink);
        return;
    }

    const reader = response.body.getReader();

    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    while (true) {
        let chunk: ReadableStreamReadResult<Uint8Array>;
        try {
            chunk = await reader.read();
        } catch (readError) {
            sink.destroy();
            throw readError;
        }
        if (chunk.done) {
            break;
        }
        try {
            await writeChunk(sink, chunk.value);
        } catch (writeError) {
            sink.destroy();
            await reader.cancel(writeError).catch(() => {});
            throw writeError;
        }
    }

    await endResponse(sink);
}
