import { vi } from 'vitest';

import type { Logger } from '../src/types.js';

export async function readAll(
    stream: ReadableStream<Uint8Array> | null
): Promise<Uint8Array> {
    if (!stream) {
        return new Uint8Array(0);
    }
    const chunks: Uint8Array[] = [];
    let total = 0;
    const reader = stream.getReader();
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    while (true) {
        const { done, value } = await reader.read();
        if (done) {
            break;
        }
        chunks.push(value);
        total += value.length;
    }
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
        result.set(chunk, offset);
        offset += chunk.length;
    }
    return result;
}

export function bytes(text: string): Uint8Array {
    return new TextEncoder().encode(text);
}

/** Байты 0, 1, 2, ... по модулю 256 */
export function sequence(length: number): Uint8Array {
    return Uint8Array.from({ length }, (_, i) => i % 256);
}

export function createLogger(): Logger {
    return {
        trace: vi.fn(),
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
    };
}
