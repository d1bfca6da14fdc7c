import { detectCharset } from './charset.js';
import { detectContentType } from './typeSniffer.js';
import type {
    CharsetDetector,
    ContentSniffer,
    Logger,
    MimeTypeMapSetting,
} from './types.js';

export const DEFAULT_CACHE_CONTROL = 'public, max-age=86400';

export interface ServeOptions {
    /**
     * Таблица расширение → MIME (по умолчанию выключена).
     * Ключи можно задавать с точкой или без, в любом регистре: ".MD" и "md" равнозначны.
     */
    mimeTypeMap?: MimeTypeMapSetting;
    /**
     * Показывать SVG в браузере (inline). false — SVG всегда отдаётся как attachment.
     * По умолчанию true.
     */
    svgEnabled?: boolean;
    /**
     * Значение Cache-Control для 200, 206 и 304 (по умолчанию `public, max-age=86400`).
     * Пустая строка — заголовок не выставляется.
     */
    cacheControl?: string;
    /**
     * Включить отладочное логирование (по умолчанию false).
     * Ошибки (закрытие reader-а, отрицательный размер, кодировка) логируются всегда.
     */
    enableLogging?: boolean;
    /** Куда писать логи (по умолчанию console) */
    logger?: Logger;
    /** Определение типа по первым байтам */
    detectContentType?: ContentSniffer;
    /** Определение кодировки текста */
    detectCharset?: CharsetDetector;
}

export type ResolvedServeOptions = Required<ServeOptions>;

function normalizeMimeTypeMap(setting: MimeTypeMapSetting): MimeTypeMapSetting {
    const map: Record<string, string> = {};
    for (const [extension, mimeType] of Object.entries(setting.map)) {
        const key = extension.toLowerCase();
        map[key.startsWith('.') ? key : `.${key}`] = mimeType;
    }
    return { enabled: setting.enabled, map };
}

/**
 * Подставляет значения по умолчанию. Вызывается один раз при создании сервера,
 * глобальное состояние не читается.
 */
export function resolveServeOptions(
    options: ServeOptions = {}
): ResolvedServeOptions {
    const {
        mimeTypeMap = { enabled: false, map: {} },
        svgEnabled = true,
        cacheControl = DEFAULT_CACHE_CONTROL,
        enableLogging = false,
        logger = console,
        detectContentType: sniffer = detectContentType,
        detectCharset: charsetDetector = detectCharset,
    } = options;

    return {
        mimeTypeMap: normalizeMimeTypeMap(mimeTypeMap),
        svgEnabled,
        cacheControl,
        enableLogging,
        logger,
        detectContentType: sniffer,
        detectCharset: charsetDetector,
    };
}
