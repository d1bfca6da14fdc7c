export type {
    BlobPath,
    BlobReader,
    ByteSource,
    CharsetDetector,
    ContentBlob,
    ContentKind,
    ContentRequest,
    ContentSniffer,
    ETagValue,
    FileExtension,
    Logger,
    MimeTypeMapSetting,
    Range,
    RangeHeaderValue,
    SniffedType,
} from './types.js';

export {
    CharsetDetectionError,
    MalformedRangeError,
    ServeError,
    type ServeErrorCode,
    SourceReadError,
    WriteError,
} from './errors.js';

export {
    DEFAULT_CACHE_CONTROL,
    type ResolvedServeOptions,
    type ServeOptions,
    resolveServeOptions,
} from './options.js';

export {
    type BlobServer,
    RENDER_QUERY_PARAM,
    createBlobServer,
    parseBooleanFlag,
    serveBlob,
} from './blobServer.js';

export { respondContent } from './contentResponder.js';

export {
    type ContentPolicyInput,
    type DispositionType,
    SVG_CONTENT_SECURITY_POLICY,
    decideContentHeaders,
    fileExtension,
    formatContentDisposition,
    lookupMappedMimeType,
    normalizeFileName,
    shouldRenderAsText,
} from './contentPolicy.js';

export {
    SNIFF_SAMPLE_SIZE,
    SVG_MIME_TYPE,
    detectContentType,
} from './typeSniffer.js';

export { detectCharset } from './charset.js';

export { handleETagCache, ifNoneMatchMatches } from './etagCache.js';

export { parseRangeHeader, ifRangeMatches } from './rangeUtils.js';

export {
    type MemoryBlobOptions,
    type ReaderSourceOptions,
    createChunkedStream,
    createMemoryBlob,
    createReaderSource,
    gitBlobId,
} from './readerSource.js';

export { type ResponseSink, sendResponse } from './nodeResponse.js';

export { errorToResponse } from './errorResponse.js';
