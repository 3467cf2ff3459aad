export { createLogger } from './logger.js';
export type { Logger, LogMeta } from './logger.js';

export {
    withRetry,
    sleep,
    classifyError,
    calculateBackoffDelay,
    getRetryOptions,
} from './retry.js';
export type { RetryOptions, RetryAttemptInfo, ErrorClass } from './retry.js';

export { RateLimiter, systemClock } from './rate-limiter.js';
export type { Clock } from './rate-limiter.js';

export { PaperRenamerEventEmitter, createEventEmitter } from './events.js';
export type { PaperRenamerEvents } from './events.js';

export {
    buildFilename,
    sanitizeFilenameComponent,
    reduceAuthor,
    withCounterSuffix,
} from './filename.js';
export type { FilenameOptions } from './filename.js';

export { parseModelResponse, extractJsonText, normalizeAuthor } from './response-parser.js';

export { createErrorRecord, createFallbackRecord, isSuccessfulRecord } from './metadata-records.js';
