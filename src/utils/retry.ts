import type { RetryConfig } from '../types/config.types.js';
import { RetryExhaustedError, type RetryableErrorKind } from '../errors/index.js';

/**
 * How a failed remote call should be treated
 */
export type ErrorClass = RetryableErrorKind | 'fatal';

const RATE_LIMIT_INDICATORS = ['429', 'quota', 'rate'];

const TRANSIENT_INDICATORS = [
    'timeout',
    'connection',
    'network',
    'temporary',
    'unavailable',
    'service',
    '502',
    '503',
    '504',
    'gateway',
];

export interface RetryAttemptInfo {
    /** 1-based number of the attempt that just failed */
    attempt: number;
    kind: RetryableErrorKind;
    delayMs: number;
    error: Error;
}

export interface RetryOptions extends RetryConfig {
    /** Sleep implementation, replaced by tests */
    sleep?: (ms: number) => Promise<void>;
    onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Default retry options from retry config
 */
export function getRetryOptions(retryConfig: RetryConfig): RetryOptions {
    return { ...retryConfig };
}

/**
 * Classify an error by its message. Rate-limit wins over transient.
 */
export function classifyError(error: unknown): ErrorClass {
    const message = (error instanceof Error ? error.message : String(error)).toLowerCase();

    if (RATE_LIMIT_INDICATORS.some((indicator) => message.includes(indicator))) {
        return 'rate_limit';
    }

    if (TRANSIENT_INDICATORS.some((indicator) => message.includes(indicator))) {
        return 'transient';
    }

    return 'fatal';
}

/**
 * Calculate delay with exponential backoff
 * @param attempt - Zero-based index of the failed attempt
 */
export function calculateBackoffDelay(
    kind: RetryableErrorKind,
    attempt: number,
    config: Pick<RetryConfig, 'rateLimitBaseDelayMs' | 'transientBaseDelayMs' | 'transientMaxDelayMs'>
): number {
    if (kind === 'rate_limit') {
        return config.rateLimitBaseDelayMs * Math.pow(2, attempt);
    }
    return Math.min(config.transientBaseDelayMs * Math.pow(2, attempt), config.transientMaxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Execute a function with retry logic.
 *
 * Fatal errors are rethrown as they are. Retryable errors are retried until
 * `maxRetries` attempts have been made, then surface as RetryExhaustedError.
 * The class is decided again for every failure.
 */
export async function withRetry<T>(
    fn: (attempt: number) => Promise<T>,
    options: RetryOptions
): Promise<T> {
    const wait = options.sleep ?? sleep;

    for (let attempt = 0; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (caught) {
            const error = caught instanceof Error ? caught : new Error(String(caught));
            const kind = classifyError(error);

            if (kind === 'fatal') {
                throw error;
            }

            if (attempt >= options.maxRetries - 1) {
                throw new RetryExhaustedError(kind, attempt + 1, error);
            }

            const delayMs = calculateBackoffDelay(kind, attempt, options);
            options.onRetry?.({ attempt: attempt + 1, kind, delayMs, error });

            await wait(delayMs);
        }
    }
}
