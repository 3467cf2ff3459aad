/**
 * Error context for correlation and tracing
 */
export interface ErrorContext {
    /** Unique correlation ID for request tracing */
    correlationId?: string;
    /** Timestamp when error occurred */
    timestamp?: Date;
    /** Original cause of the error */
    cause?: Error;
    /** Operation that was being performed */
    operation?: string;
}

/**
 * Generate a unique correlation ID
 */
export function generateCorrelationId(): string {
    return `prn_${Date.now()}_${Math.random().toString(36).substring(2, 11)}`;
}

/**
 * Current correlation ID, set per processed file by the batch engine
 */
let currentCorrelationId: string | undefined;

export function setCorrelationId(id: string): void {
    currentCorrelationId = id;
}

export function getCorrelationId(): string {
    return currentCorrelationId ?? generateCorrelationId();
}

export function clearCorrelationId(): void {
    currentCorrelationId = undefined;
}

/**
 * Base error class for paper-renamer
 * All errors extend this class for consistent handling
 */
export class PaperRenamerError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly correlationId: string;
    public readonly timestamp: Date;
    public readonly cause?: Error;
    public readonly operation?: string;

    constructor(
        message: string,
        code: string,
        details?: Record<string, unknown>,
        context?: ErrorContext
    ) {
        super(message);
        this.name = 'PaperRenamerError';
        this.code = code;
        this.details = details;
        this.correlationId = context?.correlationId ?? getCorrelationId();
        this.timestamp = context?.timestamp ?? new Date();
        this.cause = context?.cause;
        this.operation = context?.operation;
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            correlationId: this.correlationId,
            timestamp: this.timestamp.toISOString(),
            operation: this.operation,
            cause: this.cause ? {
                name: this.cause.name,
                message: this.cause.message,
            } : undefined,
        };
    }
}

/**
 * Extract a message from anything that was thrown
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Configuration-related errors
 */
export class ConfigurationError extends PaperRenamerError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, 'CONFIGURATION_ERROR', details);
        this.name = 'ConfigurationError';
    }
}

/**
 * Validation errors for caller-supplied input (paths, page counts)
 */
export class ValidationError extends PaperRenamerError {
    public readonly field?: string;

    constructor(message: string, field?: string, details?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { field, ...details });
        this.name = 'ValidationError';
        this.field = field;
    }
}

/**
 * Why a PDF could not be rendered
 */
export type RenderFailureReason =
    | 'missing'
    | 'unreadable'
    | 'empty'
    | 'encrypted'
    | 'corrupted'
    | 'no-pages'
    | 'unknown';

/**
 * PDF rendering errors
 */
export class RenderError extends PaperRenamerError {
    public readonly filename: string;
    public readonly reason: RenderFailureReason;

    constructor(message: string, filename: string, reason: RenderFailureReason, cause?: Error) {
        super(message, 'RENDER_ERROR', { filename, reason }, { cause });
        this.name = 'RenderError';
        this.filename = filename;
        this.reason = reason;
    }
}

/**
 * Gemini API specific errors
 */
export class GeminiAPIError extends PaperRenamerError {
    public readonly statusCode?: number;

    constructor(
        message: string,
        options: {
            statusCode?: number;
            cause?: Error;
            details?: Record<string, unknown>;
        } = {}
    ) {
        super(message, 'GEMINI_API_ERROR', options.details, { cause: options.cause });
        this.name = 'GeminiAPIError';
        this.statusCode = options.statusCode;
    }
}

/**
 * Retryable failure classes of a remote call
 */
export type RetryableErrorKind = 'rate_limit' | 'transient';

/**
 * Raised when a retryable remote failure persists past the retry budget
 */
export class RetryExhaustedError extends PaperRenamerError {
    public readonly kind: RetryableErrorKind;
    public readonly attempts: number;

    constructor(kind: RetryableErrorKind, attempts: number, cause: Error) {
        const label = kind === 'rate_limit' ? 'Rate limit' : 'Transient error';
        super(
            `${label} exceeded after ${attempts} attempts: ${cause.message}`,
            'RETRY_EXHAUSTED',
            { kind, attempts },
            { cause }
        );
        this.name = 'RetryExhaustedError';
        this.kind = kind;
        this.attempts = attempts;
    }
}

/**
 * File placement errors (path traversal and similar refusals)
 */
export class PlacementError extends PaperRenamerError {
    public readonly outputPath: string;

    constructor(message: string, outputPath: string) {
        super(message, 'PLACEMENT_ERROR', { outputPath });
        this.name = 'PlacementError';
        this.outputPath = outputPath;
    }
}
