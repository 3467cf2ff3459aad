import { z } from 'zod';

/**
 * PDF rendering configuration
 */
export interface RenderConfig {
    /** Leading pages to render and send per PDF (default: 2) */
    maxPages: number;
    /** Raster resolution (default: 200) */
    dpi: number;
    /** pdftoppm executable (default: 'pdftoppm' on PATH) */
    pdftoppmPath: string;
    /** Timeout for one render call in milliseconds (default: 60000) */
    timeoutMs: number;
    /** Files larger than this log a slow-processing warning (default: 100 MB) */
    largeFileWarningBytes: number;
}

/**
 * Retry configuration for the model call
 */
export interface RetryConfig {
    /** Attempt budget per file (default: 3) */
    maxRetries: number;
    /** Base delay for rate-limit backoff (default: 60000) */
    rateLimitBaseDelayMs: number;
    /** Base delay for transient-error backoff (default: 5000) */
    transientBaseDelayMs: number;
    /** Cap for transient-error backoff (default: 60000) */
    transientMaxDelayMs: number;
}

/**
 * Spacing between successive model calls
 */
export interface RateLimitConfig {
    /** Minimum wall-clock interval between call starts (default: 6000) */
    minIntervalMs: number;
}

/**
 * Filename generation configuration
 */
export interface FilenameConfig {
    /** Maximum length of each filename component (default: 100) */
    maxLength: number;
}

/**
 * Logging configuration
 */
export interface LogConfig {
    /** Log level */
    level: 'debug' | 'info' | 'warn' | 'error';
    /** Enable structured JSON logging (default: true) */
    structured: boolean;
    /** Custom logger function */
    customLogger?: (level: string, message: string, meta?: Record<string, unknown>) => void;
}

/**
 * Generation configuration for Gemini API
 */
export interface GenerationConfig {
    /** Temperature for generation (0-2, default: 0.2) */
    temperature: number;
    /** Maximum output tokens (default: 1024) */
    maxOutputTokens: number;
}

/**
 * Main paper-renamer configuration
 */
export interface PaperRenamerConfig {
    /** Gemini API key */
    geminiApiKey: string;
    /** Gemini model to use (default: 'gemini-2.5-flash') */
    model?: string;
    /** Generation configuration (temperature, maxOutputTokens) */
    generationConfig?: Partial<GenerationConfig>;
    /** PDF rendering configuration */
    renderConfig?: Partial<RenderConfig>;
    /** Retry configuration */
    retryConfig?: Partial<RetryConfig>;
    /** Call spacing configuration */
    rateLimitConfig?: Partial<RateLimitConfig>;
    /** Filename configuration */
    filenameConfig?: Partial<FilenameConfig>;
    /** Logging configuration */
    logging?: Partial<LogConfig>;
    /** Name of the JSON results file (default: 'pdf_metadata_results.json') */
    resultsFilename?: string;
}

/**
 * Internal resolved configuration with all defaults applied
 */
export interface ResolvedConfig {
    readonly geminiApiKey: string;
    readonly model: string;
    readonly generationConfig: Readonly<GenerationConfig>;
    readonly renderConfig: Readonly<RenderConfig>;
    readonly retryConfig: Readonly<RetryConfig>;
    readonly rateLimitConfig: Readonly<RateLimitConfig>;
    readonly filenameConfig: Readonly<FilenameConfig>;
    readonly logging: Readonly<LogConfig>;
    readonly resultsFilename: string;
}

/**
 * Default configuration values
 */
export const DEFAULT_MODEL = 'gemini-2.5-flash';

export const DEFAULT_RESULTS_FILENAME = 'pdf_metadata_results.json';

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
    maxPages: 2,
    dpi: 200,
    pdftoppmPath: 'pdftoppm',
    timeoutMs: 60000,
    largeFileWarningBytes: 100 * 1024 * 1024,
};

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
    maxRetries: 3,
    rateLimitBaseDelayMs: 60000,
    transientBaseDelayMs: 5000,
    transientMaxDelayMs: 60000,
};

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
    minIntervalMs: 6000,
};

export const DEFAULT_FILENAME_CONFIG: FilenameConfig = {
    maxLength: 100,
};

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
    temperature: 0.2,
    maxOutputTokens: 1024,
};

export const DEFAULT_LOG_CONFIG: LogConfig = {
    level: 'info',
    structured: true,
};

/**
 * Zod schema for config validation
 */
export const configSchema = z.object({
    geminiApiKey: z.string().min(1, 'Gemini API key is required'),
    model: z.string().min(1).optional(),
    generationConfig: z
        .object({
            temperature: z.number().min(0).max(2).optional(),
            maxOutputTokens: z.number().int().min(1).optional(),
        })
        .optional(),
    renderConfig: z
        .object({
            maxPages: z.number().int().min(1).max(50).optional(),
            dpi: z.number().int().min(36).max(600).optional(),
            pdftoppmPath: z.string().min(1).optional(),
            timeoutMs: z.number().int().min(1000).optional(),
            largeFileWarningBytes: z.number().int().min(0).optional(),
        })
        .optional(),
    retryConfig: z
        .object({
            maxRetries: z.number().int().min(1).max(10).optional(),
            rateLimitBaseDelayMs: z.number().min(0).optional(),
            transientBaseDelayMs: z.number().min(0).optional(),
            transientMaxDelayMs: z.number().min(0).optional(),
        })
        .optional(),
    rateLimitConfig: z
        .object({
            minIntervalMs: z.number().min(0).optional(),
        })
        .optional(),
    filenameConfig: z
        .object({
            maxLength: z.number().int().min(1).max(255).optional(),
        })
        .optional(),
    logging: z
        .object({
            level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
            structured: z.boolean().optional(),
        })
        .optional(),
    resultsFilename: z.string().min(1).optional(),
});

/**
 * Resolve user config with defaults
 */
export function resolveConfig(userConfig: PaperRenamerConfig): ResolvedConfig {
    return Object.freeze({
        geminiApiKey: userConfig.geminiApiKey,
        model: userConfig.model ?? DEFAULT_MODEL,
        generationConfig: Object.freeze({
            ...DEFAULT_GENERATION_CONFIG,
            ...userConfig.generationConfig,
        }),
        renderConfig: Object.freeze({
            ...DEFAULT_RENDER_CONFIG,
            ...userConfig.renderConfig,
        }),
        retryConfig: Object.freeze({
            ...DEFAULT_RETRY_CONFIG,
            ...userConfig.retryConfig,
        }),
        rateLimitConfig: Object.freeze({
            ...DEFAULT_RATE_LIMIT_CONFIG,
            ...userConfig.rateLimitConfig,
        }),
        filenameConfig: Object.freeze({
            ...DEFAULT_FILENAME_CONFIG,
            ...userConfig.filenameConfig,
        }),
        logging: Object.freeze({
            ...DEFAULT_LOG_CONFIG,
            ...userConfig.logging,
        }),
        resultsFilename: userConfig.resultsFilename ?? DEFAULT_RESULTS_FILENAME,
    });
}
