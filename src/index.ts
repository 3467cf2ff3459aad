/**
 * paper-renamer: names scanned academic PDFs "{year} - {author} - {title}.pdf"
 * from metadata a vision model reads off their first pages
 *
 * @packageDocumentation
 */

// Main class
export { PaperRenamer, type PaperRenamerDependencies, type SetupStatus } from './paper-renamer.js';
export { VERSION } from './version.js';

// Types
export type {
    IVisionModel,
    VisionResponse,
    VisionGenerateOptions,
    IPageRenderer,
    PageImage,
    PaperRenamerConfig,
    ResolvedConfig,
    RenderConfig,
    RetryConfig,
    RateLimitConfig,
    FilenameConfig,
    GenerationConfig,
    LogConfig,
    MetadataRecord,
    PlacementResult,
    PlacementMode,
    AuthorField,
    TokenUsage,
    ProcessDirectoryOptions,
    ProcessFileOptions,
    BatchSummary,
} from './types/index.js';

// Config
export {
    configSchema,
    resolveConfig,
    DEFAULT_MODEL,
    DEFAULT_RESULTS_FILENAME,
    DEFAULT_RENDER_CONFIG,
    DEFAULT_RETRY_CONFIG,
    DEFAULT_RATE_LIMIT_CONFIG,
    DEFAULT_FILENAME_CONFIG,
    DEFAULT_GENERATION_CONFIG,
    DEFAULT_LOG_CONFIG,
} from './types/config.types.js';
export { loadEnv, type Env } from './config/env.js';

// Errors
export {
    PaperRenamerError,
    ConfigurationError,
    ValidationError,
    RenderError,
    GeminiAPIError,
    RetryExhaustedError,
    PlacementError,
    type RenderFailureReason,
    type RetryableErrorKind,
} from './errors/index.js';

// Engines and services
export { MetadataExtractor, type MetadataExtractorOptions } from './engines/extraction.engine.js';
export { BatchEngine, summarizeRecords } from './engines/batch.engine.js';
export {
    GeminiService,
    PopplerPageRenderer,
    FilePlacementService,
    ResultsStore,
    type CommandRunner,
    type CommandResult,
} from './services/index.js';

// Utilities
export {
    buildFilename,
    sanitizeFilenameComponent,
    reduceAuthor,
    withCounterSuffix,
    parseModelResponse,
    classifyError,
    calculateBackoffDelay,
    RateLimiter,
    PaperRenamerEventEmitter,
    type PaperRenamerEvents,
    type Clock,
    type Logger,
} from './utils/index.js';
