export type {
    PaperRenamerConfig,
    ResolvedConfig,
    RenderConfig,
    RetryConfig,
    RateLimitConfig,
    FilenameConfig,
    GenerationConfig,
    LogConfig,
} from './config.types.js';

export type {
    MetadataRecord,
    PlacementResult,
    PlacementMode,
    AuthorField,
    TokenUsage,
} from './metadata.types.js';

export type { PageImage, IPageRenderer } from './renderer.types.js';

export type {
    IVisionModel,
    VisionResponse,
    VisionGenerateOptions,
} from './vision-model.types.js';

export type {
    ProcessDirectoryOptions,
    ProcessFileOptions,
    BatchSummary,
} from './batch.types.js';
