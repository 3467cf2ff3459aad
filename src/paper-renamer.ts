import * as path from 'path';
import type { PaperRenamerConfig, ResolvedConfig } from './types/config.types.js';
import type { MetadataRecord, PlacementMode, PlacementResult } from './types/metadata.types.js';
import type { IPageRenderer, PageImage } from './types/renderer.types.js';
import type { IVisionModel } from './types/vision-model.types.js';
import type { ProcessDirectoryOptions, ProcessFileOptions } from './types/batch.types.js';
import { configSchema, resolveConfig } from './types/config.types.js';
import { ConfigurationError } from './errors/index.js';
import { createLogger, createEventEmitter, RateLimiter, systemClock } from './utils/index.js';
import type { Logger } from './utils/logger.js';
import type { Clock } from './utils/rate-limiter.js';
import type { PaperRenamerEventEmitter } from './utils/events.js';
import { GeminiService } from './services/gemini.service.js';
import { PopplerPageRenderer } from './services/pdf.renderer.js';
import { FilePlacementService } from './services/file-placement.service.js';
import { ResultsStore } from './services/results.store.js';
import { MetadataExtractor } from './engines/extraction.engine.js';
import { BatchEngine } from './engines/batch.engine.js';

/**
 * Replaceable collaborators, mostly for tests
 */
export interface PaperRenamerDependencies {
    model?: IVisionModel;
    renderer?: IPageRenderer;
    logger?: Logger;
    /** Time source for call spacing and retry backoff */
    clock?: Clock;
}

export interface SetupStatus {
    ready: boolean;
    model: string;
    renderer: { available: boolean; detail: string };
}

/**
 * Renames scanned academic PDFs from the metadata on their first pages
 *
 * @example
 * ```typescript
 * import { PaperRenamer } from 'paper-renamer';
 *
 * const renamer = new PaperRenamer({ geminiApiKey: 'your-api-key' });
 *
 * const records = await renamer.processDirectory('./scans', {
 *   outputDir: './renamed',
 *   resultsPath: './renamed/pdf_metadata_results.json',
 * });
 * ```
 */
export class PaperRenamer {
    private readonly config: ResolvedConfig;
    private readonly logger: Logger;
    private readonly eventEmitter: PaperRenamerEventEmitter;
    private readonly renderer: IPageRenderer;

    private readonly extractor: MetadataExtractor;
    private readonly placement: FilePlacementService;
    private readonly batchEngine: BatchEngine;

    constructor(userConfig: PaperRenamerConfig, dependencies: PaperRenamerDependencies = {}) {
        const validation = configSchema.safeParse(userConfig);
        if (!validation.success) {
            throw new ConfigurationError('Invalid configuration', {
                errors: validation.error.errors,
            });
        }

        this.config = resolveConfig(userConfig);
        this.logger = dependencies.logger ?? createLogger(this.config.logging);
        this.eventEmitter = createEventEmitter();

        const clock = dependencies.clock ?? systemClock;
        const rateLimiter = new RateLimiter(this.config.rateLimitConfig, clock);
        const model = dependencies.model ?? new GeminiService(this.config, this.logger);
        this.renderer = dependencies.renderer ?? new PopplerPageRenderer(this.config.renderConfig, this.logger);

        this.extractor = new MetadataExtractor(this.config, model, this.logger, {
            events: this.eventEmitter,
            sleep: (ms) => clock.sleep(ms),
        });
        this.placement = new FilePlacementService(this.config.filenameConfig, this.logger);
        this.batchEngine = new BatchEngine(
            this.config,
            this.renderer,
            this.extractor,
            this.placement,
            rateLimiter,
            this.logger,
            this.eventEmitter
        );

        this.logger.debug('paper-renamer initialized', {
            model: this.config.model,
            maxPages: this.config.renderConfig.maxPages,
        });
    }

    /**
     * Get the resolved configuration
     */
    getConfig(): ResolvedConfig {
        return this.config;
    }

    /**
     * Progress events of directory runs
     */
    get events(): PaperRenamerEventEmitter {
        return this.eventEmitter;
    }

    /**
     * Where a run writes its results file by default
     */
    defaultResultsPath(directory: string): string {
        return path.join(directory, this.config.resultsFilename);
    }

    // ============================================
    // PROCESSING
    // ============================================

    async processDirectory(sourceDir: string, options: ProcessDirectoryOptions = {}): Promise<MetadataRecord[]> {
        return this.batchEngine.processDirectory(sourceDir, options);
    }

    async processFile(pdfPath: string, options: ProcessFileOptions = {}): Promise<MetadataRecord> {
        return this.batchEngine.processFile(pdfPath, options);
    }

    /**
     * Extract metadata from already rendered pages
     */
    async extract(images: readonly PageImage[], filename: string, maxPages?: number): Promise<MetadataRecord> {
        return this.extractor.extract(images, filename, maxPages);
    }

    /**
     * Place a PDF under the name generated from `record`
     */
    async place(
        sourcePath: string,
        record: MetadataRecord,
        outputDir: string,
        mode: PlacementMode = 'copy'
    ): Promise<PlacementResult> {
        return this.placement.place(sourcePath, record, outputDir, mode);
    }

    /**
     * Read back a results file
     */
    async readResults(resultsPath: string): Promise<MetadataRecord[]> {
        return new ResultsStore(resultsPath, this.logger).readAll();
    }

    // ============================================
    // SETUP CHECK
    // ============================================

    /**
     * Check that the page renderer can run
     */
    async checkSetup(): Promise<SetupStatus> {
        const renderer = this.renderer.checkAvailability
            ? await this.renderer.checkAvailability()
            : { available: true, detail: 'custom renderer' };

        return {
            ready: renderer.available,
            model: this.config.model,
            renderer,
        };
    }
}
