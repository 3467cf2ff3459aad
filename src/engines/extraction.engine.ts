import type { ResolvedConfig } from '../types/config.types.js';
import type { MetadataRecord } from '../types/metadata.types.js';
import type { PageImage } from '../types/renderer.types.js';
import type { IVisionModel } from '../types/vision-model.types.js';
import { RetryExhaustedError, errorMessage } from '../errors/index.js';
import { buildExtractionPrompt } from '../config/templates.js';
import type { Logger } from '../utils/logger.js';
import type { PaperRenamerEventEmitter } from '../utils/events.js';
import { withRetry, getRetryOptions, sleep } from '../utils/retry.js';
import { parseModelResponse } from '../utils/response-parser.js';
import { createErrorRecord } from '../utils/metadata-records.js';

export interface MetadataExtractorOptions {
    /** Receives `extraction:retry` events */
    events?: PaperRenamerEventEmitter;
    /** Backoff sleep, replaced by tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Metadata Extractor
 *
 * Sends rendered pages to the vision model and turns whatever comes back into
 * a MetadataRecord. Never throws: remote failures become error records and
 * unusable responses become fallback records.
 */
export class MetadataExtractor {
    private readonly config: ResolvedConfig;
    private readonly model: IVisionModel;
    private readonly logger: Logger;
    private readonly events?: PaperRenamerEventEmitter;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(
        config: ResolvedConfig,
        model: IVisionModel,
        logger: Logger,
        options: MetadataExtractorOptions = {}
    ) {
        this.config = config;
        this.model = model;
        this.logger = logger;
        this.events = options.events;
        this.sleep = options.sleep ?? sleep;
    }

    /**
     * Extract title, author and year from page images
     * @param images - Rendered pages, first page first
     * @param filename - Source PDF filename, copied onto the record
     * @param maxPages - Pages to send; extra images are dropped
     */
    async extract(
        images: readonly PageImage[],
        filename: string,
        maxPages: number = this.config.renderConfig.maxPages
    ): Promise<MetadataRecord> {
        const pages = images.slice(0, maxPages);
        if (pages.length === 0) {
            return createErrorRecord('No images to process', filename);
        }

        const prompt = buildExtractionPrompt();
        const retryOptions = getRetryOptions(this.config.retryConfig);

        try {
            const response = await withRetry(
                () => this.model.generateWithVision(prompt, pages),
                {
                    ...retryOptions,
                    sleep: this.sleep,
                    onRetry: ({ attempt, kind, delayMs, error }) => {
                        this.logger.warn('Model call failed, backing off', {
                            filename,
                            kind,
                            attempt,
                            maxAttempts: retryOptions.maxRetries,
                            delayMs,
                            error: error.message,
                        });
                        this.events?.emit('extraction:retry', {
                            filename,
                            attempt,
                            maxAttempts: retryOptions.maxRetries,
                            kind,
                            delayMs,
                        });
                    },
                }
            );

            this.logger.debug('Model response received', {
                filename,
                pages: pages.length,
                tokenUsage: response.tokenUsage,
            });

            const record = parseModelResponse(response.text, filename);
            if (record.parse_error !== undefined) {
                this.logger.warn('Model response is not usable metadata', {
                    filename,
                    parseError: record.parse_error,
                });
            }
            return record;
        } catch (error) {
            const message = error instanceof RetryExhaustedError
                ? error.message
                : `API call failed: ${errorMessage(error)}`;

            this.logger.error('Metadata extraction failed', { filename, error: message });
            return createErrorRecord(message, filename);
        }
    }
}
