import { constants as fsConstants, type Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { ResolvedConfig } from '../types/config.types.js';
import type { MetadataRecord } from '../types/metadata.types.js';
import type { IPageRenderer } from '../types/renderer.types.js';
import type { BatchSummary, ProcessDirectoryOptions, ProcessFileOptions } from '../types/batch.types.js';
import { MetadataExtractor } from './extraction.engine.js';
import { FilePlacementService } from '../services/file-placement.service.js';
import { ResultsStore } from '../services/results.store.js';
import {
    ValidationError,
    errorMessage,
    generateCorrelationId,
    setCorrelationId,
    clearCorrelationId,
} from '../errors/index.js';
import { FILENAME_RULES } from '../config/constants.js';
import type { Logger } from '../utils/logger.js';
import type { PaperRenamerEventEmitter } from '../utils/events.js';
import type { RateLimiter } from '../utils/rate-limiter.js';
import { createErrorRecord, isSuccessfulRecord } from '../utils/metadata-records.js';

/**
 * Build the summary of a finished run
 */
export function summarizeRecords(records: MetadataRecord[]): BatchSummary {
    const succeeded = records.filter(isSuccessfulRecord).length;
    return {
        total: records.length,
        succeeded,
        failed: records.length - succeeded,
        placed: records.filter((record) => record.placement?.copied === true).length,
        records,
    };
}

function isValidPageCount(maxPages: number): boolean {
    return Number.isInteger(maxPages) && maxPages >= 1;
}

/**
 * Batch Engine
 *
 * Walks a directory of PDFs one file at a time: render, extract, place,
 * persist. Every discovered file yields exactly one record.
 */
export class BatchEngine {
    constructor(
        private readonly config: ResolvedConfig,
        private readonly renderer: IPageRenderer,
        private readonly extractor: MetadataExtractor,
        private readonly placement: FilePlacementService,
        private readonly rateLimiter: RateLimiter,
        private readonly logger: Logger,
        private readonly events: PaperRenamerEventEmitter
    ) { }

    /**
     * Process one PDF: render its leading pages, extract metadata and, when an
     * output directory is given and extraction succeeded, place the file.
     */
    async processFile(pdfPath: string, options: ProcessFileOptions = {}): Promise<MetadataRecord> {
        const filename = path.basename(pdfPath);
        const maxPages = options.maxPages ?? this.config.renderConfig.maxPages;

        if (!isValidPageCount(maxPages)) {
            return createErrorRecord('maxPages must be an integer of at least 1', filename);
        }

        const images = await this.renderer.render(pdfPath, maxPages);
        if (images.length === 0) {
            return createErrorRecord('Failed to convert PDF to images', filename);
        }

        const record = await this.extractor.extract(images, filename, maxPages);

        if (options.outputDir === undefined || !isSuccessfulRecord(record)) {
            return record;
        }

        const placement = await this.placement.place(
            pdfPath,
            record,
            options.outputDir,
            options.mode ?? 'copy'
        );
        return { ...record, placement };
    }

    /**
     * Process every PDF directly inside `sourceDir`, in name order.
     *
     * An invalid source directory or page count yields an empty list and a
     * `batch:invalid` event; nothing is processed.
     */
    async processDirectory(
        sourceDir: string,
        options: ProcessDirectoryOptions = {}
    ): Promise<MetadataRecord[]> {
        const maxPages = options.maxPages ?? this.config.renderConfig.maxPages;

        const invalid = isValidPageCount(maxPages)
            ? await this.checkSourceDirectory(sourceDir)
            : new ValidationError('maxPages must be an integer of at least 1', 'maxPages');
        if (invalid) {
            return this.reject(sourceDir, invalid);
        }

        let pdfFiles: string[];
        try {
            pdfFiles = await this.discoverPdfFiles(sourceDir);
        } catch (error) {
            return this.reject(
                sourceDir,
                new ValidationError(`Failed to scan directory: ${errorMessage(error)}`, 'sourceDir')
            );
        }

        if (pdfFiles.length === 0) {
            this.logger.warn('No PDF files found', { sourceDir });
            this.events.emit('batch:complete', summarizeRecords([]));
            return [];
        }

        this.logger.info('Processing PDF files', {
            sourceDir,
            fileCount: pdfFiles.length,
            outputDir: options.outputDir,
            maxPages,
        });
        this.events.emit('batch:start', {
            sourceDir,
            fileCount: pdfFiles.length,
            outputDir: options.outputDir,
            resultsPath: options.resultsPath,
        });

        const store = options.resultsPath !== undefined
            ? new ResultsStore(options.resultsPath, this.logger)
            : undefined;
        const fileOptions: ProcessFileOptions = {
            outputDir: options.outputDir,
            maxPages,
            mode: options.mode,
        };
        const records: MetadataRecord[] = [];

        try {
            for (const [index, pdfPath] of pdfFiles.entries()) {
                const filename = path.basename(pdfPath);

                const waitedMs = await this.rateLimiter.waitTurn();
                if (waitedMs > 0) {
                    this.logger.debug('Waited for rate limit', { delayMs: waitedMs });
                    this.events.emit('rate-limit:wait', { delayMs: waitedMs });
                }

                setCorrelationId(generateCorrelationId());
                this.logger.info('Processing PDF', { filename, index: index + 1, total: pdfFiles.length });
                this.events.emit('file:start', { index, total: pdfFiles.length, filename });

                const startTime = Date.now();
                this.rateLimiter.begin();
                const record = await this.processFileSafely(pdfPath, fileOptions);
                this.rateLimiter.complete(isSuccessfulRecord(record));
                records.push(record);

                if (store) {
                    const saved = await store.append(record);
                    this.events.emit('results:saved', {
                        resultsPath: store.resultsPath,
                        filename,
                        saved,
                    });
                }

                this.logRecord(record);
                this.events.emit('file:complete', {
                    index,
                    total: pdfFiles.length,
                    record,
                    durationMs: Date.now() - startTime,
                });
            }
        } finally {
            clearCorrelationId();
        }

        const summary = summarizeRecords(records);
        this.logger.info('Batch complete', {
            total: summary.total,
            succeeded: summary.succeeded,
            failed: summary.failed,
            placed: summary.placed,
        });
        this.events.emit('batch:complete', summary);

        return records;
    }

    /**
     * PDF files directly inside a directory, sorted by name.
     * The extension match ignores case; symlinks to files are included.
     */
    async discoverPdfFiles(sourceDir: string): Promise<string[]> {
        const entries = await fs.readdir(sourceDir, { withFileTypes: true });
        const pdfFiles: string[] = [];

        for (const entry of entries) {
            if (path.extname(entry.name).toLowerCase() !== FILENAME_RULES.EXTENSION) {
                continue;
            }
            const entryPath = path.join(sourceDir, entry.name);
            if (await this.isFileEntry(entry, entryPath)) {
                pdfFiles.push(entryPath);
            }
        }

        return pdfFiles.sort((a, b) => {
            const nameA = path.basename(a);
            const nameB = path.basename(b);
            return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
        });
    }

    private async isFileEntry(entry: Dirent, entryPath: string): Promise<boolean> {
        if (entry.isFile()) {
            return true;
        }
        if (!entry.isSymbolicLink()) {
            return false;
        }
        const target = await fs.stat(entryPath).catch(() => undefined);
        return target?.isFile() ?? false;
    }

    private async checkSourceDirectory(sourceDir: string): Promise<ValidationError | undefined> {
        const stats = await fs.stat(sourceDir).catch(() => undefined);
        if (!stats) {
            return new ValidationError(`Directory does not exist: ${sourceDir}`, 'sourceDir');
        }
        if (!stats.isDirectory()) {
            return new ValidationError(`Path is not a directory: ${sourceDir}`, 'sourceDir');
        }
        try {
            await fs.access(sourceDir, fsConstants.R_OK);
        } catch {
            return new ValidationError(`No read permission for directory: ${sourceDir}`, 'sourceDir');
        }
        return undefined;
    }

    private reject(sourceDir: string, error: ValidationError): MetadataRecord[] {
        this.logger.error('Cannot process directory', { sourceDir, field: error.field, reason: error.message });
        this.events.emit('batch:invalid', { sourceDir, reason: error.message });
        return [];
    }

    private async processFileSafely(pdfPath: string, options: ProcessFileOptions): Promise<MetadataRecord> {
        try {
            return await this.processFile(pdfPath, options);
        } catch (error) {
            const message = `Unexpected error: ${errorMessage(error)}`;
            this.logger.error('Processing failed', { filename: path.basename(pdfPath), error: message });
            return createErrorRecord(message, path.basename(pdfPath));
        }
    }

    private logRecord(record: MetadataRecord): void {
        if (record.error !== undefined) {
            this.logger.warn('Extraction failed', {
                filename: record.source_filename,
                error: record.error,
            });
            return;
        }

        this.logger.info('Metadata extracted', {
            filename: record.source_filename,
            title: record.title,
            author: record.author,
            year: record.year,
            outputFilename: record.placement?.output_filename,
        });
    }
}
