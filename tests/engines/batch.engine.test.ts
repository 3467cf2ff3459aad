import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { BatchEngine, summarizeRecords } from '../../src/engines/batch.engine.js';
import { MetadataExtractor } from '../../src/engines/extraction.engine.js';
import { FilePlacementService } from '../../src/services/file-placement.service.js';
import { RateLimiter } from '../../src/utils/rate-limiter.js';
import { createEventEmitter, type PaperRenamerEventEmitter } from '../../src/utils/events.js';
import type { IPageRenderer } from '../../src/types/renderer.types.js';
import type { IVisionModel } from '../../src/types/vision-model.types.js';
import {
    createFakeClock,
    createMetadataRecord,
    createMockLogger,
    createMockRenderer,
    createMockVisionModel,
    createTempDir,
    removeTempDir,
    visionResponse,
    writeFakePdf,
    createTestConfig,
    type FakeClock,
    type MockRenderer,
    type MockVisionModel,
} from '../mocks/index.js';

function createEngine(
    model: IVisionModel,
    renderer: IPageRenderer,
    clock: FakeClock
): { engine: BatchEngine; events: PaperRenamerEventEmitter } {
    const config = createTestConfig();
    const logger = createMockLogger();
    const events = createEventEmitter();
    const extractor = new MetadataExtractor(config, model, logger, { events, sleep: clock.sleep });
    const placement = new FilePlacementService(config.filenameConfig, logger);
    const rateLimiter = new RateLimiter(config.rateLimitConfig, clock);

    return {
        engine: new BatchEngine(config, renderer, extractor, placement, rateLimiter, logger, events),
        events,
    };
}

describe('BatchEngine', () => {
    let dir: string;
    let sourceDir: string;
    let outputDir: string;
    let resultsPath: string;
    let model: MockVisionModel;
    let renderer: MockRenderer & IPageRenderer;
    let clock: FakeClock;
    let engine: BatchEngine;
    let events: PaperRenamerEventEmitter;

    beforeEach(async () => {
        dir = await createTempDir();
        sourceDir = path.join(dir, 'scans');
        outputDir = path.join(dir, 'renamed');
        resultsPath = path.join(outputDir, 'pdf_metadata_results.json');
        await fs.mkdir(sourceDir);

        model = createMockVisionModel('{"title":"T","author":"A","year":"2021"}');
        renderer = createMockRenderer();
        clock = createFakeClock();
        ({ engine, events } = createEngine(model, renderer, clock));
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    describe('processDirectory', () => {
        it('should extract, copy and record a single PDF', async () => {
            await writeFakePdf(sourceDir, 'scan_0001.pdf', 'scanned bytes');

            const records = await engine.processDirectory(sourceDir, { outputDir, resultsPath });

            expect(records).toHaveLength(1);
            expect(records[0]).toEqual({
                title: 'T',
                author: 'A',
                year: '2021',
                source_filename: 'scan_0001.pdf',
                placement: {
                    copied: true,
                    source_filename: 'scan_0001.pdf',
                    output_filename: '2021 - A - T.pdf',
                    source_path: path.join(sourceDir, 'scan_0001.pdf'),
                    output_path: path.join(outputDir, '2021 - A - T.pdf'),
                    mode: 'copy',
                },
            });
            await expect(fs.readFile(path.join(outputDir, '2021 - A - T.pdf'), 'utf8')).resolves.toBe('scanned bytes');

            const saved: unknown = JSON.parse(await fs.readFile(resultsPath, 'utf8'));
            expect(saved).toEqual([records[0]]);
        });

        it('should process PDFs in name order and skip other files', async () => {
            await writeFakePdf(sourceDir, 'b.PDF');
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'notes.txt');
            await fs.mkdir(path.join(sourceDir, 'c.pdf'));

            const records = await engine.processDirectory(sourceDir);

            expect(records.map((record) => record.source_filename)).toEqual(['a.pdf', 'b.PDF']);
        });

        it('should give colliding names a counter', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');

            const records = await engine.processDirectory(sourceDir, { outputDir });

            expect(records.map((record) => record.placement?.output_filename)).toEqual([
                '2021 - A - T.pdf',
                '2021 - A - T (1).pdf',
            ]);
        });

        it('should keep going after a malformed response', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');
            model.generateWithVision
                .mockResolvedValueOnce(visionResponse('Sorry, I cannot help with that.'))
                .mockResolvedValueOnce(visionResponse('{"title":"T","author":"A","year":"2021"}'));

            const records = await engine.processDirectory(sourceDir, { resultsPath });

            expect(records).toHaveLength(2);
            expect(records[0].parse_error).toBeDefined();
            expect(records[0].raw_response).toBe('Sorry, I cannot help with that.');
            expect(records[1].title).toBe('T');

            const saved: unknown = JSON.parse(await fs.readFile(resultsPath, 'utf8'));
            expect(saved).toEqual(records);
        });

        it('should record render failures without calling the model', async () => {
            await writeFakePdf(sourceDir, 'a_broken.pdf');
            await writeFakePdf(sourceDir, 'b_fine.pdf');
            renderer.render.mockResolvedValueOnce([]);

            const records = await engine.processDirectory(sourceDir, { outputDir });

            expect(records[0]).toEqual({
                title: 'Error',
                author: 'Error',
                year: 'Error',
                source_filename: 'a_broken.pdf',
                error: 'Failed to convert PDF to images',
            });
            expect(records[1].placement?.copied).toBe(true);
            expect(model.generateWithVision).toHaveBeenCalledTimes(1);
        });

        it('should move files in move mode', async () => {
            const sourcePath = await writeFakePdf(sourceDir, 'a.pdf');

            const [record] = await engine.processDirectory(sourceDir, { outputDir, mode: 'move' });

            expect(record.placement?.mode).toBe('move');
            await expect(fs.access(sourcePath)).rejects.toThrow();
            await expect(fs.access(path.join(outputDir, '2021 - A - T.pdf'))).resolves.toBeUndefined();
        });

        it('should render the requested number of pages', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');

            await engine.processDirectory(sourceDir, { maxPages: 1 });

            expect(renderer.render).toHaveBeenCalledWith(path.join(sourceDir, 'a.pdf'), 1);
        });
    });

    describe('call spacing', () => {
        it('should space successful calls by the minimum interval', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');
            await writeFakePdf(sourceDir, 'c.pdf');
            const waits = vi.fn();
            events.on('rate-limit:wait', waits);

            await engine.processDirectory(sourceDir);

            expect(clock.sleeps).toEqual([6000, 6000]);
            expect(waits.mock.calls).toEqual([[{ delayMs: 6000 }], [{ delayMs: 6000 }]]);
        });

        it('should subtract processing time from the wait', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');
            model.generateWithVision.mockImplementation(async () => {
                clock.advance(2500);
                return visionResponse('{"title":"T","author":"A","year":"2021"}');
            });

            await engine.processDirectory(sourceDir);

            expect(clock.sleeps).toEqual([3500]);
        });

        it('should not wait after a failed file', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');
            await writeFakePdf(sourceDir, 'c.pdf');
            model.generateWithVision.mockRejectedValueOnce(new Error('Invalid request'));

            const records = await engine.processDirectory(sourceDir);

            expect(records[0].error).toBe('API call failed: Invalid request');
            expect(clock.sleeps).toEqual([6000]);
        });
    });

    describe('validation', () => {
        it('should reject a missing directory', async () => {
            const missing = path.join(dir, 'nope');
            const invalid = vi.fn();
            events.on('batch:invalid', invalid);

            await expect(engine.processDirectory(missing)).resolves.toEqual([]);
            expect(invalid).toHaveBeenCalledWith({ sourceDir: missing, reason: `Directory does not exist: ${missing}` });
        });

        it('should reject a file given as directory', async () => {
            const file = await writeFakePdf(dir, 'single.pdf');
            const invalid = vi.fn();
            events.on('batch:invalid', invalid);

            await expect(engine.processDirectory(file)).resolves.toEqual([]);
            expect(invalid).toHaveBeenCalledWith({ sourceDir: file, reason: `Path is not a directory: ${file}` });
        });

        it('should reject a page count below 1', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            const invalid = vi.fn();
            events.on('batch:invalid', invalid);

            await expect(engine.processDirectory(sourceDir, { maxPages: 0 })).resolves.toEqual([]);
            expect(invalid).toHaveBeenCalledWith({
                sourceDir,
                reason: 'maxPages must be an integer of at least 1',
            });
            expect(renderer.render).not.toHaveBeenCalled();
        });

        it('should finish quietly when there are no PDFs', async () => {
            const complete = vi.fn();
            events.on('batch:complete', complete);

            await expect(engine.processDirectory(sourceDir)).resolves.toEqual([]);
            expect(complete).toHaveBeenCalledWith({ total: 0, succeeded: 0, failed: 0, placed: 0, records: [] });
        });
    });

    describe('events', () => {
        it('should report progress for every file', async () => {
            await writeFakePdf(sourceDir, 'a.pdf');
            await writeFakePdf(sourceDir, 'b.pdf');
            const started = vi.fn();
            const saved = vi.fn();
            const complete = vi.fn();
            events.on('file:start', started);
            events.on('results:saved', saved);
            events.on('batch:complete', complete);

            await engine.processDirectory(sourceDir, { resultsPath });

            expect(started.mock.calls).toEqual([
                [{ index: 0, total: 2, filename: 'a.pdf' }],
                [{ index: 1, total: 2, filename: 'b.pdf' }],
            ]);
            expect(saved).toHaveBeenCalledWith({ resultsPath, filename: 'b.pdf', saved: true });
            expect(complete).toHaveBeenCalledWith(expect.objectContaining({ total: 2, succeeded: 2, failed: 0 }));
        });
    });

    describe('processFile', () => {
        it('should not place files without an output directory', async () => {
            const pdfPath = await writeFakePdf(sourceDir, 'a.pdf');

            const record = await engine.processFile(pdfPath);

            expect(record).toEqual({ title: 'T', author: 'A', year: '2021', source_filename: 'a.pdf' });
        });

        it('should not place files whose extraction failed', async () => {
            const pdfPath = await writeFakePdf(sourceDir, 'a.pdf');
            model.generateWithVision.mockRejectedValue(new Error('Invalid request'));

            const record = await engine.processFile(pdfPath, { outputDir });

            expect(record.placement).toBeUndefined();
            await expect(fs.access(outputDir)).rejects.toThrow();
        });
    });

    describe('summarizeRecords', () => {
        it('should count outcomes', () => {
            const placed = createMetadataRecord({
                placement: { copied: true, source_filename: 'a.pdf', output_filename: 'x.pdf' },
            });
            const failed = createMetadataRecord({ error: 'boom' });
            const unplaced = createMetadataRecord();

            expect(summarizeRecords([placed, failed, unplaced])).toEqual({
                total: 3,
                succeeded: 2,
                failed: 1,
                placed: 1,
                records: [placed, failed, unplaced],
            });
        });
    });
});
