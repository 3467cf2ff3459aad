#!/usr/bin/env node

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import * as path from 'path';
import type { LogConfig, RenderConfig } from '../types/config.types.js';
import type { MetadataRecord } from '../types/metadata.types.js';
import { DEFAULT_LOG_CONFIG, DEFAULT_RENDER_CONFIG } from '../types/config.types.js';
import { PROCESSING_LIMITS } from '../config/constants.js';
import { loadEnv, type Env } from '../config/env.js';
import { errorMessage } from '../errors/index.js';
import { PaperRenamer } from '../paper-renamer.js';
import { PopplerPageRenderer } from '../services/pdf.renderer.js';
import { ResultsStore } from '../services/results.store.js';
import { createLogger } from '../utils/logger.js';
import { summarizeRecords } from '../engines/batch.engine.js';
import { VERSION } from '../version.js';

type LogLevel = LogConfig['level'];

interface RunOptions {
    copy: boolean;
    move?: boolean;
    maxPages?: number;
    force?: boolean;
    results?: string;
    logLevel?: LogLevel;
    pretty?: boolean;
}

const SEPARATOR = '='.repeat(80);

function parsePageCount(value: string): number {
    const pages = Number(value);
    if (!Number.isInteger(pages) || pages < 1) {
        throw new InvalidArgumentError('must be an integer of at least 1');
    }
    return pages;
}

function renderOverrides(env: Env): Partial<RenderConfig> {
    return env.PDFTOPPM_PATH ? { pdftoppmPath: env.PDFTOPPM_PATH } : {};
}

function printRecord(record: MetadataRecord, position: number): void {
    console.log(`\n${position}. File: ${record.source_filename}`);
    console.log('-'.repeat(60));

    if (record.error !== undefined) {
        console.log(`   Error: ${record.error}`);
        return;
    }

    console.log(`   Title:  ${record.title}`);
    console.log(`   Author: ${record.author}`);
    console.log(`   Year:   ${record.year}`);

    if (record.parse_error !== undefined) {
        console.log(`   Note:   response could not be parsed (${record.parse_error})`);
    }
    if (record.placement?.copied) {
        console.log(`   Output: ${record.placement.output_filename ?? ''}`);
    } else if (record.placement?.error !== undefined) {
        console.log(`   Not placed: ${record.placement.error}`);
    }
}

function printSummary(records: MetadataRecord[], resultsPath: string | undefined): void {
    const summary = summarizeRecords(records);

    console.log(`\n${SEPARATOR}`);
    console.log('EXTRACTION RESULTS');
    console.log(SEPARATOR);

    records.forEach((record, index) => printRecord(record, index + 1));

    console.log(`\n${SEPARATOR}`);
    console.log(`Successful extractions: ${summary.succeeded}/${summary.total}`);
    if (summary.placed > 0) {
        console.log(`Files placed: ${summary.placed}`);
    }
    if (resultsPath !== undefined) {
        console.log(`Results saved to: ${resultsPath}`);
    }
}

async function run(source: string, output: string | undefined, options: RunOptions): Promise<number> {
    const maxPages = options.maxPages ?? DEFAULT_RENDER_CONFIG.maxPages;

    if (maxPages > PROCESSING_LIMITS.MAX_PAGES_WITHOUT_FORCE && !options.force) {
        console.error(
            `Error: --max-pages above ${PROCESSING_LIMITS.MAX_PAGES_WITHOUT_FORCE} is slow and costly. ` +
            'Pass --force to continue.'
        );
        return 1;
    }
    if (options.copy && output === undefined) {
        console.error('Error: an output directory is required unless --no-copy is given');
        return 1;
    }
    if (!options.copy && options.move) {
        console.error('Error: --move cannot be combined with --no-copy');
        return 1;
    }

    const env = loadEnv();
    const apiKey = env.GEMINI_API_KEY;
    if (!apiKey) {
        console.error('Error: GEMINI_API_KEY not found');
        console.error('Create a .env file with: GEMINI_API_KEY=your-api-key');
        return 1;
    }

    const renamer = new PaperRenamer({
        geminiApiKey: apiKey,
        model: env.GEMINI_MODEL,
        renderConfig: { ...renderOverrides(env), maxPages },
        logging: {
            level: options.logLevel ?? env.LOG_LEVEL,
            structured: options.pretty !== true,
        },
    });

    const sourceDir = path.resolve(source);
    const outputDir = options.copy && output !== undefined ? path.resolve(output) : undefined;
    const resultsPath = options.results !== undefined
        ? path.resolve(options.results)
        : renamer.defaultResultsPath(outputDir ?? sourceDir);

    let invalidReason: string | undefined;
    renamer.events.on('batch:invalid', ({ reason }) => {
        invalidReason = reason;
    });
    renamer.events.on('batch:start', ({ fileCount }) => {
        console.log(`Found ${fileCount} PDF files to process`);
    });
    renamer.events.on('file:start', ({ index, total, filename }) => {
        console.log(`[${index + 1}/${total}] ${filename}`);
    });
    renamer.events.on('rate-limit:wait', ({ delayMs }) => {
        console.log(`   Waiting ${(delayMs / 1000).toFixed(1)}s to respect API rate limits`);
    });
    renamer.events.on('extraction:retry', ({ kind, attempt, maxAttempts, delayMs }) => {
        const label = kind === 'rate_limit' ? 'Rate limit hit' : 'Temporary error';
        console.log(`   ${label}, retrying in ${Math.round(delayMs / 1000)}s (attempt ${attempt}/${maxAttempts})`);
    });
    renamer.events.on('file:complete', ({ record }) => {
        if (record.error !== undefined) {
            console.log(`   Failed: ${record.error}`);
        } else if (record.placement?.copied) {
            console.log(`   -> ${record.placement.output_filename ?? ''}`);
        }
    });

    console.log('Starting PDF metadata extraction');
    console.log(`Source directory: ${sourceDir}`);
    console.log(outputDir !== undefined
        ? `Output directory: ${outputDir} (${options.move ? 'move' : 'copy'})`
        : 'Metadata extraction only (no file copying)');
    console.log(`Analyzing the first ${maxPages} pages of each PDF`);

    const records = await renamer.processDirectory(sourceDir, {
        outputDir,
        resultsPath,
        maxPages,
        mode: options.move ? 'move' : 'copy',
    });

    if (invalidReason !== undefined) {
        console.error(`Error: ${invalidReason}`);
        return 1;
    }
    if (records.length === 0) {
        console.log('No PDF files found');
        return 0;
    }

    printSummary(records, resultsPath);
    return 0;
}

async function check(): Promise<number> {
    const env = loadEnv();
    const logger = createLogger({ ...DEFAULT_LOG_CONFIG, level: env.LOG_LEVEL, structured: false });
    const renderer = new PopplerPageRenderer({ ...DEFAULT_RENDER_CONFIG, ...renderOverrides(env) }, logger);
    const poppler = await renderer.checkAvailability();
    const hasKey = Boolean(env.GEMINI_API_KEY);

    console.log('Environment:');
    console.log(`  ${hasKey ? 'OK' : 'MISSING'}: GEMINI_API_KEY`);
    console.log(`  ${env.GEMINI_MODEL ? 'OK' : 'DEFAULT'}: GEMINI_MODEL`);
    console.log();
    console.log('Renderer:');
    console.log(`  ${poppler.available ? 'OK' : 'MISSING'}: pdftoppm ${poppler.detail}`);
    console.log();

    if (!hasKey || !poppler.available) {
        console.log('Setup incomplete.');
        return 1;
    }
    console.log('Ready.');
    return 0;
}

async function show(resultsFile: string): Promise<number> {
    const logger = createLogger({ ...DEFAULT_LOG_CONFIG, structured: false });
    const resultsPath = path.resolve(resultsFile);
    const records = await new ResultsStore(resultsPath, logger).readAll();

    if (records.length === 0) {
        console.log(`No records in ${resultsPath}`);
        return 1;
    }

    printSummary(records, undefined);
    return 0;
}

const program = new Command();

program
    .name('paper-renamer')
    .description('Rename scanned academic PDFs as "{year} - {author} - {title}.pdf" using Gemini')
    .version(VERSION)
    .argument('<source>', 'Directory containing PDF files')
    .argument('[output]', 'Directory for renamed files')
    .option('--no-copy', 'Only extract metadata, do not copy files')
    .option('--move', 'Move files into the output directory instead of copying')
    .option('-p, --max-pages <n>', `Pages to analyze per PDF (default: ${DEFAULT_RENDER_CONFIG.maxPages})`, parsePageCount)
    .option('--force', `Allow --max-pages above ${PROCESSING_LIMITS.MAX_PAGES_WITHOUT_FORCE}`)
    .option('--results <file>', 'Results file (default: <output>/pdf_metadata_results.json)')
    .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
    .option('--pretty', 'Human-readable log output')
    .action(async (source: string, output: string | undefined, options: RunOptions) => {
        process.exitCode = await run(source, output, options);
    });

program
    .command('check')
    .description('Check that GEMINI_API_KEY is set and pdftoppm can run')
    .action(async () => {
        process.exitCode = await check();
    });

program
    .command('show')
    .description('Print the records of a results file')
    .argument('<results-file>', 'JSON results file written by a previous run')
    .action(async (resultsFile: string) => {
        process.exitCode = await show(resultsFile);
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    console.error('Error:', errorMessage(error));
    process.exitCode = 1;
});
