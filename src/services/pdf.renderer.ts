import { execFile } from 'child_process';
import { constants as fsConstants } from 'fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import type { RenderConfig } from '../types/config.types.js';
import type { IPageRenderer, PageImage } from '../types/renderer.types.js';
import { RenderError, errorMessage, type RenderFailureReason } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * Output of a finished child process
 */
export interface CommandResult {
    stdout: string;
    stderr: string;
}

/**
 * Runs an executable; rejects when it exits non-zero
 */
export type CommandRunner = (
    file: string,
    args: readonly string[],
    options: { timeoutMs: number }
) => Promise<CommandResult>;

const execFileAsync = promisify(execFile);

export const execFileRunner: CommandRunner = async (file, args, options) => {
    const { stdout, stderr } = await execFileAsync(file, [...args], {
        timeout: options.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
        encoding: 'utf8',
    });
    return { stdout, stderr };
};

const PAGE_FILE_PATTERN = /^page-(\d+)\.png$/;

interface ProcessFailure {
    code?: unknown;
    killed?: unknown;
    stderr?: unknown;
}

function asProcessFailure(error: unknown): ProcessFailure {
    if (typeof error !== 'object' || error === null) {
        return {};
    }
    return {
        code: 'code' in error ? error.code : undefined,
        killed: 'killed' in error ? error.killed : undefined,
        stderr: 'stderr' in error ? error.stderr : undefined,
    };
}

/**
 * Map a pdftoppm failure onto a render failure reason and a readable message
 */
export function describeRenderFailure(error: unknown): { reason: RenderFailureReason; message: string } {
    const failure = asProcessFailure(error);
    const stderr = typeof failure.stderr === 'string' ? failure.stderr : '';
    const text = `${stderr}\n${errorMessage(error)}`.toLowerCase();

    if (failure.code === 'ENOENT') {
        return {
            reason: 'unknown',
            message: 'pdftoppm not found. Install poppler (brew install poppler / apt-get install poppler-utils)',
        };
    }
    if (failure.killed === true) {
        return { reason: 'unknown', message: 'Rendering timed out' };
    }
    if (text.includes('password') || text.includes('encrypted')) {
        return { reason: 'encrypted', message: 'PDF is password protected or encrypted' };
    }
    if (
        text.includes('corrupt') ||
        text.includes('damaged') ||
        text.includes('syntax error') ||
        text.includes("couldn't") ||
        text.includes('may not be a pdf')
    ) {
        return { reason: 'corrupted', message: 'PDF file appears to be corrupted' };
    }

    const detail = stderr.trim() || errorMessage(error);
    return { reason: 'unknown', message: `Error converting PDF: ${detail}` };
}

/**
 * Renders leading PDF pages to PNG with poppler's pdftoppm
 */
export class PopplerPageRenderer implements IPageRenderer {
    private readonly config: RenderConfig;
    private readonly logger: Logger;
    private readonly runCommand: CommandRunner;

    constructor(config: RenderConfig, logger: Logger, runCommand: CommandRunner = execFileRunner) {
        this.config = config;
        this.logger = logger;
        this.runCommand = runCommand;
    }

    /**
     * Render the first `maxPages` pages. Returns [] when the file cannot be used.
     */
    async render(pdfPath: string, maxPages: number): Promise<PageImage[]> {
        try {
            return await this.renderOrThrow(pdfPath, maxPages);
        } catch (error) {
            const renderError = error instanceof RenderError
                ? error
                : new RenderError(`Error converting PDF: ${errorMessage(error)}`, path.basename(pdfPath), 'unknown');

            this.logger.warn(renderError.message, {
                filename: renderError.filename,
                reason: renderError.reason,
                path: pdfPath,
            });
            return [];
        }
    }

    /**
     * Check that pdftoppm can be executed
     */
    async checkAvailability(): Promise<{ available: boolean; detail: string }> {
        try {
            const { stdout, stderr } = await this.runCommand(this.config.pdftoppmPath, ['-v'], {
                timeoutMs: this.config.timeoutMs,
            });
            return { available: true, detail: (stderr || stdout).trim().split('\n')[0] ?? '' };
        } catch (error) {
            const failure = asProcessFailure(error);
            if (failure.code === 'ENOENT') {
                return { available: false, detail: `${this.config.pdftoppmPath} not found` };
            }
            // Old poppler releases exit non-zero on -v but still run
            const stderr = typeof failure.stderr === 'string' ? failure.stderr : '';
            return { available: true, detail: stderr.trim().split('\n')[0] ?? '' };
        }
    }

    private async renderOrThrow(pdfPath: string, maxPages: number): Promise<PageImage[]> {
        const filename = path.basename(pdfPath);

        await this.validateFile(pdfPath, filename);

        const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'paper-renamer-'));
        try {
            try {
                await this.runCommand(
                    this.config.pdftoppmPath,
                    [
                        '-png',
                        '-r', String(this.config.dpi),
                        '-f', '1',
                        '-l', String(maxPages),
                        pdfPath,
                        path.join(workDir, 'page'),
                    ],
                    { timeoutMs: this.config.timeoutMs }
                );
            } catch (error) {
                const { reason, message } = describeRenderFailure(error);
                throw new RenderError(message, filename, reason, error instanceof Error ? error : undefined);
            }

            const images = await this.collectPages(workDir);
            if (images.length === 0) {
                throw new RenderError('PDF produced no page images', filename, 'no-pages');
            }

            this.logger.debug('PDF rendered', {
                filename,
                pages: images.length,
                dpi: this.config.dpi,
            });

            return images.slice(0, maxPages);
        } finally {
            await fs.rm(workDir, { recursive: true, force: true });
        }
    }

    private async validateFile(pdfPath: string, filename: string): Promise<void> {
        const stats = await fs.stat(pdfPath).catch(() => undefined);
        if (!stats) {
            throw new RenderError('PDF file does not exist', filename, 'missing');
        }

        if (!stats.isFile()) {
            throw new RenderError('PDF path is not a regular file', filename, 'missing');
        }

        try {
            await fs.access(pdfPath, fsConstants.R_OK);
        } catch {
            throw new RenderError('No read permission for PDF file', filename, 'unreadable');
        }

        if (stats.size === 0) {
            throw new RenderError('PDF file is empty', filename, 'empty');
        }

        if (stats.size > this.config.largeFileWarningBytes) {
            this.logger.warn('Large PDF file, rendering may be slow', {
                filename,
                sizeMb: Math.floor(stats.size / (1024 * 1024)),
            });
        }
    }

    private async collectPages(workDir: string): Promise<PageImage[]> {
        const entries = await fs.readdir(workDir);
        const pages = entries
            .map((entry) => {
                const match = PAGE_FILE_PATTERN.exec(entry);
                return match ? { entry, pageNumber: Number(match[1]) } : undefined;
            })
            .filter((page): page is { entry: string; pageNumber: number } => page !== undefined)
            .sort((a, b) => a.pageNumber - b.pageNumber);

        const images: PageImage[] = [];
        for (const page of pages) {
            images.push({
                pageNumber: page.pageNumber,
                mimeType: 'image/png',
                data: await fs.readFile(path.join(workDir, page.entry)),
            });
        }
        return images;
    }
}
