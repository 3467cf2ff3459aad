import { constants as fsConstants } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { FilenameConfig } from '../types/config.types.js';
import type { MetadataRecord, PlacementMode, PlacementResult } from '../types/metadata.types.js';
import { PlacementError, errorMessage } from '../errors/index.js';
import { buildFilename, withCounterSuffix } from '../utils/filename.js';
import type { Logger } from '../utils/logger.js';

function hasErrorCode(error: unknown, ...codes: string[]): boolean {
    return typeof error === 'object' &&
        error !== null &&
        'code' in error &&
        typeof error.code === 'string' &&
        codes.includes(error.code);
}

async function pathExists(target: string): Promise<boolean> {
    try {
        await fs.lstat(target);
        return true;
    } catch (error) {
        if (hasErrorCode(error, 'ENOENT')) {
            return false;
        }
        throw error;
    }
}

/**
 * Refuse any destination that does not resolve inside the output directory
 */
export function assertInsideDirectory(directory: string, target: string): void {
    const relative = path.relative(path.resolve(directory), path.resolve(target));
    if (
        relative === '' ||
        path.isAbsolute(relative) ||
        relative.split(path.sep)[0] === '..'
    ) {
        throw new PlacementError('Invalid output path (path traversal detected)', target);
    }
}

/**
 * Remove a destination written by a step that did not complete, then rethrow
 */
async function discardDestination(outputPath: string, error: unknown): Promise<never> {
    await fs.rm(outputPath, { force: true });
    throw error;
}

/**
 * Copy a file without overwriting, keeping permission bits and timestamps
 */
async function copyPreservingMetadata(sourcePath: string, outputPath: string): Promise<void> {
    await fs.copyFile(sourcePath, outputPath, fsConstants.COPYFILE_EXCL);
    try {
        const stats = await fs.stat(sourcePath);
        await fs.chmod(outputPath, stats.mode & 0o7777);
        await fs.utimes(outputPath, stats.atime, stats.mtime);
    } catch (error) {
        await discardDestination(outputPath, error);
    }
}

/**
 * Move a file without overwriting. Hard-links then unlinks the source, falling
 * back to copy-and-delete across filesystems. The destination is removed again
 * when the source cannot be deleted.
 */
async function moveExclusive(sourcePath: string, outputPath: string): Promise<void> {
    try {
        await fs.link(sourcePath, outputPath);
    } catch (error) {
        if (!hasErrorCode(error, 'EXDEV', 'EPERM', 'ENOTSUP', 'EOPNOTSUPP')) {
            throw error;
        }
        await copyPreservingMetadata(sourcePath, outputPath);
    }

    try {
        await fs.unlink(sourcePath);
    } catch (error) {
        await discardDestination(outputPath, error);
    }
}

/**
 * Places source PDFs into the output directory under their generated names.
 *
 * Existing files are never overwritten: a taken name gets " (1)", " (2)", ...
 * before the extension until a free one is found.
 */
export class FilePlacementService {
    private readonly config: FilenameConfig;
    private readonly logger: Logger;

    constructor(config: FilenameConfig, logger: Logger) {
        this.config = config;
        this.logger = logger;
    }

    /**
     * Copy or move one PDF. Failures are reported in the result, not thrown.
     */
    async place(
        sourcePath: string,
        record: MetadataRecord,
        outputDir: string,
        mode: PlacementMode = 'copy'
    ): Promise<PlacementResult> {
        const sourceFilename = path.basename(sourcePath);

        try {
            await fs.mkdir(outputDir, { recursive: true });

            const filename = buildFilename(record, { maxLength: this.config.maxLength });
            const outputPath = await this.placeUnderFreeName(sourcePath, outputDir, filename, mode);
            const outputFilename = path.basename(outputPath);

            this.logger.info(mode === 'move' ? 'PDF moved' : 'PDF copied', {
                filename: sourceFilename,
                outputFilename,
            });

            return {
                copied: true,
                source_filename: sourceFilename,
                output_filename: outputFilename,
                source_path: sourcePath,
                output_path: outputPath,
                mode,
            };
        } catch (error) {
            const message = errorMessage(error);
            this.logger.error('Could not place PDF', { filename: sourceFilename, mode, error: message });
            return {
                copied: false,
                source_filename: sourceFilename,
                error: message,
            };
        }
    }

    private async placeUnderFreeName(
        sourcePath: string,
        outputDir: string,
        filename: string,
        mode: PlacementMode
    ): Promise<string> {
        for (let counter = 0; ; counter++) {
            const candidate = counter === 0 ? filename : withCounterSuffix(filename, counter);
            const outputPath = path.join(outputDir, candidate);
            assertInsideDirectory(outputDir, outputPath);

            if (await pathExists(outputPath)) {
                continue;
            }

            try {
                if (mode === 'move') {
                    await moveExclusive(sourcePath, outputPath);
                } else {
                    await copyPreservingMetadata(sourcePath, outputPath);
                }
                return outputPath;
            } catch (error) {
                // Taken between the existence check and the write
                if (hasErrorCode(error, 'EEXIST')) {
                    continue;
                }
                throw error;
            }
        }
    }
}
