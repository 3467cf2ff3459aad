import * as fs from 'fs/promises';
import * as path from 'path';
import type { MetadataRecord } from '../types/metadata.types.js';
import { MetadataRecordSchema } from '../schemas/metadata.schema.js';
import { errorMessage } from '../errors/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * JSON results file holding one array of metadata records.
 *
 * Every append rewrites the whole file, so an interrupted batch keeps the
 * records of all files finished before the interruption.
 */
export class ResultsStore {
    readonly resultsPath: string;
    private readonly logger: Logger;

    constructor(resultsPath: string, logger: Logger) {
        this.resultsPath = resultsPath;
        this.logger = logger;
    }

    /**
     * Append one record. Returns false when the file could not be written.
     */
    async append(record: MetadataRecord): Promise<boolean> {
        try {
            const entries = await this.readEntries();
            entries.push(record);

            await fs.mkdir(path.dirname(this.resultsPath), { recursive: true });
            await fs.writeFile(this.resultsPath, JSON.stringify(entries, null, 2) + '\n', 'utf8');

            this.logger.debug('Results saved', {
                filename: record.source_filename,
                resultsPath: this.resultsPath,
                entries: entries.length,
            });
            return true;
        } catch (error) {
            this.logger.error('Could not save results', {
                filename: record.source_filename,
                resultsPath: this.resultsPath,
                error: errorMessage(error),
            });
            return false;
        }
    }

    /**
     * Read back the stored records, skipping entries that are not records
     */
    async readAll(): Promise<MetadataRecord[]> {
        const entries = await this.readEntries();
        const records: MetadataRecord[] = [];
        for (const entry of entries) {
            const parsed = MetadataRecordSchema.safeParse(entry);
            if (parsed.success) {
                records.push(parsed.data);
            }
        }
        return records;
    }

    /**
     * Raw array content of the file. A missing file is empty; unparsable or
     * non-array content is discarded with a warning.
     */
    private async readEntries(): Promise<unknown[]> {
        let content: string;
        try {
            content = await fs.readFile(this.resultsPath, 'utf8');
        } catch (error) {
            if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
                return [];
            }
            throw error;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch (error) {
            this.logger.warn('Results file is not valid JSON, starting a new list', {
                resultsPath: this.resultsPath,
                error: errorMessage(error),
            });
            return [];
        }

        if (!Array.isArray(parsed)) {
            this.logger.warn('Results file does not hold a list, starting a new list', {
                resultsPath: this.resultsPath,
            });
            return [];
        }

        return parsed;
    }
}
