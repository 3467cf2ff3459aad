import type { MetadataRecord, PlacementMode } from './metadata.types.js';

/**
 * Options for processing a whole directory
 */
export interface ProcessDirectoryOptions {
    /** Where renamed copies go; metadata-only run when omitted */
    outputDir?: string;
    /** JSON results file, appended after every file */
    resultsPath?: string;
    /** Leading pages to analyze per PDF */
    maxPages?: number;
    /** Copy (default) or move the source files */
    mode?: PlacementMode;
}

/**
 * Options for processing a single PDF
 */
export type ProcessFileOptions = Omit<ProcessDirectoryOptions, 'resultsPath'>;

/**
 * Summary of a finished directory run
 */
export interface BatchSummary {
    total: number;
    succeeded: number;
    failed: number;
    placed: number;
    records: MetadataRecord[];
}
