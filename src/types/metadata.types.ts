/**
 * How a PDF was placed into the output directory
 */
export type PlacementMode = 'copy' | 'move';

/**
 * Outcome of placing a source PDF under its generated name.
 * Keys are snake_case because records are persisted as-is to the results file.
 */
export interface PlacementResult {
    /** True only when the destination file now exists */
    copied: boolean;
    source_filename: string;
    output_filename?: string;
    source_path?: string;
    output_path?: string;
    mode?: PlacementMode;
    error?: string;
}

/**
 * Normalized result of one extraction attempt for one PDF.
 *
 * When `error` is set, `title`, `author` and `year` hold placeholders, not data.
 * `author` is always a display string; `authors` keeps the list when the model
 * returned one, so the filename builder can take its first element.
 */
export interface MetadataRecord {
    title: string;
    author: string;
    authors?: string[];
    year: string;
    source_filename: string;
    error?: string;
    raw_response?: string;
    parse_error?: string;
    placement?: PlacementResult;
}

/**
 * Author field as returned by the model, before normalization
 */
export type AuthorField =
    | { kind: 'single'; value: string }
    | { kind: 'list'; values: string[] };

/**
 * Token usage of a model call
 */
export interface TokenUsage {
    input: number;
    output: number;
    total: number;
}
