import type { MetadataRecord } from '../types/metadata.types.js';
import { METADATA_PLACEHOLDERS, RESPONSE_LIMITS } from '../config/constants.js';

/**
 * Record for a file whose extraction failed outright
 */
export function createErrorRecord(message: string, filename: string): MetadataRecord {
    return {
        title: METADATA_PLACEHOLDERS.ERROR,
        author: METADATA_PLACEHOLDERS.ERROR,
        year: METADATA_PLACEHOLDERS.ERROR,
        source_filename: filename,
        error: message,
    };
}

/**
 * Record for a model response that could not be turned into metadata.
 * Keeps the start of the raw text for diagnosis.
 */
export function createFallbackRecord(
    filename: string,
    rawResponse: string,
    parseError: string
): MetadataRecord {
    return {
        title: METADATA_PLACEHOLDERS.NOT_FOUND,
        author: METADATA_PLACEHOLDERS.NOT_FOUND,
        year: METADATA_PLACEHOLDERS.NOT_FOUND,
        source_filename: filename,
        raw_response: rawResponse.slice(0, RESPONSE_LIMITS.RAW_RESPONSE_LENGTH),
        parse_error: parseError,
    };
}

export function isSuccessfulRecord(record: MetadataRecord): boolean {
    return record.error === undefined;
}
