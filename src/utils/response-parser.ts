import type { AuthorField, MetadataRecord } from '../types/metadata.types.js';
import { ModelMetadataSchema } from '../schemas/metadata.schema.js';
import { METADATA_PLACEHOLDERS } from '../config/constants.js';
import { errorMessage } from '../errors/index.js';
import { createFallbackRecord } from './metadata-records.js';

const LEADING_FENCE = /^```[ \t]*[\w+-]*[ \t]*\r?\n?/i;
const TRAILING_FENCE = /\r?\n?```\s*$/;

/**
 * Cut the JSON candidate out of a free-text model response.
 *
 * Removes a surrounding markdown fence, then keeps the span from the first
 * "{" to the last "}" so prose around the object is ignored.
 */
export function extractJsonText(responseText: string): string {
    let text = responseText.trim();
    text = text.replace(LEADING_FENCE, '');
    text = text.replace(TRAILING_FENCE, '');
    text = text.trim();

    const start = text.indexOf('{');
    const end = text.lastIndexOf('}');
    if (start !== -1 && end > start) {
        text = text.slice(start, end + 1);
    }

    return text;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Fold the author field into a display string, keeping the list when there is one
 */
export function normalizeAuthor(
    field: AuthorField | null | undefined
): Pick<MetadataRecord, 'author' | 'authors'> {
    if (!field) {
        return { author: METADATA_PLACEHOLDERS.NOT_FOUND };
    }

    if (field.kind === 'single') {
        return { author: field.value };
    }

    return {
        author: field.values.length > 0
            ? field.values.join(METADATA_PLACEHOLDERS.AUTHOR_LIST_SEPARATOR)
            : METADATA_PLACEHOLDERS.NOT_FOUND,
        authors: field.values,
    };
}

/**
 * Turn the model's free-text answer into a metadata record.
 *
 * Never throws: text that is not a JSON object becomes a fallback record
 * carrying the raw text and the parse error. Fields of an unusable type are
 * treated as missing.
 * `source_filename` always comes from `filename`, not from the model.
 */
export function parseModelResponse(responseText: string, filename: string): MetadataRecord {
    let parsed: unknown;
    try {
        parsed = JSON.parse(extractJsonText(responseText));
    } catch (error) {
        return createFallbackRecord(filename, responseText, errorMessage(error));
    }

    if (!isPlainObject(parsed)) {
        const kind = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
        return createFallbackRecord(filename, responseText, `Expected a JSON object, received ${kind}`);
    }

    const data = ModelMetadataSchema.parse(parsed);
    return {
        title: data.title ?? METADATA_PLACEHOLDERS.NOT_FOUND,
        ...normalizeAuthor(data.author),
        year: data.year ?? METADATA_PLACEHOLDERS.NOT_FOUND,
        source_filename: filename,
    };
}
