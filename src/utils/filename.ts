import type { MetadataRecord } from '../types/metadata.types.js';
import { FILENAME_RULES, METADATA_PLACEHOLDERS } from '../config/constants.js';
import { DEFAULT_FILENAME_CONFIG } from '../types/config.types.js';

export interface FilenameOptions {
    /** Maximum length of each component */
    maxLength?: number;
}

/**
 * Cut to `maxLength` code points so a surrogate pair is never split
 */
function truncate(text: string, maxLength: number): string {
    return Array.from(text).slice(0, maxLength).join('');
}

function orUnknown(component: string, maxLength: number): string {
    return component || truncate(METADATA_PLACEHOLDERS.UNKNOWN, maxLength);
}

/**
 * Make one metadata field safe to use inside a filename.
 * Empty and not-found values become "Unknown".
 */
export function sanitizeFilenameComponent(
    text: string | undefined,
    maxLength: number = DEFAULT_FILENAME_CONFIG.maxLength
): string {
    if (!text || text === METADATA_PLACEHOLDERS.NOT_FOUND) {
        return truncate(METADATA_PLACEHOLDERS.UNKNOWN, maxLength);
    }

    const cleaned = text
        .replace(FILENAME_RULES.RESERVED_CHARACTERS, '')
        .replace(/\s+/g, ' ')
        .replace(FILENAME_RULES.SYMBOL_DENYLIST, '')
        .trim();
    return truncate(cleaned, maxLength);
}

function isGenerationalSuffix(segment: string): boolean {
    const normalized = segment.trim().toLowerCase().replace(/\.$/, '');
    return FILENAME_RULES.GENERATIONAL_SUFFIXES.some((suffix) => suffix === normalized);
}

/**
 * Reduce an author field to the first author's name.
 *
 * Separators are tried in order: " and " (any case), " & ", ";", then a comma
 * when the string has more than one and the second segment is not Jr./Sr./II...
 * An empty result becomes "Unknown".
 */
export function reduceAuthor(
    author: string | readonly string[],
    maxLength: number = DEFAULT_FILENAME_CONFIG.maxLength
): string {
    const first = typeof author === 'string'
        ? author
        : author[0] ?? METADATA_PLACEHOLDERS.UNKNOWN;
    const name = sanitizeFilenameComponent(first, maxLength);
    return orUnknown(firstAuthorOf(name), maxLength);
}

function firstAuthorOf(name: string): string {
    if (/ and /i.test(name)) {
        return name.split(/ and /i)[0].trim();
    }
    if (name.includes(' & ')) {
        return name.split(' & ')[0].trim();
    }
    if (name.includes(';')) {
        return name.split(';')[0].trim();
    }

    const parts = name.split(',');
    if (parts.length > 2 && !isGenerationalSuffix(parts[1])) {
        return parts[0].trim();
    }

    return name;
}

/**
 * Build "{year} - {author} - {title}.pdf" from a metadata record
 */
export function buildFilename(record: MetadataRecord, options: FilenameOptions = {}): string {
    const maxLength = options.maxLength ?? DEFAULT_FILENAME_CONFIG.maxLength;

    const year = orUnknown(sanitizeFilenameComponent(record.year, maxLength), maxLength);
    const author = reduceAuthor(record.authors ?? record.author, maxLength);
    const title = orUnknown(sanitizeFilenameComponent(record.title, maxLength), maxLength);

    return `${year} - ${author} - ${title}${FILENAME_RULES.EXTENSION}`;
}

/**
 * Insert a " (N)" counter before the extension
 */
export function withCounterSuffix(filename: string, counter: number): string {
    const extension = FILENAME_RULES.EXTENSION;
    const stem = filename.toLowerCase().endsWith(extension)
        ? filename.slice(0, -extension.length)
        : filename;
    return `${stem} (${counter})${extension}`;
}
