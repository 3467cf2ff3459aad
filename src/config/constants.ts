/**
 * System constants for paper-renamer
 * Centralizes magic values for maintainability
 */

// ============================================
// Metadata placeholders
// ============================================

export const METADATA_PLACEHOLDERS = {
    /**
     * Value the model is told to use, and that we fill in, for unrecoverable fields
     */
    NOT_FOUND: 'Not found',

    /**
     * Field value of records whose extraction failed outright
     */
    ERROR: 'Error',

    /**
     * Filename component used for empty or not-found fields
     */
    UNKNOWN: 'Unknown',

    /**
     * Separator used when a list of authors is folded into the display string
     */
    AUTHOR_LIST_SEPARATOR: '; ',
} as const;

// ============================================
// Response parsing
// ============================================

export const RESPONSE_LIMITS = {
    /**
     * Raw model text kept on fallback records
     */
    RAW_RESPONSE_LENGTH: 500,
} as const;

// ============================================
// Filename rules
// ============================================

export const FILENAME_RULES = {
    /**
     * Characters no common filesystem accepts in a name
     */
    RESERVED_CHARACTERS: /[<>:"/\\|?*]/g,

    /**
     * Symbols that survive most filesystems but make awkward names
     */
    SYMBOL_DENYLIST: /[†‡§¶#@$%^&*+={}[\]~`]/g,

    /**
     * Suffixes that make "Smith, Jr." a single author
     */
    GENERATIONAL_SUFFIXES: ['jr', 'sr', 'ii', 'iii', 'iv'],

    EXTENSION: '.pdf',
} as const;

// ============================================
// Processing limits
// ============================================

export const PROCESSING_LIMITS = {
    /**
     * --max-pages above this needs --force on the CLI
     */
    MAX_PAGES_WITHOUT_FORCE: 10,
} as const;

// ============================================
// Type exports for type-safe access
// ============================================

export type MetadataPlaceholders = typeof METADATA_PLACEHOLDERS;
export type FilenameRules = typeof FILENAME_RULES;
