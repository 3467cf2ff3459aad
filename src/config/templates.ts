/**
 * Prompt templates sent to the vision model.
 */

import { METADATA_PLACEHOLDERS } from './constants.js';

// ============================================
// METADATA EXTRACTION TEMPLATE
// ============================================

/**
 * Instruction sent after the page images.
 * The response is free text; the extractor parses the JSON out of it.
 */
export const METADATA_EXTRACTION_TEMPLATE = `Analyze this academic paper/document and extract the following information in JSON format:

{
  "title": "Full title of the paper/article",
  "author": "Author name(s) - include all authors if multiple",
  "year": "Year of publication",
  "source_filename": "The filename this data was extracted from"
}

Instructions:
- Look for the title, usually prominently displayed at the top
- Find author information, which might be below the title or in a byline
- Look for the publication year, which might be in various formats (©2015, 2015, etc.)
- If there are multiple authors, include all of them
- If you cannot find specific information, use "{{NOT_FOUND}}" for that field
- Return only valid JSON, no additional text

Analyze carefully and extract the most accurate information possible.`;

/**
 * Build the extraction prompt
 */
export function buildExtractionPrompt(): string {
    return METADATA_EXTRACTION_TEMPLATE.replace('{{NOT_FOUND}}', METADATA_PLACEHOLDERS.NOT_FOUND);
}
