/**
 * Prompts for data-dictionary table extraction
 *
 * @module services/extraction/prompts
 */

import { BLANK_COMMENT } from '../../models/record.js';

/**
 * User-message text sent alongside the page image.
 */
export const EXTRACTION_DIRECTIVE = 'Extract every table row from this page.';

/**
 * System instructions spelling out the output contract.
 *
 * @param sourceFileName - Base name of the PDF; every record must repeat it verbatim
 */
export function createExtractionInstructions(sourceFileName: string): string {
  return `You are extracting tabular data from a PDF page screenshot.

Return JSON that matches the provided schema EXACTLY:
- Top-level key: data_records (array)
- Each record must have:
  file_name (string), key (string), item (string), data_type (string), format (string),
  length (integer), start (integer), end (integer), comments (string)

Rules:
- Extract ALL table rows visible on the page, top-to-bottom.
- Do NOT invent rows.
- Preserve text exactly as shown (case/punctuation).
- IMPORTANT: length/start/end must be integers (no quotes).
- If a comments cell is blank, use "${BLANK_COMMENT}".
- file_name must be exactly: ${sourceFileName}`;
}
