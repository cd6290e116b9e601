/**
 * Extraction Service - schema-constrained table extraction from a page image
 *
 * Sends one page image to the inference client, then gates the response
 * through JSON parsing and record validation. Both gates are fatal; nothing
 * is retried or repaired.
 *
 * @module services/extraction/service
 */

import type { InferenceClient } from '../openai/index.js';
import type { SchemaContract } from '../schema/schema-loader.js';
import { ExtractionResultSchema, type ExtractionResult } from '../../models/record.js';
import { PipelineError } from '../../utils/errors.js';
import { ValidationError, validateInput } from '../../utils/validation.js';
import { EXTRACTION_DIRECTIVE, createExtractionInstructions } from './prompts.js';

/**
 * Extraction capability used by the consistency runner
 */
export interface TableExtractor {
  extract(imageDataUrl: string, schema: SchemaContract, expectedFileName: string): Promise<ExtractionResult>;
}

/**
 * ExtractionService - inference call plus parse/validate gates
 */
export class ExtractionService implements TableExtractor {
  constructor(private readonly client: InferenceClient) {}

  /**
   * Extract every table row from a page image.
   *
   * @param imageDataUrl - `data:image/png;base64,...` of the page
   * @param schema - Output-format contract forwarded to the inference call
   * @param expectedFileName - Base name of the source PDF
   * @throws PipelineError MALFORMED_RESPONSE if the text is not JSON
   * @throws PipelineError SCHEMA_VALIDATION_FAILED if the JSON is not an ExtractionResult
   */
  async extract(
    imageDataUrl: string,
    schema: SchemaContract,
    expectedFileName: string
  ): Promise<ExtractionResult> {
    const response = await this.client.complete({
      instructions: createExtractionInstructions(expectedFileName),
      directive: EXTRACTION_DIRECTIVE,
      imageDataUrl,
      format: schema,
    });

    const parsed = parseResponseJson(response.text);
    const result = validateExtraction(parsed);

    const mismatched = result.data_records.filter((r) => r.file_name !== expectedFileName).length;
    if (mismatched > 0) {
      console.error(
        `[WARN] [ExtractionService] ${mismatched} record(s) have file_name other than ${expectedFileName}`
      );
    }

    return result;
  }
}

/**
 * Parse response text as JSON.
 *
 * @throws PipelineError MALFORMED_RESPONSE carrying the raw text
 */
export function parseResponseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new PipelineError(
      'MALFORMED_RESPONSE',
      `Model did not return valid JSON: ${reason}\nRaw output:\n${raw}`,
      { raw }
    );
  }
}

/**
 * Validate parsed JSON against the ExtractionResult shape.
 *
 * @throws PipelineError SCHEMA_VALIDATION_FAILED carrying the issues and the parsed JSON
 */
export function validateExtraction(parsed: unknown): ExtractionResult {
  try {
    return validateInput(ExtractionResultSchema, parsed);
  } catch (error) {
    if (!(error instanceof ValidationError)) throw error;
    const pretty = JSON.stringify(parsed, null, 2);
    throw new PipelineError(
      'SCHEMA_VALIDATION_FAILED',
      `JSON did not match the record schema: ${error.message}\nParsed JSON:\n${pretty}`,
      { issues: error.issues, parsed }
    );
  }
}
