/**
 * Schema descriptor loading
 *
 * The descriptor is a JSON file whose top-level `format` object is handed to
 * the inference call as its output-format contract. Its contents are not
 * interpreted here.
 *
 * @module services/schema/schema-loader
 */

import * as fs from 'fs';
import { PipelineError, missingFileError } from '../../utils/errors.js';

/**
 * Opaque output-format contract
 */
export type SchemaContract = Record<string, unknown>;

const FORMAT_KEY = 'format';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the `format` object from a schema descriptor file.
 *
 * @returns The `format` value, unchanged
 * @throws PipelineError MISSING_FILE if the file does not exist
 * @throws PipelineError MALFORMED_SCHEMA if it is not a JSON object with an
 *   object under `format`
 */
export function loadSchemaFormat(schemaPath: string): SchemaContract {
  if (!fs.existsSync(schemaPath)) {
    throw missingFileError('Schema file', schemaPath);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  } catch (error) {
    throw new PipelineError(
      'MALFORMED_SCHEMA',
      `Schema file is not valid JSON: ${schemaPath} - ${error instanceof Error ? error.message : String(error)}`,
      { path: schemaPath }
    );
  }

  if (!isPlainObject(data) || !(FORMAT_KEY in data)) {
    throw new PipelineError(
      'MALFORMED_SCHEMA',
      `${schemaPath} must contain a top-level key named '${FORMAT_KEY}'`,
      { path: schemaPath }
    );
  }

  const format = data[FORMAT_KEY];
  if (!isPlainObject(format)) {
    throw new PipelineError(
      'MALFORMED_SCHEMA',
      `'${FORMAT_KEY}' in ${schemaPath} must be an object`,
      { path: schemaPath }
    );
  }

  return format;
}
