/**
 * API key loading
 *
 * The key lives alone on one line of a file at a fixed path. The value is
 * never logged or echoed back in errors.
 *
 * @module services/credentials/key-loader
 */

import * as fs from 'fs';
import { PipelineError, missingFileError } from '../../utils/errors.js';

export const DEFAULT_KEY_PREFIX = 'sk-';

/**
 * Read and check the API key stored at `keyPath`.
 *
 * @returns The trimmed key
 * @throws PipelineError MISSING_FILE if the file does not exist
 * @throws PipelineError MALFORMED_CREDENTIAL if the content is empty, holds
 *   whitespace, or lacks the expected prefix
 */
export function loadApiKey(keyPath: string, prefix: string = DEFAULT_KEY_PREFIX): string {
  if (!fs.existsSync(keyPath)) {
    throw missingFileError(
      'API key file',
      keyPath,
      'Create it with your API key on a single line.'
    );
  }

  const key = fs.readFileSync(keyPath, 'utf-8').trim();
  if (!key || /\s/.test(key) || !key.startsWith(prefix)) {
    throw new PipelineError(
      'MALFORMED_CREDENTIAL',
      `API key file exists but does not look valid. It must be one line like: ${prefix}...`,
      { path: keyPath }
    );
  }

  return key;
}
