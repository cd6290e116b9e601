/**
 * SHA-256 Hash Utilities for run comparison
 *
 * All hashes use the format: 'sha256:' + 64-character lowercase hex string,
 * computed over raw bytes.
 *
 * @module utils/hash
 */

import crypto from 'crypto';
import fs from 'fs';

const HASH_PREFIX = 'sha256:';

const HASH_PATTERN = /^sha256:[a-f0-9]{64}$/;

/**
 * Compute SHA-256 hash of content
 *
 * @example
 * computeHash('hello')
 * // Returns: 'sha256:2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824'
 */
export function computeHash(content: string | Buffer): string {
  const hash = crypto.createHash('sha256').update(content).digest('hex');

  return HASH_PREFIX + hash;
}

/**
 * Compute SHA-256 hash of a file by streaming its bytes
 *
 * @throws Error if the path is missing, not a file, or unreadable
 */
export async function hashFile(filePath: string): Promise<string> {
  let stats: fs.Stats;
  try {
    stats = await fs.promises.stat(filePath);
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code === 'ENOENT') {
      throw new Error(`File not found: ${filePath}`);
    }
    throw new Error(`Cannot access file: ${filePath} - ${fsError.message}`);
  }

  if (!stats.isFile()) {
    throw new Error(`Path is not a file: ${filePath}`);
  }

  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (chunk: string | Buffer) => {
      hash.update(chunk);
    });

    stream.on('end', () => {
      resolve(HASH_PREFIX + hash.digest('hex'));
    });

    stream.on('error', (error: NodeJS.ErrnoException) => {
      stream.destroy();
      reject(new Error(`Error reading file: ${filePath} - ${error.message}`));
    });
  });
}

/**
 * Validate hash format is correct
 *
 * @example
 * isValidHashFormat('sha256:ABC123') // Wrong length, uppercase
 * // Returns: false
 */
export function isValidHashFormat(hash: string): boolean {
  return HASH_PATTERN.test(hash);
}

/**
 * Leading hex digits of a hash, for progress output.
 */
export function shortHash(hash: string, length = 16): string {
  const hex = hash.startsWith(HASH_PREFIX) ? hash.slice(HASH_PREFIX.length) : hash;
  return hex.slice(0, length);
}
