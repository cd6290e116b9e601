/**
 * Command-line argument parsing
 *
 * Only one form is recognised: `--test <N>`, the number of runs per PDF for
 * the consistency check. Anything else means a single run.
 *
 * @module cli/args
 */

import { invalidArgumentError } from '../utils/errors.js';

export const USAGE = 'Usage: pdf-table-extract [--test <runs>]';

export function parseRepeatCount(argv: readonly string[]): number {
  if (argv.length !== 2 || argv[0] !== '--test') {
    return 1;
  }

  const raw = argv[1];
  const runs = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(runs) || runs < 1) {
    throw invalidArgumentError(`Invalid run count for --test: "${raw}"`, { hint: USAGE });
  }
  return runs;
}
