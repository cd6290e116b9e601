#!/usr/bin/env node
/**
 * pdf-table-extract - CLI Entry Point
 *
 * Usage:
 *   pdf-table-extract              # one run per PDF
 *   pdf-table-extract --test 3     # three runs per PDF, compared by hash
 *
 * @module bin
 */

import { runCli } from './cli/main.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
