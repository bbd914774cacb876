#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage (run from source through tsx):
 *   npm run cli -- --input ./input --output ./output
 *   npm run cli -- --config ./lineproto-csv.json
 */

import { run } from './run.js';

run({ argv: process.argv.slice(2) })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Unexpected failure: ${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
