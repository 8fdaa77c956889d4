#!/usr/bin/env node
/**
 * @fileoverview research-loop CLI
 *
 * Usage:
 *   research-loop run --title <text> --instruction <text> [options]
 *   research-loop tools
 *   research-loop --help
 */

import { runCli } from './main.js';

const controller = new AbortController();

process.once('SIGINT', () => {
  console.error('\n  Cancelling run...');
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then(code => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exitCode = 1;
  });
