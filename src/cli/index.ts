#!/usr/bin/env node
/**
 * Quarry command-line entry point.
 *
 * Usage: quarry <command> [options]
 */

import { run } from './run.js';

run(process.argv.slice(2)).catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
