#!/usr/bin/env node

/**
 * opencli CLI entry point.
 */

import { runCli } from './app.js';

try {
  const result = runCli(process.argv.slice(2));
  process.exit(result.exitCode);
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}
