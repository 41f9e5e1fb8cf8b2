/**
 * Shared error handling utilities for CLI commands.
 */

import { EnvCoercionError } from '../../config/index.js';
import { CliUsageError, EXIT_CODES } from '../errors.js';
import type { CliCommandResult } from '../types.js';

/**
 * Runs a command handler and converts thrown errors into a result.
 *
 * - Usage and environment errors print `Error: <message>` plus a help hint and yield exit code 1
 * - Any other error prints `Error: <message>` and yields exit code 1
 *
 * @param fn - The command to run.
 * @returns The command result.
 */
export function runWithErrorHandling(fn: () => CliCommandResult): CliCommandResult {
  try {
    return fn();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Error: ${message}`);
    if (error instanceof CliUsageError || error instanceof EnvCoercionError) {
      console.error('\nRun "opencli help" for usage information.');
    }
    return { exitCode: EXIT_CODES.usage, message };
  }
}
