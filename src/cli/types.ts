/**
 * CLI types and interfaces for the opencli command-line front end.
 */

import type { CliConfig } from '../config/index.js';
import type { Logger } from '../utils/logger.js';

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Positional command-line arguments left after flag parsing.
   */
  args: string[];

  /**
   * Resolved CLI configuration.
   */
  config: CliConfig;

  /**
   * Logger writing structured entries to stderr.
   */
  logger: Logger;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}
