/**
 * Inspect command handler for the opencli CLI.
 *
 * Loads an OpenCLI document from a YAML or JSON file and prints it in the
 * configured output format.
 */

import { loadFromPath, OpenCliLoadError } from '../../loader/index.js';
import { CliUsageError, EXIT_CODES, exitCodeForLoadError, formatLoadError } from '../errors.js';
import { renderDocument } from '../render.js';
import type { CliCommandResult, CliContext } from '../types.js';

/**
 * Handles the inspect command.
 *
 * @param context - The CLI context; `args` must hold exactly one path.
 * @returns The command result with an exit code derived from the load outcome.
 * @throws CliUsageError if the path argument is missing or repeated.
 */
export function handleInspectCommand(context: CliContext): CliCommandResult {
  const [filePath, ...extra] = context.args;
  if (filePath === undefined) {
    throw new CliUsageError('Missing path to OpenCLI document');
  }
  if (extra.length > 0) {
    throw new CliUsageError(`Unexpected argument: ${extra.join(' ')}`);
  }

  const { logger, config } = context;
  logger.debug('load_started', { path: filePath });

  try {
    const document = loadFromPath(filePath);
    logger.debug('load_succeeded', {
      path: filePath,
      title: document.info.title,
      commands: document.commands.length,
    });
    console.log(renderDocument(document, config.format, config.pretty));
    return { exitCode: EXIT_CODES.success };
  } catch (error) {
    if (!(error instanceof OpenCliLoadError)) {
      throw error;
    }
    logger.error('load_failed', {
      path: filePath,
      kind: error.kind,
      cause: error.cause?.message,
    });
    console.error(formatLoadError(error, { colors: process.stderr.isTTY === true }));
    return { exitCode: exitCodeForLoadError(error), message: error.message };
  }
}
