/**
 * Default configuration values for the opencli command-line front end.
 *
 * @packageDocumentation
 */

import type { CliConfig, OutputFormat } from './types.js';

/**
 * Output formats accepted by `--format` and `OPENCLI_FORMAT`.
 */
export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'tree'];

/**
 * Default CLI configuration.
 */
export const DEFAULT_CLI_CONFIG: CliConfig = {
  format: 'json',
  pretty: true,
  debug: false,
};

/**
 * Checks whether a string names a supported output format.
 *
 * @param value - The candidate format name.
 * @returns True if the value is an OutputFormat.
 */
export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}
