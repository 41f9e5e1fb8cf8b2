/**
 * Configuration module for the opencli command-line front end.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

export type { CliConfig, OutputFormat, PartialCliConfig } from './types.js';
export { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS, isOutputFormat } from './defaults.js';
export {
  EnvCoercionError,
  coerceToBoolean,
  coerceToFormat,
  readEnvOverrides,
  resolveCliConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvRecord } from './env.js';
