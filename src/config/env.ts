/**
 * Environment variable overrides for the CLI configuration.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

import { DEFAULT_CLI_CONFIG, OUTPUT_FORMATS, isOutputFormat } from './defaults.js';
import type { CliConfig, OutputFormat, PartialCliConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

function getDefaultEnv(): EnvRecord {
  return process.env;
}

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Mapping from environment variable names to configuration fields.
 */
const ENV_VAR_MAPPINGS = {
  OPENCLI_FORMAT: 'format',
  OPENCLI_PRETTY: 'pretty',
  OPENCLI_DEBUG: 'debug',
} as const satisfies Record<string, keyof CliConfig>;

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
export function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to an output format.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The output format.
 * @throws EnvCoercionError if the value is not a known format.
 */
export function coerceToFormat(value: string, envVar: string): OutputFormat {
  const trimmed = value.trim().toLowerCase();
  if (isOutputFormat(trimmed)) {
    return trimmed;
  }
  throw new EnvCoercionError(
    envVar,
    value,
    'format',
    `Cannot coerce '${envVar}' value '${value}' to format. Expected one of: ${OUTPUT_FORMATS.join(', ')}`
  );
}

function applyEnvVar(
  overrides: PartialCliConfig,
  field: keyof CliConfig,
  value: string,
  envVar: string
): void {
  switch (field) {
    case 'format':
      overrides.format = coerceToFormat(value, envVar);
      break;
    case 'pretty':
      overrides.pretty = coerceToBoolean(value, envVar);
      break;
    case 'debug':
      overrides.debug = coerceToBoolean(value, envVar);
      break;
  }
}

/**
 * Reads OPENCLI_* environment variables and returns configuration overrides.
 *
 * Unset and empty variables are skipped.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Partial configuration with values from environment variables.
 * @throws EnvCoercionError if a variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const overrides = readEnvOverrides({ OPENCLI_FORMAT: 'yaml' });
 * console.log(overrides.format); // "yaml"
 * ```
 */
export function readEnvOverrides(env: EnvRecord = getDefaultEnv()): PartialCliConfig {
  const overrides: PartialCliConfig = {};

  for (const [envVar, field] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];
    if (value === undefined || value === '') {
      continue;
    }
    applyEnvVar(overrides, field, value, envVar);
  }

  return overrides;
}

/**
 * Resolves the effective CLI configuration.
 *
 * @param flags - Overrides parsed from command-line flags.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with flags over environment over defaults.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function resolveCliConfig(
  flags: PartialCliConfig = {},
  env: EnvRecord = getDefaultEnv()
): CliConfig {
  return {
    ...DEFAULT_CLI_CONFIG,
    ...readEnvOverrides(env),
    ...flags,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  return {
    OPENCLI_FORMAT: {
      description: `Default output format (${OUTPUT_FORMATS.join(', ')})`,
      type: 'string',
    },
    OPENCLI_PRETTY: {
      description: 'Indent JSON output (true/false)',
      type: 'boolean',
    },
    OPENCLI_DEBUG: {
      description: 'Write debug log entries to stderr (true/false)',
      type: 'boolean',
    },
  };
}
