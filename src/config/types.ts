/**
 * Configuration types for the opencli command-line front end.
 *
 * @packageDocumentation
 */

/**
 * How a loaded document is rendered.
 *
 * - `json`: the encoded document as JSON
 * - `yaml`: the encoded document as YAML
 * - `tree`: an indented outline of the command tree
 */
export type OutputFormat = 'json' | 'yaml' | 'tree';

/**
 * Resolved CLI configuration.
 */
export interface CliConfig {
  /** Output format for the loaded document. */
  format: OutputFormat;
  /** Whether JSON output is indented. Ignored by the other formats. */
  pretty: boolean;
  /** Whether debug-level log entries are written to stderr. */
  debug: boolean;
}

/**
 * Partial configuration used for overrides from flags or the environment.
 */
export type PartialCliConfig = Partial<CliConfig>;
