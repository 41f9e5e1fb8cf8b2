/**
 * Application context setup for the opencli command-line front end.
 */

import {
  getEnvVarDocumentation,
  isOutputFormat,
  OUTPUT_FORMATS,
  resolveCliConfig,
  type EnvRecord,
  type PartialCliConfig,
} from '../config/index.js';
import { Logger } from '../utils/logger.js';
import { handleInspectCommand } from './commands/inspect.js';
import { handleVersionCommand } from './commands/version.js';
import { CliUsageError, EXIT_CODES } from './errors.js';
import type { CliCommandResult, CliContext } from './types.js';
import { runWithErrorHandling } from './utils/errorHandling.js';

/**
 * Result of splitting command arguments into positionals and flags.
 */
export interface ParsedArgs {
  /** Positional arguments in order. */
  positionals: string[];
  /** Configuration overrides given as flags. */
  flags: PartialCliConfig;
}

/**
 * Parses the flags shared by document commands.
 *
 * Recognized flags: `--format <json|yaml|tree>` (or `--format=<value>`),
 * `--compact`, `--debug`. Everything after `--` is positional.
 *
 * @param args - Arguments following the command name.
 * @returns Positionals and flag overrides.
 * @throws CliUsageError for unknown flags or a bad format value.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: PartialCliConfig = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--') {
      positionals.push(...args.slice(i + 1));
      break;
    }

    if (arg === '--format' || arg.startsWith('--format=')) {
      const value = arg === '--format' ? args[++i] : arg.slice('--format='.length);
      if (value === undefined || !isOutputFormat(value)) {
        throw new CliUsageError(
          `Invalid value for --format: expected one of ${OUTPUT_FORMATS.join(', ')}, got '${value ?? ''}'`
        );
      }
      flags.format = value;
    } else if (arg === '--compact') {
      flags.pretty = false;
    } else if (arg === '--debug') {
      flags.debug = true;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new CliUsageError(`Unknown option: ${arg}`);
    } else {
      positionals.push(arg);
    }
  }

  return { positionals, flags };
}

/**
 * Creates the CLI application context for a command.
 *
 * @param args - Arguments following the command name.
 * @param env - Environment to read OPENCLI_* overrides from (defaults to process.env).
 * @returns The CLI context.
 * @throws CliUsageError for invalid flags.
 * @throws EnvCoercionError for invalid environment values.
 */
export function createCliApp(args: readonly string[], env?: EnvRecord): CliContext {
  const { positionals, flags } = parseArgs(args);
  const config = resolveCliConfig(flags, env);

  return {
    args: positionals,
    config,
    logger: new Logger({ component: 'cli', debugMode: config.debug }),
  };
}

const HELP_TEXT = `
opencli - inspect OpenCLI documents

USAGE:
  opencli <command> [options]

COMMANDS:
  inspect <path>  Load a YAML or JSON OpenCLI document and print it
  help            Show this help message
  version         Show version information

OPTIONS:
  --format <fmt>  Output format: json, yaml or tree (default: json)
  --compact       Print JSON on a single line
  --debug         Write debug log entries to stderr
  --help, -h      Show help
  --version, -v   Show version information

ENVIRONMENT:
${Object.entries(getEnvVarDocumentation())
  .map(([name, doc]) => `  ${name.padEnd(16)}${doc.description}`)
  .join('\n')}

EXIT CODES:
  0 success, 1 usage error, 2 parse error, 3 read error, 4 input is not UTF-8 text

EXAMPLES:
  opencli inspect opencli.yaml
  opencli inspect opencli.json --format tree
`;

/**
 * Displays usage information.
 */
export function showHelp(): void {
  console.log(HELP_TEXT);
}

/**
 * Dispatches a command line to its handler.
 *
 * @param argv - Arguments after the executable, e.g. `process.argv.slice(2)`.
 * @param env - Environment to read OPENCLI_* overrides from (defaults to process.env).
 * @returns The command result; the caller decides how to exit.
 */
export function runCli(argv: readonly string[], env?: EnvRecord): CliCommandResult {
  const [command, ...commandArgs] = argv;

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      showHelp();
      return { exitCode: EXIT_CODES.success };

    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand();

    case 'inspect':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelp();
        return { exitCode: EXIT_CODES.success };
      }
      return runWithErrorHandling(() => handleInspectCommand(createCliApp(commandArgs, env)));

    default:
      return runWithErrorHandling(() => {
        throw new CliUsageError(`Unknown command: ${command}`);
      });
  }
}
