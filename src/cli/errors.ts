/**
 * Error reporting for the opencli command-line front end.
 *
 * Maps load failures to exit codes and contextual suggestions.
 *
 * @packageDocumentation
 */

import { OpenCliLoadError, type LoadErrorKind } from '../loader/index.js';

/**
 * Display options for error output.
 */
export interface DisplayOptions {
  /** Whether to use ANSI colors. */
  colors: boolean;
}

/**
 * Exit codes of the CLI.
 */
export const EXIT_CODES = {
  success: 0,
  usage: 1,
  parse: 2,
  io: 3,
  other: 4,
} as const;

/**
 * Error thrown for invalid command-line usage.
 */
export class CliUsageError extends Error {
  /**
   * Creates a new CliUsageError.
   *
   * @param message - Descriptive error message.
   */
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

const LOAD_ERROR_SUGGESTIONS: Readonly<Record<LoadErrorKind, readonly Suggestion[]>> = {
  parse: [
    {
      text: 'Check that the document is valid YAML or JSON',
    },
    {
      text: "Ensure 'opencli', 'info.title' and 'info.version' are present and are strings",
    },
    {
      text: 'YAML mistakes are reported by the JSON parser; lint the file as YAML if it is YAML',
    },
  ],
  io: [
    {
      text: 'Check that the path exists and is a readable file',
      action: 'ls -l <path>',
    },
    {
      text: 'Ensure the file is UTF-8 encoded',
      action: 'file <path>',
    },
  ],
  other: [
    {
      text: 'Ensure the input is UTF-8 encoded text',
    },
  ],
};

/**
 * Gets the exit code for a load error.
 *
 * @param error - The load error.
 * @returns The process exit code.
 */
export function exitCodeForLoadError(error: OpenCliLoadError): number {
  switch (error.kind) {
    case 'parse':
      return EXIT_CODES.parse;
    case 'io':
      return EXIT_CODES.io;
    case 'other':
      return EXIT_CODES.other;
    default: {
      const exhaustiveCheck: never = error.kind;
      return exhaustiveCheck;
    }
  }
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText =
    suggestion.action !== undefined ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats a load error with its cause, details and suggestions.
 *
 * @param error - The load error.
 * @param options - Display options.
 * @returns Formatted error text.
 */
export function formatLoadError(
  error: OpenCliLoadError,
  options: DisplayOptions = { colors: false }
): string {
  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${error.message}`;

  if (error.details !== undefined) {
    result += `\n  ${yellowCode}Details:${resetCode} ${error.details}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  LOAD_ERROR_SUGGESTIONS[error.kind].forEach((suggestion, index) => {
    result += '\n' + formatSuggestion(suggestion, index + 1, options);
  });

  return result;
}
