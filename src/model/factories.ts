/**
 * Factory functions for OpenCLI model records.
 *
 * Each factory takes the required fields positionally and fills every sequence
 * field with an empty array unless the caller supplies it.
 *
 * @packageDocumentation
 */

import type {
  MetadataValue,
  OpenCliArgument,
  OpenCliCommand,
  OpenCliDocument,
  OpenCliExitCode,
  OpenCliInfo,
  OpenCliMetadata,
  OpenCliOption,
} from './types.js';

/**
 * Creates an info record.
 *
 * @param title - The application title.
 * @param version - The application version.
 * @param fields - Optional fields to set.
 * @returns A new OpenCliInfo.
 */
export function createInfo(
  title: string,
  version: string,
  fields: Partial<Omit<OpenCliInfo, 'title' | 'version'>> = {}
): OpenCliInfo {
  return { title, ...fields, version };
}

/**
 * Creates a document with empty sequences.
 *
 * @param opencli - The OpenCLI version string.
 * @param info - Information about the CLI.
 * @param fields - Optional and sequence fields to set.
 * @returns A new OpenCliDocument.
 *
 * @example
 * ```typescript
 * const doc = createDocument('0.1', createInfo('demo', '1.0'), {
 *   commands: [createCommand('build')],
 * });
 * ```
 */
export function createDocument(
  opencli: string,
  info: OpenCliInfo,
  fields: Partial<Omit<OpenCliDocument, 'opencli' | 'info'>> = {}
): OpenCliDocument {
  return {
    opencli,
    info,
    arguments: [],
    options: [],
    commands: [],
    exitCodes: [],
    examples: [],
    metadata: [],
    ...fields,
  };
}

/**
 * Creates a command with empty sequences.
 *
 * @param name - The command name.
 * @param fields - Optional and sequence fields to set.
 * @returns A new OpenCliCommand.
 */
export function createCommand(
  name: string,
  fields: Partial<Omit<OpenCliCommand, 'name'>> = {}
): OpenCliCommand {
  return {
    name,
    aliases: [],
    options: [],
    arguments: [],
    commands: [],
    exitCodes: [],
    examples: [],
    metadata: [],
    ...fields,
  };
}

/**
 * Creates an argument with empty sequences.
 *
 * @param name - The argument name.
 * @param fields - Optional and sequence fields to set.
 * @returns A new OpenCliArgument.
 */
export function createArgument(
  name: string,
  fields: Partial<Omit<OpenCliArgument, 'name'>> = {}
): OpenCliArgument {
  return {
    name,
    acceptedValues: [],
    metadata: [],
    ...fields,
  };
}

/**
 * Creates an option with empty sequences.
 *
 * @param name - The option name.
 * @param fields - Optional and sequence fields to set.
 * @returns A new OpenCliOption.
 */
export function createOption(
  name: string,
  fields: Partial<Omit<OpenCliOption, 'name'>> = {}
): OpenCliOption {
  return {
    name,
    aliases: [],
    arguments: [],
    metadata: [],
    ...fields,
  };
}

export function createExitCode(code: number, description?: string): OpenCliExitCode {
  return description === undefined ? { code } : { code, description };
}

export function createMetadata(name: string, value?: MetadataValue): OpenCliMetadata {
  return value === undefined ? { name } : { name, value };
}
