/**
 * Rendering of loaded documents for terminal output.
 *
 * @packageDocumentation
 */

import type { OutputFormat } from '../config/index.js';
import { toJson, toYaml } from '../model/index.js';
import type {
  OpenCliArgument,
  OpenCliCommand,
  OpenCliDocument,
  OpenCliOption,
} from '../model/index.js';

const INDENT = '  ';

function hiddenMarker(hidden: boolean | undefined): string {
  return hidden === true ? ' [hidden]' : '';
}

function renderArgument(argument: OpenCliArgument, depth: number): string {
  return `${INDENT.repeat(depth)}<${argument.name}>${hiddenMarker(argument.hidden)}`;
}

function renderOption(option: OpenCliOption, depth: number): string {
  const names = [option.name, ...option.aliases].join(', ');
  return `${INDENT.repeat(depth)}${names}${hiddenMarker(option.hidden)}`;
}

function renderMembers(
  members: Pick<OpenCliCommand, 'arguments' | 'options' | 'commands'>,
  depth: number
): string[] {
  return [
    ...members.arguments.map((argument) => renderArgument(argument, depth)),
    ...members.options.map((option) => renderOption(option, depth)),
    ...members.commands.flatMap((command) => renderCommand(command, depth)),
  ];
}

function renderCommand(command: OpenCliCommand, depth: number): string[] {
  const aliases = command.aliases.length > 0 ? ` (${command.aliases.join(', ')})` : '';
  const description = command.description !== undefined ? ` - ${command.description}` : '';
  const line = `${INDENT.repeat(depth)}${command.name}${aliases}${description}${hiddenMarker(command.hidden)}`;
  return [line, ...renderMembers(command, depth + 1)];
}

/**
 * Renders an indented outline of the command tree.
 *
 * Each node lists its arguments as `<name>`, then its options with aliases,
 * then its sub commands.
 *
 * @param document - The document to render.
 * @returns The outline, one node per line.
 *
 * @example
 * ```text
 * demo 1.0 (opencli 0.1)
 *   build (b) - Build it
 *     <target>
 *     --release, -r
 * ```
 */
export function renderCommandTree(document: OpenCliDocument): string {
  const header = `${document.info.title} ${document.info.version} (opencli ${document.opencli})`;
  return [header, ...renderMembers(document, 1)].join('\n');
}

/**
 * Renders a document in the requested output format.
 *
 * @param document - The document to render.
 * @param format - The output format.
 * @param pretty - Whether JSON output is indented.
 * @returns The rendered text without a trailing newline.
 */
export function renderDocument(
  document: OpenCliDocument,
  format: OutputFormat,
  pretty: boolean
): string {
  switch (format) {
    case 'json':
      return toJson(document, { pretty });
    case 'yaml':
      return toYaml(document).trimEnd();
    case 'tree':
      return renderCommandTree(document);
  }
}
