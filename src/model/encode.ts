/**
 * Serialization of OpenCLI documents to plain values, JSON and YAML.
 *
 * Absent optional fields and empty sequences are omitted from the output, so
 * an empty sequence written out reads back the same as a missing one.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import type {
  MetadataValue,
  OpenCliArgument,
  OpenCliArity,
  OpenCliCommand,
  OpenCliContact,
  OpenCliConventions,
  OpenCliDocument,
  OpenCliExitCode,
  OpenCliInfo,
  OpenCliLicense,
  OpenCliMetadata,
  OpenCliOption,
} from './types.js';

/**
 * A JSON object as produced by {@link encodeDocument}.
 */
export interface EncodedObject {
  [key: string]: MetadataValue;
}

/**
 * Options for JSON serialization.
 */
export interface JsonOptions {
  /**
   * Whether to indent the output with two spaces.
   * @defaultValue true
   */
  readonly pretty?: boolean;
}

function putOptional(target: EncodedObject, key: string, value: MetadataValue | undefined): void {
  if (value !== undefined) {
    target[key] = value;
  }
}

function putSequence<T>(
  target: EncodedObject,
  key: string,
  items: readonly T[],
  encodeItem: (item: T) => MetadataValue
): void {
  if (items.length > 0) {
    target[key] = items.map(encodeItem);
  }
}

function identity<T extends MetadataValue>(value: T): T {
  return value;
}

function encodeMetadata(metadata: OpenCliMetadata): EncodedObject {
  const out: EncodedObject = { name: metadata.name };
  putOptional(out, 'value', metadata.value);
  return out;
}

function encodeContact(contact: OpenCliContact): EncodedObject {
  const out: EncodedObject = {};
  putOptional(out, 'name', contact.name);
  putOptional(out, 'url', contact.url);
  putOptional(out, 'email', contact.email);
  return out;
}

function encodeLicense(license: OpenCliLicense): EncodedObject {
  const out: EncodedObject = {};
  putOptional(out, 'name', license.name);
  putOptional(out, 'identifier', license.identifier);
  return out;
}

function encodeInfo(info: OpenCliInfo): EncodedObject {
  const out: EncodedObject = { title: info.title };
  putOptional(out, 'summary', info.summary);
  putOptional(out, 'description', info.description);
  putOptional(out, 'contact', info.contact && encodeContact(info.contact));
  putOptional(out, 'license', info.license && encodeLicense(info.license));
  out.version = info.version;
  return out;
}

function encodeConventions(conventions: OpenCliConventions): EncodedObject {
  const out: EncodedObject = {};
  putOptional(out, 'groupOptions', conventions.groupOptions);
  putOptional(out, 'optionArgumentSeparator', conventions.optionArgumentSeparator);
  return out;
}

function encodeArity(arity: OpenCliArity): EncodedObject {
  const out: EncodedObject = {};
  putOptional(out, 'minimum', arity.minimum);
  putOptional(out, 'maximum', arity.maximum);
  return out;
}

function encodeExitCode(exitCode: OpenCliExitCode): EncodedObject {
  const out: EncodedObject = { code: exitCode.code };
  putOptional(out, 'description', exitCode.description);
  return out;
}

function encodeArgument(argument: OpenCliArgument): EncodedObject {
  const out: EncodedObject = { name: argument.name };
  putOptional(out, 'required', argument.required);
  putOptional(out, 'arity', argument.arity && encodeArity(argument.arity));
  putSequence(out, 'acceptedValues', argument.acceptedValues, identity);
  putOptional(out, 'group', argument.group);
  putOptional(out, 'description', argument.description);
  putOptional(out, 'hidden', argument.hidden);
  putSequence(out, 'metadata', argument.metadata, encodeMetadata);
  return out;
}

function encodeOption(option: OpenCliOption): EncodedObject {
  const out: EncodedObject = { name: option.name };
  putOptional(out, 'required', option.required);
  putSequence(out, 'aliases', option.aliases, identity);
  putSequence(out, 'arguments', option.arguments, encodeArgument);
  putOptional(out, 'group', option.group);
  putOptional(out, 'description', option.description);
  putOptional(out, 'recursive', option.recursive);
  putOptional(out, 'hidden', option.hidden);
  putSequence(out, 'metadata', option.metadata, encodeMetadata);
  return out;
}

function encodeCommand(command: OpenCliCommand): EncodedObject {
  const out: EncodedObject = { name: command.name };
  putSequence(out, 'aliases', command.aliases, identity);
  putSequence(out, 'options', command.options, encodeOption);
  putSequence(out, 'arguments', command.arguments, encodeArgument);
  putSequence(out, 'commands', command.commands, encodeCommand);
  putSequence(out, 'exitCodes', command.exitCodes, encodeExitCode);
  putOptional(out, 'description', command.description);
  putOptional(out, 'hidden', command.hidden);
  putSequence(out, 'examples', command.examples, identity);
  putOptional(out, 'interactive', command.interactive);
  putSequence(out, 'metadata', command.metadata, encodeMetadata);
  return out;
}

/**
 * Encodes a document as a plain JSON-compatible object with lower camel case
 * field names.
 *
 * @param document - The document to encode.
 * @returns The encoded object.
 */
export function encodeDocument(document: OpenCliDocument): EncodedObject {
  const out: EncodedObject = {
    opencli: document.opencli,
    info: encodeInfo(document.info),
  };
  putOptional(out, 'conventions', document.conventions && encodeConventions(document.conventions));
  putSequence(out, 'arguments', document.arguments, encodeArgument);
  putSequence(out, 'options', document.options, encodeOption);
  putSequence(out, 'commands', document.commands, encodeCommand);
  putSequence(out, 'exitCodes', document.exitCodes, encodeExitCode);
  putSequence(out, 'examples', document.examples, identity);
  putOptional(out, 'interactive', document.interactive);
  putSequence(out, 'metadata', document.metadata, encodeMetadata);
  return out;
}

/**
 * Serializes a document to JSON text.
 *
 * @param document - The document to serialize.
 * @param options - Serialization options.
 * @returns JSON string.
 */
export function toJson(document: OpenCliDocument, options: JsonOptions = {}): string {
  const pretty = options.pretty ?? true;
  return JSON.stringify(encodeDocument(document), null, pretty ? 2 : undefined);
}

/**
 * Serializes a document to YAML text.
 *
 * @param document - The document to serialize.
 * @returns YAML string.
 */
export function toYaml(document: OpenCliDocument): string {
  return yaml.dump(encodeDocument(document), {
    indent: 2,
    lineWidth: -1,
    noRefs: true,
    sortKeys: false,
  });
}
