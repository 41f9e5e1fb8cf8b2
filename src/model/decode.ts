/**
 * Structural decoder from raw structured values to the OpenCLI model.
 *
 * The input is whatever a YAML or JSON parser produced. Decoding checks field
 * presence and types only; no semantic validation is performed.
 *
 * @packageDocumentation
 */

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
 * Error thrown when a raw value does not have the shape of an OpenCLI document.
 */
export class DocumentDecodeError extends Error {
  /** Dotted path of the offending field, empty for the document root. */
  public readonly fieldPath: string;

  /**
   * Creates a new DocumentDecodeError.
   *
   * @param message - Descriptive error message.
   * @param fieldPath - Path of the field that failed to decode.
   */
  constructor(message: string, fieldPath: string) {
    super(message);
    this.name = 'DocumentDecodeError';
    this.fieldPath = fieldPath;
  }
}

type RawRecord = Record<string, unknown>;

/** Bounds of the signed 32-bit integers used for exit codes and arity. */
const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPlainPrototype(proto: unknown): boolean {
  return proto === Object.prototype || proto === null;
}

function childPath(parent: string, key: string): string {
  return parent === '' ? key : `${parent}.${key}`;
}

function label(fieldPath: string): string {
  return fieldPath === '' ? 'document' : `'${fieldPath}'`;
}

/**
 * Reads an own property of a raw record. `null` reads as absent.
 */
function field(raw: RawRecord, key: string): unknown {
  if (!Object.prototype.hasOwnProperty.call(raw, key)) {
    return undefined;
  }
  const value = raw[key];
  return value === null ? undefined : value;
}

function validateRecord(value: unknown, fieldPath: string): RawRecord {
  if (!isRecord(value)) {
    throw new DocumentDecodeError(
      `Invalid type for ${label(fieldPath)}: expected object, got ${describeType(value)}`,
      fieldPath
    );
  }
  return value;
}

function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new DocumentDecodeError(
      `Invalid type for ${label(fieldPath)}: expected string, got ${describeType(value)}`,
      fieldPath
    );
  }
  return value;
}

function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new DocumentDecodeError(
      `Invalid type for ${label(fieldPath)}: expected boolean, got ${describeType(value)}`,
      fieldPath
    );
  }
  return value;
}

function validateInteger(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new DocumentDecodeError(
      `Invalid type for ${label(fieldPath)}: expected integer, got ${describeType(value)}`,
      fieldPath
    );
  }
  if (value < INT32_MIN || value > INT32_MAX) {
    throw new DocumentDecodeError(
      `Invalid value for ${label(fieldPath)}: ${String(value)} is outside the 32-bit integer range`,
      fieldPath
    );
  }
  return value;
}

/**
 * Reads a required field, failing when it is absent or null.
 */
function required<T>(
  raw: RawRecord,
  key: string,
  parentPath: string,
  validate: (value: unknown, fieldPath: string) => T
): T {
  const fieldPath = childPath(parentPath, key);
  const value = field(raw, key);
  if (value === undefined) {
    throw new DocumentDecodeError(`Missing required field: '${fieldPath}'`, fieldPath);
  }
  return validate(value, fieldPath);
}

/**
 * Reads an optional field. Absent and null both yield undefined.
 */
function optional<T>(
  raw: RawRecord,
  key: string,
  parentPath: string,
  validate: (value: unknown, fieldPath: string) => T
): T | undefined {
  const value = field(raw, key);
  return value === undefined ? undefined : validate(value, childPath(parentPath, key));
}

/**
 * Reads a sequence field. Absent, null and empty all yield an empty array.
 */
function sequence<T>(
  raw: RawRecord,
  key: string,
  parentPath: string,
  validateItem: (value: unknown, fieldPath: string) => T
): T[] {
  const fieldPath = childPath(parentPath, key);
  const value = field(raw, key);
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DocumentDecodeError(
      `Invalid type for '${fieldPath}': expected array, got ${describeType(value)}`,
      fieldPath
    );
  }
  return value.map((item: unknown, index) => validateItem(item, `${fieldPath}[${String(index)}]`));
}

/**
 * Validates an arbitrary metadata value, copying it into plain arrays and
 * objects. Nested nulls are kept.
 */
function decodeMetadataValue(value: unknown, fieldPath: string): MetadataValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new DocumentDecodeError(
        `Invalid value for '${fieldPath}': expected a finite number, got ${String(value)}`,
        fieldPath
      );
    }
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, index) =>
      decodeMetadataValue(item, `${fieldPath}[${String(index)}]`)
    );
  }
  if (isRecord(value) && isPlainPrototype(Object.getPrototypeOf(value))) {
    // fromEntries defines own properties, so a '__proto__' key stays plain data
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [
        key,
        decodeMetadataValue(item, `${fieldPath}.${key}`),
      ])
    );
  }
  throw new DocumentDecodeError(
    `Invalid type for '${fieldPath}': expected a JSON-compatible value, got ${describeType(value)}`,
    fieldPath
  );
}

function decodeMetadata(value: unknown, fieldPath: string): OpenCliMetadata {
  const raw = validateRecord(value, fieldPath);
  const metadata: OpenCliMetadata = {
    name: required(raw, 'name', fieldPath, validateString),
  };

  const metadataValue = optional(raw, 'value', fieldPath, decodeMetadataValue);
  if (metadataValue !== undefined) {
    metadata.value = metadataValue;
  }

  return metadata;
}

function decodeContact(value: unknown, fieldPath: string): OpenCliContact {
  const raw = validateRecord(value, fieldPath);
  const contact: OpenCliContact = {};

  const name = optional(raw, 'name', fieldPath, validateString);
  if (name !== undefined) {
    contact.name = name;
  }
  const url = optional(raw, 'url', fieldPath, validateString);
  if (url !== undefined) {
    contact.url = url;
  }
  const email = optional(raw, 'email', fieldPath, validateString);
  if (email !== undefined) {
    contact.email = email;
  }

  return contact;
}

function decodeLicense(value: unknown, fieldPath: string): OpenCliLicense {
  const raw = validateRecord(value, fieldPath);
  const license: OpenCliLicense = {};

  const name = optional(raw, 'name', fieldPath, validateString);
  if (name !== undefined) {
    license.name = name;
  }
  const identifier = optional(raw, 'identifier', fieldPath, validateString);
  if (identifier !== undefined) {
    license.identifier = identifier;
  }

  return license;
}

function decodeInfo(value: unknown, fieldPath: string): OpenCliInfo {
  const raw = validateRecord(value, fieldPath);
  const info: OpenCliInfo = {
    title: required(raw, 'title', fieldPath, validateString),
    version: required(raw, 'version', fieldPath, validateString),
  };

  const summary = optional(raw, 'summary', fieldPath, validateString);
  if (summary !== undefined) {
    info.summary = summary;
  }
  const description = optional(raw, 'description', fieldPath, validateString);
  if (description !== undefined) {
    info.description = description;
  }
  const contact = optional(raw, 'contact', fieldPath, decodeContact);
  if (contact !== undefined) {
    info.contact = contact;
  }
  const license = optional(raw, 'license', fieldPath, decodeLicense);
  if (license !== undefined) {
    info.license = license;
  }

  return info;
}

function decodeConventions(value: unknown, fieldPath: string): OpenCliConventions {
  const raw = validateRecord(value, fieldPath);
  const conventions: OpenCliConventions = {};

  const groupOptions = optional(raw, 'groupOptions', fieldPath, validateBoolean);
  if (groupOptions !== undefined) {
    conventions.groupOptions = groupOptions;
  }
  const separator = optional(raw, 'optionArgumentSeparator', fieldPath, validateString);
  if (separator !== undefined) {
    conventions.optionArgumentSeparator = separator;
  }

  return conventions;
}

function decodeArity(value: unknown, fieldPath: string): OpenCliArity {
  const raw = validateRecord(value, fieldPath);
  const arity: OpenCliArity = {};

  const minimum = optional(raw, 'minimum', fieldPath, validateInteger);
  if (minimum !== undefined) {
    arity.minimum = minimum;
  }
  const maximum = optional(raw, 'maximum', fieldPath, validateInteger);
  if (maximum !== undefined) {
    arity.maximum = maximum;
  }

  return arity;
}

function decodeExitCode(value: unknown, fieldPath: string): OpenCliExitCode {
  const raw = validateRecord(value, fieldPath);
  const exitCode: OpenCliExitCode = {
    code: required(raw, 'code', fieldPath, validateInteger),
  };

  const description = optional(raw, 'description', fieldPath, validateString);
  if (description !== undefined) {
    exitCode.description = description;
  }

  return exitCode;
}

function decodeArgument(value: unknown, fieldPath: string): OpenCliArgument {
  const raw = validateRecord(value, fieldPath);
  const argument: OpenCliArgument = {
    name: required(raw, 'name', fieldPath, validateString),
    acceptedValues: sequence(raw, 'acceptedValues', fieldPath, validateString),
    metadata: sequence(raw, 'metadata', fieldPath, decodeMetadata),
  };

  const isRequired = optional(raw, 'required', fieldPath, validateBoolean);
  if (isRequired !== undefined) {
    argument.required = isRequired;
  }
  const arity = optional(raw, 'arity', fieldPath, decodeArity);
  if (arity !== undefined) {
    argument.arity = arity;
  }
  const group = optional(raw, 'group', fieldPath, validateString);
  if (group !== undefined) {
    argument.group = group;
  }
  const description = optional(raw, 'description', fieldPath, validateString);
  if (description !== undefined) {
    argument.description = description;
  }
  const hidden = optional(raw, 'hidden', fieldPath, validateBoolean);
  if (hidden !== undefined) {
    argument.hidden = hidden;
  }

  return argument;
}

function decodeOption(value: unknown, fieldPath: string): OpenCliOption {
  const raw = validateRecord(value, fieldPath);
  const option: OpenCliOption = {
    name: required(raw, 'name', fieldPath, validateString),
    aliases: sequence(raw, 'aliases', fieldPath, validateString),
    arguments: sequence(raw, 'arguments', fieldPath, decodeArgument),
    metadata: sequence(raw, 'metadata', fieldPath, decodeMetadata),
  };

  const isRequired = optional(raw, 'required', fieldPath, validateBoolean);
  if (isRequired !== undefined) {
    option.required = isRequired;
  }
  const group = optional(raw, 'group', fieldPath, validateString);
  if (group !== undefined) {
    option.group = group;
  }
  const description = optional(raw, 'description', fieldPath, validateString);
  if (description !== undefined) {
    option.description = description;
  }
  const recursive = optional(raw, 'recursive', fieldPath, validateBoolean);
  if (recursive !== undefined) {
    option.recursive = recursive;
  }
  const hidden = optional(raw, 'hidden', fieldPath, validateBoolean);
  if (hidden !== undefined) {
    option.hidden = hidden;
  }

  return option;
}

function decodeCommand(value: unknown, fieldPath: string): OpenCliCommand {
  const raw = validateRecord(value, fieldPath);
  const command: OpenCliCommand = {
    name: required(raw, 'name', fieldPath, validateString),
    aliases: sequence(raw, 'aliases', fieldPath, validateString),
    options: sequence(raw, 'options', fieldPath, decodeOption),
    arguments: sequence(raw, 'arguments', fieldPath, decodeArgument),
    commands: sequence(raw, 'commands', fieldPath, decodeCommand),
    exitCodes: sequence(raw, 'exitCodes', fieldPath, decodeExitCode),
    examples: sequence(raw, 'examples', fieldPath, validateString),
    metadata: sequence(raw, 'metadata', fieldPath, decodeMetadata),
  };

  const description = optional(raw, 'description', fieldPath, validateString);
  if (description !== undefined) {
    command.description = description;
  }
  const hidden = optional(raw, 'hidden', fieldPath, validateBoolean);
  if (hidden !== undefined) {
    command.hidden = hidden;
  }
  const interactive = optional(raw, 'interactive', fieldPath, validateBoolean);
  if (interactive !== undefined) {
    command.interactive = interactive;
  }

  return command;
}

/**
 * Decodes a raw structured value into an OpenCLI document.
 *
 * Field names are read in lower camel case. Unknown fields are ignored.
 *
 * @param raw - Value produced by a YAML or JSON parser.
 * @returns The decoded document.
 * @throws DocumentDecodeError if a required field is missing or any field has the wrong type.
 *
 * @example
 * ```typescript
 * const doc = decodeDocument(JSON.parse(text));
 * console.log(doc.info.title);
 * ```
 */
export function decodeDocument(raw: unknown): OpenCliDocument {
  const root = validateRecord(raw, '');
  const document: OpenCliDocument = {
    opencli: required(root, 'opencli', '', validateString),
    info: required(root, 'info', '', decodeInfo),
    arguments: sequence(root, 'arguments', '', decodeArgument),
    options: sequence(root, 'options', '', decodeOption),
    commands: sequence(root, 'commands', '', decodeCommand),
    exitCodes: sequence(root, 'exitCodes', '', decodeExitCode),
    examples: sequence(root, 'examples', '', validateString),
    metadata: sequence(root, 'metadata', '', decodeMetadata),
  };

  const conventions = optional(root, 'conventions', '', decodeConventions);
  if (conventions !== undefined) {
    document.conventions = conventions;
  }
  const interactive = optional(root, 'interactive', '', validateBoolean);
  if (interactive !== undefined) {
    document.interactive = interactive;
  }

  return document;
}
