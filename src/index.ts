/**
 * OpenCLI document toolkit.
 *
 * Typed model of OpenCLI descriptions and a loader that accepts YAML or JSON.
 *
 * @example
 * ```typescript
 * import { loadFromPath } from 'opencli-document';
 *
 * const doc = loadFromPath('opencli.yaml');
 * console.log(doc.commands.map((command) => command.name));
 * ```
 *
 * @packageDocumentation
 */

export {
  DocumentDecodeError,
  createArgument,
  createCommand,
  createDocument,
  createExitCode,
  createInfo,
  createMetadata,
  createOption,
  decodeDocument,
  documentsEqual,
  encodeDocument,
  modelEquals,
  toJson,
  toYaml,
} from './model/index.js';
export type {
  EncodedObject,
  JsonOptions,
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
} from './model/index.js';

export {
  INVALID_UTF8_MESSAGE,
  OpenCliLoadError,
  loadFromBytes,
  loadFromPath,
  loadFromText,
} from './loader/index.js';
export type { LoadErrorKind } from './loader/index.js';
