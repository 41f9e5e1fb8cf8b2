/**
 * OpenCLI document model.
 *
 * Provides the record types of an OpenCLI description together with factories,
 * structural equality, decoding from raw values and encoding to JSON or YAML.
 *
 * @packageDocumentation
 */

export { DocumentDecodeError, decodeDocument } from './decode.js';
export { encodeDocument, toJson, toYaml } from './encode.js';
export type { EncodedObject, JsonOptions } from './encode.js';
export { documentsEqual, modelEquals } from './equality.js';
export {
  createArgument,
  createCommand,
  createDocument,
  createExitCode,
  createInfo,
  createMetadata,
  createOption,
} from './factories.js';
export type {
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
