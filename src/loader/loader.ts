/**
 * OpenCLI document loader.
 *
 * All entry points converge on {@link loadFromText}, which tries YAML first and
 * falls back to JSON. The YAML failure is discarded; only the JSON failure is
 * ever reported. A broken YAML document is therefore reported with a JSON
 * diagnostic.
 *
 * Loading is synchronous and stateless.
 *
 * @packageDocumentation
 */

import * as yaml from 'js-yaml';
import { parse as parseLosslessJson } from 'lossless-json';
import { decodeDocument } from '../model/decode.js';
import type { OpenCliDocument } from '../model/types.js';
import { safeReadFileSync } from '../utils/safe-fs.js';
import { INVALID_UTF8_MESSAGE, OpenCliLoadError, toError } from './errors.js';

/**
 * Decodes bytes as UTF-8, throwing on any malformed sequence.
 */
function decodeUtf8(bytes: Uint8Array): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

/**
 * Attempts the YAML decoding of a document.
 *
 * The core schema is used so that YAML-only types such as timestamps never
 * reach the model.
 */
function decodeYaml(text: string): OpenCliDocument {
  return decodeDocument(yaml.load(text, { schema: yaml.CORE_SCHEMA }));
}

/**
 * Attempts the JSON decoding of a document.
 *
 * Unlike `JSON.parse`, the parser rejects an object that repeats a key with a
 * different value instead of keeping the last one.
 */
function decodeJson(text: string): OpenCliDocument {
  return decodeDocument(parseLosslessJson(text, null, Number));
}

/**
 * Outcome of one decoding attempt.
 */
type DecodeAttempt =
  | { readonly success: true; readonly document: OpenCliDocument }
  | { readonly success: false; readonly error: Error };

function attempt(decode: (text: string) => OpenCliDocument, text: string): DecodeAttempt {
  try {
    return { success: true, document: decode(text) };
  } catch (error) {
    return { success: false, error: toError(error) };
  }
}

/**
 * Loads a document from text in either YAML or JSON.
 *
 * @param text - The document text.
 * @returns The decoded document.
 * @throws OpenCliLoadError of kind `parse` carrying the JSON-stage failure as cause.
 *
 * @example
 * ```typescript
 * const doc = loadFromText('{"opencli":"0.1","info":{"title":"demo","version":"1.0"}}');
 * console.log(doc.info.title); // "demo"
 * ```
 */
export function loadFromText(text: string): OpenCliDocument {
  const fromYaml = attempt(decodeYaml, text);
  if (fromYaml.success) {
    return fromYaml.document;
  }

  const fromJson = attempt(decodeJson, text);
  if (fromJson.success) {
    return fromJson.document;
  }

  throw new OpenCliLoadError(
    `Failed to parse OpenCLI document: ${fromJson.error.message}`,
    'parse',
    { cause: fromJson.error }
  );
}

/**
 * Loads a document from a byte buffer holding UTF-8 text.
 *
 * No other encoding is guessed and no lossy decoding is attempted.
 *
 * @param bytes - The raw document bytes.
 * @returns The decoded document.
 * @throws OpenCliLoadError of kind `other` if the bytes are not UTF-8, or `parse`.
 */
export function loadFromBytes(bytes: Uint8Array): OpenCliDocument {
  let text: string;
  try {
    text = decodeUtf8(bytes);
  } catch (error) {
    throw new OpenCliLoadError(INVALID_UTF8_MESSAGE, 'other', { cause: toError(error) });
  }
  return loadFromText(text);
}

/**
 * Loads a document from a file.
 *
 * @param filePath - Path to a YAML or JSON document.
 * @returns The decoded document.
 * @throws OpenCliLoadError of kind `io` if the file cannot be read as UTF-8 text, or `parse`.
 */
export function loadFromPath(filePath: string): OpenCliDocument {
  let text: string;
  try {
    text = decodeUtf8(safeReadFileSync(filePath));
  } catch (error) {
    const cause = toError(error);
    throw new OpenCliLoadError(`Failed to read OpenCLI document: ${cause.message}`, 'io', {
      cause,
      details: `Path: ${filePath}`,
    });
  }
  return loadFromText(text);
}
