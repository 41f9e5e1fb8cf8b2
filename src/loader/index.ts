/**
 * Loader module for OpenCLI documents in YAML or JSON.
 *
 * @packageDocumentation
 */

export { loadFromBytes, loadFromPath, loadFromText } from './loader.js';
export { INVALID_UTF8_MESSAGE, OpenCliLoadError } from './errors.js';
export type { LoadErrorKind } from './errors.js';
