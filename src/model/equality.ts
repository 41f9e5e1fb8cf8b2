/**
 * Structural equality for OpenCLI model values.
 *
 * @packageDocumentation
 */

import type { OpenCliDocument } from './types.js';

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Returns the keys of a record whose values are not `undefined`.
 * A property holding `undefined` is treated the same as an absent one.
 */
function definedKeys(record: Record<string, unknown>): string[] {
  return Object.keys(record).filter((key) => record[key] !== undefined);
}

/**
 * Compares two model values structurally.
 *
 * Arrays compare element-wise in order; records compare by their defined keys
 * regardless of key order; everything else compares with `Object.is`, except
 * that `0` and `-0` are equal.
 *
 * @param a - First value.
 * @param b - Second value.
 * @returns True if the values are structurally equal.
 */
export function modelEquals<T>(a: T, b: T): boolean {
  return valuesEqual(a, b);
}

function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) {
    return true;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item: unknown, index) => valuesEqual(item, b[index]));
  }

  if (isPlainRecord(a) && isPlainRecord(b)) {
    const aKeys = definedKeys(a);
    const bKeys = definedKeys(b);
    if (aKeys.length !== bKeys.length) {
      return false;
    }
    return aKeys.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key])
    );
  }

  return Object.is(a, b);
}

/**
 * Compares two documents structurally.
 *
 * @param a - First document.
 * @param b - Second document.
 * @returns True if both documents describe the same CLI.
 */
export function documentsEqual(a: OpenCliDocument, b: OpenCliDocument): boolean {
  return modelEquals(a, b);
}
