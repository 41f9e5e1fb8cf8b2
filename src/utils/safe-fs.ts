/**
 * Safe file system utilities with path validation.
 *
 * Paths are resolved to absolute paths and validated before any file system
 * operation is attempted:
 *
 * - The path must be a non-empty string
 * - The path must not contain null bytes
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  return path.resolve(filePath);
}

/**
 * Synchronously reads the raw bytes of a file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadFileSync(filePath: string): Buffer {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath);
}
