/**
 * Error types for OpenCLI document loading.
 *
 * @packageDocumentation
 */

/**
 * Classification of a load failure.
 *
 * - `parse`: the text could not be decoded as a document (always the JSON-stage diagnostic)
 * - `io`: the byte source could not be read
 * - `other`: a fixed non-decoder failure, such as bytes that are not UTF-8 text
 */
export type LoadErrorKind = 'parse' | 'io' | 'other';

/**
 * Error thrown by the load entry points.
 */
export class OpenCliLoadError extends Error {
  /** The kind of load failure. */
  public readonly kind: LoadErrorKind;
  /** Additional details about the error. */
  public readonly details: string | undefined;
  /** The underlying cause of the error if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new OpenCliLoadError.
   *
   * @param message - Human-readable error message.
   * @param kind - The kind of load failure.
   * @param options - Additional error options.
   */
  constructor(
    message: string,
    kind: LoadErrorKind,
    options?: { details?: string | undefined; cause?: Error | undefined }
  ) {
    super(message);
    this.name = 'OpenCliLoadError';
    this.kind = kind;
    this.details = options?.details;
    this.cause = options?.cause;
  }
}

/** Message of the `other` error raised for bytes that are not UTF-8 text. */
export const INVALID_UTF8_MESSAGE = 'Input is not valid UTF-8 text';

/**
 * Normalizes a thrown value into an Error.
 *
 * @param error - The caught value.
 * @returns The value itself if it is an Error, otherwise a wrapping Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
