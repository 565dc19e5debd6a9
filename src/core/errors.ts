/**
 * Error types surfaced by the export pipeline.
 *
 * Only document-level and format-level problems are fatal. Per-element issues
 * (missing attributes, unparsable lengths, unknown colors or tags) degrade to
 * defaults and never reach the caller.
 */

/**
 * Base class for all errors thrown by markup-raster.
 */
export class MarkupRasterError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MarkupRasterError';
  }
}

/**
 * No root element could be found in the markup.
 */
export class ParseError extends MarkupRasterError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
  }
}

/**
 * The image encoder rejected the finished pixel buffer.
 */
export class EncodeError extends MarkupRasterError {
  readonly format: string;

  constructor(format: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to encode ${format.toUpperCase()}: ${message}`, options);
    this.name = 'EncodeError';
    this.format = format;
  }
}

/**
 * A format token did not name a supported export format.
 */
export class UnknownFormatError extends MarkupRasterError {
  readonly token: string;

  constructor(token: string) {
    super(`Unknown format: ${token}`);
    this.name = 'UnknownFormatError';
    this.token = token;
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
