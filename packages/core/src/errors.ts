/**
 * @module errors
 * Error types raised by the composer core.
 *
 * Computational failures (bad sizes, malformed grids, unreadable sources) are
 * thrown. Lookups by layer id are advisory and report through `LayerResult`
 * instead.
 */

/** Base class for every error the composer throws. */
export class ComposerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A width, height or target size is non-positive or not an integer. */
export class InvalidDimensionError extends ComposerError {}

/** A pixel grid has the wrong shape or values for the requested step. */
export class InvalidInputError extends ComposerError {}

/** An image source could not be read or decoded. */
export class LoadError extends ComposerError {
  /** Path of the source that failed. */
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to load image "${path}": ${reason}`, { cause });
    this.path = path;
  }
}
