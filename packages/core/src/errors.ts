/**
 * packages/core/src/errors.ts — Deterministic error type for cache misuse.
 *
 * Only programming errors surface here. Reads and writes of the tolerant
 * field family on an unregistered node never throw.
 */

/**
 * Deterministic error codes for cache contract violations.
 *
 *   - LAYOUT_CACHE_UNREGISTERED: strict accessor used on a node with no row
 *   - LAYOUT_CACHE_INVALID_ENTITY: entity index or generation out of range
 *   - LAYOUT_CACHE_INVALID_LAYER: layer is not a non-negative safe integer
 *   - LAYOUT_CACHE_INVALID_OPTIONS: malformed cache construction options
 */
export type LayoutCacheErrorCode =
  | "LAYOUT_CACHE_UNREGISTERED"
  | "LAYOUT_CACHE_INVALID_ENTITY"
  | "LAYOUT_CACHE_INVALID_LAYER"
  | "LAYOUT_CACHE_INVALID_OPTIONS";

/**
 * Error class for all cache contract violations.
 * The `code` property identifies the specific violation.
 */
export class LayoutCacheError extends Error {
  override readonly name = "LayoutCacheError";
  readonly code: LayoutCacheErrorCode;

  constructor(code: LayoutCacheErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LayoutCacheError);
    }
  }
}

export function isLayoutCacheError(value: unknown): value is LayoutCacheError {
  return value instanceof LayoutCacheError;
}
