/**
 * packages/core/src/cache/options.ts — Dense cache construction options.
 */

import { DEV_MODE } from "../dev.js";
import { MAX_ENTITY_INDEX } from "../entity.js";
import { LayoutCacheError } from "../errors.js";

export type NodeCacheOptions = Readonly<{
  /**
   * Slots allocated up front. Columns double when a larger index registers,
   * so memory follows the highest slot index, not the row count (164 bytes
   * per slot). Default 64.
   */
  initialCapacity?: number;
  /**
   * Warn once per slot when a tolerant write goes through a stale handle
   * (slot re-registered under another generation). Defaults to true outside
   * NODE_ENV=production.
   */
  warnOnStaleHandle?: boolean;
}>;

export type ResolvedNodeCacheOptions = Readonly<{
  initialCapacity: number;
  warnOnStaleHandle: boolean;
}>;

export const DEFAULT_INITIAL_CAPACITY = 64;
export const MAX_CAPACITY = MAX_ENTITY_INDEX + 1;

function invalid(detail: string): never {
  throw new LayoutCacheError("LAYOUT_CACHE_INVALID_OPTIONS", `createNodeCache: ${detail}`);
}

export function resolveNodeCacheOptions(options: NodeCacheOptions): ResolvedNodeCacheOptions {
  const capacity = options.initialCapacity ?? DEFAULT_INITIAL_CAPACITY;
  if (!Number.isInteger(capacity) || capacity < 0 || capacity > MAX_CAPACITY) {
    invalid(`initialCapacity must be an integer in 0..${MAX_CAPACITY} (got ${String(capacity)})`);
  }
  const warn = options.warnOnStaleHandle ?? DEV_MODE;
  if (typeof warn !== "boolean") {
    invalid(`warnOnStaleHandle must be a boolean (got ${typeof warn})`);
  }
  return Object.freeze({ initialCapacity: capacity, warnOnStaleHandle: warn });
}
