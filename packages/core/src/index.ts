/**
 * @cellbox/core
 *
 * Per-node state store for box-layout solvers.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors
// =============================================================================

export { LayoutCacheError, type LayoutCacheErrorCode, isLayoutCacheError } from "./errors.js";

// =============================================================================
// Entity handles
// =============================================================================

export {
  ENTITY_INDEX_BITS,
  MAX_ENTITY_GENERATION,
  MAX_ENTITY_INDEX,
  type Entity,
  entityGeneration,
  entityIndex,
  formatEntity,
  isEntity,
  makeEntity,
} from "./entity.js";

// =============================================================================
// Layout values and change tracking
// =============================================================================

export {
  LAYOUT_ACCUMULATORS,
  type LayoutAccumulator,
  type Rect,
  STACK_FLAGS,
  type Size,
  type Space,
  type StackFlag,
  ZERO_RECT,
  ZERO_SIZE,
  ZERO_SPACE,
} from "./layout/types.js";

export {
  GEOMETRY_CHANGE_MASK,
  GEOMETRY_UNCHANGED,
  GeometryChange,
  type GeometryChangeFlag,
  type GeometryChangeName,
  type GeometryChanged,
  geometryChangeNames,
  hasGeometryChange,
  isGeometryUnchanged,
  withGeometryChange,
} from "./layout/geometryChanged.js";

// =============================================================================
// Caches
// =============================================================================

export type { LayoutCache, LayoutCacheStore } from "./cache/contract.js";
export {
  DEFAULT_INITIAL_CAPACITY,
  type NodeCacheOptions,
  type ResolvedNodeCacheOptions,
} from "./cache/options.js";
export { type NodeCache, createNodeCache } from "./cache/nodeCache.js";
export { type MapNodeCache, createMapNodeCache } from "./cache/mapNodeCache.js";
