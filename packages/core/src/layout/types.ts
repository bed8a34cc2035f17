/**
 * packages/core/src/layout/types.ts — Layout value type definitions.
 *
 * Why: Defines the per-node geometric values the cache stores for a layout
 * solver. Rect is the only externally meaningful output; Space, Size and the
 * accumulators are solver intermediates.
 */

/** Finalized position and size of a node after layout. */
export type Rect = Readonly<{ posx: number; posy: number; width: number; height: number }>;

/** Resolved inset/margin distance on each side of a node. */
export type Space = Readonly<{ left: number; right: number; top: number; bottom: number }>;

/** Requested (pre-resolution) width and height, distinct from the final Rect size. */
export type Size = Readonly<{ width: number; height: number }>;

export const ZERO_RECT: Rect = Object.freeze({ posx: 0, posy: 0, width: 0, height: 0 });
export const ZERO_SPACE: Space = Object.freeze({ left: 0, right: 0, top: 0, bottom: 0 });
export const ZERO_SIZE: Size = Object.freeze({ width: 0, height: 0 });

/**
 * Scratch values a solver overwrites on every pass.
 *
 * Accessors for these are strict: using one on an unregistered node is a
 * programming error in the solver, not a recoverable absence.
 */
export const LAYOUT_ACCUMULATORS = Object.freeze([
  "childWidthMax",
  "childHeightMax",
  "childWidthSum",
  "childHeightSum",
  "gridRowMax",
  "gridColMax",
  "horizontalFreeSpace",
  "horizontalStretchSum",
  "verticalFreeSpace",
  "verticalStretchSum",
] as const);

export type LayoutAccumulator = (typeof LAYOUT_ACCUMULATORS)[number];

/** Position-in-stack markers. Strict, like the accumulators. */
export const STACK_FLAGS = Object.freeze(["stackFirstChild", "stackLastChild"] as const);

export type StackFlag = (typeof STACK_FLAGS)[number];
