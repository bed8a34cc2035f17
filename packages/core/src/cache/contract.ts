/**
 * packages/core/src/cache/contract.ts — Capability surface a layout solver
 * reads and writes through.
 *
 * Two accessor families with different failure policies:
 *
 *   Tolerant (Rect, Space, Size, visible, geometryChanged):
 *     reads on an unregistered node return a default (0, true or unchanged);
 *     writes are silent no-ops.
 *
 *   Layer is kept apart from rows: it may be set before register and
 *     survives it.
 *
 *   Strict (accumulators, stack flags):
 *     reads and writes on an unregistered node throw LayoutCacheError with
 *     code LAYOUT_CACHE_UNREGISTERED.
 *
 * Solvers are written against both policies, so implementations must keep
 * them apart.
 */

import type { GeometryChangeFlag, GeometryChanged } from "../layout/geometryChanged.js";
import type { Rect, Size, Space } from "../layout/types.js";

/** Store interface consumed by a layout solver. */
export type LayoutCache<TNode> = Readonly<{
  /** Create (or reset) the node's row with default values. */
  register: (node: TNode) => void;

  visible: (node: TNode) => boolean;
  setVisible: (node: TNode, value: boolean) => void;

  geometryChanged: (node: TNode) => GeometryChanged;
  setGeometryChanged: (node: TNode, flag: GeometryChangeFlag, value: boolean) => void;

  // Rect
  posx: (node: TNode) => number;
  posy: (node: TNode) => number;
  width: (node: TNode) => number;
  height: (node: TNode) => number;
  setPosx: (node: TNode, value: number) => void;
  setPosy: (node: TNode, value: number) => void;
  setWidth: (node: TNode, value: number) => void;
  setHeight: (node: TNode, value: number) => void;

  // Space
  left: (node: TNode) => number;
  right: (node: TNode) => number;
  top: (node: TNode) => number;
  bottom: (node: TNode) => number;
  setLeft: (node: TNode, value: number) => void;
  setRight: (node: TNode, value: number) => void;
  setTop: (node: TNode, value: number) => void;
  setBottom: (node: TNode, value: number) => void;

  // Requested size
  newWidth: (node: TNode) => number;
  newHeight: (node: TNode) => number;
  setNewWidth: (node: TNode, value: number) => void;
  setNewHeight: (node: TNode, value: number) => void;

  // Child aggregates (strict)
  childWidthMax: (node: TNode) => number;
  childHeightMax: (node: TNode) => number;
  childWidthSum: (node: TNode) => number;
  childHeightSum: (node: TNode) => number;
  setChildWidthMax: (node: TNode, value: number) => void;
  setChildHeightMax: (node: TNode, value: number) => void;
  setChildWidthSum: (node: TNode, value: number) => void;
  setChildHeightSum: (node: TNode, value: number) => void;

  // Grid maxima (strict)
  gridRowMax: (node: TNode) => number;
  gridColMax: (node: TNode) => number;
  setGridRowMax: (node: TNode, value: number) => void;
  setGridColMax: (node: TNode, value: number) => void;

  // Free space and stretch (strict)
  horizontalFreeSpace: (node: TNode) => number;
  horizontalStretchSum: (node: TNode) => number;
  verticalFreeSpace: (node: TNode) => number;
  verticalStretchSum: (node: TNode) => number;
  setHorizontalFreeSpace: (node: TNode, value: number) => void;
  setHorizontalStretchSum: (node: TNode, value: number) => void;
  setVerticalFreeSpace: (node: TNode, value: number) => void;
  setVerticalStretchSum: (node: TNode, value: number) => void;

  // Stack position (strict)
  stackFirstChild: (node: TNode) => boolean;
  stackLastChild: (node: TNode) => boolean;
  setStackFirstChild: (node: TNode, value: boolean) => void;
  setStackLastChild: (node: TNode, value: boolean) => void;

  /**
   * Paint order. Independent of registration: absent until set, kept across
   * register, dropped by remove.
   */
  layer: (node: TNode) => number | undefined;
  /** Throws LAYOUT_CACHE_INVALID_LAYER unless `layer` is a non-negative safe integer. */
  setLayer: (node: TNode, layer: number) => void;
}>;

/**
 * Full store surface: the solver contract plus lifecycle and
 * downstream-consumer operations owned by the node tree.
 */
export type LayoutCacheStore<TNode> = LayoutCache<TNode> &
  Readonly<{
    /** Drop the node's row and layer. Returns true if a row existed. */
    remove: (node: TNode) => boolean;
    has: (node: TNode) => boolean;
    /** Number of registered rows. */
    readonly size: number;
    nodes: () => IterableIterator<TNode>;
    clear: () => void;

    /** Frozen snapshots; zero-valued for an unregistered node. */
    rect: (node: TNode) => Rect;
    space: (node: TNode) => Space;
    requestedSize: (node: TNode) => Size;

    /** Clear every change bit of the node. No-op if unregistered. */
    clearGeometryChanged: (node: TNode) => void;
    /** Registered nodes with at least one change bit set. */
    nodesWithGeometryChanges: () => IterableIterator<TNode>;

    /** Remove the node's layer. */
    clearLayer: (node: TNode) => void;
  }>;
