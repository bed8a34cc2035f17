/**
 * packages/core/src/cache/mapNodeCache.ts — Map-backed layout cache for
 * arbitrary node keys.
 *
 * Why: Not every node tree hands out dense integer handles. This variant keys
 * one Map per field by any value with identity semantics (strings, objects,
 * handles from another allocator) and keeps the exact defaulting policy of
 * the dense cache. A node is registered iff it has a rect row.
 */

import {
  GEOMETRY_CHANGE_MASK,
  GEOMETRY_UNCHANGED,
  type GeometryChangeFlag,
  type GeometryChanged,
  withGeometryChange,
} from "../layout/geometryChanged.js";
import {
  LAYOUT_ACCUMULATORS,
  type LayoutAccumulator,
  type Rect,
  type Size,
  type Space,
  STACK_FLAGS,
  type StackFlag,
  ZERO_RECT,
  ZERO_SIZE,
  ZERO_SPACE,
} from "../layout/types.js";
import type { LayoutCacheStore } from "./contract.js";
import { assertLayer, strictGet, strictSet } from "./guards.js";

type MutableRect = { posx: number; posy: number; width: number; height: number };
type MutableSpace = { left: number; right: number; top: number; bottom: number };
type MutableSize = { width: number; height: number };

export type MapNodeCache<TNode> = LayoutCacheStore<TNode>;

export function createMapNodeCache<TNode>(): MapNodeCache<TNode> {
  // Computed outputs
  const rects = new Map<TNode, MutableRect>();

  // Intermediate values
  const spaces = new Map<TNode, MutableSpace>();
  const sizes = new Map<TNode, MutableSize>();
  const accumulators: Readonly<Record<LayoutAccumulator, Map<TNode, number>>> = Object.freeze({
    childWidthMax: new Map<TNode, number>(),
    childHeightMax: new Map<TNode, number>(),
    childWidthSum: new Map<TNode, number>(),
    childHeightSum: new Map<TNode, number>(),
    gridRowMax: new Map<TNode, number>(),
    gridColMax: new Map<TNode, number>(),
    horizontalFreeSpace: new Map<TNode, number>(),
    horizontalStretchSum: new Map<TNode, number>(),
    verticalFreeSpace: new Map<TNode, number>(),
    verticalStretchSum: new Map<TNode, number>(),
  });
  const stackFlags: Readonly<Record<StackFlag, Map<TNode, boolean>>> = Object.freeze({
    stackFirstChild: new Map<TNode, boolean>(),
    stackLastChild: new Map<TNode, boolean>(),
  });

  const geometry = new Map<TNode, GeometryChanged>();
  const visible = new Map<TNode, boolean>();
  const layers = new Map<TNode, number>();

  function dropRow(node: TNode): void {
    rects.delete(node);
    spaces.delete(node);
    sizes.delete(node);
    for (const name of LAYOUT_ACCUMULATORS) accumulators[name].delete(node);
    for (const name of STACK_FLAGS) stackFlags[name].delete(node);
    geometry.delete(node);
    visible.delete(node);
    layers.delete(node);
  }

  function readAccumulator(name: LayoutAccumulator, node: TNode): number {
    return strictGet(accumulators[name], node, name);
  }

  function writeAccumulator(
    name: LayoutAccumulator,
    setter: string,
    node: TNode,
    value: number,
  ): void {
    strictSet(accumulators[name], node, value, setter);
  }

  function* nodesWithGeometryChanges(): IterableIterator<TNode> {
    for (const [node, set] of geometry) {
      if ((set & GEOMETRY_CHANGE_MASK) !== 0) yield node;
    }
  }

  return Object.freeze({
    register(node: TNode): void {
      rects.set(node, { posx: 0, posy: 0, width: 0, height: 0 });
      spaces.set(node, { left: 0, right: 0, top: 0, bottom: 0 });
      sizes.set(node, { width: 0, height: 0 });
      for (const name of LAYOUT_ACCUMULATORS) accumulators[name].set(node, 0);
      for (const name of STACK_FLAGS) stackFlags[name].set(node, false);
      geometry.set(node, GEOMETRY_UNCHANGED);
      visible.set(node, true);
    },

    remove(node: TNode): boolean {
      layers.delete(node);
      if (!rects.has(node)) return false;
      dropRow(node);
      return true;
    },

    has: (node: TNode) => rects.has(node),

    get size(): number {
      return rects.size;
    },

    nodes: () => rects.keys(),

    clear(): void {
      for (const node of [...rects.keys()]) dropRow(node);
      layers.clear();
    },

    visible: (node: TNode) => visible.get(node) ?? true,

    setVisible(node: TNode, value: boolean): void {
      if (visible.has(node)) visible.set(node, value);
    },

    geometryChanged: (node: TNode) => geometry.get(node) ?? GEOMETRY_UNCHANGED,

    setGeometryChanged(node: TNode, flag: GeometryChangeFlag, value: boolean): void {
      const current = geometry.get(node);
      if (current === undefined) return;
      geometry.set(node, withGeometryChange(current, flag, value));
    },

    clearGeometryChanged(node: TNode): void {
      if (geometry.has(node)) geometry.set(node, GEOMETRY_UNCHANGED);
    },

    nodesWithGeometryChanges,

    posx: (node: TNode) => rects.get(node)?.posx ?? 0,
    posy: (node: TNode) => rects.get(node)?.posy ?? 0,
    width: (node: TNode) => rects.get(node)?.width ?? 0,
    height: (node: TNode) => rects.get(node)?.height ?? 0,

    setPosx(node: TNode, value: number): void {
      const rect = rects.get(node);
      if (rect) rect.posx = value;
    },
    setPosy(node: TNode, value: number): void {
      const rect = rects.get(node);
      if (rect) rect.posy = value;
    },
    setWidth(node: TNode, value: number): void {
      const rect = rects.get(node);
      if (rect) rect.width = value;
    },
    setHeight(node: TNode, value: number): void {
      const rect = rects.get(node);
      if (rect) rect.height = value;
    },

    left: (node: TNode) => spaces.get(node)?.left ?? 0,
    right: (node: TNode) => spaces.get(node)?.right ?? 0,
    top: (node: TNode) => spaces.get(node)?.top ?? 0,
    bottom: (node: TNode) => spaces.get(node)?.bottom ?? 0,

    setLeft(node: TNode, value: number): void {
      const space = spaces.get(node);
      if (space) space.left = value;
    },
    setRight(node: TNode, value: number): void {
      const space = spaces.get(node);
      if (space) space.right = value;
    },
    setTop(node: TNode, value: number): void {
      const space = spaces.get(node);
      if (space) space.top = value;
    },
    setBottom(node: TNode, value: number): void {
      const space = spaces.get(node);
      if (space) space.bottom = value;
    },

    newWidth: (node: TNode) => sizes.get(node)?.width ?? 0,
    newHeight: (node: TNode) => sizes.get(node)?.height ?? 0,

    setNewWidth(node: TNode, value: number): void {
      const size = sizes.get(node);
      if (size) size.width = value;
    },
    setNewHeight(node: TNode, value: number): void {
      const size = sizes.get(node);
      if (size) size.height = value;
    },

    rect(node: TNode): Rect {
      const rect = rects.get(node);
      return rect ? Object.freeze({ ...rect }) : ZERO_RECT;
    },

    space(node: TNode): Space {
      const space = spaces.get(node);
      return space ? Object.freeze({ ...space }) : ZERO_SPACE;
    },

    requestedSize(node: TNode): Size {
      const size = sizes.get(node);
      return size ? Object.freeze({ ...size }) : ZERO_SIZE;
    },

    childWidthMax: (node: TNode) => readAccumulator("childWidthMax", node),
    childHeightMax: (node: TNode) => readAccumulator("childHeightMax", node),
    childWidthSum: (node: TNode) => readAccumulator("childWidthSum", node),
    childHeightSum: (node: TNode) => readAccumulator("childHeightSum", node),
    setChildWidthMax: (node: TNode, value: number) =>
      writeAccumulator("childWidthMax", "setChildWidthMax", node, value),
    setChildHeightMax: (node: TNode, value: number) =>
      writeAccumulator("childHeightMax", "setChildHeightMax", node, value),
    setChildWidthSum: (node: TNode, value: number) =>
      writeAccumulator("childWidthSum", "setChildWidthSum", node, value),
    setChildHeightSum: (node: TNode, value: number) =>
      writeAccumulator("childHeightSum", "setChildHeightSum", node, value),

    gridRowMax: (node: TNode) => readAccumulator("gridRowMax", node),
    gridColMax: (node: TNode) => readAccumulator("gridColMax", node),
    setGridRowMax: (node: TNode, value: number) =>
      writeAccumulator("gridRowMax", "setGridRowMax", node, value),
    setGridColMax: (node: TNode, value: number) =>
      writeAccumulator("gridColMax", "setGridColMax", node, value),

    horizontalFreeSpace: (node: TNode) => readAccumulator("horizontalFreeSpace", node),
    horizontalStretchSum: (node: TNode) => readAccumulator("horizontalStretchSum", node),
    verticalFreeSpace: (node: TNode) => readAccumulator("verticalFreeSpace", node),
    verticalStretchSum: (node: TNode) => readAccumulator("verticalStretchSum", node),
    setHorizontalFreeSpace: (node: TNode, value: number) =>
      writeAccumulator("horizontalFreeSpace", "setHorizontalFreeSpace", node, value),
    setHorizontalStretchSum: (node: TNode, value: number) =>
      writeAccumulator("horizontalStretchSum", "setHorizontalStretchSum", node, value),
    setVerticalFreeSpace: (node: TNode, value: number) =>
      writeAccumulator("verticalFreeSpace", "setVerticalFreeSpace", node, value),
    setVerticalStretchSum: (node: TNode, value: number) =>
      writeAccumulator("verticalStretchSum", "setVerticalStretchSum", node, value),

    stackFirstChild: (node: TNode) =>
      strictGet(stackFlags.stackFirstChild, node, "stackFirstChild"),
    stackLastChild: (node: TNode) => strictGet(stackFlags.stackLastChild, node, "stackLastChild"),
    setStackFirstChild: (node: TNode, value: boolean) =>
      strictSet(stackFlags.stackFirstChild, node, value, "setStackFirstChild"),
    setStackLastChild: (node: TNode, value: boolean) =>
      strictSet(stackFlags.stackLastChild, node, value, "setStackLastChild"),

    layer: (node: TNode) => layers.get(node),

    setLayer(node: TNode, layer: number): void {
      assertLayer(layer);
      layers.set(node, layer);
    },

    clearLayer(node: TNode): void {
      layers.delete(node);
    },
  });
}
