/**
 * packages/core/src/cache/nodeCache.ts — Dense entity-indexed layout cache.
 *
 * Why: Entities are small recyclable integers, so rows live in typed arrays
 * indexed by the entity's slot. Each slot remembers the generation it was
 * registered under; a handle whose generation differs reads as unregistered,
 * so a recycled slot never leaks its previous occupant's values.
 *
 * Storage:
 *   - numbers: Float64Array, NUMBER_STRIDE values per slot (rect, space,
 *     requested size, accumulators)
 *   - flags: Uint8Array bitfield (visible, stack first, stack last)
 *   - geometry: Uint8Array GeometryChanged bit-set
 *   - generations: Int16Array, VACANT when the slot has no row
 *   - layers: Map keyed by the full handle; written with or without a row,
 *     untouched by register, dropped by remove and clear
 *
 * Columns grow by doubling; they never shrink. Their length follows the
 * highest slot index registered, not the row count: 164 bytes per slot, so a
 * single index near MAX_ENTITY_INDEX allocates about 2.75 GB.
 */

import { warnDev } from "../dev.js";
import {
  type Entity,
  entityGeneration,
  entityIndex,
  formatEntity,
  isEntity,
  makeEntity,
} from "../entity.js";
import { LayoutCacheError } from "../errors.js";
import {
  GEOMETRY_CHANGE_MASK,
  GEOMETRY_UNCHANGED,
  type GeometryChangeFlag,
  type GeometryChanged,
  withGeometryChange,
} from "../layout/geometryChanged.js";
import type { Rect, Size, Space } from "../layout/types.js";
import type { LayoutCacheStore } from "./contract.js";
import { assertLayer, throwUnregistered } from "./guards.js";
import { MAX_CAPACITY, type NodeCacheOptions, resolveNodeCacheOptions } from "./options.js";

/* ========== Field offsets within a slot's number block ========== */

const F_POSX = 0;
const F_POSY = 1;
const F_WIDTH = 2;
const F_HEIGHT = 3;
const F_LEFT = 4;
const F_RIGHT = 5;
const F_TOP = 6;
const F_BOTTOM = 7;
const F_NEW_WIDTH = 8;
const F_NEW_HEIGHT = 9;
const F_CHILD_WIDTH_MAX = 10;
const F_CHILD_HEIGHT_MAX = 11;
const F_CHILD_WIDTH_SUM = 12;
const F_CHILD_HEIGHT_SUM = 13;
const F_GRID_ROW_MAX = 14;
const F_GRID_COL_MAX = 15;
const F_H_FREE_SPACE = 16;
const F_H_STRETCH_SUM = 17;
const F_V_FREE_SPACE = 18;
const F_V_STRETCH_SUM = 19;

const NUMBER_STRIDE = 20;

const FLAG_VISIBLE = 1 << 0;
const FLAG_STACK_FIRST = 1 << 1;
const FLAG_STACK_LAST = 1 << 2;
const DEFAULT_FLAGS = FLAG_VISIBLE;

const VACANT = -1;
const MIN_GROW_CAPACITY = 16;

/** Layout cache keyed by packed entity handles. */
export type NodeCache = LayoutCacheStore<Entity>;

export function createNodeCache(options: NodeCacheOptions = {}): NodeCache {
  const resolved = resolveNodeCacheOptions(options);

  let capacity = resolved.initialCapacity;
  let numbers = new Float64Array(capacity * NUMBER_STRIDE);
  let flags = new Uint8Array(capacity);
  let geometry = new Uint8Array(capacity);
  let generations = new Int16Array(capacity).fill(VACANT);
  let count = 0;
  const layers = new Map<Entity, number>();
  const warnedSlots = new Set<number>();

  function grow(minCapacity: number): void {
    let next = Math.max(capacity * 2, MIN_GROW_CAPACITY);
    while (next < minCapacity) next *= 2;
    next = Math.min(next, MAX_CAPACITY);

    const nextNumbers = new Float64Array(next * NUMBER_STRIDE);
    nextNumbers.set(numbers);
    const nextFlags = new Uint8Array(next);
    nextFlags.set(flags);
    const nextGeometry = new Uint8Array(next);
    nextGeometry.set(geometry);
    const nextGenerations = new Int16Array(next).fill(VACANT);
    nextGenerations.set(generations);

    numbers = nextNumbers;
    flags = nextFlags;
    geometry = nextGeometry;
    generations = nextGenerations;
    capacity = next;
  }

  /** Slot of a registered node, or -1. */
  function slotOf(node: Entity): number {
    if (!isEntity(node)) return -1;
    const index = entityIndex(node);
    if (index >= capacity) return -1;
    return generations[index] === entityGeneration(node) ? index : -1;
  }

  /** Slot for a tolerant write; reports stale handles once per slot. */
  function writableSlot(node: Entity, accessor: string): number {
    const slot = slotOf(node);
    if (slot >= 0 || !resolved.warnOnStaleHandle) return slot;

    const index = entityIndex(node);
    const occupant = index < capacity ? (generations[index] ?? VACANT) : VACANT;
    if (occupant !== VACANT && !warnedSlots.has(index)) {
      warnedSlots.add(index);
      warnDev(
        `[cellbox] ${accessor}: ignored write through stale handle ${formatEntity(node)} (slot ${index} holds generation ${occupant})`,
      );
    }
    return -1;
  }

  function strictSlot(node: Entity, accessor: string): number {
    const slot = slotOf(node);
    if (slot < 0) throwUnregistered(accessor, node);
    return slot;
  }

  function readNumber(node: Entity, field: number): number {
    const slot = slotOf(node);
    if (slot < 0) return 0;
    return numbers[slot * NUMBER_STRIDE + field] ?? 0;
  }

  function writeNumber(node: Entity, field: number, value: number, accessor: string): void {
    const slot = writableSlot(node, accessor);
    if (slot < 0) return;
    numbers[slot * NUMBER_STRIDE + field] = value;
  }

  function readStrictNumber(node: Entity, field: number, accessor: string): number {
    const slot = strictSlot(node, accessor);
    return numbers[slot * NUMBER_STRIDE + field] ?? 0;
  }

  function writeStrictNumber(node: Entity, field: number, value: number, accessor: string): void {
    const slot = strictSlot(node, accessor);
    numbers[slot * NUMBER_STRIDE + field] = value;
  }

  function readStrictFlag(node: Entity, bit: number, accessor: string): boolean {
    const slot = strictSlot(node, accessor);
    return ((flags[slot] ?? 0) & bit) !== 0;
  }

  function writeStrictFlag(node: Entity, bit: number, value: boolean, accessor: string): void {
    const slot = strictSlot(node, accessor);
    const current = flags[slot] ?? 0;
    flags[slot] = value ? current | bit : current & ~bit;
  }

  function* nodes(): IterableIterator<Entity> {
    for (let i = 0; i < capacity; i++) {
      const generation = generations[i] ?? VACANT;
      if (generation !== VACANT) yield makeEntity(i, generation);
    }
  }

  function* nodesWithGeometryChanges(): IterableIterator<Entity> {
    for (let i = 0; i < capacity; i++) {
      const generation = generations[i] ?? VACANT;
      if (generation === VACANT) continue;
      if (((geometry[i] ?? 0) & GEOMETRY_CHANGE_MASK) !== 0) yield makeEntity(i, generation);
    }
  }

  return Object.freeze({
    register(node: Entity): void {
      if (!isEntity(node)) {
        throw new LayoutCacheError(
          "LAYOUT_CACHE_INVALID_ENTITY",
          `register: ${String(node)} is not an entity handle`,
        );
      }
      const index = entityIndex(node);
      if (index >= capacity) grow(index + 1);

      const occupant = generations[index] ?? VACANT;
      const generation = entityGeneration(node);
      if (occupant === VACANT) count++;
      else if (occupant !== generation) layers.delete(makeEntity(index, occupant));
      generations[index] = generation;
      numbers.fill(0, index * NUMBER_STRIDE, (index + 1) * NUMBER_STRIDE);
      flags[index] = DEFAULT_FLAGS;
      geometry[index] = GEOMETRY_UNCHANGED;
      warnedSlots.delete(index);
    },

    remove(node: Entity): boolean {
      layers.delete(node);
      const slot = slotOf(node);
      if (slot < 0) return false;
      generations[slot] = VACANT;
      count--;
      return true;
    },

    has(node: Entity): boolean {
      return slotOf(node) >= 0;
    },

    get size(): number {
      return count;
    },

    nodes,

    clear(): void {
      generations.fill(VACANT);
      layers.clear();
      count = 0;
      warnedSlots.clear();
    },

    visible(node: Entity): boolean {
      const slot = slotOf(node);
      if (slot < 0) return true;
      return ((flags[slot] ?? DEFAULT_FLAGS) & FLAG_VISIBLE) !== 0;
    },

    setVisible(node: Entity, value: boolean): void {
      const slot = writableSlot(node, "setVisible");
      if (slot < 0) return;
      const current = flags[slot] ?? DEFAULT_FLAGS;
      flags[slot] = value ? current | FLAG_VISIBLE : current & ~FLAG_VISIBLE;
    },

    geometryChanged(node: Entity): GeometryChanged {
      const slot = slotOf(node);
      if (slot < 0) return GEOMETRY_UNCHANGED;
      return geometry[slot] ?? GEOMETRY_UNCHANGED;
    },

    setGeometryChanged(node: Entity, flag: GeometryChangeFlag, value: boolean): void {
      const slot = writableSlot(node, "setGeometryChanged");
      if (slot < 0) return;
      geometry[slot] = withGeometryChange(geometry[slot] ?? GEOMETRY_UNCHANGED, flag, value);
    },

    clearGeometryChanged(node: Entity): void {
      const slot = writableSlot(node, "clearGeometryChanged");
      if (slot < 0) return;
      geometry[slot] = GEOMETRY_UNCHANGED;
    },

    nodesWithGeometryChanges,

    posx: (node: Entity) => readNumber(node, F_POSX),
    posy: (node: Entity) => readNumber(node, F_POSY),
    width: (node: Entity) => readNumber(node, F_WIDTH),
    height: (node: Entity) => readNumber(node, F_HEIGHT),
    setPosx: (node: Entity, value: number) => writeNumber(node, F_POSX, value, "setPosx"),
    setPosy: (node: Entity, value: number) => writeNumber(node, F_POSY, value, "setPosy"),
    setWidth: (node: Entity, value: number) => writeNumber(node, F_WIDTH, value, "setWidth"),
    setHeight: (node: Entity, value: number) => writeNumber(node, F_HEIGHT, value, "setHeight"),

    left: (node: Entity) => readNumber(node, F_LEFT),
    right: (node: Entity) => readNumber(node, F_RIGHT),
    top: (node: Entity) => readNumber(node, F_TOP),
    bottom: (node: Entity) => readNumber(node, F_BOTTOM),
    setLeft: (node: Entity, value: number) => writeNumber(node, F_LEFT, value, "setLeft"),
    setRight: (node: Entity, value: number) => writeNumber(node, F_RIGHT, value, "setRight"),
    setTop: (node: Entity, value: number) => writeNumber(node, F_TOP, value, "setTop"),
    setBottom: (node: Entity, value: number) => writeNumber(node, F_BOTTOM, value, "setBottom"),

    newWidth: (node: Entity) => readNumber(node, F_NEW_WIDTH),
    newHeight: (node: Entity) => readNumber(node, F_NEW_HEIGHT),
    setNewWidth: (node: Entity, value: number) =>
      writeNumber(node, F_NEW_WIDTH, value, "setNewWidth"),
    setNewHeight: (node: Entity, value: number) =>
      writeNumber(node, F_NEW_HEIGHT, value, "setNewHeight"),

    rect(node: Entity): Rect {
      return Object.freeze({
        posx: readNumber(node, F_POSX),
        posy: readNumber(node, F_POSY),
        width: readNumber(node, F_WIDTH),
        height: readNumber(node, F_HEIGHT),
      });
    },

    space(node: Entity): Space {
      return Object.freeze({
        left: readNumber(node, F_LEFT),
        right: readNumber(node, F_RIGHT),
        top: readNumber(node, F_TOP),
        bottom: readNumber(node, F_BOTTOM),
      });
    },

    requestedSize(node: Entity): Size {
      return Object.freeze({
        width: readNumber(node, F_NEW_WIDTH),
        height: readNumber(node, F_NEW_HEIGHT),
      });
    },

    childWidthMax: (node: Entity) => readStrictNumber(node, F_CHILD_WIDTH_MAX, "childWidthMax"),
    childHeightMax: (node: Entity) => readStrictNumber(node, F_CHILD_HEIGHT_MAX, "childHeightMax"),
    childWidthSum: (node: Entity) => readStrictNumber(node, F_CHILD_WIDTH_SUM, "childWidthSum"),
    childHeightSum: (node: Entity) => readStrictNumber(node, F_CHILD_HEIGHT_SUM, "childHeightSum"),
    setChildWidthMax: (node: Entity, value: number) =>
      writeStrictNumber(node, F_CHILD_WIDTH_MAX, value, "setChildWidthMax"),
    setChildHeightMax: (node: Entity, value: number) =>
      writeStrictNumber(node, F_CHILD_HEIGHT_MAX, value, "setChildHeightMax"),
    setChildWidthSum: (node: Entity, value: number) =>
      writeStrictNumber(node, F_CHILD_WIDTH_SUM, value, "setChildWidthSum"),
    setChildHeightSum: (node: Entity, value: number) =>
      writeStrictNumber(node, F_CHILD_HEIGHT_SUM, value, "setChildHeightSum"),

    gridRowMax: (node: Entity) => readStrictNumber(node, F_GRID_ROW_MAX, "gridRowMax"),
    gridColMax: (node: Entity) => readStrictNumber(node, F_GRID_COL_MAX, "gridColMax"),
    setGridRowMax: (node: Entity, value: number) =>
      writeStrictNumber(node, F_GRID_ROW_MAX, value, "setGridRowMax"),
    setGridColMax: (node: Entity, value: number) =>
      writeStrictNumber(node, F_GRID_COL_MAX, value, "setGridColMax"),

    horizontalFreeSpace: (node: Entity) =>
      readStrictNumber(node, F_H_FREE_SPACE, "horizontalFreeSpace"),
    horizontalStretchSum: (node: Entity) =>
      readStrictNumber(node, F_H_STRETCH_SUM, "horizontalStretchSum"),
    verticalFreeSpace: (node: Entity) => readStrictNumber(node, F_V_FREE_SPACE, "verticalFreeSpace"),
    verticalStretchSum: (node: Entity) =>
      readStrictNumber(node, F_V_STRETCH_SUM, "verticalStretchSum"),
    setHorizontalFreeSpace: (node: Entity, value: number) =>
      writeStrictNumber(node, F_H_FREE_SPACE, value, "setHorizontalFreeSpace"),
    setHorizontalStretchSum: (node: Entity, value: number) =>
      writeStrictNumber(node, F_H_STRETCH_SUM, value, "setHorizontalStretchSum"),
    setVerticalFreeSpace: (node: Entity, value: number) =>
      writeStrictNumber(node, F_V_FREE_SPACE, value, "setVerticalFreeSpace"),
    setVerticalStretchSum: (node: Entity, value: number) =>
      writeStrictNumber(node, F_V_STRETCH_SUM, value, "setVerticalStretchSum"),

    stackFirstChild: (node: Entity) => readStrictFlag(node, FLAG_STACK_FIRST, "stackFirstChild"),
    stackLastChild: (node: Entity) => readStrictFlag(node, FLAG_STACK_LAST, "stackLastChild"),
    setStackFirstChild: (node: Entity, value: boolean) =>
      writeStrictFlag(node, FLAG_STACK_FIRST, value, "setStackFirstChild"),
    setStackLastChild: (node: Entity, value: boolean) =>
      writeStrictFlag(node, FLAG_STACK_LAST, value, "setStackLastChild"),

    layer: (node: Entity) => layers.get(node),

    setLayer(node: Entity, layer: number): void {
      assertLayer(layer);
      if (!isEntity(node)) return;
      layers.set(node, layer);
    },

    clearLayer(node: Entity): void {
      layers.delete(node);
    },
  });
}
