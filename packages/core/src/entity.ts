/**
 * packages/core/src/entity.ts — Generation-checked entity handles.
 *
 * An entity is a single unsigned 32-bit number:
 *   - bits 0-23: slot index (dense, recycled by the node tree owner)
 *   - bits 24-31: generation (bumped by the owner each time a slot is reused)
 *
 * The cache never allocates entities. It only keys rows by them, and uses the
 * generation to tell a recycled slot's new occupant from a stale handle.
 */

import { LayoutCacheError } from "./errors.js";

/** Packed entity handle. Compare with `===`; usable as a Map key. */
export type Entity = number;

export const ENTITY_INDEX_BITS = 24;
export const MAX_ENTITY_INDEX = 0xffffff;
export const MAX_ENTITY_GENERATION = 0xff;

function isIntInRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

/** Pack a slot index and generation into an entity handle. */
export function makeEntity(index: number, generation = 0): Entity {
  if (!isIntInRange(index, MAX_ENTITY_INDEX)) {
    throw new LayoutCacheError(
      "LAYOUT_CACHE_INVALID_ENTITY",
      `makeEntity: index must be an integer in 0..${MAX_ENTITY_INDEX} (got ${String(index)})`,
    );
  }
  if (!isIntInRange(generation, MAX_ENTITY_GENERATION)) {
    throw new LayoutCacheError(
      "LAYOUT_CACHE_INVALID_ENTITY",
      `makeEntity: generation must be an integer in 0..${MAX_ENTITY_GENERATION} (got ${String(generation)})`,
    );
  }
  return ((index & MAX_ENTITY_INDEX) | (generation << ENTITY_INDEX_BITS)) >>> 0;
}

export function entityIndex(entity: Entity): number {
  return entity & MAX_ENTITY_INDEX;
}

export function entityGeneration(entity: Entity): number {
  return (entity >>> ENTITY_INDEX_BITS) & MAX_ENTITY_GENERATION;
}

/** True for any number a `makeEntity` call could have produced. */
export function isEntity(value: unknown): value is Entity {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 0xffffffff;
}

/** Human-readable form used in error messages: `#index@generation`. */
export function formatEntity(entity: Entity): string {
  return `#${entityIndex(entity)}@${entityGeneration(entity)}`;
}
