/**
 * packages/core/src/layout/geometryChanged.ts — Per-node change bit-set.
 *
 * Records which output geometry fields moved since the bits were last
 * cleared. Bits are independent; no ordering between mutations.
 */

/** Single-bit change flags. */
export const GeometryChange = Object.freeze({
  POSX: 1 << 0,
  POSY: 1 << 1,
  WIDTH: 1 << 2,
  HEIGHT: 1 << 3,
} as const);

export type GeometryChangeName = keyof typeof GeometryChange;
export type GeometryChangeFlag = (typeof GeometryChange)[GeometryChangeName];

/** Bit-set of GeometryChangeFlag values. */
export type GeometryChanged = number;

export const GEOMETRY_UNCHANGED: GeometryChanged = 0;
export const GEOMETRY_CHANGE_MASK: GeometryChanged =
  GeometryChange.POSX | GeometryChange.POSY | GeometryChange.WIDTH | GeometryChange.HEIGHT;

const NAMES_IN_BIT_ORDER: readonly GeometryChangeName[] = Object.freeze([
  "POSX",
  "POSY",
  "WIDTH",
  "HEIGHT",
]);

export function hasGeometryChange(set: GeometryChanged, flag: GeometryChangeFlag): boolean {
  return (set & flag) !== 0;
}

/** Return `set` with `flag` set or cleared; other bits untouched. */
export function withGeometryChange(
  set: GeometryChanged,
  flag: GeometryChangeFlag,
  value: boolean,
): GeometryChanged {
  return value ? (set | flag) & GEOMETRY_CHANGE_MASK : set & ~flag & GEOMETRY_CHANGE_MASK;
}

export function isGeometryUnchanged(set: GeometryChanged): boolean {
  return (set & GEOMETRY_CHANGE_MASK) === 0;
}

/** Names of the set bits, lowest bit first. */
export function geometryChangeNames(set: GeometryChanged): readonly GeometryChangeName[] {
  const out: GeometryChangeName[] = [];
  for (const name of NAMES_IN_BIT_ORDER) {
    if ((set & GeometryChange[name]) !== 0) out.push(name);
  }
  return out;
}
