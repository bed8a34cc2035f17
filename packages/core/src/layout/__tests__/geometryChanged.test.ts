import { assert, describe, test } from "@cellbox/testkit";
import {
  GEOMETRY_CHANGE_MASK,
  GEOMETRY_UNCHANGED,
  GeometryChange,
  geometryChangeNames,
  hasGeometryChange,
  isGeometryUnchanged,
  withGeometryChange,
} from "../geometryChanged.js";

describe("GeometryChanged bit-set", () => {
  test("flags occupy distinct bits", () => {
    assert.deepEqual(Object.values(GeometryChange), [1, 2, 4, 8]);
    assert.equal(GEOMETRY_CHANGE_MASK, 15);
  });

  test("withGeometryChange sets and clears a single bit", () => {
    let set = GEOMETRY_UNCHANGED;
    set = withGeometryChange(set, GeometryChange.POSY, true);
    set = withGeometryChange(set, GeometryChange.HEIGHT, true);
    assert.equal(set, 10);
    assert.equal(hasGeometryChange(set, GeometryChange.POSY), true);
    assert.equal(hasGeometryChange(set, GeometryChange.WIDTH), false);

    set = withGeometryChange(set, GeometryChange.POSY, false);
    assert.equal(set, 8);
    assert.equal(withGeometryChange(set, GeometryChange.POSY, false), 8);
  });

  test("bits outside the mask are dropped", () => {
    assert.equal(withGeometryChange(0x30, GeometryChange.POSX, true), 1);
    assert.equal(isGeometryUnchanged(0x30), true);
  });

  test("geometryChangeNames lists set bits lowest first", () => {
    assert.deepEqual(geometryChangeNames(GEOMETRY_UNCHANGED), []);
    assert.deepEqual(geometryChangeNames(GeometryChange.HEIGHT | GeometryChange.POSX), [
      "POSX",
      "HEIGHT",
    ]);
    assert.deepEqual(geometryChangeNames(GEOMETRY_CHANGE_MASK), ["POSX", "POSY", "WIDTH", "HEIGHT"]);
  });
});
