import { assert, describe, test } from "@panelkit/testkit";
import {
  boundsOf,
  insetRect,
  intersectRect,
  isEmptyRect,
  offsetRect,
  point,
  rect,
  rectContains,
  rectsEqual,
} from "../../geometry.js";

describe("geometry", () => {
  test("rectContains is inclusive on every edge", () => {
    const r = rect(10, 20, 30, 40);
    assert.equal(rectContains(r, point(10, 20)), true);
    assert.equal(rectContains(r, point(40, 60)), true);
    assert.equal(rectContains(r, point(25, 60)), true);
    assert.equal(rectContains(r, point(9.5, 30)), false);
    assert.equal(rectContains(r, point(25, 60.5)), false);
  });

  test("insetRect shrinks symmetrically without clamping", () => {
    assert.deepEqual(insetRect(rect(0, 0, 10, 8), 2), rect(2, 2, 6, 4));
    assert.deepEqual(insetRect(rect(0, 0, 10, 8), 1, 3), rect(1, 3, 8, 2));
    assert.deepEqual(insetRect(rect(0, 0, 4, 4), 3), rect(3, 3, -2, -2));
  });

  test("boundsOf keeps the size and zeroes the origin", () => {
    assert.deepEqual(boundsOf(rect(5, 6, 7, 8)), rect(0, 0, 7, 8));
  });

  test("offsetRect moves the origin", () => {
    assert.deepEqual(offsetRect(rect(1, 2, 3, 4), 10, -2), rect(11, 0, 3, 4));
  });

  test("intersectRect overlaps and disjoint cases", () => {
    assert.deepEqual(intersectRect(rect(0, 0, 10, 10), rect(5, 5, 10, 10)), rect(5, 5, 5, 5));
    const none = intersectRect(rect(0, 0, 2, 2), rect(4, 4, 2, 2));
    assert.equal(isEmptyRect(none), true);
    assert.deepEqual(none, rect(0, 0, 0, 0));
  });

  test("rectsEqual compares all four fields", () => {
    assert.equal(rectsEqual(rect(1, 2, 3, 4), rect(1, 2, 3, 4)), true);
    assert.equal(rectsEqual(rect(1, 2, 3, 4), rect(1, 2, 3, 5)), false);
  });
});
