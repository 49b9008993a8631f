import { assert, describe, test } from "@panelkit/testkit";
import {
  easeInOutCirc,
  easeInOutCubic,
  easeInOutElastic,
  easeInOutQuad,
  easeInOutQuart,
  resolveEasing,
} from "../easing.js";
import { clamp01, progressFraction } from "../interpolate.js";

describe("animation/interpolate", () => {
  test("clamp01 clamps non-finite and out-of-range values", () => {
    assert.equal(clamp01(Number.NaN), 0);
    assert.equal(clamp01(Number.POSITIVE_INFINITY), 0);
    assert.equal(clamp01(-0.5), 0);
    assert.equal(clamp01(0.25), 0.25);
    assert.equal(clamp01(2), 1);
  });

  test("progressFraction is elapsed over duration, clamped", () => {
    assert.equal(progressFraction(100, 100, 350), 0);
    assert.equal(progressFraction(100, 275, 350), 0.5);
    assert.equal(progressFraction(100, 450, 350), 1);
    assert.equal(progressFraction(100, 9000, 350), 1);
  });

  test("progressFraction treats clock regressions as no progress", () => {
    assert.equal(progressFraction(100, 40, 350), 0);
  });

  test("zero duration completes immediately", () => {
    assert.equal(progressFraction(100, 100, 0), 1);
  });
});

describe("animation/easing", () => {
  test("easeInOutQuad matches the piecewise quadratic", () => {
    assert.equal(easeInOutQuad(0), 0);
    assert.equal(easeInOutQuad(0.25), 0.125);
    assert.equal(easeInOutQuad(0.5), 0.5);
    assert.equal(easeInOutQuad(0.75), 0.875);
    assert.equal(easeInOutQuad(1), 1);
  });

  test("easeInOutQuad is monotonic over [0, 1]", () => {
    let prev = easeInOutQuad(0);
    for (let i = 1; i <= 100; i++) {
      const v = easeInOutQuad(i / 100);
      assert.ok(v >= prev, `decreased at ${String(i)}`);
      prev = v;
    }
  });

  test("all curves pin the endpoints and the midpoint", () => {
    for (const fn of [easeInOutCubic, easeInOutQuart, easeInOutCirc]) {
      assert.equal(fn(0), 0);
      assert.equal(fn(0.5), 0.5);
      assert.equal(fn(1), 1);
    }
    assert.equal(easeInOutElastic(0), 0);
    assert.equal(easeInOutElastic(1), 1);
  });

  test("easeInOutCubic first half is 4t^3", () => {
    assert.equal(easeInOutCubic(0.25), 0.0625);
  });

  test("undefined easing resolves to linear", () => {
    const easing = resolveEasing(undefined);
    assert.equal(easing(0), 0);
    assert.equal(easing(0.5), 0.5);
    assert.equal(easing(1), 1);
  });

  test("named presets clamp their input", () => {
    const quad = resolveEasing("easeInOutQuad");
    assert.equal(quad(-1), 0);
    assert.equal(quad(0.25), 0.125);
    assert.equal(quad(2), 1);
  });

  test("custom easing functions receive clamped input", () => {
    const seen: number[] = [];
    const easing = resolveEasing((t) => {
      seen.push(t);
      return t;
    });
    easing(-3);
    easing(0.4);
    easing(7);
    assert.deepEqual(seen, [0, 0.4, 1]);
  });
});
