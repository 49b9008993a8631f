import { assert, createRng, describe, test } from "../index.js";

describe("testkit/rng", () => {
  test("same seed replays the same sequence", () => {
    const a = createRng(0xc0ffee);
    const b = createRng(0xc0ffee);
    for (let i = 0; i < 32; i++) {
      assert.equal(a.u32(), b.u32());
    }
  });

  test("int stays inside the inclusive range", () => {
    const rng = createRng(7);
    for (let i = 0; i < 500; i++) {
      const v = rng.int(3, 9);
      assert.ok(v >= 3 && v <= 9, `out of range: ${String(v)}`);
      assert.equal(Number.isInteger(v), true);
    }
  });

  test("next yields floats in [0, 1)", () => {
    const rng = createRng(42);
    for (let i = 0; i < 500; i++) {
      const v = rng.next();
      assert.ok(v >= 0 && v < 1);
    }
  });
});
