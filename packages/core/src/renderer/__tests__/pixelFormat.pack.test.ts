import { assert, describe, test } from "@panelkit/testkit";
import { PanelError } from "../../errors.js";
import {
  bytesPerPixel,
  hasAlpha,
  isPixelFormat,
  optimalStride,
  packPixel,
  unpackPixel,
} from "../pixelFormat.js";

describe("renderer/pixelFormat", () => {
  test("optimalStride rounds rows up to four bytes", () => {
    assert.equal(optimalStride("argb32", 800), 3200);
    assert.equal(optimalStride("rgb24", 1), 4);
    assert.equal(optimalStride("rgb16", 3), 8);
    assert.equal(optimalStride("rgb16", 4), 8);
    assert.equal(optimalStride("rgb30", 5), 20);
  });

  test("optimalStride rejects widths outside the framebuffer range", () => {
    for (const width of [0, -4, 1.5, 32768]) {
      assert.throws(
        () => optimalStride("argb32", width),
        (err: unknown) => err instanceof PanelError && err.code === "PANEL_INVALID_ARGUMENT",
      );
    }
  });

  test("format metadata", () => {
    assert.equal(isPixelFormat("rgb16"), true);
    assert.equal(isPixelFormat("bgr8"), false);
    assert.equal(bytesPerPixel("rgb16"), 2);
    assert.equal(bytesPerPixel("rgb30"), 4);
    assert.equal(hasAlpha("argb32"), true);
    assert.equal(hasAlpha("rgb24"), false);
  });

  test("argb32 stores B, G, R, A", () => {
    const data = new Uint8Array(4);
    packPixel("argb32", data, 0, { r: 1, g: 0.5, b: 0, a: 1 });
    assert.deepEqual(Array.from(data), [0, 128, 255, 255]);
  });

  test("rgb24 zeroes the top byte and reads back opaque", () => {
    const data = new Uint8Array([9, 9, 9, 9]);
    packPixel("rgb24", data, 0, { r: 0, g: 0, b: 1, a: 0.2 });
    assert.deepEqual(Array.from(data), [255, 0, 0, 0]);
    assert.deepEqual(unpackPixel("rgb24", data, 0), { b: 1, g: 0, r: 0, a: 1 });
  });

  test("rgb16 packs 5-6-5 little-endian", () => {
    const data = new Uint8Array(2);
    packPixel("rgb16", data, 0, { r: 1, g: 0, b: 0, a: 1 });
    assert.deepEqual(Array.from(data), [0x00, 0xf8]);
    assert.deepEqual(unpackPixel("rgb16", data, 0), { r: 1, g: 0, b: 0, a: 1 });

    packPixel("rgb16", data, 0, { r: 0, g: 1, b: 0, a: 1 });
    assert.deepEqual(Array.from(data), [0xe0, 0x07]);
  });

  test("rgb30 packs 10 bits per channel", () => {
    const data = new Uint8Array(4);
    packPixel("rgb30", data, 0, { r: 1, g: 1, b: 1, a: 1 });
    assert.deepEqual(Array.from(data), [0xff, 0xff, 0xff, 0x3f]);

    packPixel("rgb30", data, 0, { r: 1, g: 0, b: 0, a: 1 });
    assert.deepEqual(Array.from(data), [0x00, 0x00, 0xf0, 0x3f]);
    assert.deepEqual(unpackPixel("rgb30", data, 0), { r: 1, g: 0, b: 0, a: 1 });
  });

  test("out-of-range components saturate", () => {
    const data = new Uint8Array(4);
    packPixel("argb32", data, 0, { r: 4, g: -1, b: Number.NaN, a: 1 });
    assert.deepEqual(Array.from(data), [0, 0, 255, 255]);
  });
});
