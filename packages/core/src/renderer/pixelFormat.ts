/**
 * packages/core/src/renderer/pixelFormat.ts — Framebuffer pixel formats.
 *
 * Why: Panels expose whatever the display controller scans out. The runtime
 * packs premultiplied color into one of four layouts, all little-endian:
 *
 *   - argb32: 32-bit, alpha in the top byte, premultiplied
 *   - rgb24:  32-bit, top byte unused
 *   - rgb16:  16-bit 5-6-5
 *   - rgb30:  32-bit, 10 bits per channel, top 2 bits unused
 */

import { PanelError } from "../errors.js";

export type PixelFormat = "argb32" | "rgb24" | "rgb16" | "rgb30";

export const PIXEL_FORMATS: readonly PixelFormat[] = Object.freeze([
  "argb32",
  "rgb24",
  "rgb16",
  "rgb30",
]);

/** Premultiplied color with components in [0, 1]. */
export type Premultiplied = { r: number; g: number; b: number; a: number };

/** Largest width/height a framebuffer may have. */
export const MAX_FRAMEBUFFER_DIMENSION = 32767;

const STRIDE_ALIGNMENT = 4;

export function isPixelFormat(v: unknown): v is PixelFormat {
  return v === "argb32" || v === "rgb24" || v === "rgb16" || v === "rgb30";
}

export function bytesPerPixel(format: PixelFormat): number {
  switch (format) {
    case "rgb16":
      return 2;
    case "argb32":
    case "rgb24":
    case "rgb30":
      return 4;
  }
}

export function hasAlpha(format: PixelFormat): boolean {
  return format === "argb32";
}

/**
 * Optimal stride (bytes per row) for a buffer: the packed row size rounded up
 * to a multiple of 4 bytes.
 *
 * @throws PanelError PANEL_INVALID_ARGUMENT for an unknown format or a width
 *   outside [1, 32767]
 */
export function optimalStride(format: PixelFormat, width: number): number {
  if (!isPixelFormat(format)) {
    throw new PanelError("PANEL_INVALID_ARGUMENT", `unknown pixel format: ${String(format)}`);
  }
  if (!Number.isInteger(width) || width <= 0 || width > MAX_FRAMEBUFFER_DIMENSION) {
    throw new PanelError(
      "PANEL_INVALID_ARGUMENT",
      `width must be an integer in [1, ${String(MAX_FRAMEBUFFER_DIMENSION)}]`,
    );
  }
  const row = width * bytesPerPixel(format);
  return Math.ceil(row / STRIDE_ALIGNMENT) * STRIDE_ALIGNMENT;
}

function toBits(v: number, max: number): number {
  if (!Number.isFinite(v) || v <= 0) return 0;
  if (v >= 1) return max;
  return Math.round(v * max);
}

/** Write a premultiplied color at byte offset `i`. */
export function packPixel(
  format: PixelFormat,
  data: Uint8Array,
  i: number,
  c: Premultiplied,
): void {
  switch (format) {
    case "argb32":
      data[i] = toBits(c.b, 255);
      data[i + 1] = toBits(c.g, 255);
      data[i + 2] = toBits(c.r, 255);
      data[i + 3] = toBits(c.a, 255);
      return;
    case "rgb24":
      data[i] = toBits(c.b, 255);
      data[i + 1] = toBits(c.g, 255);
      data[i + 2] = toBits(c.r, 255);
      data[i + 3] = 0;
      return;
    case "rgb16": {
      const v = (toBits(c.r, 31) << 11) | (toBits(c.g, 63) << 5) | toBits(c.b, 31);
      data[i] = v & 0xff;
      data[i + 1] = v >>> 8;
      return;
    }
    case "rgb30": {
      const v = ((toBits(c.r, 1023) << 20) | (toBits(c.g, 1023) << 10) | toBits(c.b, 1023)) >>> 0;
      data[i] = v & 0xff;
      data[i + 1] = (v >>> 8) & 0xff;
      data[i + 2] = (v >>> 16) & 0xff;
      data[i + 3] = (v >>> 24) & 0xff;
      return;
    }
  }
}

/** Read the premultiplied color at byte offset `i`. Formats without alpha read as opaque. */
export function unpackPixel(format: PixelFormat, data: Uint8Array, i: number): Premultiplied {
  const b0 = data[i] ?? 0;
  const b1 = data[i + 1] ?? 0;
  switch (format) {
    case "argb32":
      return { b: b0 / 255, g: b1 / 255, r: (data[i + 2] ?? 0) / 255, a: (data[i + 3] ?? 0) / 255 };
    case "rgb24":
      return { b: b0 / 255, g: b1 / 255, r: (data[i + 2] ?? 0) / 255, a: 1 };
    case "rgb16": {
      const v = b0 | (b1 << 8);
      return { r: ((v >>> 11) & 0x1f) / 31, g: ((v >>> 5) & 0x3f) / 63, b: (v & 0x1f) / 31, a: 1 };
    }
    case "rgb30": {
      const v = (b0 | (b1 << 8) | ((data[i + 2] ?? 0) << 16) | ((data[i + 3] ?? 0) << 24)) >>> 0;
      return {
        r: ((v >>> 20) & 0x3ff) / 1023,
        g: ((v >>> 10) & 0x3ff) / 1023,
        b: (v & 0x3ff) / 1023,
        a: 1,
      };
    }
  }
}
