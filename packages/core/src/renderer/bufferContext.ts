/**
 * packages/core/src/renderer/bufferContext.ts — Raster DrawContext over a pixel buffer.
 *
 * Why: A screen draws into one CPU-side framebuffer. This context keeps a
 * translate/clip stack in logical pixels and maps every fill to physical pixels
 * through the UI scale factor and a 90°-multiple rotation.
 *
 * Mapping (logical → physical), with s = scale:
 *   - scaled rect [x0,x1)×[y0,y1) = round(logical * s)
 *   - rotation 0:   same
 *   - rotation 90:  px ∈ [W - y1, W - y0), py ∈ [x0, x1)
 *   - rotation 180: px ∈ [W - x1, W - x0), py ∈ [H - y1, H - y0)
 *   - rotation 270: px ∈ [y0, y1), py ∈ [H - x1, H - x0)
 *   where W×H is the physical framebuffer size.
 */

import { PanelError } from "../errors.js";
import {
  type Color,
  type Point,
  type Rect,
  type Size,
  intersectRect,
  isEmptyRect,
  offsetRect,
  rect,
  size,
} from "../geometry.js";
import {
  type PixelFormat,
  type Premultiplied,
  bytesPerPixel,
  packPixel,
  unpackPixel,
} from "./pixelFormat.js";
import type { DrawContext, DrawSurfaceOptions, Surface } from "./types.js";

/** Clockwise display rotation in degrees. */
export type Rotation = 0 | 90 | 180 | 270;

export function isRotation(v: unknown): v is Rotation {
  return v === 0 || v === 90 || v === 180 || v === 270;
}

/** Destination framebuffer description. */
export type PixelBuffer = Readonly<{
  data: Uint8Array;
  format: PixelFormat;
  /** Physical width in pixels. */
  width: number;
  /** Physical height in pixels. */
  height: number;
  /** Bytes per row. */
  stride: number;
}>;

export type BufferContextOptions = Readonly<{
  scale: number;
  rotation: Rotation;
}>;

export type BufferContext = DrawContext &
  Readonly<{
    /** Logical drawing area after rotation and scaling. */
    logicalSize: () => Size;
    /** Number of unbalanced save() calls. */
    depth: () => number;
    /** Drop the state stack and return to the identity state. */
    reset: () => void;
  }>;

type State = { tx: number; ty: number; clip: Rect };

/** Logical size of a buffer under a rotation and scale factor. */
export function logicalSizeFor(buffer: PixelBuffer, opts: BufferContextOptions): Size {
  const swap = opts.rotation === 90 || opts.rotation === 270;
  const w = swap ? buffer.height : buffer.width;
  const h = swap ? buffer.width : buffer.height;
  return size(Math.floor(w / opts.scale), Math.floor(h / opts.scale));
}

export function createBufferContext(
  buffer: PixelBuffer,
  opts: BufferContextOptions,
): BufferContext {
  const bpp = bytesPerPixel(buffer.format);
  const logical = logicalSizeFor(buffer, opts);
  const screenClip = rect(0, 0, logical.width, logical.height);
  const stack: State[] = [];
  let state: State = { tx: 0, ty: 0, clip: screenClip };

  function blendPixel(px: number, py: number, src: Premultiplied, opaque: boolean): void {
    const i = py * buffer.stride + px * bpp;
    if (opaque || src.a >= 1) {
      packPixel(buffer.format, buffer.data, i, src);
      return;
    }
    if (src.a <= 0) return;
    const dst = unpackPixel(buffer.format, buffer.data, i);
    const k = 1 - src.a;
    packPixel(buffer.format, buffer.data, i, {
      r: src.r + dst.r * k,
      g: src.g + dst.g * k,
      b: src.b + dst.b * k,
      a: src.a + dst.a * k,
    });
  }

  /** Fill an absolute logical rect (already clipped) with a premultiplied color. */
  function fillDevice(r: Rect, src: Premultiplied, opaque: boolean): void {
    const s = opts.scale;
    const x0 = Math.round(r.origin.x * s);
    const y0 = Math.round(r.origin.y * s);
    const x1 = Math.round((r.origin.x + r.size.width) * s);
    const y1 = Math.round((r.origin.y + r.size.height) * s);
    const W = buffer.width;
    const H = buffer.height;

    let px0: number;
    let px1: number;
    let py0: number;
    let py1: number;
    switch (opts.rotation) {
      case 0:
        px0 = x0;
        px1 = x1;
        py0 = y0;
        py1 = y1;
        break;
      case 90:
        px0 = W - y1;
        px1 = W - y0;
        py0 = x0;
        py1 = x1;
        break;
      case 180:
        px0 = W - x1;
        px1 = W - x0;
        py0 = H - y1;
        py1 = H - y0;
        break;
      case 270:
        px0 = y0;
        px1 = y1;
        py0 = H - x1;
        py1 = H - x0;
        break;
    }

    px0 = Math.max(0, px0);
    py0 = Math.max(0, py0);
    px1 = Math.min(W, px1);
    py1 = Math.min(H, py1);
    for (let py = py0; py < py1; py++) {
      for (let px = px0; px < px1; px++) {
        blendPixel(px, py, src, opaque);
      }
    }
  }

  function fillLogical(r: Rect, src: Premultiplied, opaque: boolean): void {
    const clipped = intersectRect(offsetRect(r, state.tx, state.ty), state.clip);
    if (isEmptyRect(clipped)) return;
    fillDevice(clipped, src, opaque);
  }

  return Object.freeze({
    save(): void {
      stack.push({ ...state });
    },

    restore(): void {
      const prev = stack.pop();
      if (!prev) {
        throw new PanelError("PANEL_INVALID_STATE", "restore() without matching save()");
      }
      state = prev;
    },

    translate(dx: number, dy: number): void {
      state.tx += dx;
      state.ty += dy;
    },

    clipRect(r: Rect): void {
      state.clip = intersectRect(state.clip, offsetRect(r, state.tx, state.ty));
    },

    fillRect(r: Rect, c: Color): void {
      fillLogical(r, premultiply(c), false);
    },

    strokeRect(r: Rect, c: Color, lineWidth: number): void {
      if (!(lineWidth > 0)) return;
      const src = premultiply(c);
      const { x, y } = r.origin;
      const { width: w, height: h } = r.size;
      const lw = Math.min(lineWidth, w / 2, h / 2);
      if (lw <= 0) return;
      fillLogical(rect(x, y, w, lw), src, false);
      fillLogical(rect(x, y + h - lw, w, lw), src, false);
      fillLogical(rect(x, y + lw, lw, h - 2 * lw), src, false);
      fillLogical(rect(x + w - lw, y + lw, lw, h - 2 * lw), src, false);
    },

    paint(c: Color): void {
      if (isEmptyRect(state.clip)) return;
      fillDevice(state.clip, premultiply(c), false);
    },

    drawSurface(surface: Surface, at: Point, drawOpts?: DrawSurfaceOptions): void {
      const scaleX = drawOpts?.scaleX ?? 1;
      const scaleY = drawOpts?.scaleY ?? 1;
      const opaque = drawOpts?.opaque === true;
      if (!(scaleX > 0) || !(scaleY > 0)) return;
      for (let sy = 0; sy < surface.height; sy++) {
        for (let sx = 0; sx < surface.width; sx++) {
          const i = (sy * surface.width + sx) * 4;
          const src: Premultiplied = {
            b: (surface.data[i] ?? 0) / 255,
            g: (surface.data[i + 1] ?? 0) / 255,
            r: (surface.data[i + 2] ?? 0) / 255,
            a: opaque ? 1 : (surface.data[i + 3] ?? 0) / 255,
          };
          fillLogical(rect(at.x + sx * scaleX, at.y + sy * scaleY, scaleX, scaleY), src, opaque);
        }
      }
    },

    logicalSize(): Size {
      return logical;
    },

    depth(): number {
      return stack.length;
    },

    reset(): void {
      stack.length = 0;
      state = { tx: 0, ty: 0, clip: screenClip };
    },
  });
}

function premultiply(c: Color): Premultiplied {
  const a = c.a <= 0 ? 0 : c.a >= 1 ? 1 : c.a;
  return { r: c.r * a, g: c.g * a, b: c.b * a, a };
}
