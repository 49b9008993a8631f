/**
 * packages/core/src/renderer/types.ts — Drawing capability consumed by widgets.
 *
 * Widgets receive a context already translated (and, for clipping widgets,
 * clipped) to their own coordinate space. Coordinates are logical pixels; the
 * context maps them to the destination buffer.
 */

import type { Color, Point, Rect } from "../geometry.js";

/**
 * Bitmap in premultiplied ARGB32, little-endian byte order (B, G, R, A),
 * rows packed at `width * 4` bytes.
 */
export type Surface = Readonly<{
  width: number;
  height: number;
  data: Uint8Array;
}>;

export type DrawSurfaceOptions = Readonly<{
  /** Horizontal logical pixels per surface pixel. Default 1. */
  scaleX?: number;
  /** Vertical logical pixels per surface pixel. Default 1. */
  scaleY?: number;
  /** Skip blending and copy pixels as-is. Default false. */
  opaque?: boolean;
}>;

export interface DrawContext {
  /** Push the current translation and clip. */
  save(): void;
  /** Pop the most recent save(). Must be balanced with save(). */
  restore(): void;
  /** Move the coordinate origin. */
  translate(dx: number, dy: number): void;
  /** Intersect the clip with a rect in the current coordinate space. */
  clipRect(r: Rect): void;
  fillRect(r: Rect, color: Color): void;
  /** Stroke a rect with the line drawn inside its edges. */
  strokeRect(r: Rect, color: Color, lineWidth: number): void;
  /** Fill the whole current clip. */
  paint(color: Color): void;
  drawSurface(surface: Surface, at: Point, opts?: DrawSurfaceOptions): void;
}

/**
 * Bitmap loader capability. Decoding lives with the host; the runtime only
 * needs dimensions and pixels.
 */
export interface ImageProvider {
  load(path: string): Surface;
}
