/**
 * packages/core/src/geometry.ts — Geometric value types.
 *
 * Why: Frames, bounds and hit tests share one set of immutable primitives. All
 * coordinates are logical pixels; a frame's origin is relative to its parent.
 */

/** Point in logical pixels. */
export type Point = Readonly<{ x: number; y: number }>;

/** Size dimensions in logical pixels. */
export type Size = Readonly<{ width: number; height: number }>;

/** Rectangle with an origin and a size. Sizes may go negative after insetting. */
export type Rect = Readonly<{ origin: Point; size: Size }>;

/**
 * RGBA color with float components, nominally in [0, 1].
 * Components are not premultiplied.
 */
export type Color = Readonly<{ r: number; g: number; b: number; a: number }>;

export const ZERO_POINT: Point = Object.freeze({ x: 0, y: 0 });
export const ZERO_RECT: Rect = Object.freeze({
  origin: ZERO_POINT,
  size: Object.freeze({ width: 0, height: 0 }),
});

export function point(x: number, y: number): Point {
  return Object.freeze({ x, y });
}

export function size(width: number, height: number): Size {
  return Object.freeze({ width, height });
}

export function rect(x: number, y: number, width: number, height: number): Rect {
  return Object.freeze({ origin: point(x, y), size: size(width, height) });
}

export function color(r: number, g: number, b: number, a = 1): Color {
  return Object.freeze({ r, g, b, a });
}

/**
 * Shrink a rect by `dx`/`dy` on each side.
 *
 * No clamping is applied: insetting past the center yields a negative size.
 */
export function insetRect(r: Rect, dx: number, dy: number = dx): Rect {
  return rect(r.origin.x + dx, r.origin.y + dy, r.size.width - 2 * dx, r.size.height - 2 * dy);
}

/** Inclusive containment test: points on the right/bottom edge are inside. */
export function rectContains(r: Rect, p: Point): boolean {
  return (
    p.x >= r.origin.x &&
    p.x <= r.origin.x + r.size.width &&
    p.y >= r.origin.y &&
    p.y <= r.origin.y + r.size.height
  );
}

/** Bounds of a frame: same size, origin at zero. */
export function boundsOf(frame: Rect): Rect {
  return Object.freeze({ origin: ZERO_POINT, size: frame.size });
}

export function offsetRect(r: Rect, dx: number, dy: number): Rect {
  return rect(r.origin.x + dx, r.origin.y + dy, r.size.width, r.size.height);
}

export function isEmptyRect(r: Rect): boolean {
  return r.size.width <= 0 || r.size.height <= 0;
}

/** Intersection of two rects; a zero-sized rect at the origin of `a` when disjoint. */
export function intersectRect(a: Rect, b: Rect): Rect {
  const x0 = Math.max(a.origin.x, b.origin.x);
  const y0 = Math.max(a.origin.y, b.origin.y);
  const x1 = Math.min(a.origin.x + a.size.width, b.origin.x + b.size.width);
  const y1 = Math.min(a.origin.y + a.size.height, b.origin.y + b.size.height);
  if (x1 <= x0 || y1 <= y0) return rect(a.origin.x, a.origin.y, 0, 0);
  return rect(x0, y0, x1 - x0, y1 - y0);
}

export function rectsEqual(a: Rect, b: Rect): boolean {
  return (
    a.origin.x === b.origin.x &&
    a.origin.y === b.origin.y &&
    a.size.width === b.size.width &&
    a.size.height === b.size.height
  );
}
