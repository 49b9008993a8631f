/**
 * packages/core/src/renderer/surface.ts — In-memory bitmap surfaces.
 */

import { PanelError } from "../errors.js";
import type { Color } from "../geometry.js";
import type { Surface } from "./types.js";

function requireDimension(name: string, v: number): number {
  if (!Number.isInteger(v) || v < 0) {
    throw new PanelError("PANEL_INVALID_ARGUMENT", `${name} must be a non-negative integer`);
  }
  return v;
}

/**
 * Wrap (or allocate) premultiplied ARGB32 pixels.
 *
 * @throws PanelError PANEL_RESOURCE_ERROR when `data` is shorter than width * height * 4
 */
export function createSurface(width: number, height: number, data?: Uint8Array): Surface {
  requireDimension("width", width);
  requireDimension("height", height);
  const needed = width * height * 4;
  if (data !== undefined && data.length < needed) {
    throw new PanelError(
      "PANEL_RESOURCE_ERROR",
      `surface data holds ${String(data.length)} bytes, ${String(needed)} required`,
    );
  }
  return Object.freeze({ width, height, data: data ?? new Uint8Array(needed) });
}

/** Read a surface pixel back as an unpremultiplied color. */
export function readSurfacePixel(surface: Surface, x: number, y: number): Color {
  const i = (y * surface.width + x) * 4;
  const a = (surface.data[i + 3] ?? 0) / 255;
  if (a === 0) return Object.freeze({ r: 0, g: 0, b: 0, a: 0 });
  return Object.freeze({
    r: (surface.data[i + 2] ?? 0) / 255 / a,
    g: (surface.data[i + 1] ?? 0) / 255 / a,
    b: (surface.data[i] ?? 0) / 255 / a,
    a,
  });
}

/** Write an unpremultiplied color into a surface pixel. */
export function writeSurfacePixel(surface: Surface, x: number, y: number, c: Color): void {
  const i = (y * surface.width + x) * 4;
  const a = clampUnit(c.a);
  surface.data[i] = Math.round(clampUnit(c.b) * a * 255);
  surface.data[i + 1] = Math.round(clampUnit(c.g) * a * 255);
  surface.data[i + 2] = Math.round(clampUnit(c.r) * a * 255);
  surface.data[i + 3] = Math.round(a * 255);
}

function clampUnit(v: number): number {
  if (!Number.isFinite(v) || v <= 0) return 0;
  return v >= 1 ? 1 : v;
}
