/**
 * packages/core/src/screen/config.ts — Screen configuration defaults and validation.
 *
 * Why: A screen is constructed once from host-provided values. Everything is
 * checked up front so later ticks never see a malformed buffer or clock.
 */

import { resolveEasing } from "../animation/easing.js";
import type { EasingFunction, EasingInput } from "../animation/types.js";
import { PanelError, invalidArgument } from "../errors.js";
import { type Color, type Size, color, size } from "../geometry.js";
import { type Rotation, isRotation } from "../renderer/bufferContext.js";
import {
  MAX_FRAMEBUFFER_DIMENSION,
  type PixelFormat,
  bytesPerPixel,
  isPixelFormat,
  optimalStride,
} from "../renderer/pixelFormat.js";
import { type WarnFn, defaultWarn } from "../warnings.js";

export type ScreenConfig = Readonly<{
  format: PixelFormat;
  /** Physical framebuffer size in pixels. */
  size: Size;
  /** Externally owned framebuffer. Allocated when omitted. */
  buffer?: Uint8Array;
  /** Bytes per row. Defaults to optimalStride(format, size.width). */
  stride?: number;
  scaleFactor?: number;
  rotation?: Rotation;
  backgroundColor?: Color;
  /** Duration of presentation and dismissal transitions. */
  transitionDurationMs?: number;
  /** Easing applied to transition progress. Defaults to easeInOutQuad. */
  transitionEasing?: EasingInput;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  warn?: WarnFn;
}>;

export type ResolvedScreenConfig = Readonly<{
  format: PixelFormat;
  size: Size;
  buffer: Uint8Array;
  stride: number;
  scaleFactor: number;
  rotation: Rotation;
  backgroundColor: Color;
  transitionDurationMs: number;
  transitionEasing: EasingFunction;
  now: () => number;
  warn: WarnFn;
}>;

export const DEFAULT_TRANSITION_DURATION_MS = 350;
export const DEFAULT_BACKGROUND_COLOR: Color = color(0, 0, 0);

function defaultNow(): number {
  return performance.now();
}

function requireDimension(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0 || v > MAX_FRAMEBUFFER_DIMENSION) {
    invalidArgument(
      `${name} must be an integer in [1, ${String(MAX_FRAMEBUFFER_DIMENSION)}]`,
    );
  }
  return v;
}

/** Scale factors and similar ratios: finite and strictly positive. */
export function requirePositiveFinite(name: string, v: number): number {
  if (!Number.isFinite(v) || v <= 0) invalidArgument(`${name} must be a positive finite number`);
  return v;
}

function requireNonNegativeFinite(name: string, v: number): number {
  if (!Number.isFinite(v) || v < 0) invalidArgument(`${name} must be a non-negative finite number`);
  return v;
}

export function requireRotation(v: unknown): Rotation {
  if (!isRotation(v)) {
    throw new PanelError("PANEL_UNSUPPORTED", `unsupported rotation: ${String(v)}`);
  }
  return v;
}

export function resolveScreenConfig(config: ScreenConfig): ResolvedScreenConfig {
  if (!isPixelFormat(config.format)) {
    throw new PanelError("PANEL_UNSUPPORTED", `unsupported pixel format: ${String(config.format)}`);
  }
  const format = config.format;
  const width = requireDimension("size.width", config.size.width);
  const height = requireDimension("size.height", config.size.height);

  const rowBytes = width * bytesPerPixel(format);
  let stride: number;
  if (config.stride === undefined) {
    stride = optimalStride(format, width);
  } else {
    if (!Number.isInteger(config.stride) || config.stride < rowBytes) {
      throw new PanelError(
        "PANEL_RESOURCE_ERROR",
        `stride ${String(config.stride)} is smaller than a row (${String(rowBytes)} bytes)`,
      );
    }
    stride = config.stride;
  }

  const required = stride * height;
  let buffer: Uint8Array;
  if (config.buffer === undefined) {
    buffer = new Uint8Array(required);
  } else {
    if (config.buffer.byteLength < required) {
      throw new PanelError(
        "PANEL_RESOURCE_ERROR",
        `buffer holds ${String(config.buffer.byteLength)} bytes, need ${String(required)}`,
      );
    }
    buffer = config.buffer;
  }

  const scaleFactor =
    config.scaleFactor === undefined ? 1 : requirePositiveFinite("scaleFactor", config.scaleFactor);
  const rotation = config.rotation === undefined ? 0 : requireRotation(config.rotation);
  const transitionDurationMs =
    config.transitionDurationMs === undefined
      ? DEFAULT_TRANSITION_DURATION_MS
      : requireNonNegativeFinite("transitionDurationMs", config.transitionDurationMs);

  return Object.freeze({
    format,
    size: size(width, height),
    buffer,
    stride,
    scaleFactor,
    rotation,
    backgroundColor: config.backgroundColor ?? DEFAULT_BACKGROUND_COLOR,
    transitionDurationMs,
    transitionEasing: resolveEasing(config.transitionEasing ?? "easeInOutQuad"),
    now: typeof config.now === "function" ? config.now : defaultNow,
    warn: typeof config.warn === "function" ? config.warn : defaultWarn,
  });
}
