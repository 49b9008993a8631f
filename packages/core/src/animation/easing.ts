/**
 * packages/core/src/animation/easing.ts — Easing curve helpers.
 *
 * Curves follow easings.net. `easeInOutQuad` is the curve driving controller
 * presentation transitions.
 */

import { clamp01 } from "./interpolate.js";
import type { EasingFunction, EasingInput, EasingName } from "./types.js";

export function easeInOutQuad(t: number): number {
  return t < 0.5 ? 2 * t * t : t * (4 - 2 * t) - 1;
}

export function easeInOutCubic(t: number): number {
  return t < 0.5 ? 4 * t * t * t : 1 + (t - 1) * (2 * t - 2) * (2 * t - 2);
}

export function easeInOutQuart(t: number): number {
  if (t < 0.5) {
    const sq = t * t;
    return 8 * sq * sq;
  }
  const shifted = (t - 1) * (t - 1);
  return 1 - 8 * shifted * shifted;
}

export function easeInOutCirc(t: number): number {
  if (t < 0.5) return (1 - Math.sqrt(1 - 2 * t)) * 0.5;
  return (1 + Math.sqrt(2 * t - 1)) * 0.5;
}

export function easeInOutElastic(t: number): number {
  if (t < 0.45) {
    const sq = t * t;
    return 8 * sq * sq * Math.sin(t * Math.PI * 9);
  }
  if (t < 0.55) return 0.5 + 0.75 * Math.sin(t * Math.PI * 4);
  const sq = (t - 1) * (t - 1);
  return 1 - 8 * sq * sq * Math.sin(t * Math.PI * 9);
}

const EASING_PRESETS: Readonly<Record<EasingName, EasingFunction>> = Object.freeze({
  linear: (t: number): number => t,
  easeInOutQuad,
  easeInOutCubic,
  easeInOutQuart,
  easeInOutCirc,
  easeInOutElastic,
});

/** Resolve user-provided easing value to a function over a clamped input. */
export function resolveEasing(input: EasingInput | undefined): EasingFunction {
  if (typeof input === "function") {
    return (t: number): number => input(clamp01(t));
  }
  const preset = input ? EASING_PRESETS[input] : EASING_PRESETS.linear;
  return (t: number): number => preset(clamp01(t));
}
