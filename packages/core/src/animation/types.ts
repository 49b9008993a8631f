/**
 * packages/core/src/animation/types.ts — Core animation API types.
 */

/** Easing function input/output nominally in [0..1]. */
export type EasingFunction = (t: number) => number;

/** Built-in easing presets. */
export type EasingName =
  | "linear"
  | "easeInOutQuad"
  | "easeInOutCubic"
  | "easeInOutQuart"
  | "easeInOutCirc"
  | "easeInOutElastic";

/** Easing value accepted by animation APIs. */
export type EasingInput = EasingName | EasingFunction;

/**
 * Per-frame animator callback. Return `true` to keep receiving frames,
 * `false` to be removed after the current pass.
 */
export type AnimatorCallback = () => boolean;

/** Token identifying a registered animator callback. Never 0. */
export type AnimatorToken = number;
