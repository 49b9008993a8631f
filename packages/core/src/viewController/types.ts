/**
 * packages/core/src/viewController/types.ts — Presentation types.
 */

import type { Animator } from "../animation/animator.js";
import type { EasingFunction } from "../animation/types.js";
import type { WidgetTree } from "../widgets/tree.js";

/** How a presented controller enters and leaves. */
export type PresentationAnimation = "none" | "slideUp";

/**
 * Presenter lifecycle:
 *   idle → presenting-animating → presented → dismissing-animating → idle
 * Non-animated transitions skip the animating states.
 */
export type PresentationState =
  | "idle"
  | "presenting-animating"
  | "presented"
  | "dismissing-animating";

/** Screen services a controller needs to run transitions. */
export type PresentationHost = Readonly<{
  tree: WidgetTree;
  animator: Animator;
  now: () => number;
  transitionDurationMs: number;
  transitionEasing: EasingFunction;
  setEventsInhibited: (inhibited: boolean) => void;
}>;
