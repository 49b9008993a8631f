/**
 * packages/core/src/widgets/types.ts — Widget identity and capability types.
 *
 * Why: Widgets live in an arena (see tree.ts) and are addressed by stable ids.
 * What a widget *does* is described by a WidgetBehavior: every member is
 * optional and falls back to "no"/no-op (bounds clipping alone defaults to
 * on), so tree traversal and event routing never depend on concrete widget
 * types.
 */

import type { Animator } from "../animation/animator.js";
import type { ButtonEvent, ScrollEvent, TouchEvent } from "../events.js";
import type { Point, Rect } from "../geometry.js";
import type { DrawContext } from "../renderer/types.js";

/** Stable widget identifier, unique within one WidgetTree. */
export type WidgetId = number;

/**
 * View of one widget handed to behavior hooks.
 *
 * Handles stay valid after the widget is destroyed; their accessors then throw.
 */
export interface WidgetHandle {
  readonly id: WidgetId;
  /** Frame in the parent's coordinate space. */
  frame(): Rect;
  /** Bounds in the widget's own coordinate space (origin 0,0). */
  bounds(): Rect;
  setFrame(frame: Rect): void;
  /** Mark the widget's own content dirty. */
  needsDisplay(): void;
  parent(): WidgetId | null;
  isOnScreen(): boolean;
  isAnimationParticipant(): boolean;
  convertToScreenSpace(r: Rect): Rect;
  convertFromScreenSpace(p: Point): Point;
}

/**
 * Capability set of a widget.
 *
 * `draw` renders the widget's own content only; children are drawn by the
 * tree afterwards, on top. The tree clears the self-dirty flag after `draw`
 * returns, so implementations never manage dirty state themselves.
 */
export interface WidgetBehavior {
  /** Diagnostic name. */
  readonly kind?: string;

  /** Whether the widget paints every pixel of its bounds. */
  isOpaque?(w: WidgetHandle): boolean;
  /** Whether drawing of this widget and its subtree is clipped to its frame. Default true. */
  clipToBounds?(w: WidgetHandle): boolean;
  /** Whether the widget wants processAnimationFrame once per frame while on screen. */
  wantsAnimation?(w: WidgetHandle): boolean;
  /** Whether a consumed touch-down makes this widget receive the rest of the gesture. */
  wantsTouchTracking?(w: WidgetHandle): boolean;

  draw?(ctx: DrawContext, w: WidgetHandle, everything: boolean): void;

  /** `local` is the touch position in the widget's own coordinate space. */
  handleTouchEvent?(event: TouchEvent, w: WidgetHandle, local: Point): boolean;
  handleScrollEvent?(event: ScrollEvent, w: WidgetHandle): boolean;
  handleButtonEvent?(event: ButtonEvent, w: WidgetHandle): boolean;

  processAnimationFrame?(w: WidgetHandle): void;

  /** Called before the parent changes; `newParent` is null on removal. */
  willMoveToParent?(w: WidgetHandle, newParent: WidgetId | null): void;
  didMoveToParent?(w: WidgetHandle): void;
  /** Called before the widget joins (`true`) or leaves (`false`) a screen. */
  willMoveToScreen?(w: WidgetHandle, onScreen: boolean): void;
  didMoveToScreen?(w: WidgetHandle, onScreen: boolean): void;
  frameDidChange?(w: WidgetHandle): void;
}

/** Result of a hit test: the deepest widget and the point in its own space. */
export type HitResult = Readonly<{ widget: WidgetId; point: Point }>;

/** Screen-side services a tree reports to once its root is on a screen. */
export type WidgetTreeHost = Readonly<{
  /** The root (or the tree above a dirty widget) became dirty. */
  markDirty: () => void;
  animator: Animator;
}>;
