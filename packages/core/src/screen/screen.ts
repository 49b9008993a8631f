/**
 * packages/core/src/screen/screen.ts — Framebuffer screen: root binding, drawing, input and
 * animation ticks.
 *
 * Why: The host owns the loop; the screen exposes one method per tick phase
 * so hosts can drive it from whatever refresh source they have:
 *
 *   screen.processEvents();
 *   screen.handleAnimations();
 *   if (screen.isDirty()) { screen.redraw(); flip(screen.buffer); }
 *
 * queueEvent() is the only method meant to be called from input callbacks;
 * everything else belongs to the UI tick.
 */

import { type Animator, createAnimator } from "../animation/animator.js";
import type { EasingFunction } from "../animation/types.js";
import { invalidArgument } from "../errors.js";
import type { InputEvent } from "../events.js";
import type { Color, Size } from "../geometry.js";
import {
  type BufferContext,
  type PixelBuffer,
  type Rotation,
  createBufferContext,
  logicalSizeFor,
} from "../renderer/bufferContext.js";
import { type PixelFormat, optimalStride } from "../renderer/pixelFormat.js";
import type { ViewController } from "../viewController/viewController.js";
import { type WidgetTree, createWidgetTree } from "../widgets/tree.js";
import type { WidgetId } from "../widgets/types.js";
import { type WarnFn, formatWarning } from "../warnings.js";
import {
  type ResolvedScreenConfig,
  type ScreenConfig,
  requirePositiveFinite,
  requireRotation,
  resolveScreenConfig,
} from "./config.js";
import { type EventRouter, createEventRouter } from "./eventRouter.js";

export class Screen {
  /** Bytes per row for a tightly packed, 4-byte aligned framebuffer. */
  static optimalStride(format: PixelFormat, width: number): number {
    return optimalStride(format, width);
  }

  readonly tree: WidgetTree;
  readonly animator: Animator;
  readonly transitionDurationMs: number;
  readonly transitionEasing: EasingFunction;

  private readonly config: ResolvedScreenConfig;
  private readonly router: EventRouter;
  private readonly warn: WarnFn;

  /* --- Display state --- */
  private scale: number;
  private rot: Rotation;
  private background: Color;
  private ctx: BufferContext;
  private dirty = true;
  private forceDisplay = true;

  private rootVc: ViewController | null = null;

  constructor(config: ScreenConfig) {
    this.config = resolveScreenConfig(config);
    this.warn = this.config.warn;
    this.scale = this.config.scaleFactor;
    this.rot = this.config.rotation;
    this.background = this.config.backgroundColor;
    this.transitionDurationMs = this.config.transitionDurationMs;
    this.transitionEasing = this.config.transitionEasing;

    this.animator = createAnimator();
    this.tree = createWidgetTree({
      host: Object.freeze({
        markDirty: (): void => {
          this.dirty = true;
        },
        animator: this.animator,
      }),
    });
    this.router = createEventRouter({
      tree: this.tree,
      fallbackButton: (event) => this.rootVc?.handleButtonEventRoot(event) ?? false,
      warn: this.warn,
    });
    this.ctx = this.makeContext();
  }

  /* --- Buffer --- */

  get buffer(): Uint8Array {
    return this.config.buffer;
  }

  get stride(): number {
    return this.config.stride;
  }

  get format(): PixelFormat {
    return this.config.format;
  }

  /** Physical framebuffer size. */
  get framebufferSize(): Size {
    return this.config.size;
  }

  /** Logical size: rotated framebuffer size divided by the scale factor. */
  get size(): Size {
    return logicalSizeFor(this.pixelBuffer(), { scale: this.scale, rotation: this.rot });
  }

  /* --- Display settings --- */

  get scaleFactor(): number {
    return this.scale;
  }

  setScaleFactor(scale: number): void {
    this.scale = requirePositiveFinite("scaleFactor", scale);
    this.ctx = this.makeContext();
    this.needsDisplay();
  }

  get rotation(): Rotation {
    return this.rot;
  }

  setRotation(rotation: Rotation): void {
    this.rot = requireRotation(rotation);
    this.ctx = this.makeContext();
    this.needsDisplay();
  }

  get backgroundColor(): Color {
    return this.background;
  }

  setBackgroundColor(c: Color): void {
    this.background = c;
    this.needsDisplay();
  }

  now(): number {
    return this.config.now();
  }

  /* --- Root binding --- */

  get rootWidget(): WidgetId | null {
    return this.tree.screenRoot();
  }

  setRootWidget(id: WidgetId | null): void {
    this.tree.setScreenRoot(id);
    this.needsDisplay();
  }

  get rootViewController(): ViewController | null {
    return this.rootVc;
  }

  setRootViewController(vc: ViewController | null): void {
    if (vc !== null && !vc.belongsTo(this.tree)) {
      invalidArgument("view controller's widget does not belong to this screen");
    }
    if (vc !== null && this.tree.getParent(vc.view) !== null) {
      invalidArgument("a root view controller's widget cannot have a parent");
    }
    const old = this.rootVc;
    if (old !== null) {
      old.viewWillDisappear(false);
      this.rootVc = null;
      old.viewDidDisappear();
    }
    if (vc === null) {
      this.setRootWidget(null);
      return;
    }
    vc.viewWillAppear(false);
    this.rootVc = vc;
    this.setRootWidget(vc.view);
    vc.viewDidAppear();
  }

  /* --- Drawing --- */

  /** Force the next redraw to repaint everything. */
  needsDisplay(): void {
    this.forceDisplay = true;
    this.dirty = true;
  }

  isDirty(): boolean {
    if (this.dirty || this.forceDisplay) return true;
    const root = this.tree.screenRoot();
    return root !== null && this.tree.isDirty(root);
  }

  /**
   * Repaint the framebuffer. A clean screen is left untouched; otherwise the
   * whole tree is drawn, since painting the root covers every child.
   */
  redraw(): void {
    if (!this.isDirty()) return;
    const ctx = this.ctx;
    const tree = this.tree;
    const root = tree.screenRoot();
    ctx.reset();

    if (root === null || !tree.isOpaque(root)) ctx.paint(this.background);

    if (root !== null) {
      const everything = this.forceDisplay || tree.isDirty(root);
      const origin = tree.getFrame(root).origin;
      ctx.save();
      ctx.translate(origin.x, origin.y);
      tree.draw(root, ctx, everything);
      tree.drawChildren(root, ctx, everything);
      ctx.restore();
    }

    this.forceDisplay = false;
    this.dirty = false;
  }

  /* --- Animation --- */

  handleAnimations(): void {
    this.animator.frame();
  }

  /* --- Events --- */

  queueEvent(event: InputEvent, atFront = false): void {
    this.router.enqueue(event, atFront);
  }

  processEvents(): void {
    this.router.drain();
  }

  pendingEventCount(): number {
    return this.router.pendingCount();
  }

  setEventsInhibited(inhibited: boolean): void {
    this.router.setInhibited(inhibited);
  }

  areEventsInhibited(): boolean {
    return this.router.isInhibited();
  }

  setFirstResponder(id: WidgetId | null): void {
    this.router.setFirstResponder(id);
    if (id !== null && !this.tree.isOnScreen(id)) {
      this.warn(formatWarning("screen", `first responder ${String(id)} is not on screen`));
    }
  }

  get firstResponder(): WidgetId | null {
    return this.router.firstResponder();
  }

  get touchTrackingWidget(): WidgetId | null {
    return this.router.trackingWidget();
  }

  /* --- Internals --- */

  private pixelBuffer(): PixelBuffer {
    const c = this.config;
    return Object.freeze({
      data: c.buffer,
      format: c.format,
      width: c.size.width,
      height: c.size.height,
      stride: c.stride,
    });
  }

  private makeContext(): BufferContext {
    return createBufferContext(this.pixelBuffer(), { scale: this.scale, rotation: this.rot });
  }
}

export function createScreen(config: ScreenConfig): Screen {
  return new Screen(config);
}
