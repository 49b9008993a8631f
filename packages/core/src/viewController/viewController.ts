/**
 * packages/core/src/viewController/viewController.ts — Modal presentation coordinator.
 *
 * Why: A controller owns one root widget and can present exactly one child
 * controller over it. The child's root widget is added on top of the
 * presenter's children; once it fully covers them, those children stop
 * drawing until the child is dismissed.
 *
 * Transition contract:
 *   - Frames are driven by the screen's animator; progress is wall-clock
 *     based (host clock), so dropped frames shorten nothing
 *   - Input is dropped while a transition runs
 *   - finishTransition() jumps to the end state synchronously
 *
 * Subclasses override the lifecycle hooks. The hooks run in this order:
 *   present (none):    child.viewWillAppear(false), presenter.viewWillDisappear(false),
 *                      child.viewDidAppear(), presenter.viewDidDisappear()
 *   present (slideUp): child.viewWillAppear(true), ..., child.viewDidAppear()
 *   dismiss (none):    child.viewWillDisappear(false), presenter.viewWillAppear(false),
 *                      child.viewDidDisappear(), presenter.viewDidAppear()
 *   dismiss (slideUp): child.viewWillDisappear(true), ..., child.viewDidDisappear()
 */

import { progressFraction } from "../animation/interpolate.js";
import type { AnimatorToken } from "../animation/types.js";
import { invalidArgument, invalidState } from "../errors.js";
import type { ButtonEvent } from "../events.js";
import { rect } from "../geometry.js";
import type { WidgetTree } from "../widgets/tree.js";
import type { WidgetId } from "../widgets/types.js";
import type { PresentationAnimation, PresentationHost, PresentationState } from "./types.js";

type CapturedWidget = Readonly<{ id: WidgetId; wasInhibited: boolean }>;

type Transition = {
  readonly animation: PresentationAnimation;
  /** true while presenting, false while dismissing */
  readonly presentation: boolean;
  startMs: number;
  token: AnimatorToken | null;
};

export class ViewController {
  protected readonly host: PresentationHost;
  /** Root widget of this controller. */
  readonly view: WidgetId;

  /* --- Presentation links --- */
  private presenter: ViewController | null = null;
  private presented: ViewController | null = null;
  private captured: readonly CapturedWidget[] = Object.freeze([]);
  private transition: Transition | null = null;

  constructor(host: PresentationHost, view: WidgetId) {
    this.host = host;
    this.view = view;
  }

  /* --- Overridable hooks --- */

  /** Display title, e.g. for a navigation bar. */
  get title(): string {
    return "";
  }

  viewWillAppear(_animated: boolean): void {}

  viewDidAppear(): void {}

  viewWillDisappear(_animated: boolean): void {}

  viewDidDisappear(): void {}

  /** Return false to keep a button event away from controllers presented above this one. */
  shouldPropagateButtonEvent(_event: ButtonEvent): boolean {
    return true;
  }

  /** Whether a menu button press dismisses this controller. */
  shouldDismissOnMenuPress(): boolean {
    return false;
  }

  /**
   * Handle a button event no widget consumed. The default dismisses the
   * controller (animated) on menu-down when shouldDismissOnMenuPress() allows.
   */
  handleButtonEvent(event: ButtonEvent): boolean {
    if (event.button !== "menu" || !event.isDown) return false;
    if (!this.shouldDismissOnMenuPress()) return false;
    this.dismiss(true);
    return true;
  }

  /* --- Queries --- */

  get state(): PresentationState {
    if (this.transition !== null) {
      return this.transition.presentation ? "presenting-animating" : "dismissing-animating";
    }
    return this.presented !== null ? "presented" : "idle";
  }

  /** Controller currently presented by this one. */
  get presentedViewController(): ViewController | null {
    return this.presented;
  }

  /** Controller that presented this one. */
  get presentingViewController(): ViewController | null {
    return this.presenter;
  }

  /** Whether this controller's root widget lives in `tree`. */
  belongsTo(tree: WidgetTree): boolean {
    return this.host.tree === tree && tree.has(this.view);
  }

  /** Linear progress of the running transition in [0, 1], or null when none runs. */
  transitionFraction(): number | null {
    const t = this.transition;
    if (t === null) return null;
    return progressFraction(t.startMs, this.host.now(), this.host.transitionDurationMs);
  }

  /* --- Presentation --- */

  presentViewController(child: ViewController, animation: PresentationAnimation): void {
    if (child === this) invalidState("a view controller cannot present itself");
    if (this.presented !== null) invalidState("already presenting a view controller");
    if (child.presenter !== null) invalidState("view controller is already presented");
    if (child.host.tree !== this.host.tree) {
      invalidState("view controllers must share a widget tree");
    }
    const { tree } = this.host;
    if (child.view === tree.screenRoot()) {
      invalidArgument("the screen root view cannot be presented");
    }
    for (let id: WidgetId | null = this.view; id !== null; id = tree.getParent(id)) {
      if (id === child.view) {
        invalidArgument("cannot present a view controller that contains its presenter");
      }
    }
    const animated = animation !== "none";
    if (animated && !tree.isOnScreen(this.view)) {
      invalidState("cannot present with animation from an off-screen view controller");
    }

    child.presenter = this;
    child.viewWillAppear(animated);

    this.captured = Object.freeze(
      tree.getChildren(this.view).map((id) =>
        Object.freeze({ id, wasInhibited: tree.isDrawInhibited(id) }),
      ),
    );

    const ours = tree.getBounds(this.view);
    const theirs = tree.getBounds(child.view);
    const y = animation === "slideUp" ? ours.size.height : 0;
    tree.setFrame(child.view, rect(0, y, theirs.size.width, theirs.size.height));
    tree.addChild(this.view, child.view);

    this.presented = child;

    if (!animated) {
      this.viewWillDisappear(false);
      child.viewDidAppear();
      this.viewDidDisappear();
      this.setCapturedInhibited(true);
      return;
    }
    this.startTransition(animation, true);
  }

  dismissViewController(animation: PresentationAnimation): void {
    const child = this.presented;
    if (child === null) invalidState("not presenting a view controller");
    if (this.transition !== null) invalidState("a presentation transition is still running");
    const animated = animation !== "none";
    if (animated && !this.host.tree.isOnScreen(this.view)) {
      invalidState("cannot dismiss with animation on an off-screen view controller");
    }

    child.viewWillDisappear(animated);
    this.restoreCaptured();

    if (!animated) {
      this.viewWillAppear(false);
      this.finalizeDismissal(child);
      this.viewDidAppear();
      return;
    }
    this.startTransition(animation, false);
  }

  /** Ask the presenting controller to dismiss this one. */
  dismiss(animated: boolean): void {
    const presenter = this.presenter;
    if (presenter === null) invalidState("view controller must be presented to be dismissed");
    presenter.dismissViewController(animated ? "slideUp" : "none");
  }

  /** Complete a running transition immediately. No-op without one. */
  finishTransition(): void {
    if (this.transition === null) return;
    this.step(true);
  }

  /**
   * Route a button event from the root controller to the topmost presented
   * controller. Any controller with something presented above it may stop
   * propagation, in which case the event is unhandled.
   */
  handleButtonEventRoot(event: ButtonEvent): boolean {
    let vc: ViewController = this;
    while (vc.presented !== null) {
      if (!vc.shouldPropagateButtonEvent(event)) return false;
      vc = vc.presented;
    }
    return vc.handleButtonEvent(event);
  }

  /* --- Transition internals --- */

  private startTransition(animation: PresentationAnimation, presentation: boolean): void {
    const { tree, animator } = this.host;
    const transition: Transition = {
      animation,
      presentation,
      startMs: this.host.now(),
      token: null,
    };
    this.transition = transition;
    transition.token = animator.register(() => this.step(false));

    tree.setAnimationParticipant(this.view, true);
    for (const w of this.captured) {
      if (tree.has(w.id)) tree.setAnimationParticipant(w.id, true);
    }
    this.host.setEventsInhibited(true);
  }

  /** One transition frame. Returns whether more frames are needed. */
  private step(finish: boolean): boolean {
    const t = this.transition;
    const child = this.presented;
    if (t === null || child === null) return false;
    const { tree } = this.host;

    const fraction = finish
      ? 1
      : progressFraction(t.startMs, this.host.now(), this.host.transitionDurationMs);

    if (t.animation === "slideUp") {
      const eased = this.host.transitionEasing(fraction);
      const height = tree.getBounds(this.view).size.height;
      const bounds = tree.getBounds(child.view);
      const y = Math.trunc(height * (t.presentation ? 1 - eased : eased));
      tree.setFrame(child.view, rect(0, y, bounds.size.width, bounds.size.height));
    }

    if (fraction < 1 && t.animation !== "none") return true;

    this.endTransition(t);
    if (t.presentation) {
      child.viewDidAppear();
      this.setCapturedInhibited(true);
      for (const w of this.captured) {
        if (tree.has(w.id)) tree.setAnimationParticipant(w.id, false);
      }
    } else {
      this.finalizeDismissal(child);
    }
    tree.invokeRecursive(this.view, (id) => tree.needsDisplay(id));
    return false;
  }

  private endTransition(t: Transition): void {
    if (t.token !== null) this.host.animator.unregister(t.token);
    t.token = null;
    this.transition = null;
    this.host.tree.setAnimationParticipant(this.view, false);
    this.host.setEventsInhibited(false);
  }

  private finalizeDismissal(child: ViewController): void {
    const { tree } = this.host;
    if (!tree.has(child.view) || !tree.removeFromParent(child.view)) {
      invalidState("failed to remove presented view controller's widget");
    }
    child.viewDidDisappear();

    child.presenter = null;
    this.presented = null;
    for (const w of this.captured) {
      if (tree.has(w.id)) tree.setAnimationParticipant(w.id, false);
    }
    this.captured = Object.freeze([]);
  }

  private setCapturedInhibited(inhibited: boolean): void {
    const { tree } = this.host;
    for (const w of this.captured) {
      if (tree.has(w.id)) tree.setDrawInhibited(w.id, inhibited);
    }
  }

  private restoreCaptured(): void {
    const { tree } = this.host;
    for (const w of this.captured) {
      if (tree.has(w.id)) tree.setDrawInhibited(w.id, w.wasInhibited);
    }
  }
}
