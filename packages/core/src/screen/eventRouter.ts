/**
 * packages/core/src/screen/eventRouter.ts — Input queue and routing rules.
 *
 * Why: Producers only ever append to the queue; routing runs on the UI tick
 * that calls drain(). Keeping the rules in one place (separate from the
 * screen's drawing state) makes them testable against a bare widget tree.
 *
 * Routing:
 *   - touch: tracking widget, then hit-test target, then first responder.
 *     A consuming hit-test target that wantsTouchTracking becomes the tracking
 *     widget if none was active. Every touch-up ends tracking.
 *   - button: first responder, then the fallback (root view controller).
 *     Still unconsumed → warning.
 *   - scroll: first responder only; unconsumed scrolls are dropped.
 *
 * Widget references (first responder, tracking widget) are ids; a destroyed
 * widget simply stops receiving events.
 */

import { invalidArgument } from "../errors.js";
import {
  type ButtonEvent,
  type InputEvent,
  type ScrollEvent,
  type TouchEvent,
  describeEvent,
} from "../events.js";
import { point } from "../geometry.js";
import type { WidgetTree } from "../widgets/tree.js";
import type { WidgetId } from "../widgets/types.js";
import { type WarnFn, formatWarning } from "../warnings.js";

export type EventRouter = Readonly<{
  /** Append an event, or put it ahead of all pending events. */
  enqueue: (event: InputEvent, atFront?: boolean) => void;
  /** Route every pending event (and any queued while routing). */
  drain: () => void;
  pendingCount: () => number;
  setInhibited: (inhibited: boolean) => void;
  isInhibited: () => boolean;
  setFirstResponder: (id: WidgetId | null) => void;
  firstResponder: () => WidgetId | null;
  trackingWidget: () => WidgetId | null;
}>;

export type EventRouterOptions = Readonly<{
  tree: WidgetTree;
  /** Button handling after the first responder declines. */
  fallbackButton?: (event: ButtonEvent) => boolean;
  warn: WarnFn;
}>;

export function createEventRouter(opts: EventRouterOptions): EventRouter {
  const { tree, warn } = opts;
  const queue: InputEvent[] = [];
  let inhibited = false;
  let firstResponder: WidgetId | null = null;
  let tracking: WidgetId | null = null;

  function live(id: WidgetId | null): WidgetId | null {
    return id !== null && tree.has(id) ? id : null;
  }

  function routeTouch(event: TouchEvent): void {
    let wantNewTracking = true;
    let handled = false;

    const tracked = live(tracking);
    if (tracked !== null) {
      wantNewTracking = false;
      handled = tree.dispatchTouch(tracked, event);
    }

    if (!handled) {
      const root = tree.screenRoot();
      if (root !== null) {
        const origin = tree.getFrame(root).origin;
        const hit = tree.findChildAt(
          root,
          point(event.position.x - origin.x, event.position.y - origin.y),
        );
        if (hit !== null && tree.dispatchTouch(hit.widget, event)) {
          handled = true;
          if (wantNewTracking && tree.wantsTouchTracking(hit.widget)) tracking = hit.widget;
        }
      }
    }

    if (!handled) {
      const responder = live(firstResponder);
      if (responder !== null) tree.dispatchTouch(responder, event);
    }

    if (!event.isDown) tracking = null;
  }

  function routeButton(event: ButtonEvent): void {
    const responder = live(firstResponder);
    if (responder !== null && tree.dispatchButton(responder, event)) return;
    if (opts.fallbackButton?.(event) === true) return;
    warn(formatWarning("events", `unhandled ${describeEvent(event)}`));
  }

  function routeScroll(event: ScrollEvent): void {
    const responder = live(firstResponder);
    if (responder !== null) tree.dispatchScroll(responder, event);
  }

  return Object.freeze({
    enqueue(event: InputEvent, atFront = false): void {
      if (atFront) {
        queue.unshift(event);
      } else {
        queue.push(event);
      }
    },

    drain(): void {
      for (;;) {
        // Inhibition may begin mid-drain (a handler starting a transition).
        if (inhibited) {
          queue.length = 0;
          return;
        }
        const event = queue.shift();
        if (event === undefined) return;
        switch (event.kind) {
          case "touch":
            routeTouch(event);
            break;
          case "button":
            routeButton(event);
            break;
          case "scroll":
            routeScroll(event);
            break;
        }
      }
    },

    pendingCount(): number {
      return queue.length;
    },

    setInhibited(next: boolean): void {
      inhibited = next;
    },

    isInhibited(): boolean {
      return inhibited;
    },

    setFirstResponder(id: WidgetId | null): void {
      if (id !== null && !tree.has(id)) invalidArgument(`unknown widget id ${String(id)}`);
      firstResponder = id;
    },

    firstResponder(): WidgetId | null {
      return live(firstResponder);
    },

    trackingWidget(): WidgetId | null {
      return live(tracking);
    },
  });
}
