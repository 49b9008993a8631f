import { assert, describe, test } from "@panelkit/testkit";
import { createAnimator } from "../../animation/animator.js";
import { PanelError } from "../../errors.js";
import { buttonEvent, scrollEvent, touchEvent } from "../../events.js";
import type { ButtonEvent } from "../../events.js";
import { type Rect, point, rect } from "../../geometry.js";
import { createWidgetTree } from "../../widgets/tree.js";
import type { WidgetBehavior } from "../../widgets/types.js";
import { createEventRouter } from "../eventRouter.js";

type Harness = ReturnType<typeof harness>;

function harness(fallbackButton?: (event: ButtonEvent) => boolean) {
  const warnings: string[] = [];
  const tree = createWidgetTree({ host: { markDirty: () => {}, animator: createAnimator() } });
  const root = tree.create(rect(0, 0, 100, 100));
  tree.setScreenRoot(root);
  const router = createEventRouter({
    tree,
    warn: (msg) => warnings.push(msg),
    ...(fallbackButton ? { fallbackButton } : {}),
  });
  return { tree, root, router, warnings };
}

function touchLogger(log: string[], name: string, consume: boolean, track = false): WidgetBehavior {
  return {
    wantsTouchTracking: () => track,
    handleTouchEvent: (event, _w, local) => {
      log.push(`${name} ${event.isDown ? "down" : "up"} ${String(local.x)},${String(local.y)}`);
      return consume;
    },
  };
}

function addWidget(h: Harness, frame: Rect, behavior: WidgetBehavior): number {
  const id = h.tree.create(frame, behavior);
  h.tree.addChild(h.root, id);
  return id;
}

describe("screen/eventRouter touch routing", () => {
  test("a tracking widget receives the rest of the gesture wherever it goes", () => {
    const log: string[] = [];
    const h = harness();
    const button = addWidget(h, rect(10, 10, 20, 20), touchLogger(log, "button", true, true));

    h.router.enqueue(touchEvent(point(15, 15), true));
    h.router.drain();
    assert.equal(h.router.trackingWidget(), button);

    h.router.enqueue(touchEvent(point(90, 90), true));
    h.router.enqueue(touchEvent(point(90, 90), false));
    h.router.drain();
    assert.deepEqual(log, ["button down 5,5", "button down 80,80", "button up 80,80"]);
    assert.equal(h.router.trackingWidget(), null);
  });

  test("widgets that do not track only see touches inside them", () => {
    const log: string[] = [];
    const h = harness();
    addWidget(h, rect(10, 10, 20, 20), touchLogger(log, "tap", true));

    h.router.enqueue(touchEvent(point(15, 15), true));
    h.router.enqueue(touchEvent(point(90, 90), true));
    h.router.drain();
    assert.deepEqual(log, ["tap down 5,5"]);
    assert.equal(h.router.trackingWidget(), null);
  });

  test("unconsumed touches fall back to the first responder", () => {
    const log: string[] = [];
    const h = harness();
    addWidget(h, rect(10, 10, 20, 20), touchLogger(log, "passive", false));
    const responder = addWidget(h, rect(60, 60, 10, 10), touchLogger(log, "responder", true));
    h.router.setFirstResponder(responder);

    h.router.enqueue(touchEvent(point(15, 15), true));
    h.router.drain();
    assert.deepEqual(log, ["passive down 5,5", "responder down -45,-45"]);
  });

  test("hit testing accounts for the root's frame origin", () => {
    const log: string[] = [];
    const tree = createWidgetTree({ host: { markDirty: () => {}, animator: createAnimator() } });
    const root = tree.create(rect(100, 50, 100, 100));
    const child = tree.create(rect(5, 5, 10, 10), touchLogger(log, "child", true));
    tree.addChild(root, child);
    tree.setScreenRoot(root);
    const router = createEventRouter({ tree, warn: () => {} });

    router.enqueue(touchEvent(point(110, 60), true));
    router.drain();
    assert.deepEqual(log, ["child down 5,5"]);
  });

  test("a destroyed tracking widget stops receiving touches", () => {
    const log: string[] = [];
    const h = harness();
    const button = addWidget(h, rect(10, 10, 20, 20), touchLogger(log, "button", true, true));
    h.router.enqueue(touchEvent(point(15, 15), true));
    h.router.drain();
    h.tree.destroy(button);

    h.router.enqueue(touchEvent(point(15, 15), false));
    h.router.drain();
    assert.deepEqual(log, ["button down 5,5"]);
    assert.equal(h.router.trackingWidget(), null);
  });
});

describe("screen/eventRouter queue", () => {
  function scrollRecorder(h: Harness, deltas: number[], onFirst?: () => void): number {
    let first = true;
    const id = addWidget(h, rect(0, 0, 10, 10), {
      handleScrollEvent: (event) => {
        deltas.push(event.delta);
        if (first) {
          first = false;
          onFirst?.();
        }
        return true;
      },
    });
    h.router.setFirstResponder(id);
    return id;
  }

  test("events drain in FIFO order; atFront jumps the queue", () => {
    const deltas: number[] = [];
    const h = harness();
    scrollRecorder(h, deltas);
    h.router.enqueue(scrollEvent(1));
    h.router.enqueue(scrollEvent(2));
    h.router.enqueue(scrollEvent(0), true);
    assert.equal(h.router.pendingCount(), 3);
    h.router.drain();
    assert.deepEqual(deltas, [0, 1, 2]);
    assert.equal(h.router.pendingCount(), 0);
  });

  test("events queued while draining are routed in the same drain", () => {
    const deltas: number[] = [];
    const h = harness();
    scrollRecorder(h, deltas, () => h.router.enqueue(scrollEvent(9)));
    h.router.enqueue(scrollEvent(1));
    h.router.enqueue(scrollEvent(2));
    h.router.drain();
    assert.deepEqual(deltas, [1, 2, 9]);
  });

  test("inhibited events are discarded, not deferred", () => {
    const deltas: number[] = [];
    const h = harness();
    scrollRecorder(h, deltas);
    h.router.enqueue(scrollEvent(1));
    h.router.setInhibited(true);
    h.router.drain();
    assert.equal(h.router.pendingCount(), 0);

    h.router.setInhibited(false);
    h.router.drain();
    assert.deepEqual(deltas, []);
  });

  test("inhibition that starts mid-drain drops the rest of the queue", () => {
    const deltas: number[] = [];
    const h = harness();
    scrollRecorder(h, deltas, () => h.router.setInhibited(true));
    h.router.enqueue(scrollEvent(1));
    h.router.enqueue(scrollEvent(2));
    h.router.drain();
    assert.deepEqual(deltas, [1]);
    assert.equal(h.router.pendingCount(), 0);
  });

  test("scrolls without a first responder are dropped silently", () => {
    const h = harness();
    h.router.enqueue(scrollEvent(3));
    h.router.drain();
    assert.deepEqual(h.warnings, []);
  });
});

describe("screen/eventRouter buttons and responders", () => {
  test("the first responder sees buttons before the fallback", () => {
    const seen: string[] = [];
    const h = harness(() => {
      seen.push("fallback");
      return true;
    });
    const responder = addWidget(h, rect(0, 0, 10, 10), {
      handleButtonEvent: (event) => {
        seen.push(`responder ${event.button}`);
        return event.button === "select";
      },
    });
    h.router.setFirstResponder(responder);

    h.router.enqueue(buttonEvent("select", true));
    h.router.enqueue(buttonEvent("menu", true));
    h.router.drain();
    assert.deepEqual(seen, ["responder select", "responder menu", "fallback"]);
    assert.deepEqual(h.warnings, []);
  });

  test("unhandled buttons produce a warning", () => {
    const h = harness(() => false);
    h.router.enqueue(buttonEvent("menu", true));
    h.router.drain();
    assert.deepEqual(h.warnings, ["[panelkit][events] unhandled button(menu down)"]);
  });

  test("first responder references are weak", () => {
    const h = harness();
    const id = addWidget(h, rect(0, 0, 10, 10), {});
    h.router.setFirstResponder(id);
    assert.equal(h.router.firstResponder(), id);
    h.tree.destroy(id);
    assert.equal(h.router.firstResponder(), null);
    assert.throws(
      () => h.router.setFirstResponder(id),
      (err: unknown) => err instanceof PanelError && err.code === "PANEL_INVALID_ARGUMENT",
    );
  });
});
