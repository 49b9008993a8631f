import { assert, describe, test } from "@panelkit/testkit";
import { createAnimator } from "../../animation/animator.js";
import { PanelError } from "../../errors.js";
import { rect } from "../../geometry.js";
import { createWidgetTree } from "../tree.js";
import type { WidgetBehavior } from "../types.js";

function isCode(code: string): (err: unknown) => boolean {
  return (err: unknown) => err instanceof PanelError && err.code === code;
}

function hostedTree() {
  const animator = createAnimator();
  const tree = createWidgetTree({ host: { markDirty: () => {}, animator } });
  return { tree, animator };
}

function screenLogger(log: string[], name: string, extra: WidgetBehavior = {}): WidgetBehavior {
  return {
    ...extra,
    willMoveToScreen: (_w, onScreen) => {
      log.push(`${name}.will(${String(onScreen)})`);
    },
    didMoveToScreen: (_w, onScreen) => {
      log.push(`${name}.did(${String(onScreen)})`);
    },
  };
}

describe("widgets/tree screen binding", () => {
  test("binding a root moves its whole subtree on screen", () => {
    const log: string[] = [];
    const { tree } = hostedTree();
    const root = tree.create(rect(0, 0, 100, 100), screenLogger(log, "root"));
    const child = tree.create(rect(0, 0, 10, 10), screenLogger(log, "child"));
    tree.addChild(root, child);
    assert.equal(tree.isOnScreen(child), false);

    tree.setScreenRoot(root);
    assert.equal(tree.screenRoot(), root);
    assert.equal(tree.isOnScreen(child), true);
    assert.deepEqual(log, [
      "root.will(true)",
      "child.will(true)",
      "root.did(true)",
      "child.did(true)",
    ]);
  });

  test("replacing the root sends leave hooks to the old subtree", () => {
    const log: string[] = [];
    const { tree } = hostedTree();
    const first = tree.create(rect(0, 0, 100, 100), screenLogger(log, "first"));
    const second = tree.create(rect(0, 0, 100, 100), screenLogger(log, "second"));
    tree.setScreenRoot(first);
    log.length = 0;

    tree.setScreenRoot(second);
    assert.deepEqual(log, [
      "first.will(false)",
      "first.did(false)",
      "second.will(true)",
      "second.did(true)",
    ]);
    assert.equal(tree.isOnScreen(first), false);

    log.length = 0;
    tree.setScreenRoot(null);
    assert.deepEqual(log, ["second.will(false)", "second.did(false)"]);
    assert.equal(tree.screenRoot(), null);
  });

  test("attaching under an on-screen parent sends screen hooks", () => {
    const log: string[] = [];
    const { tree } = hostedTree();
    const root = tree.create(rect(0, 0, 100, 100));
    const child = tree.create(rect(0, 0, 10, 10), screenLogger(log, "child"));
    tree.setScreenRoot(root);

    tree.addChild(root, child);
    tree.removeFromParent(child);
    assert.deepEqual(log, [
      "child.will(true)",
      "child.did(true)",
      "child.will(false)",
      "child.did(false)",
    ]);
  });

  test("animated widgets hold an animator registration only while on screen", () => {
    const { tree, animator } = hostedTree();
    let frames = 0;
    const root = tree.create(rect(0, 0, 100, 100));
    const spinner = tree.create(rect(0, 0, 10, 10), {
      wantsAnimation: () => true,
      processAnimationFrame: () => {
        frames++;
      },
    });
    tree.addChild(root, spinner);
    assert.equal(tree.isAnimating(spinner), false);

    tree.setScreenRoot(root);
    assert.equal(tree.isAnimating(spinner), true);
    animator.frame();
    animator.frame();
    assert.equal(frames, 2);

    tree.removeFromParent(spinner);
    assert.equal(tree.isAnimating(spinner), false);
    assert.equal(animator.size(), 0);
    animator.frame();
    assert.equal(frames, 2);

    tree.addChild(root, spinner);
    assert.equal(animator.size(), 1);
    tree.destroy(spinner);
    assert.equal(animator.size(), 0);
  });

  test("screen binding misuse is rejected", () => {
    const detached = createWidgetTree();
    const lone = detached.create(rect(0, 0, 1, 1));
    assert.throws(() => detached.setScreenRoot(lone), isCode("PANEL_INVALID_STATE"));

    const { tree } = hostedTree();
    const root = tree.create(rect(0, 0, 100, 100));
    const other = tree.create(rect(0, 0, 100, 100));
    const child = tree.create(rect(0, 0, 10, 10));
    tree.addChild(root, child);
    assert.throws(() => tree.setScreenRoot(child), isCode("PANEL_INVALID_ARGUMENT"));

    tree.setScreenRoot(root);
    assert.throws(() => tree.addChild(other, root), isCode("PANEL_INVALID_ARGUMENT"));
    assert.throws(() => tree.destroy(root), isCode("PANEL_INVALID_ARGUMENT"));
    assert.equal(tree.screenRoot(), root);
  });
});
