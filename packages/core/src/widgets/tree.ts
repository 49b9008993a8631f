/**
 * packages/core/src/widgets/tree.ts — Widget arena: hierarchy, dirty state, drawing, hit testing.
 *
 * Why: Widgets are records addressed by stable ids. Parent, child and screen
 * links are id fields, so a detached subtree can never leave a dangling
 * back-reference, and "weak" references held elsewhere (first responder, touch
 * tracking, presentation bookkeeping) are just ids checked with `has()`.
 *
 * Dirty model:
 *   - selfDirty: the widget's own content changed
 *   - childrenDirty: some descendant changed
 *   - needsDisplay(w) sets selfDirty on w and childrenDirty on every ancestor;
 *     at the screen root the host is told instead of recursing further
 *   - flags are cleared lazily by draw()/drawChildren(), never eagerly
 *
 * Paint order is child insertion order (back to front); hit testing walks the
 * reverse order so the topmost widget wins.
 */

import type { AnimatorToken } from "../animation/types.js";
import { invalidArgument, invalidState } from "../errors.js";
import type { ButtonEvent, ScrollEvent, TouchEvent } from "../events.js";
import {
  type Point,
  type Rect,
  boundsOf,
  offsetRect,
  point,
  rectContains,
} from "../geometry.js";
import type { DrawContext } from "../renderer/types.js";
import type {
  HitResult,
  WidgetBehavior,
  WidgetHandle,
  WidgetId,
  WidgetTreeHost,
} from "./types.js";

const EMPTY_BEHAVIOR: WidgetBehavior = Object.freeze({});

type WidgetRecord = {
  readonly id: WidgetId;
  readonly behavior: WidgetBehavior;
  readonly handle: WidgetHandle;
  frame: Rect;
  parent: WidgetId | null;
  children: WidgetId[];
  selfDirty: boolean;
  childrenDirty: boolean;
  hasTransparentChildren: boolean;
  drawInhibited: boolean;
  animationParticipant: boolean;
  animatorToken: AnimatorToken | null;
};

export type WidgetTree = Readonly<{
  /** Create a detached widget. New widgets start self-dirty. */
  create: (frame: Rect, behavior?: WidgetBehavior) => WidgetId;
  /** Detach a widget and release it and its whole subtree. */
  destroy: (id: WidgetId) => void;
  has: (id: WidgetId) => boolean;
  handle: (id: WidgetId) => WidgetHandle;
  behavior: (id: WidgetId) => WidgetBehavior;
  /** Number of live widgets. */
  size: () => number;

  /* --- Hierarchy --- */
  addChild: (parent: WidgetId, child: WidgetId, atStart?: boolean) => void;
  removeChild: (parent: WidgetId, child: WidgetId) => boolean;
  removeFromParent: (id: WidgetId) => boolean;
  getParent: (id: WidgetId) => WidgetId | null;
  getChildren: (id: WidgetId) => readonly WidgetId[];
  hasChildren: (id: WidgetId) => boolean;
  getRoot: (id: WidgetId) => WidgetId;
  /** Visit `id` and its descendants, parents before children. */
  invokeRecursive: (id: WidgetId, fn: (id: WidgetId) => void) => void;

  /* --- Geometry --- */
  getFrame: (id: WidgetId) => Rect;
  getBounds: (id: WidgetId) => Rect;
  setFrame: (id: WidgetId, frame: Rect) => void;
  convertToScreenSpace: (id: WidgetId, r: Rect) => Rect;
  convertFromScreenSpace: (id: WidgetId, p: Point) => Point;
  /** Deepest widget under `p` (in `id`'s own space), or null when `id` rejects it. */
  findChildAt: (id: WidgetId, p: Point) => HitResult | null;

  /* --- Dirty state --- */
  needsDisplay: (id: WidgetId) => void;
  isDirty: (id: WidgetId) => boolean;
  isSelfDirty: (id: WidgetId) => boolean;
  isChildrenDirty: (id: WidgetId) => boolean;

  /* --- Drawing --- */
  draw: (id: WidgetId, ctx: DrawContext, everything: boolean) => void;
  drawChildren: (id: WidgetId, ctx: DrawContext, everything: boolean) => void;
  setDrawInhibited: (id: WidgetId, inhibited: boolean) => void;
  isDrawInhibited: (id: WidgetId) => boolean;
  setAnimationParticipant: (id: WidgetId, participant: boolean) => void;
  isAnimationParticipant: (id: WidgetId) => boolean;
  hasTransparentChildren: (id: WidgetId) => boolean;

  /* --- Capabilities --- */
  isOpaque: (id: WidgetId) => boolean;
  clipsToBounds: (id: WidgetId) => boolean;
  wantsTouchTracking: (id: WidgetId) => boolean;
  dispatchTouch: (id: WidgetId, event: TouchEvent) => boolean;
  dispatchScroll: (id: WidgetId, event: ScrollEvent) => boolean;
  dispatchButton: (id: WidgetId, event: ButtonEvent) => boolean;

  /* --- Screen binding --- */
  /** Widget currently bound to the host screen, if any. */
  screenRoot: () => WidgetId | null;
  /** Bind (or with null, unbind) the tree root shown by the host screen. */
  setScreenRoot: (id: WidgetId | null) => void;
  isOnScreen: (id: WidgetId) => boolean;
  /** Whether the widget currently holds an animator registration. */
  isAnimating: (id: WidgetId) => boolean;
}>;

export type WidgetTreeOptions = Readonly<{
  host?: WidgetTreeHost;
}>;

export function createWidgetTree(opts: WidgetTreeOptions = {}): WidgetTree {
  const host = opts.host ?? null;
  const records = new Map<WidgetId, WidgetRecord>();
  let nextId: WidgetId = 1;
  let rootId: WidgetId | null = null;

  function get(id: WidgetId): WidgetRecord {
    const rec = records.get(id);
    if (!rec) invalidArgument(`unknown widget id ${String(id)}`);
    return rec;
  }

  function rootOf(rec: WidgetRecord): WidgetRecord {
    let cur = rec;
    while (cur.parent !== null) cur = get(cur.parent);
    return cur;
  }

  function onScreen(rec: WidgetRecord): boolean {
    return host !== null && rootId !== null && rootOf(rec).id === rootId;
  }

  function visit(rec: WidgetRecord, fn: (r: WidgetRecord) => void): void {
    fn(rec);
    for (const childId of rec.children) visit(get(childId), fn);
  }

  /* --- Capability lookups with defaults --- */

  function opaque(rec: WidgetRecord): boolean {
    return rec.behavior.isOpaque?.(rec.handle) === true;
  }

  function clips(rec: WidgetRecord): boolean {
    return rec.behavior.clipToBounds?.(rec.handle) ?? true;
  }

  /* --- Dirty propagation --- */

  function markChildrenDirty(start: WidgetId | null): void {
    let id = start;
    while (id !== null) {
      const rec = get(id);
      rec.childrenDirty = true;
      if (rec.parent === null) {
        if (host !== null && rec.id === rootId) host.markDirty();
        return;
      }
      id = rec.parent;
    }
  }

  function needsDisplay(rec: WidgetRecord): void {
    rec.selfDirty = true;
    if (rec.parent !== null) {
      markChildrenDirty(rec.parent);
    } else if (host !== null && rec.id === rootId) {
      host.markDirty();
    }
  }

  function updateChildData(rec: WidgetRecord): void {
    rec.hasTransparentChildren = !rec.children.every((childId) => opaque(get(childId)));
    markChildrenDirty(rec.id);
  }

  /* --- Animator registration --- */

  function animationFrame(id: WidgetId): boolean {
    const rec = records.get(id);
    if (!rec || rec.animatorToken === null) return false;
    rec.behavior.processAnimationFrame?.(rec.handle);
    return true;
  }

  function registerAnimation(rec: WidgetRecord): void {
    if (host === null || rec.animatorToken !== null) return;
    if (rec.behavior.wantsAnimation?.(rec.handle) !== true) return;
    const id = rec.id;
    rec.animatorToken = host.animator.register(() => animationFrame(id));
  }

  function unregisterAnimation(rec: WidgetRecord): void {
    if (rec.animatorToken === null) return;
    host?.animator.unregister(rec.animatorToken);
    rec.animatorToken = null;
  }

  /* --- Screen transitions for a subtree --- */

  function willMoveToScreen(rec: WidgetRecord, entering: boolean): void {
    visit(rec, (r) => {
      if (!entering) unregisterAnimation(r);
      r.behavior.willMoveToScreen?.(r.handle, entering);
    });
  }

  function didMoveToScreen(rec: WidgetRecord, entering: boolean): void {
    visit(rec, (r) => {
      if (entering) registerAnimation(r);
      r.behavior.didMoveToScreen?.(r.handle, entering);
    });
  }

  /* --- Attach / detach --- */

  function detach(rec: WidgetRecord): WidgetRecord | null {
    if (rec.parent === null) return null;
    const parent = get(rec.parent);
    const leaving = onScreen(rec);

    rec.behavior.willMoveToParent?.(rec.handle, null);
    if (leaving) willMoveToScreen(rec, false);

    const idx = parent.children.indexOf(rec.id);
    if (idx >= 0) parent.children.splice(idx, 1);
    rec.parent = null;

    rec.behavior.didMoveToParent?.(rec.handle);
    if (leaving) didMoveToScreen(rec, false);

    updateChildData(parent);
    return parent;
  }

  function attach(parent: WidgetRecord, child: WidgetRecord, atStart: boolean): void {
    const entering = onScreen(parent);

    child.behavior.willMoveToParent?.(child.handle, parent.id);
    if (entering) willMoveToScreen(child, true);

    if (atStart) {
      parent.children.unshift(child.id);
    } else {
      parent.children.push(child.id);
    }
    child.parent = parent.id;

    child.behavior.didMoveToParent?.(child.handle);
    if (entering) didMoveToScreen(child, true);

    updateChildData(parent);
    needsDisplay(child);
  }

  /* --- Drawing --- */

  function drawOne(rec: WidgetRecord, ctx: DrawContext, everything: boolean): void {
    rec.behavior.draw?.(ctx, rec.handle, everything);
    rec.selfDirty = false;
  }

  function clearDirty(rec: WidgetRecord): void {
    rec.selfDirty = false;
    rec.childrenDirty = false;
  }

  function drawChildren(rec: WidgetRecord, ctx: DrawContext, everything: boolean): void {
    for (const childId of rec.children) {
      const child = get(childId);
      if (child.drawInhibited) {
        // setDrawInhibited(false) marks the subtree dirty again.
        visit(child, clearDirty);
        continue;
      }
      const frame = child.frame;

      ctx.save();
      try {
        if (clips(child)) ctx.clipRect(frame);
        ctx.translate(frame.origin.x, frame.origin.y);
        if (everything || child.selfDirty || child.childrenDirty) {
          drawOne(child, ctx, everything);
        }
        drawChildren(child, ctx, everything);
      } finally {
        ctx.restore();
      }
    }
    rec.childrenDirty = false;
  }

  /* --- Hit testing --- */

  function hitTest(rec: WidgetRecord, p: Point): HitResult | null {
    if (!rectContains(boundsOf(rec.frame), p)) return null;
    for (let i = rec.children.length - 1; i >= 0; i--) {
      const childId = rec.children[i];
      if (childId === undefined) continue;
      const child = get(childId);
      if (child.drawInhibited) continue;
      const local = point(p.x - child.frame.origin.x, p.y - child.frame.origin.y);
      const hit = hitTest(child, local);
      if (hit) return hit;
    }
    return Object.freeze({ widget: rec.id, point: p });
  }

  function screenOffset(rec: WidgetRecord): Point {
    let x = 0;
    let y = 0;
    let cur: WidgetRecord | null = rec;
    while (cur !== null) {
      x += cur.frame.origin.x;
      y += cur.frame.origin.y;
      cur = cur.parent === null ? null : get(cur.parent);
    }
    return point(x, y);
  }

  function setFrame(rec: WidgetRecord, frame: Rect): void {
    rec.frame = frame;
    needsDisplay(rec);
    rec.behavior.frameDidChange?.(rec.handle);
  }

  function makeHandle(id: WidgetId): WidgetHandle {
    return Object.freeze({
      id,
      frame: (): Rect => get(id).frame,
      bounds: (): Rect => boundsOf(get(id).frame),
      setFrame: (frame: Rect): void => setFrame(get(id), frame),
      needsDisplay: (): void => needsDisplay(get(id)),
      parent: (): WidgetId | null => get(id).parent,
      isOnScreen: (): boolean => onScreen(get(id)),
      isAnimationParticipant: (): boolean => get(id).animationParticipant,
      convertToScreenSpace: (r: Rect): Rect => {
        const o = screenOffset(get(id));
        return offsetRect(r, o.x, o.y);
      },
      convertFromScreenSpace: (p: Point): Point => {
        const o = screenOffset(get(id));
        return point(p.x - o.x, p.y - o.y);
      },
    });
  }

  const tree: WidgetTree = Object.freeze({
    create(frame: Rect, behavior?: WidgetBehavior): WidgetId {
      const id = nextId++;
      records.set(id, {
        id,
        behavior: behavior ?? EMPTY_BEHAVIOR,
        handle: makeHandle(id),
        frame,
        parent: null,
        children: [],
        selfDirty: true,
        childrenDirty: false,
        hasTransparentChildren: false,
        drawInhibited: false,
        animationParticipant: false,
        animatorToken: null,
      });
      return id;
    },

    destroy(id: WidgetId): void {
      const rec = get(id);
      if (rec.id === rootId) invalidArgument("cannot destroy the screen root widget");
      detach(rec);
      const doomed: WidgetRecord[] = [];
      visit(rec, (r) => doomed.push(r));
      for (const r of doomed) {
        unregisterAnimation(r);
        records.delete(r.id);
      }
    },

    has(id: WidgetId): boolean {
      return records.has(id);
    },

    handle(id: WidgetId): WidgetHandle {
      return get(id).handle;
    },

    behavior(id: WidgetId): WidgetBehavior {
      return get(id).behavior;
    },

    size(): number {
      return records.size;
    },

    addChild(parentId: WidgetId, childId: WidgetId, atStart = false): void {
      const parent = get(parentId);
      const child = get(childId);
      if (parentId === childId) invalidArgument("cannot add widget to itself");
      if (childId === rootId) {
        invalidArgument("the screen root widget cannot become a child; replace the root first");
      }
      for (let cur: WidgetRecord | null = parent; cur !== null; ) {
        if (cur.id === childId) {
          invalidArgument(
            `adding widget ${String(childId)} under ${String(parentId)} would create a cycle`,
          );
        }
        cur = cur.parent === null ? null : get(cur.parent);
      }
      detach(child);
      attach(parent, child, atStart);
    },

    removeChild(parentId: WidgetId, childId: WidgetId): boolean {
      get(parentId);
      const child = get(childId);
      if (child.parent !== parentId) return false;
      detach(child);
      return true;
    },

    removeFromParent(id: WidgetId): boolean {
      return detach(get(id)) !== null;
    },

    getParent(id: WidgetId): WidgetId | null {
      return get(id).parent;
    },

    getChildren(id: WidgetId): readonly WidgetId[] {
      return Object.freeze(get(id).children.slice());
    },

    hasChildren(id: WidgetId): boolean {
      return get(id).children.length > 0;
    },

    getRoot(id: WidgetId): WidgetId {
      return rootOf(get(id)).id;
    },

    invokeRecursive(id: WidgetId, fn: (id: WidgetId) => void): void {
      visit(get(id), (r) => fn(r.id));
    },

    getFrame(id: WidgetId): Rect {
      return get(id).frame;
    },

    getBounds(id: WidgetId): Rect {
      return boundsOf(get(id).frame);
    },

    setFrame(id: WidgetId, frame: Rect): void {
      setFrame(get(id), frame);
    },

    convertToScreenSpace(id: WidgetId, r: Rect): Rect {
      return get(id).handle.convertToScreenSpace(r);
    },

    convertFromScreenSpace(id: WidgetId, p: Point): Point {
      return get(id).handle.convertFromScreenSpace(p);
    },

    findChildAt(id: WidgetId, p: Point): HitResult | null {
      return hitTest(get(id), p);
    },

    needsDisplay(id: WidgetId): void {
      needsDisplay(get(id));
    },

    isDirty(id: WidgetId): boolean {
      const rec = get(id);
      return rec.selfDirty || rec.childrenDirty;
    },

    isSelfDirty(id: WidgetId): boolean {
      return get(id).selfDirty;
    },

    isChildrenDirty(id: WidgetId): boolean {
      return get(id).childrenDirty;
    },

    draw(id: WidgetId, ctx: DrawContext, everything: boolean): void {
      drawOne(get(id), ctx, everything);
    },

    drawChildren(id: WidgetId, ctx: DrawContext, everything: boolean): void {
      drawChildren(get(id), ctx, everything);
    },

    setDrawInhibited(id: WidgetId, inhibited: boolean): void {
      const rec = get(id);
      if (rec.drawInhibited === inhibited) return;
      rec.drawInhibited = inhibited;
      if (!inhibited) visit(rec, needsDisplay);
    },

    isDrawInhibited(id: WidgetId): boolean {
      return get(id).drawInhibited;
    },

    setAnimationParticipant(id: WidgetId, participant: boolean): void {
      get(id).animationParticipant = participant;
    },

    isAnimationParticipant(id: WidgetId): boolean {
      return get(id).animationParticipant;
    },

    hasTransparentChildren(id: WidgetId): boolean {
      return get(id).hasTransparentChildren;
    },

    isOpaque(id: WidgetId): boolean {
      return opaque(get(id));
    },

    clipsToBounds(id: WidgetId): boolean {
      return clips(get(id));
    },

    wantsTouchTracking(id: WidgetId): boolean {
      const rec = get(id);
      return rec.behavior.wantsTouchTracking?.(rec.handle) === true;
    },

    dispatchTouch(id: WidgetId, event: TouchEvent): boolean {
      const rec = get(id);
      const handler = rec.behavior.handleTouchEvent;
      if (!handler) return false;
      const local = rec.handle.convertFromScreenSpace(event.position);
      return handler.call(rec.behavior, event, rec.handle, local) === true;
    },

    dispatchScroll(id: WidgetId, event: ScrollEvent): boolean {
      const rec = get(id);
      return rec.behavior.handleScrollEvent?.(event, rec.handle) === true;
    },

    dispatchButton(id: WidgetId, event: ButtonEvent): boolean {
      const rec = get(id);
      return rec.behavior.handleButtonEvent?.(event, rec.handle) === true;
    },

    screenRoot(): WidgetId | null {
      return rootId;
    },

    setScreenRoot(id: WidgetId | null): void {
      if (host === null) invalidState("tree has no screen host");
      const next = id === null ? null : get(id);
      if (next !== null && next.parent !== null) {
        invalidArgument(`widget ${String(next.id)} has a parent and cannot be a screen root`);
      }
      if (next !== null && next.id === rootId) return;

      if (rootId !== null) {
        const prev = get(rootId);
        willMoveToScreen(prev, false);
        rootId = null;
        didMoveToScreen(prev, false);
      }
      if (next !== null) {
        willMoveToScreen(next, true);
        rootId = next.id;
        didMoveToScreen(next, true);
        needsDisplay(next);
      }
    },

    isOnScreen(id: WidgetId): boolean {
      return onScreen(get(id));
    },

    isAnimating(id: WidgetId): boolean {
      return get(id).animatorToken !== null;
    },
  });

  return tree;
}
