/**
 * packages/core/src/animation/animator.ts — Per-screen frame callback registry.
 *
 * Why: Widgets and controller transitions need a callback once per displayed
 * frame. The host drives `frame()` from its refresh source (vsync, page flip
 * or a timer); nothing here schedules time on its own.
 *
 * Rules:
 *   - Every callback registered when a pass starts runs once in that pass
 *   - Callbacks registered during a pass first run in the next pass
 *   - Callbacks returning false are removed after the pass completes
 *   - Tokens are u32, allocated monotonically; 0 and live tokens are skipped
 *     on wraparound
 *   - No ordering guarantee between independent callbacks
 */

import { PanelError } from "../errors.js";
import type { AnimatorCallback, AnimatorToken } from "./types.js";

const TOKEN_LIMIT = 0x1_0000_0000;

export type Animator = Readonly<{
  /** Register a callback; returns its token. */
  register: (callback: AnimatorCallback) => AnimatorToken;
  /** Remove a callback. Returns whether it was registered. */
  unregister: (token: AnimatorToken) => boolean;
  has: (token: AnimatorToken) => boolean;
  /** Run one animation frame. */
  frame: () => void;
  /** Number of registered callbacks. */
  size: () => number;
  clear: () => void;
}>;

export type AnimatorOptions = Readonly<{
  /** First token handed out. Tests use this to exercise wraparound. */
  firstToken?: number;
}>;

export function createAnimator(opts: AnimatorOptions = {}): Animator {
  const callbacks = new Map<AnimatorToken, AnimatorCallback>();
  let nextToken = normalizeFirstToken(opts.firstToken);
  let inFrame = false;

  function allocateToken(): AnimatorToken {
    if (callbacks.size >= TOKEN_LIMIT - 1) {
      throw new PanelError("PANEL_RESOURCE_ERROR", "animator token space exhausted");
    }
    for (;;) {
      const token = nextToken;
      nextToken = (nextToken + 1) % TOKEN_LIMIT;
      if (token !== 0 && !callbacks.has(token)) return token;
    }
  }

  return Object.freeze({
    register(callback: AnimatorCallback): AnimatorToken {
      const token = allocateToken();
      callbacks.set(token, callback);
      return token;
    },

    unregister(token: AnimatorToken): boolean {
      return callbacks.delete(token);
    },

    has(token: AnimatorToken): boolean {
      return callbacks.has(token);
    },

    frame(): void {
      if (inFrame) {
        throw new PanelError("PANEL_INVALID_STATE", "animator frame() is not reentrant");
      }
      inFrame = true;
      const pass = Array.from(callbacks);
      const finished: Array<readonly [AnimatorToken, AnimatorCallback]> = [];
      try {
        for (const entry of pass) {
          const [token, callback] = entry;
          // Unregistered by an earlier callback in this pass.
          if (callbacks.get(token) !== callback) continue;
          if (!callback()) finished.push(entry);
        }
      } finally {
        inFrame = false;
        for (const [token, callback] of finished) {
          if (callbacks.get(token) === callback) callbacks.delete(token);
        }
      }
    },

    size(): number {
      return callbacks.size;
    },

    clear(): void {
      callbacks.clear();
    },
  });
}

function normalizeFirstToken(first: number | undefined): number {
  if (first === undefined) return 1;
  if (!Number.isInteger(first) || first < 0 || first >= TOKEN_LIMIT) {
    throw new PanelError("PANEL_INVALID_ARGUMENT", "firstToken must be a u32");
  }
  return first;
}
