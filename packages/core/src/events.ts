/**
 * packages/core/src/events.ts — Input event types.
 *
 * Why: Input producers (touch controllers, rotary encoders, hardware keys)
 * enqueue these plain values on a screen; the screen routes them to widgets.
 */

import type { Point } from "./geometry.js";

/**
 * Touch sample. Emitted while a touch is down, when it moves while down, and
 * once more (`isDown: false`) when it is released.
 */
export type TouchEvent = Readonly<{
  kind: "touch";
  /** Center of the touch in screen coordinates. */
  position: Point;
  isDown: boolean;
}>;

/**
 * Scroll steps since the previous event, e.g. from an encoder. Negative values
 * scroll up/left, positive values down/right.
 */
export type ScrollEvent = Readonly<{
  kind: "scroll";
  delta: number;
}>;

/** Hardware buttons the runtime understands. */
export type ButtonKind = "select" | "menu";

export type ButtonEvent = Readonly<{
  kind: "button";
  button: ButtonKind;
  isDown: boolean;
}>;

export type InputEvent = TouchEvent | ScrollEvent | ButtonEvent;

export function touchEvent(position: Point, isDown: boolean): TouchEvent {
  return Object.freeze({ kind: "touch", position, isDown });
}

export function scrollEvent(delta: number): ScrollEvent {
  return Object.freeze({ kind: "scroll", delta });
}

export function buttonEvent(button: ButtonKind, isDown: boolean): ButtonEvent {
  return Object.freeze({ kind: "button", button, isDown });
}

export function describeEvent(event: InputEvent): string {
  switch (event.kind) {
    case "touch": {
      const { x, y } = event.position;
      return `touch(${String(x)},${String(y)} ${event.isDown ? "down" : "up"})`;
    }
    case "scroll":
      return `scroll(${String(event.delta)})`;
    case "button":
      return `button(${event.button} ${event.isDown ? "down" : "up"})`;
  }
}
