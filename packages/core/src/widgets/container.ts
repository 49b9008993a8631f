/**
 * packages/core/src/widgets/container.ts — Plain background widget that holds other widgets.
 */

import { type Color, type Rect, boundsOf, color } from "../geometry.js";
import type { DrawContext } from "../renderer/types.js";
import type { WidgetTree } from "./tree.js";
import type { WidgetBehavior, WidgetHandle, WidgetId } from "./types.js";

const BORDER_WIDTH = 1;

export type ContainerOptions = Readonly<{
  backgroundColor?: Color;
  borderColor?: Color;
  drawsBorder?: boolean;
}>;

export type Container = Readonly<{
  id: WidgetId;
  backgroundColor: () => Color;
  setBackgroundColor: (c: Color) => void;
  borderColor: () => Color;
  setBorderColor: (c: Color) => void;
  drawsBorder: () => boolean;
  setDrawsBorder: (draws: boolean) => void;
}>;

export const DEFAULT_CONTAINER_BACKGROUND: Color = color(0, 0, 0);
export const DEFAULT_CONTAINER_BORDER: Color = color(0, 1, 0);

export function createContainer(
  tree: WidgetTree,
  frame: Rect,
  opts: ContainerOptions = {},
): Container {
  let background = opts.backgroundColor ?? DEFAULT_CONTAINER_BACKGROUND;
  let border = opts.borderColor ?? DEFAULT_CONTAINER_BORDER;
  let drawBorder = opts.drawsBorder ?? true;

  const behavior: WidgetBehavior = {
    kind: "container",
    isOpaque: () => background.a >= 1,
    draw(ctx: DrawContext, w: WidgetHandle): void {
      ctx.paint(background);
      if (drawBorder) ctx.strokeRect(boundsOf(w.frame()), border, BORDER_WIDTH);
    },
  };

  const id = tree.create(frame, behavior);

  return Object.freeze({
    id,
    backgroundColor: () => background,
    setBackgroundColor(c: Color): void {
      background = c;
      tree.needsDisplay(id);
    },
    borderColor: () => border,
    setBorderColor(c: Color): void {
      border = c;
      tree.needsDisplay(id);
    },
    drawsBorder: () => drawBorder,
    setDrawsBorder(draws: boolean): void {
      drawBorder = draws;
      tree.needsDisplay(id);
    },
  });
}
