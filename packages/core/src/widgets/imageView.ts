/**
 * packages/core/src/widgets/imageView.ts — Static image widget.
 *
 * Why: Hosts decode images themselves (see ImageProvider); this widget only
 * places a Surface inside its bounds. Placement is cached and recomputed when
 * the frame, image, mode or border width changes.
 */

import {
  type Color,
  type Rect,
  type Size,
  boundsOf,
  color,
  insetRect,
  isEmptyRect,
  rect,
  size,
} from "../geometry.js";
import type { DrawContext, Surface } from "../renderer/types.js";
import type { WidgetTree } from "./tree.js";
import type { WidgetBehavior, WidgetHandle, WidgetId } from "./types.js";

/**
 * How the image is fitted into the view.
 *   - none: drawn at its own size
 *   - scaleDown: proportional, shrunk to fit but never enlarged
 *   - scaleUpDown: proportional, shrunk or enlarged to fit
 *   - scaleIndependently: each axis stretched to the available area
 */
export type ImageViewMode = "none" | "scaleDown" | "scaleUpDown" | "scaleIndependently";

export type ImageViewOptions = Readonly<{
  image?: Surface | null;
  mode?: ImageViewMode;
  backgroundColor?: Color;
  borderColor?: Color;
  borderWidth?: number;
}>;

export type ImageView = Readonly<{
  id: WidgetId;
  image: () => Surface | null;
  setImage: (image: Surface | null) => void;
  mode: () => ImageViewMode;
  setMode: (mode: ImageViewMode) => void;
  backgroundColor: () => Color;
  setBackgroundColor: (c: Color) => void;
  borderColor: () => Color;
  setBorderColor: (c: Color) => void;
  borderWidth: () => number;
  setBorderWidth: (width: number) => void;
}>;

/** Where and how large the image is drawn, in the view's own coordinates. */
export type ImagePlacement = Readonly<{
  rect: Rect;
  scaleX: number;
  scaleY: number;
}>;

/**
 * Compute the image rect inside `area` for a mode. The result is centered in
 * `area` whenever the drawn image is smaller than it.
 */
export function placeImage(image: Size, area: Rect, mode: ImageViewMode): ImagePlacement {
  let drawn: Size;
  switch (mode) {
    case "none":
      drawn = image;
      break;
    case "scaleIndependently":
      drawn = area.size;
      break;
    case "scaleDown":
    case "scaleUpDown": {
      const fit = Math.min(area.size.width / image.width, area.size.height / image.height);
      const ratio = mode === "scaleDown" ? Math.min(1, fit) : fit;
      drawn = size(Math.floor(image.width * ratio), Math.floor(image.height * ratio));
      break;
    }
  }

  const x = area.origin.x + Math.floor((area.size.width - drawn.width) / 2);
  const y = area.origin.y + Math.floor((area.size.height - drawn.height) / 2);
  return Object.freeze({
    rect: rect(x, y, drawn.width, drawn.height),
    scaleX: drawn.width / image.width,
    scaleY: drawn.height / image.height,
  });
}

export function createImageView(
  tree: WidgetTree,
  frame: Rect,
  opts: ImageViewOptions = {},
): ImageView {
  let image = opts.image ?? null;
  let mode: ImageViewMode = opts.mode ?? "scaleDown";
  let background = opts.backgroundColor ?? color(0, 0, 0, 0);
  let border = opts.borderColor ?? color(0, 0, 0);
  let borderWidth = Math.max(0, opts.borderWidth ?? 0);
  let placement: ImagePlacement | null = null;

  function invalidate(): void {
    placement = null;
    tree.needsDisplay(id);
  }

  function currentPlacement(img: Surface, bounds: Rect): ImagePlacement {
    if (placement === null) {
      const area = insetRect(bounds, Math.floor(borderWidth));
      placement = placeImage(size(img.width, img.height), area, mode);
    }
    return placement;
  }

  const behavior: WidgetBehavior = {
    kind: "imageView",
    isOpaque: () => background.a >= 1,
    draw(ctx: DrawContext, w: WidgetHandle): void {
      const bounds = boundsOf(w.frame());
      ctx.fillRect(bounds, background);

      if (image !== null && image.width > 0 && image.height > 0) {
        const p = currentPlacement(image, bounds);
        if (!isEmptyRect(p.rect)) {
          ctx.save();
          ctx.clipRect(p.rect);
          ctx.drawSurface(image, p.rect.origin, { scaleX: p.scaleX, scaleY: p.scaleY });
          ctx.restore();
        }
      }

      if (borderWidth > 0) ctx.strokeRect(bounds, border, borderWidth);
    },
    frameDidChange(): void {
      placement = null;
    },
  };

  const id = tree.create(frame, behavior);

  return Object.freeze({
    id,
    image: () => image,
    setImage(next: Surface | null): void {
      image = next;
      invalidate();
    },
    mode: () => mode,
    setMode(next: ImageViewMode): void {
      mode = next;
      invalidate();
    },
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
    borderWidth: () => borderWidth,
    setBorderWidth(width: number): void {
      borderWidth = Math.max(0, width);
      invalidate();
    },
  });
}
