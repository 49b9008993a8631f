/**
 * @panelkit/core
 *
 * Retained-mode UI runtime for framebuffer displays: widget tree, input
 * routing, per-frame animation and modal view-controller presentation.
 * Platform I/O (display flipping, input devices, image decoding) stays with
 * the host.
 */

// =============================================================================
// Errors and diagnostics
// =============================================================================

export { PanelError, type PanelErrorCode } from "./errors.js";
export { defaultWarn, formatWarning, type WarnArea, type WarnFn } from "./warnings.js";

// =============================================================================
// Geometry
// =============================================================================

export {
  ZERO_POINT,
  ZERO_RECT,
  boundsOf,
  color,
  insetRect,
  intersectRect,
  isEmptyRect,
  offsetRect,
  point,
  rect,
  rectContains,
  rectsEqual,
  size,
  type Color,
  type Point,
  type Rect,
  type Size,
} from "./geometry.js";

// =============================================================================
// Events
// =============================================================================

export {
  buttonEvent,
  describeEvent,
  scrollEvent,
  touchEvent,
  type ButtonEvent,
  type ButtonKind,
  type InputEvent,
  type ScrollEvent,
  type TouchEvent,
} from "./events.js";

// =============================================================================
// Animation
// =============================================================================

export { createAnimator, type Animator, type AnimatorOptions } from "./animation/animator.js";
export {
  easeInOutCirc,
  easeInOutCubic,
  easeInOutElastic,
  easeInOutQuad,
  easeInOutQuart,
  resolveEasing,
} from "./animation/easing.js";
export { clamp01, progressFraction } from "./animation/interpolate.js";
export type {
  AnimatorCallback,
  AnimatorToken,
  EasingFunction,
  EasingInput,
  EasingName,
} from "./animation/types.js";

// =============================================================================
// Drawing
// =============================================================================

export type {
  DrawContext,
  DrawSurfaceOptions,
  ImageProvider,
  Surface,
} from "./renderer/types.js";
export { createSurface, readSurfacePixel, writeSurfacePixel } from "./renderer/surface.js";
export {
  MAX_FRAMEBUFFER_DIMENSION,
  PIXEL_FORMATS,
  bytesPerPixel,
  hasAlpha,
  isPixelFormat,
  optimalStride,
  packPixel,
  unpackPixel,
  type PixelFormat,
  type Premultiplied,
} from "./renderer/pixelFormat.js";
export {
  createBufferContext,
  isRotation,
  logicalSizeFor,
  type BufferContext,
  type BufferContextOptions,
  type PixelBuffer,
  type Rotation,
} from "./renderer/bufferContext.js";

// =============================================================================
// Widgets
// =============================================================================

export { createWidgetTree, type WidgetTree, type WidgetTreeOptions } from "./widgets/tree.js";
export type {
  HitResult,
  WidgetBehavior,
  WidgetHandle,
  WidgetId,
  WidgetTreeHost,
} from "./widgets/types.js";
export {
  DEFAULT_CONTAINER_BACKGROUND,
  DEFAULT_CONTAINER_BORDER,
  createContainer,
  type Container,
  type ContainerOptions,
} from "./widgets/container.js";
export {
  createImageView,
  placeImage,
  type ImagePlacement,
  type ImageView,
  type ImageViewMode,
  type ImageViewOptions,
} from "./widgets/imageView.js";

// =============================================================================
// Screen
// =============================================================================

export { Screen, createScreen } from "./screen/screen.js";
export {
  DEFAULT_BACKGROUND_COLOR,
  DEFAULT_TRANSITION_DURATION_MS,
  resolveScreenConfig,
  type ResolvedScreenConfig,
  type ScreenConfig,
} from "./screen/config.js";
export {
  createEventRouter,
  type EventRouter,
  type EventRouterOptions,
} from "./screen/eventRouter.js";

// =============================================================================
// View controllers
// =============================================================================

export { ViewController } from "./viewController/viewController.js";
export type {
  PresentationAnimation,
  PresentationHost,
  PresentationState,
} from "./viewController/types.js";
