/**
 * packages/core/src/animation/interpolate.ts — Primitive interpolation helpers.
 */

/** Clamp a number into [0, 1]. */
export function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  if (value <= 0) return 0;
  if (value >= 1) return 1;
  return value;
}

/**
 * Progress of a timed animation.
 *
 * A zero duration completes immediately. Clock regressions read as no progress.
 */
export function progressFraction(startMs: number, nowMs: number, durationMs: number): number {
  if (durationMs <= 0) return 1;
  const elapsed = nowMs - startMs;
  if (elapsed <= 0) return 0;
  return clamp01(elapsed / durationMs);
}
