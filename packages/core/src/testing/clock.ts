/**
 * packages/core/src/testing/clock.ts — Manually advanced clock.
 *
 * Pass `clock.now` as `ScreenConfig.now` to step transitions deterministically.
 */

export type ManualClock = Readonly<{
  now: () => number;
  advance: (ms: number) => void;
  set: (ms: number) => void;
}>;

export function createManualClock(startMs = 0): ManualClock {
  let current = startMs;
  return Object.freeze({
    now: (): number => current,
    advance(ms: number): void {
      current += ms;
    },
    set(ms: number): void {
      current = ms;
    },
  });
}
