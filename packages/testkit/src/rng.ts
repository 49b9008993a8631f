/**
 * packages/testkit/src/rng.ts — Seeded pseudo-random source for property tests.
 *
 * Why: Randomized tree/event tests must replay exactly from a printed seed.
 */

export type Rng = Readonly<{
  /** Next unsigned 32-bit value. */
  u32: () => number;
  /** Next float in [0, 1). */
  next: () => number;
  /** Integer in [min, max] (inclusive). */
  int: (min: number, max: number) => number;
  /** Seed the generator was created with. */
  seed: number;
}>;

/** Mulberry32 generator. */
export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  function u32(): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  return Object.freeze({
    u32,
    next: (): number => u32() / 4294967296,
    int: (min: number, max: number): number => min + (u32() % (max - min + 1)),
    seed: seed >>> 0,
  });
}
