/** Source of uniformly distributed floats in `[0, 1)`. */
export interface RandomSource {
  next(): number;
}

/** `Math.random` as a {@link RandomSource}. */
export const mathRandom: RandomSource = {
  next: () => Math.random(),
};

/**
 * Deterministic generator (mulberry32) for reproducible conversations.
 * Two sources built from the same seed yield the same sequence.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Uniform index into a list of `length` items. A source value of exactly 1
 * maps to the last index; anything outside `[0, 1]` is a `RangeError`.
 */
export function pickIndex(random: RandomSource, length: number): number {
  if (!Number.isInteger(length) || length <= 0) {
    throw new RangeError(`Cannot pick from ${length} items`);
  }
  const value = random.next();
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new RangeError(`Random source returned ${value}, expected a number in [0, 1)`);
  }
  return Math.min(Math.floor(value * length), length - 1);
}
