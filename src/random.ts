/** Source of uniform floats in [0, 1). Tests pass a seeded one. */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/** Fisher–Yates shuffle into a new array; the input is left untouched. */
export function shuffle<T>(items: readonly T[], random: RandomSource = defaultRandom): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}

/** Uniformly random permutation of 0..n-1. */
export function randomPermutation(n: number, random: RandomSource = defaultRandom): number[] {
  return shuffle(Array.from({ length: n }, (_, i) => i), random);
}

/** Deterministic mulberry32 generator for reproducible runs. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
