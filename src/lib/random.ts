/** A source of uniform floats in [0, 1), shaped like `Math.random`. */
export type RandomSource = () => number;

export function randomIntInclusive(random: RandomSource, min: number, max: number) {
  return min + Math.floor(random() * (max - min + 1));
}

/**
 * Mulberry32. Same seed, same stream; backs `VITE_RANDOM_SEED` and tests.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
