// Seeded 32-bit PRNG (mulberry32) so benchmark inputs can be reproduced from a seed.

export type RandomSource = () => number; // 0 .. 2^32-1

export function createRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  };
}

// integer in [0, n)
export function randomBelow(rand: RandomSource, n: number): number {
  return rand() % n;
}
