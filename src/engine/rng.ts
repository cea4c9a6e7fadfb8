export type RandomSource = () => number;

// mulberry32: small, fast and good enough for board generation
export function createRng(seed: number): RandomSource {
  let s = seed >>> 0;
  return () => {
    s = (s + 0x6d2b79f5) >>> 0;
    let t = s;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [0, n). */
export function randomIndex(rng: RandomSource, n: number): number {
  const i = Math.floor(rng() * n);
  // guard sources that can return exactly 1
  return i >= n ? n - 1 : i;
}
