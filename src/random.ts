// ─── Random Sources ─────────────────────────────────────────────────────────
//
// Phrasing choices go through an explicit RandomSource so callers (and
// tests) decide where randomness comes from. Nothing here is global.
// ─────────────────────────────────────────────────────────────────────────────

/** Yields floats in [0, 1). */
export interface RandomSource {
  next(): number;
}

/** Mulberry32: tiny, fast, and deterministic for a given 32-bit seed. */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed | 0;
  return {
    next() {
      let t = (state = (state + 0x6d2b79f5) | 0);
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Backed by Math.random. */
export function createDefaultRandom(): RandomSource {
  return { next: () => Math.random() };
}

/** Pick one element. Throws on an empty list. */
export function choose<T>(rng: RandomSource, options: readonly T[]): T {
  if (options.length === 0) {
    throw new Error("Cannot choose from an empty list");
  }
  const index = Math.min(options.length - 1, Math.floor(rng.next() * options.length));
  return options[index];
}
