/**
 * Seeded random source (Mulberry32). Every random draw in a run comes from
 * one of these, so a seed fixes the whole run.
 */

export interface RNG {
  /** Uniform in [0, 1) */
  next(): number;
  /** Normal draw via Box-Muller; consumes two uniforms */
  nextGaussian(mean?: number, stdDev?: number): number;
  /** Child generator seeded from this one's next draw */
  fork(): RNG;
}

const UINT32_RANGE = 2 ** 32;
const FORK_SEED_RANGE = 2 ** 31;

export function createRNG(seed: number): RNG {
  let state = seed >>> 0;

  function next(): number {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
  }

  function nextGaussian(mean = 0, stdDev = 1): number {
    if (stdDev < 0) {
      throw new RangeError(`Standard deviation must be non-negative, got ${stdDev}`);
    }
    const radius = Math.sqrt(-2 * Math.log(1 - next()));
    const angle = 2 * Math.PI * next();
    return mean + stdDev * radius * Math.cos(angle);
  }

  return {
    next,
    nextGaussian,
    fork: () => createRNG(Math.floor(next() * FORK_SEED_RANGE)),
  };
}

/**
 * Fold a word into a 32-bit seed (FNV-1a), for seeds given as text.
 */
export function hashSeed(text: string): number {
  let hash = 0x811c9dc5;
  for (const char of text) {
    hash ^= char.codePointAt(0) ?? 0;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
