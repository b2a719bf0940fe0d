/**
 * Seedable randomness for cold-start and fallback picks.
 */

/**
 * Returns a float in [0, 1)
 */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

// String seed -> 32-bit state
function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i++) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^= h >>> 16) >>> 0;
}

/**
 * Deterministic generator (mulberry32). Same seed, same sequence.
 */
export function createSeededRng(seed: string | number): Rng {
  let state = typeof seed === 'number' ? seed >>> 0 : hashSeed(seed);
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform pick. Throws on an empty list.
 */
export function pickOne<T>(items: readonly T[], rng: Rng): T {
  if (items.length === 0) {
    throw new RangeError('Cannot pick from an empty list');
  }
  // Guard against an rng returning exactly 1
  const index = Math.min(Math.floor(rng() * items.length), items.length - 1);
  return items[index];
}
