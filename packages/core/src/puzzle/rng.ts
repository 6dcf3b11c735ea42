/**
 * A source of uniform numbers in [0, 1). `Math.random` is one.
 */
export type RNG = () => number;

// FNV-1a, so string seeds such as "session-42" map to a 32-bit state.
function hashSeed(seed: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Deterministic generator (mulberry32). The same seed always yields the
 * same sequence.
 */
export function createRNG(seed: string | number): RNG {
  let t = typeof seed === "number" ? seed >>> 0 : hashSeed(seed);
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [min, max], both inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  if (!Number.isInteger(min) || !Number.isInteger(max) || min > max) {
    throw new RangeError(`Invalid range [${min}, ${max}]`);
  }
  const r = Math.min(Math.max(rng(), 0), 0.9999999999999999);
  return min + Math.floor(r * (max - min + 1));
}
