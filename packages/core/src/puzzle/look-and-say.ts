import { randomInt, type RNG } from "./rng.js";

export const DEFAULT_MIN_ITERATIONS = 3;
export const DEFAULT_MAX_ITERATIONS = 6;

/**
 * One step of the look-and-say transform: each maximal run of identical
 * characters becomes its length followed by the character.
 *
 * "1" -> "11" -> "21" -> "1211" -> "111221"
 */
export function lookAndSay(sequence: string): string {
  let result = "";
  let i = 0;
  while (i < sequence.length) {
    const ch = sequence[i];
    let run = 1;
    while (i + run < sequence.length && sequence[i + run] === ch) {
      run++;
    }
    result += `${run}${ch}`;
    i += run;
  }
  return result;
}

/**
 * The session-specific values behind the look-and-say rule.
 * The player is shown `lastSequence` and must type `nextSequence`.
 */
export interface PuzzleSeed {
  iterations: number;
  lastSequence: string;
  nextSequence: string;
}

export interface PuzzleSeedOptions {
  /** Random source used to pick the iteration count. Defaults to Math.random. */
  rng?: RNG;
  /** Fixes the iteration count within the range; `rng` is not consulted. */
  iterations?: number;
  minIterations?: number;
  maxIterations?: number;
}

/**
 * Applies `lookAndSay` `iterations` times starting from "1".
 */
export function lookAndSayTerm(iterations: number): string {
  if (!Number.isInteger(iterations) || iterations < 0) {
    throw new RangeError(
      `Iteration count must be a non-negative integer, got ${iterations}`,
    );
  }
  let term = "1";
  for (let i = 0; i < iterations; i++) {
    term = lookAndSay(term);
  }
  return term;
}

/**
 * An explicit `iterations` must lie in `minIterations..maxIterations`,
 * the same range a drawn count comes from.
 */
export function createPuzzleSeed(opts: PuzzleSeedOptions = {}): PuzzleSeed {
  const min = opts.minIterations ?? DEFAULT_MIN_ITERATIONS;
  const max = opts.maxIterations ?? DEFAULT_MAX_ITERATIONS;
  const iterations = opts.iterations ?? randomInt(opts.rng ?? Math.random, min, max);
  if (!Number.isInteger(iterations) || iterations < min || iterations > max) {
    throw new RangeError(
      `Iteration count must be an integer in [${min}, ${max}], got ${iterations}`,
    );
  }
  const lastSequence = lookAndSayTerm(iterations);
  return {
    iterations,
    lastSequence,
    nextSequence: lookAndSay(lastSequence),
  };
}
