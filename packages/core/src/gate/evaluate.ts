import type { PuzzleSeed } from "../puzzle/look-and-say.js";
import { type Catalog, checkRule } from "./catalog.js";

export interface GateState {
  /** Index of the first failing rule, or catalog length when none fail. */
  currentGateIndex: number;
  /** Always exactly 0..currentGateIndex-1. */
  satisfiedIndices: number[];
  allSatisfied: boolean;
}

export function initialGateState(): GateState {
  return { currentGateIndex: 0, satisfiedIndices: [], allSatisfied: false };
}

/**
 * Walks the catalog in order and stops at the first rule the text fails.
 * A later rule never counts while an earlier one fails, so the satisfied
 * set is always a prefix. Recomputed from scratch on every call.
 */
export function evaluate(
  catalog: Catalog,
  seed: PuzzleSeed,
  text: string,
): GateState {
  const satisfiedIndices: number[] = [];
  let currentGateIndex = catalog.length;

  for (let index = 0; index < catalog.length; index++) {
    if (!checkRule(catalog[index], text, seed)) {
      currentGateIndex = index;
      break;
    }
    satisfiedIndices.push(index);
  }

  return {
    currentGateIndex,
    satisfiedIndices,
    allSatisfied: currentGateIndex === catalog.length,
  };
}

export function isComplete(catalog: Catalog, state: GateState): boolean {
  return state.currentGateIndex >= catalog.length;
}
