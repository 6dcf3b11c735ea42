import type { Meta, Result, State } from "./types.js";

/**
 * A Rule Kernel encapsulates the pure game logic:
 * - Validity checks (isLegal)
 * - State transitions (apply)
 */
export interface Rule<S = State, A = unknown> {
  /**
   * Check if an action is legal in the current state.
   * Returns ok(undefined) if legal, or err(reason) if not.
   * MUST be deterministic.
   */
  isLegal(state: S, action: A, meta: Meta): Result<void>;

  /**
   * Apply an action to the state and return the new state.
   * MUST be deterministic and must not mutate `state`.
   * Only called after `isLegal` has passed.
   */
  apply(state: S, action: A, meta: Meta): S;
}
