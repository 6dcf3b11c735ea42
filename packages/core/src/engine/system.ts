import type { Meta, State } from "./types.js";

/**
 * A System derives part of the state automatically after every applied
 * action, rather than in response to one specific action.
 * Examples: re-evaluating gates, recomputing scores.
 */
export interface System<S = State> {
  /**
   * Returns the updated state. Must not mutate its input.
   */
  update(state: S, meta: Meta): S;
}
