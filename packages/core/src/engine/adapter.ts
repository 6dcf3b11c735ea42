import type { Meta, Result, State } from "./types.js";

/**
 * Minimal interface a session needs to drive ANY engine.
 */
export interface EngineAdapter<S = State, A = unknown> {
  initialState: S;
  reduce: (state: S, action: A, meta: Meta) => S;
}

/**
 * Full-featured engine with validation and observation.
 * This is what `BaseEngine` implements.
 */
export interface EngineFacade<S = State, A = unknown, O = unknown>
  extends EngineAdapter<S, A> {
  /**
   * Check if an action is valid without applying it.
   */
  isLegal: (state: S, action: A, meta: Meta) => Result<void>;

  /**
   * Produce the observable view of the state for a player.
   */
  observe: (state: S, playerId: string) => O;
}
