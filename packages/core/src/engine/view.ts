import type { State } from "./types.js";

/**
 * View Layer responsibility:
 * Transform the authoritative State into what a renderer draws.
 * Derived, read-only, and safe to call at any cadence.
 */
export interface View<S = State, O = unknown> {
  observe(state: S, playerId: string): O;
}
