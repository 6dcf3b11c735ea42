import type { System } from "../engine/system.js";
import type { Meta } from "../engine/types.js";
import type { Catalog } from "../gate/catalog.js";
import { evaluate } from "../gate/evaluate.js";
import type { PasswordState } from "./types.js";

/**
 * Re-evaluates every gate against the current text after each applied
 * action. No result from a previous edit is reused.
 */
export class GateSystem implements System<PasswordState> {
  constructor(private readonly catalog: Catalog) {}

  update(state: PasswordState, _meta: Meta): PasswordState {
    return { ...state, gate: evaluate(this.catalog, state.seed, state.text) };
  }
}
