import type { EngineFacade } from "./adapter.js";
import type { Rule } from "./rule.js";
import type { System } from "./system.js";
import type { Action, Meta, Result, State } from "./types.js";
import type { View } from "./view.js";

/**
 * Base implementation of an Engine that follows the 3-Layer Architecture:
 * 1. Rule Kernel (Logic)
 * 2. System Pipeline (derived state)
 * 3. View Layer (Observation)
 */
export abstract class BaseEngine<
  S extends State = State,
  A extends Action = Action,
  O = unknown,
> implements EngineFacade<S, A, O>
{
  protected abstract rule: Rule<S, A>;
  protected abstract view: View<S, O>;
  protected systems: System<S>[] = [];

  constructor(public readonly initialState: S) {}

  /**
   * Registers a system into the pipeline.
   * Systems are executed in registration order after every applied action.
   */
  addSystem(system: System<S>): void {
    this.systems.push(system);
  }

  /**
   * Main state transition function.
   * - Validates action (isLegal)
   * - Applies action (rule.apply)
   * - Runs systems (pipeline)
   *
   * An illegal action returns `state` itself, unchanged.
   */
  reduce(state: S, action: A, meta: Meta): S {
    const result = this.isLegal(state, action, meta);
    if (!result.ok) {
      return state;
    }

    let nextState = this.rule.apply(state, action, meta);

    for (const system of this.systems) {
      nextState = system.update(nextState, meta);
    }

    return nextState;
  }

  isLegal(state: S, action: A, meta: Meta): Result<void> {
    return this.rule.isLegal(state, action, meta);
  }

  observe(state: S, playerId: string): O {
    return this.view.observe(state, playerId);
  }
}
