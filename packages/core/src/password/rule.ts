import type { Rule } from "../engine/rule.js";
import { err, type Meta, ok, type Result } from "../engine/types.js";
import type { Catalog } from "../gate/catalog.js";
import { isComplete } from "../gate/evaluate.js";
import { dropLastCharacter, isAllowedCharacter } from "./characters.js";
import {
  FEEDBACK_ACCEPTED,
  FEEDBACK_REJECTED,
  type PasswordAction,
  type PasswordState,
} from "./types.js";

/**
 * Edits the password text. Gate state is not touched here; `GateSystem`
 * recomputes it after every applied action.
 */
export class PasswordEditRule implements Rule<PasswordState, PasswordAction> {
  constructor(private readonly catalog: Catalog) {}

  isLegal(
    state: PasswordState,
    action: PasswordAction,
    _meta: Meta,
  ): Result<void> {
    if (state.status !== "PLAYING") return err("Session is over");

    switch (action.type) {
      case "APPEND":
        if (!isAllowedCharacter(action.char)) {
          return err(`Character not allowed: ${JSON.stringify(action.char)}`);
        }
        return ok(undefined);
      case "BACKSPACE":
      case "SUBMIT":
      case "TERMINATE":
        return ok(undefined);
    }
  }

  apply(
    state: PasswordState,
    action: PasswordAction,
    _meta: Meta,
  ): PasswordState {
    switch (action.type) {
      case "APPEND":
        return { ...state, text: state.text + action.char, feedback: null };
      case "BACKSPACE":
        return { ...state, text: dropLastCharacter(state.text), feedback: null };
      case "SUBMIT":
        if (isComplete(this.catalog, state.gate)) {
          return { ...state, status: "WON", feedback: FEEDBACK_ACCEPTED };
        }
        return { ...state, feedback: FEEDBACK_REJECTED };
      case "TERMINATE":
        return { ...state, status: "ENDED", endReason: action.reason };
    }
  }
}
