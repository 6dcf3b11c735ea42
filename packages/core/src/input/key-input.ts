import { isAllowedCharacter } from "../password/characters.js";
import type { ContentFilter } from "../safety/types.js";
import type { PasswordSession } from "../session/password-session.js";

/**
 * One key press as terminal libraries report it: the typed text plus
 * flags for the special keys this game reacts to.
 */
export interface KeyPress {
  input: string;
  return?: boolean;
  backspace?: boolean;
  delete?: boolean;
  escape?: boolean;
  ctrl?: boolean;
}

export type KeyOutcome = "edited" | "submitted" | "won" | "ended" | "ignored";

export interface KeyInputOptions {
  /** Consulted with the prospective text before each character is committed. */
  isDisallowed?: ContentFilter;
}

/**
 * Turns key presses into session edits. A flagged edit ends the session
 * instead of being committed.
 */
export class KeyInputController {
  private isDisallowed: ContentFilter;

  constructor(
    private readonly session: PasswordSession,
    opts: KeyInputOptions = {},
  ) {
    this.isDisallowed = opts.isDisallowed ?? (() => false);
  }

  handle(key: KeyPress): KeyOutcome {
    if (this.session.isOver) return "ignored";

    if (key.escape || (key.ctrl && key.input === "c")) {
      this.session.terminate("quit");
      return "ended";
    }
    if (key.return) {
      return this.session.submit() ? "won" : "submitted";
    }
    if (key.backspace || key.delete) {
      if (this.session.text.length === 0) return "ignored";
      this.session.removeLastCharacter();
      return "edited";
    }
    if (key.ctrl) return "ignored";

    // Pasted text arrives as one press with several characters.
    let edited = false;
    for (const ch of key.input) {
      if (!isAllowedCharacter(ch)) continue;
      if (this.isDisallowed(this.session.text + ch)) {
        this.session.terminate("profanity");
        return "ended";
      }
      edited = this.session.appendCharacter(ch) || edited;
    }
    return edited ? "edited" : "ignored";
  }
}
