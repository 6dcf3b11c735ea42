import type { Meta } from "../engine/types.js";
import type { Catalog } from "../gate/catalog.js";
import { isComplete } from "../gate/evaluate.js";
import {
  PasswordGameEngine,
  type PasswordGameOptions,
} from "../password/engine.js";
import type {
  EndReason,
  PasswordAction,
  PasswordState,
  PlayerView,
} from "../password/types.js";
import type { PuzzleSeed } from "../puzzle/look-and-say.js";

export interface PasswordSessionOptions extends PasswordGameOptions {
  playerId?: string;
  /** Log gate changes and session end to the console. */
  output?: boolean;
}

/**
 * PasswordSession owns the text and the engine state for one game.
 * Every edit goes through the engine, so the gates are re-evaluated
 * before anyone can read the new state.
 */
export class PasswordSession {
  readonly engine: PasswordGameEngine;
  private state: PasswordState;
  private playerId: string;
  private seq = 0;
  private subscribers = new Set<(view: PlayerView) => void>();
  private output: boolean;

  constructor(opts: PasswordSessionOptions = {}) {
    this.engine = new PasswordGameEngine(opts);
    this.state = this.engine.initialState;
    this.playerId = opts.playerId ?? "local";
    this.output = opts.output ?? false;
  }

  get text(): string {
    return this.state.text;
  }

  get seed(): PuzzleSeed {
    return this.state.seed;
  }

  get catalog(): Catalog {
    return this.engine.catalog;
  }

  get isOver(): boolean {
    return this.state.status !== "PLAYING";
  }

  getState(): PasswordState {
    return this.state;
  }

  getView(): PlayerView {
    return this.engine.observe(this.state, this.playerId);
  }

  isComplete(): boolean {
    return isComplete(this.engine.catalog, this.state.gate);
  }

  /**
   * Returns false when the character is rejected (not allowed, or the
   * session is over). Rejected characters leave the state untouched.
   */
  appendCharacter(ch: string): boolean {
    return this.dispatch({ type: "APPEND", char: ch });
  }

  removeLastCharacter(): void {
    if (this.state.text.length === 0) return;
    this.dispatch({ type: "BACKSPACE" });
  }

  /**
   * Enter key. Returns true when the password passes every rule and the
   * session is won.
   */
  submit(): boolean {
    this.dispatch({ type: "SUBMIT" });
    return this.state.status === "WON";
  }

  terminate(reason: EndReason): void {
    this.dispatch({ type: "TERMINATE", reason });
  }

  subscribe(fn: (view: PlayerView) => void): () => void {
    this.subscribers.add(fn);
    fn(this.getView());
    return () => {
      this.subscribers.delete(fn);
    };
  }

  private dispatch(action: PasswordAction): boolean {
    const meta: Meta = {
      from: this.playerId,
      seq: this.seq + 1,
      timestamp: Date.now(),
    };
    const prev = this.state;
    const result = this.engine.isLegal(prev, action, meta);
    if (!result.ok) {
      if (this.output) {
        console.log(`[PasswordSession] rejected ${action.type}: ${result.error}`);
      }
      return false;
    }

    this.seq = meta.seq;
    this.state = this.engine.reduce(prev, action, meta);
    this.logTransition(prev, this.state);
    this.notifySubscribers();
    return true;
  }

  private logTransition(prev: PasswordState, next: PasswordState) {
    if (!this.output) return;
    if (prev.gate.currentGateIndex !== next.gate.currentGateIndex) {
      console.log(
        `[PasswordSession] gate ${prev.gate.currentGateIndex} -> ${next.gate.currentGateIndex} of ${this.engine.catalog.length}`,
      );
    }
    if (prev.status !== next.status) {
      console.log(
        `[PasswordSession] status ${next.status}${next.endReason ? ` (${next.endReason})` : ""} after ${this.seq} actions`,
      );
    }
  }

  private notifySubscribers() {
    for (const fn of this.subscribers) {
      fn(this.getView());
    }
  }
}
