import { BaseEngine } from "../engine/base-engine.js";
import { type Catalog, DEFAULT_CATALOG } from "../gate/catalog.js";
import { evaluate } from "../gate/evaluate.js";
import {
  createPuzzleSeed,
  type PuzzleSeed,
  type PuzzleSeedOptions,
} from "../puzzle/look-and-say.js";
import { GateSystem } from "./gate-system.js";
import { PasswordEditRule } from "./rule.js";
import type { PasswordAction, PasswordState, PlayerView } from "./types.js";
import { PasswordView } from "./view.js";

export interface PasswordGameOptions extends PuzzleSeedOptions {
  catalog?: Catalog;
  /** Use this seed as is instead of generating one. */
  seed?: PuzzleSeed;
}

export class PasswordGameEngine extends BaseEngine<
  PasswordState,
  PasswordAction,
  PlayerView
> {
  readonly catalog: Catalog;
  protected rule: PasswordEditRule;
  protected view: PasswordView;

  constructor(opts: PasswordGameOptions = {}) {
    const catalog = opts.catalog ?? DEFAULT_CATALOG;
    const seed = opts.seed ?? createPuzzleSeed(opts);
    super({
      text: "",
      seed,
      gate: evaluate(catalog, seed, ""),
      status: "PLAYING",
      endReason: null,
      feedback: null,
    });
    this.catalog = catalog;
    this.rule = new PasswordEditRule(catalog);
    this.view = new PasswordView(catalog);
    this.addSystem(new GateSystem(catalog));
  }
}
