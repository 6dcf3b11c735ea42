// Engine: Rule / System / View kernel

export type { EngineAdapter, EngineFacade } from "./engine/adapter.js";
export { BaseEngine } from "./engine/base-engine.js";
export type { Rule } from "./engine/rule.js";
export type { System } from "./engine/system.js";
export {
  type Action,
  err,
  type Meta,
  ok,
  type Result,
  type State,
} from "./engine/types.js";
export type { View } from "./engine/view.js";

// Gate: rule catalog and gating evaluation

export {
  type Catalog,
  checkRule,
  DEFAULT_CATALOG,
  digitSum,
  FIBONACCI_NUMBERS,
  MONTHS,
  type PasswordRule,
  renderRuleMessage,
  ROMAN_NUMERALS,
  type RuleId,
  STATIC_PREDICATES,
  type StaticRuleId,
} from "./gate/catalog.js";
export {
  evaluate,
  type GateState,
  initialGateState,
  isComplete,
} from "./gate/evaluate.js";

// Puzzle: look-and-say seed, primality, random source

export {
  createPuzzleSeed,
  DEFAULT_MAX_ITERATIONS,
  DEFAULT_MIN_ITERATIONS,
  lookAndSay,
  lookAndSayTerm,
  type PuzzleSeed,
  type PuzzleSeedOptions,
} from "./puzzle/look-and-say.js";
export { isPrime } from "./puzzle/primality.js";
export { createRNG, randomInt, type RNG } from "./puzzle/rng.js";

// Password game

export {
  ALLOWED_PUNCTUATION,
  dropLastCharacter,
  isAllowedCharacter,
} from "./password/characters.js";
export {
  PasswordGameEngine,
  type PasswordGameOptions,
} from "./password/engine.js";
export { GateSystem } from "./password/gate-system.js";
export { PasswordEditRule } from "./password/rule.js";
export {
  type EndReason,
  FEEDBACK_ACCEPTED,
  FEEDBACK_REJECTED,
  type PasswordAction,
  type PasswordState,
  type PlayerView,
  type RuleView,
  type SessionStatus,
} from "./password/types.js";
export { PasswordView } from "./password/view.js";

// Session and input

export {
  type KeyInputOptions,
  KeyInputController,
  type KeyOutcome,
  type KeyPress,
} from "./input/key-input.js";
export {
  PasswordSession,
  type PasswordSessionOptions,
} from "./session/password-session.js";

// Safety: content filter

export * from "./safety/index.js";
