import type { Action, State } from "../engine/types.js";
import type { RuleId } from "../gate/catalog.js";
import type { GateState } from "../gate/evaluate.js";
import type { PuzzleSeed } from "../puzzle/look-and-say.js";

export type SessionStatus = "PLAYING" | "WON" | "ENDED";

export type EndReason = "profanity" | "quit";

export interface PasswordState extends State {
  text: string;
  seed: PuzzleSeed;
  gate: GateState;
  status: SessionStatus;
  endReason: EndReason | null;
  /** Result of the last submit. Cleared by every edit. */
  feedback: string | null;
}

interface AppendAction extends Action {
  type: "APPEND";
  char: string;
}

interface BackspaceAction extends Action {
  type: "BACKSPACE";
}

interface SubmitAction extends Action {
  type: "SUBMIT";
}

interface TerminateAction extends Action {
  type: "TERMINATE";
  reason: EndReason;
}

export type PasswordAction =
  | AppendAction
  | BackspaceAction
  | SubmitAction
  | TerminateAction;

export interface RuleView {
  id: RuleId;
  message: string;
  satisfied: boolean;
  /** The rule the player is stuck on. */
  current: boolean;
}

export interface PlayerView {
  text: string;
  rules: RuleView[];
  currentGateIndex: number;
  satisfiedIndices: number[];
  allSatisfied: boolean;
  lastSequence: string;
  status: SessionStatus;
  endReason: EndReason | null;
  feedback: string | null;
}

export const FEEDBACK_ACCEPTED = "Password meets all requirements!";
export const FEEDBACK_REJECTED = "Password does not meet the requirements.";
