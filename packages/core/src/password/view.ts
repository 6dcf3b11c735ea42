import type { View } from "../engine/view.js";
import { type Catalog, renderRuleMessage } from "../gate/catalog.js";
import type { PasswordState, PlayerView } from "./types.js";

export class PasswordView implements View<PasswordState, PlayerView> {
  constructor(private readonly catalog: Catalog) {}

  observe(state: PasswordState, _playerId: string): PlayerView {
    const { gate } = state;
    return {
      text: state.text,
      rules: this.catalog.map((rule, index) => ({
        id: rule.id,
        message: renderRuleMessage(rule, state.seed),
        satisfied: index < gate.currentGateIndex,
        current: index === gate.currentGateIndex,
      })),
      currentGateIndex: gate.currentGateIndex,
      satisfiedIndices: [...gate.satisfiedIndices],
      allSatisfied: gate.allSatisfied,
      lastSequence: state.seed.lastSequence,
      status: state.status,
      endReason: state.endReason,
      feedback: state.feedback,
    };
  }
}
