import { createRNG, PasswordSession } from "@passgate/core";
import type { GameConfig } from "./config.js";

export function createSession(config: GameConfig): PasswordSession {
  return new PasswordSession({
    playerId: "terminal",
    rng: config.seed === undefined ? Math.random : createRNG(config.seed),
    iterations: config.iterations,
    output: config.output,
  });
}
