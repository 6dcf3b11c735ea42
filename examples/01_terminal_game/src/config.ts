import { z } from "zod";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

const EnvSchema = z.object({
  PASSGATE_SEED: z
    .string()
    .regex(/^-?\d+$/, "must be an integer")
    .transform(Number)
    .optional(),
  PASSGATE_ITERATIONS: z.coerce.number().int().min(3).max(6).optional(),
  PASSGATE_LOG: z
    .enum(["0", "1", "true", "false"])
    .optional()
    .transform((value) => value === "1" || value === "true"),
  PASSGATE_LEXICON: z.string().min(1).optional(),
});

export interface GameConfig {
  /** Seeds the puzzle so the same seed always draws the same sequence. */
  seed?: number;
  /** Fixes the look-and-say iteration count. */
  iterations?: number;
  output: boolean;
  /** Lexicon file replacing the bundled one. */
  lexiconPath?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv): GameConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}`,
      ),
    );
  }
  const { PASSGATE_SEED, PASSGATE_ITERATIONS, PASSGATE_LOG, PASSGATE_LEXICON } =
    parsed.data;
  return {
    seed: PASSGATE_SEED,
    iterations: PASSGATE_ITERATIONS,
    output: PASSGATE_LOG,
    lexiconPath: PASSGATE_LEXICON,
  };
}
