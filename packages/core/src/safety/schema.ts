import { z } from "zod";

export const ReasonCodeSchema = z.enum(["profanity", "slur", "sexual", "other"]);

export const LexRuleSchema = z.object({
  id: z.string().min(1),
  reasonCode: ReasonCodeSchema,
  pattern: z.string().min(1),
  // "g" and "y" make RegExp#test stateful between calls.
  flags: z
    .string()
    .regex(/^[imsu]*$/, "only i, m, s and u flags are supported")
    .optional(),
});

export const LexiconSchema = z.object({
  version: z.string().min(1),
  rules: z.array(LexRuleSchema),
});

export type LexRule = z.infer<typeof LexRuleSchema>;
export type Lexicon = z.infer<typeof LexiconSchema>;
