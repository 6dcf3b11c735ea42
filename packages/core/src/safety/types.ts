import type { z } from "zod";
import type { ReasonCodeSchema } from "./schema.js";

export type ReasonCode = z.infer<typeof ReasonCodeSchema>;

export type FilterVerdict =
  | { status: "ok" }
  | { status: "blocked"; reasonCode: ReasonCode; ruleId: string };

/**
 * Vets a prospective password before the edit is committed.
 * True means the edit must not happen and the session ends.
 */
export type ContentFilter = (candidate: string) => boolean;
