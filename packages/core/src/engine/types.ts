/**
 * Result type for operations that might fail, without throwing exceptions.
 * Rule checks report rejections through this instead of raising.
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });
export const err = <E>(error: E): Result<never, E> => ({ ok: false, error });

/**
 * Metadata associated with an action.
 */
export interface Meta {
  /** The ID of the actor (player or input device) that initiated the action. */
  from: string;
  /** Sequence number of the action within the session. 1-based. */
  seq: number;
  /** Wall clock, for display only. */
  timestamp?: number;
}

/**
 * A standardized action structure. Concrete games narrow `type` to a
 * string literal union and add their own fields.
 */
export interface Action {
  type: string;
}

/**
 * Base shape for the game state. The state holds all "truth" of the game
 * and must stay plain data.
 */
export interface State {}
