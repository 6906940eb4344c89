/**
 * Coordinator errors.
 *
 * Thrown only for caller mistakes at the API boundary. Stale ids, late
 * votes and out-of-order moves are normal traffic and come back as
 * `false`/`undefined` instead.
 */

export type CoordinationErrorCode =
  | "INTENT_NOT_FOUND"
  | "PROPOSAL_NOT_FOUND"
  | "SESSION_NOT_FOUND"
  | "INVALID_ARGUMENT";

export class CoordinationError extends Error {
  public readonly code: CoordinationErrorCode;

  constructor(code: CoordinationErrorCode, message: string) {
    super(message);
    this.name = "CoordinationError";
    this.code = code;
  }
}

export class TimeoutError extends Error {
  public readonly code = "TIMEOUT" as const;
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
