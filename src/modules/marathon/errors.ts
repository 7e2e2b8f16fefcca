/**
 * Marathon Errors.
 *
 * Purpose: Typed failures raised by the domain and the service.
 */
import type { AttemptState } from "./types";

/** An attempt was asked to move to a state it cannot reach from its current one. */
export class AttemptTransitionError extends Error {
  constructor(
    public readonly from: AttemptState,
    public readonly expected: AttemptState,
    public readonly action: "unlock" | "submit",
  ) {
    super(`Cannot ${action} an attempt that is ${from}; expected it to be ${expected}`);
    this.name = "AttemptTransitionError";
  }
}

/**
 * A command referenced a puzzle or team that is not in the roster.
 * Thrown during load/validate, before anything is persisted.
 */
export class MarathonLookupError extends Error {
  constructor(
    public readonly kind: "puzzle" | "team" | "attempt",
    public readonly key: string,
  ) {
    super(`Unknown ${kind} "${key}"`);
    this.name = "MarathonLookupError";
  }
}

/** An uploaded roster file could not be parsed or did not match the expected shape. */
export class RosterUploadError extends Error {
  constructor(
    public readonly file: "puzzles" | "teams",
    message: string,
  ) {
    super(`${file}: ${message}`);
    this.name = "RosterUploadError";
  }
}
