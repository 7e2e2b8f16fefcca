/**
 * Attempt state machine.
 *
 * Purpose: The only place attempts change state.
 * Invariants:
 * - not started → in progress → submitted; nothing else, nothing backwards.
 * - An illegal transition returns `Err` and leaves the attempt untouched.
 * - `timer.duration` is computed once, in `submitAttempt`.
 */
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { formatElapsed } from "./elapsed";
import { AttemptTransitionError } from "./errors";
import { AttemptState, type Attempt, type AttemptMatrix, type PuzzleMap, type TeamMap } from "./types";

export function createAttempt(puzzle: string, team: string): Attempt {
  return {
    puzzle,
    team,
    state: AttemptState.NotStarted,
    timer: { start: null, end: null, duration: null },
    link: null,
  };
}

/** Cross product of every puzzle with every team, all not started. */
export function buildAttemptMatrix(puzzles: PuzzleMap, teams: TeamMap): AttemptMatrix {
  const matrix: AttemptMatrix = {};
  for (const puzzleId of Object.keys(puzzles)) {
    const row: Record<string, Attempt> = {};
    for (const teamName of Object.keys(teams)) {
      row[teamName] = createAttempt(puzzleId, teamName);
    }
    matrix[puzzleId] = row;
  }
  return matrix;
}

/** Start working on a puzzle: starts the timer. */
export function unlockAttempt(
  attempt: Attempt,
  now: Date,
): Result<Attempt, AttemptTransitionError> {
  if (attempt.state !== AttemptState.NotStarted) {
    return ErrResult(new AttemptTransitionError(attempt.state, AttemptState.NotStarted, "unlock"));
  }

  attempt.state = AttemptState.InProgress;
  attempt.timer.start = now;
  return OkResult(attempt);
}

/** Submit a solution: stops the timer and freezes the elapsed time. */
export function submitAttempt(
  attempt: Attempt,
  link: string,
  now: Date,
): Result<Attempt, AttemptTransitionError> {
  if (attempt.state !== AttemptState.InProgress) {
    return ErrResult(new AttemptTransitionError(attempt.state, AttemptState.InProgress, "submit"));
  }

  const start = attempt.timer.start ?? now;
  attempt.state = AttemptState.Submitted;
  attempt.timer.start = start;
  attempt.timer.end = now;
  attempt.timer.duration = formatElapsed(now.getTime() - start.getTime());
  attempt.link = link;
  return OkResult(attempt);
}
