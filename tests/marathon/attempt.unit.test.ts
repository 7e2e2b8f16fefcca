/**
 * Attempt state machine.
 *
 * Purpose: transitions only move forward, illegal ones leave the attempt untouched,
 * and the duration is frozen at submit time.
 */
import { describe, it, expect } from "vitest";
import {
  AttemptState,
  AttemptTransitionError,
  buildAttemptMatrix,
  createAttempt,
  submitAttempt,
  unlockAttempt,
  type PuzzleMap,
  type TeamMap,
} from "@/modules/marathon";

const START = new Date("2024-03-01T12:00:00.000Z");
const END = new Date("2024-03-01T13:30:15.250Z");

describe("buildAttemptMatrix", () => {
  it("creates one not-started attempt per puzzle and team", () => {
    const puzzles: PuzzleMap = {
      p1: { id: "p1", name: "Warmup", category: "intro", points: 1, url: "https://example.com/p1" },
      p2: { id: "p2", name: "Crossword", category: "words", points: 3, url: "https://example.com/p2" },
    };
    const teams: TeamMap = {
      alpha: { name: "alpha", members: [], channels: [], role: {} },
      beta: { name: "beta", members: [], channels: [], role: {} },
    };

    const matrix = buildAttemptMatrix(puzzles, teams);

    expect(Object.keys(matrix)).toEqual(["p1", "p2"]);
    expect(Object.keys(matrix.p1 ?? {})).toEqual(["alpha", "beta"]);
    expect(matrix.p2?.beta).toEqual({
      puzzle: "p2",
      team: "beta",
      state: AttemptState.NotStarted,
      timer: { start: null, end: null, duration: null },
      link: null,
    });
  });

  it("is empty without puzzles", () => {
    expect(buildAttemptMatrix({}, { alpha: { name: "alpha", members: [], channels: [], role: {} } })).toEqual({});
  });
});

describe("unlockAttempt", () => {
  it("starts the timer", () => {
    const attempt = createAttempt("p1", "alpha");

    const result = unlockAttempt(attempt, START);

    expect(result.isOk()).toBe(true);
    expect(attempt.state).toBe(AttemptState.InProgress);
    expect(attempt.timer.start).toEqual(START);
    expect(attempt.timer.end).toBeNull();
  });

  it("rejects a second unlock and keeps the original start", () => {
    const attempt = createAttempt("p1", "alpha");
    unlockAttempt(attempt, START);

    const result = unlockAttempt(attempt, END);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(AttemptTransitionError);
      expect(result.error.from).toBe(AttemptState.InProgress);
      expect(result.error.expected).toBe(AttemptState.NotStarted);
      expect(result.error.action).toBe("unlock");
    }
    expect(attempt.timer.start).toEqual(START);
  });
});

describe("submitAttempt", () => {
  it("stops the timer and records the link", () => {
    const attempt = createAttempt("p1", "alpha");
    unlockAttempt(attempt, START);

    const result = submitAttempt(attempt, "https://example.com/solution", END);

    expect(result.isOk()).toBe(true);
    expect(attempt).toEqual({
      puzzle: "p1",
      team: "alpha",
      state: AttemptState.Submitted,
      timer: { start: START, end: END, duration: "1:30:15.250000" },
      link: "https://example.com/solution",
    });
  });

  it("rejects submitting a puzzle that was never unlocked", () => {
    const attempt = createAttempt("p1", "alpha");

    const result = submitAttempt(attempt, "L", END);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        "Cannot submit an attempt that is not started; expected it to be in progress",
      );
    }
    expect(attempt.state).toBe(AttemptState.NotStarted);
    expect(attempt.link).toBeNull();
  });

  it("does not move backwards or resubmit", () => {
    const attempt = createAttempt("p1", "alpha");
    unlockAttempt(attempt, START);
    submitAttempt(attempt, "first", END);

    expect(unlockAttempt(attempt, END).isErr()).toBe(true);
    expect(submitAttempt(attempt, "second", END).isErr()).toBe(true);
    expect(attempt.state).toBe(AttemptState.Submitted);
    expect(attempt.link).toBe("first");
    expect(attempt.timer.duration).toBe("1:30:15.250000");
  });
});
