/**
 * Marathon Types.
 *
 * Purpose: Domain entities for the puzzle marathon (puzzles, teams, attempts).
 */

/** Public definition of a puzzle. Immutable once the roster is initialized. */
export interface Puzzle {
  /** Unique key (the top-level key of the uploaded puzzles file). */
  id: string;
  name: string;
  category: string;
  points: number;
  url: string;
}

/** A team and the Discord objects that identify it. */
export interface Team {
  /** Unique key (the top-level key of the uploaded teams file). */
  name: string;
  /** User ids listed directly on the team. */
  members: string[];
  /** Channel ids where the team may unlock and submit. */
  channels: string[];
  /** Guild id → role id granting membership in that guild. */
  role: Record<string, string>;
}

/**
 * The states an attempt can be in.
 * - NotStarted: the team has not run `/marathon unlock` on the puzzle yet.
 * - InProgress: unlocked, timer running.
 * - Submitted: solved with `/marathon submit`; final.
 */
export enum AttemptState {
  NotStarted = "not started",
  InProgress = "in progress",
  Submitted = "submitted",
}

export interface AttemptTimer {
  start: Date | null;
  end: Date | null;
  /** `end - start`, rendered once at submit time and never recomputed. */
  duration: string | null;
}

/** A team's attempt at one puzzle. */
export interface Attempt {
  puzzle: string;
  team: string;
  state: AttemptState;
  timer: AttemptTimer;
  /** Solution reference, set on submit. */
  link: string | null;
}

export type PuzzleMap = Record<string, Puzzle>;
export type TeamMap = Record<string, Team>;

/** puzzle id → team name → attempt. Dense once the roster is initialized. */
export type AttemptMatrix = Record<string, Record<string, Attempt>>;

export interface Roster {
  puzzles: PuzzleMap;
  teams: TeamMap;
}

export interface MarathonState extends Roster {
  attempts: AttemptMatrix;
}

/** Who is running a command, and from where. */
export interface MarathonCaller {
  userId: string;
  /** Absent in DMs. */
  guildId?: string;
  channelId: string;
  /** Role ids the caller holds in `guildId`. */
  roleIds: readonly string[];
}
