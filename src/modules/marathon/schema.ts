/**
 * Marathon Schemas.
 *
 * Purpose: zod schemas for the two uploaded roster files and the three persisted
 * data files, plus the explicit per-entity serializers used when writing them back.
 *
 * Gotchas:
 * - YAML is parsed with `intAsBigInt`, so ids and points may arrive as `bigint`.
 * - Top-level keys win over any `id`/`name` field inside an entry.
 */
import { z } from "zod";
import { AttemptState, type Attempt, type AttemptMatrix, type Puzzle, type PuzzleMap, type Team, type TeamMap } from "./types";

/** A Discord id written as a string or an integer. */
const Snowflake = z
  .union([z.string(), z.bigint(), z.number().int().nonnegative()])
  .transform((value) => String(value).trim())
  .pipe(z.string().min(1, "id cannot be empty"));

/** Free text that YAML may have read as a number. */
const Text = z.union([z.string(), z.bigint(), z.number()]).transform((value) => String(value));

const Points = z
  .union([z.number(), z.bigint()])
  .transform((value) => Number(value))
  .pipe(z.number().int("points must be an integer"));

const IdList = z
  .array(Snowflake)
  .nullish()
  .transform((ids) => [...new Set(ids ?? [])]);

const RoleMap = z
  .record(z.string(), Snowflake)
  .nullish()
  .transform((roles) => ({ ...(roles ?? {}) }));

// Uploaded roster files ------------------------------------------------------

export const UploadedPuzzleSchema = z.object({
  name: Text,
  category: Text,
  points: Points,
  url: z.string().min(1),
});

export const UploadedTeamSchema = z
  .object({
    members: IdList,
    channels: IdList,
    role: RoleMap,
  })
  .nullish()
  .transform((team) => team ?? { members: [], channels: [], role: {} });

export const UploadedPuzzlesSchema = z
  .record(z.string(), UploadedPuzzleSchema)
  .transform((entries): PuzzleMap => {
    const puzzles: PuzzleMap = {};
    for (const [id, entry] of Object.entries(entries)) {
      puzzles[id] = { id, ...entry };
    }
    return puzzles;
  });

export const UploadedTeamsSchema = z
  .record(z.string(), UploadedTeamSchema)
  .transform((entries): TeamMap => {
    const teams: TeamMap = {};
    for (const [name, entry] of Object.entries(entries)) {
      teams[name] = { name, ...entry };
    }
    return teams;
  });

// Persisted data files -------------------------------------------------------

const IsoTimestamp = z
  .union([z.string().datetime({ offset: true }), z.date()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return null;
    return value instanceof Date ? new Date(value.getTime()) : new Date(value);
  });

export const StoredPuzzlesSchema = z
  .record(z.string(), UploadedPuzzleSchema.extend({ id: Text.optional() }))
  .transform((entries): PuzzleMap => {
    const puzzles: PuzzleMap = {};
    for (const [id, { name, category, points, url }] of Object.entries(entries)) {
      puzzles[id] = { id, name, category, points, url };
    }
    return puzzles;
  });

export const StoredTeamsSchema = z
  .record(
    z.string(),
    z.object({
      name: Text.optional(),
      members: IdList,
      channels: IdList,
      role: RoleMap,
    }),
  )
  .transform((entries): TeamMap => {
    const teams: TeamMap = {};
    for (const [name, { members, channels, role }] of Object.entries(entries)) {
      teams[name] = { name, members, channels, role };
    }
    return teams;
  });

const StoredAttemptSchema = z.object({
  state: z.nativeEnum(AttemptState),
  timer: z
    .object({
      start: IsoTimestamp,
      end: IsoTimestamp,
      duration: Text.nullish().transform((value) => value ?? null),
    })
    .nullish()
    .transform((timer) => timer ?? { start: null, end: null, duration: null }),
  link: Text.nullish().transform((value) => value ?? null),
});

export const StoredAttemptsSchema = z
  .record(z.string(), z.record(z.string(), StoredAttemptSchema))
  .transform((rows): AttemptMatrix => {
    const matrix: AttemptMatrix = {};
    for (const [puzzle, row] of Object.entries(rows)) {
      const attempts: Record<string, Attempt> = {};
      for (const [team, stored] of Object.entries(row)) {
        attempts[team] = { puzzle, team, ...stored };
      }
      matrix[puzzle] = attempts;
    }
    return matrix;
  });

// Serializers ----------------------------------------------------------------

export interface RawPuzzle {
  id: string;
  name: string;
  category: string;
  points: number;
  url: string;
}

export interface RawTeam {
  name: string;
  members: string[];
  channels: string[];
  role: Record<string, string>;
}

export interface RawAttempt {
  puzzle: string;
  team: string;
  state: AttemptState;
  timer: { start: string | null; end: string | null; duration: string | null };
  link: string | null;
}

export function serializePuzzle(puzzle: Puzzle): RawPuzzle {
  return {
    id: puzzle.id,
    name: puzzle.name,
    category: puzzle.category,
    points: puzzle.points,
    url: puzzle.url,
  };
}

export function serializeTeam(team: Team): RawTeam {
  return {
    name: team.name,
    members: [...team.members],
    channels: [...team.channels],
    role: { ...team.role },
  };
}

export function serializeAttempt(attempt: Attempt): RawAttempt {
  return {
    puzzle: attempt.puzzle,
    team: attempt.team,
    state: attempt.state,
    timer: {
      start: attempt.timer.start ? attempt.timer.start.toISOString() : null,
      end: attempt.timer.end ? attempt.timer.end.toISOString() : null,
      duration: attempt.timer.duration,
    },
    link: attempt.link,
  };
}

const mapValues = <T, U>(record: Record<string, T>, fn: (value: T) => U): Record<string, U> => {
  const out: Record<string, U> = {};
  for (const [key, value] of Object.entries(record)) {
    out[key] = fn(value);
  }
  return out;
};

export const serializePuzzles = (puzzles: PuzzleMap) => mapValues(puzzles, serializePuzzle);
export const serializeTeams = (teams: TeamMap) => mapValues(teams, serializeTeam);
export const serializeAttempts = (attempts: AttemptMatrix) =>
  mapValues(attempts, (row) => mapValues(row, serializeAttempt));
