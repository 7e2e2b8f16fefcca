/**
 * Marathon Repository.
 *
 * Purpose: Read and write the roster (puzzles, teams) and the attempt matrix as YAML
 * files under one data directory.
 * Encaje: Built on `YamlStore`; the service is the only caller that mutates state.
 *
 * RISK: `load`/`store` take no lock. Two overlapping load → store sequences lose one
 * of the updates (last writer wins). The service serializes its own sequences with
 * `MarathonRepository.exclusive`; anything calling the stores directly does not get
 * that protection.
 *
 * RISK: `AttemptStore.store` with a roster writes attempts, then puzzles, then teams, one
 * file at a time. If a later write fails, the new attempt matrix sits next to the old
 * roster until the next successful `initialize`.
 */
import { join, resolve } from "node:path";
import { YamlStore } from "@/db/yaml-store";
import { KeyedMutex } from "@/utils/keyedMutex";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  StoredAttemptsSchema,
  StoredPuzzlesSchema,
  StoredTeamsSchema,
  serializeAttempts,
  serializePuzzles,
  serializeTeams,
} from "./schema";
import type { AttemptMatrix, MarathonState, PuzzleMap, Roster, TeamMap } from "./types";

export const MARATHON_FILES = {
  puzzles: "puzzles.yaml",
  teams: "teams.yaml",
  attempts: "attempts.yaml",
} as const;

/** Puzzles and teams. */
export class RosterStore {
  readonly puzzles: YamlStore<PuzzleMap, ReturnType<typeof serializePuzzles>>;
  readonly teams: YamlStore<TeamMap, ReturnType<typeof serializeTeams>>;

  constructor(dataDir: string) {
    this.puzzles = new YamlStore(
      join(dataDir, MARATHON_FILES.puzzles),
      StoredPuzzlesSchema,
      serializePuzzles,
      () => ({}),
    );
    this.teams = new YamlStore(
      join(dataDir, MARATHON_FILES.teams),
      StoredTeamsSchema,
      serializeTeams,
      () => ({}),
    );
  }

  async load(): Promise<Result<Roster, Error>> {
    const puzzles = await this.puzzles.read();
    if (puzzles.isErr()) return ErrResult(puzzles.error);

    const teams = await this.teams.read();
    if (teams.isErr()) return ErrResult(teams.error);

    return OkResult({ puzzles: puzzles.unwrap(), teams: teams.unwrap() });
  }

  /** Overwrite the given collections; omitted ones are left as they are on disk. */
  async store(roster: Partial<Roster>): Promise<Result<void, Error>> {
    if (roster.puzzles) {
      const res = await this.puzzles.write(roster.puzzles);
      if (res.isErr()) return res;
    }
    if (roster.teams) {
      const res = await this.teams.write(roster.teams);
      if (res.isErr()) return res;
    }
    return OkResult(undefined);
  }
}

/** The puzzle × team attempt matrix. */
export class AttemptStore {
  readonly attempts: YamlStore<AttemptMatrix, ReturnType<typeof serializeAttempts>>;

  constructor(
    dataDir: string,
    private readonly roster: RosterStore,
  ) {
    this.attempts = new YamlStore(
      join(dataDir, MARATHON_FILES.attempts),
      StoredAttemptsSchema,
      serializeAttempts,
      () => ({}),
    );
  }

  async load(): Promise<Result<AttemptMatrix, Error>> {
    return this.attempts.read();
  }

  /**
   * Write the attempts, plus any roster collection passed alongside (`initialize`
   * replaces all three at once).
   */
  async store(attempts: AttemptMatrix, roster: Partial<Roster> = {}): Promise<Result<void, Error>> {
    const res = await this.attempts.write(attempts);
    if (res.isErr()) return res;
    return this.roster.store(roster);
  }
}

const locks = new KeyedMutex();

export class MarathonRepository {
  readonly roster: RosterStore;
  readonly attempts: AttemptStore;

  constructor(readonly dataDir: string) {
    this.roster = new RosterStore(dataDir);
    this.attempts = new AttemptStore(dataDir, this.roster);
  }

  /** Load all three collections fresh from disk. */
  async load(): Promise<Result<MarathonState, Error>> {
    const roster = await this.roster.load();
    if (roster.isErr()) return ErrResult(roster.error);

    const attempts = await this.attempts.load();
    if (attempts.isErr()) return ErrResult(attempts.error);

    return OkResult({ ...roster.unwrap(), attempts: attempts.unwrap() });
  }

  /**
   * Run `task` while holding this data directory's lock. Repositories built on the same
   * directory share the lock.
   */
  exclusive<T>(task: () => Promise<T>): Promise<T> {
    return locks.run(resolve(this.dataDir), task);
  }
}
