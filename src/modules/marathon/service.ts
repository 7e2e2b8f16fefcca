/**
 * Marathon Service.
 *
 * Purpose: One handler per marathon command. Each handler loads state fresh, checks
 * who is calling and from where, validates the attempt, mutates in memory, persists,
 * then sends exactly one reply through the sink it was given.
 *
 * Invariants:
 * - A denial sends one reply and writes nothing.
 * - Writes happen before the confirmation is sent.
 * - Mutating handlers hold the repository lock from load to store.
 *
 * Errors:
 * - Storage failures come back as `{ status: "failed" }` after an error reply.
 * - An unknown puzzle/team id throws `MarathonLookupError` before any write; the
 *   command layer reports it.
 */
import type { ZodType, ZodTypeDef } from "zod";
import { createLogger, type ScopedLogger } from "@/utils/logger";
import { toError } from "@/utils/result";
import { describeIssues, parseYaml } from "@/db/yaml-store";
import { findTeam, inAuthorizedChannel, isOrganizer, describeTeam, teamIncludes, type TeamCandidate } from "./access";
import { buildAttemptMatrix, submitAttempt, unlockAttempt } from "./attempt";
import { MarathonLookupError, RosterUploadError } from "./errors";
import type { MarathonRepository } from "./repository";
import { UploadedPuzzlesSchema, UploadedTeamsSchema } from "./schema";
import {
  AttemptState,
  type Attempt,
  type MarathonCaller,
  type MarathonState,
  type Puzzle,
  type PuzzleMap,
  type Team,
  type TeamMap,
} from "./types";
import * as views from "./views";
import type { MarathonReply } from "./views";

export interface MarathonReplySink {
  send(reply: MarathonReply): Promise<void>;
}

/** Returns the text of an uploaded file given its reference (an attachment URL). */
export type AttachmentFetcher = (ref: string) => Promise<string>;

/** Per-invocation collaborators. */
export interface MarathonInvocation {
  caller: MarathonCaller;
  reply: MarathonReplySink;
}

export interface MarathonServiceDeps {
  repository: MarathonRepository;
  organizers: ReadonlySet<string>;
  fetchAttachment: AttachmentFetcher;
  now?: () => Date;
  logger?: ScopedLogger;
}

export type DenialReason =
  | "not-organizer"
  | "no-team"
  | "wrong-channel"
  | "wrong-state"
  | "already-on-team"
  | "not-on-team"
  | "guild-only"
  | "invalid-upload";

export type MarathonOutcome =
  | { status: "ok" }
  | { status: "denied"; reason: DenialReason }
  | { status: "failed"; error: Error };

export interface MarathonChoice {
  name: string;
  value: string;
}

/** Discord accepts at most 25 autocomplete choices. */
export const MAX_CHOICES = 25;

const OK: MarathonOutcome = { status: "ok" };
const denied = (reason: DenialReason): MarathonOutcome => ({ status: "denied", reason });

export function requirePuzzle(puzzles: PuzzleMap, id: string): Puzzle {
  const puzzle = puzzles[id];
  if (!puzzle) throw new MarathonLookupError("puzzle", id);
  return puzzle;
}

export function requireTeam(teams: TeamMap, name: string): Team {
  const team = teams[name];
  if (!team) throw new MarathonLookupError("team", name);
  return team;
}

export function requireAttempt(state: MarathonState, puzzleId: string, teamName: string): Attempt {
  const attempt = state.attempts[puzzleId]?.[teamName];
  if (!attempt) throw new MarathonLookupError("attempt", `${puzzleId}/${teamName}`);
  return attempt;
}

export function createMarathonService(deps: MarathonServiceDeps) {
  const { repository, organizers, fetchAttachment } = deps;
  const now = deps.now ?? (() => new Date());
  const log = deps.logger ?? createLogger("marathon");

  async function fail(reply: MarathonReplySink, error: Error): Promise<MarathonOutcome> {
    log.error("storage failure:", error);
    await reply.send(views.storageFailed(error));
    return { status: "failed", error };
  }

  /** Load all collections; on `{ failed }` the error reply has already been sent. */
  async function load(reply: MarathonReplySink): Promise<MarathonState | { failed: MarathonOutcome }> {
    const res = await repository.load();
    if (res.isErr()) return { failed: await fail(reply, res.error) };
    return res.unwrap();
  }

  async function ensureOrganizer({ caller, reply }: MarathonInvocation): Promise<boolean> {
    if (isOrganizer(caller, organizers)) return true;
    await reply.send(views.notOrganizer());
    return false;
  }

  /** Shared chain for unlock/submit: on a team, in one of its channels, attempt in `expected`. */
  async function resolvePlayerAttempt(
    { caller, reply }: MarathonInvocation,
    state: MarathonState,
    puzzleId: string,
    expected: AttemptState,
  ): Promise<{ team: Team; puzzle: Puzzle; attempt: Attempt } | { denied: MarathonOutcome }> {
    const team = findTeam(caller, state.teams);
    if (!team) {
      await reply.send(views.notOnTeam());
      return { denied: denied("no-team") };
    }

    if (!inAuthorizedChannel(caller.channelId, team)) {
      await reply.send(views.wrongChannel(team));
      return { denied: denied("wrong-channel") };
    }

    const attempt = requireAttempt(state, puzzleId, team.name);
    const puzzle = requirePuzzle(state.puzzles, puzzleId);

    if (attempt.state !== expected) {
      await reply.send(views.wrongState(attempt.state, expected));
      return { denied: denied("wrong-state") };
    }

    return { team, puzzle, attempt };
  }

  /** Shared shape of the organizer-only team edits. */
  async function editTeam(
    invocation: MarathonInvocation,
    teamName: string,
    edit: (team: Team, state: MarathonState) => Promise<MarathonOutcome | MarathonReply>,
  ): Promise<MarathonOutcome> {
    if (!(await ensureOrganizer(invocation))) return denied("not-organizer");

    return repository.exclusive(async () => {
      const state = await load(invocation.reply);
      if ("failed" in state) return state.failed;

      const team = requireTeam(state.teams, teamName);
      const result = await edit(team, state);
      if ("status" in result) return result;

      const stored = await repository.roster.store({ teams: state.teams });
      if (stored.isErr()) return fail(invocation.reply, stored.error);

      await invocation.reply.send(result);
      return OK;
    });
  }

  async function readState(): Promise<MarathonState | null> {
    const res = await repository.load();
    if (res.isErr()) {
      log.warn("autocomplete could not load state:", res.error.message);
      return null;
    }
    return res.unwrap();
  }

  function parseUpload<T>(
    file: "puzzles" | "teams",
    text: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): T {
    let raw: unknown;
    try {
      raw = parseYaml(text);
    } catch (error) {
      throw new RosterUploadError(file, toError(error).message);
    }
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new RosterUploadError(file, describeIssues(parsed.error.issues));
    }
    return parsed.data;
  }

  async function suggestPuzzles(
    candidate: TeamCandidate,
    partial: string,
    wanted: AttemptState,
  ): Promise<MarathonChoice[]> {
    const state = await readState();
    if (!state) return [];

    const team = findTeam(candidate, state.teams);
    if (!team) return [];

    return Object.values(state.puzzles)
      .filter((puzzle) => state.attempts[puzzle.id]?.[team.name]?.state === wanted)
      .map((puzzle) => ({ name: views.puzzleChoiceLabel(puzzle), value: puzzle.id }))
      .filter((choice) => choice.name.includes(partial))
      .slice(0, MAX_CHOICES);
  }

  return {
    /**
     * Replace the whole marathon with the uploaded roster. Every puzzle × team attempt
     * starts over as not started.
     */
    async initialize(
      invocation: MarathonInvocation,
      files: { puzzles: string; teams: string },
    ): Promise<MarathonOutcome> {
      if (!(await ensureOrganizer(invocation))) return denied("not-organizer");

      let puzzles: PuzzleMap;
      let teams: TeamMap;
      try {
        const [puzzleText, teamText] = await Promise.all([
          fetchAttachment(files.puzzles),
          fetchAttachment(files.teams),
        ]);
        puzzles = parseUpload("puzzles", puzzleText, UploadedPuzzlesSchema);
        teams = parseUpload("teams", teamText, UploadedTeamsSchema);
      } catch (error) {
        const cause = toError(error);
        log.warn("rejected roster upload:", cause.message);
        await invocation.reply.send(views.uploadFailed(cause));
        return denied("invalid-upload");
      }

      const attempts = buildAttemptMatrix(puzzles, teams);

      return repository.exclusive(async () => {
        const stored = await repository.attempts.store(attempts, { puzzles, teams });
        if (stored.isErr()) return fail(invocation.reply, stored.error);

        const puzzleCount = Object.keys(puzzles).length;
        const teamCount = Object.keys(teams).length;
        log.info(`initialized ${puzzleCount} puzzles for ${teamCount} teams (by ${invocation.caller.userId})`);
        await invocation.reply.send(views.initialized(puzzleCount, teamCount));
        return OK;
      });
    },

    /** Start the caller's team on a puzzle. */
    async unlock(invocation: MarathonInvocation, puzzleId: string): Promise<MarathonOutcome> {
      return repository.exclusive(async () => {
        const state = await load(invocation.reply);
        if ("failed" in state) return state.failed;

        const resolved = await resolvePlayerAttempt(invocation, state, puzzleId, AttemptState.NotStarted);
        if ("denied" in resolved) return resolved.denied;

        const transition = unlockAttempt(resolved.attempt, now());
        if (transition.isErr()) {
          await invocation.reply.send(views.wrongState(transition.error.from, transition.error.expected));
          return denied("wrong-state");
        }

        const stored = await repository.attempts.store(state.attempts);
        if (stored.isErr()) return fail(invocation.reply, stored.error);

        log.info(`${resolved.team.name} unlocked ${puzzleId}`);
        await invocation.reply.send(views.unlocked(resolved.puzzle));
        return OK;
      });
    },

    /** Record the caller's team's solution for an unlocked puzzle. */
    async submit(invocation: MarathonInvocation, puzzleId: string, link: string): Promise<MarathonOutcome> {
      return repository.exclusive(async () => {
        const state = await load(invocation.reply);
        if ("failed" in state) return state.failed;

        const resolved = await resolvePlayerAttempt(invocation, state, puzzleId, AttemptState.InProgress);
        if ("denied" in resolved) return resolved.denied;

        const transition = submitAttempt(resolved.attempt, link, now());
        if (transition.isErr()) {
          await invocation.reply.send(views.wrongState(transition.error.from, transition.error.expected));
          return denied("wrong-state");
        }

        const stored = await repository.attempts.store(state.attempts);
        if (stored.isErr()) return fail(invocation.reply, stored.error);

        const duration = transition.unwrap().timer.duration ?? "";
        log.info(`${resolved.team.name} submitted ${puzzleId} after ${duration}`);
        await invocation.reply.send(views.submitted(resolved.puzzle, duration));
        return OK;
      });
    },

    async addChannel(invocation: MarathonInvocation, teamName: string): Promise<MarathonOutcome> {
      const { caller } = invocation;
      return editTeam(invocation, teamName, async (team) => {
        if (!team.channels.includes(caller.channelId)) {
          team.channels.push(caller.channelId);
        }
        log.info(`channel ${caller.channelId} added to ${team.name}`);
        return views.ethereal(`Added this channel to ${describeTeam(team, caller.guildId)}.`);
      });
    },

    async removeChannel(invocation: MarathonInvocation, teamName: string): Promise<MarathonOutcome> {
      const { caller } = invocation;
      return editTeam(invocation, teamName, async (team) => {
        team.channels = team.channels.filter((channelId) => channelId !== caller.channelId);
        log.info(`channel ${caller.channelId} removed from ${team.name}`);
        return views.ethereal(`Removed this channel from ${describeTeam(team, caller.guildId)}.`);
      });
    },

    /** Put a player on a team, unless they already play for one (by role or by listing). */
    async addPlayer(invocation: MarathonInvocation, player: TeamCandidate, teamName: string): Promise<MarathonOutcome> {
      const { caller, reply } = invocation;
      return editTeam(invocation, teamName, async (team, state) => {
        const current = findTeam(player, state.teams);
        if (current) {
          await reply.send(views.ethereal(`<@${player.userId}> is already on ${describeTeam(current, caller.guildId)}.`));
          return denied("already-on-team");
        }

        team.members.push(player.userId);
        log.info(`player ${player.userId} added to ${team.name}`);
        return views.ethereal(`Added <@${player.userId}> to ${describeTeam(team, caller.guildId)}.`);
      });
    },

    /**
     * Take a player off the named team. The player must be on some team; they are only
     * removed from the named team's list, and the reply names the team they were found on.
     */
    async removePlayer(invocation: MarathonInvocation, player: TeamCandidate, teamName: string): Promise<MarathonOutcome> {
      const { caller, reply } = invocation;
      return editTeam(invocation, teamName, async (team, state) => {
        const current = findTeam(player, state.teams);
        if (!current) {
          await reply.send(views.ethereal(`<@${player.userId}> is not on a team.`));
          return denied("not-on-team");
        }

        if (teamIncludes(team, player.userId)) {
          team.members = team.members.filter((member) => member !== player.userId);
        }
        log.info(`player ${player.userId} removed from ${team.name}`);
        return views.ethereal(`Removed <@${player.userId}> from ${describeTeam(current, caller.guildId)}.`);
      });
    },

    /** Map the team to a role in the caller's guild. */
    async setRole(invocation: MarathonInvocation, teamName: string, roleId: string): Promise<MarathonOutcome> {
      const { caller, reply } = invocation;
      return editTeam(invocation, teamName, async (team) => {
        const guildId = caller.guildId;
        if (!guildId) {
          await reply.send(views.guildOnly());
          return denied("guild-only");
        }

        team.role[guildId] = roleId;
        log.info(`team ${team.name} mapped to role ${roleId} in guild ${guildId}`);
        return views.ethereal(`Team "${team.name}" set to ${describeTeam(team, guildId)} in this server.`);
      });
    },

    async listPlayers(invocation: MarathonInvocation, teamName: string): Promise<MarathonOutcome> {
      const res = await repository.roster.load();
      if (res.isErr()) return fail(invocation.reply, res.error);

      const team = requireTeam(res.unwrap().teams, teamName);
      await invocation.reply.send(views.playerList(team, invocation.caller.guildId));
      return OK;
    },

    // Autocomplete. Never throws and never denies: a caller that cannot be resolved
    // simply gets no choices.

    async autocompleteTeams(partial: string): Promise<MarathonChoice[]> {
      const state = await readState();
      if (!state) return [];
      return Object.values(state.teams)
        .filter((team) => team.name.includes(partial))
        .map((team) => ({ name: team.name, value: team.name }))
        .slice(0, MAX_CHOICES);
    },

    async autocompleteUnlockable(candidate: TeamCandidate, partial: string): Promise<MarathonChoice[]> {
      return suggestPuzzles(candidate, partial, AttemptState.NotStarted);
    },

    async autocompleteSubmittable(candidate: TeamCandidate, partial: string): Promise<MarathonChoice[]> {
      return suggestPuzzles(candidate, partial, AttemptState.InProgress);
    },
  };
}

export type MarathonService = ReturnType<typeof createMarathonService>;
