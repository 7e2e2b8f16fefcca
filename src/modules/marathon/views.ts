/**
 * Marathon Views.
 *
 * Purpose: Every reply the marathon sends, as plain data. The command layer turns a
 * `MarathonReply` into an embed; tests read these fields directly.
 */
import type { AttemptState, Puzzle, Team } from "./types";
import { describeTeam } from "./access";

export enum ReplyTone {
  Info = "info",
  Success = "success",
  Denied = "denied",
  Error = "error",
}

export interface MarathonReply {
  tone: ReplyTone;
  title: string;
  description: string;
  /** Visible only to the caller. */
  ephemeral: boolean;
  /** Deleted after `ETHEREAL_TTL_MS`. */
  expiring: boolean;
}

export const DEFAULT_TITLE = "Puzzle Marathon";
export const DENIED_TITLE = "Sorry, you can't do that.";
export const ERROR_TITLE = "Something went wrong...";
export const ETHEREAL_TTL_MS = 5_000;

/** Private, self-deleting confirmation. */
export function ethereal(description: string, title = DEFAULT_TITLE): MarathonReply {
  return { tone: ReplyTone.Success, title, description, ephemeral: true, expiring: true };
}

export function unauthorized(message: string): MarathonReply {
  return { tone: ReplyTone.Denied, title: DENIED_TITLE, description: message, ephemeral: true, expiring: true };
}

export function failure(
  options: { message?: string; error?: Error | string; ephemeral?: boolean; expiring?: boolean },
): MarathonReply {
  const detail = options.error instanceof Error ? options.error.message : options.error;
  const codeblock = detail !== undefined ? `\n\`\`\`\n${detail}\n\`\`\`` : "";
  return {
    tone: ReplyTone.Error,
    title: ERROR_TITLE,
    description: `${options.message ?? ""}${codeblock}`,
    ephemeral: options.ephemeral ?? true,
    expiring: options.expiring ?? true,
  };
}

export const notOrganizer = () => unauthorized("You need to be an Organizer to do that.");
export const notOnTeam = () => unauthorized("You need to be on a team to do that.");
export const guildOnly = () => unauthorized("You must run this command inside a server.");

export function wrongChannel(team: Team): MarathonReply {
  const allowed = team.channels.map((channelId) => `- <#${channelId}>`).join("\n");
  return failure({
    message: `You are not allowed to do that in this channel. Try one of these:\n${allowed}`,
    ephemeral: false,
    expiring: false,
  });
}

export function wrongState(state: AttemptState, expected: AttemptState): MarathonReply {
  return failure({ message: `This puzzle is ${state}; expected it to be ${expected}!` });
}

export function uploadFailed(error: Error): MarathonReply {
  return failure({ message: "Failed to load yaml file", error });
}

export function storageFailed(error: Error): MarathonReply {
  return failure({ message: "Could not read or save the marathon data.", error });
}

export function initialized(puzzleCount: number, teamCount: number): MarathonReply {
  return {
    tone: ReplyTone.Success,
    title: DEFAULT_TITLE,
    description: `Initialized ${puzzleCount} puzzles for ${teamCount} teams.`,
    ephemeral: true,
    expiring: false,
  };
}

export function puzzleHeading(puzzle: Puzzle): string {
  return `#${puzzle.id}: ${puzzle.name}`;
}

export function unlocked(puzzle: Puzzle): MarathonReply {
  return {
    tone: ReplyTone.Info,
    title: puzzleHeading(puzzle),
    description: `Here's a [link to the puzzle](${puzzle.url}).`,
    ephemeral: false,
    expiring: false,
  };
}

export function submitted(puzzle: Puzzle, duration: string): MarathonReply {
  return {
    tone: ReplyTone.Success,
    title: puzzleHeading(puzzle),
    description: `\`\`\`elapsed: ${duration}\`\`\``,
    ephemeral: false,
    expiring: false,
  };
}

export function playerList(team: Team, guildId?: string): MarathonReply {
  const name = describeTeam(team, guildId);
  const members = team.members.map((member) => `- <@${member}>`).join("\n");
  return {
    tone: ReplyTone.Info,
    title: DEFAULT_TITLE,
    description: members !== "" ? `__${name} members__\n${members}` : `There are no players on ${name}.`,
    ephemeral: true,
    expiring: false,
  };
}

/** Discord rejects autocomplete choices with a longer name. */
export const MAX_CHOICE_NAME_LENGTH = 100;

/** Autocomplete label for a puzzle: `#id: "name"`, cut to `MAX_CHOICE_NAME_LENGTH`. */
export function puzzleChoiceLabel(puzzle: Puzzle): string {
  const label = `#${puzzle.id}: "${puzzle.name}"`;
  if (label.length <= MAX_CHOICE_NAME_LENGTH) return label;
  return `${label.slice(0, MAX_CHOICE_NAME_LENGTH - 1)}…`;
}
