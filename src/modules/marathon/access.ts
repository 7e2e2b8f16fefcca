/**
 * Marathon access rules.
 *
 * Purpose: Decide who is an organizer, which team a caller plays for, and whether the
 * current channel belongs to that team.
 * Invariants:
 * - `findTeam` checks a team's role for the caller's guild before its member list, and
 *   returns the first team (collection order) that matches either way.
 * Gotchas:
 * - A caller matching two teams (role on one, listed on another) is not reported; the
 *   first match wins. Only `add_player` keeps a player off a second team.
 */
import type { MarathonCaller, Team, TeamMap } from "./types";

/** The subset of a caller needed to resolve a team. */
export type TeamCandidate = Pick<MarathonCaller, "userId" | "guildId" | "roleIds">;

export function isOrganizer(caller: Pick<MarathonCaller, "userId">, organizers: ReadonlySet<string>): boolean {
  return organizers.has(caller.userId);
}

export function teamIncludes(team: Team, userId: string): boolean {
  return team.members.includes(userId);
}

export function findTeam(candidate: TeamCandidate, teams: TeamMap): Team | null {
  for (const team of Object.values(teams)) {
    // By role in this guild
    const roleId = candidate.guildId ? team.role[candidate.guildId] : undefined;
    if (roleId && candidate.roleIds.includes(roleId)) {
      return team;
    }
    // By user
    if (teamIncludes(team, candidate.userId)) {
      return team;
    }
  }
  return null;
}

export function inAuthorizedChannel(channelId: string, team: Team): boolean {
  return team.channels.includes(channelId);
}

/** Role mention when the team has a role in this guild, the team name otherwise. */
export function describeTeam(team: Team, guildId?: string): string {
  const roleId = guildId ? team.role[guildId] : undefined;
  return roleId ? `<@&${roleId}>` : team.name;
}
