/**
 * Organizer check, team resolution and channel authorization.
 */
import { describe, it, expect } from "vitest";
import { describeTeam, findTeam, inAuthorizedChannel, isOrganizer, type TeamMap } from "@/modules/marathon";

const teams: TeamMap = {
  alpha: { name: "alpha", members: ["u1"], channels: ["c1"], role: { g1: "r1" } },
  beta: { name: "beta", members: ["u2"], channels: [], role: { g1: "r2" } },
};

describe("findTeam", () => {
  it("finds a team by direct membership", () => {
    expect(findTeam({ userId: "u1", roleIds: [] }, teams)?.name).toBe("alpha");
  });

  it("finds a team by its role in the caller's guild", () => {
    expect(findTeam({ userId: "u9", guildId: "g1", roleIds: ["r2"] }, teams)?.name).toBe("beta");
  });

  it("ignores roles mapped for other guilds", () => {
    expect(findTeam({ userId: "u9", guildId: "g2", roleIds: ["r2"] }, teams)).toBeNull();
    expect(findTeam({ userId: "u9", roleIds: ["r1"] }, teams)).toBeNull();
  });

  it("returns the first matching team when a caller matches two", () => {
    // role on alpha, listed on beta
    expect(findTeam({ userId: "u2", guildId: "g1", roleIds: ["r1"] }, teams)?.name).toBe("alpha");
  });

  it("returns null for an unknown caller", () => {
    expect(findTeam({ userId: "u9", guildId: "g1", roleIds: [] }, teams)).toBeNull();
  });
});

describe("access helpers", () => {
  it("checks organizers by user id", () => {
    const organizers = new Set(["org"]);
    expect(isOrganizer({ userId: "org" }, organizers)).toBe(true);
    expect(isOrganizer({ userId: "u1" }, organizers)).toBe(false);
  });

  it("checks the team's channels", () => {
    expect(inAuthorizedChannel("c1", teams.alpha)).toBe(true);
    expect(inAuthorizedChannel("c2", teams.alpha)).toBe(false);
  });

  it("describes a team by role mention in its guild, by name elsewhere", () => {
    expect(describeTeam(teams.alpha, "g1")).toBe("<@&r1>");
    expect(describeTeam(teams.alpha, "g2")).toBe("alpha");
    expect(describeTeam(teams.alpha)).toBe("alpha");
  });
});
