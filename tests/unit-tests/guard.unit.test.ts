/**
 * Guard metadata and the guild-only check applied by the guard middleware.
 */
import { describe, it, expect } from "vitest";
import { Guard, getGuardMetadata } from "@/middlewares/guards/decorator";
import { guardViolation } from "@/middlewares/guards/middleware";

@Guard({ guildOnly: true })
class GuildOnlyCommand {}

class PlainCommand {}

describe("Guard", () => {
  it("stores metadata on the command prototype", () => {
    expect(getGuardMetadata(new GuildOnlyCommand())).toEqual({ guildOnly: true });
    expect(getGuardMetadata(new PlainCommand())).toBeNull();
    expect(getGuardMetadata(null)).toBeNull();
  });

  it("stops guild-only commands outside a server", () => {
    expect(guardViolation(new GuildOnlyCommand(), undefined)?.description).toBe(
      "You must run this command inside a server.",
    );
    expect(guardViolation(new GuildOnlyCommand(), "g1")).toBeNull();
    expect(guardViolation(new PlainCommand(), undefined)).toBeNull();
  });
});
