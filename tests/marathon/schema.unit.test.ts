/**
 * Roster upload schemas.
 *
 * Purpose: uploaded YAML becomes keyed puzzle/team maps, large ids keep every digit,
 * and incomplete entries are rejected.
 */
import { describe, it, expect } from "vitest";
import { parseYaml } from "@/db/yaml-store";
import { UploadedPuzzlesSchema, UploadedTeamsSchema } from "@/modules/marathon";

describe("UploadedPuzzlesSchema", () => {
  it("keys puzzles by their top-level key", () => {
    const raw = parseYaml(`1:
  name: First Light
  category: warmup
  points: 10
  url: https://example.com/p/1
p2:
  name: 42
  category: logic
  points: 20
  url: https://example.com/p/2
`);

    expect(UploadedPuzzlesSchema.parse(raw)).toEqual({
      "1": { id: "1", name: "First Light", category: "warmup", points: 10, url: "https://example.com/p/1" },
      p2: { id: "p2", name: "42", category: "logic", points: 20, url: "https://example.com/p/2" },
    });
  });

  it("rejects a puzzle without points", () => {
    const raw = parseYaml(`p1:
  name: Warmup
  category: intro
  url: https://example.com/p1
`);

    const result = UploadedPuzzlesSchema.safeParse(raw);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["p1", "points"]);
    }
  });

  it("rejects fractional points", () => {
    const raw = parseYaml(`p1:
  name: Warmup
  category: intro
  points: 1.5
  url: https://example.com/p1
`);

    expect(UploadedPuzzlesSchema.safeParse(raw).success).toBe(false);
  });
});

describe("UploadedTeamsSchema", () => {
  it("keeps snowflake ids exact and fills in missing fields", () => {
    const raw = parseYaml(`alpha:
  members: [123456789012345678, "234567890123456789"]
  channels: [345678901234567890]
  role:
    456789012345678901: 567890123456789012
beta:
`);

    expect(UploadedTeamsSchema.parse(raw)).toEqual({
      alpha: {
        name: "alpha",
        members: ["123456789012345678", "234567890123456789"],
        channels: ["345678901234567890"],
        role: { "456789012345678901": "567890123456789012" },
      },
      beta: { name: "beta", members: [], channels: [], role: {} },
    });
  });

  it("drops duplicate members and channels", () => {
    const raw = parseYaml(`alpha:
  members: [u1, u1, u2]
  channels: [c1, c1]
`);

    expect(UploadedTeamsSchema.parse(raw).alpha).toEqual({
      name: "alpha",
      members: ["u1", "u2"],
      channels: ["c1"],
      role: {},
    });
  });

  it("rejects a list where a map is expected", () => {
    expect(UploadedTeamsSchema.safeParse(parseYaml("- alpha\n- beta\n")).success).toBe(false);
  });
});
