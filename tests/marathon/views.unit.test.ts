import { describe, it, expect } from "vitest";
import { MAX_CHOICE_NAME_LENGTH, puzzleChoiceLabel, type Puzzle } from "@/modules/marathon";

const puzzle = (name: string): Puzzle => ({
  id: "p1",
  name,
  category: "intro",
  points: 1,
  url: "https://example.com/p1",
});

describe("puzzleChoiceLabel", () => {
  it("quotes the puzzle name after its id", () => {
    expect(puzzleChoiceLabel(puzzle("Warmup"))).toBe('#p1: "Warmup"');
  });

  it("cuts long labels to the autocomplete limit", () => {
    const label = puzzleChoiceLabel(puzzle("x".repeat(120)));

    expect(label).toHaveLength(MAX_CHOICE_NAME_LENGTH);
    expect(label).toBe(`#p1: "${"x".repeat(93)}…`);
  });

  it("keeps a label of exactly the limit", () => {
    // '#p1: ""' is 7 characters
    const label = puzzleChoiceLabel(puzzle("y".repeat(93)));

    expect(label).toBe(`#p1: "${"y".repeat(93)}"`);
    expect(label).toHaveLength(100);
  });
});
