/**
 * Elapsed-time rendering used for `timer.duration`.
 */
import { describe, it, expect } from "vitest";
import { formatElapsed } from "@/modules/marathon/elapsed";

describe("formatElapsed", () => {
  it("renders hours, minutes and seconds", () => {
    expect(formatElapsed(0)).toBe("0:00:00");
    expect(formatElapsed(3_723_000)).toBe("1:02:03");
    expect(formatElapsed(10 * 3_600_000)).toBe("10:00:00");
  });

  it("adds microseconds only when there is a sub-second part", () => {
    expect(formatElapsed(1_500)).toBe("0:00:01.500000");
    expect(formatElapsed(61_007)).toBe("0:01:01.007000");
  });

  it("prefixes whole days", () => {
    expect(formatElapsed(86_400_000 + 5_000)).toBe("1 day, 0:00:05");
    expect(formatElapsed(2 * 86_400_000 + 3_600_000)).toBe("2 days, 1:00:00");
  });

  it("rounds to the millisecond and clamps negative spans", () => {
    expect(formatElapsed(999.6)).toBe("0:00:01");
    expect(formatElapsed(-5_000)).toBe("0:00:00");
  });
});
