import { describe, it, expect } from "vitest";
import { formatHaiku, formatSummary } from "../report";

const match = { start: 4, end: 7, tokens: ["old", "pond", "frog"] };

describe("report", () => {
  it("should join tokens with a trailing space", () => {
    expect(formatHaiku(match)).toBe("old pond frog ");
  });

  it("should summarize the total", () => {
    expect(formatSummary(0)).toBe("Found 0 haikus.");
    expect(formatSummary(2)).toBe("Found 2 haikus.");
  });
});
