import { describe, it, expect } from "vitest";
import { HaikuScanner, type HaikuMatch } from "../haiku-scanner";
import { SyllableEstimator, type DictionaryEntry } from "../syllable-estimator";
import { formatHaiku } from "../report";

const POND: DictionaryEntry[] = [
  ["an", 1], ["old", 1], ["silent", 2], ["pond", 1], ["a", 1],
  ["frog", 1], ["jumps", 1], ["into", 2], ["the", 1],
  ["splash", 1], ["silence", 2], ["again", 2], ["and", 1],
];

const POND_TEXT = "An old silent pond A frog jumps into the pond Splash silence again";

const scannerWith = (seed: DictionaryEntry[]) => new HaikuScanner(new SyllableEstimator(seed));

const taps = (n: number): string[] => Array.from({ length: n }, () => "tap");

describe("HaikuScanner", () => {
  it("should report a 5-7-5 run closed by the following word", () => {
    const tokens = `${POND_TEXT} and`.split(" ");
    const report = scannerWith(POND).run(tokens);

    expect(report.total).toBe(1);
    expect(report.haikus).toHaveLength(1);
    expect(report.haikus[0].start).toBe(0);
    expect(report.haikus[0].end).toBe(13);
    expect(formatHaiku(report.haikus[0])).toBe(`${POND_TEXT} `);
  });

  it("should not report a run that reaches the end of the text", () => {
    const report = scannerWith(POND).run(POND_TEXT.split(" "));
    expect(report.total).toBe(0);
    expect(report.haikus).toEqual([]);
  });

  it("should restart at the next token so overlapping runs are all reported", () => {
    // "the" is unseeded and estimates to zero syllables
    const tokens = ["3rd", "--", "the", ...taps(18)];
    const report = scannerWith([["tap", 1]]).run(tokens);

    expect(report.total).toBe(2);
    expect(report.haikus.map(h => [h.start, h.end])).toEqual([[2, 20], [3, 20]]);
    expect(report.haikus[0].tokens[0]).toBe("the");
    expect(report.haikus[1].tokens).toEqual(taps(17));
  });

  it("should stop growing a window at a non-word token", () => {
    const scanner = scannerWith([["tap", 1]]);
    expect(scanner.run([...taps(17), "well-known", "tap"]).total).toBe(0);
    expect(scanner.run([...taps(8), "3rd", ...taps(10)]).total).toBe(0);
    expect(scanner.run([...taps(16), "tap.", "tap"]).total).toBe(0);
  });

  it("should let zero-syllable words extend a window", () => {
    const tokens = [...taps(17), "the", "tap"];
    const report = scannerWith([["tap", 1]]).run(tokens);

    expect(report.total).toBe(1);
    expect(report.haikus[0].start).toBe(0);
    expect(report.haikus[0].end).toBe(18);
    expect(report.haikus[0].tokens[17]).toBe("the");
  });

  it("should find nothing when no 5-7-5 partition exists", () => {
    const tokens = Array.from({ length: 20 }, () => "silent");
    const report = scannerWith([["silent", 2]]).run(tokens);
    expect(report.total).toBe(0);
  });

  it("should find nothing in an empty stream", () => {
    expect(scannerWith([]).run([]).total).toBe(0);
  });

  it("should accept any syllable counter", () => {
    const scanner = new HaikuScanner({ count: () => 1 });
    const report = scanner.run(taps(19));
    expect(report.haikus.map(h => h.start)).toEqual([0, 1]);
  });

  it("should emit each match as it is found", () => {
    const scanner = scannerWith(POND);
    const seen: HaikuMatch[] = [];
    scanner.on("haiku", (match: HaikuMatch) => seen.push(match));

    const report = scanner.run(`${POND_TEXT} and`.split(" "));
    expect(seen).toEqual(report.haikus);
  });

  it("should yield matches lazily and return the total", () => {
    const matches = scannerWith([["tap", 1]]).scan(taps(19));

    const first = matches.next();
    expect(first.done).toBe(false);
    const second = matches.next();
    expect(second.done).toBe(false);
    const last = matches.next();
    expect(last).toEqual({ done: true, value: 2 });
  });
});
