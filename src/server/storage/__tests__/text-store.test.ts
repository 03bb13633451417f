import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import { loadTokens } from "../text-store";

describe("text store", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "haiku-text-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should tokenize the file line by line", async () => {
    const file = path.join(dir, "text.txt");
    await writeFile(file, "old pond\nA frog  jumps.\n", "utf8");
    expect(await loadTokens(file)).toEqual(["old", "pond", "A", "frog", "jumps."]);
  });

  it("should give no tokens when the file is missing", async () => {
    expect(await loadTokens(path.join(dir, "missing.txt"))).toEqual([]);
  });
});
