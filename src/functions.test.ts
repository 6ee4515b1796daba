import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { all, first, match, matches } from "./functions";
import { createTree } from "./test-utils";

describe("one-shot functions", () => {
  let tempDir: string;
  let high: string;
  let low: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "searchscope-functions-"));
    high = path.join(tempDir, "high");
    low = path.join(tempDir, "low");
    await createTree(high, { "settings.json": "" });
    await createTree(low, { "settings.json": "", "theme.json": "" });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("finds the first match", () => {
    expect(first("theme.json", [["high", high], ["low", low]])).toBe(path.join(low, "theme.json"));
    expect(first("*.yaml", [high, low])).toBeNull();
  });

  it("auto-names bare entries", () => {
    expect(match("theme.json", [null, high, low])?.scope).toBe("dir1");
  });

  it("collects every match", () => {
    expect(all("*.json", [high, low])).toEqual([
      path.join(high, "settings.json"),
      path.join(low, "theme.json"),
    ]);
    expect(matches("*.json", [["high", high], ["low", low]], { dedupe: false }).map((m) => m.scope)).toEqual([
      "high",
      "low",
      "low",
    ]);
  });
});
