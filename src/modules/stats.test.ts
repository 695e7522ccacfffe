import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import chalk from "chalk";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { formatDuration, stats } from "./stats";
import { Logger, Tracker, loadDefaultConfig } from "../utils";
import type { ConversionContext, FileOutcome } from "../types";
import type { DocumentConverter } from "../converters/types";

const unusedConverter: DocumentConverter = {
  async convert() {
    throw new Error("stats tests never convert");
  },
};

const outcomes: FileOutcome[] = [
  { sourcePath: "/src/a.txt", relativePath: "a.txt", state: "converted", reason: "new" },
  { sourcePath: "/src/b.txt", relativePath: "b.txt", state: "skipped" },
  {
    sourcePath: "/src/sub/c.pdf",
    relativePath: "sub/c.pdf",
    state: "converted",
    reason: "changed",
  },
];

describe("formatDuration", () => {
  it("formats milliseconds, seconds and minutes", () => {
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.50s");
    expect(formatDuration(125_000)).toBe("2m 5s");
  });
});

describe("stats", () => {
  let dir: string;
  let level: typeof chalk.level;
  let lines: string[];

  function context(verbose: boolean): ConversionContext {
    const tracker = new Tracker();
    tracker.setTotalFiles(3);
    tracker.incrementConverted();
    tracker.incrementSkipped();
    tracker.incrementConverted();
    return {
      config: { ...loadDefaultConfig(), processedDir: dir },
      converter: unusedConverter,
      logger: Logger.silent(),
      tracker,
      verbose,
      outcomes,
    };
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "any2md-stats-"));
    level = chalk.level;
    chalk.level = 0;
    lines = [];
    vi.spyOn(console, "log").mockImplementation((line: string) => {
      lines.push(line);
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    chalk.level = level;
    await rm(dir, { recursive: true, force: true });
  });

  it("lists converted files with their reason when verbose", async () => {
    await stats(context(true));

    const start = lines.indexOf("\n  Converted");
    expect(start).toBeGreaterThan(-1);
    expect(lines.slice(start + 1, start + 3)).toEqual([
      "      · a.txt (new)",
      "      · sub/c.pdf (changed)",
    ]);
  });

  it("leaves the file list out otherwise", async () => {
    await stats(context(false));

    expect(lines).not.toContain("\n  Converted");
    expect(lines).not.toContain("      · a.txt (new)");
  });

  it("writes stats.json into the processed directory", async () => {
    await stats(context(false));

    const exported = JSON.parse(await readFile(join(dir, "stats.json"), "utf-8"));
    expect(exported.summary).toMatchObject({
      totalFiles: 3,
      convertedFiles: 2,
      skippedFiles: 1,
      failedFiles: 0,
    });
  });
});
