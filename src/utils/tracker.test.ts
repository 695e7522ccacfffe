import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Tracker } from "./tracker";
import {
  ConversionError,
  FingerprintError,
  RegistryCorruptError,
  WriteError,
} from "./errors";

describe("Tracker", () => {
  describe("counters", () => {
    it("summarizes converted, skipped and failed files", () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(4);
      tracker.incrementConverted();
      tracker.incrementConverted();
      tracker.incrementSkipped();
      tracker.incrementFailed();

      expect(tracker.getSummary()).toEqual({
        converted: 2,
        skipped: 1,
        failed: 1,
      });
      expect(tracker.getStats().totalFiles).toBe(4);
    });
  });

  describe("trackError", () => {
    it("maps file errors by class", () => {
      const tracker = new Tracker();
      tracker.trackError("/a", new FingerprintError("/a", "gone"), "file");
      tracker.trackError("/b", new ConversionError("/b", "corrupt"), "file");
      tracker.trackError("/c", new WriteError("/c.md", "disk full"), "file");

      expect(tracker.getIssues("file").map((i) => i.reason)).toEqual([
        "fingerprint-error",
        "conversion-error",
        "write-error",
      ]);
      expect(tracker.getIssues("file")[1]).toEqual({
        type: "file",
        path: "/b",
        reason: "conversion-error",
        details: "Cannot convert '/b': corrupt",
      });
    });

    it("maps a corrupt registry by its cause", () => {
      const tracker = new Tracker();
      const syntax = new SyntaxError("Unexpected token");
      tracker.trackError(
        "/reg.json",
        new RegistryCorruptError("/reg.json", syntax.message, { cause: syntax }),
        "resource",
      );

      expect(tracker.getIssues("resource")).toEqual([
        {
          type: "resource",
          path: "/reg.json",
          reason: "invalid-json",
          details: "Registry '/reg.json' is unreadable: Unexpected token",
        },
      ]);
    });

    it("maps schema failures to schema-validation", () => {
      const tracker = new Tracker();
      const result = z.object({ sourceDir: z.string() }).safeParse({});
      if (result.success) throw new Error("expected a validation failure");
      tracker.trackError("/config.json", result.error, "resource");

      expect(tracker.getIssues("resource")[0].reason).toBe("schema-validation");
    });

    it("maps resource writes to write-error", () => {
      const tracker = new Tracker();
      tracker.trackError("/reg.json", new Error("EACCES"), "resource", "write");

      expect(tracker.getIssues("resource")[0].reason).toBe("write-error");
    });

    it("keeps issue types apart", () => {
      const tracker = new Tracker();
      tracker.trackError("/a", new ConversionError("/a", "x"), "file");
      tracker.trackError("/r", new Error("y"), "resource");

      expect(tracker.getIssues()).toHaveLength(2);
      expect(tracker.getIssues("file")).toHaveLength(1);
      expect(tracker.getIssues("resource")).toHaveLength(1);
    });
  });

  describe("exportStats", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "any2md-tracker-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("writes counts and grouped issues to stats.json", async () => {
      const tracker = new Tracker();
      tracker.setTotalFiles(2);
      tracker.incrementConverted();
      tracker.incrementFailed();
      tracker.trackError("/b.pdf", new ConversionError("/b.pdf", "corrupt"), "file");

      const outputDir = join(dir, "processed");
      await tracker.exportStats(outputDir);

      const exported = JSON.parse(
        await readFile(join(outputDir, "stats.json"), "utf-8"),
      );
      expect(exported.summary).toMatchObject({
        totalFiles: 2,
        convertedFiles: 1,
        skippedFiles: 0,
        failedFiles: 1,
      });
      expect(exported.issues).toEqual({
        file: {
          "conversion-error": [
            {
              type: "file",
              path: "/b.pdf",
              reason: "conversion-error",
              details: "Cannot convert '/b.pdf': corrupt",
            },
          ],
        },
        resource: {},
      });
    });
  });
});
