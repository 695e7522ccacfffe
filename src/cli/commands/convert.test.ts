import { describe, expect, it } from "vitest";
import { applyOptions, parseLogLevel } from "./convert";
import { loadDefaultConfig } from "../../utils/load-config";

describe("parseLogLevel", () => {
  it("lowercases levels", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
  });

  it("maps warning and critical to warn and error", () => {
    expect(parseLogLevel("WARNING")).toBe("warn");
    expect(parseLogLevel("critical")).toBe("error");
  });

  it("passes unknown levels through for validation", () => {
    expect(parseLogLevel("Loud")).toBe("loud");
  });
});

describe("applyOptions", () => {
  it("keeps config values when no flags are given", () => {
    const config = loadDefaultConfig();
    expect(applyOptions(config, {})).toEqual(config);
  });

  it("lets flags override config values", () => {
    const config = applyOptions(loadDefaultConfig(), {
      sourceDir: "inbox",
      processedDir: "out",
      incremental: true,
      logLevel: "debug",
      logFile: "run.log",
      registry: "state/registry.json",
      fingerprint: "stat",
    });

    expect(config).toEqual({
      sourceDir: "inbox",
      processedDir: "out",
      incremental: true,
      registry: { filename: "file_registry.json", path: "state/registry.json" },
      fingerprint: { strategy: "stat" },
      logging: { level: "debug", file: "run.log" },
    });
  });
});
