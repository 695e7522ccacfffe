import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ZodError } from "zod";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  resolveRegistryPath,
} from "./load-config";

describe("loadDefaultConfig", () => {
  it("returns the built-in defaults", () => {
    expect(loadDefaultConfig()).toEqual({
      sourceDir: "source",
      processedDir: "processed",
      incremental: false,
      registry: { filename: "file_registry.json", path: null },
      fingerprint: { strategy: "hash" },
      logging: { level: "info", file: null },
    });
  });
});

describe("mergeConfig", () => {
  it("overrides top-level and nested values independently", () => {
    const merged = mergeConfig(loadDefaultConfig(), {
      incremental: true,
      registry: { path: "/state/registry.json" },
      logging: { level: "debug" },
    });

    expect(merged.incremental).toBe(true);
    expect(merged.sourceDir).toBe("source");
    expect(merged.registry).toEqual({
      filename: "file_registry.json",
      path: "/state/registry.json",
    });
    expect(merged.logging).toEqual({ level: "debug", file: null });
  });
});

describe("resolveRegistryPath", () => {
  it("defaults to the registry filename inside the processed directory", () => {
    const config = { ...loadDefaultConfig(), processedDir: "/out" };
    expect(resolveRegistryPath(config)).toBe(join("/out", "file_registry.json"));
  });

  it("prefers an explicit path", () => {
    const config = mergeConfig(loadDefaultConfig(), {
      registry: { path: "/state/registry.json" },
    });
    expect(resolveRegistryPath(config)).toBe("/state/registry.json");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "any2md-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when no user or custom config exists", async () => {
    const { config, errors } = await loadConfig(
      undefined,
      join(dir, "missing.json"),
    );

    expect(config).toEqual(loadDefaultConfig());
    expect(errors).toEqual([]);
  });

  it("applies user config, then custom config", async () => {
    const userPath = join(dir, "user.json");
    const customPath = join(dir, "custom.json");
    await writeFile(
      userPath,
      JSON.stringify({ sourceDir: "docs", fingerprint: { strategy: "stat" } }),
    );
    await writeFile(customPath, JSON.stringify({ sourceDir: "inbox" }));

    const { config, errors } = await loadConfig(customPath, userPath);

    expect(errors).toEqual([]);
    expect(config.sourceDir).toBe("inbox");
    expect(config.fingerprint.strategy).toBe("stat");
  });

  it("reports an invalid custom config and keeps the rest", async () => {
    const customPath = join(dir, "custom.json");
    await writeFile(
      customPath,
      JSON.stringify({ fingerprint: { strategy: "md5" } }),
    );

    const { config, errors } = await loadConfig(
      customPath,
      join(dir, "missing.json"),
    );

    expect(config.fingerprint.strategy).toBe("hash");
    expect(errors).toHaveLength(1);
    expect(errors[0].path).toBe(customPath);
    expect(errors[0].error).toBeInstanceOf(ZodError);
  });

  it("reports a custom config that is not JSON", async () => {
    const customPath = join(dir, "custom.json");
    await writeFile(customPath, "sourceDir = docs");

    const { errors } = await loadConfig(customPath, join(dir, "missing.json"));

    expect(errors[0].error).toBeInstanceOf(SyntaxError);
  });
});
