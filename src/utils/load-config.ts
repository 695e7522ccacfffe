/**
 * Configuration Loader
 * Loads and merges configuration from defaults, user config and a custom file
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { existsSync } from "fs";
import envPaths from "env-paths";
import defaults from "../config/default.json";
import type {
  ConfigError,
  ConversionConfig,
  PartialConversionConfig,
} from "../types/config";
import {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
} from "../types/config";

// Get OS-specific paths using env-paths (follows XDG spec on Linux)
const paths = envPaths("any2md", { suffix: "" });

/**
 * Get the OS-specific config directory
 * - Linux: $XDG_CONFIG_HOME/any2md or ~/.config/any2md
 * - macOS: ~/Library/Preferences/any2md
 * - Windows: %APPDATA%\any2md
 */
function getConfigDirectory(): string {
  return paths.config;
}

/**
 * Get the path where user config should be stored
 */
export function getUserConfigPath(): string {
  return join(getConfigDirectory(), "config.json");
}

/**
 * Load default configuration with Zod validation
 */
export function loadDefaultConfig(): ConversionConfig {
  return ConversionConfigSchema.parse(defaults);
}

async function loadPartialConfig(
  configPath: string,
): Promise<PartialConversionConfig> {
  const content = await readFile(configPath, "utf-8");
  return PartialConversionConfigSchema.parse(JSON.parse(content));
}

export function mergeConfig(
  base: ConversionConfig,
  override: PartialConversionConfig,
): ConversionConfig {
  return {
    ...base,
    ...override,
    registry: { ...base.registry, ...override.registry },
    fingerprint: { ...base.fingerprint, ...override.fingerprint },
    logging: { ...base.logging, ...override.logging },
  };
}

interface LoadConfigResult {
  config: ConversionConfig;
  errors: ConfigError[];
}

/**
 * Load and merge configuration
 * Priority: custom path > user config > default config
 * A broken user or custom file is reported in `errors` and skipped.
 */
export async function loadConfig(
  custom?: string,
  userConfigPath: string = getUserConfigPath(),
): Promise<LoadConfigResult> {
  let config = loadDefaultConfig();
  const errors: ConfigError[] = [];

  if (existsSync(userConfigPath)) {
    try {
      config = mergeConfig(config, await loadPartialConfig(userConfigPath));
    } catch (error) {
      errors.push({ path: userConfigPath, error });
    }
  }

  if (custom) {
    try {
      config = mergeConfig(config, await loadPartialConfig(custom));
    } catch (error) {
      errors.push({ path: custom, error });
    }
  }

  return { config, errors };
}

/**
 * Registry location: explicit path, or the registry filename inside the
 * processed directory
 */
export function resolveRegistryPath(config: ConversionConfig): string {
  return config.registry.path ?? join(config.processedDir, config.registry.filename);
}
