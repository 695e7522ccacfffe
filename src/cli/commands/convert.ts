/**
 * Convert command - Loads config and runs conversion pipeline
 */

import chalk from "chalk";
import ora from "ora";
import { z } from "zod";
import { DefaultConverter } from "../../converters";
import { loadConfig, Logger, Tracker } from "../../utils";
import { errorMessage } from "../../utils/errors";
import * as modules from "../../modules";
import { LogLevelSchema } from "../../types";
import type { ConversionConfig, ConversionContext } from "../../types";
import type { RunStage } from "../../modules";

const ConvertOptionsSchema = z.object({
  sourceDir: z.string().optional(),
  processedDir: z.string().optional(),
  incremental: z.boolean().optional(),
  logLevel: LogLevelSchema.optional(),
  logFile: z.string().optional(),
  registry: z.string().optional(),
  fingerprint: z.enum(["hash", "stat"]).optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type ConvertOptions = z.infer<typeof ConvertOptionsSchema>;

const LOG_LEVEL_ALIASES: Record<string, string> = {
  warning: "warn",
  critical: "error",
};

/**
 * Case-insensitive log level, accepting `warning` and `critical` as aliases
 */
export function parseLogLevel(value: string): string {
  const level = value.toLowerCase();
  return LOG_LEVEL_ALIASES[level] ?? level;
}

/**
 * CLI flags take precedence over every config file
 */
export function applyOptions(
  config: ConversionConfig,
  options: ConvertOptions,
): ConversionConfig {
  return {
    ...config,
    sourceDir: options.sourceDir ?? config.sourceDir,
    processedDir: options.processedDir ?? config.processedDir,
    incremental: options.incremental ?? config.incremental,
    registry: {
      ...config.registry,
      path: options.registry ?? config.registry.path,
    },
    fingerprint: {
      strategy: options.fingerprint ?? config.fingerprint.strategy,
    },
    logging: {
      level: options.logLevel ?? config.logging.level,
      file: options.logFile ?? config.logging.file,
    },
  };
}

const STAGE_TEXT: Record<RunStage, string> = {
  registry: "Loading registry...",
  scan: "Scanning files...",
  dispatch: "Converting files...",
  persist: "Saving registry...",
};

export async function convertCommand(opts: unknown): Promise<void> {
  const parsed = ConvertOptionsSchema.safeParse(opts);
  if (!parsed.success) {
    console.error(
      chalk.red(
        `Invalid options: ${parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`,
      ),
    );
    process.exit(1);
  }
  const options = parsed.data;

  // Load configuration (default → user → custom), then apply CLI flags
  const { config: loaded, errors } = await loadConfig(options.config);
  const config = applyOptions(loaded, options);

  const logger = new Logger({
    level: config.logging.level,
    file: config.logging.file,
  });
  const tracker = new Tracker();

  for (const err of errors) {
    logger.warn(`Ignoring config file '${err.path}': ${errorMessage(err.error)}`);
    tracker.trackError(err.path, err.error, "resource");
  }

  logger.info(`Source directory: ${config.sourceDir}`);
  logger.info(`Processed directory: ${config.processedDir}`);
  logger.info(`Incremental: ${config.incremental}`);

  const ctx: ConversionContext = {
    config,
    converter: new DefaultConverter(),
    logger,
    tracker,
    verbose: options.verbose,
  };

  // Progress lines and the spinner would overwrite each other
  const spinner = ora({
    text: "Initializing...",
    indent: 2,
    isEnabled: logger.enabled("info") ? false : undefined,
  }).start();

  try {
    await modules.run(ctx, (stage) => {
      spinner.text = STAGE_TEXT[stage];
    });

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx);
  } catch (error) {
    spinner.fail("Conversion failed");
    logger.error(errorMessage(error), error);
    process.exit(1);
  }
}
