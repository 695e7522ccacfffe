/**
 * Runner Module
 * Load registry → scan → dispatch → persist registry
 */

import path from "node:path";
import { Registry } from "../utils/registry";
import { resolveRegistryPath } from "../utils/load-config";
import { errorMessage } from "../utils/errors";
import { scan } from "./scanner";
import { dispatch } from "./dispatcher";
import type { ConversionContext, RunSummary } from "../types";

export type RunStage = "registry" | "scan" | "dispatch" | "persist";

/**
 * Loads the registry into context
 * A corrupt registry degrades to an empty one (full reconversion).
 */
export async function loadRegistry(ctx: ConversionContext): Promise<void> {
  const { config, logger, tracker } = ctx;
  const registryPath = path.resolve(resolveRegistryPath(config));

  const { registry, error, dropped } = await Registry.load(registryPath);

  if (error) {
    logger.warn(`${error.message}; starting with an empty registry`);
    tracker.trackError(registryPath, error, "resource");
  }
  if (dropped.length > 0) {
    logger.warn(
      `Ignored ${dropped.length} invalid registry entr${dropped.length === 1 ? "y" : "ies"}`,
    );
  }
  logger.debug(`Loaded ${registry.size} registry entries from '${registryPath}'`);

  ctx.registry = registry;
}

async function persistRegistry(ctx: ConversionContext): Promise<void> {
  const { registry, logger, tracker } = ctx;
  if (!registry) return;

  try {
    await registry.save();
    logger.debug(`Saved registry to '${registry.filepath}'`);
  } catch (error) {
    logger.error(`Could not save registry: ${errorMessage(error)}`, error);
    tracker.trackError(registry.filepath, error, "resource", "write");
  }
}

/**
 * Run the whole pipeline for one invocation
 * Only a ScanError (missing or unreadable source directory) rejects; per-file
 * failures end up in the summary.
 */
export async function run(
  ctx: ConversionContext,
  onStage?: (stage: RunStage) => void,
): Promise<RunSummary> {
  onStage?.("registry");
  await loadRegistry(ctx);

  onStage?.("scan");
  await scan(ctx);

  onStage?.("dispatch");
  await dispatch(ctx);

  onStage?.("persist");
  await persistRegistry(ctx);

  const summary = ctx.tracker.getSummary();
  ctx.logger.info(
    `Done: ${summary.converted} converted, ${summary.skipped} skipped, ${summary.failed} failed`,
  );
  return summary;
}
