/**
 * Dispatcher Module
 * Decides per file whether it needs conversion, converts, writes the output
 * and records the result in the registry. Files are handled one at a time;
 * a failure is recorded and the loop moves on.
 */

import { computeFingerprint } from "../utils/fingerprint";
import { fileExists, writeFileAtomic } from "../utils/fs";
import { ConversionError, WriteError, errorMessage } from "../utils/errors";
import type { ConversionResult } from "../converters/types";
import type { Registry } from "../utils/registry";
import type {
  ConversionContext,
  ConversionReason,
  FileDescriptor,
  FileOutcome,
  RegistryEntry,
} from "../types";

// ============================================================================
// Decision
// ============================================================================

export interface ConversionDecisionInput {
  incremental: boolean;
  entry: RegistryEntry | undefined;
  fingerprint: string;
  outputExists: boolean;
}

/**
 * Why a file must be converted, or null when it is up to date
 */
export function decideConversion({
  incremental,
  entry,
  fingerprint,
  outputExists,
}: ConversionDecisionInput): ConversionReason | null {
  if (!incremental) return "forced";
  if (!entry) return "new";
  if (entry.fingerprint !== fingerprint) return "changed";
  if (!outputExists) return "output-missing";
  return null;
}

// ============================================================================
// Main Dispatcher Function
// ============================================================================

/**
 * Reads from context:
 * - files (scanner)
 * - registry (runner)
 *
 * Writes to context:
 * - outcomes: one FileOutcome per file, in scan order
 */
export async function dispatch(ctx: ConversionContext): Promise<void> {
  if (!ctx.files || !ctx.registry) {
    throw new Error("Scanner and registry must be ready before dispatch");
  }

  const { config, converter, logger, tracker } = ctx;
  const files: FileDescriptor[] = ctx.files;
  const registry: Registry = ctx.registry;
  const outcomes: FileOutcome[] = [];

  function fail(file: FileDescriptor, error: unknown, reason?: ConversionReason): void {
    logger.error(`Failed '${file.relativePath}': ${errorMessage(error)}`, error);
    tracker.incrementFailed();
    tracker.trackError(file.sourcePath, error, "file");
    outcomes.push({
      sourcePath: file.sourcePath,
      relativePath: file.relativePath,
      state: "failed",
      reason,
      error: errorMessage(error),
    });
  }

  async function persistRegistry(): Promise<void> {
    try {
      await registry.save();
    } catch (error) {
      logger.warn(`Could not save registry: ${errorMessage(error)}`);
      tracker.trackError(registry.filepath, error, "resource", "write");
    }
  }

  for (const file of files) {
    let fingerprint: string;
    try {
      fingerprint = await computeFingerprint(
        file.sourcePath,
        config.fingerprint.strategy,
      );
    } catch (error) {
      fail(file, error);
      continue;
    }

    const entry = registry.get(file.sourcePath);
    // An entry pointing at another processed dir counts as missing output
    const outputExists =
      entry !== undefined &&
      entry.outputPath === file.outputPath &&
      (await fileExists(entry.outputPath));
    const reason = decideConversion({
      incremental: config.incremental,
      entry,
      fingerprint,
      outputExists,
    });

    if (reason === null) {
      logger.debug(`Up to date: ${file.relativePath}`);
      tracker.incrementSkipped();
      outcomes.push({
        sourcePath: file.sourcePath,
        relativePath: file.relativePath,
        state: "skipped",
      });
      continue;
    }

    logger.debug(`Converting ${file.relativePath} (${reason})`);
    let result: ConversionResult;
    try {
      result = await converter.convert(file.sourcePath);
    } catch (error) {
      // Backends report failures as results; treat a throw the same way
      fail(
        file,
        new ConversionError(file.sourcePath, errorMessage(error), { cause: error }),
        reason,
      );
      continue;
    }
    if (!result.ok) {
      fail(file, result.error, reason);
      continue;
    }

    try {
      await writeFileAtomic(file.outputPath, result.markdown);
    } catch (error) {
      fail(
        file,
        new WriteError(file.outputPath, errorMessage(error), { cause: error }),
        reason,
      );
      continue;
    }

    registry.upsert({
      sourcePath: file.sourcePath,
      fingerprint,
      outputPath: file.outputPath,
      lastProcessedAt: new Date().toISOString(),
    });
    await persistRegistry();

    logger.info(`Converted ${file.relativePath} -> ${file.outputPath}`);
    tracker.incrementConverted();
    outcomes.push({
      sourcePath: file.sourcePath,
      relativePath: file.relativePath,
      state: "converted",
      reason,
    });
  }

  ctx.outcomes = outcomes;
}
