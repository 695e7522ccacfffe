/**
 * Stats Module
 * Exports stats.json and prints the run summary
 */

import path from "node:path";
import chalk from "chalk";
import { errorMessage } from "../utils/errors";
import type {
  ConversionContext,
  FileIssue,
  FileOutcome,
  ProcessingStats,
  ResourceIssue,
} from "../types";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const empty = width - filled;
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(empty))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display processing statistics to console
 */
export async function stats(ctx: ConversionContext): Promise<void> {
  const { config, tracker, logger, verbose, outcomes } = ctx;

  const processedDir = path.resolve(config.processedDir);
  try {
    await tracker.exportStats(processedDir);
  } catch (error) {
    logger.warn(`Could not write stats.json: ${errorMessage(error)}`);
  }

  const stats = tracker.getStats();
  const fileIssues = tracker.getIssues("file");
  const resourceIssues = tracker.getIssues("resource");

  const statusIcon =
    stats.failedFiles > 0
      ? chalk.red("✖")
      : resourceIssues.length > 0
        ? chalk.yellow("◆")
        : chalk.green("✔");

  console.log("");
  console.log(
    `  ${statusIcon} ${chalk.bold("Conversion Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(stats.duration))}`,
  );

  displayFilesSection(stats);
  if (verbose && outcomes) {
    displayConvertedFiles(outcomes);
  }
  displayIssuesSection(fileIssues, resourceIssues, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayFilesSection(stats: ProcessingStats): void {
  console.log(sectionHeader("Files"));

  // Up-to-date files count as done
  const done = stats.convertedFiles + stats.skippedFiles;
  console.log(`   ${progressBar(done, stats.totalFiles)}`);

  console.log(
    statRow(chalk.green("◉"), "Converted", stats.convertedFiles, chalk.green),
  );

  if (stats.skippedFiles > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Up to date", stats.skippedFiles, chalk.cyan),
    );
  }

  if (stats.failedFiles > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", stats.failedFiles, chalk.red));
  }
}

function displayConvertedFiles(outcomes: FileOutcome[]): void {
  const converted = outcomes.filter((outcome) => outcome.state === "converted");
  if (converted.length === 0) return;

  console.log(sectionHeader("Converted"));
  for (const outcome of converted) {
    console.log(
      `      ${chalk.dim("·")} ${outcome.relativePath} ${chalk.dim(`(${outcome.reason ?? "forced"})`)}`,
    );
  }
}

function displayIssuesSection(
  fileIssues: FileIssue[],
  resourceIssues: ResourceIssue[],
  verbose?: boolean,
): void {
  if (fileIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (fileIssues.length > 0) {
    console.log(
      statRow(chalk.red("✖"), "Files failed", fileIssues.length, chalk.red),
    );
    if (verbose) {
      for (const issue of fileIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
        if (issue.details) {
          console.log(`        ${chalk.dim(issue.details)}`);
        }
      }
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(
        chalk.yellow("✖"),
        "Resources failed",
        resourceIssues.length,
        chalk.yellow,
      ),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path} ${chalk.dim(`(${issue.reason})`)}`);
      }
    }
  }
}
