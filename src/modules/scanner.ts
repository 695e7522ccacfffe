/**
 * Scanner Module
 * Discovers convertible documents and maps each to its output path
 */

import glob from "fast-glob";
import { access, stat } from "fs/promises";
import { constants } from "node:fs";
import path from "node:path";
import { ScanError, errorMessage } from "../utils/errors";
import { mapOutputPath, toPosixRelative } from "../utils/output-path";
import { ALL_SUPPORTED_EXTENSIONS } from "../types/files";
import type { ConversionContext, FileDescriptor } from "../types";

export interface ScanOptions {
  // Directories (absolute) to leave out, e.g. a processed dir inside the source
  exclude?: string[];
}

const EXTENSION_PATTERN = `**/*.{${ALL_SUPPORTED_EXTENSIONS.map((ext) => ext.slice(1)).join(",")}}`;

async function assertReadableDirectory(directory: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(directory)).isDirectory();
  } catch (error) {
    throw new ScanError(directory, "directory does not exist", { cause: error });
  }
  if (!isDirectory) {
    throw new ScanError(directory, "not a directory");
  }

  try {
    await access(directory, constants.R_OK | constants.X_OK);
  } catch (error) {
    throw new ScanError(directory, errorMessage(error), { cause: error });
  }
}

/**
 * Ignore pattern for `directory` when it lies inside `root`
 */
function ignorePattern(root: string, directory: string): string | null {
  const relative = path.relative(root, directory);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  return `${glob.escapePath(relative.split(path.sep).join("/"))}/**`;
}

/**
 * A symlink counts when its target is a regular file; dangling links do not
 */
async function isLinkedFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch {
    return false;
  }
}

/**
 * List supported documents under `sourceDir`, sorted by relative path
 *
 * Dotfiles are included. Symlinked directories are not descended into, so
 * link cycles cannot recurse; symlinked files are kept. Unreadable
 * subdirectories are skipped.
 */
export async function scanDirectory(
  sourceDir: string,
  options: ScanOptions = {},
): Promise<string[]> {
  const root = path.resolve(sourceDir);
  await assertReadableDirectory(root);

  const ignore = (options.exclude ?? [])
    .map((dir) => ignorePattern(root, path.resolve(dir)))
    .filter((pattern): pattern is string => pattern !== null);

  const entries = await glob(EXTENSION_PATTERN, {
    cwd: root,
    dot: true,
    onlyFiles: false,
    objectMode: true,
    caseSensitiveMatch: false,
    followSymbolicLinks: false,
    suppressErrors: true,
    ignore,
  });

  const relativePaths: string[] = [];
  for (const entry of entries) {
    if (
      entry.dirent.isFile() ||
      (entry.dirent.isSymbolicLink() &&
        (await isLinkedFile(path.join(root, entry.path))))
    ) {
      relativePaths.push(entry.path);
    }
  }

  return relativePaths.sort().map((relative) => path.join(root, relative));
}

/**
 * Scans the source directory and populates context
 *
 * Writes to context:
 * - files: one descriptor per supported document, in processing order
 */
export async function scan(ctx: ConversionContext): Promise<void> {
  const { config, logger, tracker } = ctx;
  const sourceDir = path.resolve(config.sourceDir);
  const processedDir = path.resolve(config.processedDir);

  const sourcePaths = await scanDirectory(sourceDir, {
    exclude: [processedDir],
  });

  const files: FileDescriptor[] = sourcePaths.map((sourcePath) => ({
    sourcePath,
    relativePath: toPosixRelative(sourceDir, sourcePath),
    outputPath: mapOutputPath(sourceDir, processedDir, sourcePath),
  }));

  tracker.setTotalFiles(files.length);
  logger.info(`Found ${files.length} file(s) in '${sourceDir}'`);

  ctx.files = files;
}
