/**
 * Filesystem Utilities
 * Shared filesystem helper functions
 */

import { access, mkdir, rename, rm, writeFile } from "fs/promises";
import { constants } from "node:fs";
import { dirname } from "node:path";

/**
 * Check if a file or directory exists
 *
 * @param path - Path to check
 * @returns True if file/directory exists, false otherwise
 */
export async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a file through a sibling temp file and rename it into place, so
 * readers only ever see the previous or the complete new content.
 * Parent directories are created as needed.
 */
export async function writeFileAtomic(
  filepath: string,
  content: string,
): Promise<void> {
  await mkdir(dirname(filepath), { recursive: true });

  const tmpFile = `${filepath}.tmp`;
  try {
    await writeFile(tmpFile, content, "utf-8");
    await rename(tmpFile, filepath);
  } catch (error) {
    await rm(tmpFile, { force: true });
    throw error;
  }
}
