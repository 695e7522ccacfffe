/**
 * File fingerprints for change detection
 *
 * - hash: `sha256:<hex>:<size>:<mtimeMs>`, the content digest plus size and
 *   modification time. Changes on any byte edit and on a touch.
 * - stat: `stat:<size>:<mtimeMs>`. No content read; misses an edit that keeps
 *   the size and lands within the filesystem's timestamp resolution.
 */

import { createHash } from "node:crypto";
import { readFile, stat } from "fs/promises";
import { FingerprintError, errorMessage } from "./errors";
import type { FingerprintStrategy } from "../types/config";

export async function computeFingerprint(
  path: string,
  strategy: FingerprintStrategy = "hash",
): Promise<string> {
  try {
    const stats = await stat(path);
    if (!stats.isFile()) {
      throw new FingerprintError(path, "not a regular file");
    }

    if (strategy === "stat") {
      return `stat:${stats.size}:${stats.mtimeMs}`;
    }

    const content = await readFile(path);
    const digest = createHash("sha256").update(content).digest("hex");
    return `sha256:${digest}:${stats.size}:${stats.mtimeMs}`;
  } catch (error) {
    if (error instanceof FingerprintError) throw error;
    throw new FingerprintError(path, errorMessage(error), { cause: error });
  }
}
