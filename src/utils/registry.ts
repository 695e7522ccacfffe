/**
 * Registry Store
 * Persistent map of source path -> last successful conversion
 */

import { readFile } from "fs/promises";
import { z } from "zod";
import { fileExists, writeFileAtomic } from "./fs";
import { RegistryCorruptError, errorMessage } from "./errors";
import { RegistryEntrySchema } from "../types/files";
import type { RegistryData, RegistryEntry } from "../types/files";

// Top level must be a plain object; entries are validated one by one
const RegistryFileSchema = z.record(z.string(), z.unknown());

export interface RegistryLoadResult {
  registry: Registry;
  // Set when the file existed but could not be used at all
  error?: RegistryCorruptError;
  // Keys of entries that failed validation and were left out
  dropped: string[];
}

export class Registry {
  private entries = new Map<string, RegistryEntry>();
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(
    readonly filepath: string,
    data: RegistryData = {},
  ) {
    for (const [sourcePath, entry] of Object.entries(data)) {
      this.entries.set(sourcePath, { ...entry, sourcePath });
    }
  }

  /**
   * Load the registry from disk
   * A missing file gives an empty registry. An unreadable or malformed file
   * also gives an empty registry, with the reason in `error`.
   */
  static async load(filepath: string): Promise<RegistryLoadResult> {
    if (!(await fileExists(filepath))) {
      return { registry: new Registry(filepath), dropped: [] };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(filepath, "utf-8"));
    } catch (error) {
      return {
        registry: new Registry(filepath),
        error: new RegistryCorruptError(filepath, errorMessage(error), {
          cause: error,
        }),
        dropped: [],
      };
    }

    const parsed = RegistryFileSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        registry: new Registry(filepath),
        error: new RegistryCorruptError(filepath, "expected a JSON object", {
          cause: parsed.error,
        }),
        dropped: [],
      };
    }

    const data: RegistryData = {};
    const dropped: string[] = [];
    for (const [sourcePath, value] of Object.entries(parsed.data)) {
      // The key is authoritative; older entries may omit sourcePath
      const candidate =
        typeof value === "object" && value !== null
          ? { ...value, sourcePath }
          : value;
      const entry = RegistryEntrySchema.safeParse(candidate);
      if (entry.success) {
        data[sourcePath] = entry.data;
      } else {
        dropped.push(sourcePath);
      }
    }

    return { registry: new Registry(filepath, data), dropped };
  }

  get size(): number {
    return this.entries.size;
  }

  get(sourcePath: string): RegistryEntry | undefined {
    return this.entries.get(sourcePath);
  }

  has(sourcePath: string): boolean {
    return this.entries.has(sourcePath);
  }

  /**
   * Insert or replace the entry for `entry.sourcePath`
   */
  upsert(entry: RegistryEntry): void {
    this.entries.set(entry.sourcePath, { ...entry });
  }

  toJSON(): RegistryData {
    const data: RegistryData = {};
    for (const key of [...this.entries.keys()].sort()) {
      const entry = this.entries.get(key);
      if (entry) data[key] = entry;
    }
    return data;
  }

  /**
   * Persist the whole registry atomically
   * Saves run one after another; a failed save rejects its own promise
   * without blocking later saves.
   */
  save(): Promise<void> {
    const next = this.saveQueue.then(() =>
      writeFileAtomic(this.filepath, JSON.stringify(this.toJSON(), null, 2)),
    );
    this.saveQueue = next.catch(() => undefined);
    return next;
  }
}
