/**
 * File-related type definitions
 */

import { z } from "zod";

/**
 * Extensions the scanner picks up, grouped by how they are converted.
 * Matching is case-insensitive.
 */
export const SUPPORTED_EXTENSIONS = {
  text: [".txt", ".md", ".markdown"],
  office: [".ppt", ".pptx", ".doc", ".docx"],
  pdf: [".pdf"],
} as const;

export type SupportedExtension =
  (typeof SUPPORTED_EXTENSIONS)[keyof typeof SUPPORTED_EXTENSIONS][number];

export const ALL_SUPPORTED_EXTENSIONS: readonly SupportedExtension[] = [
  ...SUPPORTED_EXTENSIONS.text,
  ...SUPPORTED_EXTENSIONS.office,
  ...SUPPORTED_EXTENSIONS.pdf,
];

export interface FileDescriptor {
  sourcePath: string; // Absolute path to the source document
  relativePath: string; // Relative path from the source root (POSIX separators)
  outputPath: string; // Target markdown file path
}

// ============================================================================
// Registry
// ============================================================================

/**
 * A single registry entry. Unknown fields written by newer versions are
 * stripped on load.
 */
export const RegistryEntrySchema = z.object({
  sourcePath: z.string(),
  fingerprint: z.string(),
  outputPath: z.string(),
  lastProcessedAt: z.string(),
});

export type RegistryEntry = z.infer<typeof RegistryEntrySchema>;

/**
 * Registry file contents
 * Maps absolute source path -> entry
 * Example: { "/docs/source/a.txt": { "fingerprint": "sha256:…", … } }
 */
export type RegistryData = Record<string, RegistryEntry>;

// ============================================================================
// Dispatch outcomes
// ============================================================================

export type ConversionReason =
  | "forced" // Non-incremental run
  | "new" // No registry entry
  | "changed" // Fingerprint differs from the registry
  | "output-missing"; // Registry hit, but the markdown file is gone

export type FileState = "converted" | "skipped" | "failed";

export interface FileOutcome {
  sourcePath: string;
  relativePath: string;
  state: FileState;
  reason?: ConversionReason;
  error?: string;
}

export interface RunSummary {
  converted: number;
  skipped: number;
  failed: number;
}
