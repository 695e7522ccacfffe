/**
 * Conversion Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import {
  ConversionError,
  FingerprintError,
  RegistryCorruptError,
  WriteError,
  errorMessage,
} from "./errors";
import type { RunSummary } from "../types/files";

// ============================================================================
// Types
// ============================================================================

// Type-safe reasons for each issue type
export type FileIssueReason =
  | "fingerprint-error"
  | "conversion-error"
  | "write-error";
export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error"
  | "write-error";

// Discriminated union - each type has its own subset of reasons
export interface FileIssue {
  type: "file";
  path: string;
  reason: FileIssueReason;
  details?: string;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details?: string;
}

export type Issue = FileIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface ProcessingStats {
  totalFiles: number;
  convertedFiles: number;
  skippedFiles: number;
  failedFiles: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(
  error: unknown,
  context: "read" | "write" = "read",
): IssueInfo<ResourceIssueReason> {
  const details = errorMessage(error);
  const cause = error instanceof RegistryCorruptError ? error.cause : error;

  if (context === "write") {
    return { reason: "write-error", details };
  }
  if (cause instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: cause.issues.map((e) => e.message).join("; "),
    };
  }
  if (cause instanceof SyntaxError) {
    return { reason: "invalid-json", details };
  }
  return { reason: "read-error", details };
}

function mapFileError(error: unknown): IssueInfo<FileIssueReason> {
  const details = errorMessage(error);

  if (error instanceof FingerprintError) {
    return { reason: "fingerprint-error", details };
  }
  if (error instanceof WriteError) {
    return { reason: "write-error", details };
  }
  if (error instanceof ConversionError) {
    return { reason: "conversion-error", details };
  }
  if (error instanceof Error && "code" in error) {
    if (error.code === "EACCES" || error.code === "EPERM" || error.code === "ENOSPC") {
      return { reason: "write-error", details };
    }
  }
  return { reason: "conversion-error", details };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalFiles = 0;
  private convertedFiles = 0;
  private skippedFiles = 0;
  private failedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalFiles(count: number): void {
    this.totalFiles = count;
  }

  incrementConverted(): void {
    this.convertedFiles++;
  }

  incrementSkipped(): void {
    this.skippedFiles++;
  }

  incrementFailed(): void {
    this.failedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  /**
   * Track an issue from an error, auto-detecting the reason based on error type
   */
  trackError(
    path: string,
    error: unknown,
    type: IssueType,
    context?: "read" | "write",
  ): void {
    switch (type) {
      case "file": {
        const { reason, details } = mapFileError(error);
        this.issues.push({ type: "file", path, reason, details });
        break;
      }
      case "resource": {
        const { reason, details } = mapResourceError(error, context);
        this.issues.push({ type: "resource", path, reason, details });
        break;
      }
    }
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues(type: "file"): FileIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getSummary(): RunSummary {
    return {
      converted: this.convertedFiles,
      skipped: this.skippedFiles,
      failed: this.failedFiles,
    };
  }

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalFiles: this.totalFiles,
      convertedFiles: this.convertedFiles,
      skippedFiles: this.skippedFiles,
      failedFiles: this.failedFiles,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const stats = this.getStats();

    const exported = {
      summary: {
        totalFiles: stats.totalFiles,
        convertedFiles: stats.convertedFiles,
        skippedFiles: stats.skippedFiles,
        failedFiles: stats.failedFiles,
        duration: stats.duration,
      },
      issues: this.groupIssuesByTypeAndReason(),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
  }

  private groupIssuesByTypeAndReason(): {
    file: Record<string, FileIssue[]>;
    resource: Record<string, ResourceIssue[]>;
  } {
    const grouped: {
      file: Record<string, FileIssue[]>;
      resource: Record<string, ResourceIssue[]>;
    } = {
      file: {},
      resource: {},
    };

    for (const issue of this.issues) {
      switch (issue.type) {
        case "file": {
          (grouped.file[issue.reason] ??= []).push(issue);
          break;
        }
        case "resource": {
          (grouped.resource[issue.reason] ??= []).push(issue);
          break;
        }
      }
    }

    return grouped;
  }
}
