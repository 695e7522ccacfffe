/**
 * Conversion context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { ConversionConfig } from "./config";
import type { FileDescriptor, FileOutcome } from "./files";
import type { DocumentConverter } from "../converters/types";
import type { Logger } from "../utils/logger";
import type { Registry } from "../utils/registry";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "../utils/tracker";

export interface ConversionContext {
  // Input - provided at initialization
  config: ConversionConfig;
  converter: DocumentConverter;
  logger: Logger;

  // Unified tracking for stats and issues
  tracker: Tracker;

  // List failed files with details in the summary
  verbose?: boolean;

  registry?: Registry; // Loaded by the runner
  files?: FileDescriptor[]; // Scanner output, in processing order
  outcomes?: FileOutcome[]; // Dispatcher output, one per file
}
