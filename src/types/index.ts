/**
 * Central type exports
 */

// Configuration
export type {
  ConversionConfig,
  PartialConversionConfig,
  RegistryConfig,
  FingerprintConfig,
  FingerprintStrategy,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  ConversionConfigSchema,
  PartialConversionConfigSchema,
  LogLevelSchema,
} from "./config";

// Files
export type {
  FileDescriptor,
  SupportedExtension,
  RegistryEntry,
  RegistryData,
  ConversionReason,
  FileState,
  FileOutcome,
  RunSummary,
} from "./files";
export {
  SUPPORTED_EXTENSIONS,
  ALL_SUPPORTED_EXTENSIONS,
  RegistryEntrySchema,
} from "./files";

// Context
export type {
  ConversionContext,
  Issue,
  IssueType,
  FileIssue,
  ResourceIssue,
  FileIssueReason,
  ResourceIssueReason,
  ProcessingStats,
} from "./context";
