/**
 * Utility exports
 */

// Filesystem utilities
export { fileExists, writeFileAtomic } from "./fs";
export { mapOutputPath, toPosixRelative } from "./output-path";
export { computeFingerprint } from "./fingerprint";

// Config utilities
export {
  loadConfig,
  loadDefaultConfig,
  mergeConfig,
  getUserConfigPath,
  resolveRegistryPath,
} from "./load-config";

// Errors
export {
  Any2mdError,
  ScanError,
  FingerprintError,
  ConversionError,
  WriteError,
  RegistryCorruptError,
  errorMessage,
} from "./errors";

// Classes
export { Logger } from "./logger";
export { Tracker } from "./tracker";
export { Registry } from "./registry";
export type { RegistryLoadResult } from "./registry";
