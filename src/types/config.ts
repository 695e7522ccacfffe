/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

export const RegistryConfigSchema = z.object({
  // Registry file name inside the processed directory
  filename: z.string().min(1),
  // Explicit registry location (overrides filename when set)
  path: z.string().nullable(),
});

export const FingerprintConfigSchema = z.object({
  strategy: z.enum(["hash", "stat"]),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
  // Append log lines to this file as well as the console
  file: z.string().nullable(),
});

export const ConversionConfigSchema = z.object({
  sourceDir: z.string().min(1),
  processedDir: z.string().min(1),
  incremental: z.boolean(),
  registry: RegistryConfigSchema,
  fingerprint: FingerprintConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialConversionConfigSchema = ConversionConfigSchema.partial()
  .extend({
    registry: RegistryConfigSchema.partial().optional(),
    fingerprint: FingerprintConfigSchema.partial().optional(),
    logging: LoggingConfigSchema.partial().optional(),
  });

// Infer TypeScript types from Zod schemas
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;
export type FingerprintConfig = z.infer<typeof FingerprintConfigSchema>;
export type FingerprintStrategy = FingerprintConfig["strategy"];
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
export type PartialConversionConfig = z.infer<
  typeof PartialConversionConfigSchema
>;

export interface ConfigError {
  path: string;
  error: unknown;
}
