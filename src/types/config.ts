/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const CacheConfigSchema = z.object({
  enabled: z.boolean(),
  // Cache root; null falls back to the OS cache directory
  directory: z.string().nullable(),
  fileListTtl: z.number().int().nonnegative(), // In seconds
  feedTtl: z.number().int().nonnegative(), // In seconds
  lockTimeout: z.number().int().positive(), // In milliseconds
});

export const ImagesConfigSchema = z.object({
  // Allow-listed image extensions, without the leading dot
  extensions: z.array(z.string()).min(1),
  minWidth: z.number().int().nonnegative(),
  minHeight: z.number().int().nonnegative(),
  sniffBytes: z.number().int().positive(),
});

export const ScanConfigSchema = z.object({
  // Extensions known not to be directories; skipped without stat
  skipExtensions: z.array(z.string()),
});

export const SelectionConfigSchema = z.object({
  maxAttempts: z.number().int().positive(),
});

export const NetworkConfigSchema = z.object({
  timeout: z.number().int().positive(), // In milliseconds
  userAgent: z.string(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const PickerConfigSchema = z.object({
  cache: CacheConfigSchema,
  images: ImagesConfigSchema,
  scan: ScanConfigSchema,
  selection: SelectionConfigSchema,
  network: NetworkConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialPickerConfigSchema = PickerConfigSchema.partial().extend({
  cache: CacheConfigSchema.partial().optional(),
  images: ImagesConfigSchema.partial().optional(),
  scan: ScanConfigSchema.partial().optional(),
  selection: SelectionConfigSchema.partial().optional(),
  network: NetworkConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type CacheConfig = z.infer<typeof CacheConfigSchema>;
export type ImagesConfig = z.infer<typeof ImagesConfigSchema>;
export type ScanConfig = z.infer<typeof ScanConfigSchema>;
export type SelectionConfig = z.infer<typeof SelectionConfigSchema>;
export type NetworkConfig = z.infer<typeof NetworkConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type PickerConfig = z.infer<typeof PickerConfigSchema>;
export type PartialPickerConfig = z.infer<typeof PartialPickerConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
