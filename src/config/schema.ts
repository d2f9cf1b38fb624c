/**
 * Configuration schema for fabdex
 *
 * Validates configuration using Zod and provides TypeScript types.
 */

import { z } from 'zod';

/**
 * Source language configuration
 */
export const LanguageConfigSchema = z.object({
  /** Language id used in hover code blocks */
  id: z.string().min(1).default('nesfab'),
  /** Extension of indexed source files (without dot) */
  sourceExtension: z.string().min(1).default('fab'),
  /** Extension of build descriptor files */
  configExtension: z.string().min(1).default('cfg'),
  /** npm package providing the tree-sitter grammar */
  grammarPackage: z.string().min(1).default('tree-sitter-nesfab'),
});

/**
 * Dependency resolution configuration
 */
export const DependenciesConfigSchema = z.object({
  /**
   * Fallback directory for `input` references that do not resolve next to
   * their config file (the NESFab installation directory)
   */
  baseDirectory: z.string().optional(),
});

/**
 * Indexing configuration
 */
export const IndexingConfigSchema = z.object({
  /** Files read and parsed at once during bulk indexing */
  concurrency: z.number().int().min(1).max(64).default(8),
  excludePatterns: z.array(z.string()).default([
    '**/node_modules/**',
    '**/.git/**',
  ]),
});

/**
 * Logging configuration
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  file: z.string().optional(),
  pretty: z.boolean().default(false),
});

/**
 * Complete fabdex configuration schema
 */
export const FabdexConfigSchema = z.object({
  language: LanguageConfigSchema.default({}),
  dependencies: DependenciesConfigSchema.default({}),
  indexing: IndexingConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

/**
 * TypeScript types derived from schemas
 */
export type LanguageConfig = z.infer<typeof LanguageConfigSchema>;
export type DependenciesConfig = z.infer<typeof DependenciesConfigSchema>;
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type FabdexConfig = z.infer<typeof FabdexConfigSchema>;

/**
 * Default configuration (all defaults applied)
 */
export const DEFAULT_CONFIG: FabdexConfig = FabdexConfigSchema.parse({});

/**
 * Validate and parse configuration object
 * @param config - Raw configuration object
 * @returns Validated and typed configuration
 * @throws ZodError if validation fails
 */
export function validateConfig(config: unknown): FabdexConfig {
  return FabdexConfigSchema.parse(config);
}

/**
 * Safe validation that returns result object instead of throwing
 */
export function safeValidateConfig(config: unknown): z.SafeParseReturnType<unknown, FabdexConfig> {
  return FabdexConfigSchema.safeParse(config);
}
