/**
 * Dependency graph types for fabdex
 */

import type { FabdexLogger } from '../logging/logger.js';

/**
 * Config directory → canonical source files its config declares as inputs
 */
export type DependencyGraph = Map<string, Set<string>>;

/**
 * Options for building a dependency graph
 */
export interface GraphBuildOptions {
  /** Extension of build descriptor files (without dot) */
  configExtension: string;
  /** Extension of source files kept in the graph (without dot) */
  sourceExtension: string;
  /** Fallback directory for references not found next to the config */
  baseDirectory?: string;
  /** Glob patterns of paths never scanned */
  excludePatterns?: string[];
  /** Config files read at once */
  concurrency?: number;
  logger?: FabdexLogger;
}
