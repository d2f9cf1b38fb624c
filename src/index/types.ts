/**
 * Project index types for fabdex
 */

import type { ParserError, SourceParser } from '../parser/types.js';
import type { ExtractionError, SymbolTable } from '../symbols/types.js';
import type { GraphBuildOptions } from '../dependencies/types.js';
import type { FabdexLogger } from '../logging/logger.js';

/**
 * Why a file could not be (re)indexed
 */
export type IndexingError = ParserError | ExtractionError;

/**
 * Outcome of ProjectIndex#updateFile
 */
export type UpdateResult =
  | { success: true; path: string; symbols: SymbolTable }
  | { success: false; path: string; error: IndexingError };

/**
 * Outcome of ProjectIndex#refreshWorkspace
 */
export interface RefreshResult {
  /** Directories handed to the dependency scan */
  scannedDirectories: string[];
  /** Config directories tracked after the refresh */
  configDirectories: number;
  /** Files newly parsed and cached from disk */
  filesIndexed: number;
  /** Referenced files that could not be read, parsed or extracted */
  filesFailed: number;
}

/**
 * Options for the project index
 */
export interface ProjectIndexOptions {
  parser: SourceParser;
  /** How config files are found and their inputs resolved */
  graph: Omit<GraphBuildOptions, 'logger' | 'concurrency'>;
  /** Files read and parsed at once during bulk indexing */
  concurrency?: number;
  logger?: FabdexLogger;
}
