/**
 * Project index for fabdex
 *
 * Owns the per-file stores (text, syntax tree, symbol table), the dependency
 * graph and the registered workspace roots. Every store write replaces a
 * whole value, so readers see either the previous or the next state of a
 * file, never a mix.
 */

import { readFile } from 'node:fs/promises';
import { sep } from 'node:path';
import pLimit from 'p-limit';
import { buildDependencyGraph } from '../dependencies/graph-builder.js';
import type { DependencyGraph } from '../dependencies/types.js';
import { getLogger, withLogging, type FabdexLogger } from '../logging/logger.js';
import { ParserError, ParserErrorCode, type SyntaxTree } from '../parser/types.js';
import { indexSource, type IndexedSource } from '../symbols/extractor.js';
import { ExtractionError, type SymbolTable } from '../symbols/types.js';
import { canonicalPath } from './paths.js';
import type {
  IndexingError,
  ProjectIndexOptions,
  RefreshResult,
  UpdateResult,
} from './types.js';

const DEFAULT_CONCURRENCY = 8;

type DiskIndexOutcome = 'indexed' | 'skipped' | 'failed';

/**
 * Normalize an unknown failure into an indexing error
 */
function toIndexingError(error: unknown): IndexingError {
  if (error instanceof ParserError || error instanceof ExtractionError) {
    return error;
  }
  return new ParserError(
    error instanceof Error ? error.message : String(error),
    ParserErrorCode.PARSE_FAILED,
    error instanceof Error ? error : undefined
  );
}

/**
 * Whether `path` is `root` or lies below it
 */
export function isWithin(path: string, root: string): boolean {
  if (path === root) return true;
  const prefix = root.endsWith(sep) ? root : `${root}${sep}`;
  return path.startsWith(prefix);
}

/**
 * Shared index of a NESFab workspace
 */
export class ProjectIndex {
  private readonly texts = new Map<string, string>();
  private readonly trees = new Map<string, SyntaxTree>();
  private readonly symbols = new Map<string, SymbolTable>();
  private dependencies: DependencyGraph = new Map();
  private readonly roots = new Set<string>();

  private readonly options: ProjectIndexOptions;
  private readonly logger: FabdexLogger;
  private readonly concurrency: number;

  constructor(options: ProjectIndexOptions) {
    this.options = options;
    this.logger = options.logger ?? getLogger();
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  /**
   * Replace a file's text and re-index it
   *
   * The text is always stored. Tree and symbols are replaced only when both
   * parsing and extraction succeed; otherwise the previous ones stay and the
   * failure is returned.
   */
  updateFile(path: string, text: string): UpdateResult {
    const file = canonicalPath(path);
    this.texts.set(file, text);

    let indexed: IndexedSource;
    try {
      indexed = indexSource(this.options.parser, text);
    } catch (error) {
      const indexingError = toIndexingError(error);
      this.logger.warn(
        { file, code: indexingError.code, error: indexingError.message },
        'Failed to index file'
      );
      return { success: false, path: file, error: indexingError };
    }

    this.trees.set(file, indexed.tree);
    this.symbols.set(file, indexed.symbols);
    this.logger.debug(
      {
        file,
        functions: indexed.symbols.functions.size,
        variables: indexed.symbols.variables.size,
      },
      'File indexed'
    );
    return { success: true, path: file, symbols: indexed.symbols };
  }

  /**
   * Apply a workspace root change
   *
   * Scans the added roots that are not already tracked config directories,
   * rebuilds the dependency graph, and indexes every referenced file that
   * has no symbol table yet. Entries under removed roots are dropped; all
   * other entries are carried over.
   */
  async refreshWorkspace(
    added: Iterable<string>,
    removed: Iterable<string>
  ): Promise<RefreshResult> {
    const addedDirs = new Set(Array.from(added, (dir) => canonicalPath(dir)));
    const removedDirs = new Set(Array.from(removed, (dir) => canonicalPath(dir)));

    for (const dir of removedDirs) this.roots.delete(dir);
    for (const dir of addedDirs) this.roots.add(dir);

    const tracked = new Set(this.dependencies.keys());
    const candidates = new Set([
      ...Array.from(tracked).filter((dir) => !removedDirs.has(dir)),
      ...addedDirs,
    ]);
    const scannedDirectories = Array.from(candidates).filter((dir) => !tracked.has(dir));

    return withLogging(
      this.logger,
      'refreshWorkspace',
      async () => {
        const scanned = await buildDependencyGraph(scannedDirectories, {
          ...this.options.graph,
          concurrency: this.concurrency,
          logger: this.logger,
        });

        // Read the current graph only now: another refresh may have finished
        // while this one was scanning.
        const next: DependencyGraph = new Map();
        for (const [dir, files] of this.dependencies) {
          const evicted = Array.from(removedDirs).some((root) => isWithin(dir, root));
          if (!evicted) next.set(dir, files);
        }
        for (const [dir, files] of scanned) {
          next.set(dir, files);
        }
        this.dependencies = next;

        const { indexed, failed } = await this.indexMissingFiles(next);
        return {
          scannedDirectories,
          configDirectories: next.size,
          filesIndexed: indexed,
          filesFailed: failed,
        };
      },
      { scanned: scannedDirectories.length }
    );
  }

  /**
   * Read, parse and extract every graph file without a symbol table
   */
  private async indexMissingFiles(
    graph: DependencyGraph
  ): Promise<{ indexed: number; failed: number }> {
    const missing = new Set<string>();
    for (const files of graph.values()) {
      for (const file of files) {
        if (!this.symbols.has(file)) missing.add(file);
      }
    }

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(
      Array.from(missing, (file) => limit(() => this.indexFromDisk(file)))
    );

    return {
      indexed: outcomes.filter((outcome) => outcome === 'indexed').length,
      failed: outcomes.filter((outcome) => outcome === 'failed').length,
    };
  }

  /**
   * Index one file from disk unless it got cached in the meantime
   */
  private async indexFromDisk(file: string): Promise<DiskIndexOutcome> {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch (error) {
      this.logger.warn(
        { file, error: error instanceof Error ? error.message : String(error) },
        'Failed to read referenced file'
      );
      return 'failed';
    }

    let indexed: IndexedSource;
    try {
      indexed = indexSource(this.options.parser, text);
    } catch (error) {
      const indexingError = toIndexingError(error);
      this.logger.warn(
        { file, code: indexingError.code, error: indexingError.message },
        'Failed to index referenced file'
      );
      return 'failed';
    }

    // Text from the editor is newer than the disk copy, even when it failed
    // to parse
    if (this.symbols.has(file) || this.texts.has(file)) {
      return 'skipped';
    }

    this.texts.set(file, text);
    this.trees.set(file, indexed.tree);
    this.symbols.set(file, indexed.symbols);
    this.logger.debug({ file }, 'Symbol table cached');
    return 'indexed';
  }

  /**
   * Latest text of a file
   */
  getText(path: string): string | undefined {
    return this.texts.get(canonicalPath(path));
  }

  /**
   * Syntax tree of the latest successfully indexed text
   */
  getTree(path: string): SyntaxTree | undefined {
    return this.trees.get(canonicalPath(path));
  }

  /**
   * Symbol table of the latest successfully indexed text
   */
  getSymbolTable(path: string): SymbolTable | undefined {
    return this.symbols.get(canonicalPath(path));
  }

  isIndexed(path: string): boolean {
    return this.symbols.has(canonicalPath(path));
  }

  /**
   * Paths of every file with a symbol table
   */
  indexedFiles(): string[] {
    return Array.from(this.symbols.keys());
  }

  /**
   * Current dependency graph entries
   */
  dependencyEntries(): [string, ReadonlySet<string>][] {
    return Array.from(this.dependencies.entries());
  }

  /**
   * Registered workspace roots
   */
  workspaceRoots(): string[] {
    return Array.from(this.roots);
  }
}
