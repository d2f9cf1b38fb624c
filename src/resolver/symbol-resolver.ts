/**
 * Symbol resolution for fabdex
 *
 * Read-only queries against a ProjectIndex. Results reflect whatever the
 * stores hold at call time; a rebuild running concurrently may leave
 * different files at different freshness.
 */

import { isAbsolute, relative, sep } from 'node:path';
import { canonicalPath } from '../index/paths.js';
import type { ProjectIndex } from '../index/project-index.js';
import { getLogger, type FabdexLogger } from '../logging/logger.js';
import type { SyntaxNode } from '../parser/types.js';
import { ancestorTypes, descendantForPoint } from '../parser/visitor.js';
import { NodeKind, isFunctionDefinition } from '../symbols/node-kinds.js';
import { tableSymbols, type FabSymbol, type SymbolTable } from '../symbols/types.js';
import type {
  CompletionCandidate,
  DefinitionResult,
  HoverResult,
  Position,
  ReferenceContext,
  SymbolMatch,
} from './types.js';

/**
 * Classify an identifier by its syntactic context
 */
export function classifyReference(node: SyntaxNode): ReferenceContext {
  const { parent, grandparent } = ancestorTypes(node);
  if (parent === NodeKind.CALL) return 'call';
  if (isFunctionDefinition(grandparent)) return 'function-header';
  return 'reference';
}

/**
 * Look a name up in one table according to the reference context
 */
export function lookupSymbol(
  table: SymbolTable,
  name: string,
  context: ReferenceContext
): FabSymbol | undefined {
  switch (context) {
    case 'call':
    case 'function-header':
      return table.functions.get(name);
    case 'reference':
      return table.functions.get(name) ?? table.variables.get(name);
  }
}

/**
 * Shorten `path` relative to the deepest workspace root containing it
 */
export function toDisplayPath(path: string, roots: readonly string[]): string {
  let best: { root: string; relativePath: string } | null = null;

  for (const root of roots) {
    const relativePath = relative(root, path);
    const outside =
      relativePath === '..' || relativePath.startsWith(`..${sep}`) || isAbsolute(relativePath);
    if (relativePath === '' || outside) continue;
    if (best === null || root.length > best.root.length) {
      best = { root, relativePath };
    }
  }

  return best?.relativePath ?? path;
}

/**
 * Answers hover, definition and completion queries
 */
export class SymbolResolver {
  private readonly index: ProjectIndex;
  private readonly logger: FabdexLogger;

  constructor(index: ProjectIndex, logger?: FabdexLogger) {
    this.index = index;
    this.logger = logger ?? getLogger();
  }

  /**
   * Files sharing a config with `path`
   */
  getDependencies(path: string): Set<string> {
    const file = canonicalPath(path);
    const dependencies = new Set<string>();

    for (const [, files] of this.index.dependencyEntries()) {
      if (!files.has(file)) continue;
      for (const dependency of files) {
        dependencies.add(dependency);
      }
    }

    return dependencies;
  }

  /**
   * Files searched after the current one: config neighbours first, then
   * every other indexed file, each group sorted by path
   */
  private searchOrder(file: string): string[] {
    const neighbours = Array.from(this.getDependencies(file))
      .filter((path) => path !== file)
      .sort();
    const seen = new Set([file, ...neighbours]);
    const others = this.index
      .indexedFiles()
      .filter((path) => !seen.has(path))
      .sort();
    return [...neighbours, ...others];
  }

  /**
   * Resolve the identifier at `position` to its definition
   *
   * Returns null when the file has no tree, the cursor is not on an
   * identifier, or no indexed file defines the name.
   */
  findSymbol(path: string, position: Position): SymbolMatch | null {
    const file = canonicalPath(path);
    const tree = this.index.getTree(file);
    if (tree === undefined) return null;

    const node = descendantForPoint(tree.rootNode, {
      row: position.line,
      column: position.column,
    });
    if (node === null || node.type !== NodeKind.IDENTIFIER) return null;

    const name = node.text;
    const context = classifyReference(node);

    const ownTable = this.index.getSymbolTable(file);
    const own = ownTable !== undefined ? lookupSymbol(ownTable, name, context) : undefined;
    if (own !== undefined) {
      return { path: file, symbol: own };
    }

    const matches: SymbolMatch[] = [];
    const collectAll = this.logger.isLevelEnabled('debug');
    for (const candidate of this.searchOrder(file)) {
      const table = this.index.getSymbolTable(candidate);
      if (table === undefined) continue;

      const symbol = lookupSymbol(table, name, context);
      if (symbol === undefined) continue;

      matches.push({ path: candidate, symbol });
      if (!collectAll) break;
    }

    const [first] = matches;
    if (matches.length > 1) {
      this.logger.debug(
        { name, chosen: first?.path, candidates: matches.map((match) => match.path) },
        'Ambiguous cross-file symbol'
      );
    }
    return first ?? null;
  }

  /**
   * Description and display path of the symbol under the cursor
   */
  hover(path: string, position: Position): HoverResult | null {
    const match = this.findSymbol(path, position);
    if (match === null) return null;

    return {
      description: match.symbol.description,
      displayPath: toDisplayPath(match.path, this.index.workspaceRoots()),
      symbol: match.symbol,
    };
  }

  /**
   * Location of the definition of the symbol under the cursor
   */
  gotoDefinition(path: string, position: Position): DefinitionResult | null {
    const match = this.findSymbol(path, position);
    if (match === null) return null;

    return { path: match.path, range: match.symbol.range };
  }

  /**
   * Functions and global variables visible from `path`: its own symbols and
   * those of files sharing a config with it. A name offered once per kind.
   */
  completion(path: string): CompletionCandidate[] {
    const file = canonicalPath(path);
    const files = [
      file,
      ...Array.from(this.getDependencies(file))
        .filter((dependency) => dependency !== file)
        .sort(),
    ];

    const seen = new Set<string>();
    const candidates: CompletionCandidate[] = [];

    for (const source of files) {
      const table = this.index.getSymbolTable(source);
      if (table === undefined) continue;

      for (const symbol of tableSymbols(table)) {
        const key = `${symbol.kind}:${symbol.name}`;
        if (seen.has(key)) continue;
        seen.add(key);
        candidates.push({
          name: symbol.name,
          kind: symbol.kind,
          documentation: symbol.description,
        });
      }
    }

    return candidates;
  }
}
