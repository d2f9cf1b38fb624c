/**
 * tree-sitter integration for fabdex
 *
 * Loads the NESFab grammar from an npm package at run time and exposes it
 * through the SourceParser interface.
 */

import Parser from 'tree-sitter';
import { ParserError, ParserErrorCode, type SourceParser, type SyntaxTree } from './types.js';
import { getLogger } from '../logging/logger.js';

/**
 * Options for the tree-sitter parser
 */
export interface TreeSitterParserOptions {
  /** Grammar package, e.g. `tree-sitter-nesfab` */
  grammarPackage: string;
  /** Export within the package holding the grammar (optional) */
  submodule?: string;
}

/**
 * Language object accepted by Parser#setLanguage
 */
type Grammar = NonNullable<Parameters<Parser['setLanguage']>[0]>;

function isGrammar(value: unknown): value is Grammar {
  return typeof value === 'object' && value !== null;
}

/**
 * Import a grammar package and pick the language object out of it
 */
async function importGrammar(
  packageName: string,
  submodule?: string
): Promise<Grammar> {
  let module: unknown;
  try {
    module = await import(packageName);
  } catch (error) {
    throw new ParserError(
      `Grammar package not installed: ${packageName}`,
      ParserErrorCode.GRAMMAR_NOT_LOADED,
      error instanceof Error ? error : undefined
    );
  }

  const moduleDefault =
    typeof module === 'object' && module !== null && 'default' in module
      ? module.default
      : module;

  // Packages with several grammars expose them as named properties
  const grammar: unknown =
    submodule !== undefined && typeof moduleDefault === 'object' && moduleDefault !== null
      ? Reflect.get(moduleDefault, submodule)
      : moduleDefault;

  if (!isGrammar(grammar)) {
    throw new ParserError(
      `Package ${packageName} does not export a tree-sitter grammar`,
      ParserErrorCode.GRAMMAR_NOT_LOADED
    );
  }
  return grammar;
}

/**
 * Tree-sitter parser wrapper
 */
export class TreeSitterParser implements SourceParser {
  private parser: Parser;
  private options: TreeSitterParserOptions;
  private initialized = false;

  constructor(options: TreeSitterParserOptions) {
    this.parser = new Parser();
    this.options = options;
  }

  /**
   * Load the grammar
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    const grammar = await importGrammar(this.options.grammarPackage, this.options.submodule);
    try {
      this.parser.setLanguage(grammar);
    } catch (error) {
      throw new ParserError(
        `Grammar from ${this.options.grammarPackage} is incompatible with this tree-sitter runtime`,
        ParserErrorCode.GRAMMAR_NOT_LOADED,
        error instanceof Error ? error : undefined
      );
    }
    this.initialized = true;
    getLogger().debug({ grammar: this.options.grammarPackage }, 'Grammar loaded');
  }

  /**
   * Parse source code
   *
   * Syntax errors end up as ERROR nodes in the tree; only a missing grammar
   * or a parser that yields nothing fails. The input buffer is sized to the
   * text: the binding's default of 32 KiB rejects longer sources.
   */
  parse(text: string): SyntaxTree {
    if (!this.initialized) {
      throw new ParserError(
        `Grammar not loaded: ${this.options.grammarPackage}`,
        ParserErrorCode.GRAMMAR_NOT_LOADED
      );
    }

    let tree: Parser.Tree | null | undefined;
    try {
      tree = this.parser.parse(text, undefined, { bufferSize: text.length * 2 + 1 });
    } catch (error) {
      throw new ParserError(
        'Failed to parse source',
        ParserErrorCode.PARSE_FAILED,
        error instanceof Error ? error : undefined
      );
    }
    if (tree === null || tree === undefined) {
      throw new ParserError('Parser returned no tree', ParserErrorCode.PARSE_FAILED);
    }
    return tree;
  }
}

/**
 * Create and initialize a tree-sitter parser for the given grammar package
 */
export async function createTreeSitterParser(
  options: TreeSitterParserOptions
): Promise<TreeSitterParser> {
  const parser = new TreeSitterParser(options);
  await parser.initialize();
  return parser;
}
