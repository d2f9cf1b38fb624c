/**
 * Parser types for fabdex
 *
 * The grammar lives outside this package. Everything downstream of the parser
 * sees the tree only through the interfaces below, which the tree-sitter Node
 * binding satisfies structurally.
 */

/**
 * Zero-based position in a source file
 */
export interface Point {
  row: number;
  column: number;
}

/**
 * Opaque syntax node
 */
export interface SyntaxNode {
  /** Grammar node kind, e.g. `function_definition` */
  readonly type: string;
  /** Source text covered by the node */
  readonly text: string;
  readonly startPosition: Point;
  /** End position (exclusive) */
  readonly endPosition: Point;
  /** Enclosing node, null for the root */
  readonly parent: SyntaxNode | null;
  /** Preceding sibling, named or anonymous */
  readonly previousSibling: SyntaxNode | null;
  /** Named children in source order */
  readonly namedChildren: readonly SyntaxNode[];
  /** Child bound to a grammar field, e.g. `signature` or `name` */
  childForFieldName(fieldName: string): SyntaxNode | null;
}

/**
 * Parsed file
 */
export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
}

/**
 * Anything that turns source text into a syntax tree
 */
export interface SourceParser {
  /**
   * Parse a whole file
   *
   * @throws ParserError when no tree can be produced
   */
  parse(text: string): SyntaxTree;
}

/**
 * Parser error
 */
export class ParserError extends Error {
  constructor(
    message: string,
    public readonly code: ParserErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ParserError';
  }
}

/**
 * Parser error codes
 */
export enum ParserErrorCode {
  /** Failed to parse file */
  PARSE_FAILED = 'PARSE_FAILED',
  /** Grammar not loaded */
  GRAMMAR_NOT_LOADED = 'GRAMMAR_NOT_LOADED',
}
