/**
 * Symbol extraction for NESFab sources
 *
 * Walks a parsed file and collects function and global variable
 * definitions into a SymbolTable. Extraction is all-or-nothing: a function
 * definition without its signature or name aborts the whole file.
 */

import type { SourceParser, SyntaxNode, SyntaxTree } from '../parser/types.js';
import { walkTree } from '../parser/visitor.js';
import { FieldName, NodeKind, isFunctionDefinition } from './node-kinds.js';
import {
  createSymbolTable,
  ExtractionError,
  ExtractionErrorCode,
  type FunctionSymbol,
  type SourceRange,
  type SymbolTable,
  type VariableSymbol,
} from './types.js';

/**
 * Span of a node
 */
export function nodeRange(node: SyntaxNode): SourceRange {
  return {
    startLine: node.startPosition.row,
    startColumn: node.startPosition.column,
    endLine: node.endPosition.row,
    endColumn: node.endPosition.column,
  };
}

/**
 * Collect the comment block directly above a definition
 *
 * Walks previous siblings while they are comments separated from the line
 * below by at most one line break. Returns the comments top to bottom, each
 * terminated by a newline, or undefined when there are none.
 */
export function collectLeadingComments(node: SyntaxNode): string | undefined {
  const comments: string[] = [];
  let pivotLine = node.startPosition.row;
  let sibling = node.previousSibling;

  while (
    sibling !== null &&
    sibling.type === NodeKind.COMMENT &&
    pivotLine - sibling.endPosition.row <= 1
  ) {
    comments.unshift(sibling.text);
    pivotLine = sibling.startPosition.row;
    sibling = sibling.previousSibling;
  }

  if (comments.length === 0) return undefined;
  return comments.map((comment) => `${comment}\n`).join('');
}

function describeNode(node: SyntaxNode): string {
  const { row, column } = node.startPosition;
  return `${node.type} at ${row + 1}:${column + 1}`;
}

/**
 * Build a FunctionSymbol from a function or asm function definition
 *
 * @throws ExtractionError when the signature or name is missing
 */
export function buildFunctionSymbol(node: SyntaxNode): FunctionSymbol {
  const signature = node.childForFieldName(FieldName.SIGNATURE);
  if (signature === null) {
    throw new ExtractionError(
      `Missing signature in ${describeNode(node)}`,
      ExtractionErrorCode.MISSING_SIGNATURE
    );
  }

  const name = signature.childForFieldName(FieldName.NAME);
  if (name === null) {
    throw new ExtractionError(
      `Missing function name in ${describeNode(node)}`,
      ExtractionErrorCode.MISSING_NAME
    );
  }

  const comments = collectLeadingComments(node);
  const symbol: FunctionSymbol = {
    kind: 'function',
    name: name.text,
    range: nodeRange(node),
    signature: signature.text,
    description: (comments ?? '') + signature.text,
  };
  if (comments !== undefined) {
    symbol.comments = comments;
  }
  return symbol;
}

/**
 * Build a VariableSymbol from a variable definition, or null when the
 * definition carries no name
 */
export function buildVariableSymbol(node: SyntaxNode): VariableSymbol | null {
  const name = node.childForFieldName(FieldName.NAME);
  if (name === null) return null;

  const comments = collectLeadingComments(node);
  const symbol: VariableSymbol = {
    kind: 'variable',
    name: name.text,
    range: nodeRange(node),
    declaration: node.text,
    description: (comments ?? '') + node.text,
  };
  if (comments !== undefined) {
    symbol.comments = comments;
  }
  return symbol;
}

/**
 * Whether a variable definition sits at module scope
 */
function isGlobalDefinition(node: SyntaxNode): boolean {
  const parent = node.parent;
  return parent !== null && (parent.parent === null || parent.type === NodeKind.VARS_BLOCK);
}

/**
 * Extract the symbol table of one parsed file
 *
 * Later definitions of a name replace earlier ones.
 *
 * @throws ExtractionError when a function definition is malformed
 */
export function extractSymbols(tree: SyntaxTree): SymbolTable {
  const table = createSymbolTable();

  walkTree(tree.rootNode, (node) => {
    if (isFunctionDefinition(node.type)) {
      const symbol = buildFunctionSymbol(node);
      table.functions.set(symbol.name, symbol);
    } else if (node.type === NodeKind.VARIABLE_DEFINITION && isGlobalDefinition(node)) {
      const symbol = buildVariableSymbol(node);
      if (symbol !== null) {
        table.variables.set(symbol.name, symbol);
      }
    }
  });

  return table;
}

/**
 * Parsed and extracted file
 */
export interface IndexedSource {
  tree: SyntaxTree;
  symbols: SymbolTable;
}

/**
 * Parse a whole file and extract its symbols
 *
 * @throws ParserError when parsing fails
 * @throws ExtractionError when extraction fails
 */
export function indexSource(parser: SourceParser, text: string): IndexedSource {
  const tree = parser.parse(text);
  const symbols = extractSymbols(tree);
  return { tree, symbols };
}
