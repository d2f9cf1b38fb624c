/**
 * Query types for fabdex
 */

import type { FabSymbol, SourceRange, SymbolKind } from '../symbols/types.js';

/**
 * Zero-based cursor position
 */
export interface Position {
  line: number;
  column: number;
}

/**
 * How an identifier is used at the cursor
 *
 * - `call`: callee of a call expression, functions only
 * - `function-header`: inside a function or asm function header, functions only
 * - `reference`: anything else, functions first, then global variables
 */
export type ReferenceContext = 'call' | 'function-header' | 'reference';

/**
 * A resolved symbol and the file defining it
 */
export interface SymbolMatch {
  path: string;
  symbol: FabSymbol;
}

export interface HoverResult {
  description: string;
  /** Defining file relative to its workspace root, or absolute */
  displayPath: string;
  symbol: FabSymbol;
}

export interface DefinitionResult {
  path: string;
  range: SourceRange;
}

export interface CompletionCandidate {
  name: string;
  kind: SymbolKind;
  documentation: string;
}
