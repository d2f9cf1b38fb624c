/**
 * Symbol types for fabdex
 *
 * A symbol is a named function or global variable definition together with
 * its rendered documentation and source location.
 */

/**
 * Symbol kinds
 */
export type SymbolKind = 'function' | 'variable';

/**
 * Zero-based source span, end exclusive
 */
export interface SourceRange {
  startLine: number;
  startColumn: number;
  endLine: number;
  endColumn: number;
}

/**
 * Fields shared by every symbol
 */
interface SymbolBase {
  name: string;
  /** Span of the whole definition node */
  range: SourceRange;
  /** Contiguous comment block above the definition, one comment per line */
  comments?: string;
  /** Comments followed by the signature or declaration text */
  description: string;
}

/**
 * Function (or asm function) definition
 */
export interface FunctionSymbol extends SymbolBase {
  kind: 'function';
  /** Header line, e.g. `fn add(U a, U b) U` */
  signature: string;
}

/**
 * Module-scope variable definition
 */
export interface VariableSymbol extends SymbolBase {
  kind: 'variable';
  /** Declaration text, e.g. `SS px = 128` */
  declaration: string;
}

export type FabSymbol = FunctionSymbol | VariableSymbol;

/**
 * Symbols defined by one file
 */
export interface SymbolTable {
  functions: Map<string, FunctionSymbol>;
  variables: Map<string, VariableSymbol>;
}

/**
 * Create an empty symbol table
 */
export function createSymbolTable(): SymbolTable {
  return {
    functions: new Map(),
    variables: new Map(),
  };
}

/**
 * All symbols of a table, functions first
 */
export function tableSymbols(table: SymbolTable): FabSymbol[] {
  return [...table.functions.values(), ...table.variables.values()];
}

/**
 * Extraction error
 */
export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}

/**
 * Extraction error codes
 */
export enum ExtractionErrorCode {
  /** Function definition without a signature node */
  MISSING_SIGNATURE = 'MISSING_SIGNATURE',
  /** Definition without a name node */
  MISSING_NAME = 'MISSING_NAME',
}
