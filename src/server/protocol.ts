/**
 * Conversion between fabdex query results and language server protocol shapes
 */

import {
  CompletionItemKind,
  MarkupKind,
  type CompletionItem,
  type Hover,
  type Location,
  type Range,
} from 'vscode-languageserver/node.js';
import { URI } from 'vscode-uri';
import type { SourceRange, SymbolKind } from '../symbols/types.js';
import type { CompletionCandidate, DefinitionResult, HoverResult, Position } from '../resolver/types.js';

/** Default fence tag for code blocks in markdown content */
export const DEFAULT_LANGUAGE_ID = 'nesfab';

function codeBlock(code: string, languageId: string): string {
  return ['```' + languageId, code, '```'].join('\n');
}

export function toRange(range: SourceRange): Range {
  return {
    start: { line: range.startLine, character: range.startColumn },
    end: { line: range.endLine, character: range.endColumn },
  };
}

/**
 * LSP position to a cursor position. Characters are taken as columns.
 */
export function fromPosition(position: { line: number; character: number }): Position {
  return { line: position.line, column: position.character };
}

/**
 * File system path of a document URI
 */
export function uriToPath(uri: string): string {
  return URI.parse(uri).fsPath;
}

export function toHover(result: HoverResult, languageId = DEFAULT_LANGUAGE_ID): Hover {
  return {
    contents: {
      kind: MarkupKind.Markdown,
      value: [`*${result.displayPath}*`, '', codeBlock(result.description, languageId)].join('\n'),
    },
  };
}

export function toLocation(result: DefinitionResult): Location {
  return {
    uri: URI.file(result.path).toString(),
    range: toRange(result.range),
  };
}

function toCompletionKind(kind: SymbolKind): CompletionItemKind {
  switch (kind) {
    case 'function':
      return CompletionItemKind.Function;
    case 'variable':
      return CompletionItemKind.Variable;
  }
}

export function toCompletionItems(
  candidates: readonly CompletionCandidate[],
  languageId = DEFAULT_LANGUAGE_ID
): CompletionItem[] {
  return candidates.map((candidate) => ({
    label: candidate.name,
    kind: toCompletionKind(candidate.kind),
    documentation: {
      kind: MarkupKind.Markdown,
      value: codeBlock(candidate.documentation, languageId),
    },
  }));
}
