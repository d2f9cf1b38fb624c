import { describe, it, expect } from 'vitest';
import { CompletionItemKind, MarkupKind } from 'vscode-languageserver/node.js';
import {
  fromPosition,
  toCompletionItems,
  toHover,
  toLocation,
  toRange,
  uriToPath,
} from '../../../src/server/protocol.js';
import type { FunctionSymbol } from '../../../src/symbols/types.js';

const add: FunctionSymbol = {
  kind: 'function',
  name: 'add',
  range: { startLine: 1, startColumn: 0, endLine: 2, endColumn: 16 },
  signature: 'fn add(a, b)',
  description: '// Adds\nfn add(a, b)',
  comments: '// Adds\n',
};

describe('Protocol conversion', () => {
  it('should convert ranges to LSP ranges', () => {
    expect(toRange(add.range)).toEqual({
      start: { line: 1, character: 0 },
      end: { line: 2, character: 16 },
    });
  });

  it('should take LSP characters as columns', () => {
    expect(fromPosition({ line: 4, character: 7 })).toEqual({ line: 4, column: 7 });
  });

  it('should turn file URIs into paths', () => {
    expect(uriToPath('file:///ws/game/main.fab')).toBe('/ws/game/main.fab');
    expect(uriToPath('file:///ws/my%20game/main.fab')).toBe('/ws/my game/main.fab');
  });

  it('should render hovers as markdown with a fenced description', () => {
    const hover = toHover({ description: add.description, displayPath: 'game/util.fab', symbol: add });

    expect(hover.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '*game/util.fab*\n\n```nesfab\n// Adds\nfn add(a, b)\n```',
    });
  });

  it('should use the configured language id in code fences', () => {
    const hover = toHover({ description: 'fn f()', displayPath: 'f.fab', symbol: add }, 'fab');

    expect(hover.contents).toEqual({
      kind: MarkupKind.Markdown,
      value: '*f.fab*\n\n```fab\nfn f()\n```',
    });
  });

  it('should convert definitions to locations', () => {
    expect(toLocation({ path: '/ws/game/util.fab', range: add.range })).toEqual({
      uri: 'file:///ws/game/util.fab',
      range: { start: { line: 1, character: 0 }, end: { line: 2, character: 16 } },
    });
  });

  it('should map symbol kinds to completion item kinds', () => {
    const items = toCompletionItems([
      { name: 'add', kind: 'function', documentation: 'fn add(a, b)' },
      { name: 'score', kind: 'variable', documentation: 'U score = 0' },
    ]);

    expect(items).toEqual([
      {
        label: 'add',
        kind: CompletionItemKind.Function,
        documentation: { kind: MarkupKind.Markdown, value: '```nesfab\nfn add(a, b)\n```' },
      },
      {
        label: 'score',
        kind: CompletionItemKind.Variable,
        documentation: { kind: MarkupKind.Markdown, value: '```nesfab\nU score = 0\n```' },
      },
    ]);
  });
});
