import { describe, it, expect } from 'vitest';
import { createTreeSitterParser, TreeSitterParser } from '../../../src/parser/tree-sitter.js';
import { ParserError, ParserErrorCode } from '../../../src/parser/types.js';

// The NESFab grammar is not an npm dependency; a JSON grammar exercises the
// same native runtime.
const GRAMMAR = { grammarPackage: 'tree-sitter-json' };

describe('TreeSitterParser', () => {
  it('should parse source with a loaded grammar', async () => {
    const parser = await createTreeSitterParser(GRAMMAR);
    const tree = parser.parse('{"a": 1}');

    expect(tree.rootNode.type).toBe('document');
  });

  it('should parse sources larger than 32 KiB', async () => {
    const parser = await createTreeSitterParser(GRAMMAR);
    const text = `[${Array.from({ length: 20000 }, (_, i) => String(i % 10)).join(',')}]`;

    const tree = parser.parse(text);

    expect(text.length).toBeGreaterThan(32 * 1024);
    expect(tree.rootNode.type).toBe('document');
    expect(tree.rootNode.endPosition).toEqual({ row: 0, column: text.length });
  });

  it('should fail with GRAMMAR_NOT_LOADED for a missing package', async () => {
    const error = await createTreeSitterParser({ grammarPackage: 'no-such-grammar' }).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(ParserError);
    expect(error).toMatchObject({
      code: ParserErrorCode.GRAMMAR_NOT_LOADED,
      message: 'Grammar package not installed: no-such-grammar',
    });
  });

  it('should refuse to parse before the grammar is loaded', () => {
    const parser = new TreeSitterParser(GRAMMAR);

    expect(() => parser.parse('{}')).toThrow(ParserError);
    expect(() => parser.parse('{}')).toThrow('Grammar not loaded: tree-sitter-json');
  });
});
