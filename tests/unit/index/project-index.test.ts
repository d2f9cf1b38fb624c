import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ProjectIndex, isWithin } from '../../../src/index/project-index.js';
import { ExtractionError, ExtractionErrorCode } from '../../../src/symbols/types.js';
import { FabTestParser } from '../../helpers/fab-parser.js';
import type { SyntaxTree } from '../../../src/parser/types.js';
import { silentLogger } from '../../helpers/logger.js';

/**
 * Runs a one-shot callback before the next parse, standing in for an editor
 * update that lands while a disk copy is being indexed
 */
class InterleavingParser extends FabTestParser {
  beforeNextParse: (() => void) | undefined;

  override parse(text: string): SyntaxTree {
    const hook = this.beforeNextParse;
    this.beforeNextParse = undefined;
    hook?.();
    return super.parse(text);
  }
}

describe('ProjectIndex', () => {
  let tempDir: string;
  let parser: FabTestParser;
  let index: ProjectIndex;

  function write(relativePath: string, content = ''): string {
    const path = join(tempDir, relativePath);
    mkdirSync(join(path, '..'), { recursive: true });
    writeFileSync(path, content);
    return path;
  }

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(join(tmpdir(), 'fabdex-index-test-')));
    parser = new FabTestParser();
    index = new ProjectIndex({
      parser,
      graph: { configExtension: 'cfg', sourceExtension: 'fab' },
      concurrency: 2,
      logger: silentLogger(),
    });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('isWithin', () => {
    it('should accept the root itself and paths below it', () => {
      expect(isWithin('/ws/game', '/ws/game')).toBe(true);
      expect(isWithin('/ws/game/src', '/ws/game')).toBe(true);
    });

    it('should reject siblings sharing a prefix', () => {
      expect(isWithin('/ws/gameplay', '/ws/game')).toBe(false);
    });
  });

  describe('updateFile', () => {
    it('should store text, tree and symbols', () => {
      const path = join(tempDir, 'main.fab');
      const result = index.updateFile(path, 'fn main()\n');

      expect(result.success).toBe(true);
      expect(index.getText(path)).toBe('fn main()\n');
      expect(index.getTree(path)?.rootNode.type).toBe('source_file');
      expect(index.getSymbolTable(path)?.functions.has('main')).toBe(true);
      expect(index.isIndexed(path)).toBe(true);
    });

    it('should produce equal symbol tables for the same text', () => {
      const path = join(tempDir, 'main.fab');
      index.updateFile(path, '// doc\nfn main()\nU x = 1\n');
      const first = index.getSymbolTable(path);
      index.updateFile(path, '// doc\nfn main()\nU x = 1\n');

      expect(index.getSymbolTable(path)).toEqual(first);
    });

    it('should replace symbols on a successful update', () => {
      const path = join(tempDir, 'main.fab');
      index.updateFile(path, 'fn old()\n');
      index.updateFile(path, 'fn fresh()\n');

      expect(Array.from(index.getSymbolTable(path)?.functions.keys() ?? [])).toEqual(['fresh']);
    });

    it('should keep the previous tree and symbols when extraction fails', () => {
      const path = join(tempDir, 'main.fab');
      index.updateFile(path, 'fn good()\n');
      const tree = index.getTree(path);

      const result = index.updateFile(path, 'fn (broken)\n');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(ExtractionError);
        expect(result.error.code).toBe(ExtractionErrorCode.MISSING_NAME);
      }
      expect(index.getText(path)).toBe('fn (broken)\n');
      expect(index.getTree(path)).toBe(tree);
      expect(index.getSymbolTable(path)?.functions.has('good')).toBe(true);
    });

    it('should leave a never-indexed file absent when parsing fails', () => {
      const path = join(tempDir, 'main.fab');
      const result = index.updateFile(path, '#error\n');

      expect(result.success).toBe(false);
      expect(index.getTree(path)).toBeUndefined();
      expect(index.isIndexed(path)).toBe(false);
    });
  });

  describe('refreshWorkspace', () => {
    it('should build the graph and index referenced files', async () => {
      write('game/game.cfg', 'input = main.fab\ninput = util.fab\n');
      const main = write('game/main.fab', 'fn main()\n    helper()\n');
      const util = write('game/util.fab', 'fn helper()\n');

      const result = await index.refreshWorkspace([tempDir], []);

      expect(result).toEqual({
        scannedDirectories: [tempDir],
        configDirectories: 1,
        filesIndexed: 2,
        filesFailed: 0,
      });
      expect(index.dependencyEntries()).toEqual([[join(tempDir, 'game'), new Set([main, util])]]);
      expect(index.getSymbolTable(util)?.functions.has('helper')).toBe(true);
      expect(index.workspaceRoots()).toEqual([tempDir]);
    });

    it('should not overwrite files the editor already updated', async () => {
      write('game/game.cfg', 'input = main.fab\n');
      const main = write('game/main.fab', 'fn on_disk()\n');
      index.updateFile(main, 'fn in_editor()\n');

      const result = await index.refreshWorkspace([tempDir], []);

      expect(result.filesIndexed).toBe(0);
      expect(index.getText(main)).toBe('fn in_editor()\n');
      expect(index.getSymbolTable(main)?.functions.has('in_editor')).toBe(true);
    });

    it('should keep an editor update made while the disk copy was parsing', async () => {
      write('game/game.cfg', 'input = main.fab\n');
      const main = write('game/main.fab', 'fn on_disk()\n');
      const interleaving = new InterleavingParser();
      const racing = new ProjectIndex({
        parser: interleaving,
        graph: { configExtension: 'cfg', sourceExtension: 'fab' },
        logger: silentLogger(),
      });
      interleaving.beforeNextParse = () => {
        racing.updateFile(main, 'fn in_editor()\n');
      };

      const result = await racing.refreshWorkspace([tempDir], []);

      expect(result.filesIndexed).toBe(0);
      expect(racing.getText(main)).toBe('fn in_editor()\n');
      expect(Array.from(racing.getSymbolTable(main)?.functions.keys() ?? [])).toEqual(['in_editor']);
    });

    it('should count files that fail to index', async () => {
      write('game/game.cfg', 'input = good.fab\ninput = bad.fab\n');
      write('game/good.fab', 'fn good()\n');
      const bad = write('game/bad.fab', 'fn (oops)\n');

      const result = await index.refreshWorkspace([tempDir], []);

      expect(result.filesIndexed).toBe(1);
      expect(result.filesFailed).toBe(1);
      expect(index.isIndexed(bad)).toBe(false);
    });

    it('should keep entries of other roots when a root is added', async () => {
      const first = join(tempDir, 'first');
      const second = join(tempDir, 'second');
      write('first/a.cfg', 'input = a.fab\n');
      write('first/a.fab', 'fn a()\n');
      write('second/b.cfg', 'input = b.fab\n');
      write('second/b.fab', 'fn b()\n');

      await index.refreshWorkspace([first], []);
      await index.refreshWorkspace([second], []);

      expect(index.dependencyEntries().map(([dir]) => dir).sort()).toEqual([first, second]);
    });

    it('should evict entries under removed roots but keep cached symbols', async () => {
      const first = join(tempDir, 'first');
      const second = join(tempDir, 'second');
      write('first/a.cfg', 'input = a.fab\n');
      const a = write('first/a.fab', 'fn a()\n');
      write('second/b.cfg', 'input = b.fab\n');
      write('second/b.fab', 'fn b()\n');

      await index.refreshWorkspace([first, second], []);
      const result = await index.refreshWorkspace([], [first]);

      expect(result.scannedDirectories).toEqual([]);
      expect(index.dependencyEntries().map(([dir]) => dir)).toEqual([second]);
      expect(index.workspaceRoots()).toEqual([second]);
      expect(index.isIndexed(a)).toBe(true);
    });

    it('should not rescan directories already tracked as config directories', async () => {
      const game = join(tempDir, 'game');
      write('game/game.cfg', 'input = main.fab\n');
      write('game/main.fab', 'fn main()\n');

      await index.refreshWorkspace([game], []);
      const callsAfterFirst = parser.calls;
      const result = await index.refreshWorkspace([game], []);

      expect(result.scannedDirectories).toEqual([]);
      expect(result.filesIndexed).toBe(0);
      expect(parser.calls).toBe(callsAfterFirst);
    });
  });
});
