import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { ZodError } from 'zod';
import { createConfig, findConfigFile, loadConfig } from '../../../src/config/config.js';
import { DEFAULT_CONFIG, safeValidateConfig } from '../../../src/config/schema.js';

describe('Configuration', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = realpathSync(mkdtempSync(join(tmpdir(), 'fabdex-config-test-')));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('schema defaults', () => {
    it('should describe a NESFab workspace', () => {
      expect(DEFAULT_CONFIG.language).toEqual({
        id: 'nesfab',
        sourceExtension: 'fab',
        configExtension: 'cfg',
        grammarPackage: 'tree-sitter-nesfab',
      });
      expect(DEFAULT_CONFIG.indexing.concurrency).toBe(8);
      expect(DEFAULT_CONFIG.dependencies.baseDirectory).toBeUndefined();
      expect(DEFAULT_CONFIG.logging).toEqual({ level: 'info', pretty: false });
    });

    it('should reject an unknown log level', () => {
      const result = safeValidateConfig({ logging: { level: 'verbose' } });

      expect(result.success).toBe(false);
    });
  });

  describe('loadConfig', () => {
    it('should return the defaults without file or environment', () => {
      expect(loadConfig({ skipFile: true, skipEnv: true })).toEqual(DEFAULT_CONFIG);
    });

    it('should merge a config file over the defaults', () => {
      const configPath = join(tempDir, 'fabdex.config.json');
      writeFileSync(configPath, JSON.stringify({ indexing: { concurrency: 4 } }));

      const config = loadConfig({ configPath, skipEnv: true });

      expect(config.indexing.concurrency).toBe(4);
      expect(config.indexing.excludePatterns).toEqual(DEFAULT_CONFIG.indexing.excludePatterns);
    });

    it('should read the NESFab installation directory from the environment', () => {
      const config = loadConfig({ skipFile: true, env: { NESFAB: '/opt/nesfab' } });

      expect(config.dependencies.baseDirectory).toBe('/opt/nesfab');
    });

    it('should prefer the prefixed base directory variable', () => {
      const config = loadConfig({
        skipFile: true,
        env: { NESFAB: '/opt/nesfab', FABDEX_BASE_DIR: '/srv/nesfab' },
      });

      expect(config.dependencies.baseDirectory).toBe('/srv/nesfab');
    });

    it('should convert numeric and boolean variables', () => {
      const config = loadConfig({
        skipFile: true,
        env: { FABDEX_CONCURRENCY: '3', FABDEX_LOG_PRETTY: 'true', FABDEX_LOG_LEVEL: 'debug' },
      });

      expect(config.indexing.concurrency).toBe(3);
      expect(config.logging.pretty).toBe(true);
      expect(config.logging.level).toBe('debug');
    });

    it('should let overrides win over the environment', () => {
      const config = loadConfig({
        skipFile: true,
        env: { FABDEX_CONCURRENCY: '3' },
        overrides: { indexing: { concurrency: 12 } },
      });

      expect(config.indexing.concurrency).toBe(12);
    });

    it('should throw a ZodError for out-of-range values', () => {
      expect(() => loadConfig({ skipFile: true, env: { FABDEX_CONCURRENCY: '0' } })).toThrow(ZodError);
    });

    it('should report unreadable config files', () => {
      const configPath = join(tempDir, 'fabdex.json');
      writeFileSync(configPath, '{ not json');

      expect(() => loadConfig({ configPath, skipEnv: true })).toThrow(
        `Failed to load configuration from ${configPath}`
      );
    });
  });

  describe('findConfigFile', () => {
    it('should search parent directories', () => {
      const nested = join(tempDir, 'game', 'src');
      mkdirSync(nested, { recursive: true });
      const configPath = join(tempDir, '.fabdexrc.json');
      writeFileSync(configPath, '{}');

      expect(findConfigFile(nested)).toBe(configPath);
    });

    it('should prefer fabdex.config.json within one directory', () => {
      writeFileSync(join(tempDir, 'fabdex.json'), '{}');
      writeFileSync(join(tempDir, 'fabdex.config.json'), '{}');

      expect(findConfigFile(tempDir)).toBe(join(tempDir, 'fabdex.config.json'));
    });
  });

  describe('createConfig', () => {
    it('should apply partial overrides to the defaults', () => {
      const config = createConfig({ language: { grammarPackage: 'tree-sitter-fab' } });

      expect(config.language.grammarPackage).toBe('tree-sitter-fab');
      expect(config.language.sourceExtension).toBe('fab');
    });
  });
});
