/**
 * Configuration loader for fabdex
 *
 * Loads configuration from file, applies environment variable overrides,
 * and validates the result against the schema.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { DEFAULT_CONFIG, validateConfig, type FabdexConfig } from './schema.js';

/**
 * Configuration file names to search for in project directories (in order of priority)
 */
const CONFIG_FILE_NAMES = ['fabdex.config.json', 'fabdex.json', '.fabdexrc.json'];

/**
 * Global configuration directory and file
 */
const GLOBAL_CONFIG_DIR = join(homedir(), '.fabdex');
const GLOBAL_CONFIG_FILE = join(GLOBAL_CONFIG_DIR, 'config.json');

/**
 * Map of environment variable names to configuration paths
 *
 * `NESFAB` is the variable the NESFab compiler itself reads; the prefixed
 * variable listed after it wins when both are set.
 */
const ENV_MAPPINGS: Record<string, string[]> = {
  // Language
  FABDEX_LANGUAGE_ID: ['language', 'id'],
  FABDEX_GRAMMAR_PACKAGE: ['language', 'grammarPackage'],
  // Dependencies
  NESFAB: ['dependencies', 'baseDirectory'],
  FABDEX_BASE_DIR: ['dependencies', 'baseDirectory'],
  // Indexing
  FABDEX_CONCURRENCY: ['indexing', 'concurrency'],
  // Logging
  FABDEX_LOG_LEVEL: ['logging', 'level'],
  FABDEX_LOG_FILE: ['logging', 'file'],
  FABDEX_LOG_PRETTY: ['logging', 'pretty'],
};

const NUMERIC_PATHS = ['indexing.concurrency'];

type PlainObject = Record<string, unknown>;

/**
 * Partial configuration accepted as overrides
 */
export type ConfigOverrides = {
  [K in keyof FabdexConfig]?: Partial<FabdexConfig[K]>;
};

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects
 */
function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Set a nested value in an object using a path array
 */
function setNestedValue(obj: PlainObject, path: readonly string[], value: unknown): void {
  let current = obj;
  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: PlainObject = {};
      current[key] = created;
      current = created;
    }
  }
  const lastKey = path[path.length - 1];
  if (lastKey !== undefined) {
    current[lastKey] = value;
  }
}

/**
 * Parse environment variable value to appropriate type
 */
function parseEnvValue(value: string, path: readonly string[]): unknown {
  // Boolean values
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  if (NUMERIC_PATHS.includes(path.join('.'))) {
    const num = parseInt(value, 10);
    if (!isNaN(num)) return num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
function loadEnvConfig(env: NodeJS.ProcessEnv): PlainObject {
  const config: PlainObject = {};

  for (const [envKey, path] of Object.entries(ENV_MAPPINGS)) {
    const value = env[envKey];
    if (value !== undefined && value !== '') {
      setNestedValue(config, path, parseEnvValue(value, path));
    }
  }

  return config;
}

/**
 * Find configuration file in specified directory or up the directory tree,
 * falling back to global config in ~/.fabdex/config.json
 */
export function findConfigFile(startDir: string = process.cwd()): string | null {
  let currentDir = resolve(startDir);
  const root = resolve('/');

  while (currentDir !== root) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(currentDir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    currentDir = resolve(currentDir, '..');
  }

  if (existsSync(GLOBAL_CONFIG_FILE)) {
    return GLOBAL_CONFIG_FILE;
  }

  return null;
}

/**
 * Load configuration from a JSON file
 */
function loadFileConfig(filePath: string): PlainObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load configuration from ${filePath}: ${message}`);
  }

  if (!isPlainObject(parsed)) {
    throw new Error(`Failed to load configuration from ${filePath}: expected a JSON object`);
  }
  return parsed;
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Explicit path to configuration file */
  configPath?: string;
  /** Directory to start searching for config file */
  searchDir?: string;
  /** Skip loading from file */
  skipFile?: boolean;
  /** Skip environment variable overrides */
  skipEnv?: boolean;
  /** Environment to read overrides from (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Additional configuration to merge */
  overrides?: ConfigOverrides;
}

/**
 * Load and validate fabdex configuration
 *
 * Configuration is loaded in the following order (later overrides earlier):
 * 1. Default configuration
 * 2. Configuration file (if found)
 * 3. Environment variables
 * 4. Explicit overrides
 *
 * @throws ZodError if the merged configuration is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): FabdexConfig {
  let config: PlainObject = { ...DEFAULT_CONFIG };

  if (options.skipFile !== true) {
    const configPath = options.configPath ?? findConfigFile(options.searchDir);
    if (configPath !== null) {
      config = deepMerge(config, loadFileConfig(configPath));
    }
  }

  if (options.skipEnv !== true) {
    config = deepMerge(config, loadEnvConfig(options.env ?? process.env));
  }

  if (options.overrides !== undefined) {
    config = deepMerge(config, options.overrides);
  }

  return validateConfig(config);
}

/**
 * Create a configuration instance with partial overrides
 */
export function createConfig(overrides: ConfigOverrides = {}): FabdexConfig {
  return validateConfig(deepMerge({ ...DEFAULT_CONFIG }, overrides));
}
