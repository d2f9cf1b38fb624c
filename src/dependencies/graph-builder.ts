/**
 * Dependency graph construction
 *
 * Scans root directories for build descriptors and maps each descriptor's
 * directory to the source files it declares as inputs. Only direct inputs
 * are followed; a config never pulls in another config.
 */

import { readFile, realpath } from 'node:fs/promises';
import { dirname, extname, resolve } from 'node:path';
import fg from 'fast-glob';
import pLimit from 'p-limit';
import { getLogger, type FabdexLogger } from '../logging/logger.js';
import { parseInputReferences } from './config-file.js';
import type { DependencyGraph, GraphBuildOptions } from './types.js';

const DEFAULT_CONCURRENCY = 8;

/**
 * Resolved inputs of one config file
 */
interface ConfigInputs {
  configDir: string;
  inputs: string[];
}

/**
 * Find every config file below the given roots
 *
 * Missing roots and unreadable directories contribute nothing.
 *
 * @returns Absolute config file paths, sorted
 */
export async function findConfigFiles(
  roots: Iterable<string>,
  options: GraphBuildOptions
): Promise<string[]> {
  const logger = options.logger ?? getLogger();
  const found = new Set<string>();

  for (const root of new Set(Array.from(roots, (r) => resolve(r)))) {
    const files = await fg(`**/*.${options.configExtension}`, {
      cwd: root,
      ignore: options.excludePatterns ?? [],
      absolute: true,
      dot: true,
      onlyFiles: true,
      suppressErrors: true,
    });
    logger.debug({ root, configFiles: files.length }, 'Config files found');
    for (const file of files) found.add(resolve(file));
  }

  return Array.from(found).sort();
}

/**
 * Canonical path of an existing file, or null when it does not exist
 */
async function canonicalize(path: string): Promise<string | null> {
  try {
    return await realpath(path);
  } catch {
    return null;
  }
}

/**
 * Resolve an `input` reference against the config directory, then the base
 * directory. The first existing candidate wins.
 */
export async function resolveReference(
  reference: string,
  configDir: string,
  baseDirectory?: string
): Promise<string | null> {
  const candidates = [resolve(configDir, reference)];
  if (baseDirectory !== undefined && baseDirectory !== '') {
    candidates.push(resolve(baseDirectory, reference));
  }

  for (const candidate of candidates) {
    const resolved = await canonicalize(candidate);
    if (resolved !== null) return resolved;
  }
  return null;
}

/**
 * Read one config file and resolve its inputs
 *
 * Returns null when the file cannot be read.
 */
async function readConfigInputs(
  configFile: string,
  options: GraphBuildOptions,
  logger: FabdexLogger
): Promise<ConfigInputs | null> {
  let content: string;
  try {
    content = await readFile(configFile, 'utf-8');
  } catch (error) {
    logger.warn(
      { file: configFile, error: error instanceof Error ? error.message : String(error) },
      'Failed to read config file'
    );
    return null;
  }

  const configDir = dirname(configFile);
  const sourceExtension = `.${options.sourceExtension}`;
  const inputs: string[] = [];

  for (const reference of parseInputReferences(content)) {
    const resolved = await resolveReference(reference, configDir, options.baseDirectory);
    if (resolved === null) {
      logger.debug({ file: configFile, reference }, 'Unresolved input reference');
      continue;
    }
    if (extname(resolved) === sourceExtension) {
      inputs.push(resolved);
    }
  }

  return { configDir, inputs };
}

/**
 * Build the dependency graph for a set of root directories
 *
 * Directories without a config file are absent from the result. A config
 * whose inputs all fail to resolve yields an empty set.
 */
export async function buildDependencyGraph(
  roots: Iterable<string>,
  options: GraphBuildOptions
): Promise<DependencyGraph> {
  const logger = options.logger ?? getLogger();
  const configFiles = await findConfigFiles(roots, options);
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);

  const results = await Promise.all(
    configFiles.map((configFile) => limit(() => readConfigInputs(configFile, options, logger)))
  );

  const graph: DependencyGraph = new Map();
  for (const result of results) {
    if (result === null) continue;

    let files = graph.get(result.configDir);
    if (files === undefined) {
      files = new Set();
      graph.set(result.configDir, files);
    }
    for (const input of result.inputs) {
      files.add(input);
    }
  }

  logger.debug(
    { configFiles: configFiles.length, directories: graph.size },
    'Dependency graph built'
  );
  return graph;
}
