/**
 * CLI command: deps
 *
 * Print the dependency graph built from the config files below some roots.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { buildDependencyGraph } from '../../dependencies/graph-builder.js';
import { graphOptionsFromConfig, loadCLIConfig } from '../context.js';
import { NotFoundError, handleError } from '../errors.js';
import { formatDependencies } from '../output.js';

/**
 * Command options
 */
interface DepsOptions {
  json?: boolean;
  config?: string;
}

async function assertDirectory(path: string): Promise<void> {
  try {
    const stats = await stat(path);
    if (stats.isDirectory()) return;
  } catch (error) {
    throw new NotFoundError(path, error instanceof Error ? error : undefined);
  }
  throw new NotFoundError(path);
}

/**
 * Execute the deps command
 */
async function executeDeps(dirs: string[], options: DepsOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const roots = dirs.map((dir) => resolve(dir));
    for (const root of roots) {
      await assertDirectory(root);
    }

    const { config, logger } = loadCLIConfig(
      options.config !== undefined ? { configPath: options.config } : {}
    );
    const graph = await buildDependencyGraph(roots, {
      ...graphOptionsFromConfig(config),
      concurrency: config.indexing.concurrency,
      logger,
    });

    console.log(formatDependencies(graph, { json: isJson }));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the deps command
 */
export function registerDepsCommand(program: Command): void {
  program
    .command('deps')
    .description('Show which source files each config directory declares as inputs')
    .argument('<dirs...>', 'Root directories to scan')
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Output in JSON format')
    .action(async (dirs: string[], options: DepsOptions) => {
      await executeDeps(dirs, options);
    });
}
