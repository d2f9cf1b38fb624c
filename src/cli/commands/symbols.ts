/**
 * CLI command: symbols
 *
 * Parse one source file and print its functions and global variables.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { Command } from 'commander';
import { createCLIContext } from '../context.js';
import { NotFoundError, SourceError, handleError } from '../errors.js';
import { formatSymbols } from '../output.js';

/**
 * Command options
 */
interface SymbolsOptions {
  json?: boolean;
  config?: string;
}

/**
 * Execute the symbols command
 */
async function executeSymbols(file: string, options: SymbolsOptions): Promise<void> {
  const isJson = options.json === true;

  try {
    const path = resolve(file);

    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (error) {
      throw new NotFoundError(path, error instanceof Error ? error : undefined);
    }

    const context = await createCLIContext(
      options.config !== undefined ? { configPath: options.config } : {}
    );
    const result = context.index.updateFile(path, text);
    if (!result.success) {
      throw new SourceError(`Failed to index ${path}: ${result.error.message}`, result.error);
    }

    console.log(formatSymbols(path, result.symbols, { json: isJson }));
  } catch (error) {
    handleError(error, isJson);
  }
}

/**
 * Register the symbols command
 */
export function registerSymbolsCommand(program: Command): void {
  program
    .command('symbols')
    .description('List the functions and global variables defined in a source file')
    .argument('<file>', 'Source file to parse')
    .option('-c, --config <path>', 'Configuration file')
    .option('--json', 'Output in JSON format')
    .action(async (file: string, options: SymbolsOptions) => {
      await executeSymbols(file, options);
    });
}
