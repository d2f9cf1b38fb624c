#!/usr/bin/env node
/**
 * fabdex CLI entry point
 *
 * Starts the language server or runs one-off indexing commands.
 */

import { Command } from 'commander';
import { VERSION } from '../index.js';
import { registerDepsCommand } from './commands/deps.js';
import { registerServeCommand } from './commands/serve.js';
import { registerSymbolsCommand } from './commands/symbols.js';

/**
 * Create and configure the CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('fabdex')
    .description('Code intelligence for NESFab projects')
    .version(VERSION);

  registerServeCommand(program);
  registerSymbolsCommand(program);
  registerDepsCommand(program);

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    // Commander handles most errors, but catch any unexpected ones
    console.error('Fatal error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}

// Run the CLI
void main();
