/**
 * Output formatting for CLI
 *
 * Provides human-readable and JSON output formatters for CLI commands.
 */

import chalk from 'chalk';
import type { DependencyGraph } from '../dependencies/types.js';
import { tableSymbols, type FabSymbol, type SymbolTable } from '../symbols/types.js';

/**
 * Output options for formatting
 */
export interface OutputOptions {
  /** Output in JSON format */
  json?: boolean;
}

/**
 * Symbol for display (one-based lines)
 */
export interface SymbolDisplay {
  name: string;
  kind: FabSymbol['kind'];
  line: number;
  endLine: number;
  description: string;
}

/**
 * Dependency entry for display
 */
export interface DependencyDisplay {
  directory: string;
  inputs: string[];
}

export function toSymbolDisplay(symbol: FabSymbol): SymbolDisplay {
  return {
    name: symbol.name,
    kind: symbol.kind,
    line: symbol.range.startLine + 1,
    endLine: symbol.range.endLine + 1,
    description: symbol.description,
  };
}

/**
 * Dependency entries sorted by directory, inputs sorted by path
 */
export function toDependencyDisplay(graph: DependencyGraph): DependencyDisplay[] {
  return Array.from(graph.entries())
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([directory, inputs]) => ({ directory, inputs: Array.from(inputs).sort() }));
}

/**
 * Format a file's symbols
 */
export function formatSymbols(path: string, table: SymbolTable, options: OutputOptions = {}): string {
  const symbols = tableSymbols(table).map(toSymbolDisplay);

  if (options.json === true) {
    return JSON.stringify({ file: path, symbols }, null, 2);
  }

  if (symbols.length === 0) {
    return chalk.yellow(`No symbols in ${path}`);
  }

  const lines = [chalk.bold(`${path}:`)];
  for (const symbol of symbols) {
    const badge = symbol.kind === 'function' ? chalk.cyan('[function]') : chalk.magenta('[variable]');
    lines.push(`  ${String(symbol.line).padStart(4)}  ${badge} ${symbol.name}`);
    for (const descriptionLine of symbol.description.split('\n')) {
      lines.push(chalk.dim(`        ${descriptionLine}`));
    }
  }
  return lines.join('\n');
}

/**
 * Format a dependency graph
 */
export function formatDependencies(graph: DependencyGraph, options: OutputOptions = {}): string {
  const entries = toDependencyDisplay(graph);

  if (options.json === true) {
    return JSON.stringify({ directories: entries }, null, 2);
  }

  if (entries.length === 0) {
    return chalk.yellow('No config files found.');
  }

  const lines: string[] = [];
  for (const entry of entries) {
    lines.push(chalk.bold(`${entry.directory}/`));
    if (entry.inputs.length === 0) {
      lines.push(chalk.dim('  (no resolvable inputs)'));
    }
    for (const input of entry.inputs) {
      lines.push(`  ${input}`);
    }
  }
  return lines.join('\n');
}
