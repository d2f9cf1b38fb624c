/**
 * CLI context manager
 *
 * Builds the shared components (config, logger, parser, index, resolver)
 * from the loaded configuration.
 */

import { ZodError } from 'zod';
import { loadConfig, type LoadConfigOptions } from '../config/config.js';
import type { FabdexConfig } from '../config/schema.js';
import type { GraphBuildOptions } from '../dependencies/types.js';
import { ProjectIndex } from '../index/project-index.js';
import { createLogger, setDefaultLogger, type FabdexLogger } from '../logging/logger.js';
import { createTreeSitterParser } from '../parser/tree-sitter.js';
import { ParserError, type SourceParser } from '../parser/types.js';
import { SymbolResolver } from '../resolver/symbol-resolver.js';
import { CLIError, CommonErrors, ExitCode, GrammarError } from './errors.js';

/**
 * CLI context containing all initialized components
 */
export interface CLIContext {
  config: FabdexConfig;
  logger: FabdexLogger;
  parser: SourceParser;
  index: ProjectIndex;
  resolver: SymbolResolver;
}

/**
 * Options for creating CLI context
 */
export interface CreateContextOptions extends LoadConfigOptions {
  /** Parser to use instead of loading the configured grammar */
  parser?: SourceParser;
}

/**
 * Graph options derived from configuration
 */
export function graphOptionsFromConfig(
  config: FabdexConfig
): Omit<GraphBuildOptions, 'logger' | 'concurrency'> {
  const options: Omit<GraphBuildOptions, 'logger' | 'concurrency'> = {
    configExtension: config.language.configExtension,
    sourceExtension: config.language.sourceExtension,
    excludePatterns: config.indexing.excludePatterns,
  };
  if (config.dependencies.baseDirectory !== undefined) {
    options.baseDirectory = config.dependencies.baseDirectory;
  }
  return options;
}

/**
 * Load the configured grammar, mapping failures to a CLI error
 */
async function loadParser(config: FabdexConfig): Promise<SourceParser> {
  try {
    return await createTreeSitterParser({ grammarPackage: config.language.grammarPackage });
  } catch (error) {
    if (error instanceof ParserError) {
      throw new GrammarError(config.language.grammarPackage, error);
    }
    throw error;
  }
}

/**
 * Load configuration and install the configured logger as the default
 */
export function loadCLIConfig(options: LoadConfigOptions = {}): {
  config: FabdexConfig;
  logger: FabdexLogger;
} {
  let config: FabdexConfig;
  try {
    config = loadConfig(options);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw CLIError.withHint(CommonErrors.configInvalid(details), ExitCode.INVALID_ARGS, error);
    }
    throw error;
  }

  const logger = createLogger(config.logging);
  setDefaultLogger(logger);
  return { config, logger };
}

/**
 * Create CLI context with all components initialized
 */
export async function createCLIContext(options: CreateContextOptions = {}): Promise<CLIContext> {
  const { config, logger } = loadCLIConfig(options);

  const parser = options.parser ?? (await loadParser(config));

  const index = new ProjectIndex({
    parser,
    graph: graphOptionsFromConfig(config),
    concurrency: config.indexing.concurrency,
    logger,
  });
  const resolver = new SymbolResolver(index, logger);

  return { config, logger, parser, index, resolver };
}
