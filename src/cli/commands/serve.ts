/**
 * CLI command: serve
 *
 * Start the language server.
 */

import { Command } from 'commander';
import { createConnection, ProposedFeatures } from 'vscode-languageserver/node.js';
import { createCLIContext } from '../context.js';
import { handleError } from '../errors.js';
import { startLanguageServer } from '../../server/language-server.js';

/**
 * Command options
 */
interface ServeOptions {
  stdio?: boolean;
  config?: string;
}

/**
 * Execute the serve command
 */
async function executeServe(options: ServeOptions): Promise<void> {
  try {
    const context = await createCLIContext(
      options.config !== undefined ? { configPath: options.config } : {}
    );
    context.logger.info({ stdio: options.stdio === true }, 'Starting language server');

    // Without --stdio the transport comes from the process arguments
    // (--node-ipc, --socket=<port>, --pipe=<name>)
    startLanguageServer({
      index: context.index,
      resolver: context.resolver,
      languageId: context.config.language.id,
      logger: context.logger,
      ...(options.stdio === true
        ? { connection: createConnection(ProposedFeatures.all, process.stdin, process.stdout) }
        : {}),
    });
  } catch (error) {
    handleError(error);
  }
}

/**
 * Register the serve command
 */
export function registerServeCommand(program: Command): void {
  program
    .command('serve')
    .description('Start the language server')
    .option('--stdio', 'Communicate over stdin and stdout')
    .option('-c, --config <path>', 'Configuration file')
    .action(async (options: ServeOptions) => {
      await executeServe(options);
    });
}
