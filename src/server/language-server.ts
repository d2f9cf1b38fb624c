/**
 * Language server for NESFab sources
 *
 * Wires protocol requests to a ProjectIndex and a SymbolResolver. Documents
 * are synced in full; every open or change re-indexes the whole file.
 */

import {
  createConnection,
  ProposedFeatures,
  TextDocumentSyncKind,
  type CompletionItem,
  type CompletionParams,
  type DefinitionParams,
  type DidChangeTextDocumentParams,
  type DidOpenTextDocumentParams,
  type Hover,
  type HoverParams,
  type InitializeParams,
  type InitializeResult,
  type Location,
  type WorkspaceFolder,
  type WorkspaceFoldersChangeEvent,
} from 'vscode-languageserver/node.js';
import type { ProjectIndex } from '../index/project-index.js';
import { getLogger, type FabdexLogger } from '../logging/logger.js';
import type { SymbolResolver } from '../resolver/symbol-resolver.js';
import {
  DEFAULT_LANGUAGE_ID,
  fromPosition,
  toCompletionItems,
  toHover,
  toLocation,
  uriToPath,
} from './protocol.js';

/**
 * The part of a vscode-languageserver Connection the server registers on
 */
export interface ServerConnection {
  onInitialize(handler: (params: InitializeParams) => InitializeResult): unknown;
  onInitialized(handler: () => void): unknown;
  onDidOpenTextDocument(handler: (params: DidOpenTextDocumentParams) => void): unknown;
  onDidChangeTextDocument(handler: (params: DidChangeTextDocumentParams) => void): unknown;
  onHover(handler: (params: HoverParams) => Hover | null): unknown;
  onDefinition(handler: (params: DefinitionParams) => Location | null): unknown;
  onCompletion(handler: (params: CompletionParams) => CompletionItem[]): unknown;
  workspace: {
    onDidChangeWorkspaceFolders(listener: (event: WorkspaceFoldersChangeEvent) => void): unknown;
  };
  listen(): void;
}

export interface LanguageServerOptions {
  index: ProjectIndex;
  resolver: SymbolResolver;
  /** Fence tag of code blocks in hover and completion documentation */
  languageId?: string;
  logger?: FabdexLogger;
  /** Connection to serve on; defaults to one chosen from the process arguments */
  connection?: ServerConnection;
}

function folderPaths(folders: readonly WorkspaceFolder[] | null | undefined): string[] {
  return (folders ?? []).map((folder) => uriToPath(folder.uri));
}

/**
 * Roots announced by the client, falling back to the single root URI
 */
function initialRoots(params: InitializeParams): string[] {
  if (params.workspaceFolders !== undefined && params.workspaceFolders !== null) {
    return folderPaths(params.workspaceFolders);
  }
  if (params.rootUri !== null) {
    return [uriToPath(params.rootUri)];
  }
  return [];
}

/**
 * Register handlers and start listening
 */
export function startLanguageServer(options: LanguageServerOptions): ServerConnection {
  const { index, resolver } = options;
  const logger = options.logger ?? getLogger();
  const languageId = options.languageId ?? DEFAULT_LANGUAGE_ID;
  const connection: ServerConnection = options.connection ?? createConnection(ProposedFeatures.all);

  let roots: string[] = [];
  let folderEvents = false;

  const refresh = (added: string[], removed: string[]): void => {
    void index
      .refreshWorkspace(added, removed)
      .then((result) => {
        logger.info(
          {
            configDirectories: result.configDirectories,
            filesIndexed: result.filesIndexed,
            filesFailed: result.filesFailed,
          },
          'Workspace indexed'
        );
      })
      .catch((error: unknown) => {
        logger.error(
          { error: error instanceof Error ? error.message : String(error) },
          'Workspace refresh failed'
        );
      });
  };

  const update = (uri: string, text: string): void => {
    const result = index.updateFile(uriToPath(uri), text);
    if (!result.success) {
      logger.debug({ uri, code: result.error.code }, 'Document kept previous symbols');
    }
  };

  connection.onInitialize((params): InitializeResult => {
    roots = initialRoots(params);
    folderEvents = params.capabilities.workspace?.workspaceFolders === true;
    logger.info({ roots, folderEvents }, 'Language server initializing');

    return {
      capabilities: {
        textDocumentSync: TextDocumentSyncKind.Full,
        hoverProvider: true,
        definitionProvider: true,
        completionProvider: { resolveProvider: false },
        workspace: {
          workspaceFolders: {
            supported: true,
            changeNotifications: true,
          },
        },
      },
    };
  });

  connection.onInitialized(() => {
    refresh(roots, []);

    // The connection throws on registration when the client sends no folder events
    if (folderEvents) {
      connection.workspace.onDidChangeWorkspaceFolders((event) => {
        refresh(folderPaths(event.added), folderPaths(event.removed));
      });
    }
  });

  connection.onDidOpenTextDocument((params) => {
    update(params.textDocument.uri, params.textDocument.text);
  });

  connection.onDidChangeTextDocument((params) => {
    const latest = params.contentChanges[params.contentChanges.length - 1];
    if (latest === undefined) return;
    update(params.textDocument.uri, latest.text);
  });

  connection.onHover((params) => {
    const result = resolver.hover(uriToPath(params.textDocument.uri), fromPosition(params.position));
    return result === null ? null : toHover(result, languageId);
  });

  connection.onDefinition((params) => {
    const result = resolver.gotoDefinition(
      uriToPath(params.textDocument.uri),
      fromPosition(params.position)
    );
    return result === null ? null : toLocation(result);
  });

  connection.onCompletion((params) => {
    return toCompletionItems(
      resolver.completion(uriToPath(params.textDocument.uri)),
      languageId
    );
  });

  connection.listen();
  return connection;
}
