/**
 * fabdex - Code intelligence for NESFab projects
 *
 * Main entry point for the library exports.
 */

// Configuration exports
export * from './config/schema.js';
export * from './config/config.js';

// Logging exports
export * from './logging/logger.js';

// Parsing and symbol extraction
export * from './parser/types.js';
export * from './parser/visitor.js';
export * from './parser/tree-sitter.js';
export * from './symbols/types.js';
export * from './symbols/extractor.js';

// Dependency graph
export * from './dependencies/types.js';
export * from './dependencies/config-file.js';
export * from './dependencies/graph-builder.js';

// Index and queries
export * from './index/types.js';
export * from './index/project-index.js';
export * from './resolver/types.js';
export * from './resolver/symbol-resolver.js';

// Language server
export * from './server/protocol.js';
export * from './server/language-server.js';

// Version info
export const VERSION = '0.1.0';
