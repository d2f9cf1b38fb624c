/**
 * Structured JSON logger for fabdex
 *
 * Provides configurable logging with:
 * - JSON output format
 * - Configurable log levels (debug/info/warn/error)
 * - Optional file output
 * - Timestamps and context metadata
 *
 * Logs go to stderr unless a file is configured: stdout carries the
 * language server protocol.
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';
import { createWriteStream } from 'node:fs';
import type { LoggingConfig } from '../config/schema.js';

/**
 * Context metadata for log entries
 */
export interface LogContext {
  /** File the entry is about */
  file?: string;
  /** Operation name */
  operation?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

/**
 * Logger instance type
 */
export type FabdexLogger = Logger;

/**
 * Create a destination stream for logging
 */
function createDestination(config: LoggingConfig): DestinationStream {
  if (config.file !== undefined && config.file !== '') {
    return createWriteStream(config.file, { flags: 'a' });
  }
  return pino.destination(2);
}

/**
 * Create logger options from configuration
 */
function createLoggerOptions(config: LoggingConfig): LoggerOptions {
  const options: LoggerOptions = {
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'fabdex',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  // Enable pretty printing for development
  if (config.pretty) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: config.file !== undefined && config.file !== '' ? config.file : 2,
      },
    };
  }

  return options;
}

/**
 * Create a configured logger instance
 *
 * @param config - Logging configuration
 * @returns Configured pino logger
 */
export function createLogger(config: LoggingConfig): FabdexLogger {
  const options = createLoggerOptions(config);

  // A transport owns its own destination
  if (options.transport !== undefined) {
    return pino(options);
  }

  return pino(options, createDestination(config));
}

/**
 * Default logger instance (info level, stderr, JSON format)
 * Should be replaced with createLogger() using actual config in application
 */
let defaultLogger: FabdexLogger | null = null;

/**
 * Get or create the default logger instance
 */
export function getLogger(): FabdexLogger {
  defaultLogger ??= createLogger({
    level: 'info',
    pretty: false,
  });
  return defaultLogger;
}

/**
 * Set the default logger instance
 */
export function setDefaultLogger(logger: FabdexLogger): void {
  defaultLogger = logger;
}

/**
 * Utility function to log operation start
 */
export function logOperationStart(
  logger: FabdexLogger,
  operation: string,
  context?: LogContext
): void {
  logger.debug({ operation, ...context }, `Starting ${operation}`);
}

/**
 * Utility function to log operation completion
 */
export function logOperationComplete(
  logger: FabdexLogger,
  operation: string,
  durationMs: number,
  context?: LogContext
): void {
  logger.info(
    { operation, durationMs, ...context },
    `Completed ${operation} in ${durationMs}ms`
  );
}

/**
 * Utility function to log operation failure
 */
export function logOperationError(
  logger: FabdexLogger,
  operation: string,
  error: Error,
  context?: LogContext
): void {
  logger.error(
    {
      operation,
      error: {
        message: error.message,
        name: error.name,
        stack: error.stack,
      },
      ...context,
    },
    `Failed ${operation}: ${error.message}`
  );
}

/**
 * Run an async operation, logging its start, completion and failure
 */
export async function withLogging<T>(
  logger: FabdexLogger,
  operation: string,
  fn: () => Promise<T>,
  context?: LogContext
): Promise<T> {
  const start = Date.now();
  logOperationStart(logger, operation, context);

  try {
    const result = await fn();
    logOperationComplete(logger, operation, Date.now() - start, context);
    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logOperationError(logger, operation, err, context);
    throw error;
  }
}
