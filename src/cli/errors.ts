/**
 * CLI error types and handlers
 *
 * Defines CLI-specific errors with exit codes for proper process termination.
 * Errors may carry a recovery hint printed below the message.
 */

/**
 * Recovery information attached to an error
 */
export interface ErrorHint {
  error: string;
  action_required: string;
  command?: string;
  hint?: string;
}

/**
 * CLI exit codes
 */
export enum ExitCode {
  /** Success */
  SUCCESS = 0,
  /** General error */
  GENERAL_ERROR = 1,
  /** Invalid arguments */
  INVALID_ARGS = 2,
  /** File or directory not found */
  NOT_FOUND = 3,
  /** Grammar package missing or unusable */
  GRAMMAR_ERROR = 4,
  /** Source could not be parsed or extracted */
  PARSE_ERROR = 5,
}

/**
 * Base CLI error class
 */
export class CLIError extends Error {
  public readonly errorHint: ErrorHint | undefined;

  constructor(
    message: string,
    public readonly exitCode: ExitCode = ExitCode.GENERAL_ERROR,
    public override readonly cause?: Error,
    errorHint?: ErrorHint
  ) {
    super(message);
    this.name = 'CLIError';
    this.errorHint = errorHint;
  }

  /**
   * Create a CLIError from a recovery hint
   */
  static withHint(errorHint: ErrorHint, exitCode: ExitCode = ExitCode.GENERAL_ERROR, cause?: Error): CLIError {
    return new CLIError(errorHint.error, exitCode, cause, errorHint);
  }
}

/**
 * Error when a file or directory does not exist
 */
export class NotFoundError extends CLIError {
  constructor(path: string, cause?: Error) {
    super(`File not found: ${path}`, ExitCode.NOT_FOUND, cause, CommonErrors.fileNotFound(path));
    this.name = 'NotFoundError';
  }
}

/**
 * Error when the grammar package cannot be loaded
 */
export class GrammarError extends CLIError {
  constructor(grammarPackage: string, cause?: Error) {
    super(
      `Failed to load grammar: ${grammarPackage}`,
      ExitCode.GRAMMAR_ERROR,
      cause,
      CommonErrors.grammarNotLoaded(grammarPackage)
    );
    this.name = 'GrammarError';
  }
}

/**
 * Error when a source file cannot be indexed
 */
export class SourceError extends CLIError {
  constructor(message: string, cause?: Error) {
    super(message, ExitCode.PARSE_ERROR, cause);
    this.name = 'SourceError';
  }
}

/**
 * Common errors with pre-defined messages
 */
export const CommonErrors = {
  grammarNotLoaded: (grammarPackage: string): ErrorHint => ({
    error: 'Grammar not loaded',
    action_required: 'Install the grammar package or point language.grammarPackage at one',
    command: `npm install ${grammarPackage}`,
    hint: 'Set FABDEX_GRAMMAR_PACKAGE to use another package',
  }),

  fileNotFound: (path: string): ErrorHint => ({
    error: `File not found: ${path}`,
    action_required: 'Verify the path exists and is readable',
  }),

  configInvalid: (details: string): ErrorHint => ({
    error: 'Invalid configuration',
    action_required: 'Fix the configuration file',
    hint: details,
  }),
} as const;

/**
 * Format an error hint for output
 */
export function formatErrorHint(error: ErrorHint, json = false): string {
  if (json || process.env.FABDEX_OUTPUT === 'json') {
    return JSON.stringify(error, null, 2);
  }

  const lines: string[] = [
    `Error: ${error.error}`,
    '',
    `Action required: ${error.action_required}`,
  ];

  if (error.command !== undefined) {
    lines.push('', `Run: ${error.command}`);
  }

  if (error.hint !== undefined) {
    lines.push('', `Hint: ${error.hint}`);
  }

  return lines.join('\n');
}

/**
 * Render an error as the text handleError prints
 */
export function formatError(error: unknown, json = false): { exitCode: ExitCode; output: string } {
  let exitCode = ExitCode.GENERAL_ERROR;
  let message: string;
  let errorHint: ErrorHint | undefined;

  if (error instanceof CLIError) {
    exitCode = error.exitCode;
    message = error.message;
    errorHint = error.errorHint;
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  if (errorHint !== undefined) {
    return { exitCode, output: formatErrorHint(errorHint, json) };
  }
  if (json) {
    return { exitCode, output: JSON.stringify({ error: { code: exitCode, message } }) };
  }
  return { exitCode, output: `Error: ${message}` };
}

/**
 * Handle an error and exit the process with appropriate code
 */
export function handleError(error: unknown, json = false): never {
  const { exitCode, output } = formatError(error, json);
  console.error(output);
  process.exit(exitCode);
}
