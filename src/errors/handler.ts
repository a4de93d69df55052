/**
 * Error reporting for the asnx CLI
 *
 * Every failure is reported once, on stderr: chalk text for terminals or a
 * single JSON object under --json. The process exits with the error's own
 * code (2 config, 3 input, 4 output) or 1 for anything else.
 */

import chalk from 'chalk';
import { CLIError, FileAccessError } from './types.js';

export interface ErrorHandlerOptions {
  /** Add stack traces */
  verbose?: boolean;
  json?: boolean;
}

/**
 * JSON shape written to stderr under --json
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** File behind an input or output failure */
  path?: string;
  /** Message of the underlying file system error */
  cause?: string;
  stack?: string;
}

export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Collect what asnx reports about an error. Only file access errors
 * carry a path and cause.
 */
export function describeError(error: unknown, verbose = false): ErrorOutput {
  const output: ErrorOutput = {
    error: error instanceof Error ? error.message : String(error),
    code: getExitCode(error),
  };

  if (error instanceof CLIError) {
    output.hint = error.hint;
  }
  if (error instanceof FileAccessError) {
    output.path = error.path;
    output.cause = error.cause?.message;
  }
  if (verbose && error instanceof Error) {
    output.stack = error.stack;
  }
  return output;
}

export function formatError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): string {
  const { verbose = false, json = false } = options;
  const output = describeError(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  if (output.cause) {
    lines.push(chalk.dim('Cause: ') + output.cause);
  }

  // Errors asnx did not raise itself come without a hint
  const hint = error instanceof CLIError ? output.hint : verbose ? undefined : 'Run with --verbose for more details';
  if (hint) {
    lines.push(chalk.dim('Hint: ') + hint);
  }

  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }
  return lines.join('\n');
}

/**
 * Print an error to stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: ErrorHandlerOptions = {}
): never {
  // stdout carries only command output
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Handler for `uncaughtException` and `unhandledRejection`. Options are
 * read when an error arrives, after --verbose and --json are parsed.
 */
export function createGlobalErrorHandler(
  getOptions: () => ErrorHandlerOptions = () => ({})
): (error: unknown) => never {
  return (error: unknown) => handleError(error, getOptions());
}
