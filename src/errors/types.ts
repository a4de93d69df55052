/**
 * Error type definitions for the asnx CLI
 *
 * Every error carries:
 * - An actionable recovery hint
 * - An exit code, so scripts can tell failures apart
 */

/**
 * Base class for all CLI errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - A marker set to an empty string
 * - An output extension without a leading dot
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(
      message,
      hint ?? 'Run: asnx config list  to see valid options',
      2
    );
    this.name = 'ConfigError';
  }
}

/**
 * A file or directory asnx could not read or write. Keeps the path and
 * the file system error (ENOENT, EACCES, EISDIR, ...) that caused it.
 */
export abstract class FileAccessError extends CLIError {
  public readonly path: string;

  public readonly cause?: Error;

  protected constructor(message: string, hint: string, code: number, path: string, cause?: Error) {
    super(message, hint, code);
    this.path = path;
    this.cause = cause;
  }
}

/**
 * The source document (or a directory to scan) cannot be read.
 *
 * Raised before any output is opened, so an existing output file
 * is left untouched.
 *
 * Exit code 3: Input unreadable
 */
export class InputUnreadableError extends FileAccessError {
  constructor(path: string, cause?: Error) {
    super(
      `Cannot read input file: ${path}`,
      'Check that the input file exists and is readable',
      3,
      path,
      cause
    );
    this.name = 'InputUnreadableError';
  }
}

/**
 * An output file or directory cannot be created.
 *
 * Exit code 4: Output unwritable
 */
export class OutputUnwritableError extends FileAccessError {
  constructor(path: string, cause?: Error) {
    super(
      `Cannot write output file: ${path}`,
      'Check that the target directory exists and is writable, or pass --output',
      4,
      path,
      cause
    );
    this.name = 'OutputUnwritableError';
  }
}

/**
 * Thrown when command-line input validation fails.
 *
 * Used with Zod schemas to provide field-level errors.
 *
 * Exit code 1: General error
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
