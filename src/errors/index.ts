/**
 * Error handling module for the asnx CLI
 *
 * Usage:
 *   import { InputUnreadableError, handleError } from './errors/index.js';
 *
 *   throw new InputUnreadableError('spec.txt');
 */

// Error types
export {
  CLIError,
  ConfigError,
  FileAccessError,
  InputUnreadableError,
  OutputUnwritableError,
  ValidationError,
} from './types.js';

// Error handling utilities
export {
  describeError,
  formatError,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
} from './handler.js';
