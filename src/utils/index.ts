/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { silentLogger, type Logger } from './logger.js';
