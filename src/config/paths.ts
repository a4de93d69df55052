/**
 * Centralized Path Definitions
 *
 * Directory structure:
 * ~/.asnx/            (or $ASNX_HOME)
 * └── config.toml     (User configuration)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';
import { getEnv } from './env.js';

/**
 * Get the asnx directory path (~/.asnx unless ASNX_HOME is set)
 */
export function getAsnxDir(): string {
  return getEnv('ASNX_HOME') ?? join(homedir(), '.asnx');
}

/**
 * Get the config file path (<asnx dir>/config.toml)
 */
export function getConfigPath(): string {
  return join(getAsnxDir(), 'config.toml');
}
