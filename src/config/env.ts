/**
 * Environment Variable Handler
 *
 * Reads the environment once and caches it.
 * Supports .env files for local development via dotenv.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

export const EnvSchema = z.object({
  /** Overrides the ~/.asnx config directory */
  ASNX_HOME: z
    .string()
    .trim()
    .min(1)
    .optional()
    .catch(undefined),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

/**
 * Load environment variables (called once, then cached).
 * A blank ASNX_HOME counts as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    ASNX_HOME: process.env.ASNX_HOME,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Drop the cached environment so the next loadEnv() re-reads process.env.
 * Tests call this after changing ASNX_HOME.
 */
export function _clearEnvCache(): void {
  _envCache = null;
}
