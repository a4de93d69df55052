/**
 * Configuration Loader
 *
 * Handles the complete config lifecycle:
 * 1. Find/create the config directory (~/.asnx)
 * 2. Load config.toml if it exists
 * 3. Validate with Zod schema
 * 4. Merge with defaults (user values override defaults)
 * 5. Provide type-safe access
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config, type PartialConfig } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getAsnxDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';
import type { z } from 'zod';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isTomlTable(value: unknown): value is TOML.JsonMap {
  return isRecord(value) && !(value instanceof Date);
}

/**
 * Ensure the config directory exists
 */
function ensureAsnxDir(): void {
  const dir = getAsnxDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
    .join('\n');
}

/**
 * Merge a sparse user config over the defaults, section by section
 */
function mergeConfig(base: Config, user: PartialConfig): Config {
  return {
    markers: { ...base.markers, ...user.markers },
    output: { ...base.output, ...user.output },
    split: { ...base.split, ...user.split },
  };
}

function readToml(configPath: string): TOML.JsonMap {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown read error';
    throw new ConfigError(
      `Cannot read config file: ${message}`,
      `Check the permissions of ${configPath}`
    );
  }

  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: asnx config reset --force`
    );
  }
}

/**
 * Load and parse the config file
 * Returns the merged config (defaults + user overrides)
 *
 * @param createIfMissing - If true, writes the default config on first run
 * @throws ConfigError if the config file exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureAsnxDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const parsed = readToml(configPath);

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(validationResult.error)}`,
      'Run: asnx config reset --force  to restore defaults'
    );
  }

  return mergeConfig(DEFAULT_CONFIG, validationResult.data);
}

/**
 * Walk a dot-notation path through a config object
 */
function lookup(config: Config, key: string): unknown {
  let current: unknown = config;
  for (const part of key.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a specific config value by dot-notation path
 * Example: getConfigValue('markers.start') => '-- ASN1START'
 */
export function getConfigValue(key: string, createIfMissing = true): unknown {
  return lookup(loadConfig(createIfMissing), key);
}

/**
 * Set a specific config value by dot-notation path
 * Every setting is a string, so the value is stored as given.
 * Writes the change back to the config file.
 */
export function setConfigValue(key: string, value: string): void {
  // Only leaf keys that exist in the schema can be set
  if (typeof lookup(DEFAULT_CONFIG, key) !== 'string') {
    throw new ConfigError(
      `Unknown config key: ${key}`,
      'Run: asnx config list  to see available keys'
    );
  }

  const configPath = getConfigPath();
  ensureAsnxDir();

  // Load existing config or start fresh
  const config: TOML.JsonMap = fs.existsSync(configPath) ? readToml(configPath) : {};

  const parts = key.split('.');
  const leaf = parts.pop();
  if (leaf === undefined) {
    throw new ConfigError(
      'Invalid config key: empty key',
      'Run: asnx config list  to see available keys'
    );
  }

  let current = config;
  for (const part of parts) {
    const next = current[part];
    if (isTomlTable(next)) {
      current = next;
    } else {
      const table: TOML.JsonMap = {};
      current[part] = table;
      current = table;
    }
  }
  current[leaf] = value;

  // Validate the complete config before saving
  const partial = PartialConfigSchema.safeParse(config);
  const full = partial.success
    ? ConfigSchema.safeParse(mergeConfig(DEFAULT_CONFIG, partial.data))
    : partial;

  if (!full.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(full.error)}`,
      'Run: asnx config list  to see current values'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(config), 'utf-8');
}

/**
 * List all config values in a flat format
 * Returns entries like ['markers.start', '-- ASN1START']
 */
export function listConfig(createIfMissing = true): Array<[string, unknown]> {
  const config = loadConfig(createIfMissing);
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: Record<string, unknown>, prefix = ''): void {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (isRecord(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}

/**
 * Delete the config file, then write a fresh default one
 */
export function resetConfig(): void {
  const configPath = getConfigPath();
  if (fs.existsSync(configPath)) {
    fs.unlinkSync(configPath);
  }
  loadConfig(true);
}
