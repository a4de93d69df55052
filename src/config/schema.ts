/**
 * Configuration Schema
 *
 * Defines the shape of ~/.asnx/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * File extension: a leading dot followed by at least one character,
 * with no further dots or path separators.
 */
const ExtensionSchema = z
  .string()
  .regex(/^\.[^./\\]+$/, 'must start with "." and contain no other dots or slashes (e.g. ".asn")');

/**
 * Block markers
 * Matched as substrings anywhere in a line
 */
export const MarkersConfigSchema = z.object({
  start: z
    .string()
    .min(1, 'start marker cannot be empty')
    .describe('Substring that opens an ASN.1 block'),
  stop: z
    .string()
    .min(1, 'stop marker cannot be empty')
    .describe('Substring that closes an ASN.1 block'),
});

/**
 * Output settings for `asnx extract`
 */
export const OutputConfigSchema = z.object({
  extension: ExtensionSchema.describe('Replaces the input extension when deriving the output path'),
  line_ending: z
    .enum(['lf', 'crlf'])
    .describe('Terminator written after every extracted line'),
});

/**
 * Settings for `asnx split`
 */
export const SplitConfigSchema = z.object({
  out_dir: z
    .string()
    .min(1, 'out_dir cannot be empty')
    .describe('Directory that receives one file per block'),
  extension: ExtensionSchema.describe('Extension of each section file'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  markers: MarkersConfigSchema,
  output: OutputConfigSchema,
  split: SplitConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
