/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod so that empty
 * markers or paths fail with a field-level message instead of producing
 * a silently empty extraction.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';
import { MAPPING_MODES } from '../extractor/mapping.js';

// ============================================================================
// SHARED
// ============================================================================

const MarkerOptionSchema = z.string().min(1, 'Marker cannot be empty');

export const InputArgSchema = z.string().min(1, 'Input path is required');

// ============================================================================
// EXTRACT COMMAND SCHEMA
// ============================================================================

export const ExtractOptionsSchema = z.object({
  output: z.string().min(1, 'Output path cannot be empty').optional(),
  start: MarkerOptionSchema.optional(),
  stop: MarkerOptionSchema.optional(),
  crlf: z.boolean().default(false),
});

export type ExtractOptions = z.input<typeof ExtractOptionsSchema>;

// ============================================================================
// SPLIT COMMAND SCHEMA
// ============================================================================

export const SplitOptionsSchema = z.object({
  out: z.string().min(1, 'Output directory cannot be empty').optional(),
  start: MarkerOptionSchema.optional(),
  stop: MarkerOptionSchema.optional(),
});

export type SplitOptions = z.input<typeof SplitOptionsSchema>;

// ============================================================================
// DEFS COMMAND SCHEMA
// ============================================================================

export const DefsOptionsSchema = z.object({
  full: z.boolean().default(false),
});

export type DefsOptions = z.input<typeof DefsOptionsSchema>;

// ============================================================================
// MAP COMMAND SCHEMA
// ============================================================================

export const DirectoryArgSchema = z.string().min(1, 'Directory is required');

export const MapOptionsSchema = z.object({
  mode: z.enum(MAPPING_MODES, {
    errorMap: () => ({ message: `Mode must be one of: ${MAPPING_MODES.join(', ')}` }),
  }).default('defs'),
  output: z.string().min(1, 'Output path cannot be empty').default('mapping.json'),
});

export type MapOptions = z.input<typeof MapOptionsSchema>;

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue as `field: message`
 *
 * @example
 * ```typescript
 * const opts = parseInput(ExtractOptionsSchema, options);
 * ```
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });

  throw new ValidationError('Invalid command options', issues);
}
