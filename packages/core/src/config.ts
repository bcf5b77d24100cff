// ============================================================================
// @mxqlint/core - Configuration
// ============================================================================

import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_GRANULARITY_RATIO } from './performance.js';
import { DEFAULT_SAMPLE_ROWS } from './synthesizer.js';

const dialectSchema = z.enum(['mxql', 'pipeline']);

export const lintConfigSchema = z
  .object({
    dialect: dialectSchema.default('mxql'),
    granularityRatio: z.number().positive().default(DEFAULT_GRANULARITY_RATIO),
    timeRangeMs: z.number().int().positive().optional(),
    sampleRows: z.number().int().min(1).max(100).default(DEFAULT_SAMPLE_ROWS),
    disabledRules: z.array(z.string().min(1)).default([]),
    categoriesDir: z.string().min(1).optional(),
  })
  .strict();

export type LintConfig = z.infer<typeof lintConfigSchema>;

/** Partial config as written in a file or passed on the command line. */
export type LintConfigInput = z.input<typeof lintConfigSchema>;

export const DEFAULT_CONFIG: LintConfig = lintConfigSchema.parse({});

/**
 * Validate raw configuration and fill defaults.
 * @throws {ConfigError} listing each invalid setting
 */
export function parseConfig(raw: unknown, source?: string): LintConfig {
  const result = lintConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`, {
      paths: result.error.issues.map((issue) => issue.path.join('.')),
      source,
    });
  }
  return result.data;
}

/** Later layers override earlier ones; undefined values are ignored. */
export function mergeConfig(base: LintConfig, ...layers: LintConfigInput[]): LintConfig {
  const merged: Record<string, unknown> = { ...base };
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return parseConfig(merged);
}
