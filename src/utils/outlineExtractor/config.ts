/**
 * Extraction Configuration
 *
 * One explicit object threaded through every pipeline stage, so a batch (or a
 * single document) can override thresholds without touching module state.
 * Files use the snake_case option names; code uses camelCase.
 */

import { readFile } from 'fs/promises';
import os from 'os';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const configurationSchema = z
  .object({
    minHeadingLength: z.number().int().min(1),
    maxHeadingLength: z.number().int().min(1),
    /** Candidate sizes must be >= bodySize * threshold. Must exceed 1. */
    headingSizeThreshold: z.number().gt(1).max(10),
    /** Fraction of page height treated as header (top) and footer (bottom) band */
    marginBandFraction: z.number().min(0).lt(0.5),
    /** Outline depth is fixed at H1..H3 */
    maxLevels: z.literal(3),
    /** Sizes within this many points of a bucket's largest member share the bucket */
    sizeBucketEpsilon: z.number().min(0).max(4),
    documentTimeoutMs: z.number().int().positive(),
    concurrency: z.number().int().min(1),
  })
  .refine(c => c.minHeadingLength <= c.maxHeadingLength, {
    message: 'minHeadingLength must not exceed maxHeadingLength',
    path: ['minHeadingLength'],
  });

export type Configuration = z.infer<typeof configurationSchema>;

/** Option names as they appear in configuration files */
const configFileSchema = z
  .object({
    min_heading_length: z.number().optional(),
    max_heading_length: z.number().optional(),
    heading_size_threshold: z.number().optional(),
    margin_band_fraction: z.number().optional(),
    max_levels: z.number().optional(),
    size_bucket_epsilon: z.number().optional(),
    document_timeout_ms: z.number().optional(),
    concurrency: z.number().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

export type ConfigurationOverrides = Partial<Omit<Configuration, 'maxLevels'>> & { maxLevels?: number };

export const DEFAULT_CONFIGURATION: Readonly<Configuration> = {
  minHeadingLength: 3,
  maxHeadingLength: 200,
  // Both 1.10 and 1.20 appear in practice; 1.10 keeps 13pt headings over 11pt body (1.20 needs 13.2pt).
  headingSizeThreshold: 1.1,
  marginBandFraction: 0.08,
  maxLevels: 3,
  sizeBucketEpsilon: 0.5,
  documentTimeoutMs: 10_000,
  concurrency: Math.max(1, os.availableParallelism()),
};

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Merge overrides onto the defaults and validate the result.
 * Undefined override values leave the default in place.
 */
export function resolveConfiguration(...overrides: ConfigurationOverrides[]): Configuration {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIGURATION };
  for (const layer of overrides) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }

  const parsed = configurationSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

function fromConfigFile(file: ConfigFile): ConfigurationOverrides {
  return {
    minHeadingLength: file.min_heading_length,
    maxHeadingLength: file.max_heading_length,
    headingSizeThreshold: file.heading_size_threshold,
    marginBandFraction: file.margin_band_fraction,
    maxLevels: file.max_levels,
    sizeBucketEpsilon: file.size_bucket_epsilon,
    documentTimeoutMs: file.document_timeout_ms,
    concurrency: file.concurrency,
  };
}

/** Parse the JSON text of a configuration file into overrides. */
export function parseConfigurationFile(json: string, source = 'configuration file'): ConfigurationOverrides {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new ConfigurationError(`${source} is not valid JSON`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid ${source}: ${formatIssues(parsed.error)}`);
  }
  return fromConfigFile(parsed.data);
}

export async function loadConfigurationFile(filePath: string): Promise<ConfigurationOverrides> {
  let json: string;
  try {
    json = await readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read configuration file ${filePath}`, { cause: err });
  }
  return parseConfigurationFile(json, filePath);
}
