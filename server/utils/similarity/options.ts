import { z } from 'zod';
import { ConfigurationError } from '../../types/errors';

export const DEFAULT_PIPELINE_OPTIONS = {
  shingleSize: 3,
  numHashes: 100,
  similarityThreshold: 0.5,
} as const;

export const PipelineOptionsSchema = z.object({
  shingleSize: z.number().int().positive().default(DEFAULT_PIPELINE_OPTIONS.shingleSize),
  numHashes: z.number().int().positive().default(DEFAULT_PIPELINE_OPTIONS.numHashes),
  // Only consumed by reporting; the estimator itself never filters on it
  similarityThreshold: z
    .number()
    .min(0)
    .max(1)
    .default(DEFAULT_PIPELINE_OPTIONS.similarityThreshold),
});

export type PipelineOptions = z.infer<typeof PipelineOptionsSchema>;
export type PipelineOptionsInput = z.input<typeof PipelineOptionsSchema>;

/**
 * Validate pipeline options, failing before any document is processed
 */
export function parsePipelineOptions(input: PipelineOptionsInput = {}): PipelineOptions {
  const parsed = PipelineOptionsSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid similarity pipeline options', {
      issues: parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }
  return parsed.data;
}
