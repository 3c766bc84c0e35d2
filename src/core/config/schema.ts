import { z } from 'zod/v4';
import type { Thresholds } from '../report/reportTypes.js';

/** Defaults carried over from the catalog advisor functions. */
export const DEFAULT_THRESHOLDS: Thresholds = {
  minUnusedSizeBytes: 1_048_576,
  largeSizeBytes: 10_485_760,
  rarelyUsedMaxScans: 100,
  poorSelectivityRatio: 0.01,
  fairSelectivityRatio: 0.001,
  reindexHighSizeBytes: 100_000_000,
  reindexMediumSizeBytes: 10_000_000,
};

export const DEFAULT_SCHEMAS: readonly string[] = ['public'];

const byteCount = z.number().int().nonnegative();
const ratio = z.number().min(0).max(1);

/**
 * Zod schema for threshold overrides. Every key is optional; missing keys
 * fall back to {@link DEFAULT_THRESHOLDS}.
 */
export const thresholdsSchema = z
  .object({
    minUnusedSizeBytes: byteCount,
    largeSizeBytes: byteCount,
    rarelyUsedMaxScans: z.number().int().positive(),
    poorSelectivityRatio: ratio,
    fairSelectivityRatio: ratio,
    reindexHighSizeBytes: byteCount,
    reindexMediumSizeBytes: byteCount,
  })
  .partial()
  .strict();

export const FINDING_CATEGORIES = [
  'unused_index',
  'missing_fk_index',
  'redundant_index',
  'large_rarely_used',
] as const;

/** Zod schema for the categories `--apply` is limited to. */
export const categoriesSchema = z.array(z.enum(FINDING_CATEGORIES)).min(1);

/**
 * Zod schema for the suppress array.
 * Format: category:schema.table or category:schema.table.object
 */
export const suppressArraySchema = z.array(
  z
    .string()
    .regex(
      /^(unused_index|missing_fk_index|redundant_index|large_rarely_used):[^.:\s]+\.[^.:\s]+(\.[^.:\s]+)?$/,
    ),
);

/** Zod schema for the advisor config file. */
export const advisorConfigSchema = z
  .object({
    schemas: z.array(z.string().min(1)).min(1).optional(),
    thresholds: thresholdsSchema.optional(),
    suppress: suppressArraySchema.optional(),
  })
  .strict();

export type ThresholdOverrides = z.infer<typeof thresholdsSchema>;
export type AdvisorConfig = z.infer<typeof advisorConfigSchema>;
