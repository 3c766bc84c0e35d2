import { readFileSync } from 'node:fs';
import { DEFAULT_THRESHOLDS, advisorConfigSchema, thresholdsSchema } from './schema.js';
import type { AdvisorConfig, ThresholdOverrides } from './schema.js';
import type { Thresholds } from '../report/reportTypes.js';

/**
 * Parse and validate an advisor config JSON file.
 * Throws on unreadable files, malformed JSON or unknown keys.
 */
export function loadAdvisorConfig(filePath: string): AdvisorConfig {
  const content = readFileSync(filePath, 'utf-8');
  const raw: unknown = JSON.parse(content);
  return advisorConfigSchema.parse(raw);
}

/**
 * Layer threshold overrides over the defaults, later layers winning.
 * Each layer is validated, so a bad CLI value fails the same way a bad
 * config value does.
 */
export function resolveThresholds(...layers: readonly (ThresholdOverrides | undefined)[]): Thresholds {
  let resolved: Thresholds = DEFAULT_THRESHOLDS;
  for (const layer of layers) {
    if (layer === undefined) {
      continue;
    }
    const overrides = thresholdsSchema.parse(layer);
    resolved = {
      minUnusedSizeBytes: overrides.minUnusedSizeBytes ?? resolved.minUnusedSizeBytes,
      largeSizeBytes: overrides.largeSizeBytes ?? resolved.largeSizeBytes,
      rarelyUsedMaxScans: overrides.rarelyUsedMaxScans ?? resolved.rarelyUsedMaxScans,
      poorSelectivityRatio: overrides.poorSelectivityRatio ?? resolved.poorSelectivityRatio,
      fairSelectivityRatio: overrides.fairSelectivityRatio ?? resolved.fairSelectivityRatio,
      reindexHighSizeBytes: overrides.reindexHighSizeBytes ?? resolved.reindexHighSizeBytes,
      reindexMediumSizeBytes: overrides.reindexMediumSizeBytes ?? resolved.reindexMediumSizeBytes,
    };
  }
  return resolved;
}
