import { describe, it, expect } from 'vitest';
import { checkRarelyUsedIndexes } from '../../src/core/analysis/rules/checkRarelyUsedIndexes.js';
import { DEFAULT_THRESHOLDS } from '../../src/core/config/schema.js';
import { MiB, indexStat, snapshot } from '../helpers/builders.js';

describe('checkRarelyUsedIndexes', () => {
  it('flags a large index with few scans and no statement', () => {
    const index = indexStat({
      indexName: 'idx_big',
      sizeBytes: 20 * MiB,
      scanCount: 5,
      tuplesRead: 1000,
      tuplesFetched: 10,
    });

    const findings = checkRarelyUsedIndexes(snapshot([index]), DEFAULT_THRESHOLDS);

    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      category: 'large_rarely_used',
      priority: 3,
      schemaTable: 'commerce.orders',
      target: 'idx_big',
      description: 'Large index idx_big (20.0 MB) used only 5 times; selectivity: 0.0100.',
      recommendedAction: 'Review if index is still needed or can be optimized',
      correctiveStatement: null,
      estimatedImpact: 'MEDIUM - Space optimization',
      sizeBytes: 20 * MiB,
    });
  });

  it('reports selectivity as no data when nothing was read', () => {
    const index = indexStat({ indexName: 'idx_big', sizeBytes: 20 * MiB, scanCount: 3, tuplesRead: 0, tuplesFetched: 0 });
    const findings = checkRarelyUsedIndexes(snapshot([index]), DEFAULT_THRESHOLDS);
    expect(findings[0]!.description).toBe(
      'Large index idx_big (20.0 MB) used only 3 times; selectivity: no data.',
    );
  });

  it('requires at least one and fewer than the maximum scans', () => {
    const never = indexStat({ indexName: 'idx_never', sizeBytes: 20 * MiB, scanCount: 0 });
    const often = indexStat({ indexName: 'idx_often', sizeBytes: 20 * MiB, scanCount: 100 });
    const rare = indexStat({ indexName: 'idx_rare', sizeBytes: 20 * MiB, scanCount: 99 });

    const findings = checkRarelyUsedIndexes(snapshot([never, often, rare]), DEFAULT_THRESHOLDS);
    expect(findings.map((f) => f.target)).toEqual(['idx_rare']);
  });

  it('ignores indexes below the large-size threshold', () => {
    const index = indexStat({ sizeBytes: 10 * MiB - 1, scanCount: 5 });
    expect(checkRarelyUsedIndexes(snapshot([index]), DEFAULT_THRESHOLDS)).toHaveLength(0);
  });

  it('ignores primary keys', () => {
    const index = indexStat({ sizeBytes: 20 * MiB, scanCount: 5, isPrimaryKey: true, isUnique: true });
    expect(checkRarelyUsedIndexes(snapshot([index]), DEFAULT_THRESHOLDS)).toHaveLength(0);
  });
});
