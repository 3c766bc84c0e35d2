import { describe, it, expect } from 'vitest';
import { checkUnusedIndexes } from '../../src/core/analysis/rules/checkUnusedIndexes.js';
import { DEFAULT_THRESHOLDS } from '../../src/core/config/schema.js';
import { MiB, indexStat, primaryKey, snapshot } from '../helpers/builders.js';

describe('checkUnusedIndexes', () => {
  it('flags a never-scanned index above the size threshold', () => {
    const findings = checkUnusedIndexes(
      snapshot([indexStat({ indexName: 'idx_foo', sizeBytes: 2 * MiB, scanCount: 0 })]),
      DEFAULT_THRESHOLDS,
    );

    expect(findings).toHaveLength(1);
    expect(findings[0]).toEqual({
      category: 'unused_index',
      priority: 1,
      schemaTable: 'commerce.orders',
      target: 'idx_foo',
      description: 'Index idx_foo has never been used (2.0 MB).',
      recommendedAction: 'Drop unused index to save space and maintenance overhead',
      correctiveStatement: { kind: 'drop_index', schema: 'commerce', indexName: 'idx_foo' },
      estimatedImpact: 'HIGH - Immediate space savings (2.0 MB)',
      sizeBytes: 2 * MiB,
    });
  });

  it('never flags a primary key', () => {
    const pk = { ...primaryKey('orders'), scanCount: 0, sizeBytes: 50 * MiB };
    expect(checkUnusedIndexes(snapshot([pk]), DEFAULT_THRESHOLDS)).toHaveLength(0);
  });

  it('treats the size threshold as inclusive', () => {
    const atThreshold = indexStat({ indexName: 'idx_at', sizeBytes: MiB, scanCount: 0 });
    const below = indexStat({ indexName: 'idx_below', sizeBytes: MiB - 1, scanCount: 0 });

    const findings = checkUnusedIndexes(snapshot([atThreshold, below]), DEFAULT_THRESHOLDS);
    expect(findings.map((f) => f.target)).toEqual(['idx_at']);
  });

  it('ignores indexes that have been scanned', () => {
    const index = indexStat({ sizeBytes: 5 * MiB, scanCount: 1 });
    expect(checkUnusedIndexes(snapshot([index]), DEFAULT_THRESHOLDS)).toHaveLength(0);
  });

  it('notes when the unused index enforces uniqueness', () => {
    const index = indexStat({ indexName: 'uq_orders_ref', sizeBytes: 2 * MiB, scanCount: 0, isUnique: true });
    const findings = checkUnusedIndexes(snapshot([index]), DEFAULT_THRESHOLDS);
    expect(findings[0]!.description).toBe(
      'Index uq_orders_ref has never been used (2.0 MB). It enforces uniqueness; make sure no constraint depends on it.',
    );
  });

  it('respects a lowered threshold', () => {
    const index = indexStat({ indexName: 'idx_small', sizeBytes: 8192, scanCount: 0 });
    const findings = checkUnusedIndexes(snapshot([index]), { ...DEFAULT_THRESHOLDS, minUnusedSizeBytes: 0 });
    expect(findings).toHaveLength(1);
    expect(findings[0]!.estimatedImpact).toBe('HIGH - Immediate space savings (8.0 kB)');
  });
});
