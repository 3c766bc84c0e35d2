import { describe, it, expect } from 'vitest';
import { evaluateRules } from '../../src/core/analysis/evaluate.js';
import { toStatements } from '../../src/core/report/toSql.js';
import { DEFAULT_THRESHOLDS } from '../../src/core/config/schema.js';
import { MiB, foreignKey, indexStat, primaryKey, snapshot } from '../helpers/builders.js';

describe('evaluateRules', () => {
  it('returns no findings for a snapshot without indexes', () => {
    expect(evaluateRules(snapshot([]))).toEqual([]);
  });

  it('orders an unused index before a missing FK index', () => {
    const findings = evaluateRules(
      snapshot(
        [
          primaryKey('orders'),
          primaryKey('products'),
          indexStat({ table: 'products', indexName: 'idx_foo', columns: ['sku'], sizeBytes: 2 * MiB, scanCount: 0 }),
        ],
        [foreignKey('orders', ['customer_id'])],
      ),
    );

    expect(findings.map((f) => f.priority)).toEqual([1, 2]);
    expect(findings.map((f) => f.category)).toEqual(['unused_index', 'missing_fk_index']);
    expect(findings.map((f) => f.target)).toEqual(['idx_foo', 'orders_customer_id_fkey']);
  });

  it('breaks priority ties by size, largest first', () => {
    const findings = evaluateRules(
      snapshot([
        indexStat({ indexName: 'idx_small_unused', columns: ['a'], sizeBytes: 2 * MiB, scanCount: 0 }),
        indexStat({ indexName: 'idx_large_unused', columns: ['b'], sizeBytes: 5 * MiB, scanCount: 0 }),
      ]),
    );
    expect(findings.map((f) => f.target)).toEqual(['idx_large_unused', 'idx_small_unused']);
  });

  it('places a sized redundant index ahead of a missing FK index at the same priority', () => {
    const findings = evaluateRules(
      snapshot(
        [
          indexStat({ indexName: 'idx_status', columns: ['status'], sizeBytes: 3 * MiB }),
          indexStat({ indexName: 'idx_status_created', columns: ['status', 'created_at'] }),
        ],
        [foreignKey('orders', ['customer_id'])],
      ),
    );
    expect(findings.map((f) => [f.category, f.target])).toEqual([
      ['redundant_index', 'idx_status'],
      ['missing_fk_index', 'orders_customer_id_fkey'],
    ]);
  });

  it('is deterministic for the same snapshot', () => {
    const input = snapshot(
      [
        primaryKey('orders'),
        indexStat({ indexName: 'idx_x', columns: ['x'], sizeBytes: 4 * MiB, scanCount: 0 }),
        indexStat({ indexName: 'idx_x_y', columns: ['x', 'y'], sizeBytes: 12 * MiB, scanCount: 7 }),
      ],
      [foreignKey('orders', ['customer_id']), foreignKey('orders', ['store_id'])],
    );

    const first = evaluateRules(input);
    const second = evaluateRules(input);
    expect(second).toEqual(first);
    expect(first.map((f) => [f.priority, f.category, f.target])).toEqual([
      [1, 'unused_index', 'idx_x'],
      [2, 'redundant_index', 'idx_x'],
      [2, 'missing_fk_index', 'orders_customer_id_fkey'],
      [2, 'missing_fk_index', 'orders_store_id_fkey'],
      [3, 'large_rarely_used', 'idx_x_y'],
    ]);
  });

  it('lists the drop of an index that is both unused and redundant once', () => {
    const findings = evaluateRules(
      snapshot([
        indexStat({ indexName: 'idx_x', columns: ['x'], sizeBytes: 4 * MiB, scanCount: 0 }),
        indexStat({ indexName: 'idx_x_y', columns: ['x', 'y'] }),
      ]),
    );
    expect(findings.map((f) => [f.category, f.target])).toEqual([
      ['unused_index', 'idx_x'],
      ['redundant_index', 'idx_x'],
    ]);
    expect(toStatements(findings)).toEqual(['DROP INDEX IF EXISTS "commerce"."idx_x";']);
  });

  it('applies custom thresholds', () => {
    const input = snapshot([indexStat({ indexName: 'idx_tiny', sizeBytes: 4096, scanCount: 0 })]);
    expect(evaluateRules(input)).toHaveLength(0);
    expect(
      evaluateRules(input, { ...DEFAULT_THRESHOLDS, minUnusedSizeBytes: 0 }),
    ).toHaveLength(1);
  });
});
