import { compareStrings } from '../../util/index.js';
import type { CatalogSnapshot, IndexStat } from '../catalog/types.js';
import type { EffectivenessRating, IndexEffectiveness, Thresholds } from '../report/reportTypes.js';

/**
 * Rows fetched per row read through the index, rounded to 4 places.
 * Null when the index has not read anything yet.
 */
export function selectivityRatio(index: IndexStat): number | null {
  if (index.tuplesRead === 0) {
    return null;
  }
  return Math.round((index.tuplesFetched / index.tuplesRead) * 10_000) / 10_000;
}

export function formatSelectivity(ratio: number | null): string {
  return ratio === null ? 'no data' : ratio.toFixed(4);
}

/**
 * Rate every index by how selective its scans have been.
 * Unused indexes sort last; the rest by ratio, worst first.
 */
export function assessEffectiveness(
  snapshot: CatalogSnapshot,
  thresholds: Thresholds,
): readonly IndexEffectiveness[] {
  const assessed = snapshot.indexes.map((index): IndexEffectiveness => {
    const rating = rate(index, thresholds);
    return {
      schemaTable: `${index.schema}.${index.table}`,
      indexName: index.indexName,
      scanCount: index.scanCount,
      tuplesRead: index.tuplesRead,
      tuplesFetched: index.tuplesFetched,
      selectivityRatio: selectivityRatio(index),
      rating,
      suggestion: suggest(index, rating, thresholds),
    };
  });

  return assessed.sort(compareEffectiveness);
}

function rate(index: IndexStat, thresholds: Thresholds): EffectivenessRating {
  if (index.scanCount === 0) return 'unused';
  if (index.tuplesRead === 0) return 'no_data';
  const ratio = index.tuplesFetched / index.tuplesRead;
  if (ratio > thresholds.poorSelectivityRatio) return 'poor';
  if (ratio > thresholds.fairSelectivityRatio) return 'fair';
  return 'good';
}

function suggest(index: IndexStat, rating: EffectivenessRating, thresholds: Thresholds): string {
  switch (rating) {
    case 'unused':
      return 'Consider dropping if consistently unused';
    case 'no_data':
      return 'No tuples read through this index yet';
    case 'poor':
      return 'Review query patterns or add WHERE conditions';
    case 'fair':
    case 'good':
      if (index.scanCount < thresholds.rarelyUsedMaxScans && index.sizeBytes >= thresholds.largeSizeBytes) {
        return 'Large rarely-used index; review necessity';
      }
      return 'Index performing well';
  }
}

function compareEffectiveness(a: IndexEffectiveness, b: IndexEffectiveness): number {
  const unusedA = a.rating === 'unused' ? 1 : 0;
  const unusedB = b.rating === 'unused' ? 1 : 0;
  if (unusedA !== unusedB) return unusedA - unusedB;

  if (a.selectivityRatio !== b.selectivityRatio) {
    if (a.selectivityRatio === null) return 1;
    if (b.selectivityRatio === null) return -1;
    return b.selectivityRatio - a.selectivityRatio;
  }

  return compareStrings(a.schemaTable, b.schemaTable) || compareStrings(a.indexName, b.indexName);
}
