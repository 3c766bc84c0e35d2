import { formatBytes } from '../../../util/index.js';
import type { CatalogSnapshot } from '../../catalog/types.js';
import type { Finding, Thresholds } from '../../report/reportTypes.js';

/**
 * Flag indexes that have never been scanned and are big enough to matter.
 * Primary keys are never flagged.
 */
export function checkUnusedIndexes(
  snapshot: CatalogSnapshot,
  thresholds: Thresholds,
): readonly Finding[] {
  const findings: Finding[] = [];

  for (const index of snapshot.indexes) {
    if (index.scanCount !== 0 || index.isPrimaryKey || index.sizeBytes < thresholds.minUnusedSizeBytes) {
      continue;
    }

    const size = formatBytes(index.sizeBytes);
    const uniqueNote = index.isUnique
      ? ' It enforces uniqueness; make sure no constraint depends on it.'
      : '';
    findings.push({
      category: 'unused_index',
      priority: 1,
      schemaTable: `${index.schema}.${index.table}`,
      target: index.indexName,
      description: `Index ${index.indexName} has never been used (${size}).${uniqueNote}`,
      recommendedAction: 'Drop unused index to save space and maintenance overhead',
      correctiveStatement: { kind: 'drop_index', schema: index.schema, indexName: index.indexName },
      estimatedImpact: `HIGH - Immediate space savings (${size})`,
      sizeBytes: index.sizeBytes,
    });
  }

  return findings;
}
