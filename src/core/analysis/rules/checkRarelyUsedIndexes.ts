import { formatBytes } from '../../../util/index.js';
import { formatSelectivity, selectivityRatio } from '../effectiveness.js';
import type { CatalogSnapshot } from '../../catalog/types.js';
import type { Finding, Thresholds } from '../../report/reportTypes.js';

/**
 * Flag large indexes with only a handful of scans. These need a human to
 * look at the workload, so no statement is generated.
 */
export function checkRarelyUsedIndexes(
  snapshot: CatalogSnapshot,
  thresholds: Thresholds,
): readonly Finding[] {
  const findings: Finding[] = [];

  for (const index of snapshot.indexes) {
    if (
      index.isPrimaryKey ||
      index.scanCount === 0 ||
      index.scanCount >= thresholds.rarelyUsedMaxScans ||
      index.sizeBytes < thresholds.largeSizeBytes
    ) {
      continue;
    }

    const selectivity = formatSelectivity(selectivityRatio(index));
    findings.push({
      category: 'large_rarely_used',
      priority: 3,
      schemaTable: `${index.schema}.${index.table}`,
      target: index.indexName,
      description: `Large index ${index.indexName} (${formatBytes(index.sizeBytes)}) used only ${String(index.scanCount)} times; selectivity: ${selectivity}.`,
      recommendedAction: 'Review if index is still needed or can be optimized',
      correctiveStatement: null,
      estimatedImpact: 'MEDIUM - Space optimization',
      sizeBytes: index.sizeBytes,
    });
  }

  return findings;
}
