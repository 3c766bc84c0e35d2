import { compareStrings } from '../../util/index.js';
import type { CatalogSnapshot, IndexStat } from '../catalog/types.js';
import type { MaintenanceTask, MaintenanceTier, Thresholds } from '../report/reportTypes.js';

const TIER_ORDER: Readonly<Record<MaintenanceTier, number>> = { high: 0, medium: 1 };

const TIER_ADVICE: Readonly<Record<MaintenanceTier, { action: string; window: string }>> = {
  high: { action: 'Rebuild during a maintenance window', window: 'Weekend maintenance window' },
  medium: { action: 'Schedule a rebuild during a low-traffic period', window: 'Off-peak hours' },
};

/**
 * Suggest index rebuilds by size. Indexes above `reindexHighSizeBytes` are
 * `high`, above `reindexMediumSizeBytes` `medium`; smaller ones need nothing.
 * Ordered by tier, then largest first.
 *
 * The plan is advice only. The gate never runs it.
 */
export function planMaintenance(
  snapshot: CatalogSnapshot,
  thresholds: Thresholds,
): readonly MaintenanceTask[] {
  const tasks: MaintenanceTask[] = [];

  for (const index of snapshot.indexes) {
    const tier = tierOf(index, thresholds);
    if (tier === null) {
      continue;
    }
    tasks.push({
      tier,
      schemaTable: `${index.schema}.${index.table}`,
      indexName: index.indexName,
      sizeBytes: index.sizeBytes,
      recommendedAction: TIER_ADVICE[tier].action,
      maintenanceWindow: TIER_ADVICE[tier].window,
      statement: { kind: 'reindex_index', schema: index.schema, indexName: index.indexName },
    });
  }

  return tasks.sort(
    (a, b) =>
      TIER_ORDER[a.tier] - TIER_ORDER[b.tier] ||
      b.sizeBytes - a.sizeBytes ||
      compareStrings(a.schemaTable, b.schemaTable) ||
      compareStrings(a.indexName, b.indexName),
  );
}

function tierOf(index: IndexStat, thresholds: Thresholds): MaintenanceTier | null {
  if (index.sizeBytes > thresholds.reindexHighSizeBytes) return 'high';
  if (index.sizeBytes > thresholds.reindexMediumSizeBytes) return 'medium';
  return null;
}
