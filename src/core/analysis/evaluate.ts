import { compareStrings } from '../../util/index.js';
import { DEFAULT_THRESHOLDS } from '../config/schema.js';
import { checkUnusedIndexes } from './rules/checkUnusedIndexes.js';
import { checkFkIndexes } from './rules/checkFkIndexes.js';
import { checkRedundantIndexes } from './rules/checkRedundantIndexes.js';
import { checkRarelyUsedIndexes } from './rules/checkRarelyUsedIndexes.js';
import type { CatalogSnapshot } from '../catalog/types.js';
import type { Finding, FindingCategory, Thresholds } from '../report/reportTypes.js';

const RULE_ORDER: Readonly<Record<FindingCategory, number>> = {
  unused_index: 0,
  missing_fk_index: 1,
  redundant_index: 2,
  large_rarely_used: 3,
};

/**
 * Run every rule over a snapshot. Pure: same snapshot, same ordered findings.
 */
export function evaluateRules(
  snapshot: CatalogSnapshot,
  thresholds: Thresholds = DEFAULT_THRESHOLDS,
): readonly Finding[] {
  const findings = [
    ...checkUnusedIndexes(snapshot, thresholds),
    ...checkFkIndexes(snapshot),
    ...checkRedundantIndexes(snapshot),
    ...checkRarelyUsedIndexes(snapshot, thresholds),
  ];
  return [...findings].sort(compareFindings);
}

/**
 * Priority first, then larger indexes first. Rule order, table and target
 * settle whatever is left.
 */
export function compareFindings(a: Finding, b: Finding): number {
  return (
    a.priority - b.priority ||
    b.sizeBytes - a.sizeBytes ||
    RULE_ORDER[a.category] - RULE_ORDER[b.category] ||
    compareStrings(a.schemaTable, b.schemaTable) ||
    compareStrings(a.target, b.target)
  );
}
