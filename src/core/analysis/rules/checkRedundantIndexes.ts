import { compareStrings, formatBytes, sortBy } from '../../../util/index.js';
import { hasPlainColumns, indexesByTable, isLeftmostPrefix } from './indexColumns.js';
import type { CatalogSnapshot, IndexStat } from '../../catalog/types.js';
import type { Finding } from '../../report/reportTypes.js';

/**
 * Flag indexes whose key columns equal, or are a leftmost prefix of, another
 * index's key columns on the same table. Only the subsumed index is ever
 * dropped, and never a primary key.
 *
 * A unique index that a wider index starts with is still reported, but
 * without a statement: the wider index does not enforce the same uniqueness.
 */
export function checkRedundantIndexes(snapshot: CatalogSnapshot): readonly Finding[] {
  const findings: Finding[] = [];

  for (const [schemaTable, tableIndexes] of indexesByTable(snapshot.indexes)) {
    const candidates = sortBy(tableIndexes.filter(hasPlainColumns), (index) => index.indexName);

    for (const index of candidates) {
      if (index.isPrimaryKey) {
        continue;
      }
      const others = candidates.filter((other) => other !== index);
      const cover = others.find((other) => subsumes(other, index));
      if (cover !== undefined) {
        findings.push(dropFinding(schemaTable, index, cover));
        continue;
      }
      const wider = index.isUnique ? others.find((other) => extendsUnique(other, index)) : undefined;
      if (wider !== undefined) {
        findings.push(reviewFinding(schemaTable, index, wider));
      }
    }
  }

  return findings;
}

function dropFinding(schemaTable: string, index: IndexStat, cover: IndexStat): Finding {
  const size = formatBytes(index.sizeBytes);
  return {
    category: 'redundant_index',
    priority: 2,
    schemaTable,
    target: index.indexName,
    description: `Index ${index.indexName} (${index.columns.join(', ')}) is covered by ${cover.indexName} (${cover.columns.join(', ')}).`,
    recommendedAction: 'Drop redundant index; the covering index serves the same lookups',
    correctiveStatement: { kind: 'drop_index', schema: index.schema, indexName: index.indexName },
    estimatedImpact: `MEDIUM - Less write overhead and space savings (${size})`,
    sizeBytes: index.sizeBytes,
  };
}

function reviewFinding(schemaTable: string, index: IndexStat, wider: IndexStat): Finding {
  const size = formatBytes(index.sizeBytes);
  return {
    category: 'redundant_index',
    priority: 2,
    schemaTable,
    target: index.indexName,
    description: `Unique index ${index.indexName} (${index.columns.join(', ')}) is a prefix of ${wider.indexName} (${wider.columns.join(', ')}), which does not enforce the same uniqueness.`,
    recommendedAction: 'Manual review: drop only if the uniqueness is enforced elsewhere',
    correctiveStatement: null,
    estimatedImpact: `LOW - Possible space savings (${size})`,
    sizeBytes: index.sizeBytes,
  };
}

/**
 * Whether `cover` makes `index` unnecessary.
 *
 * A unique index is only subsumed by a unique index on the same columns,
 * since a wider unique index enforces a weaker constraint. Between exact
 * duplicates the primary key is kept first, then a unique index, then the
 * name that sorts first.
 */
function subsumes(cover: IndexStat, index: IndexStat): boolean {
  if (!isLeftmostPrefix(index.columns, cover.columns)) {
    return false;
  }
  const isExact = index.columns.length === cover.columns.length;
  if (index.isUnique && !(cover.isUnique && isExact)) {
    return false;
  }
  if (isExact) {
    return keepRank(cover) < keepRank(index) ||
      (keepRank(cover) === keepRank(index) && compareStrings(cover.indexName, index.indexName) < 0);
  }
  return true;
}

/** `wider` strictly extends the unique index's columns. */
function extendsUnique(wider: IndexStat, index: IndexStat): boolean {
  return wider.columns.length > index.columns.length && isLeftmostPrefix(index.columns, wider.columns);
}

function keepRank(index: IndexStat): number {
  if (index.isPrimaryKey) return 0;
  if (index.isUnique) return 1;
  return 2;
}
