import type { IndexStat } from '../../catalog/types.js';

/** Group indexes by `schema.table`. */
export function indexesByTable(indexes: readonly IndexStat[]): ReadonlyMap<string, readonly IndexStat[]> {
  const byTable = new Map<string, IndexStat[]>();
  for (const index of indexes) {
    const key = `${index.schema}.${index.table}`;
    const existing = byTable.get(key);
    if (existing !== undefined) {
      existing.push(index);
    } else {
      byTable.set(key, [index]);
    }
  }
  return byTable;
}

/**
 * Whether the index's column list describes what it can serve. Partial and
 * expression indexes don't: their `columns` omit the predicate or expression.
 */
export function hasPlainColumns(index: IndexStat): boolean {
  return !index.isPartial && !index.hasExpressions && index.columns.length > 0;
}

/**
 * Check if `prefix` is a leftmost prefix of `columns`.
 * e.g. [a] is a prefix of [a, b], [a, b] is a prefix of [a, b, c], [a] is a prefix of [a].
 */
export function isLeftmostPrefix(prefix: readonly string[], columns: readonly string[]): boolean {
  if (prefix.length > columns.length) {
    return false;
  }
  return prefix.every((column, i) => columns[i] === column);
}

/**
 * An index covers a lookup on `columns` when its first n key columns are
 * exactly those n columns, in any order.
 */
export function coversColumns(columns: readonly string[], indexColumns: readonly string[]): boolean {
  if (columns.length === 0 || columns.length > indexColumns.length) {
    return false;
  }
  const leading = new Set(indexColumns.slice(0, columns.length));
  return columns.every((column) => leading.has(column));
}
