import { sortBy } from '../../../util/index.js';
import { suggestIndexName } from '../../report/statements.js';
import { coversColumns, hasPlainColumns, indexesByTable } from './indexColumns.js';
import type { CatalogSnapshot } from '../../catalog/types.js';
import type { Finding } from '../../report/reportTypes.js';

/**
 * Check that every foreign key's referencing columns lead some index on the
 * same table. Without one, joins and cascading deletes scan the table.
 *
 * Two foreign keys over the same column set need only one index, so the set
 * is reported once, under the constraint name that sorts first.
 */
export function checkFkIndexes(snapshot: CatalogSnapshot): readonly Finding[] {
  const findings: Finding[] = [];
  const byTable = indexesByTable(snapshot.indexes);
  const reported = new Set<string>();
  const takenNames = indexNamesBySchema(snapshot);

  const foreignKeys = sortBy(
    snapshot.constraints.filter((c) => c.constraintType === 'foreign_key' && c.columns.length > 0),
    (c) => `${c.schema}.${c.table}.${c.constraintName}`,
  );

  for (const fk of foreignKeys) {
    const schemaTable = `${fk.schema}.${fk.table}`;
    const key = `${schemaTable}(${[...fk.columns].sort().join(',')})`;
    if (reported.has(key)) {
      continue;
    }

    const tableIndexes = byTable.get(schemaTable) ?? [];
    const isCovered = tableIndexes.some(
      (index) => hasPlainColumns(index) && coversColumns(fk.columns, index.columns),
    );
    if (isCovered) {
      continue;
    }

    reported.add(key);
    const taken = takenNames.get(fk.schema) ?? new Set<string>();
    const indexName = suggestIndexName(fk.table, fk.columns, taken);
    taken.add(indexName);
    takenNames.set(fk.schema, taken);

    const columnList = fk.columns.join(', ');
    const referenced = fk.referencedTable !== null ? ` referencing ${fk.referencedTable}` : '';
    findings.push({
      category: 'missing_fk_index',
      priority: 2,
      schemaTable,
      target: fk.constraintName,
      description: `Foreign key ${fk.constraintName} (${columnList})${referenced} has no covering index.`,
      recommendedAction: 'Create index on foreign key columns for better JOIN performance',
      correctiveStatement: {
        kind: 'create_index',
        schema: fk.schema,
        table: fk.table,
        indexName,
        columns: fk.columns,
      },
      estimatedImpact: 'HIGH - Significant JOIN improvement',
      sizeBytes: 0,
    });
  }

  return findings;
}

/** Index names are unique per schema, so suggestions must avoid all of them. */
function indexNamesBySchema(snapshot: CatalogSnapshot): Map<string, Set<string>> {
  const names = new Map<string, Set<string>>();
  for (const index of snapshot.indexes) {
    const existing = names.get(index.schema);
    if (existing !== undefined) {
      existing.add(index.indexName);
    } else {
      names.set(index.schema, new Set([index.indexName]));
    }
  }
  return names;
}
