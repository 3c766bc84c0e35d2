import { z } from 'zod/v4';
import { PermissionError, errorMessage, sqlStateOf } from '../errors.js';
import { sortBy } from '../../util/index.js';
import { CONSTRAINTS_QUERY, INDEX_STATS_QUERY, SCHEMA_ACCESS_QUERY } from './queries.js';
import { constraintRowSchema, indexStatRowSchema, schemaAccessRowSchema } from './rows.js';
import type { ConstraintRow, IndexStatRow } from './rows.js';
import type {
  AdvisorConnection,
  CatalogSnapshot,
  ConstraintInfo,
  ConstraintType,
  DeniedSchema,
  IndexStat,
} from './types.js';

const INSUFFICIENT_PRIVILEGE = '42501';

const CONSTRAINT_TYPES: Readonly<Record<ConstraintRow['constraint_type'], ConstraintType>> = {
  c: 'check',
  f: 'foreign_key',
  u: 'unique',
  x: 'exclusion',
};

/**
 * Read a snapshot of index statistics and constraints for the given schemas.
 *
 * Only SELECTs against the system catalogs go through `connection.query`.
 * Schemas the role cannot read are listed in `deniedSchemas` and skipped;
 * schemas that do not exist contribute nothing.
 */
export async function readCatalog(
  connection: AdvisorConnection,
  schemas: readonly string[],
): Promise<CatalogSnapshot> {
  const requested = [...new Set(schemas)];
  const accessRows = z
    .array(schemaAccessRowSchema)
    .parse(await connection.query(SCHEMA_ACCESS_QUERY, [requested]));

  const indexes: IndexStat[] = [];
  const constraints: ConstraintInfo[] = [];
  const deniedSchemas: DeniedSchema[] = [];

  for (const access of sortBy(accessRows, (row) => row.schema)) {
    if (!access.usable) {
      deniedSchemas.push(
        toDenied(new PermissionError(access.schema, `permission denied for schema ${access.schema}`)),
      );
      continue;
    }

    try {
      const indexRows = z
        .array(indexStatRowSchema)
        .parse(await connection.query(INDEX_STATS_QUERY, [access.schema]));
      const constraintRows = z
        .array(constraintRowSchema)
        .parse(await connection.query(CONSTRAINTS_QUERY, [access.schema]));
      indexes.push(...indexRows.map(toIndexStat));
      constraints.push(...constraintRows.map(toConstraintInfo));
    } catch (error: unknown) {
      if (sqlStateOf(error) !== INSUFFICIENT_PRIVILEGE) {
        throw error;
      }
      deniedSchemas.push(toDenied(new PermissionError(access.schema, errorMessage(error))));
    }
  }

  return { schemas: requested, indexes, constraints, deniedSchemas };
}

function toDenied(error: PermissionError): DeniedSchema {
  return { schema: error.schema, message: error.message, hint: error.hint };
}

function toIndexStat(row: IndexStatRow): IndexStat {
  return {
    schema: row.schema,
    table: row.table,
    indexName: row.index_name,
    sizeBytes: row.size_bytes,
    scanCount: row.scan_count,
    tuplesRead: row.tuples_read,
    tuplesFetched: row.tuples_fetched,
    isPrimaryKey: row.is_primary_key,
    isUnique: row.is_unique,
    isPartial: row.is_partial,
    hasExpressions: row.has_expressions,
    columns: row.columns,
  };
}

function toConstraintInfo(row: ConstraintRow): ConstraintInfo {
  return {
    schema: row.schema,
    table: row.table,
    constraintName: row.constraint_name,
    constraintType: CONSTRAINT_TYPES[row.constraint_type],
    columns: row.columns,
    referencedTable: row.referenced_table,
  };
}
