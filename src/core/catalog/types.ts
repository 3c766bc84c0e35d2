/** Usage statistics and shape of one index, read from pg_stat_user_indexes and pg_index. */
export interface IndexStat {
  readonly schema: string;
  readonly table: string;
  readonly indexName: string;
  readonly sizeBytes: number;
  readonly scanCount: number;
  readonly tuplesRead: number;
  readonly tuplesFetched: number;
  readonly isPrimaryKey: boolean;
  readonly isUnique: boolean;
  /** Index has a WHERE predicate. */
  readonly isPartial: boolean;
  /** At least one key is an expression rather than a plain column. */
  readonly hasExpressions: boolean;
  /** Key columns in key order; INCLUDE columns are not listed. */
  readonly columns: readonly string[];
}

export type ConstraintType = 'check' | 'foreign_key' | 'unique' | 'exclusion';

/** A table constraint, read from pg_constraint. */
export interface ConstraintInfo {
  readonly schema: string;
  readonly table: string;
  readonly constraintName: string;
  readonly constraintType: ConstraintType;
  readonly columns: readonly string[];
  /** `schema.table` the foreign key points at; null for other constraint types. */
  readonly referencedTable: string | null;
}

/** A schema the current role may not read. */
export interface DeniedSchema {
  readonly schema: string;
  readonly message: string;
  /** What to grant so the next run can read the schema. */
  readonly hint: string;
}

/** Everything the rules look at, captured once per run. */
export interface CatalogSnapshot {
  readonly schemas: readonly string[];
  readonly indexes: readonly IndexStat[];
  readonly constraints: readonly ConstraintInfo[];
  readonly deniedSchemas: readonly DeniedSchema[];
}

/**
 * The one database handle a run holds.
 *
 * `query` is only ever given read-only catalog SELECTs. `execute` runs a single
 * corrective statement inside its own transaction and is only reached when the
 * caller asked to apply findings.
 */
export interface AdvisorConnection {
  query(text: string, values?: readonly unknown[]): Promise<readonly unknown[]>;
  execute(statement: string): Promise<void>;
  release(): Promise<void>;
}

/** Acquires a fresh connection for one run. */
export type ConnectionFactory = () => Promise<AdvisorConnection>;
