import type { DeniedSchema } from '../catalog/types.js';
import type { ExecutionError } from '../errors.js';

/** Finding categories, in rule order. */
export type FindingCategory =
  | 'unused_index'
  | 'missing_fk_index'
  | 'redundant_index'
  | 'large_rarely_used';

/** 1 = high, 2 = medium, 3 = low. */
export type Priority = 1 | 2 | 3;

/** Drop one index. Rendered as `DROP INDEX IF EXISTS`. */
export interface DropIndexStatement {
  readonly kind: 'drop_index';
  readonly schema: string;
  readonly indexName: string;
}

/** Create a plain b-tree index. Rendered as `CREATE INDEX IF NOT EXISTS`. */
export interface CreateIndexStatement {
  readonly kind: 'create_index';
  readonly schema: string;
  readonly table: string;
  readonly indexName: string;
  readonly columns: readonly string[];
}

/** Rebuild one index. Rendered as a plain `REINDEX INDEX`, never `CONCURRENTLY`. */
export interface ReindexIndexStatement {
  readonly kind: 'reindex_index';
  readonly schema: string;
  readonly indexName: string;
}

/**
 * A corrective action kept as data. It only becomes SQL text at the
 * formatting boundary, see `renderStatement`.
 */
export type CorrectiveStatement = DropIndexStatement | CreateIndexStatement | ReindexIndexStatement;

/** A single advisor finding. */
export interface Finding {
  readonly category: FindingCategory;
  readonly priority: Priority;
  /** `schema.table` the finding is about. */
  readonly schemaTable: string;
  /** Index or constraint name. */
  readonly target: string;
  readonly description: string;
  readonly recommendedAction: string;
  readonly correctiveStatement: CorrectiveStatement | null;
  readonly estimatedImpact: string;
  /** Size used to order findings of equal priority; 0 when unknown. */
  readonly sizeBytes: number;
}

/** Tunable rule thresholds. */
export interface Thresholds {
  readonly minUnusedSizeBytes: number;
  readonly largeSizeBytes: number;
  readonly rarelyUsedMaxScans: number;
  readonly poorSelectivityRatio: number;
  readonly fairSelectivityRatio: number;
  /** Indexes larger than this are rebuilt in a maintenance window. */
  readonly reindexHighSizeBytes: number;
  /** Indexes larger than this are rebuilt off-peak. */
  readonly reindexMediumSizeBytes: number;
}

export type EffectivenessRating = 'unused' | 'no_data' | 'poor' | 'fair' | 'good';

/** How well one index filters rows, from its fetch/read counters. */
export interface IndexEffectiveness {
  readonly schemaTable: string;
  readonly indexName: string;
  readonly scanCount: number;
  readonly tuplesRead: number;
  readonly tuplesFetched: number;
  /** tuplesFetched / tuplesRead, or null when nothing was read. */
  readonly selectivityRatio: number | null;
  readonly rating: EffectivenessRating;
  readonly suggestion: string;
}

export type MaintenanceTier = 'high' | 'medium';

/** A suggested index rebuild, sized into a tier. */
export interface MaintenanceTask {
  readonly tier: MaintenanceTier;
  readonly schemaTable: string;
  readonly indexName: string;
  readonly sizeBytes: number;
  readonly recommendedAction: string;
  readonly maintenanceWindow: string;
  readonly statement: ReindexIndexStatement;
}

export type ExecutionStatus = 'not_executed' | 'succeeded' | 'failed' | 'skipped';

/**
 * Why a finding was skipped on apply:
 * - `no_statement`: the finding only calls for review
 * - `duplicate`: an earlier finding already ran the same statement
 * - `category_filtered`: the finding's category was not selected
 */
export type SkipReason = 'no_statement' | 'duplicate' | 'category_filtered';

/** Outcome of the execution gate for one finding. */
export interface ExecutionResult {
  readonly category: FindingCategory;
  readonly target: string;
  readonly status: ExecutionStatus;
  readonly statement: string | null;
  readonly skipReason: SkipReason | null;
  readonly error: ExecutionError | null;
}

/** Output format options. */
export type OutputFormat = 'json' | 'text' | 'sql';

/** Metadata about the advisor run. */
export interface ReportMetadata {
  readonly schemas: readonly string[];
  readonly timestamp: string | null;
  readonly dryRun: boolean;
  readonly indexCount: number;
  readonly constraintCount: number;
  readonly findingCount: number;
  readonly suppressedCount: number;
  /** Categories applied on `--apply`; null means all of them. */
  readonly categories: readonly FindingCategory[] | null;
  readonly thresholds: Thresholds;
}

/** The complete advisor report. */
export interface AdvisorReport {
  readonly findings: readonly Finding[];
  readonly effectiveness: readonly IndexEffectiveness[];
  readonly maintenance: readonly MaintenanceTask[];
  readonly deniedSchemas: readonly DeniedSchema[];
  readonly executions: readonly ExecutionResult[];
  readonly metadata: ReportMetadata;
}
