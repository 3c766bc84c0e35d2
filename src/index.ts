export type {
  AdvisorReport,
  ReportMetadata,
  Finding,
  FindingCategory,
  Priority,
  CorrectiveStatement,
  DropIndexStatement,
  CreateIndexStatement,
  ReindexIndexStatement,
  MaintenanceTask,
  MaintenanceTier,
  SkipReason,
  Thresholds,
  IndexEffectiveness,
  EffectivenessRating,
  ExecutionResult,
  ExecutionStatus,
  OutputFormat,
} from './core/report/reportTypes.js';

export type {
  AdvisorConnection,
  CatalogSnapshot,
  ConnectionFactory,
  ConstraintInfo,
  ConstraintType,
  DeniedSchema,
  IndexStat,
} from './core/catalog/types.js';

export type { AdvisorConfig, ThresholdOverrides } from './core/config/schema.js';
export type { PgConnectionOptions } from './core/catalog/pgConnection.js';

export { AdvisorError, ConnectionError, PermissionError, ExecutionError } from './core/errors.js';
export { readCatalog } from './core/catalog/read.js';
export { connectPostgres } from './core/catalog/pgConnection.js';
export { evaluateRules } from './core/analysis/evaluate.js';
export { assessEffectiveness, selectivityRatio } from './core/analysis/effectiveness.js';
export { planMaintenance } from './core/analysis/maintenance.js';
export { applyFindings } from './core/execution/apply.js';
export { renderStatement } from './core/report/statements.js';
export { toText } from './core/report/toText.js';
export { toJson } from './core/report/toJson.js';
export { toStatements, toSqlScript } from './core/report/toSql.js';
export { loadAdvisorConfig, resolveThresholds } from './core/config/parse.js';
export { DEFAULT_THRESHOLDS, DEFAULT_SCHEMAS, FINDING_CATEGORIES } from './core/config/schema.js';

import { ConnectionError, errorMessage } from './core/errors.js';
import { readCatalog } from './core/catalog/read.js';
import { evaluateRules } from './core/analysis/evaluate.js';
import { assessEffectiveness } from './core/analysis/effectiveness.js';
import { planMaintenance } from './core/analysis/maintenance.js';
import { applySuppressions } from './core/analysis/suppress.js';
import { applyFindings } from './core/execution/apply.js';
import { resolveThresholds } from './core/config/parse.js';
import { DEFAULT_SCHEMAS, categoriesSchema, suppressArraySchema } from './core/config/schema.js';
import type { AdvisorConnection, ConnectionFactory } from './core/catalog/types.js';
import type { ThresholdOverrides } from './core/config/schema.js';
import type { AdvisorReport, FindingCategory } from './core/report/reportTypes.js';

/** Phases of one advisor run, in order. `applying` is skipped on dry runs. */
export type RunPhase = 'reading' | 'evaluating' | 'reporting' | 'applying' | 'done';

/** Options for an advisor run. */
export interface AdviseOptions {
  readonly schemas?: readonly string[] | undefined;
  /** Defaults to true: nothing is executed unless this is explicitly false. */
  readonly dryRun?: boolean | undefined;
  readonly thresholds?: ThresholdOverrides | undefined;
  readonly suppress?: readonly string[] | undefined;
  /** Apply only findings in these categories. Has no effect on a dry run. */
  readonly categories?: readonly FindingCategory[] | undefined;
  readonly noTimestamp?: boolean | undefined;
  readonly onPhase?: ((phase: RunPhase) => void) | undefined;
}

/**
 * Analyze the given schemas over an already open connection.
 *
 * Reads the catalog, evaluates the rules, builds the report and, only when
 * `dryRun` is false, runs the corrective statements. The connection is left
 * open; see {@link runAdvisor} for a run that owns its connection.
 */
export async function advise(
  connection: AdvisorConnection,
  options: AdviseOptions = {},
): Promise<AdvisorReport> {
  const schemas = options.schemas !== undefined && options.schemas.length > 0
    ? options.schemas
    : DEFAULT_SCHEMAS;
  const dryRun = options.dryRun !== false;
  const thresholds = resolveThresholds(options.thresholds);
  const suppress = suppressArraySchema.parse(options.suppress ?? []);
  const categories = options.categories !== undefined ? categoriesSchema.parse(options.categories) : undefined;
  const notify = options.onPhase ?? (() => undefined);

  try {
    notify('reading');
    const snapshot = await readCatalog(connection, schemas);

    notify('evaluating');
    const { kept: findings, suppressedCount } = applySuppressions(
      evaluateRules(snapshot, thresholds),
      suppress,
    );
    const effectiveness = assessEffectiveness(snapshot, thresholds);
    const maintenance = planMaintenance(snapshot, thresholds);

    notify('reporting');
    let executions = await applyFindings(connection, findings, false);
    if (!dryRun) {
      notify('applying');
      executions = await applyFindings(connection, findings, true, categories);
    }

    return {
      findings,
      effectiveness,
      maintenance,
      deniedSchemas: snapshot.deniedSchemas,
      executions,
      metadata: {
        schemas: snapshot.schemas,
        timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
        dryRun,
        indexCount: snapshot.indexes.length,
        constraintCount: snapshot.constraints.length,
        findingCount: findings.length,
        suppressedCount,
        categories: categories ?? null,
        thresholds,
      },
    };
  } finally {
    notify('done');
  }
}

/**
 * Acquire a connection, run {@link advise}, and release the connection on
 * every path out.
 */
export async function runAdvisor(
  connect: ConnectionFactory,
  options: AdviseOptions = {},
): Promise<AdvisorReport> {
  let connection: AdvisorConnection;
  try {
    connection = await connect();
  } catch (error: unknown) {
    if (error instanceof ConnectionError) {
      throw error;
    }
    throw new ConnectionError(`Could not connect to database: ${errorMessage(error)}`);
  }

  try {
    return await advise(connection, options);
  } finally {
    await connection.release();
  }
}
