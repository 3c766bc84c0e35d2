import { ConnectionError, ExecutionError, errorMessage, sqlStateOf } from '../errors.js';
import { renderStatement } from '../report/statements.js';
import type { AdvisorConnection } from '../catalog/types.js';
import type { ExecutionResult, Finding, FindingCategory } from '../report/reportTypes.js';

/**
 * Execution gate. With `apply` false every finding comes back marked
 * `not_executed` and the connection is never touched.
 *
 * With `apply` true each corrective statement runs, in finding order, in its
 * own transaction. A failure is recorded against its finding and the queue
 * moves on; earlier successes stay committed. A lost connection ends the run.
 *
 * `categories`, when given, limits what runs; other findings are skipped.
 * A statement already run for an earlier finding is skipped too.
 */
export async function applyFindings(
  connection: AdvisorConnection,
  findings: readonly Finding[],
  apply = false,
  categories?: readonly FindingCategory[],
): Promise<readonly ExecutionResult[]> {
  const results: ExecutionResult[] = [];
  const selected = categories !== undefined ? new Set(categories) : undefined;
  const attempted = new Set<string>();

  for (const finding of findings) {
    const statement =
      finding.correctiveStatement !== null ? renderStatement(finding.correctiveStatement) : null;
    const base = { category: finding.category, target: finding.target, statement };

    if (!apply) {
      results.push({ ...base, status: 'not_executed', skipReason: null, error: null });
      continue;
    }
    if (selected !== undefined && !selected.has(finding.category)) {
      results.push({ ...base, status: 'skipped', skipReason: 'category_filtered', error: null });
      continue;
    }
    if (statement === null) {
      results.push({ ...base, status: 'skipped', skipReason: 'no_statement', error: null });
      continue;
    }
    if (attempted.has(statement)) {
      results.push({ ...base, status: 'skipped', skipReason: 'duplicate', error: null });
      continue;
    }
    attempted.add(statement);

    try {
      await connection.execute(statement);
      results.push({ ...base, status: 'succeeded', skipReason: null, error: null });
    } catch (error: unknown) {
      if (error instanceof ConnectionError) {
        throw error;
      }
      results.push({
        ...base,
        status: 'failed',
        skipReason: null,
        error: new ExecutionError(statement, errorMessage(error), sqlStateOf(error)),
      });
    }
  }

  return results;
}
