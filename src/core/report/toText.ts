import { formatSelectivity } from '../analysis/effectiveness.js';
import { formatBytes } from '../../util/index.js';
import { renderStatement } from './statements.js';
import type { AdvisorReport, ExecutionResult, SkipReason } from './reportTypes.js';

/**
 * Format an AdvisorReport as human-readable text.
 */
export function toText(report: AdvisorReport): string {
  const lines: string[] = [];
  const { metadata } = report;

  lines.push('=== Index Advisor Report ===');
  lines.push('');

  if (metadata.timestamp !== null) {
    lines.push(`Timestamp:   ${metadata.timestamp}`);
  }
  lines.push(`Schemas:     ${metadata.schemas.join(', ')}`);
  lines.push(`Mode:        ${metadata.dryRun ? 'dry run' : 'apply'}`);
  if (metadata.categories !== null) {
    lines.push(`Categories:  ${metadata.categories.join(', ')}`);
  }
  lines.push(`Indexes:     ${String(metadata.indexCount)}`);
  lines.push(`Constraints: ${String(metadata.constraintCount)}`);
  lines.push(`Findings:    ${String(metadata.findingCount)}`);
  if (metadata.suppressedCount > 0) {
    lines.push(`Suppressed:  ${String(metadata.suppressedCount)}`);
  }
  lines.push('');

  if (report.findings.length > 0) {
    lines.push('--- Findings ---');
    report.findings.forEach((f, i) => {
      lines.push(`  ${String(i + 1)}. [P${String(f.priority)}] ${f.category} @ ${f.schemaTable} (${f.target})`);
      lines.push(`     ${f.description}`);
      lines.push(`     Action: ${f.recommendedAction}`);
      lines.push(`     Impact: ${f.estimatedImpact}`);
      if (f.correctiveStatement !== null) {
        lines.push(`     SQL:    ${renderStatement(f.correctiveStatement)}`);
      }
      const execution = report.executions[i];
      if (execution !== undefined) {
        lines.push(`     Result: ${describeExecution(execution)}`);
      }
    });
  } else {
    lines.push('No index findings.');
  }
  lines.push('');

  if (report.effectiveness.length > 0) {
    lines.push('--- Index Effectiveness ---');
    for (const e of report.effectiveness) {
      lines.push(
        `  ${e.schemaTable}.${e.indexName}: scans=${String(e.scanCount)} selectivity=${formatSelectivity(e.selectivityRatio)} [${e.rating}] ${e.suggestion}`,
      );
    }
    lines.push('');
  }

  if (report.maintenance.length > 0) {
    lines.push('--- Maintenance Plan ---');
    for (const task of report.maintenance) {
      lines.push(`  [${task.tier}] ${task.schemaTable}.${task.indexName} (${formatBytes(task.sizeBytes)}): ${task.recommendedAction}`);
      lines.push(`     When: ${task.maintenanceWindow}`);
      lines.push(`     SQL:  ${renderStatement(task.statement)}`);
    }
    lines.push('');
  }

  if (report.deniedSchemas.length > 0) {
    lines.push('--- Denied Schemas ---');
    for (const denied of report.deniedSchemas) {
      lines.push(`  ${denied.schema}: ${denied.message}`);
      lines.push(`     Hint: ${denied.hint}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}

const SKIP_REASONS: Readonly<Record<SkipReason, string>> = {
  no_statement: 'no statement',
  duplicate: 'same statement as an earlier finding',
  category_filtered: 'category not selected',
};

function describeExecution(execution: ExecutionResult): string {
  switch (execution.status) {
    case 'not_executed':
      return 'not executed';
    case 'skipped':
      return `skipped (${SKIP_REASONS[execution.skipReason ?? 'no_statement']})`;
    case 'succeeded':
      return 'executed';
    case 'failed':
      return `failed: ${execution.error?.message ?? 'unknown error'}`;
  }
}
