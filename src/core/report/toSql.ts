import { renderStatement } from './statements.js';
import type { AdvisorReport, Finding } from './reportTypes.js';

/**
 * Rendered corrective statements, in finding order. Findings that only call
 * for review have no statement and are left out, and a statement shared by
 * two findings (an index both unused and redundant) is listed once.
 */
export function toStatements(findings: readonly Finding[]): readonly string[] {
  return firstStatements(findings).map(({ statement }) => statement);
}

/** Each distinct statement with the first finding that calls for it. */
function firstStatements(findings: readonly Finding[]): { finding: Finding; statement: string }[] {
  const seen = new Set<string>();
  const firsts: { finding: Finding; statement: string }[] = [];
  for (const finding of findings) {
    if (finding.correctiveStatement === null) {
      continue;
    }
    const statement = renderStatement(finding.correctiveStatement);
    if (!seen.has(statement)) {
      seen.add(statement);
      firsts.push({ finding, statement });
    }
  }
  return firsts;
}

/** The corrective statements as a script, each under a comment naming its finding. */
export function toSqlScript(report: AdvisorReport): string {
  const lines: string[] = [];
  lines.push(`-- Index advisor: ${String(report.metadata.findingCount)} finding(s) for ${report.metadata.schemas.join(', ')}`);

  for (const { finding, statement } of firstStatements(report.findings)) {
    lines.push('');
    lines.push(`-- [P${String(finding.priority)}] ${finding.category} ${finding.schemaTable} ${finding.target}`);
    lines.push(statement);
  }

  if (report.maintenance.length > 0) {
    lines.push('');
    lines.push('-- Maintenance plan; run in the suggested window, REINDEX locks writes to the table');
    for (const task of report.maintenance) {
      lines.push(`-- [${task.tier}] ${task.schemaTable} ${task.indexName}: ${task.maintenanceWindow}`);
      lines.push(`-- ${renderStatement(task.statement)}`);
    }
  }

  lines.push('');
  return lines.join('\n');
}
