import type { Finding } from '../report/reportTypes.js';

/**
 * Check if a finding is suppressed by a suppress entry.
 * Supports category:schema.table and category:schema.table.object patterns.
 */
export function isSuppressed(finding: Finding, suppress: readonly string[]): boolean {
  for (const entry of suppress) {
    const colonIdx = entry.indexOf(':');
    const category = entry.slice(0, colonIdx);
    const target = entry.slice(colonIdx + 1);

    if (category !== finding.category) {
      continue;
    }

    if (target === finding.schemaTable) {
      // whole table
      return true;
    }
    if (target === `${finding.schemaTable}.${finding.target}`) {
      return true;
    }
  }
  return false;
}

/** Split findings into kept and suppressed, preserving order. */
export function applySuppressions(
  findings: readonly Finding[],
  suppress: readonly string[],
): { readonly kept: readonly Finding[]; readonly suppressedCount: number } {
  if (suppress.length === 0) {
    return { kept: findings, suppressedCount: 0 };
  }
  const kept = findings.filter((f) => !isSuppressed(f, suppress));
  return { kept, suppressedCount: findings.length - kept.length };
}
