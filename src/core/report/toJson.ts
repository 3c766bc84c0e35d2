import type { AdvisorReport } from './reportTypes.js';

/**
 * Serialize an AdvisorReport to a deterministic JSON string.
 * Keys are sorted for stable diffing; errors become `{ name, message }`.
 */
export function toJson(report: AdvisorReport, pretty: boolean): string {
  const sorted = sortKeysDeep(report);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/** Recursively sort object keys for deterministic output. */
function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value instanceof Error) {
    return { message: value.message, name: value.name };
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    const sorted: Record<string, unknown> = {};
    for (const key of keys) {
      sorted[key] = sortKeysDeep(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}
