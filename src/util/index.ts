/**
 * Sort an array by a key function. Returns a new array.
 */
export function sortBy<T>(arr: readonly T[], keyFn: (item: T) => string): T[] {
  return [...arr].sort((a, b) => compareStrings(keyFn(a), keyFn(b)));
}

/** Plain code-unit comparison, independent of locale. */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const BYTE_UNITS = ['bytes', 'kB', 'MB', 'GB', 'TB'] as const;

/**
 * Format a byte count the way pg_size_pretty does (1024-based units),
 * with one decimal above the bytes range.
 */
export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  if (unit === 0) {
    return `${String(bytes)} bytes`;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unit] ?? 'TB'}`;
}
