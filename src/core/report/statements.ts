import type { CorrectiveStatement } from './reportTypes.js';

/** PostgreSQL truncates identifiers beyond NAMEDATALEN - 1 bytes. */
const MAX_IDENTIFIER_BYTES = 63;

/** Quote an identifier, doubling any embedded double quotes. */
export function quoteIdent(name: string): string {
  return `"${name.replaceAll('"', '""')}"`;
}

/** Render a corrective statement as a single SQL statement. */
export function renderStatement(statement: CorrectiveStatement): string {
  switch (statement.kind) {
    case 'drop_index':
      return `DROP INDEX IF EXISTS ${quoteIdent(statement.schema)}.${quoteIdent(statement.indexName)};`;
    case 'create_index':
      return `CREATE INDEX IF NOT EXISTS ${quoteIdent(statement.indexName)} ON ${quoteIdent(statement.schema)}.${quoteIdent(statement.table)} (${statement.columns.map(quoteIdent).join(', ')});`;
    case 'reindex_index':
      return `REINDEX INDEX ${quoteIdent(statement.schema)}.${quoteIdent(statement.indexName)};`;
  }
}

/**
 * Name for a new index over the given columns, e.g. `idx_orders_customer_id`.
 *
 * A name already in `taken` gets a `_2`, `_3`, ... suffix, so an
 * `IF NOT EXISTS` create never lands on an unrelated index. Names are cut
 * to the server's byte limit on a character boundary.
 */
export function suggestIndexName(
  table: string,
  columns: readonly string[],
  taken: ReadonlySet<string> = new Set(),
): string {
  const base = `idx_${table}_${columns.join('_')}`;
  let name = truncateBytes(base, MAX_IDENTIFIER_BYTES);
  for (let n = 2; taken.has(name); n++) {
    const suffix = `_${String(n)}`;
    name = truncateBytes(base, MAX_IDENTIFIER_BYTES - suffix.length) + suffix;
  }
  return name;
}

function truncateBytes(text: string, maxBytes: number): string {
  if (Buffer.byteLength(text, 'utf8') <= maxBytes) {
    return text;
  }
  let result = '';
  let bytes = 0;
  for (const char of text) {
    const size = Buffer.byteLength(char, 'utf8');
    if (bytes + size > maxBytes) {
      break;
    }
    result += char;
    bytes += size;
  }
  return result;
}
