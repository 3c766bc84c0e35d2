/** Schemas by name, with whether the current role holds USAGE on each. */
export const SCHEMA_ACCESS_QUERY = `
SELECT
  n.nspname::text AS schema,
  has_schema_privilege(n.oid, 'USAGE') AS usable
FROM pg_namespace n
WHERE n.nspname = ANY($1::text[])
ORDER BY n.nspname`;

/** Index usage and key columns for one schema. */
export const INDEX_STATS_QUERY = `
SELECT
  s.schemaname::text AS schema,
  s.relname::text AS table,
  s.indexrelname::text AS index_name,
  pg_relation_size(s.indexrelid) AS size_bytes,
  s.idx_scan AS scan_count,
  s.idx_tup_read AS tuples_read,
  s.idx_tup_fetch AS tuples_fetched,
  i.indisprimary AS is_primary_key,
  i.indisunique AS is_unique,
  i.indpred IS NOT NULL AS is_partial,
  i.indexprs IS NOT NULL AS has_expressions,
  ARRAY(
    SELECT a.attname::text
    FROM unnest(i.indkey) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_attribute a ON a.attrelid = i.indrelid AND a.attnum = k.attnum
    WHERE k.ord <= i.indnkeyatts
    ORDER BY k.ord
  ) AS columns
FROM pg_stat_user_indexes s
JOIN pg_index i ON i.indexrelid = s.indexrelid
WHERE s.schemaname = $1
ORDER BY s.relname, s.indexrelname`;

/** Check, foreign key, unique and exclusion constraints for one schema. */
export const CONSTRAINTS_QUERY = `
SELECT
  n.nspname::text AS schema,
  t.relname::text AS table,
  c.conname::text AS constraint_name,
  c.contype::text AS constraint_type,
  ARRAY(
    SELECT a.attname::text
    FROM unnest(c.conkey) WITH ORDINALITY AS k(attnum, ord)
    JOIN pg_attribute a ON a.attrelid = c.conrelid AND a.attnum = k.attnum
    ORDER BY k.ord
  ) AS columns,
  CASE WHEN c.contype = 'f' THEN rn.nspname || '.' || rt.relname END AS referenced_table
FROM pg_constraint c
JOIN pg_class t ON t.oid = c.conrelid
JOIN pg_namespace n ON n.oid = t.relnamespace
LEFT JOIN pg_class rt ON rt.oid = c.confrelid
LEFT JOIN pg_namespace rn ON rn.oid = rt.relnamespace
WHERE n.nspname = $1
  AND c.contype IN ('c', 'f', 'u', 'x')
ORDER BY t.relname, c.conname`;
