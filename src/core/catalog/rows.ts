import { z } from 'zod/v4';

/**
 * pg hands bigint columns back as strings; counters may be null on a
 * freshly reset stats collector.
 */
const counter = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .nullable()
  .transform((value) => (value === null ? 0 : Number(value)));

export const schemaAccessRowSchema = z.object({
  schema: z.string(),
  usable: z.boolean(),
});

export const indexStatRowSchema = z.object({
  schema: z.string(),
  table: z.string(),
  index_name: z.string(),
  size_bytes: counter,
  scan_count: counter,
  tuples_read: counter,
  tuples_fetched: counter,
  is_primary_key: z.boolean(),
  is_unique: z.boolean(),
  is_partial: z.boolean(),
  has_expressions: z.boolean(),
  columns: z.array(z.string()),
});

export const constraintRowSchema = z.object({
  schema: z.string(),
  table: z.string(),
  constraint_name: z.string(),
  constraint_type: z.enum(['c', 'f', 'u', 'x']),
  columns: z.array(z.string()),
  referenced_table: z.string().nullable(),
});

export type SchemaAccessRow = z.infer<typeof schemaAccessRowSchema>;
export type IndexStatRow = z.infer<typeof indexStatRowSchema>;
export type ConstraintRow = z.infer<typeof constraintRowSchema>;
