import { constraintRow, indexRow } from './builders.js';
import type { StubSchema } from './stubConnection.js';

export const DROP_FOO = 'DROP INDEX IF EXISTS "commerce"."idx_foo";';
export const CREATE_CUSTOMER_INDEX =
  'CREATE INDEX IF NOT EXISTS "idx_orders_customer_id" ON "commerce"."orders" ("customer_id");';

/**
 * One never-scanned 2 MiB index on products and one foreign key on
 * orders.customer_id with no index behind it.
 */
export function commerceSchema(): StubSchema {
  return {
    indexRows: [
      indexRow(),
      indexRow({
        table: 'products',
        index_name: 'products_pkey',
        tuples_read: '3000',
        tuples_fetched: '3',
      }),
      indexRow({
        table: 'products',
        index_name: 'idx_foo',
        size_bytes: '2097152',
        scan_count: '0',
        tuples_read: '0',
        tuples_fetched: '0',
        is_primary_key: false,
        is_unique: false,
        columns: ['sku'],
      }),
    ],
    constraintRows: [constraintRow()],
  };
}
