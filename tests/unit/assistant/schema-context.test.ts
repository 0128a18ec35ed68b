/**
 * Schema Context Tests
 */

import {
  describeDestinationSchema,
  loadDestinationSchema,
  type SchemaTable
} from '../../../src/assistant/schema-context';
import { FakeDestination } from '../../helpers/fake-destination';

const CUSTOMER: SchemaTable = {
  name: 'customer',
  columns: [
    { name: 'id', type: 'BIGINT', nullable: false },
    { name: 'name', type: 'TEXT', nullable: true }
  ],
  primaryKey: ['id'],
  references: []
};

const ORDERS: SchemaTable = {
  name: 'orders',
  columns: [
    { name: 'id', type: 'BIGINT', nullable: false },
    { name: 'customer_id', type: 'BIGINT', nullable: true },
    { name: 'total', type: 'DOUBLE PRECISION', nullable: true }
  ],
  primaryKey: ['id'],
  references: [{ columns: ['customer_id'], table: 'customer' }]
};

describe('Schema Context', () => {
  describe('describeDestinationSchema', () => {
    test('should render one block per table with keys and references', () => {
      expect(describeDestinationSchema([CUSTOMER, ORDERS])).toBe(
        'Database Schema:\n' +
        '- customer(\n' +
        '        id BIGINT NOT NULL PRIMARY KEY,\n' +
        '        name TEXT\n' +
        '        )\n' +
        '\n' +
        '- orders(\n' +
        '        id BIGINT NOT NULL PRIMARY KEY,\n' +
        '        customer_id BIGINT (FK to customer),\n' +
        '        total DOUBLE PRECISION\n' +
        '        )'
      );
    });

    test('should list composite keys separately and quote awkward names', () => {
      const table: SchemaTable = {
        name: 'order line',
        columns: [
          { name: 'order_id', type: 'BIGINT', nullable: false },
          { name: 'line_no', type: 'BIGINT', nullable: false }
        ],
        primaryKey: ['order_id', 'line_no'],
        references: []
      };

      expect(describeDestinationSchema([table])).toBe(
        'Database Schema:\n' +
        '- "order line"(\n' +
        '        order_id BIGINT NOT NULL,\n' +
        '        line_no BIGINT NOT NULL,\n' +
        '        PRIMARY KEY (order_id, line_no)\n' +
        '        )'
      );
    });
  });

  describe('loadDestinationSchema', () => {
    test('should assemble tables from information_schema rows', async () => {
      const destination = new FakeDestination()
        .respondTo(/FROM information_schema\.columns/, {
          rows: [
            { table_name: 'customer', column_name: 'id', data_type: 'bigint', is_nullable: 'NO' },
            { table_name: 'customer', column_name: 'name', data_type: 'text', is_nullable: 'YES' },
            { table_name: 'orders', column_name: 'id', data_type: 'bigint', is_nullable: 'NO' },
            { table_name: 'orders', column_name: 'customer_id', data_type: 'bigint', is_nullable: 'YES' },
            { table_name: 'orders', column_name: 'total', data_type: 'double precision', is_nullable: 'YES' }
          ]
        })
        .respondTo(/FROM information_schema\.table_constraints/, {
          rows: [
            { table_name: 'customer', constraint_name: 'customer_pkey', constraint_type: 'PRIMARY KEY', column_name: 'id', referenced_table: null },
            {
              table_name: 'orders',
              constraint_name: 'orders_customer_id_fkey',
              constraint_type: 'FOREIGN KEY',
              column_name: 'customer_id',
              referenced_table: 'customer'
            },
            { table_name: 'orders', constraint_name: 'orders_pkey', constraint_type: 'PRIMARY KEY', column_name: 'id', referenced_table: null }
          ]
        });

      await expect(loadDestinationSchema(destination)).resolves.toEqual([CUSTOMER, ORDERS]);
    });

    test('should return no tables for an empty destination', async () => {
      await expect(loadDestinationSchema(new FakeDestination())).resolves.toEqual([]);
    });
  });
});
