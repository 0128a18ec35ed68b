/**
 * Schema Reconciler Tests
 * Case folding, reserved-word quoting and duplicate detection
 */

import { SchemaConflictError } from '../../../src/lib/error-handler';
import {
  formatIdentifier,
  isReservedWord,
  quoteIdentifier,
  reconcileColumns,
  reconcileIdentifier,
  resolveTable
} from '../../../src/services/schema-reconciler';
import { DestinationType, SourceTypeTag, type ColumnDescriptor, type TableDescriptor } from '../../../src/types/migration-types';

function column(sourceName: string, typeTag: SourceTypeTag = SourceTypeTag.TEXT, primaryKeyPosition = 0): ColumnDescriptor {
  return { sourceName, declaredType: typeTag.toUpperCase(), typeTag, nullable: primaryKeyPosition === 0, primaryKeyPosition };
}

function table(name: string, columns: ColumnDescriptor[]): TableDescriptor {
  return {
    name,
    columns,
    primaryKey: columns.filter(c => c.primaryKeyPosition > 0).map(c => c.sourceName),
    foreignKeys: [],
    uniqueConstraints: [],
    withoutRowId: false
  };
}

describe('Schema Reconciler', () => {
  describe('reconcileIdentifier', () => {
    test('should fold to lower case without quoting simple names', () => {
      expect(reconcileIdentifier('OrderID', 'table "orders"')).toEqual({ destinationName: 'orderid', requiresQuoting: false });
    });

    test('should quote reserved words instead of renaming them', () => {
      expect(reconcileIdentifier('Order', 'the source schema')).toEqual({ destinationName: 'order', requiresQuoting: true });
      expect(reconcileIdentifier('user', 'table "t"')).toEqual({ destinationName: 'user', requiresQuoting: true });
    });

    test('should quote names with spaces, punctuation or a leading digit', () => {
      expect(reconcileIdentifier('Unit Price', 'table "t"')).toEqual({ destinationName: 'unit price', requiresQuoting: true });
      expect(reconcileIdentifier('2nd_address', 'table "t"').requiresQuoting).toBe(true);
      expect(reconcileIdentifier('e-mail', 'table "t"').requiresQuoting).toBe(true);
    });

    test('should reject identifiers PostgreSQL would truncate', () => {
      expect(() => reconcileIdentifier('c'.repeat(64), 'table "t"')).toThrow(SchemaConflictError);
      expect(reconcileIdentifier('c'.repeat(63), 'table "t"').destinationName).toHaveLength(63);
    });

    test('should reject empty identifiers', () => {
      expect(() => reconcileIdentifier('', 'table "t"')).toThrow(SchemaConflictError);
    });
  });

  describe('quoting helpers', () => {
    test('should double embedded quotes', () => {
      expect(quoteIdentifier('say "hi"')).toBe('"say ""hi"""');
      expect(formatIdentifier('select', true)).toBe('"select"');
      expect(formatIdentifier('total', false)).toBe('total');
    });

    test('should recognise reserved words case-insensitively', () => {
      expect(isReservedWord('SELECT')).toBe(true);
      expect(isReservedWord('customer')).toBe(false);
    });
  });

  describe('reconcileColumns', () => {
    test('should produce N unique names for N case-insensitively unique columns, in order', () => {
      const result = reconcileColumns('orders', [column('OrderID'), column('Total'), column('group')]);
      expect(result.map(c => c.destinationName)).toEqual(['orderid', 'total', 'group']);
      expect(result.map(c => c.requiresQuoting)).toEqual([false, false, true]);
      expect(result.map(c => c.sourceName)).toEqual(['OrderID', 'Total', 'group']);
    });

    test('should fail on the customers Name/name collision, naming both columns', () => {
      const columns = [column('id', SourceTypeTag.INTEGER), column('Name'), column('name')];

      let caught: unknown;
      try {
        reconcileColumns('customers', columns);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(SchemaConflictError);
      if (caught instanceof SchemaConflictError) {
        expect(caught.message).toBe(
          'Columns "Name" and "name" of table "customers" both map to destination column "name"'
        );
        expect(caught.context).toEqual({ table: 'customers', columns: ['Name', 'name'], destinationName: 'name' });
      }
    });
  });

  describe('resolveTable', () => {
    test('should fill in destination names and types and freeze the result', () => {
      const resolved = resolveTable(table('Orders', [
        column('order_id', SourceTypeTag.INTEGER, 1),
        column('total', SourceTypeTag.REAL)
      ]));

      expect(resolved.destinationName).toBe('orders');
      expect(resolved.destinationRequiresQuoting).toBe(false);
      expect(resolved.columns.map(c => [c.destinationName, c.destinationType])).toEqual([
        ['order_id', DestinationType.BIGINT],
        ['total', DestinationType.DOUBLE_PRECISION]
      ]);
      expect(Object.isFrozen(resolved)).toBe(true);
      expect(Object.isFrozen(resolved.columns[0])).toBe(true);
    });

    test('should quote a reserved table name', () => {
      const resolved = resolveTable(table('Order', [column('id', SourceTypeTag.INTEGER, 1)]));
      expect(resolved.destinationName).toBe('order');
      expect(resolved.destinationRequiresQuoting).toBe(true);
    });
  });
});
