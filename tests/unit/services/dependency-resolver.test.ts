/**
 * Dependency Resolver Tests
 */

import { resolveDependencies } from '../../../src/services/dependency-resolver';
import type { TableDescriptor } from '../../../src/types/migration-types';

function table(name: string, ...parents: string[]): TableDescriptor {
  return {
    name,
    columns: [],
    primaryKey: [],
    foreignKeys: parents.map(parent => ({ columns: [`${parent}_id`], referencedTable: parent, referencedColumns: ['id'] })),
    uniqueConstraints: [],
    withoutRowId: false
  };
}

describe('resolveDependencies', () => {
  test('should place parents before children', () => {
    const result = resolveDependencies([
      table('order_line', 'orders', 'product'),
      table('orders', 'customer'),
      table('product'),
      table('customer')
    ]);

    expect(result.order).toEqual(['product', 'customer', 'orders', 'order_line']);
    expect(result.cycles).toEqual([]);
    expect(result.dependencies).toEqual({
      order_line: ['orders', 'product'],
      orders: ['customer'],
      product: [],
      customer: []
    });
  });

  test('should keep catalog order for independent tables', () => {
    expect(resolveDependencies([table('b'), table('a'), table('c')]).order).toEqual(['b', 'a', 'c']);
  });

  test('should ignore self references and tables outside the set', () => {
    const result = resolveDependencies([table('employee', 'employee', 'department')]);

    expect(result.order).toEqual(['employee']);
    expect(result.dependencies).toEqual({ employee: [] });
  });

  test('should match referenced tables case-insensitively and report catalog names', () => {
    const result = resolveDependencies([table('orders', 'customer'), table('Customer')]);

    expect(result.order).toEqual(['Customer', 'orders']);
    expect(result.dependencies).toEqual({ orders: ['Customer'], Customer: [] });
  });

  test('should treat a differently cased self reference as a self reference', () => {
    const result = resolveDependencies([table('Employee', 'employee')]);

    expect(result.order).toEqual(['Employee']);
    expect(result.cycles).toEqual([]);
  });

  test('should collapse repeated references to one parent', () => {
    const result = resolveDependencies([table('transfer', 'account', 'account'), table('account')]);

    expect(result.dependencies.transfer).toEqual(['account']);
    expect(result.order).toEqual(['account', 'transfer']);
  });

  test('should append cycle members in catalog order', () => {
    const result = resolveDependencies([
      table('a', 'b'),
      table('root'),
      table('b', 'a'),
      table('leaf', 'a')
    ]);

    expect(result.order).toEqual(['root', 'a', 'b', 'leaf']);
    expect(result.cycles).toEqual(['a', 'b', 'leaf']);
  });
});
