/**
 * Schema Introspector Tests
 * Reads real catalogs from in-memory SQLite databases
 */

import { SchemaReadError } from '../../../src/lib/error-handler';
import { SchemaIntrospector } from '../../../src/services/schema-introspector';
import { SourceTypeTag, type RawTableInfo, type SourceConnection } from '../../../src/types/migration-types';
import { createSource } from '../../helpers/sqlite-source';

const SCHEMA = `
  CREATE TABLE region (id INTEGER PRIMARY KEY, name TEXT NOT NULL UNIQUE);
  CREATE TABLE customer (
    customer_id INTEGER PRIMARY KEY,
    first_name VARCHAR(50) NOT NULL,
    balance DECIMAL(10,2),
    active BOOLEAN,
    joined DATETIME,
    photo BLOB,
    notes,
    region_id INTEGER REFERENCES region(id)
  );
  CREATE TABLE order_line (
    order_id INTEGER NOT NULL,
    line_no INTEGER NOT NULL,
    qty REAL,
    PRIMARY KEY (order_id, line_no)
  ) WITHOUT ROWID;
  CREATE TABLE tagged (code INT PRIMARY KEY, label TEXT);
`;

describe('SchemaIntrospector', () => {
  let introspector: SchemaIntrospector;
  let close: () => void;

  beforeEach(() => {
    const { source } = createSource(SCHEMA);
    introspector = new SchemaIntrospector(source);
    close = () => source.close();
  });

  afterEach(() => {
    close();
  });

  test('should list user tables in catalog order', () => {
    expect(introspector.listTables()).toEqual(['region', 'customer', 'order_line', 'tagged']);
  });

  test('should describe columns, tags, nullability and foreign keys', () => {
    const customer = introspector.describeTable('customer');

    expect(customer.columns.map(c => [c.sourceName, c.declaredType, c.typeTag, c.nullable])).toEqual([
      ['customer_id', 'INTEGER', SourceTypeTag.INTEGER, false],
      ['first_name', 'VARCHAR(50)', SourceTypeTag.TEXT, false],
      ['balance', 'DECIMAL(10,2)', SourceTypeTag.NUMERIC, true],
      ['active', 'BOOLEAN', SourceTypeTag.BOOLEAN, true],
      ['joined', 'DATETIME', SourceTypeTag.TEMPORAL, true],
      ['photo', 'BLOB', SourceTypeTag.BLOB, true],
      ['notes', '', SourceTypeTag.UNSPECIFIED, true],
      ['region_id', 'INTEGER', SourceTypeTag.INTEGER, true]
    ]);
    expect(customer.primaryKey).toEqual(['customer_id']);
    expect(customer.foreignKeys).toEqual([
      { columns: ['region_id'], referencedTable: 'region', referencedColumns: ['id'] }
    ]);
    expect(customer.withoutRowId).toBe(false);
    expect(Object.isFrozen(customer)).toBe(true);
  });

  test('should order a composite primary key and detect WITHOUT ROWID', () => {
    const orderLine = introspector.describeTable('order_line');
    expect(orderLine.primaryKey).toEqual(['order_id', 'line_no']);
    expect(orderLine.columns.map(c => c.primaryKeyPosition)).toEqual([1, 2, 0]);
    expect(orderLine.withoutRowId).toBe(true);
  });

  test('should read UNIQUE constraints but not separately created indexes', () => {
    const { db, source } = createSource(`
      CREATE TABLE staging (region TEXT UNIQUE NOT NULL, country TEXT, city TEXT, UNIQUE (country, city));
      CREATE UNIQUE INDEX staging_city ON staging (city);
    `);

    expect(new SchemaIntrospector(source).describeTable('staging').uniqueConstraints).toEqual([
      ['region'],
      ['country', 'city']
    ]);
    expect(introspector.describeTable('region').uniqueConstraints).toEqual([['name']]);
    expect(introspector.describeTable('order_line').uniqueConstraints).toEqual([]);
    db.close();
  });

  test('should find tables case-insensitively and keep the catalog spelling', () => {
    const orderLine = introspector.describeTable('ORDER_LINE');

    expect(orderLine.name).toBe('order_line');
    expect(orderLine.primaryKey).toEqual(['order_id', 'line_no']);
  });

  test('should leave an INT primary key nullable, as SQLite does', () => {
    // only the exact type INTEGER aliases the rowid
    expect(introspector.describeTable('tagged').columns[0].nullable).toBe(true);
  });

  test('should raise SchemaReadError for a missing table', () => {
    expect(() => introspector.describeTable('nope')).toThrow(
      new SchemaReadError('Table "nope" does not exist in the source database')
    );
  });

  test('should wrap catalog failures in SchemaReadError', () => {
    const broken: SourceConnection = {
      listTables: () => {
        throw new Error('database disk image is malformed');
      },
      describeTable: (): RawTableInfo | null => {
        throw new Error('database disk image is malformed');
      },
      streamRows: () => [].values(),
      countRows: () => 0,
      close: () => undefined
    };
    const failing = new SchemaIntrospector(broken);

    expect(() => failing.listTables()).toThrow('Source catalog is unreadable: database disk image is malformed');
    expect(() => failing.describeTable('x')).toThrow(SchemaReadError);
  });
});
