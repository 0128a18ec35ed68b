/**
 * Destination schema context for the query assistant.
 * Only destination names and types are ever described: the model writes
 * SQL against PostgreSQL, never against the source.
 */

import { formatIdentifier, needsQuoting } from '../services/schema-reconciler';
import type { DestinationConnection } from '../types/migration-types';

export interface SchemaColumn {
  name: string;
  type: string;
  nullable: boolean;
}

export interface SchemaTable {
  name: string;
  columns: SchemaColumn[];
  primaryKey: string[];
  references: Array<{ columns: string[]; table: string }>;
}

const DESTINATION_COLUMNS_QUERY = `
  SELECT table_name, column_name, data_type, is_nullable
  FROM information_schema.columns
  WHERE table_schema = 'public'
  ORDER BY table_name, ordinal_position
`;

const DESTINATION_KEYS_QUERY = `
  SELECT tc.table_name, tc.constraint_name, tc.constraint_type, kcu.column_name,
         ccu.table_name AS referenced_table
  FROM information_schema.table_constraints tc
  JOIN information_schema.key_column_usage kcu
    ON kcu.constraint_name = tc.constraint_name AND kcu.table_schema = tc.table_schema
  LEFT JOIN information_schema.constraint_column_usage ccu
    ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
    AND tc.constraint_type = 'FOREIGN KEY'
  WHERE tc.table_schema = 'public' AND tc.constraint_type IN ('PRIMARY KEY', 'FOREIGN KEY')
  ORDER BY tc.table_name, tc.constraint_name, kcu.ordinal_position
`;

function text(row: Record<string, unknown>, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function identifier(name: string): string {
  return formatIdentifier(name, needsQuoting(name));
}

/**
 * Reads the public schema of the destination from information_schema
 */
export async function loadDestinationSchema(destination: DestinationConnection): Promise<SchemaTable[]> {
  const columns = await destination.execute(DESTINATION_COLUMNS_QUERY);
  const keys = await destination.execute(DESTINATION_KEYS_QUERY);

  const tables = new Map<string, SchemaTable>();
  const tableFor = (name: string): SchemaTable => {
    const existing = tables.get(name);
    if (existing) {
      return existing;
    }
    const created: SchemaTable = { name, columns: [], primaryKey: [], references: [] };
    tables.set(name, created);
    return created;
  };

  for (const row of columns.rows) {
    tableFor(text(row, 'table_name')).columns.push({
      name: text(row, 'column_name'),
      type: text(row, 'data_type').toUpperCase(),
      nullable: text(row, 'is_nullable') === 'YES'
    });
  }

  const foreignKeys = new Map<string, { table: SchemaTable; columns: string[]; referenced: string }>();
  for (const row of keys.rows) {
    const table = tables.get(text(row, 'table_name'));
    if (!table) {
      continue;
    }

    if (text(row, 'constraint_type') === 'PRIMARY KEY') {
      table.primaryKey.push(text(row, 'column_name'));
      continue;
    }

    const key = `${table.name}.${text(row, 'constraint_name')}`;
    const entry = foreignKeys.get(key) ?? { table, columns: [], referenced: text(row, 'referenced_table') };
    if (!entry.columns.includes(text(row, 'column_name'))) {
      entry.columns.push(text(row, 'column_name'));
    }
    foreignKeys.set(key, entry);
  }

  for (const entry of foreignKeys.values()) {
    entry.table.references.push({ columns: entry.columns, table: entry.referenced });
  }

  return [...tables.values()];
}

/**
 * Renders the schema block placed in the assistant prompt:
 *
 *   Database Schema:
 *   - customers(
 *           id BIGINT NOT NULL PRIMARY KEY,
 *           country_id BIGINT (FK to countries)
 *           )
 */
export function describeDestinationSchema(schema: readonly SchemaTable[]): string {
  const blocks = schema.map(table => {
    const singlePrimaryKey = table.primaryKey.length === 1 ? table.primaryKey[0] : null;

    const lines = table.columns.map(column => {
      let line = `${identifier(column.name)} ${column.type}`;
      if (!column.nullable) line += ' NOT NULL';
      if (column.name === singlePrimaryKey) line += ' PRIMARY KEY';

      const reference = table.references.find(ref => ref.columns.length === 1 && ref.columns[0] === column.name);
      if (reference) line += ` (FK to ${identifier(reference.table)})`;
      return `        ${line}`;
    });

    if (table.primaryKey.length > 1) {
      lines.push(`        PRIMARY KEY (${table.primaryKey.map(identifier).join(', ')})`);
    }
    for (const reference of table.references.filter(ref => ref.columns.length > 1)) {
      lines.push(`        (${reference.columns.map(identifier).join(', ')}) FK to ${identifier(reference.table)}`);
    }

    return `- ${identifier(table.name)}(\n${lines.join(',\n')}\n        )`;
  });

  return `Database Schema:\n${blocks.join('\n\n')}`;
}
