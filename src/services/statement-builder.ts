/**
 * Statement Builder
 * Renders DDL and multi-row INSERT statements from resolved table descriptors
 */

import { formatIdentifier, reconcileIdentifier } from './schema-reconciler';
import type { ForeignKeyDescriptor, ResolvedTableDescriptor } from '../types/migration-types';

/** PostgreSQL's limit on bind parameters in one statement */
export const MAX_BIND_PARAMETERS = 65535;

export interface DdlOptions {
  recreate: boolean;
  includeForeignKeys: boolean;
}

export function tableIdentifier(table: ResolvedTableDescriptor): string {
  return formatIdentifier(table.destinationName, table.destinationRequiresQuoting);
}

function referenceIdentifier(sourceName: string, owner: string): string {
  const identifier = reconcileIdentifier(sourceName, owner);
  return formatIdentifier(identifier.destinationName, identifier.requiresQuoting);
}

function columnList(table: ResolvedTableDescriptor, columns: readonly string[]): string {
  const owner = `table "${table.name}"`;
  return columns.map(column => referenceIdentifier(column, owner)).join(', ');
}

function foreignKeyClause(table: ResolvedTableDescriptor, foreignKey: ForeignKeyDescriptor): string {
  const parent = referenceIdentifier(foreignKey.referencedTable, `table "${table.name}"`);
  const parentColumns = foreignKey.referencedColumns.length > 0
    ? ` (${columnList(table, foreignKey.referencedColumns)})`
    : '';

  return `FOREIGN KEY (${columnList(table, foreignKey.columns)}) REFERENCES ${parent}${parentColumns}`;
}

export function buildCreateTableStatement(table: ResolvedTableDescriptor, includeForeignKeys: boolean): string {
  const lines = table.columns.map(column => {
    const name = formatIdentifier(column.destinationName, column.requiresQuoting);
    return `  ${name} ${column.destinationType}${column.nullable ? '' : ' NOT NULL'}`;
  });

  const primaryKey = [...table.columns]
    .filter(column => column.primaryKeyPosition > 0)
    .sort((a, b) => a.primaryKeyPosition - b.primaryKeyPosition)
    .map(column => formatIdentifier(column.destinationName, column.requiresQuoting));

  if (primaryKey.length > 0) {
    lines.push(`  PRIMARY KEY (${primaryKey.join(', ')})`);
  }

  for (const unique of table.uniqueConstraints) {
    lines.push(`  UNIQUE (${columnList(table, unique)})`);
  }

  if (includeForeignKeys) {
    for (const foreignKey of table.foreignKeys) {
      lines.push(`  ${foreignKeyClause(table, foreignKey)}`);
    }
  }

  return `CREATE TABLE IF NOT EXISTS ${tableIdentifier(table)} (\n${lines.join(',\n')}\n)`;
}

/**
 * Foreign key added once both tables exist, for references the CREATE TABLE could not carry
 */
export function buildAddForeignKeyStatement(table: ResolvedTableDescriptor, foreignKey: ForeignKeyDescriptor): string {
  return `ALTER TABLE ${tableIdentifier(table)} ADD ${foreignKeyClause(table, foreignKey)}`;
}

export function buildDropTableStatement(table: ResolvedTableDescriptor): string {
  return `DROP TABLE IF EXISTS ${tableIdentifier(table)} CASCADE`;
}

/**
 * DDL issued inside the table's transaction, in execution order
 */
export function buildTableStatements(table: ResolvedTableDescriptor, options: DdlOptions): string[] {
  const statements: string[] = [];
  if (options.recreate) {
    statements.push(buildDropTableStatement(table));
  }
  statements.push(buildCreateTableStatement(table, options.includeForeignKeys));
  return statements;
}

/**
 * One INSERT carrying `rowCount` rows as numbered parameters ($1, $2, ...)
 */
export function buildInsertStatement(table: ResolvedTableDescriptor, rowCount: number): string {
  const columnCount = table.columns.length;
  const columns = table.columns
    .map(column => formatIdentifier(column.destinationName, column.requiresQuoting))
    .join(', ');

  const tuples: string[] = [];
  for (let row = 0; row < rowCount; row++) {
    const placeholders: string[] = [];
    for (let col = 1; col <= columnCount; col++) {
      placeholders.push(`$${row * columnCount + col}`);
    }
    tuples.push(`(${placeholders.join(', ')})`);
  }

  return `INSERT INTO ${tableIdentifier(table)} (${columns}) VALUES ${tuples.join(', ')}`;
}

/**
 * Largest batch that stays within the bind parameter limit
 */
export function effectiveBatchSize(requested: number, columnCount: number): number {
  if (columnCount === 0) {
    return requested;
  }
  return Math.max(1, Math.min(requested, Math.floor(MAX_BIND_PARAMETERS / columnCount)));
}
