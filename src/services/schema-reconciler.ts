/**
 * Schema Reconciler
 *
 * Assigns PostgreSQL identifiers to source tables and columns. Names are
 * folded to lower case the way PostgreSQL folds unquoted identifiers; names
 * that collide with a reserved word or contain other characters are quoted,
 * never renamed. Two names that fold to the same identifier are a conflict.
 */

import reservedWords from '../data/postgres-reserved-words.json';
import { SchemaConflictError } from '../lib/error-handler';
import { mapType } from './type-mapper';
import type {
  ColumnDescriptor,
  ResolvedColumnDescriptor,
  ResolvedTableDescriptor,
  TableDescriptor
} from '../types/migration-types';

const RESERVED_WORDS: ReadonlySet<string> = new Set(reservedWords);
const SIMPLE_IDENTIFIER = /^[a-z_][a-z0-9_$]*$/;
const MAX_IDENTIFIER_BYTES = 63;

export interface ReconciledIdentifier {
  destinationName: string;
  requiresQuoting: boolean;
}

export function isReservedWord(name: string): boolean {
  return RESERVED_WORDS.has(name.toLowerCase());
}

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * True when a destination identifier cannot be written bare
 */
export function needsQuoting(name: string): boolean {
  return RESERVED_WORDS.has(name) || !SIMPLE_IDENTIFIER.test(name);
}

export function formatIdentifier(name: string, requiresQuoting: boolean): string {
  return requiresQuoting ? quoteIdentifier(name) : name;
}

/**
 * Folds one source identifier into its destination form
 */
export function reconcileIdentifier(sourceName: string, owner: string): ReconciledIdentifier {
  if (sourceName.length === 0) {
    throw new SchemaConflictError(`Empty identifier in ${owner} cannot be created in PostgreSQL`, { owner });
  }

  const destinationName = sourceName.toLowerCase();

  if (Buffer.byteLength(destinationName, 'utf8') > MAX_IDENTIFIER_BYTES) {
    throw new SchemaConflictError(
      `Identifier "${sourceName}" in ${owner} exceeds PostgreSQL's ${MAX_IDENTIFIER_BYTES}-byte limit and would be truncated`,
      { owner, identifier: sourceName }
    );
  }

  return {
    destinationName,
    requiresQuoting: needsQuoting(destinationName)
  };
}

/**
 * Assigns destination names to every column, preserving order.
 * Fails when two source names fold to the same destination name.
 */
export function reconcileColumns<T extends ColumnDescriptor>(
  tableName: string,
  columns: readonly T[]
): Array<T & ReconciledIdentifier> {
  const seen = new Map<string, string>();

  return columns.map(column => {
    const identifier = reconcileIdentifier(column.sourceName, `table "${tableName}"`);
    const previous = seen.get(identifier.destinationName);

    if (previous !== undefined) {
      throw new SchemaConflictError(
        `Columns "${previous}" and "${column.sourceName}" of table "${tableName}" both map to destination column "${identifier.destinationName}"`,
        { table: tableName, columns: [previous, column.sourceName], destinationName: identifier.destinationName }
      );
    }

    seen.set(identifier.destinationName, column.sourceName);
    return { ...column, ...identifier };
  });
}

/**
 * Produces the frozen destination schema for a table: mapped types plus reconciled names
 */
export function resolveTable(table: TableDescriptor): ResolvedTableDescriptor {
  const tableIdentifier = reconcileIdentifier(table.name, 'the source schema');

  const typed = table.columns.map(column => ({ ...column, destinationType: mapType(column.typeTag) }));
  const columns: ResolvedColumnDescriptor[] = reconcileColumns(table.name, typed).map(column => Object.freeze(column));

  return Object.freeze({
    ...table,
    destinationName: tableIdentifier.destinationName,
    destinationRequiresQuoting: tableIdentifier.requiresQuoting,
    columns: Object.freeze(columns)
  });
}
