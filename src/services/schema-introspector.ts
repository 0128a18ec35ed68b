/**
 * Schema Introspector
 * Reads table and column definitions from the source catalog into TableDescriptors
 */

import { getLogger, Logger, SchemaReadError } from '../lib/error-handler';
import { deriveTypeTag } from './type-mapper';
import type { ColumnDescriptor, RawColumnInfo, RawTableInfo, SourceConnection, TableDescriptor } from '../types/migration-types';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * An INTEGER PRIMARY KEY column aliases the rowid and can never hold NULL
 */
function isRowIdAlias(column: RawColumnInfo, primaryKeySize: number, withoutRowId: boolean): boolean {
  return !withoutRowId
    && primaryKeySize === 1
    && column.primaryKeyPosition === 1
    && column.declaredType.trim().toUpperCase() === 'INTEGER';
}

export class SchemaIntrospector {
  private readonly logger: Logger;

  constructor(private readonly source: SourceConnection, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  /**
   * User tables in catalog order
   */
  listTables(): string[] {
    try {
      return this.source.listTables();
    } catch (error) {
      throw new SchemaReadError(`Source catalog is unreadable: ${messageOf(error)}`, {}, error);
    }
  }

  describeTable(tableName: string): TableDescriptor {
    const info = this.readTableInfo(tableName);
    if (info.columns.length === 0) {
      throw new SchemaReadError(`Table "${tableName}" has no readable columns`, { table: tableName });
    }

    const primaryKeySize = info.columns.filter(column => column.primaryKeyPosition > 0).length;

    const columns: ColumnDescriptor[] = info.columns.map(column => Object.freeze({
      sourceName: column.name,
      declaredType: column.declaredType,
      typeTag: deriveTypeTag(column.declaredType),
      nullable: !column.notNull && !isRowIdAlias(column, primaryKeySize, info.withoutRowId),
      primaryKeyPosition: column.primaryKeyPosition
    }));

    const primaryKey = columns
      .filter(column => column.primaryKeyPosition > 0)
      .sort((a, b) => a.primaryKeyPosition - b.primaryKeyPosition)
      .map(column => column.sourceName);

    this.logger.debug(`Introspected table ${tableName}`, {
      columns: columns.length,
      primaryKey,
      foreignKeys: info.foreignKeys.length,
      uniqueConstraints: info.uniqueConstraints.length
    });

    return Object.freeze({
      name: info.name,
      columns: Object.freeze(columns),
      primaryKey: Object.freeze(primaryKey),
      foreignKeys: Object.freeze(info.foreignKeys),
      uniqueConstraints: Object.freeze(info.uniqueConstraints.map(unique => Object.freeze([...unique]))),
      withoutRowId: info.withoutRowId
    });
  }

  private readTableInfo(tableName: string): RawTableInfo {
    let info: RawTableInfo | null;
    try {
      info = this.source.describeTable(tableName);
    } catch (error) {
      throw new SchemaReadError(
        `Cannot read catalog for table "${tableName}": ${messageOf(error)}`,
        { table: tableName },
        error
      );
    }

    if (!info) {
      throw new SchemaReadError(`Table "${tableName}" does not exist in the source database`, { table: tableName });
    }
    return info;
  }
}
