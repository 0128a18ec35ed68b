// Database Connection Utility
// Source (SQLite, read-only) and destination (PostgreSQL) handles with scoped acquisition

import Database from 'better-sqlite3';
import { Pool, type PoolClient, type PoolConfig } from 'pg';
import {
  classifyDestinationError,
  ConnectivityError,
  getLogger,
  Logger,
  SchemaReadError,
  withRetry
} from './error-handler';
import { maskConnectionString, type AppConfig } from './environment-config';
import type {
  DestinationConnection,
  DestinationQueryResult,
  DestinationValue,
  ForeignKeyDescriptor,
  RawColumnInfo,
  RawTableInfo,
  SourceConnection,
  SourceRow,
  SourceValue,
  TableDescriptor
} from '../types/migration-types';

// ===== SQLITE SOURCE =====

type CatalogRow = Record<string, unknown>;

function isCatalogRow(value: unknown): value is CatalogRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function catalogRows(values: unknown[]): CatalogRow[] {
  return values.filter(isCatalogRow);
}

function readText(row: CatalogRow, key: string): string {
  const value = row[key];
  return typeof value === 'string' ? value : '';
}

function readNumber(row: CatalogRow, key: string): number {
  const value = row[key];
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  return 0;
}

function isSourceValue(value: unknown): value is SourceValue {
  return value === null
    || typeof value === 'string'
    || typeof value === 'number'
    || typeof value === 'bigint'
    || Buffer.isBuffer(value);
}

function toSourceRow(value: unknown, table: string): SourceRow {
  if (!Array.isArray(value) || !value.every(isSourceValue)) {
    throw new SchemaReadError(`Unexpected row shape while reading table "${table}"`, { table });
  }
  return value;
}

function quoteSqliteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Read-only SQLite source backed by better-sqlite3
 */
export class SqliteSource implements SourceConnection {
  constructor(private readonly db: Database.Database) {}

  static open(filePath: string): SqliteSource {
    try {
      return new SqliteSource(new Database(filePath, { readonly: true, fileMustExist: true }));
    } catch (error) {
      throw new SchemaReadError(
        `Cannot open source database ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        { path: filePath },
        error
      );
    }
  }

  listTables(): string[] {
    const rows = catalogRows(
      this.db
        .prepare("SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY rowid")
        .all()
    );
    return rows.map(row => readText(row, 'name'));
  }

  describeTable(tableName: string): RawTableInfo | null {
    const [master] = catalogRows(
      this.db
        .prepare("SELECT name, sql FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE")
        .all(tableName)
    );
    if (!master) {
      return null;
    }
    const name = readText(master, 'name');

    const columns: RawColumnInfo[] = catalogRows(
      this.db.prepare('SELECT name, type, "notnull", pk FROM pragma_table_info(?) ORDER BY cid').all(name)
    ).map(row => ({
      name: readText(row, 'name'),
      declaredType: readText(row, 'type'),
      notNull: readNumber(row, 'notnull') === 1,
      primaryKeyPosition: readNumber(row, 'pk')
    }));

    return {
      name,
      columns,
      foreignKeys: this.readForeignKeys(name),
      uniqueConstraints: this.readUniqueConstraints(name),
      withoutRowId: /\bWITHOUT\s+ROWID\b/i.test(readText(master, 'sql'))
    };
  }

  private readForeignKeys(tableName: string): ForeignKeyDescriptor[] {
    const rows = catalogRows(
      this.db.prepare('SELECT id, seq, "table", "from", "to" FROM pragma_foreign_key_list(?) ORDER BY id, seq').all(tableName)
    );

    const grouped = new Map<number, { table: string; from: string[]; to: string[] }>();
    for (const row of rows) {
      const id = readNumber(row, 'id');
      const entry = grouped.get(id) ?? { table: readText(row, 'table'), from: [], to: [] };
      entry.from.push(readText(row, 'from'));
      const to = readText(row, 'to');
      if (to) {
        entry.to.push(to);
      }
      grouped.set(id, entry);
    }

    return [...grouped.values()].map(entry => ({
      columns: entry.from,
      referencedTable: entry.table,
      referencedColumns: entry.to
    }));
  }

  /**
   * UNIQUE constraints declared in the table definition; indexes created separately are not constraints
   */
  private readUniqueConstraints(tableName: string): string[][] {
    const indexes = catalogRows(
      this.db.prepare("SELECT name FROM pragma_index_list(?) WHERE origin = 'u' ORDER BY name").all(tableName)
    );

    return indexes.map(index =>
      catalogRows(
        this.db.prepare('SELECT name FROM pragma_index_info(?) ORDER BY seqno').all(readText(index, 'name'))
      ).map(row => readText(row, 'name'))
    );
  }

  /**
   * Rows in rowid order, or primary-key order for WITHOUT ROWID tables.
   * Integers are read as bigint so 64-bit values survive.
   */
  *streamRows(table: TableDescriptor): IterableIterator<SourceRow> {
    const columns = table.columns.map(column => quoteSqliteIdentifier(column.sourceName)).join(', ');
    const orderBy = table.withoutRowId
      ? table.primaryKey.map(quoteSqliteIdentifier).join(', ')
      : 'rowid';

    const statement = this.db
      .prepare(`SELECT ${columns} FROM ${quoteSqliteIdentifier(table.name)} ORDER BY ${orderBy}`)
      .raw(true)
      .safeIntegers(true);

    for (const row of statement.iterate()) {
      yield toSourceRow(row, table.name);
    }
  }

  countRows(tableName: string): number {
    const [row] = catalogRows(
      this.db.prepare(`SELECT COUNT(*) AS count FROM ${quoteSqliteIdentifier(tableName)}`).all()
    );
    return row ? readNumber(row, 'count') : 0;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}

// ===== POSTGRESQL DESTINATION =====

/**
 * Destination handle over a single pooled pg client held for the whole run
 */
export class PgDestination implements DestinationConnection {
  private released = false;

  constructor(
    private readonly client: PoolClient,
    private readonly pool: Pool | null = null,
    private readonly logger: Logger = getLogger()
  ) {
    this.client.on('error', error => {
      this.logger.error('Destination connection error', error);
    });
  }

  async execute(sql: string, params?: readonly DestinationValue[]): Promise<DestinationQueryResult> {
    try {
      const result = params && params.length > 0
        ? await this.client.query(sql, [...params])
        : await this.client.query(sql);

      const rows: Record<string, unknown>[] = result.rows;
      return {
        rows,
        rowCount: result.rowCount ?? 0,
        fields: result.fields.map(field => field.name)
      };
    } catch (error) {
      throw classifyDestinationError(error, { statement: sql.slice(0, 120) });
    }
  }

  async begin(mode: 'read write' | 'read only' = 'read write'): Promise<void> {
    await this.execute(mode === 'read only' ? 'BEGIN READ ONLY' : 'BEGIN');
  }

  async commit(): Promise<void> {
    await this.execute('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.execute('ROLLBACK');
  }

  async savepoint(name: string): Promise<void> {
    await this.execute(`SAVEPOINT ${name}`);
  }

  async rollbackToSavepoint(name: string): Promise<void> {
    await this.execute(`ROLLBACK TO SAVEPOINT ${name}`);
  }

  async releaseSavepoint(name: string): Promise<void> {
    await this.execute(`RELEASE SAVEPOINT ${name}`);
  }

  async close(): Promise<void> {
    if (this.released) {
      return;
    }
    this.released = true;
    this.client.release();
    if (this.pool) {
      await this.pool.end();
    }
  }
}

// ===== CONNECTION MANAGER =====

export interface ConnectionProvider {
  openSource(): SourceConnection;
  withConnections<T>(callback: (source: SourceConnection, destination: DestinationConnection) => Promise<T>): Promise<T>;
  withDestination<T>(callback: (destination: DestinationConnection) => Promise<T>): Promise<T>;
}

export class DatabaseConnections implements ConnectionProvider {
  private readonly logger: Logger;

  constructor(private readonly config: AppConfig, logger?: Logger) {
    this.logger = logger ?? getLogger();
  }

  openSource(): SqliteSource {
    this.logger.info(`Opening source database ${this.config.source.sqlitePath} (read-only)`);
    return SqliteSource.open(this.config.source.sqlitePath);
  }

  async openDestination(): Promise<PgDestination> {
    const { destination } = this.config;
    const poolConfig: PoolConfig = {
      connectionString: destination.connectionString,
      max: 1,
      connectionTimeoutMillis: destination.connectionTimeoutMillis,
      ssl: destination.ssl ? { rejectUnauthorized: false } : false
    };

    const pool = new Pool(poolConfig);
    pool.on('error', error => {
      this.logger.error('Destination pool error', error);
    });

    this.logger.info(`Connecting to destination ${maskConnectionString(destination.connectionString)}`);

    try {
      const client = await withRetry(() => pool.connect(), {
        maxRetries: this.config.migration.maxRetryAttempts,
        delayMs: this.config.migration.retryDelayMs,
        shouldRetry: error => classifyDestinationError(error) instanceof ConnectivityError,
        onRetry: (error, attempt, wait) => {
          this.logger.warn(`🔄 Destination connect failed, retrying in ${wait}ms (attempt ${attempt})`, {
            error: error instanceof Error ? error.message : String(error)
          });
        }
      });
      return new PgDestination(client, pool, this.logger);
    } catch (error) {
      await pool.end();
      throw classifyDestinationError(error, { phase: 'connect' });
    }
  }

  /**
   * Opens both connections, runs the callback, and closes both on every exit path
   */
  async withConnections<T>(callback: (source: SourceConnection, destination: DestinationConnection) => Promise<T>): Promise<T> {
    const source = this.openSource();
    try {
      const destination = await this.openDestination();
      try {
        return await callback(source, destination);
      } finally {
        await destination.close();
      }
    } finally {
      source.close();
    }
  }

  /**
   * Destination only, for the query assistant
   */
  async withDestination<T>(callback: (destination: DestinationConnection) => Promise<T>): Promise<T> {
    const destination = await this.openDestination();
    try {
      return await callback(destination);
    } finally {
      await destination.close();
    }
  }
}
