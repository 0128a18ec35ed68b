// Migration Types
// Shared descriptors and results for the SQLite to PostgreSQL migration

// ===== TYPE TAGS =====

/**
 * Coarse category of a source column, derived from its declared type
 * using SQLite's affinity rules.
 */
export enum SourceTypeTag {
  INTEGER = 'integer',
  REAL = 'real',
  TEXT = 'text',
  BLOB = 'blob',
  UNSPECIFIED = 'unspecified',
  NUMERIC = 'numeric',
  BOOLEAN = 'boolean',
  TEMPORAL = 'temporal'
}

export enum DestinationType {
  BIGINT = 'BIGINT',
  DOUBLE_PRECISION = 'DOUBLE PRECISION',
  TEXT = 'TEXT',
  BYTEA = 'BYTEA',
  NUMERIC = 'NUMERIC',
  BOOLEAN = 'BOOLEAN',
  TIMESTAMP = 'TIMESTAMP'
}

// ===== SCHEMA DESCRIPTORS =====

export interface ColumnDescriptor {
  readonly sourceName: string;
  readonly declaredType: string;
  readonly typeTag: SourceTypeTag;
  readonly nullable: boolean;
  /** 1-based position within the primary key, 0 when not part of it */
  readonly primaryKeyPosition: number;
  readonly destinationName?: string;
  readonly destinationType?: DestinationType;
  readonly requiresQuoting?: boolean;
}

/**
 * Column whose destination name and type have both been filled in.
 */
export interface ResolvedColumnDescriptor extends ColumnDescriptor {
  readonly destinationName: string;
  readonly destinationType: DestinationType;
  readonly requiresQuoting: boolean;
}

export interface ForeignKeyDescriptor {
  readonly columns: readonly string[];
  readonly referencedTable: string;
  readonly referencedColumns: readonly string[];
}

export interface TableDescriptor {
  readonly name: string;
  readonly columns: readonly ColumnDescriptor[];
  readonly primaryKey: readonly string[];
  readonly foreignKeys: readonly ForeignKeyDescriptor[];
  /** Column lists of UNIQUE constraints, in declaration order */
  readonly uniqueConstraints: readonly (readonly string[])[];
  readonly withoutRowId: boolean;
}

export interface ResolvedTableDescriptor extends TableDescriptor {
  readonly destinationName: string;
  readonly destinationRequiresQuoting: boolean;
  readonly columns: readonly ResolvedColumnDescriptor[];
}

// ===== CONNECTIONS =====

export type SourceValue = string | number | bigint | Buffer | null;

export type SourceRow = readonly SourceValue[];

export type DestinationValue = string | number | boolean | Buffer | Date | null;

export interface RawColumnInfo {
  name: string;
  declaredType: string;
  notNull: boolean;
  primaryKeyPosition: number;
}

export interface RawTableInfo {
  /** Catalog spelling of the table name */
  name: string;
  columns: RawColumnInfo[];
  foreignKeys: ForeignKeyDescriptor[];
  uniqueConstraints: string[][];
  withoutRowId: boolean;
}

/**
 * Read-only handle on the source database.
 */
export interface SourceConnection {
  listTables(): string[];
  describeTable(tableName: string): RawTableInfo | null;
  /** Yields rows in column order, in a stable order across runs */
  streamRows(table: TableDescriptor): IterableIterator<SourceRow>;
  countRows(tableName: string): number;
  close(): void;
}

export interface DestinationQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number;
  fields: string[];
}

/**
 * Handle on the destination database. One connection, held for the whole run.
 */
export interface DestinationConnection {
  execute(sql: string, params?: readonly DestinationValue[]): Promise<DestinationQueryResult>;
  begin(mode?: 'read write' | 'read only'): Promise<void>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
  savepoint(name: string): Promise<void>;
  rollbackToSavepoint(name: string): Promise<void>;
  releaseSavepoint(name: string): Promise<void>;
  close(): Promise<void>;
}

// ===== RESULTS =====

export type FailurePolicy = 'continue' | 'abort';

export type TableStatus = 'succeeded' | 'failed' | 'skipped';

export interface MigrationErrorInfo {
  readonly kind: string;
  readonly code: string;
  readonly message: string;
}

export interface MigrationResult {
  readonly table: string;
  readonly destinationTable: string | null;
  readonly status: TableStatus;
  readonly rowsAttempted: number;
  readonly rowsCommitted: number;
  readonly batches: number;
  readonly durationMs: number;
  readonly error: MigrationErrorInfo | null;
}

export type DeferredForeignKeyStatus = 'added' | 'failed' | 'skipped';

/**
 * Foreign key whose parent was created after its child, added once both tables were loaded
 */
export interface DeferredForeignKeyResult {
  readonly table: string;
  readonly referencedTable: string;
  readonly statement: string;
  readonly status: DeferredForeignKeyStatus;
  readonly error: MigrationErrorInfo | null;
}

export interface MigrationSummary {
  readonly runId: string;
  readonly startedAt: Date;
  readonly completedAt: Date;
  readonly failurePolicy: FailurePolicy;
  readonly totalTables: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  readonly totalRowsCommitted: number;
  readonly results: readonly MigrationResult[];
  readonly deferredForeignKeys: readonly DeferredForeignKeyResult[];
}

export interface LoaderOptions {
  batchSize: number;
  maxRetries: number;
  retryDelayMs: number;
  recreate: boolean;
  includeForeignKeys: boolean;
}

export interface TablePlan {
  readonly table: string;
  readonly descriptor: ResolvedTableDescriptor | null;
  readonly statements: readonly string[];
  /** ALTER TABLE statements that run after every table is loaded */
  readonly deferredStatements: readonly string[];
  readonly sourceRows: number | null;
  /** Rows per INSERT after the bind parameter cap */
  readonly batchSize: number | null;
  readonly error: MigrationErrorInfo | null;
}
