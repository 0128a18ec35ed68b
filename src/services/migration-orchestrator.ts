/**
 * Migration Orchestrator
 *
 * Runs introspection, reconciliation and loading for each table in the order
 * given, one table at a time, and aggregates the outcomes into a summary.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  classifyDestinationError,
  getLogger,
  Logger,
  SchemaConflictError
} from '../lib/error-handler';
import {
  buildSummary,
  deferredForeignKeyResult,
  failedResult,
  skippedResult,
  toErrorInfo
} from '../models/migration-result';
import { BatchLoader, DEFAULT_LOADER_OPTIONS } from './batch-loader';
import { resolveDependencies, type DependencyOrder } from './dependency-resolver';
import { SchemaIntrospector } from './schema-introspector';
import { resolveTable } from './schema-reconciler';
import {
  buildAddForeignKeyStatement,
  buildInsertStatement,
  buildTableStatements,
  effectiveBatchSize,
  type DdlOptions
} from './statement-builder';
import type {
  DeferredForeignKeyResult,
  DestinationConnection,
  FailurePolicy,
  ForeignKeyDescriptor,
  LoaderOptions,
  MigrationResult,
  MigrationSummary,
  ResolvedTableDescriptor,
  SourceConnection,
  TablePlan
} from '../types/migration-types';

export interface OrchestratorOptions extends LoaderOptions {
  failurePolicy: FailurePolicy;
}

interface DeferredForeignKey {
  table: ResolvedTableDescriptor;
  foreignKey: ForeignKeyDescriptor;
}

/**
 * Tables after `index` in the run, keyed case-insensitively
 */
function laterTables(tables: readonly string[], index: number): Set<string> {
  return new Set(tables.slice(index + 1).map(table => table.toLowerCase()));
}

/**
 * Holds back the foreign keys whose parent is created later in the run.
 * They are added with ALTER TABLE once both tables are loaded.
 */
export function splitForwardReferences(
  table: ResolvedTableDescriptor,
  later: ReadonlySet<string>
): { table: ResolvedTableDescriptor; deferred: ForeignKeyDescriptor[] } {
  const self = table.name.toLowerCase();
  const deferred = table.foreignKeys.filter(foreignKey => {
    const parent = foreignKey.referencedTable.toLowerCase();
    return parent !== self && later.has(parent);
  });

  if (deferred.length === 0) {
    return { table, deferred };
  }

  return {
    table: Object.freeze({
      ...table,
      foreignKeys: Object.freeze(table.foreignKeys.filter(foreignKey => !deferred.includes(foreignKey)))
    }),
    deferred
  };
}

/**
 * Introspects and reconciles one table, claiming its destination name
 */
function resolveAndClaim(
  introspector: SchemaIntrospector,
  table: string,
  claimed: Map<string, string>
): ResolvedTableDescriptor {
  const descriptor = resolveTable(introspector.describeTable(table));
  const owner = claimed.get(descriptor.destinationName);

  if (owner !== undefined) {
    throw new SchemaConflictError(
      `Tables "${owner}" and "${table}" both map to destination table "${descriptor.destinationName}"`,
      { tables: [owner, table], destinationName: descriptor.destinationName }
    );
  }

  claimed.set(descriptor.destinationName, table);
  return descriptor;
}

/**
 * Resolves each table's destination schema and renders its DDL without touching the destination
 */
export function planMigration(
  source: SourceConnection,
  tables: readonly string[],
  options: DdlOptions & { batchSize: number },
  logger?: Logger
): TablePlan[] {
  const introspector = new SchemaIntrospector(source, logger);
  const claimed = new Map<string, string>();

  return tables.map((table, index) => {
    try {
      const descriptor = resolveAndClaim(introspector, table, claimed);
      const split: ReturnType<typeof splitForwardReferences> = options.includeForeignKeys
        ? splitForwardReferences(descriptor, laterTables(tables, index))
        : { table: descriptor, deferred: [] };

      return Object.freeze({
        table,
        descriptor,
        statements: Object.freeze([
          ...buildTableStatements(split.table, options),
          buildInsertStatement(descriptor, 1)
        ]),
        deferredStatements: Object.freeze(split.deferred.map(foreignKey => buildAddForeignKeyStatement(descriptor, foreignKey))),
        sourceRows: source.countRows(table),
        batchSize: effectiveBatchSize(options.batchSize, descriptor.columns.length),
        error: null
      });
    } catch (error) {
      return Object.freeze({
        table,
        descriptor: null,
        statements: Object.freeze([]),
        deferredStatements: Object.freeze([]),
        sourceRows: null,
        batchSize: null,
        error: toErrorInfo(error)
      });
    }
  });
}

export class MigrationOrchestrator {
  private readonly options: OrchestratorOptions;
  private readonly logger: Logger;
  private readonly introspector: SchemaIntrospector;
  private readonly loader: BatchLoader;

  constructor(
    private readonly source: SourceConnection,
    private readonly destination: DestinationConnection,
    options: Partial<OrchestratorOptions> = {},
    logger?: Logger,
    sleep?: (ms: number) => Promise<void>
  ) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, failurePolicy: 'continue', ...options };
    this.logger = logger ?? getLogger();
    this.introspector = new SchemaIntrospector(source, this.logger);
    this.loader = new BatchLoader(source, destination, this.options, this.logger, sleep);
  }

  /**
   * Source tables ordered parents-first; cycle members keep catalog order
   */
  orderTables(tables: readonly string[] = this.introspector.listTables()): DependencyOrder {
    const dependencyOrder = resolveDependencies(tables.map(table => this.introspector.describeTable(table)));
    if (dependencyOrder.cycles.length > 0) {
      this.logger.warn(
        `⚠️  Foreign-key cycle between ${dependencyOrder.cycles.join(', ')}; these tables keep catalog order ` +
        'and their forward references are added after loading'
      );
    }
    return dependencyOrder;
  }

  /**
   * Migrates every table once, in the order given
   */
  async migrate(tables: readonly string[]): Promise<MigrationSummary> {
    const runId = uuidv4();
    const startedAt = new Date();
    const claimed = new Map<string, string>();
    const results: MigrationResult[] = [];
    const deferred: DeferredForeignKey[] = [];
    let abortedBy: string | null = null;

    this.logger.setMigrationId(runId);
    this.logger.info(`🚀 Starting migration of ${tables.length} tables`, {
      runId,
      failurePolicy: this.options.failurePolicy,
      batchSize: this.options.batchSize,
      recreate: this.options.recreate
    });

    try {
      for (const [index, table] of tables.entries()) {
        if (abortedBy !== null) {
          results.push(skippedResult(table, `Not attempted: migration aborted after ${abortedBy} failed`));
          continue;
        }

        this.logger.info(`📋 [${index + 1}/${tables.length}] ${table}`);
        const result = await this.migrateTable(table, claimed, laterTables(tables, index), deferred);
        results.push(result);

        if (result.status === 'failed' && this.options.failurePolicy === 'abort') {
          abortedBy = table;
          this.logger.warn(`⛔ Aborting: ${table} failed and the failure policy is abort`);
        }
      }

      const deferredForeignKeys = await this.addDeferredForeignKeys(deferred, results);

      const summary = buildSummary({
        runId,
        startedAt,
        completedAt: new Date(),
        failurePolicy: this.options.failurePolicy,
        results,
        deferredForeignKeys
      });

      this.logger.info(
        `🏁 Migration finished: ${summary.succeeded} succeeded, ${summary.failed} failed, ${summary.skipped} skipped`,
        { totalRowsCommitted: summary.totalRowsCommitted }
      );
      return summary;
    } finally {
      this.logger.clearContext();
    }
  }

  plan(tables: readonly string[]): TablePlan[] {
    return planMigration(this.source, tables, this.options, this.logger);
  }

  private async migrateTable(
    table: string,
    claimed: Map<string, string>,
    later: ReadonlySet<string>,
    deferred: DeferredForeignKey[]
  ): Promise<MigrationResult> {
    const startedAt = Date.now();
    let descriptor: ResolvedTableDescriptor;

    try {
      descriptor = resolveAndClaim(this.introspector, table, claimed);
    } catch (error) {
      const classified = classifyDestinationError(error, { table });
      this.logger.logMigrationError(classified, table);
      return failedResult({
        table,
        destinationTable: null,
        rowsAttempted: 0,
        batches: 0,
        durationMs: Date.now() - startedAt,
        error: classified
      });
    }

    if (!this.options.includeForeignKeys) {
      return this.loader.load(descriptor);
    }

    const split = splitForwardReferences(descriptor, later);
    for (const foreignKey of split.deferred) {
      deferred.push({ table: descriptor, foreignKey });
      this.logger.info(`🔗 ${descriptor.name}: foreign key to ${foreignKey.referencedTable} is added after loading`);
    }
    return this.loader.load(split.table);
  }

  /**
   * Adds the held-back foreign keys where both tables were migrated; each ALTER commits on its own
   */
  private async addDeferredForeignKeys(
    deferred: readonly DeferredForeignKey[],
    results: readonly MigrationResult[]
  ): Promise<DeferredForeignKeyResult[]> {
    const migrated = new Set(
      results.filter(result => result.status === 'succeeded').map(result => result.table.toLowerCase())
    );
    const outcomes: DeferredForeignKeyResult[] = [];

    for (const { table, foreignKey } of deferred) {
      const statement = buildAddForeignKeyStatement(table, foreignKey);
      const base = { table: table.name, referencedTable: foreignKey.referencedTable, statement };
      const missing = [table.name, foreignKey.referencedTable].filter(name => !migrated.has(name.toLowerCase()));

      if (missing.length > 0) {
        outcomes.push(deferredForeignKeyResult({
          ...base,
          status: 'skipped',
          error: Object.freeze({
            kind: 'Skipped',
            code: 'SKIPPED',
            message: `Not added: ${missing.join(' and ')} did not migrate`
          })
        }));
        continue;
      }

      try {
        await this.destination.execute(statement);
        this.logger.info(`🔗 Added foreign key ${table.name} → ${foreignKey.referencedTable}`);
        outcomes.push(deferredForeignKeyResult({ ...base, status: 'added', error: null }));
      } catch (error) {
        const classified = classifyDestinationError(error, { table: table.name, statement });
        this.logger.logMigrationError(classified, table.name);
        outcomes.push(deferredForeignKeyResult({ ...base, status: 'failed', error: toErrorInfo(classified) }));
      }
    }

    return outcomes;
  }
}
