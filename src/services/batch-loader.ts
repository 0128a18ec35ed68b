/**
 * Batch Loader
 *
 * Copies one table: DDL and every batch run inside a single destination
 * transaction, one multi-row INSERT per batch. Any failure rolls the whole
 * table back; only connectivity failures are retried, per batch, under a
 * savepoint.
 */

import { BatchProcessorService, createProgressReporter } from '../lib/batch-processor';
import {
  classifyDestinationError,
  ConnectivityError,
  DestinationError,
  getLogger,
  Logger,
  TypeCoercionError
} from '../lib/error-handler';
import { failedResult, succeededResult } from '../models/migration-result';
import {
  buildInsertStatement,
  buildTableStatements,
  effectiveBatchSize,
  tableIdentifier
} from './statement-builder';
import { coerceValue, describeValue } from './type-mapper';
import type {
  DestinationConnection,
  DestinationValue,
  LoaderOptions,
  MigrationResult,
  ResolvedTableDescriptor,
  SourceConnection,
  SourceRow
} from '../types/migration-types';

export const DEFAULT_LOADER_OPTIONS: LoaderOptions = {
  batchSize: 1000,
  maxRetries: 3,
  retryDelayMs: 500,
  recreate: false,
  includeForeignKeys: true
};

const BATCH_SAVEPOINT = 'migration_batch';

export class BatchLoader {
  private readonly options: LoaderOptions;
  private readonly logger: Logger;

  constructor(
    private readonly source: SourceConnection,
    private readonly destination: DestinationConnection,
    options: Partial<LoaderOptions> = {},
    logger?: Logger,
    private readonly sleep?: (ms: number) => Promise<void>
  ) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
    this.logger = logger ?? getLogger();
  }

  /**
   * Migrates one table whose destination schema is already resolved
   */
  async load(table: ResolvedTableDescriptor): Promise<MigrationResult> {
    const startedAt = Date.now();
    const progress = { rowsRead: 0, batches: 0 };
    let inTransaction = false;

    const batchSize = effectiveBatchSize(this.options.batchSize, table.columns.length);
    if (batchSize < this.options.batchSize) {
      this.logger.warn(
        `Batch size reduced to ${batchSize} for ${table.name} to stay within the bind parameter limit`,
        { requested: this.options.batchSize, columns: table.columns.length }
      );
    }

    try {
      await this.destination.begin();
      inTransaction = true;

      for (const statement of buildTableStatements(table, this.options)) {
        await this.destination.execute(statement);
      }

      const processor = new BatchProcessorService<DestinationValue[]>(
        {
          batchSize,
          maxRetries: this.options.maxRetries,
          retryDelay: this.options.retryDelayMs,
          shouldRetry: error => classifyDestinationError(error) instanceof ConnectivityError
        },
        createProgressReporter(table.name, this.logger),
        this.sleep,
        this.logger
      );

      const stats = await processor.processBatches(
        this.coerceRows(table, this.source.streamRows(table), progress),
        async (batch, batchIndex, attempt) => {
          await this.insertBatch(table, batch, batchIndex, attempt);
          progress.batches++;
        },
        async () => {
          await this.destination.rollbackToSavepoint(BATCH_SAVEPOINT);
        }
      );

      if (stats.totalProcessed !== progress.rowsRead) {
        throw new DestinationError(
          `Inserted ${stats.totalProcessed} of ${progress.rowsRead} rows read from ${table.name}`,
          { table: table.name }
        );
      }

      await this.destination.commit();
      inTransaction = false;

      const result = succeededResult({
        table: table.name,
        destinationTable: table.destinationName,
        rowsCommitted: stats.totalProcessed,
        batches: stats.batches,
        durationMs: Date.now() - startedAt
      });

      this.logger.info(`✅ ${table.name}: ${result.rowsCommitted.toLocaleString()} rows committed in ${result.batches} batches`);
      return result;

    } catch (error) {
      const classified = classifyDestinationError(error, { table: table.name });

      if (inTransaction) {
        await this.safeRollback(table);
      }

      this.logger.logMigrationError(classified, table.name);

      return failedResult({
        table: table.name,
        destinationTable: table.destinationName,
        rowsAttempted: progress.rowsRead,
        batches: progress.batches,
        durationMs: Date.now() - startedAt,
        error: classified
      });
    }
  }

  /**
   * Converts every source value to its destination representation, counting rows read
   */
  private *coerceRows(
    table: ResolvedTableDescriptor,
    rows: Iterable<SourceRow>,
    progress: { rowsRead: number }
  ): Generator<DestinationValue[]> {
    for (const row of rows) {
      progress.rowsRead++;

      yield table.columns.map((column, index) => {
        const value = row[index] ?? null;
        const result = coerceValue(column.destinationType, value);
        if (!result.ok) {
          throw new TypeCoercionError(
            `Row ${progress.rowsRead} of ${table.name}: column "${column.sourceName}" ${result.reason}`,
            {
              table: table.name,
              column: column.sourceName,
              row: progress.rowsRead,
              value: describeValue(value),
              destinationType: column.destinationType
            }
          );
        }
        return result.value;
      });
    }
  }

  private async insertBatch(
    table: ResolvedTableDescriptor,
    batch: DestinationValue[][],
    batchIndex: number,
    attempt: number
  ): Promise<void> {
    if (attempt === 0) {
      await this.destination.savepoint(BATCH_SAVEPOINT);
    }

    const result = await this.destination.execute(buildInsertStatement(table, batch.length), batch.flat());

    if (result.rowCount !== batch.length) {
      throw new DestinationError(
        `Batch ${batchIndex} of ${table.name} inserted ${result.rowCount} of ${batch.length} rows`,
        { table: table.name, batchIndex }
      );
    }

    await this.destination.releaseSavepoint(BATCH_SAVEPOINT);
    this.logger.debug(`Batch ${batchIndex} of ${table.name}: ${batch.length} rows into ${tableIdentifier(table)}`);
  }

  private async safeRollback(table: ResolvedTableDescriptor): Promise<void> {
    try {
      await this.destination.rollback();
      this.logger.warn(`↩️  Rolled back ${table.name}`);
    } catch (rollbackError) {
      this.logger.error(`Rollback of ${table.name} failed`, rollbackError);
    }
  }
}
