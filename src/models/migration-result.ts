/**
 * Migration Result Model
 * Frozen per-table outcomes and the run summary built from them
 */

import { errorKind, MigrationBaseError } from '../lib/error-handler';
import type {
  DeferredForeignKeyResult,
  DeferredForeignKeyStatus,
  FailurePolicy,
  MigrationErrorInfo,
  MigrationResult,
  MigrationSummary
} from '../types/migration-types';

export function toErrorInfo(error: unknown): MigrationErrorInfo {
  return Object.freeze({
    kind: errorKind(error),
    code: error instanceof MigrationBaseError ? error.errorCode : 'UNKNOWN',
    message: error instanceof Error ? error.message : String(error)
  });
}

export function succeededResult(params: {
  table: string;
  destinationTable: string;
  rowsCommitted: number;
  batches: number;
  durationMs: number;
}): MigrationResult {
  return Object.freeze({
    table: params.table,
    destinationTable: params.destinationTable,
    status: 'succeeded',
    rowsAttempted: params.rowsCommitted,
    rowsCommitted: params.rowsCommitted,
    batches: params.batches,
    durationMs: params.durationMs,
    error: null
  });
}

/**
 * A failed table never reports committed rows: its transaction was rolled back
 */
export function failedResult(params: {
  table: string;
  destinationTable: string | null;
  rowsAttempted: number;
  batches: number;
  durationMs: number;
  error: unknown;
}): MigrationResult {
  return Object.freeze({
    table: params.table,
    destinationTable: params.destinationTable,
    status: 'failed',
    rowsAttempted: params.rowsAttempted,
    rowsCommitted: 0,
    batches: params.batches,
    durationMs: params.durationMs,
    error: toErrorInfo(params.error)
  });
}

export function skippedResult(table: string, reason: string): MigrationResult {
  return Object.freeze({
    table,
    destinationTable: null,
    status: 'skipped',
    rowsAttempted: 0,
    rowsCommitted: 0,
    batches: 0,
    durationMs: 0,
    error: Object.freeze({ kind: 'Skipped', code: 'SKIPPED', message: reason })
  });
}

export function deferredForeignKeyResult(params: {
  table: string;
  referencedTable: string;
  statement: string;
  status: DeferredForeignKeyStatus;
  error: MigrationErrorInfo | null;
}): DeferredForeignKeyResult {
  return Object.freeze({ ...params });
}

export function buildSummary(params: {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  failurePolicy: FailurePolicy;
  results: readonly MigrationResult[];
  deferredForeignKeys?: readonly DeferredForeignKeyResult[];
}): MigrationSummary {
  const { results } = params;
  return Object.freeze({
    runId: params.runId,
    startedAt: params.startedAt,
    completedAt: params.completedAt,
    failurePolicy: params.failurePolicy,
    totalTables: results.length,
    succeeded: results.filter(result => result.status === 'succeeded').length,
    failed: results.filter(result => result.status === 'failed').length,
    skipped: results.filter(result => result.status === 'skipped').length,
    totalRowsCommitted: results.reduce((sum, result) => sum + result.rowsCommitted, 0),
    results: Object.freeze([...results]),
    deferredForeignKeys: Object.freeze([...(params.deferredForeignKeys ?? [])])
  });
}

export function isSuccessfulRun(summary: MigrationSummary): boolean {
  return summary.failed === 0
    && summary.skipped === 0
    && summary.deferredForeignKeys.every(foreignKey => foreignKey.status === 'added');
}
