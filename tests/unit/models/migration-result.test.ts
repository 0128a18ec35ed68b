/**
 * Migration Result Model Tests
 */

import { DestinationError, TypeCoercionError } from '../../../src/lib/error-handler';
import {
  buildSummary,
  deferredForeignKeyResult,
  failedResult,
  isSuccessfulRun,
  skippedResult,
  succeededResult,
  toErrorInfo
} from '../../../src/models/migration-result';

const startedAt = new Date('2026-01-05T10:00:00.000Z');
const completedAt = new Date('2026-01-05T10:00:05.000Z');

describe('Migration Result Model', () => {
  test('should count committed rows as attempted for a successful table', () => {
    const result = succeededResult({ table: 'orders', destinationTable: 'orders', rowsCommitted: 42, batches: 1, durationMs: 12 });

    expect(result).toEqual({
      table: 'orders',
      destinationTable: 'orders',
      status: 'succeeded',
      rowsAttempted: 42,
      rowsCommitted: 42,
      batches: 1,
      durationMs: 12,
      error: null
    });
    expect(Object.isFrozen(result)).toBe(true);
  });

  test('should never report committed rows for a failed table', () => {
    const result = failedResult({
      table: 'orders',
      destinationTable: 'orders',
      rowsAttempted: 1500,
      batches: 1,
      durationMs: 30,
      error: new TypeCoercionError('Row 1500 of orders: bad total')
    });

    expect(result.status).toBe('failed');
    expect(result.rowsCommitted).toBe(0);
    expect(result.rowsAttempted).toBe(1500);
    expect(result.error).toEqual({ kind: 'TypeCoercionError', code: 'TYPE_COERCION', message: 'Row 1500 of orders: bad total' });
  });

  test('should describe foreign errors', () => {
    expect(toErrorInfo(new RangeError('too big'))).toEqual({ kind: 'RangeError', code: 'UNKNOWN', message: 'too big' });
    expect(toErrorInfo('plain')).toEqual({ kind: 'Error', code: 'UNKNOWN', message: 'plain' });
  });

  test('should build a skipped result with the reason', () => {
    expect(skippedResult('orders', 'Not attempted').error).toEqual({
      kind: 'Skipped',
      code: 'SKIPPED',
      message: 'Not attempted'
    });
  });

  test('should tally a summary', () => {
    const summary = buildSummary({
      runId: 'run-1',
      startedAt,
      completedAt,
      failurePolicy: 'abort',
      results: [
        succeededResult({ table: 'a', destinationTable: 'a', rowsCommitted: 10, batches: 1, durationMs: 1 }),
        succeededResult({ table: 'b', destinationTable: 'b', rowsCommitted: 5, batches: 1, durationMs: 1 }),
        failedResult({ table: 'c', destinationTable: 'c', rowsAttempted: 3, batches: 0, durationMs: 1, error: new DestinationError('x') }),
        skippedResult('d', 'Not attempted')
      ]
    });

    expect(summary).toMatchObject({
      runId: 'run-1',
      failurePolicy: 'abort',
      totalTables: 4,
      succeeded: 2,
      failed: 1,
      skipped: 1,
      totalRowsCommitted: 15
    });
    expect(isSuccessfulRun(summary)).toBe(false);
  });

  test('should treat a run with only successes as successful', () => {
    const summary = buildSummary({ runId: 'run-2', startedAt, completedAt, failurePolicy: 'continue', results: [] });
    expect(isSuccessfulRun(summary)).toBe(true);
    expect(summary.deferredForeignKeys).toEqual([]);
  });

  test('should treat a foreign key that could not be added as an incomplete run', () => {
    const results = [succeededResult({ table: 'a', destinationTable: 'a', rowsCommitted: 1, batches: 1, durationMs: 1 })];
    const added = deferredForeignKeyResult({
      table: 'a',
      referencedTable: 'b',
      statement: 'ALTER TABLE a ADD FOREIGN KEY (b_id) REFERENCES b (id)',
      status: 'added',
      error: null
    });
    const failed = deferredForeignKeyResult({
      ...added,
      status: 'failed',
      error: toErrorInfo(new DestinationError('insert or update on table "a" violates foreign key constraint'))
    });

    const complete = buildSummary({ runId: 'run-3', startedAt, completedAt, failurePolicy: 'continue', results, deferredForeignKeys: [added] });
    const incomplete = buildSummary({ runId: 'run-4', startedAt, completedAt, failurePolicy: 'continue', results, deferredForeignKeys: [added, failed] });

    expect(isSuccessfulRun(complete)).toBe(true);
    expect(isSuccessfulRun(incomplete)).toBe(false);
    expect(Object.isFrozen(failed)).toBe(true);
  });
});
