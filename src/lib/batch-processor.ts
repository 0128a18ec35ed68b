// Batch Processor Utility
// Groups a row stream into fixed-size batches and runs each batch with bounded retry

import { backoffDelay, delay, getLogger, Logger } from './error-handler';

export interface BatchProcessorConfig {
  batchSize: number;
  maxRetries: number;
  retryDelay: number; // milliseconds, doubled on every further attempt
  progressReportingInterval?: number; // report every N batches
  shouldRetry?: (error: unknown) => boolean;
}

export interface BatchProcessorStats {
  totalProcessed: number;
  batches: number;
  retries: number;
  startTime: Date;
  endTime?: Date;
  avgBatchTime?: number;
}

export type BatchProcessor<TInput> = (
  batch: TInput[],
  batchIndex: number,
  attempt: number
) => Promise<void>;

/**
 * Called after a failed attempt and before the wait that precedes the next one.
 * Throwing from here abandons the batch with the thrown error.
 */
export type RetryHook = (
  error: unknown,
  batchIndex: number,
  attempt: number
) => Promise<void>;

export type ProgressReporter = (
  processed: number,
  batchIndex: number,
  stats: BatchProcessorStats
) => void;

/**
 * Lazily splits an iterable into arrays of at most `size` items
 */
export function* chunk<T>(items: Iterable<T>, size: number): Generator<T[]> {
  let batch: T[] = [];
  for (const item of items) {
    batch.push(item);
    if (batch.length >= size) {
      yield batch;
      batch = [];
    }
  }
  if (batch.length > 0) {
    yield batch;
  }
}

export class BatchProcessorService<TInput> {
  private config: Required<BatchProcessorConfig>;
  private stats: BatchProcessorStats;
  private readonly logger: Logger;

  constructor(
    config: Partial<BatchProcessorConfig> = {},
    private readonly progressReporter?: ProgressReporter,
    private readonly sleep: (ms: number) => Promise<void> = delay,
    logger?: Logger
  ) {
    this.config = {
      batchSize: config.batchSize ?? 1000,
      maxRetries: config.maxRetries ?? 3,
      retryDelay: config.retryDelay ?? 500,
      progressReportingInterval: config.progressReportingInterval ?? 10,
      shouldRetry: config.shouldRetry ?? (() => false)
    };
    this.logger = logger ?? getLogger();
    this.stats = this.initializeStats();
  }

  /**
   * Runs every batch in order. The first batch that fails for good stops
   * processing and its error is rethrown, as is any error raised while
   * reading the input.
   */
  async processBatches(
    items: Iterable<TInput>,
    processor: BatchProcessor<TInput>,
    onRetry?: RetryHook
  ): Promise<BatchProcessorStats> {
    this.stats = this.initializeStats();
    let batchIndex = 0;

    for (const batch of chunk(items, this.config.batchSize)) {
      await this.processSingleBatch(batch, batchIndex, processor, onRetry);

      this.stats.totalProcessed += batch.length;
      this.stats.batches++;

      if (this.progressReporter && (batchIndex + 1) % this.config.progressReportingInterval === 0) {
        this.progressReporter(this.stats.totalProcessed, batchIndex, this.getStats());
      }
      batchIndex++;
    }

    this.stats.endTime = new Date();
    this.calculateAverageBatchTime();
    return this.getStats();
  }

  private async processSingleBatch(
    batch: TInput[],
    batchIndex: number,
    processor: BatchProcessor<TInput>,
    onRetry?: RetryHook
  ): Promise<void> {
    let attempt = 0;

    for (;;) {
      try {
        await processor(batch, batchIndex, attempt);
        return;
      } catch (error) {
        attempt++;
        if (attempt > this.config.maxRetries || !this.config.shouldRetry(error)) {
          throw error;
        }

        const wait = backoffDelay(attempt, this.config.retryDelay);
        this.logger.warn(
          `🔄 Batch ${batchIndex} failed, retrying in ${wait}ms (attempt ${attempt}/${this.config.maxRetries})`,
          { error: error instanceof Error ? error.message : String(error) }
        );
        this.stats.retries++;

        if (onRetry) {
          await onRetry(error, batchIndex, attempt);
        }
        await this.sleep(wait);
      }
    }
  }

  private initializeStats(): BatchProcessorStats {
    return {
      totalProcessed: 0,
      batches: 0,
      retries: 0,
      startTime: new Date()
    };
  }

  private calculateAverageBatchTime(): void {
    if (this.stats.endTime && this.stats.batches > 0) {
      const totalTime = this.stats.endTime.getTime() - this.stats.startTime.getTime();
      this.stats.avgBatchTime = totalTime / this.stats.batches;
    }
  }

  getStats(): BatchProcessorStats {
    return { ...this.stats };
  }
}

/**
 * Default progress reporter: one log line per reporting interval
 */
export function createProgressReporter(label: string, logger: Logger = getLogger()): ProgressReporter {
  return (processed, batchIndex, stats) => {
    logger.info(
      `📈 ${label}: ${processed.toLocaleString()} rows in ${batchIndex + 1} batches` +
      (stats.retries > 0 ? ` (${stats.retries} retries)` : '')
    );
  };
}
