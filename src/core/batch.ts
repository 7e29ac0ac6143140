/**
 * Batch Processor
 * Walks a working set in fixed-size chunks, one item at a time, pausing
 * between chunks to stay under the upstream rate limit
 */

import type { BatchOptions, ItemOutcome, Sleep } from '../types';
import { DEFAULT_RUN_OPTIONS } from '../utils/constants';
import { logger } from '../utils/logger';
import type { Deadline } from './deadline';
import { ConfigError, DeadlineExceededError, ItemProcessingError } from './errors';
import { defaultSleep } from './request';
import { RunStatistics } from './stats';

export type PerItemAction<T> = (
  item: T,
  stats: RunStatistics,
  index: number
) => ItemOutcome | Promise<ItemOutcome>;

export interface BatchProgress {
  batch: number;
  totalBatches: number;
  size: number;
  succeeded: number;
  skipped: number;
  errors: number;
  processed: number;
  total: number;
}

export interface BatchProcessorOptions extends Partial<BatchOptions> {
  sleep?: Sleep;
  deadline?: Deadline;
  onProgress?: (progress: BatchProgress) => void;
}

export const succeeded = (): ItemOutcome => ({ status: 'succeeded' });

export const skipped = (reason: string): ItemOutcome => ({ status: 'skipped', reason });

/**
 * Split into contiguous chunks of at most `size`; the last one may be shorter.
 */
export const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
};

export class BatchProcessor {
  readonly batchSize: number;
  readonly delayBetweenBatchesSeconds: number;
  private readonly sleep: Sleep;
  private readonly deadline?: Deadline;
  private readonly onProgress?: (progress: BatchProgress) => void;

  constructor(options: BatchProcessorOptions = {}) {
    this.batchSize = options.batchSize ?? DEFAULT_RUN_OPTIONS.batchSize;
    this.delayBetweenBatchesSeconds = options.delayBetweenBatchesSeconds ?? DEFAULT_RUN_OPTIONS.batchDelaySeconds;
    this.sleep = options.sleep ?? defaultSleep;
    this.deadline = options.deadline;
    this.onProgress = options.onProgress;

    if (!Number.isInteger(this.batchSize) || this.batchSize < 1) {
      throw new ConfigError(`batchSize must be an integer >= 1. Received: ${this.batchSize}`);
    }
    if (!Number.isFinite(this.delayBetweenBatchesSeconds) || this.delayBetweenBatchesSeconds < 0) {
      throw new ConfigError(
        `delayBetweenBatchesSeconds must be >= 0. Received: ${this.delayBetweenBatchesSeconds}`
      );
    }
  }

  /**
   * Run `perItemAction` over every item in order. Item failures are counted and
   * skipped past; a failed sleep or an expired deadline ends the run.
   */
  async processInBatches<T>(
    items: readonly T[],
    perItemAction: PerItemAction<T>,
    stats: RunStatistics = new RunStatistics('batch')
  ): Promise<RunStatistics> {
    const batches = chunk(items, this.batchSize);
    logger.info('Starting batch processing', {
      items: items.length,
      batches: batches.length,
      batchSize: this.batchSize,
      delaySeconds: this.delayBetweenBatchesSeconds,
    });

    let index = 0;
    for (let b = 0; b < batches.length; b++) {
      const batch = batches[b];
      const batchNumber = b + 1;
      this.deadline?.assertCanContinue(`batch ${batchNumber}`);

      let batchSucceeded = 0;
      let batchSkipped = 0;
      let batchErrors = 0;

      for (const item of batch) {
        try {
          const outcome = await perItemAction(item, stats, index);
          stats.increment('processed');
          if (outcome.status === 'skipped') {
            stats.recordSkip(outcome.reason);
            batchSkipped++;
          } else {
            stats.increment('succeeded');
            batchSucceeded++;
          }
        } catch (error) {
          // An aborted item was never processed
          if (error instanceof DeadlineExceededError) throw error;

          const failure = new ItemProcessingError(index, error);
          stats.increment('processed');
          stats.recordError(failure);
          batchErrors++;
          logger.error('Item processing failed', { batch: batchNumber, index, message: failure.message });
        }
        index++;
      }

      stats.increment('batches');
      const progress: BatchProgress = {
        batch: batchNumber,
        totalBatches: batches.length,
        size: batch.length,
        succeeded: batchSucceeded,
        skipped: batchSkipped,
        errors: batchErrors,
        processed: index,
        total: items.length,
      };
      logger.info('Batch complete', { ...progress });
      this.onProgress?.(progress);

      if (batchNumber < batches.length) {
        const delayMs = this.delayBetweenBatchesSeconds * 1000;
        this.deadline?.assertCanContinue(`delay after batch ${batchNumber}`, delayMs);
        logger.debug('Pausing between batches', { seconds: this.delayBetweenBatchesSeconds });
        await this.sleep(delayMs);
      }
    }

    return stats.finalize();
  }
}
