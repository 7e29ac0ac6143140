/**
 * Run Statistics
 * Counter bag owned by a single run, frozen into a flat record at the end
 */

import { v4 as uuidv4 } from 'uuid';
import type { ItemErrorDetail, RunCounter, RunRecord } from '../types';
import { RUN_STATISTICS } from '../utils/constants';
import { ItemProcessingError, toErrorMessage } from './errors';

export const SKIPPED_CATEGORY = 'skipped';

export class RunStatistics {
  readonly runId: string;
  readonly startedAt: Date;
  private completedAt?: Date;
  private readonly counters: Record<RunCounter, number> = {
    processed: 0,
    succeeded: 0,
    skipped: 0,
    errors: 0,
    batches: 0,
  };
  private readonly categories = new Map<string, Map<string, number>>();
  private readonly errorDetails: ItemErrorDetail[] = [];
  private readonly now: () => Date;

  constructor(
    readonly runbook: string,
    readonly dryRun: boolean = false,
    options: { runId?: string; now?: () => Date } = {}
  ) {
    this.runId = options.runId ?? uuidv4();
    this.now = options.now ?? (() => new Date());
    this.startedAt = this.now();
  }

  get isFinalized(): boolean {
    return this.completedAt != null;
  }

  increment(counter: RunCounter, by: number = 1): number {
    this.assertMutable();
    this.counters[counter] += by;
    return this.counters[counter];
  }

  incrementCategory(category: string, key: string, by: number = 1): number {
    this.assertMutable();
    let entries = this.categories.get(category);
    if (!entries) {
      entries = new Map();
      this.categories.set(category, entries);
    }
    const next = (entries.get(key) ?? 0) + by;
    entries.set(key, next);
    return next;
  }

  recordSkip(reason: string): void {
    this.increment('skipped');
    this.incrementCategory(SKIPPED_CATEGORY, reason);
  }

  recordError(failure: ItemProcessingError): void {
    this.increment('errors');
    if (this.errorDetails.length < RUN_STATISTICS.MAX_ERROR_DETAILS) {
      this.errorDetails.push({ index: failure.index, message: toErrorMessage(failure.cause) });
    }
  }

  count(counter: RunCounter): number {
    return this.counters[counter];
  }

  categoryCount(category: string, key: string): number {
    return this.categories.get(category)?.get(key) ?? 0;
  }

  categorySnapshot(): Record<string, Record<string, number>> {
    const snapshot: Record<string, Record<string, number>> = {};
    for (const [category, entries] of this.categories) {
      snapshot[category] = Object.fromEntries(entries);
    }
    return snapshot;
  }

  get errors(): readonly ItemErrorDetail[] {
    return this.errorDetails;
  }

  /**
   * Stamp completion and make the statistics read-only. Idempotent.
   */
  finalize(): this {
    if (this.completedAt) return this;
    this.completedAt = this.now();
    Object.freeze(this.counters);
    Object.freeze(this.errorDetails);
    return this;
  }

  durationSeconds(): number {
    const end = this.completedAt ?? this.now();
    return Math.round((end.getTime() - this.startedAt.getTime()) / 10) / 100;
  }

  toRecord(): RunRecord {
    const record: RunRecord = {
      runId: this.runId,
      runbook: this.runbook,
      dryRun: this.dryRun,
      startedAt: this.startedAt.toISOString(),
      durationSeconds: this.durationSeconds(),
      ...this.counters,
    };
    if (this.completedAt) {
      record.completedAt = this.completedAt.toISOString();
    }

    for (const [category, entries] of this.categories) {
      for (const [key, value] of entries) {
        record[`${category}.${key}`] = value;
      }
    }
    return record;
  }

  private assertMutable(): void {
    if (this.completedAt) {
      throw new Error(`Run statistics for ${this.runId} are finalized`);
    }
  }
}
