import type { BatchProcessor } from '../core/batch';
import type { GraphClient } from '../core/graph';
import type { RunStatistics } from '../core/stats';
import type { RunOptions } from '../types';

/**
 * Everything a runbook body needs for one run
 */
export interface RunbookContext {
  graph: GraphClient;
  batches: BatchProcessor;
  stats: RunStatistics;
  options: RunOptions;
  now: () => Date;
}
