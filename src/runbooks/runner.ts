/**
 * Runbook Runner
 * Wires token, executor, batching and run history around one runbook body
 */

import { acquireRunTokens } from '../core/auth';
import { BatchProcessor, BatchProgress } from '../core/batch';
import { Deadline } from '../core/deadline';
import { AuthenticationError, toErrorMessage } from '../core/errors';
import { GraphClient } from '../core/graph';
import { RunStatistics } from '../core/stats';
import type { RunTracker } from '../core/tracker';
import type { FetchLike, RunOptions, RunRecord, Sleep, TokenProvider } from '../types';
import { logger } from '../utils/logger';
import type { RunbookContext } from './types';

export type RunbookBody = (ctx: RunbookContext) => Promise<RunStatistics>;

export interface RunDependencies {
  tokenProvider: TokenProvider;
  tracker?: RunTracker;
  fetch?: FetchLike;
  sleep?: Sleep;
  now?: () => Date;
  onProgress?: (progress: BatchProgress) => void;
}

export interface RunResult {
  stats: RunStatistics;
  record: RunRecord;
}

export async function executeRunbook(
  runbook: string,
  options: RunOptions,
  body: RunbookBody,
  deps: RunDependencies
): Promise<RunResult> {
  const now = deps.now ?? (() => new Date());
  const stats = new RunStatistics(runbook, options.dryRun, { now });
  deps.tracker?.startRun(stats.runId, runbook, options.dryRun, stats.startedAt);

  logger.info(`Starting ${runbook}`, {
    runId: stats.runId,
    dryRun: options.dryRun,
    batchSize: options.batchSize,
    maxRetries: options.maxRetries,
  });

  try {
    const deadline = Deadline.after(options.deadlineSeconds, () => now().getTime());
    const tokens = await acquireRunTokens(deps.tokenProvider, ['graph']);
    const graphToken = tokens.get('graph');
    if (!graphToken) {
      throw new AuthenticationError('No token acquired for graph');
    }

    const graph = GraphClient.withToken(graphToken, {
      retryPolicy: { maxRetries: options.maxRetries, initialBackoffSeconds: options.initialBackoffSeconds },
      requestTimeoutSeconds: options.requestTimeoutSeconds,
      fetch: deps.fetch,
      sleep: deps.sleep,
      deadline,
    });
    const batches = new BatchProcessor({
      batchSize: options.batchSize,
      delayBetweenBatchesSeconds: options.delayBetweenBatchesSeconds,
      sleep: deps.sleep,
      deadline,
      onProgress: deps.onProgress,
    });

    const result = (await body({ graph, batches, stats, options, now })).finalize();
    const record = result.toRecord();
    deps.tracker?.completeRun(result.runId, record, now());
    logger.info(`Completed ${runbook}`, record);
    return { stats: result, record };
  } catch (error) {
    stats.finalize();
    const record = stats.toRecord();
    deps.tracker?.failRun(stats.runId, toErrorMessage(error), record, now());
    logger.error(`${runbook} failed: ${toErrorMessage(error)}`, { runId: stats.runId });
    throw error;
  }
}
