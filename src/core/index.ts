/**
 * Core module exports
 */

export { ManagedIdentityTokenProvider, acquireRunTokens, normalizeToken } from './auth';
export { ResilientRequestExecutor, resolveRetryPolicy, computeBackoffSeconds, parseRetryAfter } from './request';
export { PagedCollector, createRawCollector } from './pager';
export { BatchProcessor, chunk, succeeded, skipped } from './batch';
export { RunStatistics } from './stats';
export { Deadline } from './deadline';
export { GraphClient } from './graph';
export { RunTracker } from './tracker';
export { loadRunOptionsFromEnv } from './config';
export * from './errors';
export type { ExecutorOptions } from './request';
export type { ItemDecoder, PagedCollectorOptions } from './pager';
export type { PerItemAction, BatchProgress, BatchProcessorOptions } from './batch';
export type { MailMessage } from './graph';
