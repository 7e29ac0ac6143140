/**
 * Graph Runbooks Core Types
 */

// ============================================================================
// Authentication
// ============================================================================

export type ResourceAudience = 'graph' | 'storage' | 'logAnalytics';

export interface TokenProvider {
  acquireToken(audience: ResourceAudience): Promise<string>;
}

// ============================================================================
// Requests
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export interface RetryPolicy {
  maxRetries: number;
  initialBackoffSeconds: number;
}

export interface RequestSpec {
  readonly method: HttpMethod;
  readonly uri: string;
  readonly body?: unknown;
  readonly contentType?: string;
  readonly headers?: Readonly<Record<string, string>>;
  readonly retryPolicy?: Partial<RetryPolicy>;
}

export type Sleep = (ms: number) => Promise<void>;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

// ============================================================================
// Batching and statistics
// ============================================================================

export type ItemOutcome =
  | { status: 'succeeded' }
  | { status: 'skipped'; reason: string };

export type RunCounter = 'processed' | 'succeeded' | 'skipped' | 'errors' | 'batches';

export interface ItemErrorDetail {
  index: number;
  message: string;
}

export interface BatchOptions {
  batchSize: number;
  delayBetweenBatchesSeconds: number;
}

export type RunRecord = Record<string, string | number | boolean>;

// ============================================================================
// Run configuration and history
// ============================================================================

export interface RunOptions extends BatchOptions {
  maxRetries: number;
  initialBackoffSeconds: number;
  requestTimeoutSeconds: number;
  dryRun: boolean;
  deadlineSeconds?: number;
  managedIdentityClientId?: string;
}

export type RunStatus = 'running' | 'completed' | 'failed';

export interface RunHistoryEntry {
  id: string;
  runbook: string;
  status: RunStatus;
  dryRun: boolean;
  startedAt: string;
  completedAt?: string;
  summary?: RunRecord;
  error?: string;
}

// ============================================================================
// Graph resources used by the runbooks
// ============================================================================

export interface ManagedDevice {
  id: string;
  deviceName: string;
  operatingSystem: string;
  lastSyncDateTime?: string;
  userPrincipalName?: string;
  emailAddress?: string;
  deviceCategoryDisplayName?: string;
}

export interface DeviceCategory {
  id: string;
  displayName: string;
}

export interface DirectoryUser {
  id: string;
  displayName?: string;
  userPrincipalName?: string;
  department?: string;
}
