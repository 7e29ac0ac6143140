/**
 * Application Constants
 */

import type { ResourceAudience } from '../types';

// Graph API
export const GRAPH_API = {
  BASE_URL: 'https://graph.microsoft.com/v1.0',
  BETA_URL: 'https://graph.microsoft.com/beta',
  NEXT_LINK_FIELD: '@odata.nextLink',
  ITEMS_FIELD: 'value',
  // Largest page size managedDevices accepts
  PAGE_SIZE: 1000,
};

// Token audiences requested from the managed identity endpoint
export const RESOURCE_AUDIENCES: Record<ResourceAudience, string> = {
  graph: 'https://graph.microsoft.com',
  storage: 'https://storage.azure.com',
  logAnalytics: 'https://api.loganalytics.io',
};

// Defaults shared by every runbook
export const DEFAULT_RUN_OPTIONS = {
  maxRetries: 5,
  initialBackoffSeconds: 5,
  requestTimeoutSeconds: 100,
  batchSize: 50,
  batchDelaySeconds: 10,
  dryRun: false,
};

export const RUN_STATISTICS = {
  MAX_ERROR_DETAILS: 50,
};

// Application paths
export const PATHS = {
  DATA_DIR: process.env.RUNBOOKS_DATA_DIR || '.graph-runbooks/data',
  LOG_DIR: process.env.RUNBOOKS_LOG_DIR || '',
  DB_FILE: 'runs.db',
};
