/**
 * Run configuration from the environment
 */

import type { RunOptions } from '../types';
import { DEFAULT_RUN_OPTIONS } from '../utils/constants';
import { ConfigError } from './errors';

export const runOptionCaps = {
  maxRetries: { min: 0, max: 20 },
  initialBackoffSeconds: { min: 0, max: 300 },
  requestTimeoutSeconds: { min: 1, max: 600 },
  batchSize: { min: 1, max: 1000 },
  batchDelaySeconds: { min: 0, max: 3600 },
  deadlineSeconds: { min: 1, max: 86400 },
} as const;

type Range = { min: number; max: number };

const readRaw = (env: NodeJS.ProcessEnv, name: string): string | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  return raw.trim();
};

export const parseIntInRange = (name: string, raw: string, range: Range): number => {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new ConfigError(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }
  return value;
};

/**
 * Positive number, strictly above `range.min`.
 */
export const parsePositiveInRange = (name: string, raw: string, range: Range): number => {
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= range.min || value > range.max) {
    throw new ConfigError(`${name}=${raw} is out of allowed range (${range.min}..${range.max}]`);
  }
  return value;
};

export const parseBoolean = (name: string, raw: string): boolean => {
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) return true;
  if (['0', 'false', 'no'].includes(normalized)) return false;
  throw new ConfigError(`${name}=${raw} must be one of 1/true/yes or 0/false/no`);
};

const optionalInt = (env: NodeJS.ProcessEnv, name: string, range: Range): number | undefined => {
  const raw = readRaw(env, name);
  return raw == null ? undefined : parseIntInRange(name, raw, range);
};

export const loadRunOptionsFromEnv = (env: NodeJS.ProcessEnv = process.env): RunOptions => {
  const backoffRaw = readRaw(env, 'GRAPH_INITIAL_BACKOFF_SECONDS');
  const dryRunRaw = readRaw(env, 'DRY_RUN');

  return {
    maxRetries: optionalInt(env, 'GRAPH_MAX_RETRIES', runOptionCaps.maxRetries) ?? DEFAULT_RUN_OPTIONS.maxRetries,
    initialBackoffSeconds:
      backoffRaw == null
        ? DEFAULT_RUN_OPTIONS.initialBackoffSeconds
        : parsePositiveInRange('GRAPH_INITIAL_BACKOFF_SECONDS', backoffRaw, runOptionCaps.initialBackoffSeconds),
    requestTimeoutSeconds:
      optionalInt(env, 'GRAPH_REQUEST_TIMEOUT_SECONDS', runOptionCaps.requestTimeoutSeconds) ??
      DEFAULT_RUN_OPTIONS.requestTimeoutSeconds,
    batchSize: optionalInt(env, 'BATCH_SIZE', runOptionCaps.batchSize) ?? DEFAULT_RUN_OPTIONS.batchSize,
    delayBetweenBatchesSeconds:
      optionalInt(env, 'BATCH_DELAY_SECONDS', runOptionCaps.batchDelaySeconds) ?? DEFAULT_RUN_OPTIONS.batchDelaySeconds,
    dryRun: dryRunRaw == null ? DEFAULT_RUN_OPTIONS.dryRun : parseBoolean('DRY_RUN', dryRunRaw),
    deadlineSeconds: optionalInt(env, 'RUN_DEADLINE_SECONDS', runOptionCaps.deadlineSeconds),
    managedIdentityClientId: readRaw(env, 'MANAGED_IDENTITY_CLIENT_ID'),
  };
};
