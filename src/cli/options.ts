import { loadRunOptionsFromEnv, parseIntInRange, parsePositiveInRange, runOptionCaps } from '../core/config';
import type { RunOptions } from '../types';

/**
 * Flags shared by every `run` subcommand; commander hands them over as strings.
 */
export interface RunFlags {
  dryRun?: boolean;
  batchSize?: string;
  batchDelay?: string;
  maxRetries?: string;
  initialBackoff?: string;
  timeout?: string;
  deadline?: string;
  identityClientId?: string;
}

/**
 * Environment first, then command-line flags on top.
 */
export const resolveRunOptions = (flags: RunFlags, env: NodeJS.ProcessEnv = process.env): RunOptions => {
  const options = loadRunOptionsFromEnv(env);

  if (flags.dryRun) options.dryRun = true;
  if (flags.batchSize != null) {
    options.batchSize = parseIntInRange('--batch-size', flags.batchSize, runOptionCaps.batchSize);
  }
  if (flags.batchDelay != null) {
    options.delayBetweenBatchesSeconds = parseIntInRange(
      '--batch-delay',
      flags.batchDelay,
      runOptionCaps.batchDelaySeconds
    );
  }
  if (flags.maxRetries != null) {
    options.maxRetries = parseIntInRange('--max-retries', flags.maxRetries, runOptionCaps.maxRetries);
  }
  if (flags.initialBackoff != null) {
    options.initialBackoffSeconds = parsePositiveInRange(
      '--initial-backoff',
      flags.initialBackoff,
      runOptionCaps.initialBackoffSeconds
    );
  }
  if (flags.timeout != null) {
    options.requestTimeoutSeconds = parseIntInRange('--timeout', flags.timeout, runOptionCaps.requestTimeoutSeconds);
  }
  if (flags.deadline != null) {
    options.deadlineSeconds = parseIntInRange('--deadline', flags.deadline, runOptionCaps.deadlineSeconds);
  }
  if (flags.identityClientId) options.managedIdentityClientId = flags.identityClientId;

  return options;
};
