/**
 * Run CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { ManagedIdentityTokenProvider } from '../../core/auth';
import type { BatchProgress } from '../../core/batch';
import { parseIntInRange } from '../../core/config';
import { RunTracker } from '../../core/tracker';
import { executeRunbook, RunbookBody, RunResult } from '../../runbooks/runner';
import { runSyncReminder, SYNC_REMINDER } from '../../runbooks/sync-reminder';
import { runDeviceCategory, DEVICE_CATEGORY } from '../../runbooks/device-category';
import { enableConsoleLogging } from '../../utils/logger';
import { buildCliErrorEnvelope, isDebugMode } from '../errors';
import { resolveRunOptions, RunFlags } from '../options';

interface CommonFlags extends RunFlags {
  verbose?: boolean;
  progress?: boolean;
}

const withRunFlags = (command: Command): Command =>
  command
    .option('-d, --dry-run', 'Log intended changes without performing them')
    .option('--batch-size <n>', 'Items per batch (default 50)')
    .option('--batch-delay <seconds>', 'Pause between batches (default 10)')
    .option('--max-retries <n>', 'Retries for throttled or failed requests (default 5)')
    .option('--initial-backoff <seconds>', 'First retry wait, doubled on each retry (default 5)')
    .option('--timeout <seconds>', 'Per-request timeout (default 100)')
    .option('--deadline <seconds>', 'Abort the run once this much time has passed')
    .option('--identity-client-id <id>', 'Client id of a user-assigned managed identity')
    .option('--no-progress', 'Hide the progress spinner')
    .option('-v, --verbose', 'Show detailed output');

function printSummary(result: RunResult): void {
  const { stats } = result;
  const lines = [
    chalk.bold(`\n${stats.runbook} summary${stats.dryRun ? chalk.cyan(' [DRY RUN]') : ''}:`),
    `  Processed: ${stats.count('processed')} in ${stats.count('batches')} batch(es)`,
    `  ${chalk.green('Succeeded')}: ${stats.count('succeeded')}`,
    `  ${chalk.yellow('Skipped')}: ${stats.count('skipped')}`,
    `  ${stats.count('errors') > 0 ? chalk.red('Errors') : 'Errors'}: ${stats.count('errors')}`,
    `  Duration: ${stats.durationSeconds()}s`,
  ];

  for (const [category, entries] of Object.entries(stats.categorySnapshot())) {
    lines.push(chalk.dim(`  ${category}:`));
    for (const [key, value] of Object.entries(entries)) {
      lines.push(chalk.dim(`    ${key}: ${value}`));
    }
  }

  process.stderr.write(`${lines.join('\n')}\n`);
}

/**
 * `makeBody` validates runbook-specific flags before any token is requested.
 */
async function runFromCli(runbook: string, flags: CommonFlags, makeBody: () => RunbookBody): Promise<void> {
  if (flags.verbose) {
    enableConsoleLogging(true);
  }

  let tracker: RunTracker | undefined;
  const spinner = flags.progress === false ? null : ora(`Running ${runbook}...`);

  try {
    const options = resolveRunOptions(flags);
    const body = makeBody();
    tracker = new RunTracker();
    if (options.dryRun) {
      process.stderr.write(chalk.cyan('\n[DRY RUN MODE - No changes will be made]\n\n'));
    }

    spinner?.start();
    const onProgress = (progress: BatchProgress) => {
      if (spinner) {
        spinner.text = `Batch ${progress.batch}/${progress.totalBatches} (${progress.processed}/${progress.total} items)`;
      }
    };

    const result = await executeRunbook(runbook, options, body, {
      tokenProvider: new ManagedIdentityTokenProvider(options.managedIdentityClientId),
      tracker,
      onProgress,
    });

    spinner?.succeed(`${runbook} complete`);
    printSummary(result);
    // The single machine-readable result line for the scheduler
    process.stdout.write(`${JSON.stringify(result.record)}\n`);
  } catch (error) {
    spinner?.fail(`${runbook} failed`);
    console.error(JSON.stringify(buildCliErrorEnvelope(runbook, error, isDebugMode())));
    process.exitCode = 1;
  } finally {
    tracker?.close();
  }
}

export const runCommands = new Command('run').description('Execute a runbook');

withRunFlags(
  runCommands
    .command(SYNC_REMINDER)
    .description('Mail users whose devices have not synced with Intune recently')
    .requiredOption('-s, --sender <mailbox>', 'Mailbox the reminders are sent from')
    .option('--days <n>', 'Days without a sync before a reminder is sent', '7')
).action(async (flags: CommonFlags & { sender: string; days: string }) => {
  await runFromCli(SYNC_REMINDER, flags, () => {
    const params = {
      sender: flags.sender,
      days: parseIntInRange('--days', flags.days, { min: 1, max: 3650 }),
    };
    return (ctx) => runSyncReminder(ctx, params);
  });
});

withRunFlags(
  runCommands
    .command(DEVICE_CATEGORY)
    .description("Assign device categories from each primary user's department")
).action(async (flags: CommonFlags) => {
  await runFromCli(DEVICE_CATEGORY, flags, () => runDeviceCategory);
});
