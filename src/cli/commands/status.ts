/**
 * Status CLI commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { table } from 'table';
import { parseIntInRange } from '../../core/config';
import { RunTracker } from '../../core/tracker';
import type { RunHistoryEntry } from '../../types';

const colorStatus = (status: RunHistoryEntry['status']): string =>
  status === 'completed' ? chalk.green(status) : status === 'failed' ? chalk.red(status) : chalk.yellow(status);

const counter = (run: RunHistoryEntry, key: string): string => {
  const value = run.summary?.[key];
  return value == null ? '-' : String(value);
};

export const statusCommands = new Command('status')
  .description('View runbook run history');

// List recent runs
statusCommands
  .command('list')
  .description('List recent runs')
  .option('-r, --runbook <name>', 'Only runs of this runbook')
  .option('-l, --limit <n>', 'Limit results', '10')
  .action((options: { runbook?: string; limit: string }) => {
    const limit = parseIntInRange('--limit', options.limit, { min: 1, max: 500 });
    const tracker = new RunTracker();

    try {
      const runs = tracker.getRecentRuns(options.runbook, limit);

      if (runs.length === 0) {
        console.log(chalk.yellow('No runs recorded yet.'));
        return;
      }

      const data = [
        ['Run', 'Runbook', 'Started', 'Status', 'Processed', 'Succeeded', 'Skipped', 'Errors'],
        ...runs.map((run) => [
          run.id.slice(0, 8),
          run.dryRun ? `${run.runbook} ${chalk.cyan('(dry run)')}` : run.runbook,
          new Date(run.startedAt).toLocaleString(),
          colorStatus(run.status),
          counter(run, 'processed'),
          counter(run, 'succeeded'),
          counter(run, 'skipped'),
          counter(run, 'errors'),
        ]),
      ];

      console.log(table(data));
    } finally {
      tracker.close();
    }
  });

// Show one run
statusCommands
  .command('show <run-id>')
  .description('Show the recorded result of a run')
  .action((runId: string) => {
    const tracker = new RunTracker();

    try {
      const run = tracker.getRun(runId);

      if (!run) {
        console.error(chalk.red(`Run "${runId}" not found`));
        process.exitCode = 1;
        return;
      }

      console.log(chalk.bold(`\n${run.runbook} ${run.id}`));
      console.log('─'.repeat(40));
      console.log(`  Status: ${colorStatus(run.status)}${run.dryRun ? chalk.cyan(' (dry run)') : ''}`);
      console.log(`  Started: ${run.startedAt}`);
      if (run.completedAt) console.log(`  Completed: ${run.completedAt}`);
      if (run.error) console.log(chalk.red(`  Error: ${run.error}`));

      if (run.summary) {
        console.log(chalk.bold('\nResult:'));
        for (const [key, value] of Object.entries(run.summary)) {
          console.log(`  ${key}: ${String(value)}`);
        }
      }
    } finally {
      tracker.close();
    }
  });
