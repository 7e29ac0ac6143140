#!/usr/bin/env node
/**
 * Graph Runbooks CLI
 * Scheduled Microsoft Graph jobs for Intune devices and users
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { runCommands } from './commands/run';
import { statusCommands } from './commands/status';

const program = new Command();

program
  .name('graph-runbooks')
  .description('Throttle-aware Microsoft Graph runbooks for Intune device and user remediation')
  .version('1.0.0');

// Register command groups
program.addCommand(runCommands);
program.addCommand(statusCommands);

// Global error handling
program.exitOverride((err) => {
  if (err.code === 'commander.help' || err.code === 'commander.helpDisplayed' || err.code === 'commander.version') {
    process.exit(0);
  }
  console.error(chalk.red(`Error: ${err.message}`));
  process.exit(1);
});

// Show help if no command specified
if (!process.argv.slice(2).length) {
  program.outputHelp();
} else {
  program.parseAsync(process.argv).catch((error: unknown) => {
    console.error(chalk.red(`Error: ${error instanceof Error ? error.message : String(error)}`));
    process.exit(1);
  });
}
