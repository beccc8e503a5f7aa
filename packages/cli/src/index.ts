#!/usr/bin/env tsx

import { Command } from 'commander';
import chalk from 'chalk';
import { DISKWATCH_VERSION } from '@diskwatch/shared';
import { startCommand } from './commands/start.js';
import { currentCommand } from './commands/current.js';
import { historyCommand } from './commands/history.js';
import { alertsCommand } from './commands/alerts.js';
import { ackCommand } from './commands/ack.js';

const program = new Command();

program
  .name('diskwatch')
  .version(DISKWATCH_VERSION, '-v, --version')
  .description(chalk.bold('diskwatch') + ': disk usage history, alerts and live updates')
  .addCommand(startCommand)
  .addCommand(currentCommand)
  .addCommand(historyCommand)
  .addCommand(alertsCommand)
  .addCommand(ackCommand);

// Default to 'current' when no command given
program.action(async () => {
  await currentCommand.parseAsync([], { from: 'user' });
});

await program.parseAsync(process.argv);
