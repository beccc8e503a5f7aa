import { Command } from 'commander';
import chalk from 'chalk';
import type { MonitorConfig } from '@diskwatch/shared';
import { ConfigValidationError, loadConfig } from '@diskwatch/shared';
import { DiskWatchDaemon } from '@diskwatch/core';
import { errorMessage } from '../utils/format.js';

interface StartOptions {
  port?: string;
  host?: string;
  interval?: string;
  threshold?: string;
  db?: string;
  webhook?: string;
  logLevel?: string;
}

/** Map command-line flags onto config keys; unset flags are left out. */
export function toConfigOverrides(
  options: StartOptions,
): Partial<Record<keyof MonitorConfig, string>> {
  const overrides: Partial<Record<keyof MonitorConfig, string>> = {};
  if (options.port !== undefined) overrides.port = options.port;
  if (options.host !== undefined) overrides.host = options.host;
  if (options.interval !== undefined) overrides.pollInterval = options.interval;
  if (options.threshold !== undefined) overrides.alertThreshold = options.threshold;
  if (options.db !== undefined) overrides.dbPath = options.db;
  if (options.webhook !== undefined) overrides.webhookUrl = options.webhook;
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;
  return overrides;
}

export const startCommand = new Command('start')
  .option('-p, --port <port>', 'HTTP port')
  .option('--host <host>', 'HTTP bind address')
  .option('-i, --interval <seconds>', 'Seconds between collection cycles')
  .option('-t, --threshold <percent>', 'Alert threshold in percent (0-100)')
  .option('--db <path>', 'SQLite database file')
  .option('--webhook <url>', 'POST every alert to this URL')
  .option('--log-level <level>', 'trace, debug, info, warn, error or fatal')
  .description('Start the monitor in the foreground')
  .action(async (options: StartOptions) => {
    try {
      const config = loadConfig(process.env, toConfigOverrides(options));
      const daemon = new DiskWatchDaemon(config);
      await daemon.start();

      console.log(
        chalk.green(`diskwatch listening on http://${config.host}:${config.port}`) +
          chalk.gray(` (every ${config.pollInterval}s, threshold ${config.alertThreshold}%)`),
      );
    } catch (err) {
      if (err instanceof ConfigValidationError) {
        console.error(chalk.red('Invalid configuration:'));
        for (const line of err.errors) {
          console.error(chalk.red(`  ${line}`));
        }
      } else {
        console.error(chalk.red(`Failed to start: ${errorMessage(err)}`));
      }
      process.exitCode = 1;
    }
  });
