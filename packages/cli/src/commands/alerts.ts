import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_ALERT_LIMIT, alertListSchema } from '@diskwatch/shared';
import { apiRequest, resolveApiUrl } from '../utils/client.js';
import { errorMessage } from '../utils/format.js';
import { renderAlertTable } from '../ui/Table.js';

export const alertsCommand = new Command('alerts')
  .option('-l, --limit <n>', 'Number of alerts to show (1-500)', String(DEFAULT_ALERT_LIMIT))
  .option('-u, --url <url>', 'diskwatch API base URL')
  .option('--json', 'Output as JSON')
  .description('List recent threshold alerts, newest first')
  .action(async (options: { limit: string; url?: string; json?: boolean }) => {
    try {
      const alerts = await apiRequest(
        resolveApiUrl(options.url),
        `/api/alerts?limit=${encodeURIComponent(options.limit)}`,
        alertListSchema,
      );

      if (options.json) {
        console.log(JSON.stringify(alerts, null, 2));
        return;
      }

      if (alerts.length === 0) {
        console.log(chalk.gray('\n  No alerts recorded.\n'));
        return;
      }

      console.log(renderAlertTable(alerts));
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
