import { Command } from 'commander';
import chalk from 'chalk';
import {
  DEFAULT_ALERT_THRESHOLD,
  DEFAULT_HISTORY_HOURS,
  usageHistorySchema,
} from '@diskwatch/shared';
import { apiRequest, historyPath, resolveApiUrl } from '../utils/client.js';
import { errorMessage } from '../utils/format.js';
import { renderHistoryTable } from '../ui/Table.js';

export const historyCommand = new Command('history')
  .argument('<mountpoint>', 'Mountpoint, e.g. / or /home')
  .option('-H, --hours <n>', 'Size of the window in hours (1-8760)', String(DEFAULT_HISTORY_HOURS))
  .option('-t, --threshold <n>', 'Highlight usage at or above this percent', String(DEFAULT_ALERT_THRESHOLD))
  .option('-u, --url <url>', 'diskwatch API base URL')
  .option('--json', 'Output as JSON')
  .description('Show the usage history of a mountpoint')
  .action(
    async (
      mountpoint: string,
      options: { hours: string; threshold: string; url?: string; json?: boolean },
    ) => {
      try {
        const history = await apiRequest(
          resolveApiUrl(options.url),
          historyPath(mountpoint, options.hours),
          usageHistorySchema,
        );

        if (options.json) {
          console.log(JSON.stringify(history, null, 2));
          return;
        }

        if (history.data.length === 0) {
          console.log(
            chalk.gray(`\n  No samples for ${history.mountpoint} in the last ${history.hours}h.\n`),
          );
          return;
        }

        console.log(
          chalk.bold(`\n  ${history.mountpoint}`) +
            chalk.gray(`  last ${history.hours}h, ${history.data.length} samples`),
        );
        console.log(renderHistoryTable(history, Number(options.threshold)));
      } catch (err) {
        console.error(chalk.red(`Error: ${errorMessage(err)}`));
        process.exitCode = 1;
      }
    },
  );
