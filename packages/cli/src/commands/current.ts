import { Command } from 'commander';
import chalk from 'chalk';
import { currentUsageSchema } from '@diskwatch/shared';
import { apiRequest, resolveApiUrl } from '../utils/client.js';
import { errorMessage, formatTimestamp } from '../utils/format.js';
import { renderVolumeTable } from '../ui/Table.js';

export const currentCommand = new Command('current')
  .alias('df')
  .option('-u, --url <url>', 'diskwatch API base URL')
  .option('--json', 'Output as JSON')
  .description('Show current disk usage per mountpoint')
  .action(async (options: { url?: string; json?: boolean }) => {
    try {
      const usage = await apiRequest(resolveApiUrl(options.url), '/api/current', currentUsageSchema);

      if (options.json) {
        console.log(JSON.stringify(usage, null, 2));
        return;
      }

      console.log(
        chalk.bold(`\n  ${usage.hostname}`) +
          chalk.gray(`  ${formatTimestamp(usage.timestamp)}  threshold ${usage.alertThreshold}%`),
      );
      console.log(renderVolumeTable(usage));
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
