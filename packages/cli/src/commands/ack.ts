import { Command } from 'commander';
import chalk from 'chalk';
import { acknowledgeResultSchema } from '@diskwatch/shared';
import { apiRequest, resolveApiUrl } from '../utils/client.js';
import { errorMessage } from '../utils/format.js';

export const ackCommand = new Command('ack')
  .alias('acknowledge')
  .argument('<id>', 'Alert id')
  .option('-u, --url <url>', 'diskwatch API base URL')
  .description('Acknowledge an alert')
  .action(async (id: string, options: { url?: string }) => {
    try {
      await apiRequest(
        resolveApiUrl(options.url),
        `/api/alerts/${encodeURIComponent(id)}/acknowledge`,
        acknowledgeResultSchema,
        { method: 'POST' },
      );
      console.log(chalk.green(`Alert ${chalk.bold(id)} acknowledged`));
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
