import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from './context';
import { reportError } from './errors';
import { CommonOptions, formatOption, withConfigOption } from './options';
import { formatTable } from '../utils/format';

interface BucketsOptions extends CommonOptions {
  format: 'text' | 'json';
}

export const bucketsCommand = withConfigOption(
  new Command().name('buckets').description('List the buckets visible to the configured credentials')
)
  .addOption(formatOption(['text', 'json']))
  .action(async (options: BucketsOptions) => {
    try {
      const { storage, retryPolicy } = createContext(options.config);
      const buckets = await retryPolicy.execute(() => storage.listBuckets(), 'list buckets');

      if (options.format === 'json') {
        const rows = buckets.map(bucket => ({
          name: bucket.name,
          creationDate: bucket.creationDate?.toISOString() ?? null,
        }));
        process.stdout.write(`${JSON.stringify(rows, null, 2)}\n`);
        return;
      }

      if (buckets.length === 0) {
        console.log(chalk.gray('No buckets found'));
        return;
      }

      const rows = buckets.map(bucket => [bucket.name, bucket.creationDate?.toISOString() ?? '-']);
      for (const line of formatTable(rows)) {
        console.log(line);
      }
    } catch (error) {
      process.exit(reportError(error));
    }
  });
