import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from './context';
import { abortOnInterrupt, reportError } from './errors';
import { CommonOptions, parsePositiveInteger, withConfigOption } from './options';
import { SnapshotManager } from '../clients/SnapshotManager';
import { SnapshotStore } from '../clients/SnapshotStore';
import { CronScheduler } from '../clients/CronScheduler';
import { formatBytes, formatCount } from '../utils/format';

interface SnapshotCommandOptions extends CommonOptions {
  concurrency?: number;
  schedule?: string;
  timezone: string;
  runNow?: boolean;
}

export const snapshotCommand = withConfigOption(
  new Command()
    .name('snapshot')
    .description('Record the object count and size of every bucket in the snapshot directory')
)
  .option('-j, --concurrency <n>', 'Prefixes listed in parallel per bucket', parsePositiveInteger)
  .option('--schedule <cron>', 'Keep running and take a snapshot on this cron schedule')
  .option('--timezone <zone>', 'Time zone of the schedule', 'UTC')
  .option('--run-now', 'With --schedule, also take a snapshot right away')
  .action(async (options: SnapshotCommandOptions) => {
    try {
      const { storage, retryPolicy, scanner, config, logger } = createContext(options.config);
      const manager = new SnapshotManager(
        storage,
        retryPolicy,
        scanner,
        new SnapshotStore(config.snapshotDir),
        logger
      );
      const concurrency = options.concurrency ?? config.maxConcurrency;

      if (options.schedule) {
        const scheduler = new CronScheduler(
          {
            cronExpression: options.schedule,
            timezone: options.timezone,
            runOnInit: options.runNow,
          },
          {
            name: 'snapshot',
            run: async () => {
              await manager.takeSnapshot({ concurrency });
            },
          },
          logger
        );
        scheduler.start();

        const shutdown = (signal: string) => {
          logger.info(`Received ${signal}, stopping scheduler`);
          scheduler.stop();
          process.exit(0);
        };
        process.once('SIGINT', () => shutdown('SIGINT'));
        process.once('SIGTERM', () => shutdown('SIGTERM'));
        console.log(chalk.cyan(`Taking snapshots on schedule: ${options.schedule} (${options.timezone})`));
        return;
      }

      const controller = new AbortController();
      const removeHandler = abortOnInterrupt(controller);
      try {
        const { snapshot, filePath } = await manager.takeSnapshot({
          concurrency,
          signal: controller.signal,
        });
        const totals = Object.values(snapshot.buckets);
        const files = totals.reduce((sum, bucket) => sum + bucket.files, 0);
        const bytes = totals.reduce((sum, bucket) => sum + bucket.bytes, 0);
        console.log(chalk.green(`✓ Snapshot written: ${filePath}`));
        console.log(
          chalk.gray(
            `  ${formatCount(totals.length)} buckets, ${formatCount(files)} files, ${formatBytes(bytes)}`
          )
        );
      } finally {
        removeHandler();
      }
    } catch (error) {
      process.exit(reportError(error));
    }
  });
