import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from './context';
import { EXIT_CONFIGURATION_ERROR, EXIT_RUNTIME_ERROR, abortOnInterrupt, reportError } from './errors';
import { FilterOptions, UnitOptions, buildFilter, withFilterOptions, withUnitsOption } from './options';
import { ObjectEnumerator, decodeCursor } from '../clients/ObjectEnumerator';
import { ObjectDeleter } from '../clients/ObjectDeleter';
import { formatBytes, formatCount } from '../utils/format';

interface RmOptions extends FilterOptions, UnitOptions {
  dryRun?: boolean;
  all?: boolean;
  cursor?: string;
}

export const rmCommand = withUnitsOption(
  withFilterOptions(
    new Command()
      .name('rm')
      .description('Delete the objects of a bucket that match the filters')
      .argument('<bucket>', 'Bucket to delete from')
  )
)
  .option('--dry-run', 'Show what would be deleted without deleting anything')
  .option('--all', 'Allow deleting every object when no filter is given')
  .option('--cursor <cursor>', 'Resume a deletion that was interrupted')
  .action(async (bucket: string, options: RmOptions) => {
    const filter = buildFilter(options);
    if (Object.keys(filter).length === 0 && !options.all) {
      console.error(chalk.red('✗ Refusing to delete every object in the bucket'));
      console.error(chalk.dim('  Pass a filter such as --prefix, or --all to really delete everything'));
      process.exit(EXIT_CONFIGURATION_ERROR);
    }

    const controller = new AbortController();
    const removeHandler = abortOnInterrupt(controller);
    let failed = 0;

    try {
      const { storage, retryPolicy, logger } = createContext(options.config);
      const enumerator = new ObjectEnumerator(
        storage,
        retryPolicy,
        {
          bucket,
          filter,
          cursor: options.cursor ? decodeCursor(options.cursor) : undefined,
          signal: controller.signal,
        },
        logger
      );

      const deleter = new ObjectDeleter(storage, retryPolicy, logger);
      const summary = await deleter.deleteAll(bucket, enumerator, {
        dryRun: options.dryRun,
        onBatch: keys => {
          if (options.dryRun) {
            for (const key of keys) {
              console.log(`would delete: ${key}`);
            }
          }
        },
      });

      const size = formatBytes(summary.bytes, { units: options.units });
      if (options.dryRun) {
        console.log(chalk.cyan(`${formatCount(summary.matched)} objects (${size}) would be deleted`));
        return;
      }

      console.log(
        chalk.green(
          `✓ Deleted ${formatCount(summary.deleted)} of ${formatCount(summary.matched)} objects (${size})`
        )
      );
      for (const failure of summary.failures) {
        console.error(chalk.red(`✗ ${failure.key}: ${failure.code} ${failure.message}`));
      }
      failed = summary.failures.length;
    } catch (error) {
      process.exit(reportError(error, { resumable: true }));
    } finally {
      removeHandler();
    }

    if (failed > 0) {
      process.exit(EXIT_RUNTIME_ERROR);
    }
  });
