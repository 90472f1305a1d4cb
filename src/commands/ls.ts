import { Command } from 'commander';
import chalk from 'chalk';
import { createContext } from './context';
import { abortOnInterrupt, reportError } from './errors';
import {
  FilterOptions,
  UnitOptions,
  buildFilter,
  formatOption,
  parsePositiveInteger,
  withFilterOptions,
  withUnitsOption,
} from './options';
import { ObjectEnumerator, decodeCursor, encodeCursor } from '../clients/ObjectEnumerator';
import { OutputFormat, SummaryRenderer } from '../clients/SummaryRenderer';

interface LsOptions extends FilterOptions, UnitOptions {
  format: OutputFormat;
  cursor?: string;
  limit?: number;
}

export const lsCommand = withUnitsOption(
  withFilterOptions(
    new Command()
      .name('ls')
      .description('List the objects of a bucket')
      .argument('<bucket>', 'Bucket to list')
  )
)
  .addOption(formatOption(['text', 'json']))
  .option('--cursor <cursor>', 'Resume a listing that was interrupted')
  .option('-n, --limit <count>', 'Stop after this many objects', parsePositiveInteger)
  .action(async (bucket: string, options: LsOptions) => {
    let enumerator: ObjectEnumerator | undefined;
    const controller = new AbortController();
    const removeHandler = abortOnInterrupt(controller);

    try {
      const { storage, retryPolicy, logger } = createContext(options.config);
      const renderer = new SummaryRenderer({ units: options.units });
      enumerator = new ObjectEnumerator(
        storage,
        retryPolicy,
        {
          bucket,
          filter: buildFilter(options),
          cursor: options.cursor ? decodeCursor(options.cursor) : undefined,
          signal: controller.signal,
        },
        logger
      );

      let listed = 0;
      for await (const descriptor of enumerator) {
        process.stdout.write(renderer.renderObject(descriptor, options.format));
        listed++;
        if (options.limit !== undefined && listed >= options.limit) {
          break;
        }
      }

      if (options.limit !== undefined && listed >= options.limit) {
        console.error(chalk.dim(`Limit reached. Continue with: --cursor ${encodeCursor(enumerator.cursor)}`));
      }
    } catch (error) {
      process.exit(reportError(error, { resumable: true, cursor: enumerator?.cursor }));
    } finally {
      removeHandler();
    }
  });
