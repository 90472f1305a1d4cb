import { Command } from 'commander';
import { createContext } from './context';
import { EXIT_INTERRUPTED, abortOnInterrupt, reportError } from './errors';
import {
  FilterOptions,
  UnitOptions,
  buildFilter,
  formatOption,
  parseNonNegativeInteger,
  parsePositiveInteger,
  withFilterOptions,
  withUnitsOption,
} from './options';
import { OutputFormat, SummaryRenderer } from '../clients/SummaryRenderer';
import { decodeCursor } from '../clients/ObjectEnumerator';

interface DuOptions extends FilterOptions, UnitOptions {
  format: OutputFormat;
  concurrency?: number;
  depth?: number;
  maxPrefixes?: number;
  histogram?: boolean;
  cursor?: string;
}

export const duCommand = withUnitsOption(
  withFilterOptions(
    new Command()
      .name('du')
      .description('Summarize object count and size, per prefix and overall')
      .argument('<bucket>', 'Bucket to summarize')
  )
)
  .addOption(formatOption(['text', 'json']))
  .option('-j, --concurrency <n>', 'Prefixes listed in parallel', parsePositiveInteger)
  .option('-d, --depth <n>', 'Prefix levels to roll up below --prefix', parseNonNegativeInteger)
  .option('--max-prefixes <n>', 'Prefixes to report before folding the rest into (other)', parsePositiveInteger)
  .option('--histogram', 'Include the object size distribution')
  .option('--cursor <cursor>', 'Resume an interrupted scan; totals cover only what follows the cursor')
  .action(async (bucket: string, options: DuOptions) => {
    const controller = new AbortController();
    const removeHandler = abortOnInterrupt(controller);
    let complete = true;
    // A cursor is scoped to one listing, so only a single-partition scan can hand one out
    let concurrency = options.concurrency ?? 1;

    try {
      const { scanner, config } = createContext(options.config);
      if (!options.cursor) {
        concurrency = options.concurrency ?? config.maxConcurrency;
      }
      const result = await scanner.scan({
        bucket,
        filter: buildFilter(options),
        concurrency,
        cursor: options.cursor ? decodeCursor(options.cursor) : undefined,
        accumulator: {
          ...(options.depth !== undefined && { depth: options.depth }),
          ...(options.maxPrefixes !== undefined && { maxPrefixes: options.maxPrefixes }),
        },
        signal: controller.signal,
      });

      const renderer = new SummaryRenderer({ units: options.units, histogram: options.histogram });
      renderer.write(process.stdout, result, options.format);
      complete = result.complete;
    } catch (error) {
      process.exit(reportError(error, { resumable: concurrency === 1 }));
    } finally {
      removeHandler();
    }

    if (!complete) {
      process.exit(EXIT_INTERRUPTED);
    }
  });
