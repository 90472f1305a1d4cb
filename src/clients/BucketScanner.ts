import { StorageClient, ListPage, ListPageRequest } from '../interfaces/StorageClient';
import { ListingCursor, ObjectFilter } from '../interfaces/Enumeration';
import { AccumulatorSettings, ScanResult } from '../interfaces/Aggregation';
import { Logger } from '../interfaces/Logger';
import { RetryPolicy } from './RetryPolicy';
import { RetriesExhaustedError } from './RetryPolicy';
import {
  ObjectEnumerator,
  EnumerationCancelledError,
  EnumerationError,
  InvalidCursorError,
} from './ObjectEnumerator';
import { formatError } from './StorageErrors';
import { Accumulator, aggregate, DEFAULT_ACCUMULATOR_SETTINGS } from './Accumulator';

export interface Partition {
  prefix: string;

  /** Set for the root partition, which holds only the objects directly under the prefix */
  delimiter?: string;
}

export interface ScanOptions {
  bucket: string;
  filter?: ObjectFilter;

  /** Number of partitions enumerated at the same time */
  concurrency?: number;
  accumulator?: Partial<Omit<AccumulatorSettings, 'basePrefix'>>;
  pageSize?: number;
  signal?: AbortSignal;

  /** Resume a single-partition scan; totals then cover only what follows the cursor */
  cursor?: ListingCursor;
}

/**
 * Everything up to and including the last delimiter
 */
export function basePrefixOf(prefix: string, delimiter: string): string {
  const index = prefix.lastIndexOf(delimiter);
  return index < 0 ? '' : prefix.slice(0, index + delimiter.length);
}

/**
 * Enumerates and aggregates a bucket, optionally fanned out over the
 * top-level prefixes below the requested prefix.
 *
 * Each worker owns one accumulator and adds every partition it takes to it,
 * so memory grows with the worker count, not the partition count. Worker
 * accumulators are merged one after another once every worker has returned.
 */
export class BucketScanner {
  constructor(
    private readonly storage: StorageClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly logger?: Logger
  ) {}

  async scan(options: ScanOptions): Promise<ScanResult> {
    const startTime = Date.now();
    const filter = options.filter ?? {};
    const prefix = filter.prefix ?? '';
    const concurrency = Math.max(1, options.concurrency ?? 1);
    if (options.cursor && concurrency > 1) {
      throw new InvalidCursorError('A cursor can only resume a scan that runs with concurrency 1');
    }
    const delimiter = options.accumulator?.delimiter ?? DEFAULT_ACCUMULATOR_SETTINGS.delimiter;
    const settings: Partial<AccumulatorSettings> = {
      ...options.accumulator,
      basePrefix: basePrefixOf(prefix, delimiter),
    };

    this.logger?.logScanStart(options.bucket, { prefix, concurrency });

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (options.signal?.aborted) {
      controller.abort();
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      let partitions: Partition[] = [{ prefix }];
      let discovered = true;
      if (concurrency > 1) {
        try {
          partitions = await this.discoverPartitions(
            options.bucket,
            prefix,
            delimiter,
            controller.signal
          );
        } catch (error) {
          if (!(error instanceof EnumerationCancelledError)) {
            throw error;
          }
          partitions = [];
          discovered = false;
        }
      }
      const finished = partitions.map(() => false);
      const workerCount = Math.min(concurrency, partitions.length);
      const accumulators = Array.from({ length: workerCount }, () => new Accumulator(settings));

      let nextPartition = 0;
      let failure: unknown;

      const worker = async (accumulator: Accumulator): Promise<void> => {
        while (nextPartition < partitions.length && !controller.signal.aborted) {
          const index = nextPartition++;
          const partition = partitions[index];
          const enumerator = new ObjectEnumerator(
            this.storage,
            this.retryPolicy,
            {
              bucket: options.bucket,
              filter: { ...filter, prefix: partition.prefix },
              delimiter: partition.delimiter,
              cursor: options.cursor,
              pageSize: options.pageSize,
              signal: controller.signal,
            },
            this.logger
          );

          try {
            await aggregate(enumerator, accumulator);
            finished[index] = true;
          } catch (error) {
            if (error instanceof EnumerationCancelledError && failure === undefined) {
              return;
            }
            if (failure === undefined) {
              failure = error;
            }
            controller.abort();
            return;
          }
        }
      };

      await Promise.all(accumulators.map(accumulator => worker(accumulator)));

      if (failure !== undefined) {
        throw failure;
      }

      const merged = Accumulator.mergeAll(accumulators, settings);
      const durationMs = Date.now() - startTime;
      const complete = discovered && finished.every(Boolean);

      if (complete) {
        this.logger?.logScanComplete(options.bucket, merged.count, merged.bytes, durationMs);
      } else {
        this.logger?.warn('Scan cancelled before completion', {
          bucket: options.bucket,
          prefix,
          finishedPartitions: finished.filter(Boolean).length,
          partitions: partitions.length,
        });
      }

      return {
        bucket: options.bucket,
        prefix,
        summary: merged.toSummary(),
        complete,
        partitions: partitions.length,
        durationMs,
      };
    } finally {
      options.signal?.removeEventListener('abort', onAbort);
    }
  }

  /**
   * One partition per common prefix below `prefix`, plus a root partition
   * when objects sit directly under it
   */
  async discoverPartitions(
    bucket: string,
    prefix: string,
    delimiter: string,
    signal?: AbortSignal
  ): Promise<Partition[]> {
    const partitions: Partition[] = [];
    let hasRootObjects = false;
    let continuationToken: string | undefined;

    do {
      if (signal?.aborted) {
        throw new EnumerationCancelledError({ bucket, prefix, continuationToken });
      }
      const request: ListPageRequest = { bucket, prefix, delimiter, continuationToken };
      let page: ListPage;
      try {
        page = await this.retryPolicy.execute(
          () => this.storage.listPage(request),
          `discover partitions of ${bucket}/${prefix}`
        );
      } catch (error) {
        if (!(error instanceof RetriesExhaustedError)) {
          throw error;
        }
        throw new EnumerationError(
          `Partition discovery of ${bucket}/${prefix} failed: ${formatError(error)}`,
          { bucket, prefix, continuationToken },
          error
        );
      }
      hasRootObjects = hasRootObjects || page.objects.length > 0;
      for (const commonPrefix of page.commonPrefixes) {
        partitions.push({ prefix: commonPrefix });
      }
      continuationToken = page.nextContinuationToken;
    } while (continuationToken !== undefined);

    if (hasRootObjects) {
      partitions.unshift({ prefix, delimiter });
    }

    this.logger?.debug('Discovered partitions', { bucket, prefix, partitions: partitions.length });
    return partitions;
  }
}
