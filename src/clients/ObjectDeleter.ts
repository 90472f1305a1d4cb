import { StorageClient, DeleteFailure } from '../interfaces/StorageClient';
import { ObjectDescriptor } from '../interfaces/Enumeration';
import { Logger } from '../interfaces/Logger';
import { RetryPolicy } from './RetryPolicy';
import { MAX_KEYS_PER_DELETE } from './S3StorageClient';

export interface DeleteOptions {
  /** List what would be deleted without deleting anything */
  dryRun?: boolean;

  /** Keys per DeleteObjects request, at most 1000 */
  batchSize?: number;

  /** Called after every batch with the keys it covered */
  onBatch?: (keys: string[], result: DeleteSummary) => void;
}

export interface DeleteSummary {
  matched: number;
  bytes: number;
  deleted: number;
  failures: DeleteFailure[];
}

/**
 * Deletes every object of an enumerated stream in batched DeleteObjects
 * requests
 */
export class ObjectDeleter {
  constructor(
    private readonly storage: StorageClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly logger?: Logger
  ) {}

  async deleteAll(
    bucket: string,
    stream: AsyncIterator<ObjectDescriptor>,
    options: DeleteOptions = {}
  ): Promise<DeleteSummary> {
    const batchSize = Math.min(Math.max(options.batchSize ?? MAX_KEYS_PER_DELETE, 1), MAX_KEYS_PER_DELETE);
    const summary: DeleteSummary = { matched: 0, bytes: 0, deleted: 0, failures: [] };
    let batch: string[] = [];

    const flush = async () => {
      if (batch.length === 0) {
        return;
      }
      const keys = batch;
      batch = [];
      if (!options.dryRun) {
        const result = await this.retryPolicy.execute(
          () => this.storage.deleteObjects(bucket, keys),
          'delete objects'
        );
        summary.deleted += result.deleted.length;
        summary.failures.push(...result.failures);
        for (const failure of result.failures) {
          this.logger?.warn(`Failed to delete ${failure.key}`, {
            bucket,
            key: failure.key,
            code: failure.code,
            reason: failure.message,
          });
        }
      }
      options.onBatch?.(keys, summary);
    };

    try {
      for (let step = await stream.next(); !step.done; step = await stream.next()) {
        summary.matched++;
        summary.bytes += step.value.size;
        batch.push(step.value.key);
        if (batch.length >= batchSize) {
          await flush();
        }
      }
    } catch (error) {
      // The stream's resume point is already past the pending keys
      await flush();
      throw error;
    }
    await flush();

    this.logger?.info(options.dryRun ? 'Dry run finished' : 'Deletion finished', {
      operation: 'delete',
      bucket,
      matched: summary.matched,
      deleted: summary.deleted,
      failed: summary.failures.length,
    });
    return summary;
  }
}
