import { StorageClient } from '../interfaces/StorageClient';
import { Logger } from '../interfaces/Logger';
import { Snapshot, SnapshotComparison, BucketComparison } from '../interfaces/Snapshot';
import { RetryPolicy } from './RetryPolicy';
import { BucketScanner } from './BucketScanner';
import { SnapshotStore, SnapshotError } from './SnapshotStore';

export interface SnapshotOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

/**
 * UTC time in ISO 8601 format, without fractional seconds
 */
export function snapshotTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * `current` and how it changed since `previous`
 */
export function compareSnapshots(current: Snapshot, previous?: Snapshot): SnapshotComparison {
  const now = current.metadata.start;
  const earlier = previous?.metadata.start ?? now;
  const comparison: SnapshotComparison = {
    now,
    intervalMs: Date.parse(now) - Date.parse(earlier),
    buckets: {},
    totals: { files: 0, bytes: 0, deltaFiles: 0, deltaBytes: 0 },
  };

  const names = new Set([...Object.keys(current.buckets), ...Object.keys(previous?.buckets ?? {})]);
  for (const name of names) {
    const c = current.buckets[name] ?? { files: 0, bytes: 0 };
    const p = previous?.buckets[name] ?? { files: 0, bytes: 0 };
    const row: BucketComparison = {
      files: c.files,
      bytes: c.bytes,
      deltaFiles: c.files - p.files,
      deltaBytes: c.bytes - p.bytes,
    };
    comparison.buckets[name] = row;
    comparison.totals.files += row.files;
    comparison.totals.bytes += row.bytes;
    comparison.totals.deltaFiles += row.deltaFiles;
    comparison.totals.deltaBytes += row.deltaBytes;
  }
  return comparison;
}

/**
 * Takes per-bucket usage snapshots
 */
export class SnapshotManager {
  constructor(
    private readonly storage: StorageClient,
    private readonly retryPolicy: RetryPolicy,
    private readonly scanner: BucketScanner,
    private readonly store: SnapshotStore,
    private readonly logger?: Logger,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Count files and bytes in every visible bucket and store the result
   */
  async takeSnapshot(options: SnapshotOptions = {}): Promise<{ snapshot: Snapshot; filePath: string }> {
    const start = snapshotTimestamp(this.clock());
    const snapshot: Snapshot = { buckets: {}, metadata: { version: '1', start } };

    const buckets = await this.retryPolicy.execute(() => this.storage.listBuckets(), 'list buckets');
    for (const bucket of buckets) {
      this.logger?.info(`Scanning bucket: ${bucket.name}`);
      const result = await this.scanner.scan({
        bucket: bucket.name,
        filter: { excludeFolderMarkers: true },
        concurrency: options.concurrency,
        signal: options.signal,
        accumulator: { depth: 0 },
      });
      if (!result.complete) {
        throw new SnapshotError(
          `Snapshot cancelled while scanning ${bucket.name}; nothing was written`,
          'scan'
        );
      }
      snapshot.buckets[bucket.name] = { files: result.summary.count, bytes: result.summary.bytes };
    }
    snapshot.metadata.end = snapshotTimestamp(this.clock());

    const filePath = await this.store.write(snapshot);
    this.logger?.logSnapshotWritten(filePath, buckets.length);
    return { snapshot, filePath };
  }
}
