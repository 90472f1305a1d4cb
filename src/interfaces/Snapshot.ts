export interface BucketTotals {
  files: number;
  bytes: number;
}

/**
 * Per-bucket usage at a point in time, stored as `<start>.json`
 */
export interface Snapshot {
  buckets: Record<string, BucketTotals>;
  metadata: {
    version: '1';
    start: string;
    end?: string;
  };
}

export interface BucketComparison extends BucketTotals {
  deltaFiles: number;
  deltaBytes: number;
}

/**
 * A snapshot and how it changed since the previous one
 */
export interface SnapshotComparison {
  now: string;

  /** Milliseconds between the two snapshots, 0 without a previous one */
  intervalMs: number;
  buckets: Record<string, BucketComparison>;
  totals: BucketComparison;
}
