export interface Rollup {
  count: number;
  bytes: number;
}

export interface HistogramBucket extends Rollup {
  /** Inclusive lower bound in bytes */
  min: number;

  /** Exclusive upper bound in bytes, null for the open-ended last bucket */
  max: number | null;
}

export interface AccumulatorSettings {
  /** Separator between key segments */
  delimiter: string;

  /** Number of prefix levels rolled up below the base prefix */
  depth: number;

  /** Maximum number of distinct prefixes tracked individually */
  maxPrefixes: number;

  /** Rollups are computed relative to this prefix */
  basePrefix: string;

  /** Ascending exclusive upper bounds of the histogram buckets */
  histogramBoundaries: number[];
}

/**
 * JSON-safe view of an accumulator
 */
export interface AggregationSummary {
  count: number;
  bytes: number;
  histogram: HistogramBucket[];
  prefixes: Array<{ prefix: string } & Rollup>;
  other: Rollup;
}

/**
 * Outcome of scanning a bucket
 */
export interface ScanResult {
  bucket: string;
  prefix: string;
  summary: AggregationSummary;

  /** False when the scan was cancelled before every partition finished */
  complete: boolean;
  partitions: number;
  durationMs: number;
}
