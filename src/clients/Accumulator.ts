import { ObjectDescriptor } from '../interfaces/Enumeration';
import {
  AccumulatorSettings,
  AggregationSummary,
  HistogramBucket,
  Rollup,
} from '../interfaces/Aggregation';

export class AggregationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AggregationError';
  }
}

/** 1 B, 2 B, 4 B, ... 4 TiB */
export const DEFAULT_HISTOGRAM_BOUNDARIES: number[] = Array.from({ length: 43 }, (_, i) => 2 ** i);

export const DEFAULT_ACCUMULATOR_SETTINGS: AccumulatorSettings = {
  delimiter: '/',
  depth: 1,
  maxPrefixes: 10_000,
  basePrefix: '',
  histogramBoundaries: DEFAULT_HISTOGRAM_BOUNDARIES,
};

function validateSettings(settings: AccumulatorSettings): void {
  if (!settings.delimiter) {
    throw new AggregationError('Delimiter must not be empty');
  }
  if (!Number.isInteger(settings.depth) || settings.depth < 0) {
    throw new AggregationError(`Prefix depth must be a non-negative integer, got ${settings.depth}`);
  }
  if (!Number.isInteger(settings.maxPrefixes) || settings.maxPrefixes < 0) {
    throw new AggregationError(
      `Prefix cap must be a non-negative integer, got ${settings.maxPrefixes}`
    );
  }
  settings.histogramBoundaries.forEach((boundary, i) => {
    const previous = i === 0 ? 0 : settings.histogramBoundaries[i - 1];
    if (!(boundary > previous)) {
      throw new AggregationError('Histogram boundaries must be positive and strictly ascending');
    }
  });
}

function sameSettings(a: AccumulatorSettings, b: AccumulatorSettings): boolean {
  return (
    a.delimiter === b.delimiter &&
    a.depth === b.depth &&
    a.maxPrefixes === b.maxPrefixes &&
    a.basePrefix === b.basePrefix &&
    a.histogramBoundaries.length === b.histogramBoundaries.length &&
    a.histogramBoundaries.every((boundary, i) => boundary === b.histogramBoundaries[i])
  );
}

/**
 * Running statistics over a stream of object descriptors.
 *
 * Memory is bounded by the prefix cap: the accumulator keeps the
 * lexicographically smallest `maxPrefixes` prefixes and folds every other
 * prefix into `other`. Which prefixes are kept depends only on the set of
 * prefixes seen, never on arrival order, which keeps `merge` associative and
 * commutative.
 *
 * Byte totals are plain numbers and stay exact up to
 * `Number.MAX_SAFE_INTEGER` (2^53 - 1 bytes, about 8 PiB). Larger totals are
 * rounded to the nearest representable double.
 */
export class Accumulator {
  readonly settings: AccumulatorSettings;

  private total: Rollup = { count: 0, bytes: 0 };
  private histogramCounts: number[];
  private histogramBytes: number[];
  private prefixes = new Map<string, Rollup>();
  private other: Rollup = { count: 0, bytes: 0 };
  private largestPrefix?: string;

  constructor(settings: Partial<AccumulatorSettings> = {}) {
    this.settings = {
      ...DEFAULT_ACCUMULATOR_SETTINGS,
      ...settings,
      histogramBoundaries: [
        ...(settings.histogramBoundaries ?? DEFAULT_ACCUMULATOR_SETTINGS.histogramBoundaries),
      ],
    };
    validateSettings(this.settings);

    const buckets = this.settings.histogramBoundaries.length + 1;
    this.histogramCounts = new Array<number>(buckets).fill(0);
    this.histogramBytes = new Array<number>(buckets).fill(0);
  }

  get count(): number {
    return this.total.count;
  }

  get bytes(): number {
    return this.total.bytes;
  }

  get trackedPrefixes(): number {
    return this.prefixes.size;
  }

  add(descriptor: ObjectDescriptor): this {
    this.total.count += 1;
    this.total.bytes += descriptor.size;

    const bucket = this.bucketIndex(descriptor.size);
    this.histogramCounts[bucket] += 1;
    this.histogramBytes[bucket] += descriptor.size;

    for (const prefix of this.prefixesOf(descriptor.key)) {
      this.addToPrefix(prefix, 1, descriptor.size);
    }
    return this;
  }

  /**
   * Combine two accumulators built with the same settings into a new one
   */
  static merge(a: Accumulator, b: Accumulator): Accumulator {
    if (!sameSettings(a.settings, b.settings)) {
      throw new AggregationError('Cannot merge accumulators built with different settings');
    }

    const merged = new Accumulator(a.settings);
    for (const source of [a, b]) {
      merged.total.count += source.total.count;
      merged.total.bytes += source.total.bytes;
      source.histogramCounts.forEach((count, i) => {
        merged.histogramCounts[i] += count;
        merged.histogramBytes[i] += source.histogramBytes[i];
      });
      merged.other.count += source.other.count;
      merged.other.bytes += source.other.bytes;
    }
    for (const source of [a, b]) {
      for (const [prefix, rollup] of source.prefixes) {
        merged.addToPrefix(prefix, rollup.count, rollup.bytes);
      }
    }
    return merged;
  }

  static mergeAll(accumulators: Accumulator[], settings: Partial<AccumulatorSettings> = {}): Accumulator {
    return accumulators.reduce(
      (merged, next) => Accumulator.merge(merged, next),
      new Accumulator(accumulators.length > 0 ? accumulators[0].settings : settings)
    );
  }

  /**
   * Ancestor prefixes of a key below the base prefix, shallowest first
   */
  prefixesOf(key: string): string[] {
    const { basePrefix, delimiter, depth } = this.settings;
    if (!key.startsWith(basePrefix)) {
      return [];
    }

    const result: string[] = [];
    let position = basePrefix.length;
    for (let level = 0; level < depth; level++) {
      const index = key.indexOf(delimiter, position);
      if (index < 0) {
        break;
      }
      position = index + delimiter.length;
      result.push(key.slice(0, position));
    }
    return result;
  }

  toSummary(): AggregationSummary {
    const boundaries = this.settings.histogramBoundaries;
    const histogram: HistogramBucket[] = [];
    this.histogramCounts.forEach((count, i) => {
      if (count === 0) {
        return;
      }
      histogram.push({
        min: i === 0 ? 0 : boundaries[i - 1],
        max: i < boundaries.length ? boundaries[i] : null,
        count,
        bytes: this.histogramBytes[i],
      });
    });

    const prefixes = [...this.prefixes.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([prefix, rollup]) => ({ prefix, count: rollup.count, bytes: rollup.bytes }));

    return {
      count: this.total.count,
      bytes: this.total.bytes,
      histogram,
      prefixes,
      other: { ...this.other },
    };
  }

  /**
   * Index of the first boundary greater than `size`
   */
  private bucketIndex(size: number): number {
    const boundaries = this.settings.histogramBoundaries;
    let low = 0;
    let high = boundaries.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (boundaries[middle] > size) {
        high = middle;
      } else {
        low = middle + 1;
      }
    }
    return low;
  }

  private addToPrefix(prefix: string, count: number, bytes: number): void {
    const existing = this.prefixes.get(prefix);
    if (existing) {
      existing.count += count;
      existing.bytes += bytes;
      return;
    }

    if (this.prefixes.size < this.settings.maxPrefixes) {
      this.prefixes.set(prefix, { count, bytes });
      if (this.largestPrefix === undefined || prefix > this.largestPrefix) {
        this.largestPrefix = prefix;
      }
      return;
    }

    if (this.largestPrefix === undefined || prefix > this.largestPrefix) {
      this.other.count += count;
      this.other.bytes += bytes;
      return;
    }

    // A smaller prefix arrived late: it displaces the largest tracked one.
    // Sorted listings never get here.
    const evicted = this.prefixes.get(this.largestPrefix);
    if (evicted) {
      this.other.count += evicted.count;
      this.other.bytes += evicted.bytes;
    }
    this.prefixes.delete(this.largestPrefix);
    this.prefixes.set(prefix, { count, bytes });

    let largest: string | undefined;
    for (const key of this.prefixes.keys()) {
      if (largest === undefined || key > largest) {
        largest = key;
      }
    }
    this.largestPrefix = largest;
  }
}

/**
 * Drain a descriptor stream into an accumulator
 */
export async function aggregate(
  stream: AsyncIterator<ObjectDescriptor>,
  accumulator: Accumulator = new Accumulator()
): Promise<Accumulator> {
  for (;;) {
    const result = await stream.next();
    if (result.done) {
      return accumulator;
    }
    accumulator.add(result.value);
  }
}
