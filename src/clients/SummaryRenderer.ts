import { ScanResult, HistogramBucket } from '../interfaces/Aggregation';
import { ObjectDescriptor } from '../interfaces/Enumeration';
import { formatBytes, formatCount, formatTable, UnitSystem } from '../utils/format';

export type OutputFormat = 'text' | 'json';

/**
 * Anything output can be written to, e.g. process.stdout
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface RenderOptions {
  units?: UnitSystem;

  /** Include the size distribution in text output */
  histogram?: boolean;
}

export const PARTIAL_NOTICE =
  'PARTIAL - the scan did not finish, totals cover only the objects listed so far';

/**
 * Renders scan results and object listings as text for people or JSON for tools
 */
export class SummaryRenderer {
  private readonly units: UnitSystem;
  private readonly histogram: boolean;

  constructor(options: RenderOptions = {}) {
    this.units = options.units ?? 'binary';
    this.histogram = options.histogram ?? false;
  }

  render(result: ScanResult, format: OutputFormat): string {
    return format === 'json' ? this.renderJson(result) : this.renderText(result);
  }

  write(sink: OutputSink, result: ScanResult, format: OutputFormat): void {
    sink.write(this.render(result, format));
  }

  renderText(result: ScanResult): string {
    const { summary } = result;
    const lines = formatTable([
      ['Bucket:', result.bucket],
      ['Prefix:', result.prefix || '(all)'],
      ['Status:', result.complete ? 'complete' : PARTIAL_NOTICE],
      ['Objects:', formatCount(summary.count)],
      ['Size:', this.bytes(summary.bytes)],
    ]);

    if (summary.prefixes.length > 0 || summary.other.count > 0) {
      const rows = [['Prefix', 'Objects', 'Size']];
      for (const rollup of summary.prefixes) {
        rows.push([rollup.prefix, formatCount(rollup.count), this.bytes(rollup.bytes)]);
      }
      if (summary.other.count > 0) {
        rows.push(['(other)', formatCount(summary.other.count), this.bytes(summary.other.bytes)]);
      }
      lines.push('', ...formatTable(rows, ['left', 'right', 'right']));
    }

    if (this.histogram && summary.histogram.length > 0) {
      const rows = [['Object size', 'Objects', 'Size']];
      for (const bucket of summary.histogram) {
        rows.push([this.range(bucket), formatCount(bucket.count), this.bytes(bucket.bytes)]);
      }
      lines.push('', ...formatTable(rows, ['left', 'right', 'right']));
    }

    return `${lines.join('\n')}\n`;
  }

  renderJson(result: ScanResult): string {
    const { summary } = result;
    const document = {
      bucket: result.bucket,
      prefix: result.prefix,
      complete: result.complete,
      partitions: result.partitions,
      durationMs: result.durationMs,
      count: summary.count,
      bytes: summary.bytes,
      prefixes: summary.prefixes,
      other: summary.other,
      histogram: summary.histogram,
    };
    return `${JSON.stringify(document, null, 2)}\n`;
  }

  /**
   * One line per object: JSON lines, or modification time, size and key
   */
  renderObject(descriptor: ObjectDescriptor, format: OutputFormat): string {
    if (format === 'json') {
      return `${JSON.stringify({
        key: descriptor.key,
        size: descriptor.size,
        lastModified: descriptor.lastModified.toISOString(),
        etag: descriptor.etag,
      })}\n`;
    }
    const size = this.bytes(descriptor.size).padStart(10);
    return `${descriptor.lastModified.toISOString()}  ${size}  ${descriptor.key}\n`;
  }

  private bytes(n: number): string {
    return formatBytes(n, { units: this.units });
  }

  private range(bucket: HistogramBucket): string {
    if (bucket.max === null) {
      return `${this.bytes(bucket.min)} and larger`;
    }
    return `${this.bytes(bucket.min)} to ${this.bytes(bucket.max)}`;
  }
}
