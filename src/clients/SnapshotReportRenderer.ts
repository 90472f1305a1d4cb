import { SnapshotComparison, BucketComparison } from '../interfaces/Snapshot';
import { formatBytes, formatCount, formatInterval, formatTable, UnitSystem } from '../utils/format';

export type ReportFormat = 'text' | 'html' | 'json';

const NUMERIC_STYLE = 'font-family: monospace; text-align: right;';
const PADDING_STYLE = 'padding-left: 0.5em; padding-right: 0.5em;';

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Renders how bucket usage changed between two snapshots
 */
export class SnapshotReportRenderer {
  constructor(private readonly units: UnitSystem = 'binary') {}

  render(comparison: SnapshotComparison, format: ReportFormat): string {
    switch (format) {
      case 'html':
        return this.renderHtml(comparison);
      case 'json':
        return `${JSON.stringify(comparison, null, 2)}\n`;
      default:
        return this.renderText(comparison);
    }
  }

  /**
   * One-line summary, e.g. for a mail subject
   */
  headline(comparison: SnapshotComparison, title = 'S3 storage report'): string {
    const files = formatCount(comparison.totals.deltaFiles, { signed: true });
    const bytes = formatBytes(comparison.totals.deltaBytes, { units: this.units, signed: true });
    return `${title} (${files} files, ${bytes})`;
  }

  renderText(comparison: SnapshotComparison): string {
    const lines: string[] = [];
    if (comparison.intervalMs > 0) {
      lines.push(
        `In the ${formatInterval(comparison.intervalMs)} leading up to ${comparison.now}:`,
        ''
      );
    }

    const rows = [['Bucket', 'Files', 'Change', 'Size', 'Change']];
    for (const name of Object.keys(comparison.buckets).sort()) {
      rows.push(this.cells(name, comparison.buckets[name]));
    }
    rows.push(this.cells('Total', comparison.totals));
    lines.push(...formatTable(rows, ['left', 'right', 'right', 'right', 'right']));

    return `${lines.join('\n')}\n`;
  }

  renderHtml(comparison: SnapshotComparison): string {
    let html = '';
    if (comparison.intervalMs > 0) {
      html += `<p>In the ${formatInterval(comparison.intervalMs)} leading up to ${escapeHtml(comparison.now)}:</p>\n`;
    }

    html += '<table>\n<thead>\n<tr style="background-color: #eee">\n';
    html += '<th>Bucket</th>\n<th colspan="2">Files</th>\n<th colspan="2">Size</th>\n';
    html += '</tr>\n</thead>\n<tbody>\n';

    const names = Object.keys(comparison.buckets).sort();
    names.forEach((name, rowNumber) => {
      html += this.htmlRow(escapeHtml(name), comparison.buckets[name], rowNumber);
    });
    html += this.htmlRow('<b>Total</b>', comparison.totals, names.length);

    return `${html}</tbody>\n</table>\n`;
  }

  private cells(label: string, row: BucketComparison): string[] {
    return [
      label,
      formatCount(row.files),
      formatCount(row.deltaFiles, { signed: true }),
      formatBytes(row.bytes, { units: this.units }),
      formatBytes(row.deltaBytes, { units: this.units, signed: true }),
    ];
  }

  private htmlRow(label: string, row: BucketComparison, rowNumber: number): string {
    const [, files, deltaFiles, bytes, deltaBytes] = this.cells(label, row);
    const open = rowNumber % 2 === 0 ? '<tr>' : '<tr style="background-color: #def">';
    const numeric = (value: string) => `<td style="${PADDING_STYLE} ${NUMERIC_STYLE}">${value}</td>`;
    return [
      open,
      `<td style="${PADDING_STYLE}">${label}</td>`,
      numeric(files),
      numeric(deltaFiles),
      numeric(bytes),
      numeric(deltaBytes),
      '</tr>',
      '',
    ].join('\n');
  }
}
