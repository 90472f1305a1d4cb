export type UnitSystem = 'binary' | 'decimal';

export interface NumberFormatOptions {
  /** Prefix positive values with "+" */
  signed?: boolean;
}

export interface ByteFormatOptions extends NumberFormatOptions {
  units?: UnitSystem;
}

const BINARY_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB', 'PiB', 'EiB'];
const DECIMAL_UNITS = ['B', 'kB', 'MB', 'GB', 'TB', 'PB', 'EB'];

const countFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

function sign(n: number, options: NumberFormatOptions): string {
  if (n < 0) {
    return '-';
  }
  return options.signed && n > 0 ? '+' : '';
}

/**
 * Formats an integer with thousands separators
 */
export function formatCount(n: number, options: NumberFormatOptions = {}): string {
  return sign(n, options) + countFormat.format(Math.abs(n));
}

/**
 * Formats a byte count with a binary (KiB) or decimal (kB) suffix
 */
export function formatBytes(n: number, options: ByteFormatOptions = {}): string {
  const units = options.units === 'decimal' ? DECIMAL_UNITS : BINARY_UNITS;
  const base = options.units === 'decimal' ? 1000 : 1024;

  let value = Math.abs(n);
  if (value < base) {
    return `${sign(n, options)}${value} ${units[0]}`;
  }

  let unit = 0;
  while (value >= base && unit < units.length - 1) {
    value /= base;
    unit++;
  }
  // 1023.96 KiB would print as 1024.0 KiB
  if (Number(value.toFixed(1)) >= base && unit < units.length - 1) {
    value /= base;
    unit++;
  }
  return `${sign(n, options)}${value.toFixed(1)} ${units[unit]}`;
}

const INTERVAL_UNITS: Array<[string, number]> = [
  ['day', 86_400_000],
  ['hour', 3_600_000],
  ['minute', 60_000],
  ['second', 1_000],
];

/**
 * "2 days, 3 hours and 1 minute"
 */
export function formatInterval(ms: number): string {
  let remaining = Math.round(Math.abs(ms) / 1000) * 1000;
  const parts: string[] = [];
  for (const [name, size] of INTERVAL_UNITS) {
    const amount = Math.floor(remaining / size);
    remaining -= amount * size;
    if (amount > 0) {
      parts.push(`${amount} ${name}${amount === 1 ? '' : 's'}`);
    }
  }

  if (parts.length === 0) {
    return '0 seconds';
  }
  if (parts.length === 1) {
    return parts[0];
  }
  return `${parts.slice(0, -1).join(', ')} and ${parts[parts.length - 1]}`;
}

export type Alignment = 'left' | 'right';

/**
 * Pads cells into columns separated by two spaces. Trailing whitespace is trimmed.
 */
export function formatTable(rows: string[][], alignments: Alignment[] = []): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }

  return rows.map(row =>
    row
      .map((cell, i) =>
        alignments[i] === 'right' ? cell.padStart(widths[i]) : cell.padEnd(widths[i])
      )
      .join('  ')
      .trimEnd()
  );
}
