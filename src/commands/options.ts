import { Command, InvalidArgumentError, Option } from 'commander';
import { ObjectFilter } from '../interfaces/Enumeration';
import { UnitSystem } from '../utils/format';

export interface CommonOptions {
  config?: string;
}

export interface FilterOptions extends CommonOptions {
  prefix?: string;
  suffix?: string;
  modifiedAfter?: Date;
  modifiedBefore?: Date;
}

export interface UnitOptions {
  units: UnitSystem;
}

export function parsePositiveInteger(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return Number(value);
}

export function parseNonNegativeInteger(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return Number(value);
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new InvalidArgumentError('Must be a date such as 2024-01-31 or 2024-01-31T12:00:00Z.');
  }
  return date;
}

export function withConfigOption(command: Command): Command {
  return command.option('-c, --config <file>', 'JSON configuration file');
}

export function withFilterOptions(command: Command): Command {
  return withConfigOption(command)
    .option('-p, --prefix <prefix>', 'Only keys starting with this prefix')
    .option('-s, --suffix <suffix>', 'Only keys ending with this suffix')
    .option('--modified-after <date>', 'Only objects modified at or after this time', parseDate)
    .option('--modified-before <date>', 'Only objects modified before this time', parseDate);
}

export function withUnitsOption(command: Command): Command {
  return command.addOption(
    new Option('-u, --units <units>', 'Byte units').choices(['binary', 'decimal']).default('binary')
  );
}

export function formatOption(choices: string[]): Option {
  return new Option('-f, --format <format>', 'Output format').choices(choices).default('text');
}

export function buildFilter(options: FilterOptions): ObjectFilter {
  const filter: ObjectFilter = {};
  if (options.prefix) {
    filter.prefix = options.prefix;
  }
  if (options.suffix) {
    filter.suffix = options.suffix;
  }
  if (options.modifiedAfter) {
    filter.modifiedAfter = options.modifiedAfter;
  }
  if (options.modifiedBefore) {
    filter.modifiedBefore = options.modifiedBefore;
  }
  return filter;
}
