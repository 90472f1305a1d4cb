#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { bucketsCommand } from './commands/buckets';
import { lsCommand } from './commands/ls';
import { duCommand } from './commands/du';
import { rmCommand } from './commands/rm';
import { snapshotCommand } from './commands/snapshot';
import { reportCommand } from './commands/report';
import { EXIT_RUNTIME_ERROR } from './commands/errors';

/**
 * Build the s3-tools program with every subcommand attached
 */
export function createProgram(): Command {
  return new Command()
    .name('s3-tools')
    .description('Utilities for listing, summarizing and tracking S3-compatible storage')
    .version('0.1.0')
    .addCommand(bucketsCommand)
    .addCommand(lsCommand)
    .addCommand(duCommand)
    .addCommand(rmCommand)
    .addCommand(snapshotCommand)
    .addCommand(reportCommand);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), error);
    process.exit(EXIT_RUNTIME_ERROR);
  });
}
