import chalk from 'chalk';
import { ConfigurationError } from '../config/ConfigurationManager';
import { ListingCursor } from '../interfaces/Enumeration';
import {
  EnumerationError,
  EnumerationCancelledError,
  InvalidCursorError,
  encodeCursor,
} from '../clients/ObjectEnumerator';

export const EXIT_RUNTIME_ERROR = 1;
export const EXIT_CONFIGURATION_ERROR = 2;
export const EXIT_INTERRUPTED = 130;

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError || error instanceof InvalidCursorError) {
    return EXIT_CONFIGURATION_ERROR;
  }
  if (error instanceof EnumerationCancelledError) {
    return EXIT_INTERRUPTED;
  }
  return EXIT_RUNTIME_ERROR;
}

export interface ErrorReportOptions {
  /** The command takes `--cursor`, so a resume hint can be followed */
  resumable?: boolean;

  /** Where to resume when the error carries no cursor of its own */
  cursor?: ListingCursor;
}

/**
 * Print a failed command's error to stderr and return the exit code for it
 */
export function reportError(error: unknown, options: ErrorReportOptions = {}): number {
  if (error instanceof Error) {
    console.error(chalk.red(`${error.name}: ${error.message}`));
  } else {
    console.error(chalk.red(`Error: ${String(error)}`));
  }

  const resumeFrom = error instanceof EnumerationError ? error.cursor : options.cursor;
  if (options.resumable && resumeFrom) {
    console.error(chalk.dim(`  Resume with: --cursor ${encodeCursor(resumeFrom)}`));
  }
  if (error instanceof ConfigurationError && error.field) {
    console.error(chalk.dim(`  Check the ${error.field} setting`));
  }
  return exitCodeFor(error);
}

/**
 * Abort `controller` on the first Ctrl-C and exit on the second. Returns a
 * function that removes the handler.
 */
export function abortOnInterrupt(controller: AbortController): () => void {
  const handler = () => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED);
    }
    console.error(chalk.yellow('Interrupted, stopping after the current page...'));
    controller.abort();
  };
  process.on('SIGINT', handler);
  return () => {
    process.off('SIGINT', handler);
  };
}
