import { RetrySettings } from '../interfaces/ToolsConfig';
import { Logger } from '../interfaces/Logger';
import { StorageError, formatError, toError } from './StorageErrors';

export type RetryDecision = { retry: true; delayMs: number } | { retry: false };

/**
 * Thrown once every allowed attempt of a retryable operation has failed
 */
export class RetriesExhaustedError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly attempts: number,
    public readonly lastError: Error
  ) {
    super(message);
    this.name = 'RetriesExhaustedError';
    this.stack = `${this.stack}\nCaused by: ${lastError.stack}`;
  }
}

export interface RetryPolicyOptions {
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxRetries: 3,
  baseDelayMs: 200,
  maxDelayMs: 20_000,
};

/**
 * Exponential backoff around a single storage call.
 * Only errors the storage client marks as retryable are attempted again.
 */
export class RetryPolicy {
  private readonly settings: RetrySettings;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(settings: Partial<RetrySettings> = {}, options: RetryPolicyOptions = {}) {
    this.settings = { ...DEFAULT_RETRY_SETTINGS, ...settings };
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)));
    this.logger = options.logger;
  }

  get maxAttempts(): number {
    return this.settings.maxRetries + 1;
  }

  /**
   * Delay before the attempt following failed attempt `attempt` (1-based)
   */
  backoffDelay(attempt: number): number {
    const delay = this.settings.baseDelayMs * Math.pow(2, attempt - 1);
    return Math.min(delay, this.settings.maxDelayMs);
  }

  decide(error: unknown, attempt: number): RetryDecision {
    if (!(error instanceof StorageError) || !error.retryable) {
      return { retry: false };
    }
    if (attempt >= this.maxAttempts) {
      return { retry: false };
    }
    return { retry: true, delayMs: this.backoffDelay(attempt) };
  }

  async execute<T>(operation: () => Promise<T>, operationName: string): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        const decision = this.decide(error, attempt);

        if (!decision.retry) {
          if (error instanceof StorageError && error.retryable) {
            throw new RetriesExhaustedError(
              `Failed to ${operationName} after ${attempt} attempts. Last error: ${formatError(error)}`,
              operationName,
              attempt,
              error
            );
          }
          throw error;
        }

        if (this.logger) {
          this.logger.logRetry(operationName, attempt, decision.delayMs, toError(error));
        }
        await this.sleep(decision.delayMs);
      }
    }
  }
}
