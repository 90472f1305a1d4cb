import * as cron from 'node-cron';
import {
  CronScheduler as ICronScheduler,
  CronSchedulerConfig,
  ScheduledJob,
} from '../interfaces/CronScheduler';
import { Logger } from '../interfaces/Logger';
import { formatError, toError } from './StorageErrors';

export class CronSchedulerError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'CronSchedulerError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class CronValidationError extends CronSchedulerError {
  constructor(
    message: string,
    public readonly expression: string
  ) {
    super(message, 'validation');
    this.name = 'CronValidationError';
  }
}

export class CronExecutionError extends CronSchedulerError {
  constructor(message: string, cause?: Error) {
    super(message, 'execution', cause);
    this.name = 'CronExecutionError';
  }
}

/**
 * Runs a job on a node-cron schedule. A tick that arrives while the previous
 * run is still going is skipped.
 */
export class CronScheduler implements ICronScheduler {
  private task: cron.ScheduledTask | null = null;
  private jobRunning = false;

  constructor(
    private readonly config: CronSchedulerConfig,
    private readonly job: ScheduledJob,
    private readonly logger: Logger
  ) {}

  start(): void {
    if (this.task) {
      this.logger.warn('CronScheduler is already running');
      return;
    }

    if (!this.validateCronExpression(this.config.cronExpression)) {
      throw new CronValidationError(
        `Invalid cron expression: ${this.config.cronExpression}`,
        this.config.cronExpression
      );
    }

    const timezone = this.config.timezone || 'UTC';
    this.logger.info(
      `Starting cron scheduler with expression: ${this.config.cronExpression} (timezone: ${timezone})`
    );

    try {
      this.task = cron.schedule(
        this.config.cronExpression,
        () => {
          this.logger.logScheduledExecution(this.config.cronExpression);
          this.runJob().catch((error: unknown) => {
            this.logger.error('Unexpected error in scheduled execution', toError(error));
          });
        },
        { scheduled: false, timezone }
      );
      this.task.start();
    } catch (error) {
      this.task = null;
      throw new CronSchedulerError(
        `Failed to start cron scheduler: ${formatError(error)}`,
        'start',
        toError(error)
      );
    }

    if (this.config.runOnInit) {
      this.logger.info(`Running ${this.job.name} once at startup`);
      setImmediate(() => {
        this.runJob().catch((error: unknown) => {
          this.logger.error('Initial execution failed', toError(error));
        });
      });
    }
  }

  stop(): void {
    if (!this.task) {
      this.logger.warn('CronScheduler is not running');
      return;
    }

    this.task.stop();
    this.task = null;
    this.logger.info('CronScheduler stopped');
  }

  isRunning(): boolean {
    return this.task !== null;
  }

  validateCronExpression(expression: string): boolean {
    return cron.validate(expression);
  }

  /**
   * Run the job once unless a run is already in progress. Failures are logged,
   * never thrown, so the schedule keeps going.
   */
  async runJob(): Promise<void> {
    if (this.jobRunning) {
      this.logger.warn(`${this.job.name} is still running, skipping this execution`);
      return;
    }

    this.jobRunning = true;
    const startTime = Date.now();
    let timer: NodeJS.Timeout | undefined;

    try {
      const timeout = new Promise<never>((_, reject) => {
        if (this.config.timeoutMs !== undefined) {
          const timeoutMs = this.config.timeoutMs;
          timer = setTimeout(() => {
            reject(new CronExecutionError(`${this.job.name} timed out after ${timeoutMs}ms`));
          }, timeoutMs);
        }
      });
      await Promise.race([this.job.run(), timeout]);
      this.logger.info(`${this.job.name} completed`, {
        operation: 'scheduled_job',
        duration: Date.now() - startTime,
      });
    } catch (error) {
      this.logger.error(`${this.job.name} failed`, toError(error), {
        operation: 'scheduled_job',
        duration: Date.now() - startTime,
        cronExpression: this.config.cronExpression,
      });
    } finally {
      if (timer) {
        clearTimeout(timer);
      }
      this.jobRunning = false;
    }
  }
}
