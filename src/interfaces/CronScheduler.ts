/**
 * A unit of work the scheduler runs on every tick
 */
export interface ScheduledJob {
  /** Used in log messages */
  name: string;
  run(): Promise<void>;
}

export interface CronSchedulerConfig {
  cronExpression: string;

  /** IANA zone the expression is evaluated in, UTC when unset */
  timezone?: string;

  /** Run the job once as soon as the scheduler starts */
  runOnInit?: boolean;

  /** Abort a run that takes longer than this */
  timeoutMs?: number;
}

/**
 * Runs a job on a cron schedule until stopped
 */
export interface CronScheduler {
  start(): void;
  stop(): void;
  isRunning(): boolean;
  validateCronExpression(expression: string): boolean;
}
