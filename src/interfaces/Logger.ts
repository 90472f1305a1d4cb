export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;

  // Specialized logging methods for storage operations
  logScanStart(bucket: string, meta?: Record<string, unknown>): void;
  logScanComplete(bucket: string, count: number, bytes: number, duration: number): void;
  logRetry(operation: string, attempt: number, delayMs: number, error: Error): void;
  logSnapshotWritten(filePath: string, bucketCount: number): void;
  logConfigurationStart(config: Record<string, unknown>): void;
  logScheduledExecution(cronExpression: string): void;
}

export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
}
