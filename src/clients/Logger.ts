import winston from 'winston';
import { Logger as ILogger, LogLevel } from '../interfaces/Logger';

const SENSITIVE_KEYS = [
  'password',
  'secret',
  'token',
  'credential',
  'accesskey',
  'secretkey',
  'access_key',
  'secret_key',
];

export function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevel).includes(value);
}

/**
 * Sanitize metadata to remove sensitive information
 */
export function sanitizeMeta(meta: object): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(meta)) {
    const lowerKey = key.toLowerCase();
    const isSensitive = SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive));

    if (isSensitive) {
      sanitized[key] = '[REDACTED]';
    } else if (
      typeof value === 'object' &&
      value !== null &&
      !Array.isArray(value) &&
      !(value instanceof Date)
    ) {
      sanitized[key] = sanitizeMeta(value);
    } else {
      sanitized[key] = value;
    }
  }

  return sanitized;
}

/**
 * winston-backed logger. Entries are JSON lines on stderr so that stdout only
 * ever carries command output.
 */
export class Logger implements ILogger {
  private winston: winston.Logger;

  constructor(logLevel: LogLevel = LogLevel.INFO, transports?: winston.LoggerOptions['transports']) {
    this.winston = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.printf(info => {
          const { timestamp, level, message, stack, ...meta } = info;
          const logEntry: Record<string, unknown> = {
            timestamp,
            level,
            message,
          };

          if (stack) {
            logEntry.stack = stack;
          }

          if (Object.keys(meta).length > 0) {
            logEntry.meta = sanitizeMeta(meta);
          }

          return JSON.stringify(logEntry);
        })
      ),
      transports: transports ?? [
        new winston.transports.Console({
          stderrLevels: Object.values<string>(LogLevel),
        }),
      ],
    });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const errorMeta: Record<string, unknown> = { ...meta };
    if (error) {
      const details: Record<string, unknown> = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
      const code: unknown = Reflect.get(error, 'code');
      if (typeof code === 'string') {
        details.code = code;
      }
      errorMeta.error = details;
    }
    this.winston.error(message, errorMeta);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.winston.debug(message, meta);
  }

  logScanStart(bucket: string, meta?: Record<string, unknown>): void {
    this.info('Scan started', {
      operation: 'scan_start',
      bucket,
      ...meta,
    });
  }

  logScanComplete(bucket: string, count: number, bytes: number, duration: number): void {
    this.info('Scan completed', {
      operation: 'scan_complete',
      bucket,
      count,
      bytes,
      duration,
    });
  }

  logRetry(operation: string, attempt: number, delayMs: number, error: Error): void {
    this.warn(`Attempt ${attempt} failed for ${operation}, retrying in ${delayMs}ms`, {
      operation: 'retry',
      failedOperation: operation,
      attempt,
      delayMs,
      errorName: error.name,
      errorMessage: error.message,
    });
  }

  logSnapshotWritten(filePath: string, bucketCount: number): void {
    this.info('Snapshot written', {
      operation: 'snapshot_written',
      filePath,
      bucketCount,
    });
  }

  logConfigurationStart(config: Record<string, unknown>): void {
    this.info('Starting with configuration', {
      operation: 'startup',
      config: sanitizeMeta(config),
    });
  }

  logScheduledExecution(cronExpression: string): void {
    this.info('Scheduled execution triggered', {
      operation: 'scheduled_execution',
      cronExpression,
    });
  }
}
