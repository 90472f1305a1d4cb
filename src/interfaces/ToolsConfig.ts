import { StorageClientConfig } from './StorageClient';
import { LogLevel } from './Logger';

export interface RetrySettings {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface ToolsConfig {
  storage: StorageClientConfig;
  retry: RetrySettings;

  /** Partition worker count for scans */
  maxConcurrency: number;
  snapshotDir: string;
  logLevel: LogLevel;
  mail: MailConfig;
}

/**
 * SMTP delivery of snapshot reports
 */
export interface MailSettings {
  host: string;
  port: number;

  /** Upgrade the connection with STARTTLS before sending */
  startTls: boolean;
  to: string;
  from: string;
  subject: string;
}

/** Mail settings as loaded; server and addresses are only checked when mail is sent */
export type MailConfig = Omit<MailSettings, 'host' | 'to' | 'from'> &
  Partial<Pick<MailSettings, 'host' | 'to' | 'from'>>;
