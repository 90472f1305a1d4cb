import nodemailer from 'nodemailer';
import { MailSettings } from '../interfaces/ToolsConfig';
import { Logger } from '../interfaces/Logger';
import { formatError } from './StorageErrors';

export class MailError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'MailError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export interface ReportMessage {
  subject: string;
  html: string;
}

/**
 * Sends snapshot reports as HTML mail over SMTP
 */
export class ReportMailer {
  constructor(
    private readonly settings: MailSettings,
    private readonly logger?: Logger
  ) {}

  async send(report: ReportMessage): Promise<string> {
    const transport = nodemailer.createTransport({
      host: this.settings.host,
      port: this.settings.port,
      secure: false,
      requireTLS: this.settings.startTls,
      ignoreTLS: !this.settings.startTls,
    });

    this.logger?.debug('Sending report', {
      operation: 'mail',
      host: this.settings.host,
      port: this.settings.port,
      to: this.settings.to,
    });

    try {
      const info = await transport.sendMail({
        from: this.settings.from,
        sender: this.settings.from,
        to: this.settings.to,
        subject: report.subject,
        html: report.html,
      });
      this.logger?.info('Report sent', {
        operation: 'mail',
        to: this.settings.to,
        messageId: info.messageId,
      });
      return info.messageId;
    } catch (error) {
      throw new MailError(
        `Failed to send report to ${this.settings.to} via ${this.settings.host}:${this.settings.port}: ${formatError(error)}`,
        error instanceof Error ? error : undefined
      );
    } finally {
      transport.close();
    }
  }
}
