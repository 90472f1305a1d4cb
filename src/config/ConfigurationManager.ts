import { readFileSync } from 'fs';
import { MailConfig, MailSettings, ToolsConfig } from '../interfaces/ToolsConfig';
import { LogLevel } from '../interfaces/Logger';
import { DEFAULT_RETRY_SETTINGS } from '../clients/RetryPolicy';
import { isLogLevel } from '../clients/Logger';

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Settings as they may appear in a configuration file
 */
export interface FileConfig {
  endpoint?: string;
  accessKey?: string;
  secretKey?: string;
  region?: string;
  forcePathStyle?: boolean;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  maxConcurrency?: number;
  snapshotDir?: string;
  logLevel?: string;
  smtpHost?: string;
  smtpPort?: number;
  smtpUseSsl?: boolean;
  mailTo?: string;
  mailFrom?: string;
  mailSubject?: string;
}

type Environment = Record<string, string | undefined>;

const STRING_FIELDS = [
  'endpoint',
  'accessKey',
  'secretKey',
  'region',
  'snapshotDir',
  'logLevel',
  'smtpHost',
  'mailTo',
  'mailFrom',
  'mailSubject',
] as const;
const NUMBER_FIELDS = [
  'maxRetries',
  'retryBaseDelayMs',
  'retryMaxDelayMs',
  'maxConcurrency',
  'smtpPort',
] as const;
const BOOLEAN_FIELDS = ['forcePathStyle', 'smtpUseSsl'] as const;

type StringField = (typeof STRING_FIELDS)[number];
type NumberField = (typeof NUMBER_FIELDS)[number];

function isStringField(key: string): key is StringField {
  return STRING_FIELDS.some(field => field === key);
}

function isNumberField(key: string): key is NumberField {
  return NUMBER_FIELDS.some(field => field === key);
}

const ENV_VARS: Record<keyof FileConfig, string> = {
  endpoint: 'S3_ENDPOINT',
  accessKey: 'S3_ACCESS_KEY',
  secretKey: 'S3_SECRET_KEY',
  region: 'S3_REGION',
  forcePathStyle: 'S3_FORCE_PATH_STYLE',
  maxRetries: 'S3_MAX_RETRIES',
  retryBaseDelayMs: 'S3_RETRY_BASE_DELAY_MS',
  retryMaxDelayMs: 'S3_RETRY_MAX_DELAY_MS',
  maxConcurrency: 'S3_MAX_CONCURRENCY',
  snapshotDir: 'SNAPSHOT_DIR',
  logLevel: 'LOG_LEVEL',
  smtpHost: 'SMTP_HOST',
  smtpPort: 'SMTP_PORT',
  smtpUseSsl: 'SMTP_USE_SSL',
  mailTo: 'TO',
  mailFrom: 'FROM',
  mailSubject: 'SUBJECT',
};

/**
 * Keys accepted in a configuration file. The snake_case names are the
 * documented ones; camelCase spellings are accepted as aliases.
 */
const FILE_KEYS: Record<string, keyof FileConfig> = {
  endpoint: 'endpoint',
  access_key: 'accessKey',
  secret_key: 'secretKey',
  region: 'region',
  force_path_style: 'forcePathStyle',
  max_retries: 'maxRetries',
  retry_base_delay_ms: 'retryBaseDelayMs',
  retry_max_delay_ms: 'retryMaxDelayMs',
  max_concurrency: 'maxConcurrency',
  snapshot_dir: 'snapshotDir',
  log_level: 'logLevel',
  smtp_host: 'smtpHost',
  smtp_port: 'smtpPort',
  smtp_use_ssl: 'smtpUseSsl',
  to: 'mailTo',
  from: 'mailFrom',
  subject: 'mailSubject',
};

function fileKey(key: string): keyof FileConfig | undefined {
  if (Object.prototype.hasOwnProperty.call(FILE_KEYS, key)) {
    return FILE_KEYS[key];
  }
  return Object.values(FILE_KEYS).find(field => field === key);
}

const TRUE_VALUES = ['true', 'yes', '1'];
const FALSE_VALUES = ['false', 'no', '0'];

export const CONFIG_FILE_ENV_VAR = 'S3_TOOLS_CONFIG';
export const DEFAULT_MAIL_SUBJECT = 'S3 storage report';

export interface LoadOptions {
  /** Commands that never reach the storage service can skip credentials */
  requireCredentials?: boolean;
}

export class ConfigurationManager {
  /**
   * Build the configuration from an optional JSON file overlaid by
   * environment variables
   */
  static loadConfiguration(
    env: Environment = process.env,
    configFile?: string,
    options: LoadOptions = {}
  ): ToolsConfig {
    const filePath = configFile ?? env[CONFIG_FILE_ENV_VAR];
    const fromFile = filePath ? ConfigurationManager.readConfigFile(filePath) : {};
    const merged: FileConfig = { ...fromFile, ...ConfigurationManager.readEnvironment(env) };

    const missing = (['accessKey', 'secretKey'] as const).filter(field => !merged[field]);
    if (missing.length > 0 && options.requireCredentials !== false) {
      const names = missing.map(field => ENV_VARS[field]);
      throw new ConfigurationError(
        `Missing required configuration: ${names.join(', ')}`,
        names[0]
      );
    }

    const maxRetries = merged.maxRetries ?? DEFAULT_RETRY_SETTINGS.maxRetries;
    const baseDelayMs = merged.retryBaseDelayMs ?? DEFAULT_RETRY_SETTINGS.baseDelayMs;
    const maxDelayMs = merged.retryMaxDelayMs ?? DEFAULT_RETRY_SETTINGS.maxDelayMs;
    const maxConcurrency = merged.maxConcurrency ?? 4;
    const smtpPort = merged.smtpPort ?? 25;

    ConfigurationManager.requireInteger('maxRetries', maxRetries, 0);
    ConfigurationManager.requireInteger('retryBaseDelayMs', baseDelayMs, 0);
    ConfigurationManager.requireInteger('retryMaxDelayMs', maxDelayMs, 0);
    ConfigurationManager.requireInteger('maxConcurrency', maxConcurrency, 1);
    ConfigurationManager.requireInteger('smtpPort', smtpPort, 1);
    if (maxDelayMs < baseDelayMs) {
      throw new ConfigurationError(
        `${ENV_VARS.retryMaxDelayMs} must not be smaller than ${ENV_VARS.retryBaseDelayMs}`,
        ENV_VARS.retryMaxDelayMs
      );
    }

    if (merged.endpoint) {
      try {
        new URL(merged.endpoint);
      } catch {
        throw new ConfigurationError(
          `${ENV_VARS.endpoint} must be a URL such as https://s3.example.com`,
          ENV_VARS.endpoint
        );
      }
    }

    const logLevel = (merged.logLevel ?? LogLevel.INFO).toLowerCase();
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(
        `${ENV_VARS.logLevel} must be one of ${Object.values(LogLevel).join(', ')}`,
        ENV_VARS.logLevel
      );
    }

    return {
      storage: {
        endpoint: merged.endpoint || undefined,
        region: merged.region || 'us-east-1',
        accessKey: merged.accessKey ?? '',
        secretKey: merged.secretKey ?? '',
        forcePathStyle: merged.forcePathStyle ?? Boolean(merged.endpoint),
      },
      retry: { maxRetries, baseDelayMs, maxDelayMs },
      maxConcurrency,
      snapshotDir: merged.snapshotDir || './snapshots',
      logLevel,
      mail: {
        host: merged.smtpHost || undefined,
        port: smtpPort,
        startTls: merged.smtpUseSsl ?? true,
        to: merged.mailTo || undefined,
        from: merged.mailFrom || undefined,
        subject: merged.mailSubject || DEFAULT_MAIL_SUBJECT,
      },
    };
  }

  /**
   * Mail settings for sending a report; the server and both addresses must be set
   */
  static requireMailSettings(mail: MailConfig): MailSettings {
    const { host, to, from } = mail;
    if (!host || !to || !from) {
      const names = [
        ...(host ? [] : [ENV_VARS.smtpHost]),
        ...(to ? [] : [ENV_VARS.mailTo]),
        ...(from ? [] : [ENV_VARS.mailFrom]),
      ];
      throw new ConfigurationError(
        `Missing required configuration: ${names.join(', ')}`,
        names[0]
      );
    }
    return { ...mail, host, to, from };
  }

  /**
   * Copy of the configuration that is safe to log
   */
  static sanitizeForLogging(config: ToolsConfig): Record<string, unknown> {
    return {
      ...config,
      storage: {
        ...config.storage,
        accessKey: '[REDACTED]',
        secretKey: '[REDACTED]',
      },
    };
  }

  static readConfigFile(filePath: string): FileConfig {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(filePath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Cannot read configuration file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
        CONFIG_FILE_ENV_VAR
      );
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new ConfigurationError(
        `Configuration file ${filePath} must contain a JSON object`,
        CONFIG_FILE_ENV_VAR
      );
    }

    const config: FileConfig = {};
    for (const [key, value] of Object.entries(parsed)) {
      const field = fileKey(key);
      if (field === undefined) {
        throw new ConfigurationError(`Unknown setting ${key} in ${filePath}`, key);
      }
      if (isStringField(field)) {
        if (typeof value !== 'string') {
          throw new ConfigurationError(`${key} in ${filePath} must be a string`, key);
        }
        config[field] = value;
      } else if (isNumberField(field)) {
        if (typeof value !== 'number') {
          throw new ConfigurationError(`${key} in ${filePath} must be a number`, key);
        }
        config[field] = value;
      } else {
        if (typeof value !== 'boolean') {
          throw new ConfigurationError(`${key} in ${filePath} must be true or false`, key);
        }
        config[field] = value;
      }
    }
    return config;
  }

  private static readEnvironment(env: Environment): FileConfig {
    const config: FileConfig = {};

    for (const field of STRING_FIELDS) {
      const value = env[ENV_VARS[field]];
      if (value) {
        config[field] = value;
      }
    }

    for (const field of NUMBER_FIELDS) {
      const value = env[ENV_VARS[field]];
      if (value) {
        const parsed = Number(value);
        if (!/^\d+$/.test(value.trim()) || Number.isNaN(parsed)) {
          throw new ConfigurationError(
            `${ENV_VARS[field]} must be a non-negative integer`,
            ENV_VARS[field]
          );
        }
        config[field] = parsed;
      }
    }

    for (const field of BOOLEAN_FIELDS) {
      const value = env[ENV_VARS[field]];
      if (value) {
        const normalized = value.toLowerCase();
        if (![...TRUE_VALUES, ...FALSE_VALUES].includes(normalized)) {
          throw new ConfigurationError(`${ENV_VARS[field]} must be true or false`, ENV_VARS[field]);
        }
        config[field] = TRUE_VALUES.includes(normalized);
      }
    }

    return config;
  }

  private static requireInteger(field: keyof FileConfig, value: number, min: number): void {
    if (!Number.isInteger(value) || value < min) {
      throw new ConfigurationError(
        `${ENV_VARS[field]} must be an integer of at least ${min}, got ${value}`,
        ENV_VARS[field]
      );
    }
  }
}
