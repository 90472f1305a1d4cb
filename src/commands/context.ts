import { ConfigurationManager } from '../config/ConfigurationManager';
import { ToolsConfig } from '../interfaces/ToolsConfig';
import { StorageClient } from '../interfaces/StorageClient';
import { Logger as ILogger } from '../interfaces/Logger';
import { Logger } from '../clients/Logger';
import { S3StorageClient } from '../clients/S3StorageClient';
import { RetryPolicy } from '../clients/RetryPolicy';
import { BucketScanner } from '../clients/BucketScanner';

export interface CommandContext {
  config: ToolsConfig;
  logger: ILogger;
  storage: StorageClient;
  retryPolicy: RetryPolicy;
  scanner: BucketScanner;
}

/**
 * Load the configuration and wire up the clients every command needs
 */
export function createContext(configFile?: string): CommandContext {
  const config = ConfigurationManager.loadConfiguration(process.env, configFile);
  const logger = new Logger(config.logLevel);
  logger.logConfigurationStart(ConfigurationManager.sanitizeForLogging(config));

  const storage = new S3StorageClient(config.storage, logger);
  const retryPolicy = new RetryPolicy(config.retry, { logger });
  const scanner = new BucketScanner(storage, retryPolicy, logger);

  return { config, logger, storage, retryPolicy, scanner };
}
