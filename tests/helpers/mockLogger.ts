import { Logger } from '../../src/interfaces/Logger';

export function mockLogger(): jest.Mocked<Logger> {
  return {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    logScanStart: jest.fn(),
    logScanComplete: jest.fn(),
    logRetry: jest.fn(),
    logSnapshotWritten: jest.fn(),
    logConfigurationStart: jest.fn(),
    logScheduledExecution: jest.fn(),
  };
}
