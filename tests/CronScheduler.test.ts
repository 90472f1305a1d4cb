// Mock node-cron
const mockTask = { start: jest.fn(), stop: jest.fn() };

jest.mock('node-cron', () => ({
  schedule: jest.fn(() => mockTask),
  validate: jest.fn(() => true),
}));

import * as cron from 'node-cron';
import {
  CronScheduler,
  CronSchedulerError,
  CronValidationError,
  CronExecutionError,
} from '../src/clients/CronScheduler';
import { CronSchedulerConfig, ScheduledJob } from '../src/interfaces/CronScheduler';
import { Logger } from '../src/interfaces/Logger';
import { mockLogger } from './helpers/mockLogger';

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('CronScheduler', () => {
  let logger: jest.Mocked<Logger>;
  let job: { name: string; run: jest.Mock<Promise<void>, []> };
  let config: CronSchedulerConfig;
  let scheduler: CronScheduler;

  beforeEach(() => {
    jest.clearAllMocks();
    jest.mocked(cron.validate).mockReturnValue(true);

    logger = mockLogger();
    job = { name: 'snapshot', run: jest.fn<Promise<void>, []>().mockResolvedValue(undefined) };
    config = { cronExpression: '0 2 * * *', timezone: 'UTC' };
    scheduler = new CronScheduler(config, job, logger);
  });

  describe('validateCronExpression', () => {
    it('should delegate to node-cron', () => {
      expect(scheduler.validateCronExpression('*/15 * * * *')).toBe(true);
      expect(cron.validate).toHaveBeenCalledWith('*/15 * * * *');

      jest.mocked(cron.validate).mockReturnValue(false);
      expect(scheduler.validateCronExpression('60 * * * *')).toBe(false);
    });
  });

  describe('start', () => {
    it('should schedule the job with the configured time zone', () => {
      scheduler.start();

      expect(cron.schedule).toHaveBeenCalledWith('0 2 * * *', expect.any(Function), {
        scheduled: false,
        timezone: 'UTC',
      });
      expect(mockTask.start).toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(true);
      expect(logger.info).toHaveBeenCalledWith(
        'Starting cron scheduler with expression: 0 2 * * * (timezone: UTC)'
      );
    });

    it('should reject an invalid cron expression', () => {
      jest.mocked(cron.validate).mockReturnValue(false);

      expect(() => scheduler.start()).toThrow(CronValidationError);
      expect(() => scheduler.start()).toThrow('Invalid cron expression: 0 2 * * *');
      expect(cron.schedule).not.toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn if already running', () => {
      scheduler.start();
      scheduler.start();

      expect(logger.warn).toHaveBeenCalledWith('CronScheduler is already running');
      expect(cron.schedule).toHaveBeenCalledTimes(1);
    });

    it('should wrap errors from node-cron', () => {
      jest.mocked(cron.schedule).mockImplementationOnce(() => {
        throw new Error('Invalid timezone');
      });

      expect(() => scheduler.start()).toThrow(
        new CronSchedulerError('Failed to start cron scheduler: Error: Invalid timezone', 'start')
      );
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should run the job right away when runOnInit is set', async () => {
      new CronScheduler({ ...config, runOnInit: true }, job, logger).start();

      await flush();

      expect(job.run).toHaveBeenCalledTimes(1);
      expect(logger.info).toHaveBeenCalledWith('Running snapshot once at startup');
    });

    it('should run the job on every tick', async () => {
      scheduler.start();
      const tick = jest.mocked(cron.schedule).mock.calls[0][1];
      if (typeof tick !== 'function') {
        throw new Error('expected a callback');
      }

      tick(new Date());
      await flush();

      expect(logger.logScheduledExecution).toHaveBeenCalledWith('0 2 * * *');
      expect(job.run).toHaveBeenCalledTimes(1);
    });
  });

  describe('stop', () => {
    it('should stop the running task', () => {
      scheduler.start();
      scheduler.stop();

      expect(mockTask.stop).toHaveBeenCalled();
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should warn if not running', () => {
      scheduler.stop();

      expect(logger.warn).toHaveBeenCalledWith('CronScheduler is not running');
      expect(mockTask.stop).not.toHaveBeenCalled();
    });
  });

  describe('runJob', () => {
    it('should skip a run while the previous one is still going', async () => {
      let finish: () => void = () => undefined;
      job.run.mockReturnValueOnce(
        new Promise<void>(resolve => {
          finish = resolve;
        })
      );

      const first = scheduler.runJob();
      await scheduler.runJob();
      finish();
      await first;

      expect(job.run).toHaveBeenCalledTimes(1);
      expect(logger.warn).toHaveBeenCalledWith('snapshot is still running, skipping this execution');
    });

    it('should run again once the previous run has finished', async () => {
      await scheduler.runJob();
      await scheduler.runJob();

      expect(job.run).toHaveBeenCalledTimes(2);
    });

    it('should log failures without throwing', async () => {
      const failure = new Error('Listing failed');
      job.run.mockRejectedValueOnce(failure);

      await expect(scheduler.runJob()).resolves.toBeUndefined();

      expect(logger.error).toHaveBeenCalledWith(
        'snapshot failed',
        failure,
        expect.objectContaining({ operation: 'scheduled_job', cronExpression: '0 2 * * *' })
      );
    });

    it('should give up on a run that exceeds the timeout', async () => {
      job.run.mockReturnValueOnce(new Promise<void>(() => undefined));
      const timed = new CronScheduler({ ...config, timeoutMs: 10 }, job, logger);

      await timed.runJob();

      const [message, error] = logger.error.mock.calls[0];
      expect(message).toBe('snapshot failed');
      expect(error).toBeInstanceOf(CronExecutionError);
      expect(error?.message).toBe('snapshot timed out after 10ms');
    });
  });
});
