import { BucketScanner, basePrefixOf } from '../src/clients/BucketScanner';
import { Accumulator } from '../src/clients/Accumulator';
import { EnumerationError, InvalidCursorError } from '../src/clients/ObjectEnumerator';
import { RetriesExhaustedError, RetryPolicy } from '../src/clients/RetryPolicy';
import { AuthError, ConnectivityError } from '../src/clients/StorageErrors';
import { Logger } from '../src/interfaces/Logger';
import { FakeStorageClient, entry } from './helpers/FakeStorageClient';
import { mockLogger } from './helpers/mockLogger';

describe('BucketScanner', () => {
  let storage: FakeStorageClient;
  let logger: jest.Mocked<Logger>;
  let scanner: BucketScanner;

  beforeEach(() => {
    storage = new FakeStorageClient({
      data: [
        entry('a/1', 100),
        entry('a/2', 200),
        entry('b/1', 50),
        entry('c/x/1', 10),
        entry('root.txt', 5),
      ],
    });
    logger = mockLogger();
    scanner = new BucketScanner(
      storage,
      new RetryPolicy({ maxRetries: 0 }, { sleep: () => Promise.resolve() }),
      logger
    );
  });

  describe('basePrefixOf', () => {
    it('should cut the prefix after its last delimiter', () => {
      expect(basePrefixOf('logs/2024/jan', '/')).toBe('logs/2024/');
      expect(basePrefixOf('logs/', '/')).toBe('logs/');
      expect(basePrefixOf('logs', '/')).toBe('');
    });
  });

  describe('discoverPartitions', () => {
    it('should create one partition per common prefix plus a root partition', async () => {
      await expect(scanner.discoverPartitions('data', '', '/')).resolves.toEqual([
        { prefix: '', delimiter: '/' },
        { prefix: 'a/' },
        { prefix: 'b/' },
        { prefix: 'c/' },
      ]);
    });

    it('should leave out the root partition when no objects sit directly under the prefix', async () => {
      await expect(scanner.discoverPartitions('data', 'c/', '/')).resolves.toEqual([
        { prefix: 'c/x/' },
      ]);
    });

    it('should report exhausted retries as a resumable enumeration error', async () => {
      storage.failWith(new ConnectivityError('socket hang up', 'listPage'));

      const error = await scanner.discoverPartitions('data', 'a/', '/').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(EnumerationError);
      expect(error).toMatchObject({
        message:
          'Partition discovery of data/a/ failed: RetriesExhaustedError: Failed to discover partitions of data/a/ after 1 attempts. Last error: ConnectivityError: socket hang up',
        cursor: { bucket: 'data', prefix: 'a/' },
      });
      expect(error).toHaveProperty('cause', expect.any(RetriesExhaustedError));
    });
  });

  describe('scan', () => {
    it('should summarize the whole bucket with a single enumerator', async () => {
      const result = await scanner.scan({ bucket: 'data' });

      expect(result).toMatchObject({
        bucket: 'data',
        prefix: '',
        complete: true,
        partitions: 1,
      });
      expect(result.summary.count).toBe(5);
      expect(result.summary.bytes).toBe(365);
      expect(result.summary.prefixes).toEqual([
        { prefix: 'a/', count: 2, bytes: 300 },
        { prefix: 'b/', count: 1, bytes: 50 },
        { prefix: 'c/', count: 1, bytes: 10 },
      ]);
      expect(logger.logScanComplete).toHaveBeenCalledWith('data', 5, 365, expect.any(Number));
    });

    it('should give the same summary when partitions are scanned in parallel', async () => {
      const sequential = await scanner.scan({ bucket: 'data' });
      const parallel = await scanner.scan({ bucket: 'data', concurrency: 3 });

      expect(parallel.partitions).toBe(4);
      expect(parallel.complete).toBe(true);
      expect(parallel.summary).toEqual(sequential.summary);
    });

    it('should keep one accumulator per worker', async () => {
      const mergeAll = jest.spyOn(Accumulator, 'mergeAll');

      const result = await scanner.scan({ bucket: 'data', concurrency: 2 });

      expect(result.partitions).toBe(4);
      expect(result.summary.count).toBe(5);
      expect(mergeAll).toHaveBeenCalledTimes(1);
      expect(mergeAll.mock.calls[0][0]).toHaveLength(2);
      mergeAll.mockRestore();
    });

    it('should resume a single-partition scan from a cursor', async () => {
      const result = await scanner.scan({
        bucket: 'data',
        cursor: { bucket: 'data', prefix: '', startAfter: 'a/2' },
      });

      expect(result.complete).toBe(true);
      expect(result.summary.count).toBe(3);
      expect(result.summary.bytes).toBe(65);
    });

    it('should refuse a cursor for a partitioned scan', async () => {
      await expect(
        scanner.scan({
          bucket: 'data',
          concurrency: 2,
          cursor: { bucket: 'data', prefix: '', startAfter: 'a/2' },
        })
      ).rejects.toThrow(InvalidCursorError);
      expect(storage.requests).toHaveLength(0);
    });

    it('should list the root partition with the delimiter', async () => {
      await scanner.scan({ bucket: 'data', concurrency: 2 });

      const rootRequests = storage.requests.filter(r => r.prefix === '' && r.maxKeys !== undefined);
      expect(rootRequests).toEqual([{ bucket: 'data', prefix: '', maxKeys: 1000, delimiter: '/' }]);
    });

    it('should roll up below the requested prefix', async () => {
      const result = await scanner.scan({
        bucket: 'data',
        filter: { prefix: 'c/' },
        concurrency: 2,
      });

      expect(result.summary.count).toBe(1);
      expect(result.summary.prefixes).toEqual([{ prefix: 'c/x/', count: 1, bytes: 10 }]);
    });

    it('should pass filters and accumulator settings to every partition', async () => {
      const result = await scanner.scan({
        bucket: 'data',
        filter: { suffix: '1' },
        concurrency: 4,
        accumulator: { maxPrefixes: 1 },
      });

      expect(result.summary.count).toBe(3);
      expect(result.summary.bytes).toBe(160);
      expect(result.summary.prefixes).toEqual([{ prefix: 'a/', count: 1, bytes: 100 }]);
      expect(result.summary.other).toEqual({ count: 2, bytes: 60 });
    });

    it('should fail with the first partition error', async () => {
      const authError = new AuthError('Access Denied', 'listPage');
      storage.onList = request => {
        if (request.prefix === 'b/') {
          throw authError;
        }
      };

      await expect(scanner.scan({ bucket: 'data', concurrency: 2 })).rejects.toBe(authError);
      expect(logger.logScanComplete).not.toHaveBeenCalled();
    });

    it('should return a partial result when the caller cancels', async () => {
      const controller = new AbortController();
      storage.onList = () => {
        if (storage.requests.length === 2) {
          controller.abort();
        }
      };

      const result = await scanner.scan({ bucket: 'data', pageSize: 1, signal: controller.signal });

      expect(result.complete).toBe(false);
      expect(result.summary.count).toBe(2);
      expect(result.summary.bytes).toBe(300);
      expect(logger.warn).toHaveBeenCalledWith(
        'Scan cancelled before completion',
        expect.objectContaining({ bucket: 'data' })
      );
    });

    it('should return an empty partial result when cancelled before partitions are known', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await scanner.scan({ bucket: 'data', concurrency: 2, signal: controller.signal });

      expect(result.complete).toBe(false);
      expect(result.partitions).toBe(0);
      expect(result.summary.count).toBe(0);
      expect(storage.requests).toHaveLength(0);
    });
  });
});
