import {
  S3Client as AWSS3Client,
  S3ClientConfig,
  ListObjectsV2Command,
  ListObjectsV2CommandInput,
  ListBucketsCommand,
  DeleteObjectsCommand,
  DeleteObjectsCommandInput,
  _Object,
} from '@aws-sdk/client-s3';
import {
  StorageClient as IStorageClient,
  StorageClientConfig,
  ListPageRequest,
  ListPage,
  RawObjectEntry,
  BucketInfo,
  DeleteObjectsResult,
} from '../interfaces/StorageClient';
import { Logger } from '../interfaces/Logger';
import {
  StorageError,
  ConnectivityError,
  TransientServiceError,
  AuthError,
  NotFoundError,
  ProtocolError,
  toError,
} from './StorageErrors';

export const MAX_KEYS_PER_PAGE = 1000;
export const MAX_KEYS_PER_DELETE = 1000;

const NETWORK_ERROR_CODES = [
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
];

const NETWORK_ERROR_NAMES = ['TimeoutError', 'NetworkingError', 'RequestTimeout', 'AbortError'];

const AUTH_ERROR_NAMES = [
  'AccessDenied',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'InvalidToken',
  'AllAccessDisabled',
];

const NOT_FOUND_ERROR_NAMES = ['NoSuchBucket', 'NotFound'];

const THROTTLING_ERROR_NAMES = [
  'SlowDown',
  'Throttling',
  'ThrottlingException',
  'RequestLimitExceeded',
  'TooManyRequestsException',
  'ServiceUnavailable',
  'InternalError',
  'RequestTimeTooSkewed',
];

function property(value: unknown, key: string): unknown {
  if (typeof value === 'object' && value !== null) {
    const result: unknown = Reflect.get(value, key);
    return result;
  }
  return undefined;
}

function httpStatusOf(error: unknown): number | undefined {
  const status = property(property(error, '$metadata'), 'httpStatusCode');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Map an error thrown by the AWS SDK (or the network stack underneath it)
 * onto the storage error taxonomy
 */
export function normalizeError(error: unknown, operation: string, bucket?: string): StorageError {
  if (error instanceof StorageError) {
    return error;
  }

  const cause = toError(error);
  const name = cause.name;
  const code = property(error, 'code');
  const status = httpStatusOf(error);
  const message = `Failed to ${operation}: ${cause.message || name}`;

  if (
    (typeof code === 'string' && NETWORK_ERROR_CODES.includes(code)) ||
    NETWORK_ERROR_NAMES.includes(name)
  ) {
    return new ConnectivityError(message, operation, cause);
  }

  if (AUTH_ERROR_NAMES.includes(name) || status === 401 || status === 403) {
    return new AuthError(message, operation, cause);
  }

  if (NOT_FOUND_ERROR_NAMES.includes(name) || status === 404) {
    return new NotFoundError(message, operation, bucket, cause);
  }

  if (
    THROTTLING_ERROR_NAMES.includes(name) ||
    status === 429 ||
    (status !== undefined && status >= 500)
  ) {
    return new TransientServiceError(message, operation, status, cause);
  }

  return new ProtocolError(message, operation, cause);
}

/**
 * StorageClient implementation using AWS SDK v3.
 * Retries are left to RetryPolicy, so the SDK makes exactly one attempt per call.
 */
export class S3StorageClient implements IStorageClient {
  private client: AWSS3Client;

  constructor(
    config: StorageClientConfig,
    private readonly logger?: Logger
  ) {
    const clientConfig: S3ClientConfig = {
      region: config.region,
      credentials: {
        accessKeyId: config.accessKey,
        secretAccessKey: config.secretKey,
      },
      maxAttempts: 1,
    };

    // Use custom endpoint if provided (for S3-compatible services)
    if (config.endpoint) {
      clientConfig.endpoint = config.endpoint;
    }
    if (config.forcePathStyle) {
      clientConfig.forcePathStyle = true;
    }

    this.client = new AWSS3Client(clientConfig);
  }

  async listPage(request: ListPageRequest): Promise<ListPage> {
    const operation = `list objects in ${request.bucket} with prefix "${request.prefix}"`;
    const params: ListObjectsV2CommandInput = {
      Bucket: request.bucket,
      Prefix: request.prefix || undefined,
      MaxKeys: Math.min(request.maxKeys ?? MAX_KEYS_PER_PAGE, MAX_KEYS_PER_PAGE),
    };
    if (request.continuationToken) {
      params.ContinuationToken = request.continuationToken;
    }
    if (request.startAfter) {
      params.StartAfter = request.startAfter;
    }
    if (request.delimiter) {
      params.Delimiter = request.delimiter;
    }

    const response = await this.execute(operation, request.bucket, () =>
      this.client.send(new ListObjectsV2Command(params))
    );

    const objects = (response.Contents ?? []).map(item => this.toRawEntry(item, operation));
    const commonPrefixes: string[] = [];
    for (const entry of response.CommonPrefixes ?? []) {
      if (entry.Prefix) {
        commonPrefixes.push(entry.Prefix);
      }
    }

    const nextToken = response.NextContinuationToken || undefined;
    if (response.IsTruncated && !nextToken) {
      throw new ProtocolError(
        `Listing of ${request.bucket} is truncated but carries no continuation token`,
        operation
      );
    }
    if (nextToken !== undefined && nextToken === request.continuationToken) {
      throw new ProtocolError(
        `Listing of ${request.bucket} returned the same continuation token twice`,
        operation
      );
    }

    this.logger?.debug('Fetched listing page', {
      bucket: request.bucket,
      prefix: request.prefix,
      objects: objects.length,
      commonPrefixes: commonPrefixes.length,
      truncated: nextToken !== undefined,
    });

    return { objects, commonPrefixes, nextContinuationToken: nextToken };
  }

  async listBuckets(): Promise<BucketInfo[]> {
    const response = await this.execute('list buckets', undefined, () =>
      this.client.send(new ListBucketsCommand({}))
    );

    const buckets: BucketInfo[] = [];
    for (const bucket of response.Buckets ?? []) {
      if (!bucket.Name) {
        throw new ProtocolError('Bucket listing contains an entry without a name', 'list buckets');
      }
      buckets.push({ name: bucket.Name, creationDate: bucket.CreationDate });
    }
    return buckets;
  }

  async deleteObjects(bucket: string, keys: string[]): Promise<DeleteObjectsResult> {
    if (keys.length === 0) {
      return { deleted: [], failures: [] };
    }
    if (keys.length > MAX_KEYS_PER_DELETE) {
      throw new ProtocolError(
        `Cannot delete ${keys.length} keys in one request (maximum ${MAX_KEYS_PER_DELETE})`,
        'delete objects'
      );
    }

    const operation = `delete ${keys.length} objects from ${bucket}`;
    const params: DeleteObjectsCommandInput = {
      Bucket: bucket,
      Delete: {
        Objects: keys.map(key => ({ Key: key })),
        Quiet: false,
      },
    };

    const response = await this.execute(operation, bucket, () =>
      this.client.send(new DeleteObjectsCommand(params))
    );

    return {
      deleted: (response.Deleted ?? []).flatMap(item => (item.Key ? [item.Key] : [])),
      failures: (response.Errors ?? []).map(item => ({
        key: item.Key ?? '',
        code: item.Code ?? 'Unknown',
        message: item.Message ?? '',
      })),
    };
  }

  /**
   * Run one SDK call, normalizing whatever it throws
   */
  private async execute<T>(
    operation: string,
    bucket: string | undefined,
    call: () => Promise<T>
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      throw normalizeError(error, operation, bucket);
    }
  }

  private toRawEntry(item: _Object, operation: string): RawObjectEntry {
    if (!item.Key) {
      throw new ProtocolError('Listing contains an entry without a key', operation);
    }
    const size = item.Size ?? 0;
    if (!Number.isInteger(size) || size < 0) {
      throw new ProtocolError(`Listing reports an invalid size for ${item.Key}: ${size}`, operation);
    }
    if (!item.LastModified) {
      throw new ProtocolError(`Listing reports no modification time for ${item.Key}`, operation);
    }

    const entry: RawObjectEntry = {
      key: item.Key,
      size,
      lastModified: item.LastModified,
    };
    if (item.ETag) {
      entry.etag = item.ETag.replace(/^"|"$/g, '');
    }
    return entry;
  }
}
