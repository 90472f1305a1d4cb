import { StorageClient, RawObjectEntry, ListPageRequest } from '../interfaces/StorageClient';
import {
  ObjectDescriptor,
  ListingCursor,
  ObjectFilter,
  EnumerationOptions,
} from '../interfaces/Enumeration';
import { Logger } from '../interfaces/Logger';
import { RetryPolicy, RetriesExhaustedError } from './RetryPolicy';
import { MAX_KEYS_PER_PAGE } from './S3StorageClient';
import { formatError } from './StorageErrors';

/**
 * Enumeration stopped before the end of the listing, after retries ran out
 * or on cancellation. `cursor` resumes it at the first entry that was not
 * processed.
 */
export class EnumerationError extends Error {
  constructor(
    message: string,
    public readonly cursor: ListingCursor,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'EnumerationError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class EnumerationCancelledError extends EnumerationError {
  constructor(cursor: ListingCursor) {
    super(`Enumeration of ${cursor.bucket} was cancelled`, cursor);
    this.name = 'EnumerationCancelledError';
  }
}

export class InvalidCursorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidCursorError';
  }
}

type ResumePoint = Pick<ListingCursor, 'continuationToken' | 'startAfter'>;

export function matchesFilter(entry: RawObjectEntry, filter: ObjectFilter): boolean {
  if (filter.prefix && !entry.key.startsWith(filter.prefix)) {
    return false;
  }
  if (filter.suffix && !entry.key.endsWith(filter.suffix)) {
    return false;
  }
  if (filter.excludeFolderMarkers && entry.key.endsWith('/')) {
    return false;
  }
  if (filter.modifiedAfter && entry.lastModified.getTime() < filter.modifiedAfter.getTime()) {
    return false;
  }
  if (filter.modifiedBefore && entry.lastModified.getTime() >= filter.modifiedBefore.getTime()) {
    return false;
  }
  return true;
}

function toDescriptor(entry: RawObjectEntry): ObjectDescriptor {
  const descriptor: ObjectDescriptor = {
    key: entry.key,
    size: entry.size,
    lastModified: new Date(entry.lastModified.getTime()),
    ...(entry.etag !== undefined && { etag: entry.etag }),
  };
  return Object.freeze(descriptor);
}

/**
 * Lazy, pull-based sequence of the objects in a bucket.
 *
 * Pages are fetched one at a time through the retry policy and filtered
 * before anything is handed out, so memory stays bounded by one page.
 * Order is whatever the listing returns; entries are never reordered or
 * deduplicated.
 */
export class ObjectEnumerator implements AsyncIterator<ObjectDescriptor>, AsyncIterable<ObjectDescriptor> {
  readonly bucket: string;
  readonly prefix: string;

  private readonly filter: ObjectFilter;
  private readonly delimiter?: string;
  private readonly pageSize: number;
  private readonly signal?: AbortSignal;

  private buffer: RawObjectEntry[] = [];
  private index = 0;
  private resume: ResumePoint;
  private nextToken?: string;
  private lastPage = false;
  private done = false;

  private pages = 0;
  private seen = 0;
  private yielded = 0;

  constructor(
    private readonly storage: StorageClient,
    private readonly retryPolicy: RetryPolicy,
    options: EnumerationOptions,
    private readonly logger?: Logger
  ) {
    this.bucket = options.bucket;
    this.filter = options.filter ?? {};
    this.prefix = this.filter.prefix ?? '';
    this.delimiter = options.delimiter;
    this.pageSize = options.pageSize ?? MAX_KEYS_PER_PAGE;
    this.signal = options.signal;

    const cursor = options.cursor;
    if (cursor && (cursor.bucket !== this.bucket || cursor.prefix !== this.prefix)) {
      throw new InvalidCursorError(
        `Cursor for ${cursor.bucket}/${cursor.prefix} cannot resume a listing of ${this.bucket}/${this.prefix}`
      );
    }
    this.resume = {
      continuationToken: cursor?.continuationToken,
      startAfter: cursor?.startAfter,
    };
  }

  /**
   * Where a new enumeration must start to yield exactly the entries this one
   * has not processed yet
   */
  get cursor(): ListingCursor {
    const cursor: ListingCursor = { bucket: this.bucket, prefix: this.prefix };
    if (this.resume.continuationToken) {
      cursor.continuationToken = this.resume.continuationToken;
    }
    if (this.resume.startAfter) {
      cursor.startAfter = this.resume.startAfter;
    }
    return cursor;
  }

  get pagesFetched(): number {
    return this.pages;
  }

  get entriesSeen(): number {
    return this.seen;
  }

  get entriesYielded(): number {
    return this.yielded;
  }

  get finished(): boolean {
    return this.done;
  }

  async next(): Promise<IteratorResult<ObjectDescriptor, undefined>> {
    while (!this.done) {
      while (this.index < this.buffer.length) {
        const entry = this.buffer[this.index++];
        this.seen++;
        this.resume = { startAfter: entry.key };
        if (matchesFilter(entry, this.filter)) {
          this.yielded++;
          return { done: false, value: toDescriptor(entry) };
        }
      }

      if (this.nextToken !== undefined) {
        this.resume = { continuationToken: this.nextToken };
      }

      if (this.lastPage) {
        this.finish();
        break;
      }

      await this.fetchPage();
    }
    return { done: true, value: undefined };
  }

  /**
   * Stop early. Drops the current page; nothing else needs releasing.
   */
  async return(): Promise<IteratorResult<ObjectDescriptor, undefined>> {
    this.finish();
    return { done: true, value: undefined };
  }

  [Symbol.asyncIterator](): AsyncIterator<ObjectDescriptor> {
    return this;
  }

  private async fetchPage(): Promise<void> {
    if (this.signal?.aborted) {
      const cursor = this.cursor;
      this.finish();
      throw new EnumerationCancelledError(cursor);
    }

    const request: ListPageRequest = {
      bucket: this.bucket,
      prefix: this.prefix,
      maxKeys: this.pageSize,
      ...this.resume,
    };
    if (this.delimiter) {
      request.delimiter = this.delimiter;
    }

    try {
      const page = await this.retryPolicy.execute(
        () => this.storage.listPage(request),
        `list objects in ${this.bucket}/${this.prefix}`
      );
      this.pages++;
      this.buffer = page.objects;
      this.index = 0;
      this.nextToken = page.nextContinuationToken;
      this.lastPage = page.nextContinuationToken === undefined;
    } catch (error) {
      const cursor = this.cursor;
      this.finish();
      // Terminal errors surface as they are; only exhausted retries are resumable
      if (!(error instanceof RetriesExhaustedError)) {
        throw error;
      }
      throw new EnumerationError(
        `Enumeration of ${this.bucket}/${this.prefix} failed: ${formatError(error)}`,
        cursor,
        error
      );
    }
  }

  private finish(): void {
    if (!this.done) {
      this.logger?.debug('Enumeration finished', {
        bucket: this.bucket,
        prefix: this.prefix,
        pages: this.pages,
        seen: this.seen,
        yielded: this.yielded,
      });
    }
    this.done = true;
    this.buffer = [];
    this.index = 0;
  }
}

/**
 * Serialize a cursor for the command line
 */
export function encodeCursor(cursor: ListingCursor): string {
  return Buffer.from(JSON.stringify(cursor), 'utf8').toString('base64url');
}

export function decodeCursor(encoded: string): ListingCursor {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(encoded, 'base64url').toString('utf8'));
  } catch (error) {
    throw new InvalidCursorError(`Cursor is not valid: ${formatError(error)}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new InvalidCursorError('Cursor is not valid: expected an object');
  }
  const bucket = 'bucket' in parsed ? parsed.bucket : undefined;
  const prefix = 'prefix' in parsed ? parsed.prefix : undefined;
  const continuationToken = 'continuationToken' in parsed ? parsed.continuationToken : undefined;
  const startAfter = 'startAfter' in parsed ? parsed.startAfter : undefined;
  if (typeof bucket !== 'string' || typeof prefix !== 'string') {
    throw new InvalidCursorError('Cursor is not valid: bucket and prefix are required');
  }

  const cursor: ListingCursor = { bucket, prefix };
  if (typeof continuationToken === 'string') {
    cursor.continuationToken = continuationToken;
  }
  if (typeof startAfter === 'string') {
    cursor.startAfter = startAfter;
  }
  return cursor;
}
