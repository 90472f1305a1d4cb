/**
 * One entry of a listing page, as reported by the storage service
 */
export interface RawObjectEntry {
  /** Full object key within the bucket */
  key: string;

  /** Size of the object in bytes */
  size: number;

  /** Last modified timestamp */
  lastModified: Date;

  /** Content ETag, without surrounding quotes */
  etag?: string;
}

/**
 * Parameters of a single listing call
 */
export interface ListPageRequest {
  bucket: string;
  prefix: string;

  /** Token returned by the previous page */
  continuationToken?: string;

  /** Start listing after this key (ignored by S3 when a continuation token is given) */
  startAfter?: string;

  /** Group keys sharing a prefix up to this delimiter into `commonPrefixes` */
  delimiter?: string;

  /** Page size, at most 1000 */
  maxKeys?: number;
}

export interface ListPage {
  objects: RawObjectEntry[];

  /** Prefixes rolled up by the delimiter, empty when no delimiter was sent */
  commonPrefixes: string[];

  /** Absent on the last page */
  nextContinuationToken?: string;
}

export interface BucketInfo {
  name: string;
  creationDate?: Date;
}

export interface DeleteFailure {
  key: string;
  code: string;
  message: string;
}

export interface DeleteObjectsResult {
  deleted: string[];
  failures: DeleteFailure[];
}

/**
 * Connection settings for the storage service
 */
export interface StorageClientConfig {
  /** Endpoint override for S3-compatible services */
  endpoint?: string;
  region: string;
  accessKey: string;
  secretKey: string;
  forcePathStyle: boolean;
}

/**
 * Seam between the tools and an S3-compatible service.
 * Every method fails with a StorageError subclass.
 */
export interface StorageClient {
  /** Fetch one page of a bucket listing */
  listPage(request: ListPageRequest): Promise<ListPage>;

  /** List the buckets visible to the configured credentials */
  listBuckets(): Promise<BucketInfo[]>;

  /** Delete up to 1000 keys in one request */
  deleteObjects(bucket: string, keys: string[]): Promise<DeleteObjectsResult>;
}
