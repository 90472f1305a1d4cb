/**
 * Immutable description of one stored object
 */
export interface ObjectDescriptor {
  readonly key: string;
  readonly size: number;
  readonly lastModified: Date;
  readonly etag?: string;
}

/**
 * Position within a listing, sufficient to resume it
 */
export interface ListingCursor {
  bucket: string;
  prefix: string;

  /** Resume at a page boundary */
  continuationToken?: string;

  /** Resume after this key */
  startAfter?: string;
}

export interface ObjectFilter {
  /** Keys must start with this; also sent to the server */
  prefix?: string;

  /** Keys must end with this */
  suffix?: string;

  /** Inclusive lower bound on lastModified */
  modifiedAfter?: Date;

  /** Exclusive upper bound on lastModified */
  modifiedBefore?: Date;

  /** Skip keys ending in "/", the placeholders consoles create for folders */
  excludeFolderMarkers?: boolean;
}

export interface EnumerationOptions {
  bucket: string;
  filter?: ObjectFilter;

  /** List only the entries directly below the prefix */
  delimiter?: string;

  /** Resume a previous enumeration */
  cursor?: ListingCursor;

  pageSize?: number;

  /** Checked between pages */
  signal?: AbortSignal;
}
