import { promises as fs } from 'fs';
import { join } from 'path';
import { Snapshot, BucketTotals } from '../interfaces/Snapshot';

export class SnapshotError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'SnapshotError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

function isBucketTotals(value: unknown): value is BucketTotals {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const files: unknown = Reflect.get(value, 'files');
  const bytes: unknown = Reflect.get(value, 'bytes');
  return typeof files === 'number' && typeof bytes === 'number';
}

function parseSnapshot(value: unknown, source: string): Snapshot {
  if (typeof value !== 'object' || value === null) {
    throw new SnapshotError(`${source} does not contain a snapshot`, 'load');
  }
  const buckets: unknown = Reflect.get(value, 'buckets');
  const metadata: unknown = Reflect.get(value, 'metadata');
  if (typeof buckets !== 'object' || buckets === null || typeof metadata !== 'object' || metadata === null) {
    throw new SnapshotError(`${source} does not contain a snapshot`, 'load');
  }

  const start: unknown = Reflect.get(metadata, 'start');
  const end: unknown = Reflect.get(metadata, 'end');
  if (typeof start !== 'string' || Number.isNaN(Date.parse(start))) {
    throw new SnapshotError(`${source} has no valid start time`, 'load');
  }

  const snapshot: Snapshot = {
    buckets: {},
    metadata: { version: '1', start },
  };
  if (typeof end === 'string') {
    snapshot.metadata.end = end;
  }
  for (const [name, totals] of Object.entries(buckets)) {
    if (!isBucketTotals(totals)) {
      throw new SnapshotError(`${source} has invalid totals for bucket ${name}`, 'load');
    }
    snapshot.buckets[name] = { files: totals.files, bytes: totals.bytes };
  }
  return snapshot;
}

/**
 * Snapshot files in one directory, named after their start time so that
 * name order is time order
 */
export class SnapshotStore {
  constructor(readonly directory: string) {}

  async write(snapshot: Snapshot): Promise<string> {
    const filePath = join(this.directory, `${snapshot.metadata.start}.json`);
    try {
      await fs.mkdir(this.directory, { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(snapshot, null, 2)}\n`, 'utf8');
    } catch (error) {
      throw new SnapshotError(
        `Failed to write snapshot ${filePath}`,
        'write',
        error instanceof Error ? error : undefined
      );
    }
    return filePath;
  }

  /**
   * Snapshot file names, newest first
   */
  async list(): Promise<string[]> {
    const entries = await fs
      .readdir(this.directory, { withFileTypes: true })
      .catch((error: unknown) => {
        throw new SnapshotError(
          `Cannot read snapshot directory ${this.directory}`,
          'list',
          error instanceof Error ? error : undefined
        );
      });
    return entries
      .filter(entry => entry.isFile() && entry.name.endsWith('.json'))
      .map(entry => entry.name)
      .sort()
      .reverse();
  }

  async load(fileName: string): Promise<Snapshot> {
    const filePath = join(this.directory, fileName);
    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
    } catch (error) {
      throw new SnapshotError(
        `Cannot read snapshot ${filePath}`,
        'load',
        error instanceof Error ? error : undefined
      );
    }
    return parseSnapshot(parsed, filePath);
  }

  /**
   * The newest snapshot and the one before it, if any
   */
  async latest(): Promise<{ current: Snapshot; previous?: Snapshot }> {
    const files = await this.list();
    if (files.length === 0) {
      throw new SnapshotError(`No snapshots found in: ${this.directory}`, 'compare');
    }
    const current = await this.load(files[0]);
    const previous = files.length >= 2 ? await this.load(files[1]) : undefined;
    return { current, previous };
  }
}
