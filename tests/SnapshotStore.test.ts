import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SnapshotStore, SnapshotError } from '../src/clients/SnapshotStore';
import { Snapshot } from '../src/interfaces/Snapshot';

function snapshot(start: string, files: number): Snapshot {
  return {
    buckets: { alpha: { files, bytes: files * 10 } },
    metadata: { version: '1', start },
  };
}

describe('SnapshotStore', () => {
  let dir: string;
  let store: SnapshotStore;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 's3-tools-store-'));
    store = new SnapshotStore(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should list snapshot files newest first', async () => {
    await store.write(snapshot('2024-01-01T00:00:00Z', 1));
    await store.write(snapshot('2024-03-01T00:00:00Z', 3));
    await store.write(snapshot('2024-02-01T00:00:00Z', 2));
    writeFileSync(join(dir, 'notes.txt'), 'not a snapshot');
    mkdirSync(join(dir, 'nested.json'));

    await expect(store.list()).resolves.toEqual([
      '2024-03-01T00:00:00Z.json',
      '2024-02-01T00:00:00Z.json',
      '2024-01-01T00:00:00Z.json',
    ]);
  });

  it('should read back what it wrote', async () => {
    const original = snapshot('2024-01-01T00:00:00Z', 4);
    original.metadata.end = '2024-01-01T00:01:00Z';

    await store.write(original);

    await expect(store.load('2024-01-01T00:00:00Z.json')).resolves.toEqual(original);
  });

  it('should return the two newest snapshots', async () => {
    await store.write(snapshot('2024-01-01T00:00:00Z', 1));
    await store.write(snapshot('2024-02-01T00:00:00Z', 2));
    await store.write(snapshot('2024-03-01T00:00:00Z', 3));

    const { current, previous } = await store.latest();

    expect(current.metadata.start).toBe('2024-03-01T00:00:00Z');
    expect(previous?.metadata.start).toBe('2024-02-01T00:00:00Z');
  });

  it('should have no previous snapshot when there is only one', async () => {
    await store.write(snapshot('2024-01-01T00:00:00Z', 1));

    const { previous } = await store.latest();

    expect(previous).toBeUndefined();
  });

  it('should fail when there are no snapshots', async () => {
    await expect(store.latest()).rejects.toThrow(`No snapshots found in: ${dir}`);
  });

  it('should fail when the directory does not exist', async () => {
    const missing = new SnapshotStore(join(dir, 'missing'));

    await expect(missing.list()).rejects.toBeInstanceOf(SnapshotError);
  });

  it('should reject files that are not snapshots', async () => {
    const filePath = join(dir, 'bad.json');
    writeFileSync(
      filePath,
      JSON.stringify({ buckets: { alpha: { files: 'many' } }, metadata: { start: '2024-01-01T00:00:00Z' } })
    );

    await expect(store.load('bad.json')).rejects.toThrow(`${filePath} has invalid totals for bucket alpha`);
  });

  it('should reject a snapshot without a valid start time', async () => {
    const filePath = join(dir, 'bad.json');
    writeFileSync(filePath, JSON.stringify({ buckets: {}, metadata: { start: 'yesterday' } }));

    await expect(store.load('bad.json')).rejects.toThrow(`${filePath} has no valid start time`);
  });
});
