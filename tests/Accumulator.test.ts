import {
  Accumulator,
  AggregationError,
  aggregate,
  DEFAULT_HISTOGRAM_BOUNDARIES,
} from '../src/clients/Accumulator';
import { ObjectDescriptor } from '../src/interfaces/Enumeration';

function object(key: string, size: number): ObjectDescriptor {
  return { key, size, lastModified: new Date('2024-01-01T00:00:00Z') };
}

function accumulate(
  descriptors: ObjectDescriptor[],
  settings: ConstructorParameters<typeof Accumulator>[0] = {}
): Accumulator {
  const accumulator = new Accumulator(settings);
  descriptors.forEach(descriptor => accumulator.add(descriptor));
  return accumulator;
}

async function* streamOf(descriptors: ObjectDescriptor[]): AsyncGenerator<ObjectDescriptor> {
  for (const descriptor of descriptors) {
    yield descriptor;
  }
}

describe('Accumulator', () => {
  const objects = [
    object('logs/2024/a.gz', 1500),
    object('images/cat.jpg', 300),
    object('logs/2023/b.gz', 700),
    object('readme.txt', 12),
    object('images/dog.jpg', 0),
    object('archive/x.tar', 5000),
  ];

  describe('add', () => {
    it('should roll up objects by top-level prefix', () => {
      const summary = accumulate([
        object('a/1', 100),
        object('a/2', 200),
        object('b/1', 50),
      ]).toSummary();

      expect(summary.count).toBe(3);
      expect(summary.bytes).toBe(350);
      expect(summary.prefixes).toEqual([
        { prefix: 'a/', count: 2, bytes: 300 },
        { prefix: 'b/', count: 1, bytes: 50 },
      ]);
      expect(summary.other).toEqual({ count: 0, bytes: 0 });
    });

    it('should leave keys without a delimiter out of the prefix rollup', () => {
      const summary = accumulate([object('top.txt', 10), object('dir/nested.txt', 5)]).toSummary();

      expect(summary.count).toBe(2);
      expect(summary.prefixes).toEqual([{ prefix: 'dir/', count: 1, bytes: 5 }]);
    });

    it('should roll up every ancestor up to the configured depth', () => {
      const summary = accumulate(objects, { depth: 2 }).toSummary();

      expect(summary.prefixes).toEqual([
        { prefix: 'archive/', count: 1, bytes: 5000 },
        { prefix: 'images/', count: 2, bytes: 300 },
        { prefix: 'logs/', count: 2, bytes: 2200 },
        { prefix: 'logs/2023/', count: 1, bytes: 700 },
        { prefix: 'logs/2024/', count: 1, bytes: 1500 },
      ]);
    });

    it('should compute prefixes below the base prefix', () => {
      const accumulator = new Accumulator({ basePrefix: 'logs/', depth: 1 });

      expect(accumulator.prefixesOf('logs/2024/a.gz')).toEqual(['logs/2024/']);
      expect(accumulator.prefixesOf('logs/top.gz')).toEqual([]);
      expect(accumulator.prefixesOf('images/cat.jpg')).toEqual([]);
    });

    it('should track no prefixes at depth 0', () => {
      expect(accumulate(objects, { depth: 0 }).toSummary().prefixes).toEqual([]);
    });

    it('should keep byte totals exact up to the largest safe integer', () => {
      const accumulator = accumulate([object('a/huge-1', 2 ** 52), object('a/huge-2', 2 ** 52 - 1)]);

      expect(accumulator.bytes).toBe(Number.MAX_SAFE_INTEGER);
      expect(accumulator.toSummary().prefixes).toEqual([
        { prefix: 'a/', count: 2, bytes: Number.MAX_SAFE_INTEGER },
      ]);
    });

    it('should place sizes into power-of-two histogram buckets', () => {
      const summary = accumulate([
        object('zero', 0),
        object('one', 1),
        object('three', 3),
        object('kib', 1024),
      ]).toSummary();

      expect(summary.histogram).toEqual([
        { min: 0, max: 1, count: 1, bytes: 0 },
        { min: 1, max: 2, count: 1, bytes: 1 },
        { min: 2, max: 4, count: 1, bytes: 3 },
        { min: 1024, max: 2048, count: 1, bytes: 1024 },
      ]);
    });

    it('should put sizes beyond the last boundary into the open-ended bucket', () => {
      const huge = 2 ** 43;
      const summary = accumulate([object('huge', huge)]).toSummary();

      expect(summary.histogram).toEqual([
        { min: DEFAULT_HISTOGRAM_BOUNDARIES[42], max: null, count: 1, bytes: huge },
      ]);
    });
  });

  describe('prefix cap', () => {
    it('should keep the smallest prefixes and fold the rest into other', () => {
      const summary = accumulate(
        [object('c/1', 3), object('a/1', 1), object('d/1', 4), object('b/1', 2), object('a/2', 10)],
        { maxPrefixes: 2 }
      ).toSummary();

      expect(summary.prefixes).toEqual([
        { prefix: 'a/', count: 2, bytes: 11 },
        { prefix: 'b/', count: 1, bytes: 2 },
      ]);
      expect(summary.other).toEqual({ count: 2, bytes: 7 });
      expect(summary.count).toBe(5);
    });

    it('should give the same result for any input order', () => {
      const forward = accumulate(objects, { maxPrefixes: 2 }).toSummary();
      const backward = accumulate([...objects].reverse(), { maxPrefixes: 2 }).toSummary();

      expect(backward).toEqual(forward);
      expect(forward.prefixes.map(p => p.prefix)).toEqual(['archive/', 'images/']);
      expect(forward.other).toEqual({ count: 2, bytes: 2200 });
    });

    it('should never track more prefixes than the cap', () => {
      const many = Array.from({ length: 50 }, (_, i) => object(`p${String(i).padStart(2, '0')}/k`, 1));

      const accumulator = accumulate(many, { maxPrefixes: 5 });

      expect(accumulator.trackedPrefixes).toBe(5);
      expect(accumulator.toSummary().other).toEqual({ count: 45, bytes: 45 });
    });
  });

  describe('merge', () => {
    const settings = { maxPrefixes: 2, depth: 2 };
    const parts = [objects.slice(0, 2), objects.slice(2, 4), objects.slice(4)];

    it('should equal a single accumulator over all objects', () => {
      const merged = Accumulator.mergeAll(parts.map(part => accumulate(part, settings)));

      expect(merged.toSummary()).toEqual(accumulate(objects, settings).toSummary());
    });

    it('should be commutative', () => {
      const a = accumulate(parts[0], settings);
      const b = accumulate(parts[1], settings);

      expect(Accumulator.merge(a, b).toSummary()).toEqual(Accumulator.merge(b, a).toSummary());
    });

    it('should be associative', () => {
      const [a, b, c] = parts.map(part => accumulate(part, settings));

      const left = Accumulator.merge(Accumulator.merge(a, b), c);
      const right = Accumulator.merge(a, Accumulator.merge(b, c));

      expect(left.toSummary()).toEqual(right.toSummary());
    });

    it('should leave its inputs untouched', () => {
      const a = accumulate(parts[0], settings);
      const before = a.toSummary();

      Accumulator.merge(a, accumulate(parts[1], settings));

      expect(a.toSummary()).toEqual(before);
    });

    it('should treat an empty accumulator as identity', () => {
      const a = accumulate(objects, settings);

      expect(Accumulator.merge(a, new Accumulator(settings)).toSummary()).toEqual(a.toSummary());
    });

    it('should refuse to merge accumulators with different settings', () => {
      expect(() =>
        Accumulator.merge(new Accumulator({ depth: 1 }), new Accumulator({ depth: 2 }))
      ).toThrow(AggregationError);
    });

    it('should return an empty accumulator when there is nothing to merge', () => {
      const merged = Accumulator.mergeAll([], { depth: 3 });

      expect(merged.count).toBe(0);
      expect(merged.settings.depth).toBe(3);
    });
  });

  describe('settings', () => {
    it('should reject invalid settings', () => {
      expect(() => new Accumulator({ delimiter: '' })).toThrow('Delimiter must not be empty');
      expect(() => new Accumulator({ depth: -1 })).toThrow(AggregationError);
      expect(() => new Accumulator({ histogramBoundaries: [4, 2] })).toThrow(
        'Histogram boundaries must be positive and strictly ascending'
      );
    });
  });

  describe('aggregate', () => {
    it('should drain a stream into a new accumulator', async () => {
      const accumulator = await aggregate(streamOf(objects));

      expect(accumulator.count).toBe(6);
      expect(accumulator.bytes).toBe(7512);
    });

    it('should add to the accumulator it is given', async () => {
      const existing = accumulate([object('a/1', 1)]);

      const result = await aggregate(streamOf([object('a/2', 2)]), existing);

      expect(result).toBe(existing);
      expect(result.toSummary().prefixes).toEqual([{ prefix: 'a/', count: 2, bytes: 3 }]);
    });
  });
});
