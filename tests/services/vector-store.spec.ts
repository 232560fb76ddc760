import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ValidationError } from '../../src/core/errors.js';
import { createDatabase, loadVectorExtension, type SqliteDatabase } from '../../src/services/db.js';
import { VectorStore, cosineSimilarity, widenFilteredSearch } from '../../src/services/vector-store.js';
import type { ScoredVectorRecord, VectorBackend, VectorRecord } from '../../src/types/vector.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

class FakeNativeBackend implements VectorBackend {
  readonly origin = 'native' as const;
  readonly records = new Map<string, VectorRecord>();
  queries = 0;
  failQueries = false;
  probeError: Error | null = null;

  probe(): boolean {
    if (this.probeError) throw this.probeError;
    return true;
  }

  async upsert(record: VectorRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  async query(vector: readonly number[], limit: number): Promise<ScoredVectorRecord[]> {
    this.queries += 1;
    if (this.failQueries) throw new Error('vec0 index corrupted');
    return [...this.records.values()]
      .map((record) => ({ record, score: cosineSimilarity(vector, record.embedding) }))
      .sort((left, right) => right.score - left.score)
      .slice(0, limit);
  }

  async remove(ids: readonly string[]): Promise<number> {
    return ids.filter((id) => this.records.delete(id)).length;
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}

function sequentialClock(start = 1_700_000_000_000) {
  let current = start;
  return () => current++;
}

describe('cosineSimilarity', () => {
  it('is 1 for parallel, 0 for orthogonal and -1 for opposite vectors', () => {
    expect(cosineSimilarity([2, 0, 0], [5, 0, 0])).toBe(1);
    expect(cosineSimilarity([1, 0, 0], [0, 3, 0])).toBe(0);
    expect(cosineSimilarity([1, 0, 0], [-1, 0, 0])).toBe(-1);
  });

  it('is 0 when either vector has zero magnitude', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });
});

describe('VectorStore (brute-force fallback)', () => {
  let db: SqliteDatabase;
  let store: VectorStore;

  beforeEach(async () => {
    db = createDatabase(':memory:');
    store = new VectorStore({ db, dimensions: 3, defaultK: 2, maxK: 3, nativeEnabled: false, now: sequentialClock() });
    await store.upsert('east', [1, 0, 0], { sessionId: 's1' });
    await store.upsert('north-east', [0.6, 0.8, 0], { sessionId: 's2' });
    await store.upsert('north', [0, 1, 0], { sessionId: 's1' });
    await store.upsert('west', [-1, 0, 0], { sessionId: 's1' });
  });

  afterEach(() => {
    db.close();
  });

  it('ranks records by cosine similarity to the query', async () => {
    const results = await store.query([1, 0, 0], 3);

    expect(results.map(({ record }) => record.id)).toEqual(['east', 'north-east', 'north']);
    expect(results[0]?.score).toBe(1);
    expect(results[1]?.score).toBeCloseTo(0.6, 10);
    expect(results[2]?.score).toBe(0);
  });

  it('uses the default k and caps k at the maximum', async () => {
    expect(await store.query([1, 0, 0])).toHaveLength(2);
    expect(await store.query([1, 0, 0], 50)).toHaveLength(3);
  });

  it('applies metadata filters before taking the top k', async () => {
    const results = await store.query([1, 0, 0], 2, { sessionId: 's1' });

    expect(results.map(({ record }) => record.id)).toEqual(['east', 'north']);
  });

  it('breaks score ties with the most recent record first', async () => {
    await store.upsert('east-again', [3, 0, 0]);

    const results = await store.query([1, 0, 0], 2);

    expect(results.map(({ record }) => record.id)).toEqual(['east-again', 'east']);
  });

  it('replaces a record on upsert with the same id', async () => {
    await store.upsert('west', [1, 0, 0], { sessionId: 's3' });

    const [top] = await store.query([1, 0, 0], 1, { sessionId: 's3' });

    expect(top?.record.id).toBe('west');
    expect((await store.status()).records).toBe(4);
  });

  it('rejects vectors of the wrong dimension or with non-finite values', async () => {
    await expect(store.upsert('bad', [1, 0], {})).rejects.toBeInstanceOf(ValidationError);
    await expect(store.query([1, 0, 0, 0])).rejects.toBeInstanceOf(ValidationError);
    await expect(store.upsert('nan', [Number.NaN, 0, 0], {})).rejects.toBeInstanceOf(ValidationError);
  });

  it('removes records by id and ignores unknown ids', async () => {
    expect(await store.remove(['east', 'missing'])).toBe(1);

    const results = await store.query([1, 0, 0], 3);
    expect(results.map(({ record }) => record.id)).toEqual(['north-east', 'north', 'west']);
    expect((await store.status()).records).toBe(3);
  });

  it('reports the fallback backend in its status', async () => {
    expect(await store.status()).toEqual({
      backendOrigin: 'fallback',
      nativeAvailable: false,
      downgradedAt: null,
      downgradeReason: null,
      dimensions: 3,
      records: 4,
    });
  });
});

describe('VectorStore native backend selection', () => {
  let db: SqliteDatabase;

  beforeEach(() => {
    db = createDatabase(':memory:');
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    db.close();
    vi.restoreAllMocks();
  });

  it('uses the native backend when its probe succeeds', async () => {
    const native = new FakeNativeBackend();
    const store = new VectorStore({ db, dimensions: 3, native });

    const written = await store.upsert('east', [1, 0, 0]);
    const results = await store.query([1, 0, 0], 1);

    expect(store.backendOrigin).toBe('native');
    expect(written.backendOrigin).toBe('native');
    expect(native.records.has('east')).toBe(true);
    expect(native.queries).toBe(1);
    expect(results.map(({ record }) => record.id)).toEqual(['east']);
  });

  it('removes records from the native index as well as the relational table', async () => {
    const native = new FakeNativeBackend();
    const store = new VectorStore({ db, dimensions: 3, native });
    await store.upsert('east', [1, 0, 0]);
    await store.upsert('north', [0, 1, 0]);

    expect(await store.remove(['east'])).toBe(1);

    expect([...native.records.keys()]).toEqual(['north']);
    expect((await store.status()).records).toBe(1);
  });

  it('falls back from the start when the probe throws', async () => {
    const native = new FakeNativeBackend();
    native.probeError = new Error('extension not found');

    const store = new VectorStore({ db, dimensions: 3, native });

    expect(store.backendOrigin).toBe('fallback');
    expect((await store.status()).nativeAvailable).toBe(false);
  });

  it('downgrades permanently after a native failure and still answers from the fallback', async () => {
    const native = new FakeNativeBackend();
    const store = new VectorStore({ db, dimensions: 3, native, now: () => 1_700_000_000_000 });
    await store.upsert('east', [1, 0, 0]);
    await store.upsert('north', [0, 1, 0]);
    native.failQueries = true;

    const results = await store.query([1, 0, 0], 1);

    expect(results.map(({ record }) => record.id)).toEqual(['east']);
    expect(await store.status()).toMatchObject({
      backendOrigin: 'fallback',
      nativeAvailable: true,
      downgradedAt: '2023-11-14T22:13:20.000Z',
      downgradeReason: 'vec0 index corrupted',
    });

    native.failQueries = false;
    await store.query([0, 1, 0], 1);
    expect(native.queries).toBe(1);
  });
});

describe('widenFilteredSearch', () => {
  function rankedAt(i: number): ScoredVectorRecord {
    return {
      record: {
        id: `r${i}`,
        embedding: [1, 0, 0],
        metadata: { topic: i === 15 || i === 18 ? 'rare' : 'noise' },
        createdAt: i,
        backendOrigin: 'native',
      },
      score: 1 - i / 100,
    };
  }
  const ranked = Array.from({ length: 20 }, (_, i) => rankedAt(i));

  function searchSpy() {
    return vi.fn((candidates: number) => ranked.slice(0, candidates));
  }

  it('doubles the candidate count until enough records pass the filter', () => {
    const search = searchSpy();

    const matches = widenFilteredSearch(search, {
      limit: 2,
      filter: { topic: 'rare' },
      total: 20,
      initialCandidates: 8,
      maxCandidates: 4096,
    });

    expect(matches?.map((match) => match.record.id)).toEqual(['r15', 'r18']);
    expect(search.mock.calls.map(([candidates]) => candidates)).toEqual([8, 16, 20]);
  });

  it('returns what it found once the whole index has been searched', () => {
    const search = searchSpy();

    const matches = widenFilteredSearch(search, {
      limit: 5,
      filter: { topic: 'rare' },
      total: 20,
      initialCandidates: 8,
      maxCandidates: 4096,
    });

    expect(matches?.map((match) => match.record.id)).toEqual(['r15', 'r18']);
  });

  it('gives up with null when the widest search still leaves entries unseen', () => {
    const matches = widenFilteredSearch(searchSpy(), {
      limit: 2,
      filter: { topic: 'rare' },
      total: 20,
      initialCandidates: 8,
      maxCandidates: 10,
    });

    expect(matches).toBeNull();
  });
});

const sqliteVecLoads = (() => {
  const scratch = createDatabase(':memory:');
  try {
    loadVectorExtension(scratch);
    return true;
  } catch {
    return false;
  } finally {
    scratch.close();
  }
})();

describe.runIf(sqliteVecLoads)('VectorStore with sqlite-vec', () => {
  async function seed(store: VectorStore): Promise<void> {
    for (let i = 0; i < 30; i += 1) {
      await store.upsert(`noise-${i}`, [1, i * 0.01, 0], { topic: 'noise' });
    }
    await store.upsert('rare-a', [0, 1, 0], { topic: 'rare' });
    await store.upsert('rare-b', [-1, 0.2, 0], { topic: 'rare' });
  }

  it('returns as many sparse filter matches as the brute-force scan', async () => {
    const nativeDb = createDatabase(':memory:');
    const scanDb = createDatabase(':memory:');
    const native = new VectorStore({ db: nativeDb, dimensions: 3, now: sequentialClock() });
    const scan = new VectorStore({ db: scanDb, dimensions: 3, nativeEnabled: false, now: sequentialClock() });
    await seed(native);
    await seed(scan);

    const nativeIds = (await native.query([1, 0, 0], 2, { topic: 'rare' })).map((match) => match.record.id);
    const scanIds = (await scan.query([1, 0, 0], 2, { topic: 'rare' })).map((match) => match.record.id);

    expect(native.backendOrigin).toBe('native');
    expect(nativeIds).toEqual(['rare-a', 'rare-b']);
    expect(nativeIds).toEqual(scanIds);
    nativeDb.close();
    scanDb.close();
  });
});
