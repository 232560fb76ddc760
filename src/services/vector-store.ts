import { ValidationError } from '../core/errors.js';
import type {
  ScoredVectorRecord,
  VectorBackend,
  VectorBackendOrigin,
  VectorFilter,
  VectorMetadata,
  VectorRecord,
  VectorStoreStatus,
} from '../types/vector.js';
import { logThought } from '../utils/logger.js';
import { withTimeout } from '../utils/retry.js';
import { loadVectorExtension, type SqliteDatabase } from './db.js';

/** Cosine similarity of two equal-length vectors; 0 when either has zero magnitude. */
export function cosineSimilarity(left: readonly number[], right: readonly number[]): number {
  let dot = 0;
  let leftNorm = 0;
  let rightNorm = 0;
  for (let i = 0; i < left.length; i++) {
    const a = left[i] ?? 0;
    const b = right[i] ?? 0;
    dot += a * b;
    leftNorm += a * a;
    rightNorm += b * b;
  }
  if (leftNorm === 0 || rightNorm === 0) {
    return 0;
  }
  return dot / (Math.sqrt(leftNorm) * Math.sqrt(rightNorm));
}

/** Score descending, then most recent first. */
export function compareScored(left: ScoredVectorRecord, right: ScoredVectorRecord): number {
  if (right.score !== left.score) {
    return right.score - left.score;
  }
  return right.record.createdAt - left.record.createdAt;
}

export function matchesFilter(metadata: VectorMetadata, filter: VectorFilter | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, value]) => metadata[key] === value);
}

interface VectorRow {
  id: string;
  embedding_json: string;
  metadata_json: string;
  created_at: number;
  backend_origin: string;
}

function isVectorRow(value: unknown): value is VectorRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'embedding_json' in value &&
    typeof value.embedding_json === 'string' &&
    'metadata_json' in value &&
    typeof value.metadata_json === 'string' &&
    'created_at' in value &&
    typeof value.created_at === 'number'
  );
}

function parseEmbedding(json: string): number[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed)) {
    return [];
  }
  return parsed.filter((value): value is number => typeof value === 'number');
}

function parseMetadata(json: string): VectorMetadata {
  const parsed: unknown = JSON.parse(json);
  const metadata: VectorMetadata = {};
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return metadata;
  }
  for (const [key, value] of Object.entries(parsed)) {
    if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      metadata[key] = value;
    }
  }
  return metadata;
}

function toRecord(row: VectorRow): VectorRecord {
  return {
    id: row.id,
    embedding: parseEmbedding(row.embedding_json),
    metadata: parseMetadata(row.metadata_json),
    createdAt: row.created_at,
    backendOrigin: row.backend_origin === 'native' ? 'native' : 'fallback',
  };
}

/**
 * Brute-force backend over the relational `vector_records` table.
 * Always available; every upsert lands here regardless of the active backend.
 */
export class FallbackVectorBackend implements VectorBackend {
  readonly origin = 'fallback' as const;
  readonly #db: SqliteDatabase;

  constructor(db: SqliteDatabase) {
    this.#db = db;
  }

  probe(): boolean {
    return true;
  }

  async upsert(record: VectorRecord): Promise<void> {
    this.#db
      .prepare(
        `INSERT INTO vector_records (id, embedding_json, metadata_json, created_at, backend_origin)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           embedding_json = excluded.embedding_json,
           metadata_json = excluded.metadata_json,
           created_at = excluded.created_at,
           backend_origin = excluded.backend_origin`,
      )
      .run(record.id, JSON.stringify(record.embedding), JSON.stringify(record.metadata), record.createdAt, record.backendOrigin);
  }

  async query(vector: readonly number[], limit: number, filter?: VectorFilter): Promise<ScoredVectorRecord[]> {
    const rows: unknown[] = this.#db.prepare('SELECT * FROM vector_records').all();
    const scored: ScoredVectorRecord[] = [];
    for (const row of rows) {
      if (!isVectorRow(row)) continue;
      const record = toRecord(row);
      if (!matchesFilter(record.metadata, filter)) continue;
      scored.push({ record, score: cosineSimilarity(vector, record.embedding) });
    }
    return scored.sort(compareScored).slice(0, limit);
  }

  async remove(ids: readonly string[]): Promise<number> {
    const statement = this.#db.prepare('DELETE FROM vector_records WHERE id = ?');
    const removeAll = this.#db.transaction((targets: readonly string[]) =>
      targets.reduce((removed, id) => removed + statement.run(id).changes, 0),
    );
    return removeAll(ids);
  }

  async count(): Promise<number> {
    const row: unknown = this.#db.prepare('SELECT COUNT(*) AS total FROM vector_records').get();
    if (typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number') {
      return row.total;
    }
    return 0;
  }
}

/** Largest `k` a single vec0 KNN query accepts. */
export const MAX_KNN_CANDIDATES = 4096;

export interface FilteredSearchOptions {
  limit: number;
  filter: VectorFilter;
  /** Entries in the index; a search this wide has seen everything. */
  total: number;
  initialCandidates: number;
  maxCandidates: number;
}

/**
 * Runs `search` with a doubling candidate count until `limit` results pass the
 * filter or the index is exhausted. Null when even `maxCandidates` falls short
 * of an index that still has unseen entries.
 */
export function widenFilteredSearch(
  search: (candidates: number) => ScoredVectorRecord[],
  options: FilteredSearchOptions,
): ScoredVectorRecord[] | null {
  let candidates = Math.max(1, options.limit, options.initialCandidates);
  for (;;) {
    const fetched = Math.min(candidates, options.total, options.maxCandidates);
    const matches = search(fetched).filter((match) => matchesFilter(match.record.metadata, options.filter));
    if (matches.length >= options.limit || fetched >= options.total) {
      return matches.sort(compareScored).slice(0, options.limit);
    }
    if (fetched >= options.maxCandidates) {
      return null;
    }
    candidates *= 2;
  }
}

/**
 * sqlite-vec `vec0` index (cosine distance) living in the same database.
 * Index rowids map back to `vector_records.native_rowid`, so the relational
 * row must be written before the index entry.
 */
export class SqliteVecBackend implements VectorBackend {
  readonly origin = 'native' as const;
  readonly #db: SqliteDatabase;
  readonly #dimensions: number;
  readonly #scan: FallbackVectorBackend;
  /** Index candidates first fetched per requested result when a metadata filter is applied. */
  readonly #filterOverfetch = 4;

  constructor(db: SqliteDatabase, dimensions: number) {
    this.#db = db;
    this.#dimensions = dimensions;
    this.#scan = new FallbackVectorBackend(db);
  }

  probe(): boolean {
    const version = loadVectorExtension(this.#db);
    this.#db.exec(
      `CREATE VIRTUAL TABLE IF NOT EXISTS vec_index USING vec0(
        embedding float[${this.#dimensions}] distance_metric=cosine
      )`,
    );
    this.#backfill();
    console.log(`[VectorStore] sqlite-vec ${version} loaded (${this.#dimensions} dimensions).`);
    return true;
  }

  async upsert(record: VectorRecord): Promise<void> {
    const write = this.#db.transaction(() => {
      this.#index(record.id, record.embedding);
    });
    write();
  }

  async query(vector: readonly number[], limit: number, filter?: VectorFilter): Promise<ScoredVectorRecord[]> {
    if (!filter) {
      return this.#nearest(vector, limit);
    }
    const total = await this.count();
    if (total === 0) {
      return [];
    }
    const widened = widenFilteredSearch((candidates) => this.#nearest(vector, candidates), {
      limit,
      filter,
      total,
      initialCandidates: limit * this.#filterOverfetch,
      maxCandidates: MAX_KNN_CANDIDATES,
    });
    // Matches too sparse for the widest KNN query: score every row instead.
    return widened ?? this.#scan.query(vector, limit, filter);
  }

  /** Index entries only; the relational rows belong to the fallback backend. */
  async remove(ids: readonly string[]): Promise<number> {
    const lookup = this.#db.prepare('SELECT native_rowid FROM vector_records WHERE id = ?');
    const drop = this.#db.prepare('DELETE FROM vec_index WHERE rowid = ?');
    const removeAll = this.#db.transaction((targets: readonly string[]) => {
      let removed = 0;
      for (const id of targets) {
        const row: unknown = lookup.get(id);
        if (typeof row === 'object' && row !== null && 'native_rowid' in row && typeof row.native_rowid === 'number') {
          removed += drop.run(row.native_rowid).changes;
        }
      }
      return removed;
    });
    return removeAll(ids);
  }

  async count(): Promise<number> {
    const row: unknown = this.#db.prepare('SELECT COUNT(*) AS total FROM vec_index').get();
    if (typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number') {
      return row.total;
    }
    return 0;
  }

  #nearest(vector: readonly number[], candidates: number): ScoredVectorRecord[] {
    const rows: unknown[] = this.#db
      .prepare(
        `SELECT r.*, v.distance AS distance
         FROM (
           SELECT rowid, distance FROM vec_index
           WHERE embedding MATCH ?
           ORDER BY distance ASC
           LIMIT ?
         ) v
         JOIN vector_records r ON r.native_rowid = v.rowid`,
      )
      .all(JSON.stringify(vector), candidates);

    const scored: ScoredVectorRecord[] = [];
    for (const row of rows) {
      if (!isVectorRow(row) || !('distance' in row) || typeof row.distance !== 'number') continue;
      scored.push({ record: toRecord(row), score: 1 - row.distance });
    }
    return scored.sort(compareScored);
  }

  #index(id: string, embedding: readonly number[]): void {
    const existing: unknown = this.#db.prepare('SELECT native_rowid FROM vector_records WHERE id = ?').get(id);
    if (
      typeof existing === 'object' &&
      existing !== null &&
      'native_rowid' in existing &&
      typeof existing.native_rowid === 'number'
    ) {
      this.#db.prepare('DELETE FROM vec_index WHERE rowid = ?').run(existing.native_rowid);
    }

    const inserted = this.#db.prepare('INSERT INTO vec_index (embedding) VALUES (?)').run(JSON.stringify(embedding));
    this.#db
      .prepare("UPDATE vector_records SET native_rowid = ?, backend_origin = 'native' WHERE id = ?")
      .run(Number(inserted.lastInsertRowid), id);
  }

  /** Index relational rows written while the native backend was unavailable. */
  #backfill(): void {
    const rows: unknown[] = this.#db
      .prepare('SELECT * FROM vector_records WHERE native_rowid IS NULL')
      .all();
    const fill = this.#db.transaction(() => {
      for (const row of rows) {
        if (!isVectorRow(row)) continue;
        const embedding = parseEmbedding(row.embedding_json);
        if (embedding.length === this.#dimensions) {
          this.#index(row.id, embedding);
        }
      }
    });
    fill();
  }
}

export interface VectorStoreOptions {
  db: SqliteDatabase;
  dimensions: number;
  /** @default 5 */
  defaultK?: number;
  /** @default 50 */
  maxK?: number;
  /** @default 5000 */
  timeoutMs?: number;
  /** Try the native backend at all. @default true */
  nativeEnabled?: boolean;
  /** Native backend to probe; defaults to sqlite-vec on `db`. */
  native?: VectorBackend;
  now?: () => number;
}

/**
 * Similarity search with a native ANN backend and a brute-force fallback.
 *
 * The backend is chosen once by probing the native one. Any native failure
 * afterwards switches to the fallback for the rest of the process lifetime.
 */
export class VectorStore {
  readonly #fallback: FallbackVectorBackend;
  readonly #native: VectorBackend | null;
  readonly #dimensions: number;
  readonly #defaultK: number;
  readonly #maxK: number;
  readonly #timeoutMs: number;
  readonly #now: () => number;

  #origin: VectorBackendOrigin = 'fallback';
  #nativeAvailable = false;
  #downgradedAt: string | null = null;
  #downgradeReason: string | null = null;

  constructor(options: VectorStoreOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new ValidationError(`Vector dimensions must be a positive integer, got ${options.dimensions}.`);
    }
    this.#dimensions = options.dimensions;
    this.#maxK = Math.max(1, Math.floor(options.maxK ?? 50));
    this.#defaultK = Math.min(this.#maxK, Math.max(1, Math.floor(options.defaultK ?? 5)));
    this.#timeoutMs = Math.max(1, options.timeoutMs ?? 5_000);
    this.#now = options.now ?? (() => Date.now());
    this.#fallback = new FallbackVectorBackend(options.db);

    const nativeEnabled = options.nativeEnabled ?? true;
    this.#native = nativeEnabled ? (options.native ?? new SqliteVecBackend(options.db, options.dimensions)) : null;
    if (this.#native) {
      try {
        this.#nativeAvailable = this.#native.probe();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        console.warn(`[VectorStore] Native backend unavailable, using brute-force fallback: ${message}`);
        void logThought(`[VectorStore] Native probe failed: ${message}`);
      }
    }
    this.#origin = this.#nativeAvailable ? 'native' : 'fallback';
  }

  get backendOrigin(): VectorBackendOrigin {
    return this.#origin;
  }

  get dimensions(): number {
    return this.#dimensions;
  }

  async upsert(id: string, vector: readonly number[], metadata: VectorMetadata = {}): Promise<VectorRecord> {
    if (!id.trim()) {
      throw new ValidationError('Vector record id must be a non-empty string.');
    }
    this.#assertVector(vector);

    const record: VectorRecord = {
      id,
      embedding: [...vector],
      metadata: { ...metadata },
      createdAt: this.#now(),
      backendOrigin: this.#origin,
    };

    await this.#fallback.upsert({ ...record, backendOrigin: 'fallback' });
    const native = this.#activeNative();
    if (native) {
      try {
        await withTimeout(() => native.upsert(record), this.#timeoutMs, 'vector:upsert');
      } catch (error) {
        this.#downgrade(error);
        return { ...record, backendOrigin: 'fallback' };
      }
    }
    return record;
  }

  /** Top `k` records by cosine similarity; `k` is capped at the configured maximum. */
  async query(vector: readonly number[], k: number = this.#defaultK, filter?: VectorFilter): Promise<ScoredVectorRecord[]> {
    this.#assertVector(vector);
    const limit = Math.min(this.#maxK, Math.max(1, Math.floor(Number.isFinite(k) ? k : this.#defaultK)));

    const native = this.#activeNative();
    if (native) {
      try {
        return await withTimeout(() => native.query(vector, limit, filter), this.#timeoutMs, 'vector:query');
      } catch (error) {
        this.#downgrade(error);
      }
    }
    return withTimeout(() => this.#fallback.query(vector, limit, filter), this.#timeoutMs, 'vector:query');
  }

  /**
   * Deletes records from the native index first, since it is keyed through the
   * relational rows, then from the relational table. Returns relational rows removed.
   */
  async remove(ids: readonly string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const native = this.#activeNative();
    if (native) {
      try {
        await withTimeout(() => native.remove(ids), this.#timeoutMs, 'vector:remove');
      } catch (error) {
        this.#downgrade(error);
      }
    }
    return withTimeout(() => this.#fallback.remove(ids), this.#timeoutMs, 'vector:remove');
  }

  async status(): Promise<VectorStoreStatus> {
    return {
      backendOrigin: this.#origin,
      nativeAvailable: this.#nativeAvailable,
      downgradedAt: this.#downgradedAt,
      downgradeReason: this.#downgradeReason,
      dimensions: this.#dimensions,
      records: await this.#fallback.count(),
    };
  }

  #activeNative(): VectorBackend | null {
    return this.#origin === 'native' ? this.#native : null;
  }

  #assertVector(vector: readonly number[]): void {
    if (vector.length !== this.#dimensions) {
      throw new ValidationError(`Expected a ${this.#dimensions}-dimensional vector, got ${vector.length}.`);
    }
    if (!vector.every((value) => Number.isFinite(value))) {
      throw new ValidationError('Vector contains a non-finite component.');
    }
  }

  #downgrade(error: unknown): void {
    if (this.#origin === 'fallback') return;
    const message = error instanceof Error ? error.message : String(error);
    this.#origin = 'fallback';
    this.#downgradedAt = new Date(this.#now()).toISOString();
    this.#downgradeReason = message;
    console.warn(`[VectorStore] Native backend failed, switching to brute-force fallback permanently: ${message}`);
    void logThought(`[VectorStore] Downgraded to fallback: ${message}`);
  }
}
