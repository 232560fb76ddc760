import { CancelledError, ValidationError } from '../../core/errors.js';
import type { Entity, Repository, SyncState } from '../../types/persistence.js';
import type { SqliteDatabase } from '../db.js';
import { assertStorableEntity, isEntityKind, isSyncState, type PayloadParser } from './entity-codec.js';

interface EntityRow {
  id: string;
  owner_session_id: string;
  kind: string;
  payload_json: string;
  created_at: string;
  sync_state: string;
}

function isEntityRow(value: unknown): value is EntityRow {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'owner_session_id' in value &&
    typeof value.owner_session_id === 'string' &&
    'kind' in value &&
    'payload_json' in value &&
    typeof value.payload_json === 'string' &&
    'created_at' in value &&
    typeof value.created_at === 'string' &&
    'sync_state' in value
  );
}

/**
 * Local backup tier: one row per entity in the `entities` table.
 * better-sqlite3 is synchronous, so every method resolves on the same tick.
 */
export class SqliteRepository<P> implements Repository<P> {
  readonly name: string;
  readonly #db: SqliteDatabase;
  readonly #parsePayload: PayloadParser<P>;

  constructor(db: SqliteDatabase, parsePayload: PayloadParser<P>, name = 'sqlite') {
    this.#db = db;
    this.#parsePayload = parsePayload;
    this.name = name;
  }

  async findById(id: string, signal?: AbortSignal): Promise<Entity<P> | null> {
    throwIfAborted(signal, this.name);
    const row: unknown = this.#db.prepare('SELECT * FROM entities WHERE id = ?').get(id);
    return row === undefined ? null : this.#toEntity(row);
  }

  async save(entity: Entity<P>, signal?: AbortSignal): Promise<Entity<P>> {
    throwIfAborted(signal, this.name);
    assertStorableEntity(entity);

    this.#db
      .prepare(
        `INSERT INTO entities (id, owner_session_id, kind, payload_json, created_at, sync_state, updated_at)
         VALUES (@id, @ownerSessionId, @kind, @payloadJson, @createdAt, @syncState, CURRENT_TIMESTAMP)
         ON CONFLICT(id) DO UPDATE SET
           owner_session_id = excluded.owner_session_id,
           kind = excluded.kind,
           payload_json = excluded.payload_json,
           created_at = excluded.created_at,
           sync_state = excluded.sync_state,
           updated_at = CURRENT_TIMESTAMP`,
      )
      .run({
        id: entity.id,
        ownerSessionId: entity.ownerSessionId,
        kind: entity.kind,
        payloadJson: JSON.stringify(entity.payload),
        createdAt: entity.createdAt,
        syncState: entity.syncState,
      });
    return entity;
  }

  async delete(id: string, signal?: AbortSignal): Promise<boolean> {
    throwIfAborted(signal, this.name);
    const result = this.#db.prepare('DELETE FROM entities WHERE id = ?').run(id);
    return result.changes > 0;
  }

  async listBySession(sessionId: string, limit: number, signal?: AbortSignal): Promise<Entity<P>[]> {
    throwIfAborted(signal, this.name);
    const rows: unknown[] = this.#db
      .prepare('SELECT * FROM entities WHERE owner_session_id = ? ORDER BY created_at DESC, rowid DESC LIMIT ?')
      .all(sessionId, clampLimit(limit));
    return rows.map((row) => this.#toEntity(row));
  }

  async listBySyncState(state: SyncState, limit: number, signal?: AbortSignal): Promise<Entity<P>[]> {
    throwIfAborted(signal, this.name);
    const rows: unknown[] = this.#db
      .prepare('SELECT * FROM entities WHERE sync_state = ? ORDER BY created_at ASC, rowid ASC LIMIT ?')
      .all(state, clampLimit(limit));
    return rows.map((row) => this.#toEntity(row));
  }

  /** Number of rows per sync state; used by status reporting. */
  countBySyncState(state: SyncState): number {
    const row: unknown = this.#db.prepare('SELECT COUNT(*) AS total FROM entities WHERE sync_state = ?').get(state);
    if (typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number') {
      return row.total;
    }
    return 0;
  }

  #toEntity(row: unknown): Entity<P> {
    if (!isEntityRow(row)) {
      throw new ValidationError(`[${this.name}] Unexpected row shape in entities table.`);
    }
    if (!isEntityKind(row.kind) || !isSyncState(row.sync_state)) {
      throw new ValidationError(`[${this.name}] Entity '${row.id}' has an unknown kind or sync state.`);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(row.payload_json);
    } catch (error) {
      throw new ValidationError(`[${this.name}] Entity '${row.id}' payload is not valid JSON.`, { cause: error });
    }

    return {
      id: row.id,
      ownerSessionId: row.owner_session_id,
      kind: row.kind,
      payload: this.#parsePayload(payload),
      createdAt: row.created_at,
      syncState: row.sync_state,
    };
  }
}

function clampLimit(limit: number): number {
  return Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 1;
}

function throwIfAborted(signal: AbortSignal | undefined, name: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`[${name}] Storage operation cancelled.`);
  }
}
