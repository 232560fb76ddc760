import { Redis, type ChainableCommander } from 'ioredis';
import { CancelledError, StorageUnavailableError } from '../../core/errors.js';
import type { Entity, Repository, SyncState } from '../../types/persistence.js';
import { logThought } from '../../utils/logger.js';
import { assertStorableEntity, decodeEntity, encodeEntity, type PayloadParser } from './entity-codec.js';

const SYNC_STATES: readonly SyncState[] = ['synced', 'pending_backup', 'pending_primary'];

/** One reply per queued command, as returned by `EXEC`; null when the transaction was discarded. */
export type TransactionReplies = Array<[error: Error | null, result: unknown]> | null;

/** A `MULTI` block. Writes are queued and sent together by {@link RedisTransaction.exec}. */
export interface RedisTransaction {
  set(key: string, value: string): RedisTransaction;
  del(key: string): RedisTransaction;
  zadd(key: string, score: number, member: string): RedisTransaction;
  zrem(key: string, member: string): RedisTransaction;
  exec(): Promise<TransactionReplies>;
}

/** The subset of Redis commands the repository issues. */
export interface RedisCommandClient {
  get(key: string): Promise<string | null>;
  mget(keys: string[]): Promise<Array<string | null>>;
  multi(): RedisTransaction;
  zrange(key: string, start: number, stop: number): Promise<string[]>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

/**
 * Open an ioredis connection and expose it as a {@link RedisCommandClient}.
 * Commands fail immediately while disconnected instead of queueing.
 */
export function createRedisClient(url: string): RedisCommandClient {
  const client = new Redis(url, {
    lazyConnect: false,
    enableOfflineQueue: false,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => Math.min(times * 500, 5_000),
  });

  let lastError: string | null = null;
  client.on('error', (err: Error) => {
    if (err.message !== lastError) {
      lastError = err.message;
      console.warn(`[RedisRepository] Connection error: ${err.message}`);
      void logThought(`[RedisRepository] Connection error: ${err.message}`);
    }
  });
  client.on('ready', () => {
    lastError = null;
  });

  return {
    get: (key) => client.get(key),
    mget: (keys) => client.mget(keys),
    multi: () => wrapTransaction(client.multi()),
    zrange: (key, start, stop) => client.zrange(key, start, stop),
    zrevrange: (key, start, stop) => client.zrevrange(key, start, stop),
    ping: () => client.ping(),
    quit: () => client.quit(),
  };
}

function wrapTransaction(commands: ChainableCommander): RedisTransaction {
  const transaction: RedisTransaction = {
    set: (key, value) => {
      commands.set(key, value);
      return transaction;
    },
    del: (key) => {
      commands.del(key);
      return transaction;
    },
    zadd: (key, score, member) => {
      commands.zadd(key, score, member);
      return transaction;
    },
    zrem: (key, member) => {
      commands.zrem(key, member);
      return transaction;
    },
    exec: () => commands.exec(),
  };
  return transaction;
}

/**
 * Networked primary tier. Each entity is one JSON document; a sorted set per
 * session and per sync state (scored by `createdAt`) backs the list queries.
 */
export class RedisRepository<P> implements Repository<P> {
  readonly name: string;
  readonly #client: RedisCommandClient;
  readonly #parsePayload: PayloadParser<P>;
  readonly #prefix: string;

  constructor(client: RedisCommandClient, parsePayload: PayloadParser<P>, options: { keyPrefix?: string; name?: string } = {}) {
    this.#client = client;
    this.#parsePayload = parsePayload;
    this.#prefix = options.keyPrefix ?? 'waypoint:';
    this.name = options.name ?? 'redis';
  }

  async findById(id: string, signal?: AbortSignal): Promise<Entity<P> | null> {
    this.#throwIfAborted(signal);
    const serialized = await this.#client.get(this.#entityKey(id));
    return serialized === null ? null : decodeEntity(serialized, this.#parsePayload);
  }

  async save(entity: Entity<P>, signal?: AbortSignal): Promise<Entity<P>> {
    this.#throwIfAborted(signal);
    assertStorableEntity(entity);

    const score = Date.parse(entity.createdAt);
    const transaction = this.#client
      .multi()
      .set(this.#entityKey(entity.id), encodeEntity(entity))
      .zadd(this.#sessionKey(entity.ownerSessionId), score, entity.id);
    for (const state of SYNC_STATES) {
      if (state !== entity.syncState) {
        transaction.zrem(this.#syncKey(state), entity.id);
      }
    }
    transaction.zadd(this.#syncKey(entity.syncState), score, entity.id);
    await this.#commit(transaction, `save '${entity.id}'`);
    return entity;
  }

  async delete(id: string, signal?: AbortSignal): Promise<boolean> {
    this.#throwIfAborted(signal);
    const existing = await this.findById(id, signal);
    const transaction = this.#client.multi().del(this.#entityKey(id));
    if (existing) {
      transaction.zrem(this.#sessionKey(existing.ownerSessionId), id);
    }
    for (const state of SYNC_STATES) {
      transaction.zrem(this.#syncKey(state), id);
    }
    const replies = await this.#commit(transaction, `delete '${id}'`);
    const removed = replies[0]?.[1];
    return typeof removed === 'number' && removed > 0;
  }

  async listBySession(sessionId: string, limit: number, signal?: AbortSignal): Promise<Entity<P>[]> {
    this.#throwIfAborted(signal);
    const ids = await this.#client.zrevrange(this.#sessionKey(sessionId), 0, Math.max(1, Math.floor(limit)) - 1);
    return this.#loadMany(ids);
  }

  async listBySyncState(state: SyncState, limit: number, signal?: AbortSignal): Promise<Entity<P>[]> {
    this.#throwIfAborted(signal);
    const ids = await this.#client.zrange(this.#syncKey(state), 0, Math.max(1, Math.floor(limit)) - 1);
    return this.#loadMany(ids);
  }

  async ping(): Promise<boolean> {
    return (await this.#client.ping()) === 'PONG';
  }

  async close(): Promise<void> {
    await this.#client.quit();
  }

  async #loadMany(ids: string[]): Promise<Entity<P>[]> {
    if (ids.length === 0) {
      return [];
    }
    const documents = await this.#client.mget(ids.map((id) => this.#entityKey(id)));
    const entities: Entity<P>[] = [];
    for (const document of documents) {
      if (document !== null) {
        entities.push(decodeEntity(document, this.#parsePayload));
      }
    }
    return entities;
  }

  /** Run a transaction and fail on a discarded block or any command error inside it. */
  async #commit(transaction: RedisTransaction, label: string): Promise<Array<[Error | null, unknown]>> {
    const replies = await transaction.exec();
    if (replies === null) {
      throw new StorageUnavailableError(`[${this.name}] Transaction for ${label} was discarded.`);
    }
    const failed = replies.find(([error]) => error !== null)?.[0];
    if (failed) {
      throw new StorageUnavailableError(`[${this.name}] Transaction for ${label} failed: ${failed.message}`, {
        cause: failed,
      });
    }
    return replies;
  }

  #entityKey(id: string): string {
    return `${this.#prefix}entity:${id}`;
  }

  #sessionKey(sessionId: string): string {
    return `${this.#prefix}session:${sessionId}`;
  }

  #syncKey(state: SyncState): string {
    return `${this.#prefix}sync:${state}`;
  }

  #throwIfAborted(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new CancelledError(`[${this.name}] Storage operation cancelled.`);
    }
  }
}
