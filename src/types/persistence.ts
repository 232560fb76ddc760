export type SyncState = 'synced' | 'pending_backup' | 'pending_primary';

export type EntityKind = 'chat_turn' | 'memory';

/** Generic persisted record: a chat turn or a memory item. */
export interface Entity<P = Record<string, unknown>> {
  id: string;
  ownerSessionId: string;
  kind: EntityKind;
  payload: P;
  /** ISO-8601 timestamp. */
  createdAt: string;
  syncState: SyncState;
}

/** Storage port implemented by every concrete store. */
export interface Repository<P = Record<string, unknown>> {
  readonly name: string;
  findById(id: string, signal?: AbortSignal): Promise<Entity<P> | null>;
  save(entity: Entity<P>, signal?: AbortSignal): Promise<Entity<P>>;
  delete(id: string, signal?: AbortSignal): Promise<boolean>;
  /** Most recent first. */
  listBySession(sessionId: string, limit: number, signal?: AbortSignal): Promise<Entity<P>[]>;
  /** Oldest first, so reconciliation replays writes in order. */
  listBySyncState(state: SyncState, limit: number, signal?: AbortSignal): Promise<Entity<P>[]>;
  close?(): Promise<void>;
}

export type ReadSource = 'primary' | 'backup';

export interface ReadEnvelope<P = Record<string, unknown>> {
  entity: Entity<P> | null;
  /** True when the value was served by the backup tier instead of the primary. */
  degraded: boolean;
  source: ReadSource;
}

export interface ListEnvelope<P = Record<string, unknown>> {
  entities: Entity<P>[];
  degraded: boolean;
  source: ReadSource;
}

export interface ReconciliationReport {
  scanned: number;
  synced: number;
  failed: number;
  skipped: boolean;
}

export interface ChatTurnPayload extends Record<string, unknown> {
  role: 'user' | 'assistant' | 'system';
  content: string;
  modelId?: string;
  intent?: string;
  /** Set on `memory` entities saved by the user. */
  category?: string;
}
