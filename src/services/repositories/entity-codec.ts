import { ValidationError } from '../../core/errors.js';
import type { Entity, EntityKind, SyncState } from '../../types/persistence.js';

/** Narrows an untrusted decoded payload to the repository's payload type. */
export type PayloadParser<P> = (raw: unknown) => P;

const ENTITY_KINDS: ReadonlySet<string> = new Set<EntityKind>(['chat_turn', 'memory']);
const SYNC_STATES: ReadonlySet<string> = new Set<SyncState>(['synced', 'pending_backup', 'pending_primary']);

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isEntityKind(value: unknown): value is EntityKind {
  return typeof value === 'string' && ENTITY_KINDS.has(value);
}

export function isSyncState(value: unknown): value is SyncState {
  return typeof value === 'string' && SYNC_STATES.has(value);
}

export const parseRecordPayload: PayloadParser<Record<string, unknown>> = (raw) => {
  if (!isRecord(raw)) {
    throw new ValidationError('Entity payload must be a JSON object.');
  }
  return raw;
};

export function encodeEntity<P>(entity: Entity<P>): string {
  return JSON.stringify(entity);
}

/** Decode an entity stored as a whole JSON document. */
export function decodeEntity<P>(serialized: string, parsePayload: PayloadParser<P>): Entity<P> {
  let raw: unknown;
  try {
    raw = JSON.parse(serialized);
  } catch (error) {
    throw new ValidationError('Stored entity is not valid JSON.', { cause: error });
  }
  if (!isRecord(raw)) {
    throw new ValidationError('Stored entity is not a JSON object.');
  }

  const { id, ownerSessionId, kind, payload, createdAt, syncState } = raw;
  if (typeof id !== 'string' || typeof ownerSessionId !== 'string' || typeof createdAt !== 'string') {
    throw new ValidationError('Stored entity is missing id, ownerSessionId or createdAt.');
  }
  if (!isEntityKind(kind) || !isSyncState(syncState)) {
    throw new ValidationError(`Stored entity '${id}' has an unknown kind or sync state.`);
  }

  return { id, ownerSessionId, kind, payload: parsePayload(payload), createdAt, syncState };
}

/** Reject entities the stores cannot key or order. */
export function assertStorableEntity<P>(entity: Entity<P>): void {
  if (!entity.id.trim()) {
    throw new ValidationError('Entity id must be a non-empty string.');
  }
  if (!entity.ownerSessionId.trim()) {
    throw new ValidationError(`Entity '${entity.id}' has no owner session.`);
  }
  if (Number.isNaN(Date.parse(entity.createdAt))) {
    throw new ValidationError(`Entity '${entity.id}' has an invalid createdAt timestamp.`);
  }
}
