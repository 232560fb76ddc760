import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CancelledError, ValidationError } from '../../src/core/errors.js';
import { parseChatTurnPayload } from '../../src/services/chat-history.js';
import { createDatabase, type SqliteDatabase } from '../../src/services/db.js';
import { SqliteRepository } from '../../src/services/repositories/sqlite-repository.js';
import { chatTurn } from '../harness/memory-repository.js';

describe('SqliteRepository', () => {
  let db: SqliteDatabase;
  let repository: SqliteRepository<ReturnType<typeof parseChatTurnPayload>>;

  beforeEach(() => {
    db = createDatabase(':memory:');
    repository = new SqliteRepository(db, parseChatTurnPayload);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips an entity and upserts on the same id', async () => {
    await repository.save(chatTurn('t1', 's1', '2026-01-01T00:00:00.000Z', 'first'));
    await repository.save({ ...chatTurn('t1', 's1', '2026-01-01T00:00:00.000Z', 'edited'), syncState: 'pending_primary' });

    expect(await repository.findById('t1')).toEqual({
      id: 't1',
      ownerSessionId: 's1',
      kind: 'chat_turn',
      payload: { role: 'user', content: 'edited' },
      createdAt: '2026-01-01T00:00:00.000Z',
      syncState: 'pending_primary',
    });
    expect(repository.countBySyncState('pending_primary')).toBe(1);
    expect(repository.countBySyncState('synced')).toBe(0);
  });

  it('returns null for unknown ids and reports deletes', async () => {
    await repository.save(chatTurn('t1', 's1', '2026-01-01T00:00:00.000Z'));

    expect(await repository.findById('missing')).toBeNull();
    expect(await repository.delete('t1')).toBe(true);
    expect(await repository.delete('t1')).toBe(false);
  });

  it('lists a session most recent first, bounded by the limit', async () => {
    await repository.save(chatTurn('a', 's1', '2026-01-01T00:00:01.000Z'));
    await repository.save(chatTurn('b', 's1', '2026-01-01T00:00:03.000Z'));
    await repository.save(chatTurn('c', 's1', '2026-01-01T00:00:02.000Z'));
    await repository.save(chatTurn('d', 's2', '2026-01-01T00:00:04.000Z'));

    const turns = await repository.listBySession('s1', 2);

    expect(turns.map((turn) => turn.id)).toEqual(['b', 'c']);
  });

  it('lists a sync state oldest first', async () => {
    await repository.save({ ...chatTurn('late', 's1', '2026-01-01T00:00:09.000Z'), syncState: 'pending_primary' });
    await repository.save({ ...chatTurn('early', 's2', '2026-01-01T00:00:01.000Z'), syncState: 'pending_primary' });
    await repository.save(chatTurn('done', 's1', '2026-01-01T00:00:05.000Z'));

    const pending = await repository.listBySyncState('pending_primary', 10);

    expect(pending.map((entity) => entity.id)).toEqual(['early', 'late']);
  });

  it('rejects entities it cannot key or order', async () => {
    await expect(repository.save(chatTurn('', 's1', '2026-01-01T00:00:00.000Z'))).rejects.toBeInstanceOf(ValidationError);
    await expect(repository.save(chatTurn('t1', 's1', 'not-a-date'))).rejects.toBeInstanceOf(ValidationError);
  });

  it('refuses work once the signal is aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(repository.findById('t1', controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });
});
