import {
  CircuitOpenError,
  OrchestratorError,
  StorageUnavailableError,
} from '../../core/errors.js';
import type {
  Entity,
  ListEnvelope,
  ReadEnvelope,
  ReconciliationReport,
  Repository,
} from '../../types/persistence.js';
import { logThought } from '../../utils/logger.js';
import { withTimeout } from '../../utils/retry.js';
import type { CircuitBreakerRegistry } from '../circuit-breaker.js';
import { everySeconds, type JobScheduler } from '../job-scheduler.js';

const RECONCILE_JOB_ID = 'storage-reconcile';

type Tier = 'primary' | 'backup';
type StorageOp = 'findById' | 'save' | 'delete' | 'listBySession' | 'listBySyncState';

export interface PrimaryBackupRepositoryOptions<P> {
  primary: Repository<P>;
  backup: Repository<P>;
  breakers: CircuitBreakerRegistry;
  /** @default 5000 */
  storageTimeoutMs?: number;
  /** Entities replayed per reconciliation pass. @default 50 */
  reconcileBatchSize?: number;
  /** Failed backup mirrors kept for retry; the oldest is dropped past this. @default 1000 */
  maxPendingMirrors?: number;
}

export interface PersistenceStatus {
  primary: string;
  backup: string;
  reconciling: boolean;
  pendingBackupMirrors: number;
  droppedBackupMirrors: number;
  lastReconciliation: (ReconciliationReport & { finishedAt: string }) | null;
}

function isCallerError(error: unknown): boolean {
  return error instanceof OrchestratorError && (error.kind === 'validation' || error.kind === 'cancelled');
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Composes a networked primary and a local backup behind one {@link Repository}-like surface.
 *
 * Writes go to the primary first and are mirrored to the backup afterwards without
 * blocking the caller. When the primary is down the backup takes the write as
 * `pending_primary`; {@link reconcile} replays those once the primary recovers.
 * Reads fall back to the backup and say so in the envelope.
 */
export class PrimaryBackupRepository<P> {
  readonly #primary: Repository<P>;
  readonly #backup: Repository<P>;
  readonly #breakers: CircuitBreakerRegistry;
  readonly #storageTimeoutMs: number;
  readonly #batchSize: number;
  readonly #maxPendingMirrors: number;

  readonly #mirrorTasks = new Set<Promise<void>>();
  /** Latest in-flight mirror per entity, so a delete cannot be overtaken by it. */
  readonly #mirrorsById = new Map<string, Promise<void>>();
  /** Entities the primary holds but the backup mirror failed to take. */
  readonly #pendingMirrors = new Map<string, Entity<P>>();
  #droppedMirrors = 0;
  #reconciling = false;
  #lastReconciliation: (ReconciliationReport & { finishedAt: string }) | null = null;
  #scheduler: JobScheduler | null = null;

  constructor(options: PrimaryBackupRepositoryOptions<P>) {
    this.#primary = options.primary;
    this.#backup = options.backup;
    this.#breakers = options.breakers;
    this.#storageTimeoutMs = Math.max(1, options.storageTimeoutMs ?? 5_000);
    this.#batchSize = Math.max(1, Math.floor(options.reconcileBatchSize ?? 50));
    this.#maxPendingMirrors = Math.max(1, Math.floor(options.maxPendingMirrors ?? 1_000));
  }

  async save(entity: Entity<P>, signal?: AbortSignal): Promise<Entity<P>> {
    let primaryError: unknown;
    try {
      const saved = await this.#call('primary', 'save', (s) => this.#primary.save({ ...entity, syncState: 'synced' }, s), signal);
      this.#scheduleMirror(saved);
      return saved;
    } catch (error) {
      if (isCallerError(error)) throw error;
      primaryError = error;
    }

    try {
      const saved = await this.#call('backup', 'save', (s) => this.#backup.save({ ...entity, syncState: 'pending_primary' }, s), signal);
      void logThought(
        `[PrimaryBackupRepository] Primary save failed for '${entity.id}' (${describeError(primaryError)}); held in backup as pending_primary.`,
      );
      return saved;
    } catch (backupError) {
      if (isCallerError(backupError)) throw backupError;
      throw new StorageUnavailableError(
        `Both storage tiers rejected entity '${entity.id}': primary: ${describeError(primaryError)}; backup: ${describeError(backupError)}`,
        { cause: backupError },
      );
    }
  }

  /**
   * Primary first unless its read breaker is open. A primary miss still consults the
   * backup, which may hold a write the primary has not received yet.
   */
  async findById(id: string, signal?: AbortSignal): Promise<ReadEnvelope<P>> {
    if (this.#breakerFor('primary', 'findById').isCallPermitted()) {
      try {
        const entity = await this.#call('primary', 'findById', (s) => this.#primary.findById(id, s), signal);
        if (entity) {
          return { entity, degraded: false, source: 'primary' };
        }
        return await this.#findUnsyncedInBackup(id, signal);
      } catch (error) {
        if (isCallerError(error)) throw error;
        void logThought(`[PrimaryBackupRepository] Primary read failed for '${id}': ${describeError(error)}. Serving backup.`);
      }
    }

    const entity = await this.#backupRead('findById', (s) => this.#backup.findById(id, s), signal);
    return { entity, degraded: true, source: 'backup' };
  }

  /** Most recent first, merged with backup entries the primary has not received yet. */
  async listBySession(sessionId: string, limit: number, signal?: AbortSignal): Promise<ListEnvelope<P>> {
    if (this.#breakerFor('primary', 'listBySession').isCallPermitted()) {
      try {
        const fromPrimary = await this.#call('primary', 'listBySession', (s) => this.#primary.listBySession(sessionId, limit, s), signal);
        const unsynced = await this.#unsyncedForSession(sessionId, limit, signal);
        return { entities: mergeRecent(fromPrimary, unsynced, limit), degraded: false, source: 'primary' };
      } catch (error) {
        if (isCallerError(error)) throw error;
        void logThought(
          `[PrimaryBackupRepository] Primary list failed for session '${sessionId}': ${describeError(error)}. Serving backup.`,
        );
      }
    }

    const entities = await this.#backupRead('listBySession', (s) => this.#backup.listBySession(sessionId, limit, s), signal);
    return { entities, degraded: true, source: 'backup' };
  }

  /** Deletes from both tiers; only fails when neither tier accepted the delete. */
  async delete(id: string, signal?: AbortSignal): Promise<boolean> {
    await this.#mirrorsById.get(id);
    this.#pendingMirrors.delete(id);

    let primaryResult: boolean | null = null;
    let primaryError: unknown;
    try {
      primaryResult = await this.#call('primary', 'delete', (s) => this.#primary.delete(id, s), signal);
    } catch (error) {
      if (isCallerError(error)) throw error;
      primaryError = error;
    }

    try {
      const backupResult = await this.#call('backup', 'delete', (s) => this.#backup.delete(id, s), signal);
      return (primaryResult ?? false) || backupResult;
    } catch (backupError) {
      if (isCallerError(backupError)) throw backupError;
      if (primaryResult !== null) {
        void logThought(`[PrimaryBackupRepository] Backup delete failed for '${id}': ${describeError(backupError)}`);
        return primaryResult;
      }
      throw new StorageUnavailableError(
        `Both storage tiers rejected delete of '${id}': primary: ${describeError(primaryError)}; backup: ${describeError(backupError)}`,
        { cause: backupError },
      );
    }
  }

  /**
   * Replay `pending_primary` backup entries to the primary and retry failed backup
   * mirrors. Overlapping passes are skipped; foreground calls are never blocked.
   */
  async reconcile(signal?: AbortSignal): Promise<ReconciliationReport> {
    if (this.#reconciling) {
      return { scanned: 0, synced: 0, failed: 0, skipped: true };
    }

    this.#reconciling = true;
    const report: ReconciliationReport = { scanned: 0, synced: 0, failed: 0, skipped: false };
    try {
      await this.#replayPendingPrimary(report, signal);
      await this.#retryPendingMirrors(report, signal);
    } finally {
      this.#reconciling = false;
    }

    this.#lastReconciliation = { ...report, finishedAt: new Date().toISOString() };
    if (report.scanned > 0) {
      void logThought(
        `[PrimaryBackupRepository] Reconciliation scanned ${report.scanned}, synced ${report.synced}, failed ${report.failed}.`,
      );
    }
    return report;
  }

  /** Resolves once every deferred backup mirror started so far has settled. */
  async flushMirrors(): Promise<void> {
    while (this.#mirrorTasks.size > 0) {
      await Promise.all([...this.#mirrorTasks]);
    }
  }

  /** Number of backup entries still waiting for the primary (bounded by one batch). */
  async pendingPrimaryCount(signal?: AbortSignal): Promise<number> {
    const pending = await this.#backupRead(
      'listBySyncState',
      (s) => this.#backup.listBySyncState('pending_primary', this.#batchSize, s),
      signal,
    );
    return pending.length;
  }

  status(): PersistenceStatus {
    return {
      primary: this.#primary.name,
      backup: this.#backup.name,
      reconciling: this.#reconciling,
      pendingBackupMirrors: this.#pendingMirrors.size,
      droppedBackupMirrors: this.#droppedMirrors,
      lastReconciliation: this.#lastReconciliation,
    };
  }

  start(scheduler: JobScheduler, intervalSec: number): void {
    if (scheduler.getJob(RECONCILE_JOB_ID)) {
      return;
    }
    this.#scheduler = scheduler;
    scheduler.register({
      id: RECONCILE_JOB_ID,
      cronExpression: everySeconds(intervalSec),
      description: 'Replay pending_primary backup writes to the primary store',
      handler: async () => {
        await this.reconcile();
      },
    });
  }

  async close(): Promise<void> {
    this.#scheduler?.unregister(RECONCILE_JOB_ID);
    this.#scheduler = null;
    await this.flushMirrors();
    await this.#primary.close?.();
    await this.#backup.close?.();
  }

  // ── Private Helpers ────────────────────────────────────────────────────────

  #breakerFor(tier: Tier, op: StorageOp) {
    return this.#breakers.get(`${tier}:${op}`);
  }

  #call<T>(tier: Tier, op: StorageOp, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    return this.#breakerFor(tier, op).execute(() => withTimeout(fn, this.#storageTimeoutMs, `${tier}:${op}`, signal));
  }

  async #backupRead<T>(op: StorageOp, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    try {
      return await this.#call('backup', op, fn, signal);
    } catch (error) {
      if (isCallerError(error)) throw error;
      throw new StorageUnavailableError(`Backup store failed during ${op}: ${describeError(error)}`, { cause: error });
    }
  }

  async #findUnsyncedInBackup(id: string, signal?: AbortSignal): Promise<ReadEnvelope<P>> {
    try {
      const entity = await this.#call('backup', 'findById', (s) => this.#backup.findById(id, s), signal);
      if (entity && entity.syncState === 'pending_primary') {
        return { entity, degraded: true, source: 'backup' };
      }
    } catch (error) {
      if (isCallerError(error)) throw error;
      void logThought(`[PrimaryBackupRepository] Backup lookup after primary miss failed for '${id}': ${describeError(error)}`);
    }
    return { entity: null, degraded: false, source: 'primary' };
  }

  async #unsyncedForSession(sessionId: string, limit: number, signal?: AbortSignal): Promise<Entity<P>[]> {
    try {
      const entities = await this.#call('backup', 'listBySession', (s) => this.#backup.listBySession(sessionId, limit, s), signal);
      return entities.filter((entity) => entity.syncState === 'pending_primary');
    } catch (error) {
      if (isCallerError(error)) throw error;
      void logThought(`[PrimaryBackupRepository] Backup list for session '${sessionId}' failed: ${describeError(error)}`);
      return [];
    }
  }

  #scheduleMirror(entity: Entity<P>): void {
    const previous = this.#mirrorsById.get(entity.id) ?? Promise.resolve();
    const task = previous
      .then(() => this.#mirror(entity))
      .finally(() => {
        this.#mirrorTasks.delete(task);
        if (this.#mirrorsById.get(entity.id) === task) {
          this.#mirrorsById.delete(entity.id);
        }
      });
    this.#mirrorTasks.add(task);
    this.#mirrorsById.set(entity.id, task);
  }

  async #mirror(entity: Entity<P>): Promise<void> {
    try {
      await this.#call('backup', 'save', (s) => this.#backup.save({ ...entity, syncState: 'synced' }, s));
      this.#pendingMirrors.delete(entity.id);
    } catch (error) {
      this.#holdPendingMirror(entity);
      void logThought(`[PrimaryBackupRepository] Backup mirror failed for '${entity.id}': ${describeError(error)}`);
    }
  }

  /** Map order is insertion order, so the first key is the oldest failed mirror. */
  #holdPendingMirror(entity: Entity<P>): void {
    this.#pendingMirrors.delete(entity.id);
    if (this.#pendingMirrors.size >= this.#maxPendingMirrors) {
      const oldest = this.#pendingMirrors.keys().next();
      if (!oldest.done) {
        this.#pendingMirrors.delete(oldest.value);
        this.#droppedMirrors += 1;
        console.warn(`[PrimaryBackupRepository] Pending mirror queue full; dropped '${oldest.value}'.`);
        void logThought(
          `[PrimaryBackupRepository] Dropped pending backup mirror for '${oldest.value}' (cap ${this.#maxPendingMirrors}). The primary still holds it.`,
        );
      }
    }
    this.#pendingMirrors.set(entity.id, { ...entity, syncState: 'pending_backup' });
  }

  async #replayPendingPrimary(report: ReconciliationReport, signal?: AbortSignal): Promise<void> {
    let pending: Entity<P>[];
    try {
      pending = await this.#call(
        'backup',
        'listBySyncState',
        (s) => this.#backup.listBySyncState('pending_primary', this.#batchSize, s),
        signal,
      );
    } catch (error) {
      void logThought(`[PrimaryBackupRepository] Reconciliation could not scan the backup: ${describeError(error)}`);
      return;
    }

    for (const entity of pending) {
      if (signal?.aborted) return;
      report.scanned += 1;
      try {
        const synced = await this.#call('primary', 'save', (s) => this.#primary.save({ ...entity, syncState: 'synced' }, s), signal);
        await this.#call('backup', 'save', (s) => this.#backup.save(synced, s), signal);
        report.synced += 1;
      } catch (error) {
        report.failed += 1;
        if (error instanceof CircuitOpenError) {
          // Primary still tripped; leave the rest for the next pass.
          return;
        }
      }
    }
  }

  async #retryPendingMirrors(report: ReconciliationReport, signal?: AbortSignal): Promise<void> {
    for (const entity of [...this.#pendingMirrors.values()]) {
      if (signal?.aborted) return;
      report.scanned += 1;
      try {
        await this.#call('backup', 'save', (s) => this.#backup.save({ ...entity, syncState: 'synced' }, s), signal);
        this.#pendingMirrors.delete(entity.id);
        report.synced += 1;
      } catch (error) {
        report.failed += 1;
        if (error instanceof CircuitOpenError) return;
      }
    }
  }
}

function mergeRecent<P>(primary: Entity<P>[], unsynced: Entity<P>[], limit: number): Entity<P>[] {
  const byId = new Map<string, Entity<P>>();
  for (const entity of [...primary, ...unsynced]) {
    if (!byId.has(entity.id)) {
      byId.set(entity.id, entity);
    }
  }
  return [...byId.values()]
    .sort((left, right) => Date.parse(right.createdAt) - Date.parse(left.createdAt))
    .slice(0, Math.max(1, Math.floor(limit)));
}
