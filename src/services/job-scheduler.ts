import cron, { type ScheduledTask } from 'node-cron';
import { logThought } from '../utils/logger.js';
import type {
    JobConfig,
    JobSnapshot,
    JobStatus,
    SchedulerEvent,
    SchedulerEventListener,
    SchedulerEventType,
} from '../types/scheduler.js';

interface RegisteredJob {
    config: JobConfig;
    task: ScheduledTask | null;
    status: JobStatus;
    inFlight: boolean;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedCount: number;
}

/** Build a node-cron expression that fires every `seconds` seconds (1–59) or whole minutes. */
export function everySeconds(seconds: number): string {
    const whole = Math.max(1, Math.floor(seconds));
    if (whole < 60) {
        return `*/${whole} * * * * *`;
    }
    const minutes = Math.max(1, Math.floor(whole / 60));
    return minutes === 1 ? '* * * * *' : `*/${Math.min(59, minutes)} * * * *`;
}

/**
 * Named, repeating background jobs on top of `node-cron`.
 *
 * Handlers are error-isolated: a throwing job is marked `error` and keeps its
 * schedule. Jobs registered with `allowOverlap: false` (the default) drop a
 * tick while their previous run is still in flight.
 *
 * ```ts
 * const scheduler = new JobScheduler();
 * scheduler.register({
 *   id: 'resource-refresh',
 *   cronExpression: everySeconds(10),
 *   description: 'Re-sample CPU, memory and connectivity',
 *   handler: () => monitor.refresh().then(() => undefined),
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Register a new repeating job. Throws if a job with the same ID already exists. */
    register(config: JobConfig): void {
        if (this.#jobs.has(config.id)) {
            throw new Error(`[JobScheduler] Job '${config.id}' is already registered.`);
        }

        if (!cron.validate(config.cronExpression)) {
            throw new Error(
                `[JobScheduler] Invalid cron expression for job '${config.id}': ${config.cronExpression}`,
            );
        }

        const entry: RegisteredJob = {
            config,
            task: null,
            status: 'idle',
            inFlight: false,
            lastRunAt: null,
            lastError: null,
            runCount: 0,
            skippedCount: 0,
        };

        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        }
    }

    /** Unregister and stop a job by ID. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    start(jobId: string): void {
        this.#startJob(this.#require(jobId));
    }

    stop(jobId: string): void {
        this.#stopJob(this.#require(jobId));
    }

    startAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#startJob(entry);
        }
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            this.#stopJob(entry);
        }
    }

    /** Run a job's handler now, outside its schedule. Honours the overlap policy. */
    async runNow(jobId: string): Promise<void> {
        await this.#executeJob(this.#require(jobId));
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    /** Get a single job's snapshot by ID. Returns `undefined` if not found. */
    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Subscribe to scheduler events. Returns an unsubscribe function. */
    on(eventType: SchedulerEventType, listener: SchedulerEventListener): () => void {
        let set = this.#listeners.get(eventType);
        if (!set) {
            set = new Set();
            this.#listeners.set(eventType, set);
        }
        set.add(listener);

        return () => {
            set?.delete(listener);
        };
    }

    // ── Private Helpers ────────────────────────────────────────────────────────

    #require(jobId: string): RegisteredJob {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        return entry;
    }

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
            runCount: entry.runCount,
            skippedCount: entry.skippedCount,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => {
            void this.#executeJob(entry);
        });
        entry.status = 'idle';
    }

    #stopJob(entry: RegisteredJob): void {
        if (!entry.task) return;

        entry.task.stop();
        entry.task = null;
        entry.status = 'stopped';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        if (entry.inFlight && !(config.allowOverlap ?? false)) {
            entry.skippedCount += 1;
            this.#emit({ type: 'job:skipped', jobId: config.id, timestamp: new Date() });
            return;
        }

        entry.inFlight = true;
        entry.status = 'running';
        entry.lastRunAt = new Date();
        entry.runCount += 1;
        this.#emit({ type: 'job:start', jobId: config.id, timestamp: new Date() });

        try {
            await config.handler();
            entry.status = entry.task ? 'idle' : 'stopped';
            entry.lastError = null;
            this.#emit({ type: 'job:done', jobId: config.id, timestamp: new Date() });
        } catch (err: unknown) {
            const message = err instanceof Error ? err.message : String(err);
            entry.status = 'error';
            entry.lastError = message;

            console.error(`[JobScheduler] Job '${config.id}' failed:`, message);
            await logThought(`[JobScheduler] Job '${config.id}' failed: ${message}`);

            this.#emit({ type: 'job:error', jobId: config.id, timestamp: new Date(), error: message });
        } finally {
            entry.inFlight = false;
        }
    }

    #emit(event: SchedulerEvent): void {
        const listeners = this.#listeners.get(event.type);
        if (!listeners) return;

        for (const listener of listeners) {
            try {
                listener(event);
            } catch (listenerErr) {
                console.error('[JobScheduler] Event listener threw an error:', listenerErr);
            }
        }
    }
}
