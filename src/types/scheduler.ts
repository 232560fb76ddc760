/** Status of a registered scheduled job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a new repeating job. */
export interface JobConfig {
    /** Unique identifier for this job (e.g. 'resource-refresh'). */
    id: string;
    /** A node-cron expression; a leading sixth field gives second resolution. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /**
     * If true, the job starts ticking immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
    /**
     * When false, a tick that fires while the previous run is still in flight is skipped.
     * @default false
     */
    allowOverlap?: boolean;
}

/** Read-only snapshot of a registered job's state. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
    runCount: number;
    skippedCount: number;
}

/**
 * Event types emitted by the job scheduler.
 * - 'job:start' fires just before a handler executes.
 * - 'job:done' fires after a handler completes.
 * - 'job:error' fires when a handler throws.
 * - 'job:skipped' fires when an overlapping tick is dropped.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error' | 'job:skipped';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
