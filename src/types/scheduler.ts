/** Status of a registered periodic job. */
export type JobStatus = 'idle' | 'running' | 'stopped' | 'error';

/** Configuration required to register a periodic job. */
export interface JobConfig {
    /** Unique identifier (e.g. 'backup-failure-check'). */
    id: string;
    /** node-cron expression; a leading seconds field is allowed. */
    cronExpression: string;
    description: string;
    handler: () => Promise<void> | void;
    /**
     * Start ticking immediately upon registration.
     * @default true
     */
    autoStart?: boolean;
}

/** Read-only snapshot of a registered job. */
export interface JobSnapshot {
    id: string;
    cronExpression: string;
    description: string;
    status: JobStatus;
    lastRunAt: Date | null;
    lastError: string | null;
}

/**
 * - 'job:start': before a handler runs.
 * - 'job:done': after a handler completes.
 * - 'job:error': when a handler throws.
 */
export type SchedulerEventType = 'job:start' | 'job:done' | 'job:error';

export interface SchedulerEvent {
    type: SchedulerEventType;
    jobId: string;
    timestamp: Date;
    error?: string;
}

export type SchedulerEventListener = (event: SchedulerEvent) => void;
