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
    lastRunAt: Date | null;
    lastError: string | null;
    /** Set while a tick is executing so overlapping ticks are skipped. */
    inProgress: boolean;
}

/**
 * Named periodic jobs on top of `node-cron`, with error isolation between
 * jobs, overlap protection per job and lifecycle events.
 *
 * ```ts
 * const jobs = new JobScheduler();
 * jobs.register({
 *   id: 'backup-failure-check',
 *   cronExpression: '* * * * *',
 *   description: 'Flag categories stuck pending',
 *   handler: () => monitor.sweepNow(),
 * });
 * ```
 */
export class JobScheduler {
    readonly #jobs: Map<string, RegisteredJob> = new Map();
    readonly #listeners: Map<SchedulerEventType, Set<SchedulerEventListener>> = new Map();

    /** Register a job. Throws on a duplicate ID or an invalid cron expression. */
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
            lastRunAt: null,
            lastError: null,
            inProgress: false,
        };
        this.#jobs.set(config.id, entry);

        if (config.autoStart ?? true) {
            this.#startJob(entry);
        } else {
            entry.status = 'stopped';
        }
    }

    /** Stop and forget a job. Returns false when it was not registered. */
    unregister(jobId: string): boolean {
        const entry = this.#jobs.get(jobId);
        if (!entry) return false;

        entry.task?.stop();
        this.#jobs.delete(jobId);
        return true;
    }

    /** Run a job's handler once, outside its schedule. */
    async runNow(jobId: string): Promise<void> {
        const entry = this.#jobs.get(jobId);
        if (!entry) {
            throw new Error(`[JobScheduler] Job '${jobId}' is not registered.`);
        }
        await this.#executeJob(entry);
    }

    stopAll(): void {
        for (const entry of this.#jobs.values()) {
            if (entry.task) {
                entry.task.stop();
                entry.task = null;
                entry.status = 'stopped';
            }
        }
    }

    listJobs(): JobSnapshot[] {
        return [...this.#jobs.values()].map((entry) => this.#snapshot(entry));
    }

    getJob(jobId: string): JobSnapshot | undefined {
        const entry = this.#jobs.get(jobId);
        return entry ? this.#snapshot(entry) : undefined;
    }

    /** Subscribe to job events. Returns an unsubscribe function. */
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

    #snapshot(entry: RegisteredJob): JobSnapshot {
        return {
            id: entry.config.id,
            cronExpression: entry.config.cronExpression,
            description: entry.config.description,
            status: entry.status,
            lastRunAt: entry.lastRunAt,
            lastError: entry.lastError,
        };
    }

    #startJob(entry: RegisteredJob): void {
        if (entry.task) return;

        entry.task = cron.schedule(entry.config.cronExpression, () => {
            void this.#executeJob(entry);
        });
        entry.status = 'idle';
    }

    async #executeJob(entry: RegisteredJob): Promise<void> {
        const { config } = entry;
        if (entry.inProgress) {
            await logThought(`[JobScheduler] Skipping tick for '${config.id}': previous run still in progress.`);
            return;
        }

        entry.inProgress = true;
        entry.status = 'running';
        entry.lastRunAt = new Date();
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
            entry.inProgress = false;
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
