import { logThought } from '../utils/logger.js';
import type { AlertSink, BackupAlert } from '../types/backup.js';
import type { SchedulerEvent } from '../types/scheduler.js';

/**
 * Bridges backup background work to the host's user-facing alert channel.
 * Delivery is fire-and-forget: sink failures are logged, never rethrown.
 */
export class BackupAlertNotifier {
    readonly #sink: AlertSink;
    #enabled: boolean;

    constructor(sink: AlertSink, enabled = true) {
        this.#sink = sink;
        this.#enabled = enabled;
    }

    setEnabled(value: boolean): void {
        this.#enabled = value;
    }

    get enabled(): boolean {
        return this.#enabled;
    }

    /** Periodic job errors are logged only. Other events are ignored. */
    async onSchedulerEvent(event: SchedulerEvent): Promise<void> {
        if (event.type !== 'job:error') return;
        await logThought(
            `[BackupAlertNotifier] Periodic job '${event.jobId}' failed at ${event.timestamp.toISOString()}: ${event.error ?? 'Unknown error'}`,
        );
    }

    /** Deliver an alert. Resolves to whether the sink accepted it. */
    async notify(alert: BackupAlert): Promise<boolean> {
        if (!this.#enabled) return false;

        try {
            await logThought(`[BackupAlertNotifier] Raising ${alert.severity} alert: ${alert.title}`);
            await this.#sink(alert);
            return true;
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            console.error('[BackupAlertNotifier] Failed to deliver alert:', message);
            await logThought(`[BackupAlertNotifier] Delivery failed: ${message}`);
            return false;
        }
    }
}
