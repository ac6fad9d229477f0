import {
  BACKUP_CATEGORIES,
  isBackupPending,
  type BackupAlert,
  type BackupCategory,
  type Clock,
} from '../types/backup.js';
import type { BackupStatusStore } from './backup-status-store.js';
import type { BackupAlertNotifier } from './backup-alert-notifier.js';
import type { JobScheduler } from './job-scheduler.js';
import { getConfigValue, getNumericConfigValue } from '../config/backup-config.js';
import { logThought } from '../utils/logger.js';

const FAILURE_CHECK_JOB_ID = 'backup-failure-check';

const DEFAULT_CONFIG = {
  overdueThresholdMs: 30 * 60 * 1000,
  alertCooldownMs: 10 * 60 * 1000,
} as const;

export interface BackupFailureMonitorConfig {
  checkCronExpression?: string;
  overdueThresholdMs?: number;
  alertCooldownMs?: number;
}

export interface BackupFailureMonitorDeps {
  store: BackupStatusStore;
  notifier: BackupAlertNotifier;
  scheduler?: JobScheduler;
  config?: BackupFailureMonitorConfig;
  now?: Clock;
}

export interface FailureSweepResult {
  overdue: BackupCategory[];
  alerted: boolean;
}

export function buildBackupFailureAlert(overdue: readonly BackupCategory[], overdueThresholdMs: number): BackupAlert {
  const minutes = Math.round(overdueThresholdMs / 60_000);
  const subject = overdue.length === 1 ? '1 backup category has' : `${overdue.length} backup categories have`;
  return {
    severity: 'error',
    title: 'Backup Failed',
    description:
      `${subject} not synced for over ${minutes} minutes (${overdue.join(', ')}). ` +
      'Backups will keep retrying automatically.',
  };
}

/**
 * Periodic sweep for categories stuck pending. Raises at most one aggregated
 * alert per cooldown window, however many categories are overdue.
 */
export class BackupFailureMonitor {
  readonly #store: BackupStatusStore;
  readonly #notifier: BackupAlertNotifier;
  readonly #scheduler?: JobScheduler;
  readonly #config: Required<BackupFailureMonitorConfig>;
  readonly #now: Clock;
  #lastAlertAt: number | null = null;

  constructor(deps: BackupFailureMonitorDeps) {
    this.#store = deps.store;
    this.#notifier = deps.notifier;
    this.#scheduler = deps.scheduler;
    this.#now = deps.now ?? (() => Date.now());
    this.#config = {
      checkCronExpression: deps.config?.checkCronExpression ?? getConfigValue('BACKUP_FAILURE_CHECK_CRON'),
      overdueThresholdMs:
        deps.config?.overdueThresholdMs ??
        getNumericConfigValue('BACKUP_OVERDUE_THRESHOLD_MS', DEFAULT_CONFIG.overdueThresholdMs),
      alertCooldownMs:
        deps.config?.alertCooldownMs ??
        getNumericConfigValue('BACKUP_ALERT_COOLDOWN_MS', DEFAULT_CONFIG.alertCooldownMs),
    };
  }

  get lastAlertAt(): number | null {
    return this.#lastAlertAt;
  }

  get isStarted(): boolean {
    return this.#scheduler?.getJob(FAILURE_CHECK_JOB_ID) !== undefined;
  }

  start(): void {
    if (!this.#scheduler || this.#scheduler.getJob(FAILURE_CHECK_JOB_ID)) {
      return;
    }

    this.#scheduler.register({
      id: FAILURE_CHECK_JOB_ID,
      cronExpression: this.#config.checkCronExpression,
      description: 'Flag backup categories stuck pending and alert the user',
      handler: async () => {
        await this.sweepNow();
      },
      autoStart: true,
    });
  }

  stop(): void {
    this.#scheduler?.unregister(FAILURE_CHECK_JOB_ID);
  }

  /** Categories pending for longer than the overdue threshold. */
  findOverdue(): BackupCategory[] {
    const now = this.#now();
    const statuses = this.#store.getAll();
    return BACKUP_CATEGORIES.filter((category) => {
      const status = statuses[category];
      return isBackupPending(status) && now - status.requiredAt > this.#config.overdueThresholdMs;
    });
  }

  async sweepNow(): Promise<FailureSweepResult> {
    const overdue = this.findOverdue();
    if (overdue.length === 0) {
      return { overdue, alerted: false };
    }

    const now = this.#now();
    if (this.#lastAlertAt !== null && now - this.#lastAlertAt < this.#config.alertCooldownMs) {
      return { overdue, alerted: false };
    }

    this.#lastAlertAt = now;
    void logThought(`[BackupFailureMonitor] Overdue backups detected: ${overdue.join(', ')}.`);
    await this.#notifier.notify(buildBackupFailureAlert(overdue, this.#config.overdueThresholdMs));
    return { overdue, alerted: true };
  }
}
