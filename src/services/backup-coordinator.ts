import {
  isBackupPending,
  MANAGED_BACKUP_CATEGORIES,
  type AlertSink,
  type BackupCategory,
  type BackupDataSource,
  type BackupResult,
  type BackupStatusMap,
  type Clock,
  type ExternalSyncSource,
  type ManagedBackupCategory,
  type RemoteBackupStore,
  type Result,
} from '../types/backup.js';
import type { RestoreEvent, RestoreReport } from '../types/restore.js';
import { BackupAlertNotifier } from './backup-alert-notifier.js';
import { BackupChangeBinder } from './backup-change-binder.js';
import { BackupExecutor } from './backup-executor.js';
import { BackupFailureMonitor, type BackupFailureMonitorConfig } from './backup-failure-monitor.js';
import { BackupScheduler } from './backup-scheduler.js';
import { BackupStatusStore } from './backup-status-store.js';
import { BackupSuppression } from './backup-suppression.js';
import { openBackupDatabase, type BackupDatabase } from './db.js';
import { JobScheduler } from './job-scheduler.js';
import { RestoreOrchestrator } from './restore-orchestrator.js';
import { getConfigValue } from '../config/backup-config.js';
import { logThought } from '../utils/logger.js';

export interface BackupCoordinatorOptions {
  remote: RemoteBackupStore;
  sources: readonly BackupDataSource[];
  alertSink: AlertSink;
  externalSync?: ExternalSyncSource;
  /** Existing database handle; otherwise one is opened at `databasePath`. */
  db?: BackupDatabase;
  databasePath?: string;
  jobs?: JobScheduler;
  debounceMs?: number;
  monitor?: BackupFailureMonitorConfig;
  now?: Clock;
}

export interface BackupDiagnostics {
  started: boolean;
  restoring: boolean;
  wiping: boolean;
  statuses: BackupStatusMap;
  pending: BackupCategory[];
  activeJobs: ManagedBackupCategory[];
  lastAlertAt: number | null;
}

/**
 * Owns the whole backup subsystem for one wallet: status store, change binder,
 * scheduler, executor, restore orchestrator and failure monitor.
 *
 * Host lifecycle: `start()` on unlock, `stop()` on lock or background,
 * `restoreAll()` once after wallet recovery, `scheduleAll()` once after
 * wallet creation or restore, `runWipe()` around a wallet wipe.
 */
export class BackupCoordinator {
  readonly store: BackupStatusStore;
  readonly suppression: BackupSuppression;
  readonly #db: BackupDatabase;
  readonly #ownsDb: boolean;
  readonly #jobs: JobScheduler;
  readonly #binder: BackupChangeBinder;
  readonly #executor: BackupExecutor;
  readonly #scheduler: BackupScheduler;
  readonly #orchestrator: RestoreOrchestrator;
  readonly #monitor: BackupFailureMonitor;
  readonly #notifier: BackupAlertNotifier;
  readonly #unsubscribeJobErrors: () => void;
  #started = false;

  constructor(options: BackupCoordinatorOptions) {
    const now = options.now ?? (() => Date.now());
    const sources = new Map<ManagedBackupCategory, BackupDataSource>();
    for (const source of options.sources) {
      if (sources.has(source.category)) {
        throw new Error(`[BackupCoordinator] Duplicate data source for '${source.category}'.`);
      }
      sources.set(source.category, source);
    }

    this.#ownsDb = options.db === undefined;
    this.#db = options.db ?? openBackupDatabase(options.databasePath ?? getConfigValue('BACKUP_DB_PATH'));
    this.#jobs = options.jobs ?? new JobScheduler();
    this.suppression = new BackupSuppression();
    this.store = new BackupStatusStore({ db: this.#db, now });
    this.#notifier = new BackupAlertNotifier(options.alertSink);
    this.#unsubscribeJobErrors = this.#jobs.on('job:error', (event) => {
      void this.#notifier.onSchedulerEvent(event);
    });

    this.#binder = new BackupChangeBinder({
      store: this.store,
      suppression: this.suppression,
      sources: sources.values(),
      externalSync: options.externalSync,
      now,
    });
    this.#executor = new BackupExecutor({ store: this.store, remote: options.remote, sources, now });
    this.#scheduler = new BackupScheduler({
      store: this.store,
      executor: this.#executor,
      suppression: this.suppression,
      debounceMs: options.debounceMs,
      categories: [...sources.keys()],
      now,
    });
    this.#orchestrator = new RestoreOrchestrator({
      db: this.#db,
      store: this.store,
      remote: options.remote,
      sources,
      suppression: this.suppression,
      now,
    });
    this.#monitor = new BackupFailureMonitor({
      store: this.store,
      notifier: this.#notifier,
      scheduler: this.#jobs,
      config: options.monitor,
      now,
    });
  }

  get isStarted(): boolean {
    return this.#started;
  }

  get scheduler(): BackupScheduler {
    return this.#scheduler;
  }

  get monitor(): BackupFailureMonitor {
    return this.#monitor;
  }

  /** Idempotent. Reconciles stale `running` flags before anything is scheduled. */
  start(): void {
    if (this.#started) return;
    this.#started = true;

    this.#scheduler.start();
    this.#binder.bind();
    this.#monitor.start();
    void logThought('[BackupCoordinator] Started observing backup statuses and data changes.');
  }

  /** Cancels listeners, pending and in-flight jobs, and the monitor. Safe when never started. */
  stop(): void {
    if (!this.#started) return;
    this.#started = false;

    this.#binder.unbind();
    this.#scheduler.stop();
    this.#monitor.stop();
    void logThought('[BackupCoordinator] Stopped observing backup statuses and data changes.');
  }

  /** Upload one category now, bypassing the debounce. Refused while one is already uploading. */
  backupNow(category: BackupCategory): Promise<BackupResult> {
    return this.#scheduler.runNow(category);
  }

  scheduleAll(): void {
    this.#scheduler.scheduleAll();
  }

  restoreAll(): Promise<Result<RestoreReport>> {
    return this.#orchestrator.restoreAll();
  }

  listRestoreEvents(limit?: number): RestoreEvent[] {
    return this.#orchestrator.listRestoreEvents(limit);
  }

  /**
   * Run the host's wallet wipe with change tracking suppressed and the
   * subsystem stopped, then reset every status to defaults.
   */
  async runWipe<T>(wipe: () => Promise<T>): Promise<T> {
    this.suppression.setWiping(true);
    try {
      this.stop();
      // Also covers jobs started through backupNow() before start().
      this.#scheduler.stop();
      await this.#scheduler.whenIdle();
      const result = await wipe();
      this.store.reset();
      void logThought('[BackupCoordinator] Backup statuses reset after wallet wipe.');
      return result;
    } finally {
      this.suppression.setWiping(false);
    }
  }

  getDiagnostics(): BackupDiagnostics {
    const statuses = this.store.getAll();
    return {
      started: this.#started,
      restoring: this.suppression.isRestoring,
      wiping: this.suppression.isWiping,
      statuses,
      pending: MANAGED_BACKUP_CATEGORIES.filter((category) => isBackupPending(statuses[category])),
      activeJobs: this.#scheduler.getActiveCategories(),
      lastAlertAt: this.#monitor.lastAlertAt,
    };
  }

  /** Stop and release the database if this coordinator opened it. */
  close(): void {
    this.stop();
    this.#unsubscribeJobErrors();
    if (this.#ownsDb) {
      this.#db.close();
    }
  }
}
