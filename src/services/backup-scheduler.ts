import {
  MANAGED_BACKUP_CATEGORIES,
  errorMessage,
  fail,
  isBackupPending,
  isManagedCategory,
  type BackupCategory,
  type BackupResult,
  type BackupStatus,
  type BackupStatusMap,
  type Clock,
  type ManagedBackupCategory,
} from '../types/backup.js';
import type { BackupStatusStore } from './backup-status-store.js';
import type { BackupSuppression } from './backup-suppression.js';
import type { ExecuteOptions } from './backup-executor.js';
import { getNumericConfigValue } from '../config/backup-config.js';
import { logThought } from '../utils/logger.js';

const DEFAULT_DEBOUNCE_MS = 5_000;

/** The part of `BackupExecutor` the scheduler depends on. */
export interface BackupJobRunner {
  execute(category: BackupCategory, options?: ExecuteOptions): Promise<BackupResult>;
}

export interface BackupSchedulerDeps {
  store: BackupStatusStore;
  executor: BackupJobRunner;
  suppression: BackupSuppression;
  debounceMs?: number;
  /** Categories with a registered data source. Defaults to every managed category. */
  categories?: readonly ManagedBackupCategory[];
  now?: Clock;
  /** Called after every job settles. */
  onJobSettled?: (category: ManagedBackupCategory, result: BackupResult) => void;
}

interface InFlightJob {
  controller: AbortController;
  promise: Promise<BackupResult>;
}

/**
 * Per-category debounced backup scheduling.
 *
 * A category becomes eligible when its status is pending, not running and no
 * suppression flag is set. Each new trigger cancels the category's outstanding
 * debounce and restarts the window, so rapid changes coalesce into one upload
 * and at most one job per category is ever in flight. A job cancelled by
 * `stop()` keeps its slot until it settles.
 */
export class BackupScheduler {
  readonly #store: BackupStatusStore;
  readonly #executor: BackupJobRunner;
  readonly #suppression: BackupSuppression;
  readonly #debounceMs: number;
  readonly #categories: readonly ManagedBackupCategory[];
  readonly #now: Clock;
  readonly #onJobSettled?: (category: ManagedBackupCategory, result: BackupResult) => void;
  readonly #timers: Map<ManagedBackupCategory, NodeJS.Timeout> = new Map();
  readonly #inFlight: Map<ManagedBackupCategory, InFlightJob> = new Map();
  readonly #lastSeen: Map<ManagedBackupCategory, BackupStatus> = new Map();
  #unsubscribe: (() => void) | null = null;

  constructor(deps: BackupSchedulerDeps) {
    this.#store = deps.store;
    this.#executor = deps.executor;
    this.#suppression = deps.suppression;
    this.#debounceMs = Math.max(
      0,
      Math.floor(deps.debounceMs ?? getNumericConfigValue('BACKUP_DEBOUNCE_MS', DEFAULT_DEBOUNCE_MS)),
    );
    this.#categories = deps.categories ?? MANAGED_BACKUP_CATEGORIES;
    this.#now = deps.now ?? (() => Date.now());
    this.#onJobSettled = deps.onJobSettled;
  }

  get debounceMs(): number {
    return this.#debounceMs;
  }

  get isStarted(): boolean {
    return this.#unsubscribe !== null;
  }

  /**
   * Clear stale `running` flags, then start reacting to status changes.
   * Calling it again while started does nothing.
   */
  start(): void {
    if (this.#unsubscribe) return;

    const cleared = this.#store.reconcileRunning(new Set(this.getActiveCategories()));
    if (cleared.length > 0) {
      void logThought(`[BackupScheduler] Cleared stale running flag for: ${cleared.join(', ')}.`);
    }

    this.#lastSeen.clear();
    this.#unsubscribe = this.#store.observe((statuses) => this.#onStatuses(statuses));
    void logThought('[BackupScheduler] Started observing backup statuses.');
  }

  /**
   * Cancel pending debounces and abort in-flight jobs. Aborted jobs stay
   * tracked until they settle, so no second upload for the category can start
   * meanwhile. Safe to call when never started.
   */
  stop(): void {
    this.#unsubscribe?.();
    this.#unsubscribe = null;

    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();

    for (const job of this.#inFlight.values()) {
      job.controller.abort();
    }
    this.#lastSeen.clear();

    this.#store.reconcileRunning(new Set(this.#inFlight.keys()));
  }

  /** (Re)start the debounce window for a category. */
  schedule(category: ManagedBackupCategory): void {
    const existing = this.#timers.get(category);
    if (existing) {
      clearTimeout(existing);
    }

    this.#timers.set(
      category,
      setTimeout(() => {
        this.#timers.delete(category);
        this.#runIfStillPending(category);
      }, this.#debounceMs),
    );
  }

  /**
   * Mark every managed category required and schedule it. Used for the
   * initial full backup after wallet creation or restore.
   */
  scheduleAll(): void {
    const requiredAt = this.#now();
    for (const category of this.#categories) {
      this.#store.update(category, (status) => ({ ...status, requiredAt }));
      if (this.isStarted) {
        this.schedule(category);
      }
    }
    void logThought(`[BackupScheduler] Scheduled backup for all ${this.#categories.length} categories.`);
  }

  /**
   * Upload a category now, skipping its debounce. Refused while a job for the
   * category is in flight.
   */
  async runNow(category: BackupCategory): Promise<BackupResult> {
    if (!isManagedCategory(category)) {
      return this.#executor.execute(category);
    }

    const timer = this.#timers.get(category);
    if (timer) {
      clearTimeout(timer);
      this.#timers.delete(category);
    }

    if (this.#inFlight.has(category)) {
      return fail(`A backup for '${category}' is already in progress.`);
    }

    return this.#launch(category);
  }

  /** Categories with an outstanding debounce or an in-flight job. */
  getActiveCategories(): ManagedBackupCategory[] {
    return [...new Set([...this.#timers.keys(), ...this.#inFlight.keys()])];
  }

  /** Resolves once every job currently in flight has settled. */
  async whenIdle(): Promise<void> {
    await Promise.all([...this.#inFlight.values()].map((job) => job.promise));
  }

  #isEligible(status: BackupStatus): boolean {
    return isBackupPending(status) && !status.running && !this.#suppression.isSuppressed();
  }

  #onStatuses(statuses: Readonly<BackupStatusMap>): void {
    for (const category of this.#categories) {
      const status = statuses[category];
      const previous = this.#lastSeen.get(category);
      this.#lastSeen.set(category, status);

      const changed =
        !previous || previous.syncedAt !== status.syncedAt || previous.requiredAt !== status.requiredAt;
      if (changed && this.#isEligible(status)) {
        this.schedule(category);
      }
    }
  }

  #runIfStillPending(category: ManagedBackupCategory): void {
    if (this.#inFlight.has(category)) return;
    if (!this.#isEligible(this.#store.get(category))) return;

    void this.#launch(category);
  }

  #launch(category: ManagedBackupCategory): Promise<BackupResult> {
    const controller = new AbortController();
    const promise = this.#executor
      .execute(category, { signal: controller.signal })
      .catch((err: unknown): BackupResult => ({ ok: false, error: errorMessage(err) }))
      .then((result) => {
        if (this.#inFlight.get(category)?.controller === controller) {
          this.#inFlight.delete(category);
        }

        // Changes that arrived while a cancelled job was settling still need an upload.
        if (controller.signal.aborted && this.isStarted && this.#isEligible(this.#store.get(category))) {
          this.schedule(category);
        }

        try {
          this.#onJobSettled?.(category, result);
        } catch (listenerErr) {
          console.error('[BackupScheduler] Job settle listener threw an error:', listenerErr);
        }
        return result;
      });

    this.#inFlight.set(category, { controller, promise });
    return promise;
  }
}
