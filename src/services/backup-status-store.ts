import {
  BACKUP_CATEGORIES,
  DEFAULT_BACKUP_STATUS,
  isBackupCategory,
  type BackupCategory,
  type BackupStatus,
  type BackupStatusMap,
  type Clock,
} from '../types/backup.js';
import {
  deleteAllBackupStatusRows,
  getBackupStatusRow,
  listBackupStatusRows,
  upsertBackupStatusRow,
  type BackupDatabase,
  type BackupStatusRow,
} from './db.js';

export type BackupStatusListener = (statuses: Readonly<BackupStatusMap>) => void;

export interface BackupStatusStoreOptions {
  db: BackupDatabase;
  now?: Clock;
}

function toStatus(row: BackupStatusRow | undefined): BackupStatus {
  if (!row) return { ...DEFAULT_BACKUP_STATUS };
  return {
    running: row.running === 1,
    syncedAt: row.synced_at,
    requiredAt: row.required_at,
  };
}

function defaultStatusMap(): BackupStatusMap {
  return {
    LIGHTNING_CONNECTIONS: { ...DEFAULT_BACKUP_STATUS },
    COUNTERPARTY_SERVICE: { ...DEFAULT_BACKUP_STATUS },
    ACTIVITY: { ...DEFAULT_BACKUP_STATUS },
    WALLET: { ...DEFAULT_BACKUP_STATUS },
    SETTINGS: { ...DEFAULT_BACKUP_STATUS },
    WIDGETS: { ...DEFAULT_BACKUP_STATUS },
    METADATA: { ...DEFAULT_BACKUP_STATUS },
  };
}

/**
 * Persisted, observable map of category → backup status.
 *
 * `update` is the only mutation point. It runs as a SQLite transaction on a
 * synchronous driver, so concurrent callers are serialized and no update is
 * lost. Observers receive the full map on subscription and after every change,
 * always in mutation order.
 */
export class BackupStatusStore {
  readonly #db: BackupDatabase;
  readonly #now: Clock;
  readonly #listeners: Set<BackupStatusListener> = new Set();
  readonly #updateTx: (category: BackupCategory, transform: (status: BackupStatus) => BackupStatus) => BackupStatus;
  #emitting = false;
  #dirty = false;

  constructor(options: BackupStatusStoreOptions) {
    this.#db = options.db;
    this.#now = options.now ?? (() => Date.now());
    this.#updateTx = this.#db.transaction(
      (category: BackupCategory, transform: (status: BackupStatus) => BackupStatus): BackupStatus => {
        const current = toStatus(getBackupStatusRow(this.#db, category));
        const next = transform({ ...current });
        upsertBackupStatusRow(this.#db, {
          category,
          running: next.running ? 1 : 0,
          synced_at: next.syncedAt,
          required_at: next.requiredAt,
          updated_at: this.#now(),
        });
        return { ...next };
      },
    );
  }

  get(category: BackupCategory): BackupStatus {
    return toStatus(getBackupStatusRow(this.#db, category));
  }

  getAll(): BackupStatusMap {
    const statuses = defaultStatusMap();
    for (const row of listBackupStatusRows(this.#db)) {
      if (isBackupCategory(row.category)) {
        statuses[row.category] = toStatus(row);
      }
    }
    return statuses;
  }

  /**
   * Subscribe to the status map. The current value is replayed synchronously.
   * Returns an unsubscribe function.
   */
  observe(listener: BackupStatusListener): () => void {
    this.#listeners.add(listener);
    this.#deliver(listener, this.getAll());
    return () => {
      this.#listeners.delete(listener);
    };
  }

  /** Atomically read, transform and persist one category's status. */
  update(category: BackupCategory, transform: (status: BackupStatus) => BackupStatus): BackupStatus {
    const next = this.#updateTx(category, transform);
    this.#emit();
    return next;
  }

  /**
   * Clear persisted `running` flags for every category that has no active job.
   * Returns the categories that were cleared.
   */
  reconcileRunning(activeCategories: ReadonlySet<BackupCategory>): BackupCategory[] {
    const cleared: BackupCategory[] = [];
    for (const category of BACKUP_CATEGORIES) {
      if (activeCategories.has(category)) continue;
      if (!this.get(category).running) continue;
      this.update(category, (status) => ({ ...status, running: false }));
      cleared.push(category);
    }
    return cleared;
  }

  /** Drop every persisted status; all categories read as defaults afterwards. */
  reset(): void {
    deleteAllBackupStatusRows(this.#db);
    this.#emit();
  }

  #emit(): void {
    if (this.#emitting) {
      this.#dirty = true;
      return;
    }

    this.#emitting = true;
    try {
      do {
        this.#dirty = false;
        const snapshot = this.getAll();
        for (const listener of [...this.#listeners]) {
          this.#deliver(listener, snapshot);
        }
      } while (this.#dirty);
    } finally {
      this.#emitting = false;
    }
  }

  #deliver(listener: BackupStatusListener, snapshot: BackupStatusMap): void {
    try {
      listener(snapshot);
    } catch (listenerErr) {
      console.error('[BackupStatusStore] Status listener threw an error:', listenerErr);
    }
  }
}
