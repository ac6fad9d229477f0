import {
  EXTERNALLY_MANAGED_CATEGORY,
  type BackupDataSource,
  type ChangeWatch,
  type Clock,
  type ExternalSyncSource,
  type ManagedBackupCategory,
} from '../types/backup.js';
import type { BackupStatusStore } from './backup-status-store.js';
import type { BackupSuppression } from './backup-suppression.js';
import { logThought } from '../utils/logger.js';

export interface BackupChangeBinderDeps {
  store: BackupStatusStore;
  suppression: BackupSuppression;
  sources: Iterable<BackupDataSource>;
  externalSync?: ExternalSyncSource;
  now?: Clock;
}

/**
 * Turns data-source change notifications into "backup required" marks.
 *
 * The first emission of every feed is the value current at subscription time
 * and is ignored. Nothing is marked while a restore or wipe is in progress.
 */
export class BackupChangeBinder {
  readonly #store: BackupStatusStore;
  readonly #suppression: BackupSuppression;
  readonly #sources: BackupDataSource[];
  readonly #externalSync?: ExternalSyncSource;
  readonly #now: Clock;
  readonly #unsubscribers: Array<() => void> = [];
  #bound = false;

  constructor(deps: BackupChangeBinderDeps) {
    this.#store = deps.store;
    this.#suppression = deps.suppression;
    this.#sources = [...deps.sources];
    this.#externalSync = deps.externalSync;
    this.#now = deps.now ?? (() => Date.now());
  }

  get isBound(): boolean {
    return this.#bound;
  }

  /** Subscribe to every source. No-op when already bound. */
  bind(): void {
    if (this.#bound) return;
    this.#bound = true;

    for (const source of this.#sources) {
      for (const watch of source.changes) {
        this.#unsubscribers.push(this.#bindFeed(source.category, watch));
      }
    }

    if (this.#externalSync) {
      this.#unsubscribers.push(
        this.#externalSync.onSyncCompleted((syncedAt) => this.#onExternalSync(syncedAt)),
      );
    }

    void logThought(`[BackupChangeBinder] Started ${this.#unsubscribers.length} change listeners.`);
  }

  unbind(): void {
    if (!this.#bound) return;
    this.#bound = false;

    for (const unsubscribe of this.#unsubscribers.splice(0)) {
      try {
        unsubscribe();
      } catch (err) {
        console.error('[BackupChangeBinder] Failed to unsubscribe change listener:', err);
      }
    }
  }

  /** Mark a category dirty unless suppressed. Returns whether the mark was applied. */
  markRequired(category: ManagedBackupCategory): boolean {
    if (this.#suppression.isSuppressed()) return false;

    const requiredAt = this.#now();
    this.#store.update(category, (status) => ({ ...status, requiredAt }));
    void logThought(`[BackupChangeBinder] Marked backup required for '${category}'.`);
    return true;
  }

  #bindFeed(category: ManagedBackupCategory, watch: ChangeWatch): () => void {
    let initialized = false;
    let lastFingerprint: string | undefined;

    return watch.subscribe((fingerprint) => {
      if (!initialized) {
        initialized = true;
        lastFingerprint = fingerprint;
        return;
      }

      if (fingerprint !== undefined) {
        if (fingerprint === lastFingerprint) return;
        lastFingerprint = fingerprint;
      }

      this.markRequired(category);
    });
  }

  #onExternalSync(syncedAt: number): void {
    if (this.#suppression.isSuppressed()) return;

    this.#store.update(EXTERNALLY_MANAGED_CATEGORY, () => ({
      running: false,
      syncedAt,
      requiredAt: syncedAt,
    }));
  }
}
