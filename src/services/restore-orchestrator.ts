import { randomUUID } from 'node:crypto';
import {
  RESTORE_ORDER,
  errorMessage,
  fail,
  ok,
  type BackupDataSource,
  type Clock,
  type ManagedBackupCategory,
  type RemoteBackupStore,
  type Result,
} from '../types/backup.js';
import type { CategoryRestoreOutcome, RestoreEvent, RestoreReport } from '../types/restore.js';
import type { BackupStatusStore } from './backup-status-store.js';
import type { BackupSuppression } from './backup-suppression.js';
import { decodeBackupPayload } from './backup-payload.js';
import {
  listRestoreEventRows,
  saveRestoreEventRow,
  type BackupDatabase,
  type RestoreEventRow,
} from './db.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

export interface RestoreOrchestratorDeps {
  db: BackupDatabase;
  store: BackupStatusStore;
  remote: RemoteBackupStore;
  sources: ReadonlyMap<ManagedBackupCategory, BackupDataSource>;
  suppression: BackupSuppression;
  now?: Clock;
}

function toRestoreEvent(row: RestoreEventRow): RestoreEvent | null {
  const category = RESTORE_ORDER.find((candidate) => candidate === row.category);
  if (!category) return null;
  return {
    id: row.id,
    restoreId: row.restore_id,
    category,
    outcome: row.outcome,
    createdAt: row.payload_created_at,
    detail: row.detail,
    recordedAt: row.recorded_at,
  };
}

/**
 * Rebuilds local state from the remote store, one category at a time in
 * `RESTORE_ORDER`.
 *
 * Each category is isolated: a failed fetch, decode or apply is recorded and
 * the next category still runs. Change tracking and scheduling stay suppressed
 * for the whole run.
 */
export class RestoreOrchestrator {
  readonly #db: BackupDatabase;
  readonly #store: BackupStatusStore;
  readonly #remote: RemoteBackupStore;
  readonly #sources: ReadonlyMap<ManagedBackupCategory, BackupDataSource>;
  readonly #suppression: BackupSuppression;
  readonly #now: Clock;

  constructor(deps: RestoreOrchestratorDeps) {
    this.#db = deps.db;
    this.#store = deps.store;
    this.#remote = deps.remote;
    this.#sources = deps.sources;
    this.#suppression = deps.suppression;
    this.#now = deps.now ?? (() => Date.now());
  }

  get isRestoring(): boolean {
    return this.#suppression.isRestoring;
  }

  async restoreAll(): Promise<Result<RestoreReport>> {
    if (this.#suppression.isRestoring) {
      return fail('A restore is already in progress.');
    }

    const restoreId = randomUUID();
    const startedAt = this.#now();
    this.#suppression.setRestoring(true);
    void logThought(`[RestoreOrchestrator] Full restore ${restoreId} starting.`);

    try {
      const outcomes: CategoryRestoreOutcome[] = [];
      for (const category of RESTORE_ORDER) {
        const outcome = await this.#restoreCategory(category);
        this.#record(restoreId, outcome);
        outcomes.push(outcome);
      }

      const failed = outcomes.filter((outcome) => outcome.outcome === 'failed').length;
      void logThought(
        `[RestoreOrchestrator] Full restore ${restoreId} finished (${outcomes.length - failed}/${outcomes.length} categories without error).`,
      );
      return ok({ startedAt, completedAt: this.#now(), outcomes });
    } catch (err) {
      const message = scrubSensitiveText(errorMessage(err));
      console.error('[RestoreOrchestrator] Full restore failed:', message);
      void logThought(`[RestoreOrchestrator] Full restore ${restoreId} failed: ${message}`);
      return fail(message);
    } finally {
      this.#suppression.setRestoring(false);
    }
  }

  listRestoreEvents(limit = 50): RestoreEvent[] {
    return listRestoreEventRows(this.#db, limit)
      .map(toRestoreEvent)
      .filter((event): event is RestoreEvent => event !== null);
  }

  async #restoreCategory(category: ManagedBackupCategory): Promise<CategoryRestoreOutcome> {
    const source = this.#sources.get(category);
    if (!source) {
      return { category, outcome: 'skipped', createdAt: null, detail: 'No data source registered.' };
    }

    try {
      const fetched = await this.#remote.get(category);
      if (!fetched.ok) {
        return this.#failed(category, `Fetch failed: ${fetched.error}`);
      }

      if (fetched.value === null) {
        void logThought(`[RestoreOrchestrator] No backup found for '${category}'.`);
        return { category, outcome: 'missing', createdAt: null, detail: null };
      }

      const payload = decodeBackupPayload(fetched.value, category);
      const applied = await source.applyBytes(payload.data);
      if (!applied.ok) {
        return this.#failed(category, `Apply failed: ${applied.error}`);
      }

      this.#store.update(category, () => ({
        running: false,
        syncedAt: payload.createdAt,
        requiredAt: payload.createdAt,
      }));

      void logThought(`[RestoreOrchestrator] Restored '${category}' from backup created at ${payload.createdAt}.`);
      return { category, outcome: 'restored', createdAt: payload.createdAt, detail: null };
    } catch (err) {
      return this.#failed(category, errorMessage(err));
    }
  }

  #failed(category: ManagedBackupCategory, reason: string): CategoryRestoreOutcome {
    const detail = scrubSensitiveText(reason);
    void logThought(`[RestoreOrchestrator] Restore failed for '${category}': ${detail}`);
    return { category, outcome: 'failed', createdAt: null, detail };
  }

  #record(restoreId: string, outcome: CategoryRestoreOutcome): void {
    saveRestoreEventRow(this.#db, {
      id: randomUUID(),
      restore_id: restoreId,
      category: outcome.category,
      outcome: outcome.outcome,
      payload_created_at: outcome.createdAt,
      detail: outcome.detail,
      recorded_at: this.#now(),
    });
  }
}
