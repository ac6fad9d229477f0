import {
  errorMessage,
  fail,
  isManagedCategory,
  ok,
  type BackupCategory,
  type BackupDataSource,
  type BackupResult,
  type Clock,
  type ManagedBackupCategory,
  type RemoteBackupStore,
} from '../types/backup.js';
import type { BackupStatusStore } from './backup-status-store.js';
import { encodeBackupPayload } from './backup-payload.js';
import { logThought, scrubSensitiveText } from '../utils/logger.js';

export interface BackupExecutorDeps {
  store: BackupStatusStore;
  remote: RemoteBackupStore;
  sources: ReadonlyMap<ManagedBackupCategory, BackupDataSource>;
  now?: Clock;
}

export interface ExecuteOptions {
  /** Aborting skips the remote write if it has not started, and the success status write if it has. */
  signal?: AbortSignal;
}

/**
 * Uploads one category: snapshot → envelope → remote `put`.
 * Never throws; every failure comes back as `{ ok: false }` with `running`
 * cleared and `requiredAt` kept so the category stays eligible for retry.
 */
export class BackupExecutor {
  readonly #store: BackupStatusStore;
  readonly #remote: RemoteBackupStore;
  readonly #sources: ReadonlyMap<ManagedBackupCategory, BackupDataSource>;
  readonly #now: Clock;

  constructor(deps: BackupExecutorDeps) {
    this.#store = deps.store;
    this.#remote = deps.remote;
    this.#sources = deps.sources;
    this.#now = deps.now ?? (() => Date.now());
  }

  async execute(category: BackupCategory, options: ExecuteOptions = {}): Promise<BackupResult> {
    if (!isManagedCategory(category)) {
      return fail(`'${category}' is backed up by its own subsystem.`);
    }

    const source = this.#sources.get(category);
    if (!source) {
      return fail(`No data source registered for '${category}'.`);
    }

    try {
      return await this.#run(category, source, options);
    } catch (err) {
      const message = scrubSensitiveText(errorMessage(err));
      console.error(`[BackupExecutor] Unexpected error backing up '${category}':`, message);
      return fail(message);
    }
  }

  async #run(
    category: ManagedBackupCategory,
    source: BackupDataSource,
    options: ExecuteOptions,
  ): Promise<BackupResult> {
    const startedAt = this.#now();
    this.#store.update(category, (status) => ({ ...status, running: true, requiredAt: startedAt }));
    void logThought(`[BackupExecutor] Backup starting for '${category}'.`);

    try {
      const data = await source.snapshotBytes();
      if (options.signal?.aborted) {
        return this.#failed(category, 'Backup cancelled before upload.');
      }

      const payload = encodeBackupPayload(category, startedAt, data);
      const result = await this.#remote.put(category, payload);
      if (!result.ok) {
        return this.#failed(category, result.error);
      }
      if (options.signal?.aborted) {
        // The upload may have landed, but the caller is gone: leave the category pending.
        return this.#failed(category, 'Backup cancelled during upload.');
      }

      const completedAt = this.#now();
      const next = this.#store.update(category, (status) => ({
        ...status,
        running: false,
        // A change that landed during the upload keeps the category pending.
        syncedAt: status.requiredAt > startedAt ? startedAt : completedAt,
      }));

      void logThought(`[BackupExecutor] Backup succeeded for '${category}' (${payload.byteLength} bytes).`);
      return ok({ category, syncedAt: next.syncedAt, bytes: payload.byteLength });
    } catch (err) {
      return this.#failed(category, errorMessage(err));
    }
  }

  #failed(category: ManagedBackupCategory, reason: string): BackupResult {
    this.#store.update(category, (status) => ({ ...status, running: false }));
    const message = scrubSensitiveText(reason);
    console.error(`[BackupExecutor] Backup failed for '${category}':`, message);
    void logThought(`[BackupExecutor] Backup failed for '${category}': ${message}`);
    return fail(message);
  }
}
