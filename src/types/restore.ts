import type { ManagedBackupCategory } from './backup.js';

/**
 * - `restored`: payload fetched, decoded and applied.
 * - `missing`: the remote store has nothing under the category key.
 * - `skipped`: no data source is registered for the category.
 * - `failed`: fetching, decoding or applying threw or reported failure.
 */
export type CategoryRestoreOutcomeType = 'restored' | 'missing' | 'skipped' | 'failed';

export interface CategoryRestoreOutcome {
  category: ManagedBackupCategory;
  outcome: CategoryRestoreOutcomeType;
  /** `createdAt` embedded in the restored payload. */
  createdAt: number | null;
  detail: string | null;
}

export interface RestoreReport {
  startedAt: number;
  completedAt: number;
  outcomes: CategoryRestoreOutcome[];
}

export interface RestoreEvent extends CategoryRestoreOutcome {
  id: string;
  restoreId: string;
  recordedAt: number;
}
