/**
 * Named domains of wallet state that are tracked, backed up and restored
 * independently. The set is closed: there is no runtime registration.
 */
export const BACKUP_CATEGORIES = [
  'LIGHTNING_CONNECTIONS',
  'COUNTERPARTY_SERVICE',
  'ACTIVITY',
  'WALLET',
  'SETTINGS',
  'WIDGETS',
  'METADATA',
] as const;

export type BackupCategory = (typeof BACKUP_CATEGORIES)[number];

/**
 * Category whose persistence belongs to the Lightning node itself. Its status is
 * tracked for display only and it never reaches the executor or the restore flow.
 */
export const EXTERNALLY_MANAGED_CATEGORY = 'LIGHTNING_CONNECTIONS' satisfies BackupCategory;

export type ExternallyManagedCategory = typeof EXTERNALLY_MANAGED_CATEGORY;

export type ManagedBackupCategory = Exclude<BackupCategory, ExternallyManagedCategory>;

export const MANAGED_BACKUP_CATEGORIES: readonly ManagedBackupCategory[] = BACKUP_CATEGORIES.filter(
  (category): category is ManagedBackupCategory => category !== EXTERNALLY_MANAGED_CATEGORY,
);

/**
 * Restore sequence. Categories that can rotate addresses or invalidate caches
 * run before the ones that rely on clean derived state.
 */
export const RESTORE_ORDER: readonly ManagedBackupCategory[] = [
  'METADATA',
  'SETTINGS',
  'WIDGETS',
  'WALLET',
  'COUNTERPARTY_SERVICE',
  'ACTIVITY',
];

export function isBackupCategory(value: unknown): value is BackupCategory {
  return BACKUP_CATEGORIES.some((category) => category === value);
}

export function isManagedCategory(category: BackupCategory): category is ManagedBackupCategory {
  return category !== EXTERNALLY_MANAGED_CATEGORY;
}

/** Per-category backup state. Timestamps are epoch milliseconds; `0` means never. */
export interface BackupStatus {
  /** True while a backup job for this category is executing. */
  running: boolean;
  /** Last successful write to the remote store. */
  syncedAt: number;
  /** Last time a data-source change marked the category dirty. */
  requiredAt: number;
}

export type BackupStatusMap = Record<BackupCategory, BackupStatus>;

export const DEFAULT_BACKUP_STATUS: Readonly<BackupStatus> = Object.freeze({
  running: false,
  syncedAt: 0,
  requiredAt: 0,
});

export function isBackupPending(status: BackupStatus): boolean {
  return status.requiredAt > status.syncedAt;
}

/** Outcome of an operation that reports failure as a value instead of throwing. */
export type Result<T = void> = { ok: true; value: T } | { ok: false; error: string };

export type BackupResult = Result<{ category: ManagedBackupCategory; syncedAt: number; bytes: number }>;

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(error: string): Result<T> {
  return { ok: false, error };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Collaborator contracts ───────────────────────────────────────────────────

/** Injectable time source, epoch milliseconds. */
export type Clock = () => number;

/**
 * A subscribable source of values. `subscribe` delivers the current value
 * immediately and then every subsequent change.
 */
export interface ChangeFeed<T = unknown> {
  subscribe(listener: (value: T) => void): () => void;
}

/**
 * Type-erased subscription to one change feed. Each emission carries a
 * fingerprint of the new value when the watch was built with one.
 */
export interface ChangeWatch {
  readonly label?: string;
  subscribe(listener: (fingerprint: string | undefined) => void): () => void;
}

/** Remote opaque key-value store. Absence is a successful `null`, not an error. */
export interface RemoteBackupStore {
  put(key: string, value: Uint8Array): Promise<Result>;
  get(key: string): Promise<Result<Uint8Array | null>>;
}

/** Owner of one managed category's data. */
export interface BackupDataSource {
  readonly category: ManagedBackupCategory;
  readonly changes: readonly ChangeWatch[];
  snapshotBytes(): Promise<Uint8Array>;
  applyBytes(bytes: Uint8Array): Promise<Result>;
}

/** Owner of the externally-managed category: only reports completed syncs. */
export interface ExternalSyncSource {
  /** Listener receives the completion time of the latest sync in epoch milliseconds. */
  onSyncCompleted(listener: (syncedAt: number) => void): () => void;
}

export type BackupAlertSeverity = 'info' | 'warning' | 'error';

export interface BackupAlert {
  severity: BackupAlertSeverity;
  title: string;
  description: string;
}

/** Fire-and-forget user-facing notification channel. */
export type AlertSink = (alert: BackupAlert) => Promise<void> | void;
