export * from './types/backup.js';
export type {
  CategoryRestoreOutcome,
  CategoryRestoreOutcomeType,
  RestoreEvent,
  RestoreReport,
} from './types/restore.js';
export type {
  JobConfig,
  JobSnapshot,
  JobStatus,
  SchedulerEvent,
  SchedulerEventListener,
  SchedulerEventType,
} from './types/scheduler.js';

export { BackupCoordinator } from './services/backup-coordinator.js';
export type { BackupCoordinatorOptions, BackupDiagnostics } from './services/backup-coordinator.js';
export { BackupStatusStore } from './services/backup-status-store.js';
export type { BackupStatusListener, BackupStatusStoreOptions } from './services/backup-status-store.js';
export { BackupChangeBinder } from './services/backup-change-binder.js';
export { BackupScheduler } from './services/backup-scheduler.js';
export type { BackupJobRunner, BackupSchedulerDeps } from './services/backup-scheduler.js';
export { BackupExecutor } from './services/backup-executor.js';
export type { BackupExecutorDeps, ExecuteOptions } from './services/backup-executor.js';
export { RestoreOrchestrator } from './services/restore-orchestrator.js';
export { BackupFailureMonitor, buildBackupFailureAlert } from './services/backup-failure-monitor.js';
export type { BackupFailureMonitorConfig, FailureSweepResult } from './services/backup-failure-monitor.js';
export { BackupAlertNotifier } from './services/backup-alert-notifier.js';
export { BackupSuppression } from './services/backup-suppression.js';
export { JobScheduler } from './services/job-scheduler.js';
export {
  BackupPayloadError,
  PAYLOAD_VERSION,
  decodeBackupPayload,
  encodeBackupPayload,
} from './services/backup-payload.js';
export type { BackupPayload } from './services/backup-payload.js';
export { createCacheFingerprint, jsonFingerprint, watchChanges } from './services/change-watch.js';
export type { WatchChangesOptions } from './services/change-watch.js';
export { createJsonBackupSource } from './services/json-backup-source.js';
export type { JsonBackupSourceOptions } from './services/json-backup-source.js';
export { openBackupDatabase } from './services/db.js';
export type { BackupDatabase } from './services/db.js';
export {
  DEFAULT_CONFIG,
  getConfigValue,
  readConfig,
  writeConfig,
} from './config/backup-config.js';
export type { BackupOrchestratorConfig } from './config/backup-config.js';
