import * as fs from 'node:fs/promises';
import { existsSync, readFileSync } from 'node:fs';
import * as path from 'node:path';

export interface BackupOrchestratorConfig {
    scheduler: {
        /** Quiet period after the last change before a category is uploaded. */
        debounceMs: number;
    };
    monitor: {
        /** node-cron expression for the stuck-backup sweep. */
        checkCron: string;
        overdueThresholdMs: number;
        alertCooldownMs: number;
    };
    storage: {
        databasePath: string;
    };
    logging: {
        logDir: string;
    };
}

export const DEFAULT_CONFIG: BackupOrchestratorConfig = {
    scheduler: {
        debounceMs: 5_000,
    },
    monitor: {
        checkCron: '* * * * *',
        overdueThresholdMs: 30 * 60 * 1000,
        alertCooldownMs: 10 * 60 * 1000,
    },
    storage: {
        databasePath: 'data/backup-status.db',
    },
    logging: {
        logDir: 'logs',
    },
};

export type BackupConfigKey =
    | 'BACKUP_DEBOUNCE_MS'
    | 'BACKUP_FAILURE_CHECK_CRON'
    | 'BACKUP_OVERDUE_THRESHOLD_MS'
    | 'BACKUP_ALERT_COOLDOWN_MS'
    | 'BACKUP_DB_PATH'
    | 'BACKUP_LOG_DIR';

export function getConfigPath(overridePath?: string): string {
    if (overridePath) return path.resolve(overridePath);
    if (process.env.BACKUP_CONFIG_PATH) {
        return path.resolve(process.env.BACKUP_CONFIG_PATH);
    }
    return path.resolve('backup-orchestrator.json');
}

export async function readConfig(overridePath?: string): Promise<BackupOrchestratorConfig> {
    const targetPath = getConfigPath(overridePath);
    try {
        const rawData = await fs.readFile(targetPath, 'utf-8');
        return mergeWithDefaults(JSON.parse(rawData));
    } catch (error) {
        if (isErrnoException(error) && error.code === 'ENOENT') return mergeWithDefaults({});
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to parse config file at ${targetPath}: ${message}`);
    }
}

export async function writeConfig(config: BackupOrchestratorConfig, overridePath?: string): Promise<void> {
    const targetPath = getConfigPath(overridePath);
    await fs.mkdir(path.dirname(targetPath), { recursive: true });
    const tempPath = `${targetPath}.${Date.now()}.tmp`;
    try {
        await fs.writeFile(tempPath, JSON.stringify(config, null, 2), { encoding: 'utf-8', mode: 0o600 });
        await fs.rename(tempPath, targetPath);
    } catch (error) {
        await fs.rm(tempPath, { force: true });
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Failed to save config to ${targetPath}: ${message}`);
    }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error;
}

function asRecord(value: unknown): Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
        ? Object.fromEntries(Object.entries(value))
        : {};
}

function pickNumber(record: Record<string, unknown>, key: string, fallback: number): number {
    const value = record[key];
    return typeof value === 'number' && Number.isFinite(value) && value >= 0 ? value : fallback;
}

function pickString(record: Record<string, unknown>, key: string, fallback: string): string {
    const value = record[key];
    return typeof value === 'string' && value.trim() !== '' ? value : fallback;
}

export function mergeWithDefaults(loaded: unknown): BackupOrchestratorConfig {
    const root = asRecord(loaded);
    const scheduler = asRecord(root.scheduler);
    const monitor = asRecord(root.monitor);
    const storage = asRecord(root.storage);
    const logging = asRecord(root.logging);

    return {
        scheduler: {
            debounceMs: pickNumber(scheduler, 'debounceMs', DEFAULT_CONFIG.scheduler.debounceMs),
        },
        monitor: {
            checkCron: pickString(monitor, 'checkCron', DEFAULT_CONFIG.monitor.checkCron),
            overdueThresholdMs: pickNumber(monitor, 'overdueThresholdMs', DEFAULT_CONFIG.monitor.overdueThresholdMs),
            alertCooldownMs: pickNumber(monitor, 'alertCooldownMs', DEFAULT_CONFIG.monitor.alertCooldownMs),
        },
        storage: {
            databasePath: pickString(storage, 'databasePath', DEFAULT_CONFIG.storage.databasePath),
        },
        logging: {
            logDir: pickString(logging, 'logDir', DEFAULT_CONFIG.logging.logDir),
        },
    };
}

// ── Flat key access ──────────────────────────────────────────────────────────

let cachedConfig: BackupOrchestratorConfig | null = null;

export function clearConfigCacheForTests(): void {
    cachedConfig = null;
}

export function reloadConfigSync(): BackupOrchestratorConfig {
    const configPath = getConfigPath();
    try {
        if (existsSync(configPath)) {
            cachedConfig = mergeWithDefaults(JSON.parse(readFileSync(configPath, 'utf8')));
            return cachedConfig;
        }
    } catch (error) {
        console.error(`[BackupConfig] Failed to parse JSON config at ${configPath}:`, error);
    }
    cachedConfig = mergeWithDefaults({});
    return cachedConfig;
}

/**
 * Resolve a flat configuration key. A non-empty environment variable of the
 * same name wins over the JSON file, which wins over the defaults.
 */
export function getConfigValue(key: BackupConfigKey): string {
    const envValue = process.env[key];
    if (envValue !== undefined && envValue.trim() !== '') {
        return envValue;
    }

    const config = cachedConfig ?? reloadConfigSync();
    switch (key) {
        case 'BACKUP_DEBOUNCE_MS': return String(config.scheduler.debounceMs);
        case 'BACKUP_FAILURE_CHECK_CRON': return config.monitor.checkCron;
        case 'BACKUP_OVERDUE_THRESHOLD_MS': return String(config.monitor.overdueThresholdMs);
        case 'BACKUP_ALERT_COOLDOWN_MS': return String(config.monitor.alertCooldownMs);
        case 'BACKUP_DB_PATH': return config.storage.databasePath;
        case 'BACKUP_LOG_DIR': return config.logging.logDir;
    }
}

/** Numeric variant of `getConfigValue`; falls back when the value is not a non-negative number. */
export function getNumericConfigValue(key: BackupConfigKey, fallback: number): number {
    const parsed = Number(getConfigValue(key));
    return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}
