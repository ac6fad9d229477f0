import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackupAlertNotifier } from '../../src/services/backup-alert-notifier.js';
import { BackupFailureMonitor, buildBackupFailureAlert } from '../../src/services/backup-failure-monitor.js';
import { BackupStatusStore } from '../../src/services/backup-status-store.js';
import { openBackupDatabase, type BackupDatabase } from '../../src/services/db.js';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import { BACKUP_CATEGORIES, type BackupAlert } from '../../src/types/backup.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    scrubSensitiveText: (value: string) => value,
}));

const MINUTE = 60_000;

describe('BackupFailureMonitor', () => {
    let db: BackupDatabase;
    let store: BackupStatusStore;
    let alerts: BackupAlert[];
    let notifier: BackupAlertNotifier;
    let clock: number;

    const createMonitor = (scheduler?: JobScheduler): BackupFailureMonitor =>
        new BackupFailureMonitor({
            store,
            notifier,
            scheduler,
            config: { checkCronExpression: '* * * * *', overdueThresholdMs: 30 * MINUTE, alertCooldownMs: 10 * MINUTE },
            now: () => clock,
        });

    beforeEach(() => {
        db = openBackupDatabase(':memory:');
        store = new BackupStatusStore({ db });
        alerts = [];
        notifier = new BackupAlertNotifier((alert) => {
            alerts.push(alert);
        });
        clock = 0;
    });

    afterEach(() => {
        vi.restoreAllMocks();
        db.close();
    });

    it('raises one alert for an overdue category and stays quiet inside the cooldown', async () => {
        store.update('SETTINGS', () => ({ running: false, syncedAt: 1_000, requiredAt: 2_000 }));
        const monitor = createMonitor();

        clock = 2_000 + 31 * MINUTE;
        expect(await monitor.sweepNow()).toEqual({ overdue: ['SETTINGS'], alerted: true });

        clock += 2 * MINUTE;
        expect(await monitor.sweepNow()).toEqual({ overdue: ['SETTINGS'], alerted: false });

        expect(alerts).toEqual([
            {
                severity: 'error',
                title: 'Backup Failed',
                description:
                    '1 backup category has not synced for over 30 minutes (SETTINGS). ' +
                    'Backups will keep retrying automatically.',
            },
        ]);
        expect(monitor.lastAlertAt).toBe(2_000 + 31 * MINUTE);

        clock += 9 * MINUTE;
        expect((await monitor.sweepNow()).alerted).toBe(true);
        expect(alerts).toHaveLength(2);
    });

    it('aggregates every overdue category into a single alert across repeated sweeps', async () => {
        for (const category of BACKUP_CATEGORIES) {
            store.update(category, () => ({ running: false, syncedAt: 0, requiredAt: 1 }));
        }
        const monitor = createMonitor();

        clock = 31 * MINUTE;
        for (let sweep = 0; sweep < 5; sweep += 1) {
            await monitor.sweepNow();
            clock += MINUTE;
        }

        expect(alerts).toHaveLength(1);
        expect(alerts[0]?.description).toBe(
            '7 backup categories have not synced for over 30 minutes ' +
                `(${BACKUP_CATEGORIES.join(', ')}). Backups will keep retrying automatically.`,
        );
    });

    it('ignores categories that are synced or not yet past the threshold', () => {
        store.update('WALLET', () => ({ running: false, syncedAt: 5_000, requiredAt: 5_000 }));
        store.update('ACTIVITY', () => ({ running: true, syncedAt: 0, requiredAt: 10 * MINUTE }));
        const monitor = createMonitor();

        clock = 40 * MINUTE;
        expect(monitor.findOverdue()).toEqual([]);

        clock = 40 * MINUTE + 1;
        expect(monitor.findOverdue()).toEqual(['ACTIVITY']);
    });

    it('registers its sweep as a periodic job while started', async () => {
        const jobs = new JobScheduler();
        const monitor = createMonitor(jobs);

        monitor.start();
        monitor.start();
        expect(monitor.isStarted).toBe(true);
        expect(jobs.listJobs().map((job) => job.id)).toEqual(['backup-failure-check']);

        store.update('WIDGETS', () => ({ running: false, syncedAt: 0, requiredAt: 1 }));
        clock = 31 * MINUTE;
        await jobs.runNow('backup-failure-check');
        expect(alerts).toHaveLength(1);

        monitor.stop();
        expect(monitor.isStarted).toBe(false);
        expect(jobs.listJobs()).toEqual([]);
    });

    it('formats the threshold in whole minutes', () => {
        expect(buildBackupFailureAlert(['WALLET', 'SETTINGS'], 45 * MINUTE).description).toBe(
            '2 backup categories have not synced for over 45 minutes (WALLET, SETTINGS). ' +
                'Backups will keep retrying automatically.',
        );
    });
});
