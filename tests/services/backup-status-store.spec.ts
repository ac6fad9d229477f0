import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { BackupStatusStore } from '../../src/services/backup-status-store.js';
import { openBackupDatabase, type BackupDatabase } from '../../src/services/db.js';
import type { BackupCategory, BackupStatusMap } from '../../src/types/backup.js';

describe('BackupStatusStore', () => {
    let db: BackupDatabase;
    let store: BackupStatusStore;

    beforeEach(() => {
        db = openBackupDatabase(':memory:');
        store = new BackupStatusStore({ db, now: () => 42 });
    });

    afterEach(() => {
        vi.restoreAllMocks();
        db.close();
    });

    it('reads defaults for categories that were never written', () => {
        expect(store.get('WALLET')).toEqual({ running: false, syncedAt: 0, requiredAt: 0 });
        const all = store.getAll();
        expect(Object.keys(all)).toHaveLength(7);
        expect(all.LIGHTNING_CONNECTIONS).toEqual({ running: false, syncedAt: 0, requiredAt: 0 });
    });

    it('persists updates and passes the current value to the transform', () => {
        store.update('SETTINGS', (status) => ({ ...status, requiredAt: 100 }));
        const next = store.update('SETTINGS', (status) => ({ ...status, syncedAt: status.requiredAt + 1 }));

        expect(next).toEqual({ running: false, syncedAt: 101, requiredAt: 100 });

        const reopened = new BackupStatusStore({ db });
        expect(reopened.get('SETTINGS')).toEqual({ running: false, syncedAt: 101, requiredAt: 100 });
    });

    it('replays the current map on observe and emits after every update', () => {
        store.update('WIDGETS', (status) => ({ ...status, requiredAt: 5 }));
        const seen: number[] = [];

        const unsubscribe = store.observe((statuses) => seen.push(statuses.WIDGETS.requiredAt));
        store.update('WIDGETS', (status) => ({ ...status, requiredAt: 6 }));
        unsubscribe();
        store.update('WIDGETS', (status) => ({ ...status, requiredAt: 7 }));

        expect(seen).toEqual([5, 6]);
    });

    it('delivers updates made inside a listener after the current emission, in order', () => {
        const seen: Array<[number, number]> = [];
        store.observe((statuses: Readonly<BackupStatusMap>) => {
            seen.push([statuses.METADATA.requiredAt, statuses.METADATA.syncedAt]);
            if (statuses.METADATA.requiredAt === 1 && statuses.METADATA.syncedAt === 0) {
                store.update('METADATA', (status) => ({ ...status, syncedAt: 1 }));
            }
        });

        store.update('METADATA', (status) => ({ ...status, requiredAt: 1 }));

        expect(seen).toEqual([
            [0, 0],
            [1, 0],
            [1, 1],
        ]);
    });

    it('keeps delivering to other listeners when one throws', () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const received: number[] = [];
        store.observe(() => {
            throw new Error('listener failure');
        });
        store.observe((statuses) => received.push(statuses.ACTIVITY.requiredAt));

        store.update('ACTIVITY', (status) => ({ ...status, requiredAt: 9 }));

        expect(received).toEqual([0, 9]);
        expect(console.error).toHaveBeenCalled();
    });

    it('clears running flags only for categories without an active job', () => {
        store.update('WALLET', (status) => ({ ...status, running: true }));
        store.update('SETTINGS', (status) => ({ ...status, running: true }));

        const cleared = store.reconcileRunning(new Set<BackupCategory>(['SETTINGS']));

        expect(cleared).toEqual(['WALLET']);
        expect(store.get('WALLET').running).toBe(false);
        expect(store.get('SETTINGS').running).toBe(true);
    });

    it('resets every category to defaults and notifies observers', () => {
        store.update('ACTIVITY', () => ({ running: false, syncedAt: 10, requiredAt: 20 }));
        const seen: number[] = [];
        store.observe((statuses) => seen.push(statuses.ACTIVITY.requiredAt));

        store.reset();

        expect(store.get('ACTIVITY')).toEqual({ running: false, syncedAt: 0, requiredAt: 0 });
        expect(seen).toEqual([20, 0]);
    });
});
