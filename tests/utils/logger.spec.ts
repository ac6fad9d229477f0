import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { clearConfigCacheForTests } from '../../src/config/backup-config.js';
import { getLogDir, logThought, scrubSensitiveText } from '../../src/utils/logger.js';

describe('logger', () => {
    let logDir: string;

    beforeEach(async () => {
        logDir = await mkdtemp(path.join(os.tmpdir(), 'backup-orchestrator-logs-'));
        vi.stubEnv('BACKUP_LOG_DIR', logDir);
        clearConfigCacheForTests();
    });

    afterEach(async () => {
        vi.useRealTimers();
        vi.unstubAllEnvs();
        vi.restoreAllMocks();
        await rm(logDir, { recursive: true, force: true });
    });

    it('redacts sensitive key/value pairs', () => {
        expect(scrubSensitiveText('put rejected: token=test-secret retry later')).toBe(
            'put rejected: token=[REDACTED] retry later',
        );
        expect(scrubSensitiveText('api_key: "abc def", mode=fast')).toBe('api_key: [REDACTED], mode=fast');
    });

    it('redacts raw values of sensitive environment variables', () => {
        vi.stubEnv('VSS_AUTH_SECRET', 'placeholder-value-123');
        expect(scrubSensitiveText('header placeholder-value-123 was refused')).toBe('header [REDACTED] was refused');
    });

    it('appends scrubbed lines to the daily markdown log', async () => {
        vi.useFakeTimers({ toFake: ['Date'] });
        vi.setSystemTime(new Date('2026-03-04T05:06:07.000Z'));

        await logThought('[BackupExecutor] Backup starting for SETTINGS.');
        await logThought('[BackupExecutor] Backup failed: password=test-secret');

        expect(getLogDir()).toBe(path.resolve(logDir));
        const contents = await readFile(path.join(logDir, '2026-03-04.md'), 'utf8');
        expect(contents).toBe(
            '- 05:06:07 [BackupExecutor] Backup starting for SETTINGS.\n' +
                '- 05:06:07 [BackupExecutor] Backup failed: password=[REDACTED]\n',
        );
    });

    it('reports write failures on stderr instead of throwing', async () => {
        const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
        const blocker = path.join(logDir, 'blocker');
        await writeFile(blocker, 'file', 'utf8');
        vi.stubEnv('BACKUP_LOG_DIR', path.join(blocker, 'nested'));

        await expect(logThought('unwritable')).resolves.toBeUndefined();
        expect(consoleError).toHaveBeenCalledTimes(1);
    });
});
