import { afterEach, describe, expect, it, vi } from 'vitest';
import { JobScheduler } from '../../src/services/job-scheduler.js';
import type { SchedulerEvent } from '../../src/types/scheduler.js';

vi.mock('../../src/utils/logger.js', () => ({
    logThought: vi.fn(async () => undefined),
    scrubSensitiveText: (value: string) => value,
}));

describe('JobScheduler', () => {
    let jobs: JobScheduler;

    afterEach(() => {
        jobs.stopAll();
        vi.restoreAllMocks();
    });

    it('rejects duplicate IDs and invalid cron expressions', () => {
        jobs = new JobScheduler();
        jobs.register({ id: 'sweep', cronExpression: '* * * * *', description: 'sweep', handler: vi.fn(), autoStart: false });

        expect(() =>
            jobs.register({ id: 'sweep', cronExpression: '* * * * *', description: 'again', handler: vi.fn() }),
        ).toThrow("[JobScheduler] Job 'sweep' is already registered.");
        expect(() =>
            jobs.register({ id: 'bad', cronExpression: 'not a cron', description: 'bad', handler: vi.fn() }),
        ).toThrow("[JobScheduler] Invalid cron expression for job 'bad': not a cron");
        expect(jobs.getJob('sweep')?.status).toBe('stopped');
    });

    it('runs a job on demand and emits lifecycle events', async () => {
        jobs = new JobScheduler();
        const handler = vi.fn();
        const events: SchedulerEvent['type'][] = [];
        jobs.on('job:start', (event) => events.push(event.type));
        jobs.on('job:done', (event) => events.push(event.type));
        jobs.register({ id: 'sweep', cronExpression: '* * * * *', description: 'sweep', handler, autoStart: false });

        await jobs.runNow('sweep');

        expect(handler).toHaveBeenCalledTimes(1);
        expect(events).toEqual(['job:start', 'job:done']);
        expect(jobs.getJob('sweep')?.lastRunAt).toBeInstanceOf(Date);
        expect(jobs.getJob('sweep')?.lastError).toBeNull();
    });

    it('isolates handler errors and reports them as job:error', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
        jobs = new JobScheduler();
        const errors: Array<string | undefined> = [];
        jobs.on('job:error', (event) => errors.push(event.error));
        jobs.register({
            id: 'sweep',
            cronExpression: '* * * * *',
            description: 'sweep',
            handler: () => {
                throw new Error('sweep failed');
            },
            autoStart: false,
        });

        await jobs.runNow('sweep');

        expect(errors).toEqual(['sweep failed']);
        expect(jobs.getJob('sweep')).toMatchObject({ status: 'error', lastError: 'sweep failed' });
    });

    it('skips a run while the previous one is still in progress', async () => {
        jobs = new JobScheduler();
        let release: () => void = () => undefined;
        const handler = vi.fn(
            () =>
                new Promise<void>((resolve) => {
                    release = resolve;
                }),
        );
        jobs.register({ id: 'slow', cronExpression: '* * * * *', description: 'slow', handler, autoStart: false });

        const first = jobs.runNow('slow');
        await jobs.runNow('slow');
        release();
        await first;

        expect(handler).toHaveBeenCalledTimes(1);
    });

    it('unregisters jobs and refuses to run unknown ones', async () => {
        jobs = new JobScheduler();
        jobs.register({ id: 'sweep', cronExpression: '* * * * *', description: 'sweep', handler: vi.fn() });
        expect(jobs.getJob('sweep')?.status).toBe('idle');

        expect(jobs.unregister('sweep')).toBe(true);
        expect(jobs.unregister('sweep')).toBe(false);
        await expect(jobs.runNow('sweep')).rejects.toThrow("[JobScheduler] Job 'sweep' is not registered.");
    });
});
