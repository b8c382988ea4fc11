import { describe, it, expect, beforeEach } from 'vitest';
import { JobScheduler, type JobContext, type JobExecutor, type SchedulerOptions } from './scheduler.js';
import {
    CallbackDispatcher,
    type JobFailedEvent,
    type JobSucceededEvent,
} from './utils/callbackDispatcher.js';
import { ConfigError, FetchError, NotFoundError } from './utils/errors.js';
import { __resetMetricsForTests, getMetricsSnapshot } from './utils/metrics.js';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');
const iso = (ms: number) => new Date(ms).toISOString();

interface Gate<T> {
    promise: Promise<T>;
    resolve: (value: T) => void;
}

function gate<T>(): Gate<T> {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((r) => {
        resolve = r;
    });
    return { promise, resolve };
}

/** Lets detached job tasks start. */
const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

function setup<TResult>(executor: JobExecutor<string, TResult>, options: SchedulerOptions = {}) {
    let clock = T0;
    const dispatcher = new CallbackDispatcher();
    const succeeded: JobSucceededEvent[] = [];
    const failed: JobFailedEvent[] = [];
    dispatcher.register('JobSucceeded', (e) => {
        succeeded.push(e);
    });
    dispatcher.register('JobFailed', (e) => {
        failed.push(e);
    });

    const scheduler = new JobScheduler<string, TResult>(executor, {
        dispatcher,
        now: () => new Date(clock),
        backoffBaseMs: 1000,
        backoffMaxMs: 60_000,
        ...options,
    });
    return {
        scheduler,
        dispatcher,
        succeeded,
        failed,
        setClock: (ms: number) => {
            clock = ms;
        },
    };
}

describe('JobScheduler', () => {
    beforeEach(() => {
        __resetMetricsForTests();
    });

    it('schedules an Idle job due immediately', () => {
        const { scheduler } = setup(async () => 'ok');
        const id = scheduler.schedule({ name: 'shop', target: 'https://shop.test/', intervalSeconds: 60 });

        expect(scheduler.getJob(id)).toMatchObject({
            id,
            name: 'shop',
            state: 'Idle',
            nextDue: iso(T0),
            intervalSeconds: 60,
            retryCount: 0,
            maxRetries: 3,
            lastResult: null,
        });
    });

    it('runs a due job and reschedules it one interval after completion', async () => {
        const { scheduler, succeeded, setClock } = setup(async (ctx: JobContext<string>) => `fetched ${ctx.target}`);
        const id = scheduler.schedule({ target: 'a', intervalSeconds: 60 });

        expect(scheduler.tick()).toBe(1);
        setClock(T0 + 250);
        await scheduler.whenIdle();

        const status = scheduler.getJob(id);
        expect(status).toMatchObject({
            state: 'Idle',
            nextDue: iso(T0 + 250 + 60_000),
            lastResult: 'fetched a',
            runCount: 1,
            lastRunAt: iso(T0 + 250),
        });
        expect(succeeded).toHaveLength(1);
        expect(succeeded[0]).toMatchObject({ jobId: id, result: 'fetched a', durationMs: 250 });
        expect(scheduler.tick()).toBe(0);
    });

    it('never runs two executions of the same job at once', async () => {
        const pending = gate<string>();
        let calls = 0;
        const { scheduler, setClock } = setup(() => {
            calls++;
            return pending.promise;
        });
        const id = scheduler.schedule({ target: 'a', intervalSeconds: 60 });

        expect(scheduler.tick()).toBe(1);
        expect(scheduler.tick()).toBe(0);
        expect(scheduler.trigger(id)).toBe(false);
        await flush();
        expect(calls).toBe(1);
        expect(scheduler.getJob(id)?.state).toBe('Running');

        setClock(T0 + 120_000);
        expect(scheduler.tick()).toBe(0);
        expect(scheduler.getJob(id)?.overdue).toBe(true);
        expect(getMetricsSnapshot().overdueSkips).toBe(1);

        pending.resolve('done');
        await scheduler.whenIdle();
        expect(calls).toBe(1);
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Idle', overdue: false, runCount: 1 });
    });

    it('backs off exponentially and stops after maxRetries failures', async () => {
        let calls = 0;
        const attempts: number[] = [];
        const { scheduler, failed, setClock } = setup(async (ctx: JobContext<string>) => {
            calls++;
            attempts.push(ctx.attempt);
            throw new FetchError('HTTP 503', 'https://shop.test/', 503);
        });
        const id = scheduler.schedule({ target: 'a', intervalSeconds: 60, maxRetries: 3 });

        scheduler.tick();
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Idle', retryCount: 1, nextDue: iso(T0 + 1000) });

        setClock(T0 + 1000);
        scheduler.tick();
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Idle', retryCount: 2, nextDue: iso(T0 + 3000) });

        setClock(T0 + 3000);
        scheduler.tick();
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Failed', retryCount: 3, lastError: 'HTTP 503' });

        setClock(T0 + 86_400_000);
        expect(scheduler.tick()).toBe(0);
        expect(calls).toBe(3);
        expect(attempts).toEqual([1, 2, 3]);
        expect(failed.map((e) => [e.retryCount, e.terminal, e.nextDue?.toISOString() ?? null])).toEqual([
            [1, false, iso(T0 + 1000)],
            [2, false, iso(T0 + 3000)],
            [3, true, null],
        ]);
        expect(failed[2]).toMatchObject({ errorCode: 'FETCH_FAILED', retryable: true, maxRetries: 3 });
    });

    it('fails at once on a non-retryable error', async () => {
        const { scheduler, failed } = setup(async () => {
            throw new TypeError('bad target');
        });
        const id = scheduler.schedule({ target: 'a', maxRetries: 5 });

        scheduler.tick();
        await scheduler.whenIdle();

        expect(scheduler.getJob(id)).toMatchObject({ state: 'Failed', retryCount: 1 });
        expect(failed[0]).toMatchObject({ terminal: true, retryable: false, errorCode: null });
    });

    it('resets a Failed job so it runs again', async () => {
        let fail = true;
        const { scheduler } = setup(async () => {
            if (fail) throw new Error('no');
            return 'ok';
        });
        const id = scheduler.schedule({ target: 'a', maxRetries: 0 });
        scheduler.tick();
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)?.state).toBe('Failed');

        fail = false;
        expect(scheduler.reset(id)).toBe(true);
        expect(scheduler.reset(id)).toBe(false);
        expect(scheduler.tick()).toBe(1);
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Idle', retryCount: 0, lastResult: 'ok' });
    });

    it('records but suppresses the completion of a job cancelled mid-run', async () => {
        const pending = gate<string>();
        const signals: AbortSignal[] = [];
        const { scheduler, succeeded, failed } = setup((ctx: JobContext<string>) => {
            signals.push(ctx.signal);
            return pending.promise;
        });
        const id = scheduler.schedule({ target: 'a', intervalSeconds: 60 });

        scheduler.tick();
        await flush();
        scheduler.cancel(id);
        expect(signals[0].aborted).toBe(true);

        pending.resolve('late result');
        await scheduler.whenIdle();

        expect(succeeded).toEqual([]);
        expect(failed).toEqual([]);
        expect(scheduler.getJob(id)).toMatchObject({ state: 'Cancelled', lastResult: 'late result', runCount: 1 });
        expect(scheduler.history(id)).toMatchObject([{ success: true, result: 'late result', suppressed: true }]);
        expect(getMetricsSnapshot().completionsSuppressed).toBe(1);
        expect(scheduler.tick()).toBe(0);
    });

    it('throws NotFoundError when cancelling an unknown job', () => {
        const { scheduler } = setup(async () => 'ok');
        expect(() => scheduler.cancel('job-404')).toThrow(NotFoundError);
    });

    it('dispatches due jobs earliest first up to the concurrency limit', async () => {
        const pending = gate<string>();
        const started: string[] = [];
        const { scheduler } = setup((ctx: JobContext<string>) => {
            started.push(ctx.target);
            return pending.promise;
        }, { maxConcurrency: 2 });

        scheduler.schedule({ target: 'late', startAt: new Date(T0 - 1000) });
        scheduler.schedule({ target: 'earliest', startAt: new Date(T0 - 3000) });
        scheduler.schedule({ target: 'middle', startAt: new Date(T0 - 2000) });

        expect(scheduler.tick()).toBe(2);
        await flush();
        expect(started).toEqual(['earliest', 'middle']);
        expect(scheduler.getSummary()).toMatchObject({ total: 3, inFlight: 2, byState: { Running: 2, Idle: 1 } });

        pending.resolve('ok');
        await scheduler.whenIdle();
        expect(scheduler.tick()).toBe(1);
        await scheduler.whenIdle();
        expect(started).toEqual(['earliest', 'middle', 'late']);
    });

    it('skips disabled jobs on tick but runs them on trigger', async () => {
        const { scheduler } = setup(async () => 'ok');
        const id = scheduler.schedule({ target: 'a', enabled: false });

        expect(scheduler.tick()).toBe(0);
        expect(scheduler.trigger(id)).toBe(true);
        await scheduler.whenIdle();
        expect(scheduler.getJob(id)?.runCount).toBe(1);
    });

    it('ignores the completion of a removed job', async () => {
        const pending = gate<string>();
        const { scheduler, succeeded } = setup(() => pending.promise);
        const id = scheduler.schedule({ target: 'a' });

        scheduler.tick();
        await flush();
        expect(scheduler.remove(id)).toBe(true);
        pending.resolve('ok');
        await scheduler.whenIdle();

        expect(succeeded).toEqual([]);
        expect(scheduler.getStatus()).toEqual([]);
        expect(scheduler.getSummary().inFlight).toBe(0);
        expect(scheduler.remove(id)).toBe(false);
    });

    it('keeps a late completion away from a job re-added under the same id', async () => {
        const gates: Gate<string>[] = [];
        let active = 0;
        const { scheduler, succeeded } = setup(async () => {
            const pending = gate<string>();
            gates.push(pending);
            active++;
            try {
                return await pending.promise;
            } finally {
                active--;
            }
        });

        scheduler.schedule({ id: 'a', target: 'first' });
        expect(scheduler.tick()).toBe(1);
        await flush();
        scheduler.remove('a');
        scheduler.schedule({ id: 'a', target: 'second' });
        expect(scheduler.tick()).toBe(1);
        await flush();

        gates[0].resolve('first');
        await flush();

        expect(scheduler.getJob('a')).toMatchObject({ state: 'Running', runCount: 0, lastResult: null });
        expect(scheduler.tick()).toBe(0);
        expect(gates).toHaveLength(2);
        expect(active).toBe(1);
        expect(succeeded).toEqual([]);

        gates[1].resolve('second');
        await scheduler.whenIdle();

        expect(scheduler.getJob('a')).toMatchObject({ state: 'Idle', runCount: 1, lastResult: 'second' });
        expect(succeeded.map((e) => e.result)).toEqual(['second']);
        expect(scheduler.getSummary().inFlight).toBe(0);
    });

    it('keeps scheduling other jobs while an event handler hangs', async () => {
        const { scheduler, dispatcher, setClock } = setup(async (ctx: JobContext<string>) => ctx.target);
        const delivered: string[] = [];
        dispatcher.register('JobSucceeded', (e) => (e.jobId === 'slow' ? new Promise<void>(() => undefined) : undefined));
        dispatcher.register('JobSucceeded', (e) => {
            delivered.push(e.jobId);
        });
        scheduler.schedule({ id: 'slow', target: 'slow', intervalSeconds: 60 });
        scheduler.schedule({ id: 'other', target: 'other', intervalSeconds: 60 });

        expect(scheduler.tick()).toBe(2);
        await flush();
        await flush();

        expect(scheduler.getJob('slow')?.state).toBe('Idle');
        expect(scheduler.getJob('other')).toMatchObject({ state: 'Idle', lastResult: 'other' });
        expect(scheduler.getSummary().inFlight).toBe(0);
        expect(delivered).toEqual(['other']);

        setClock(T0 + 60_000);
        expect(scheduler.tick()).toBe(2);
    });

    it('derives the interval from a cron expression', () => {
        const { scheduler } = setup(async () => 'ok');
        const id = scheduler.schedule({ target: 'a', cron: '*/15 * * * *', intervalSeconds: 5 });
        expect(scheduler.getJob(id)).toMatchObject({ intervalSeconds: 900, cron: '*/15 * * * *' });
    });

    it('rejects invalid definitions with ConfigError', () => {
        const { scheduler } = setup(async () => 'ok');
        expect(() => scheduler.schedule({ target: 'a', cron: 'every day' })).toThrow(ConfigError);
        expect(() => scheduler.schedule({ target: 'a', intervalSeconds: 0 })).toThrow(ConfigError);
        expect(() => scheduler.schedule({ target: 'a', maxRetries: -1 })).toThrow(ConfigError);
        scheduler.schedule({ id: 'fixed', target: 'a' });
        expect(() => scheduler.schedule({ id: 'fixed', target: 'b' })).toThrow(ConfigError);
    });

    it('keeps the last ten history entries', async () => {
        let n = 0;
        const { scheduler } = setup(async () => ++n);
        const id = scheduler.schedule({ target: 'a' });

        for (let i = 0; i < 12; i++) {
            expect(scheduler.trigger(id)).toBe(true);
            await scheduler.whenIdle();
        }

        const history = scheduler.history(id);
        expect(history).toHaveLength(10);
        expect(history[0].result).toBe(3);
        expect(history[9].result).toBe(12);
        expect(scheduler.history(id, 2).map((h) => h.result)).toEqual([11, 12]);
        expect(scheduler.history('unknown')).toEqual([]);
    });

    it('round-trips job definitions through export and import', () => {
        const { scheduler } = setup(async () => 'ok');
        scheduler.schedule({ id: 'a', name: 'Alpha', target: 'https://a.test/', intervalSeconds: 120, maxRetries: 2 });
        scheduler.schedule({ id: 'b', target: 'https://b.test/', cron: '0 * * * *', enabled: false });
        const cancelled = scheduler.schedule({ target: 'https://c.test/' });
        scheduler.cancel(cancelled);

        const exported = scheduler.exportJobs();
        expect(exported).toEqual([
            { id: 'a', name: 'Alpha', target: 'https://a.test/', intervalSeconds: 120, cron: null, maxRetries: 2, enabled: true },
            { id: 'b', name: 'b', target: 'https://b.test/', intervalSeconds: 3600, cron: '0 * * * *', maxRetries: 3, enabled: false },
        ]);

        const other = setup(async () => 'ok').scheduler;
        expect(other.importJobs(exported)).toEqual(['a', 'b']);
        expect(other.exportJobs()).toEqual(exported);
        expect(other.importJobs(exported)).toEqual([]);
    });
});
