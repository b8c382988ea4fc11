/**
 * src/scheduler.ts
 *
 * RECURRING JOB SCHEDULER
 *
 * Owns every recurring job and decides when each one runs.
 *
 *   Idle ──(due)──▶ Running ──(success)──▶ Idle       next due = completion + interval
 *                      │
 *                      ├──(retryable failure, retries left)──▶ Idle   next due = completion + backoff
 *                      └──(retries exhausted / non-retryable)──▶ Failed  (until reset())
 *
 *   any state ──(cancel)──▶ Cancelled (terminal)
 *
 * COORDINATION
 * ────────────
 * - tick() is the only place that dispatches scheduled work. It never waits
 *   on a job body: tasks run detached and post their outcome to a
 *   CompletionChannel, which hands completions to the coordinator one at a
 *   time, in completion order.
 * - Idle → Running is a compare-and-transition on the job record, so a job
 *   id never has two executions in flight. A Running job whose due time has
 *   passed is flagged overdue and skipped.
 * - cancel() is cooperative: the running task's AbortSignal fires, and its
 *   eventual completion is recorded in history but neither reschedules the
 *   job nor reaches the dispatcher.
 * - A completion belongs to the launch that produced it. One that arrives
 *   after its job was removed (or replaced under the same id) is dropped.
 * - State changes are applied as soon as a completion is handled. Events go
 *   out afterwards on a chain per job id, so a slow handler delays only the
 *   events of its own job.
 */

import { log } from 'crawlee';
import { computeBackoff, parseCron } from './utils/backoff.js';
import type { CallbackDispatcher } from './utils/callbackDispatcher.js';
import { CompletionChannel } from './utils/completionChannel.js';
import { ConfigError, NotFoundError, PagewatchError, isRetryable, toErrorMessage } from './utils/errors.js';
import {
    recordCompletionSuppressed,
    recordJobCompleted,
    recordJobDispatched,
    recordJobExhausted,
    recordJobRetried,
    recordOverdueSkip,
} from './utils/metrics.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type JobState = 'Idle' | 'Running' | 'Failed' | 'Cancelled';

export interface JobDefinition<TTarget> {
    /** Defaults to a generated `job-N` id. */
    id?: string;
    name?: string;
    target: TTarget;
    intervalSeconds?: number;
    /** Simple cron form; takes precedence over intervalSeconds. */
    cron?: string | null;
    maxRetries?: number;
    enabled?: boolean;
    /** First due time (default: now). */
    startAt?: Date;
}

export interface JobContext<TTarget> {
    jobId: string;
    name: string;
    target: TTarget;
    /** 1 for a first attempt, n + 1 after n consecutive failures. */
    attempt: number;
    signal: AbortSignal;
}

export type JobExecutor<TTarget, TResult> = (ctx: JobContext<TTarget>) => Promise<TResult>;

export interface JobHistoryEntry<TResult> {
    timestamp: string;
    success: boolean;
    result: TResult | null;
    error: string | null;
    durationMs: number;
    /** Completion arrived after the job was cancelled. */
    suppressed: boolean;
}

export interface JobStatus<TTarget, TResult> {
    id: string;
    name: string;
    target: TTarget;
    state: JobState;
    nextDue: string;
    intervalSeconds: number;
    cron: string | null;
    retryCount: number;
    maxRetries: number;
    enabled: boolean;
    overdue: boolean;
    runCount: number;
    errorCount: number;
    lastResult: TResult | null;
    lastError: string | null;
    lastRunAt: string | null;
}

export interface ExportedJob<TTarget> {
    id: string;
    name: string;
    target: TTarget;
    intervalSeconds: number;
    cron: string | null;
    maxRetries: number;
    enabled: boolean;
}

export interface SchedulerSummary {
    total: number;
    byState: Record<JobState, number>;
    inFlight: number;
    overdue: number;
    started: boolean;
}

export interface SchedulerOptions {
    dispatcher?: CallbackDispatcher;
    now?: () => Date;
    tickMs?: number;
    maxConcurrency?: number;
    backoffBaseMs?: number;
    backoffMaxMs?: number;
    defaultIntervalSeconds?: number;
    defaultMaxRetries?: number;
    historySize?: number;
}

interface Job<TTarget, TResult> {
    id: string;
    name: string;
    target: TTarget;
    intervalMs: number;
    cron: string | null;
    nextDue: Date;
    state: JobState;
    retryCount: number;
    maxRetries: number;
    enabled: boolean;
    overdue: boolean;
    runCount: number;
    errorCount: number;
    lastResult: TResult | null;
    lastError: string | null;
    lastRunAt: Date | null;
    history: JobHistoryEntry<TResult>[];
    controller: AbortController | null;
}

type Outcome<TResult> = { ok: true; value: TResult } | { ok: false; error: unknown };

interface Completion<TResult> {
    jobId: string;
    /** Identifies the launch; compared against the job's current controller. */
    controller: AbortController;
    startedAt: Date;
    completedAt: Date;
    outcome: Outcome<TResult>;
}

// ─── Scheduler ────────────────────────────────────────────────────────────────

export class JobScheduler<TTarget, TResult> {
    private readonly jobs = new Map<string, Job<TTarget, TResult>>();
    private readonly tasks = new Set<Promise<void>>();
    private readonly eventChains = new Map<string, Promise<void>>();
    private readonly channel: CompletionChannel<Completion<TResult>>;
    private readonly dispatcher: CallbackDispatcher | null;
    private readonly now: () => Date;
    private readonly tickMs: number;
    private readonly maxConcurrency: number;
    private readonly backoffBaseMs: number;
    private readonly backoffMaxMs: number;
    private readonly defaultIntervalSeconds: number;
    private readonly defaultMaxRetries: number;
    private readonly historySize: number;

    private inFlight = 0;
    private sequence = 0;
    private timer: ReturnType<typeof setInterval> | null = null;

    constructor(
        private readonly executor: JobExecutor<TTarget, TResult>,
        options: SchedulerOptions = {},
    ) {
        this.dispatcher = options.dispatcher ?? null;
        this.now = options.now ?? (() => new Date());
        this.tickMs = options.tickMs ?? 1000;
        this.maxConcurrency = Math.max(1, options.maxConcurrency ?? 4);
        this.backoffBaseMs = options.backoffBaseMs ?? 1000;
        this.backoffMaxMs = options.backoffMaxMs ?? 300_000;
        this.defaultIntervalSeconds = options.defaultIntervalSeconds ?? 300;
        this.defaultMaxRetries = options.defaultMaxRetries ?? 3;
        this.historySize = options.historySize ?? 10;
        this.channel = new CompletionChannel((c) => this.handleCompletion(c));
    }

    // ─── Registration ─────────────────────────────────────────────────────────

    /** Registers a job and returns its id. Throws ConfigError on an invalid definition. */
    schedule(def: JobDefinition<TTarget>): string {
        const id = def.id ?? this.nextId();
        if (this.jobs.has(id)) {
            throw new ConfigError(`Job id already scheduled: ${id}`);
        }

        let intervalSeconds = def.intervalSeconds ?? this.defaultIntervalSeconds;
        if (def.cron) {
            const fromCron = parseCron(def.cron);
            if (fromCron === null) {
                throw new ConfigError(`Unsupported cron expression for ${id}: "${def.cron}"`);
            }
            intervalSeconds = fromCron;
        }
        if (!Number.isFinite(intervalSeconds) || intervalSeconds <= 0) {
            throw new ConfigError(`Interval for ${id} must be positive, got ${intervalSeconds}`);
        }

        const maxRetries = def.maxRetries ?? this.defaultMaxRetries;
        if (!Number.isInteger(maxRetries) || maxRetries < 0) {
            throw new ConfigError(`maxRetries for ${id} must be a non-negative integer, got ${maxRetries}`);
        }

        const job: Job<TTarget, TResult> = {
            id,
            name: def.name ?? id,
            target: def.target,
            intervalMs: intervalSeconds * 1000,
            cron: def.cron ?? null,
            nextDue: new Date((def.startAt ?? this.now()).getTime()),
            state: 'Idle',
            retryCount: 0,
            maxRetries,
            enabled: def.enabled ?? true,
            overdue: false,
            runCount: 0,
            errorCount: 0,
            lastResult: null,
            lastError: null,
            lastRunAt: null,
            history: [],
            controller: null,
        };
        this.jobs.set(id, job);

        log.info(
            `[Scheduler] Scheduled ${job.name} (${id}) every ${intervalSeconds}s` +
            `${job.enabled ? '' : ' [disabled]'}, first due ${job.nextDue.toISOString()}`,
        );
        return id;
    }

    private nextId(): string {
        let id: string;
        do {
            id = `job-${++this.sequence}`;
        } while (this.jobs.has(id));
        return id;
    }

    /** Throws NotFoundError for an unknown id. Cancelling twice is a no-op. */
    cancel(jobId: string): void {
        const job = this.require(jobId);
        if (job.state === 'Cancelled') return;

        const wasRunning = job.state === 'Running';
        job.state = 'Cancelled';
        job.overdue = false;
        job.controller?.abort(new CancelledError(jobId));

        log.info(`[Scheduler] Cancelled ${job.name} (${jobId})${wasRunning ? ' while running' : ''}.`);
    }

    /** Revives a Failed job: retries reset, due immediately. */
    reset(jobId: string): boolean {
        const job = this.require(jobId);
        if (!this.transition(job, 'Failed', 'Idle')) return false;
        job.retryCount = 0;
        job.nextDue = this.now();
        log.info(`[Scheduler] Reset ${job.name} (${jobId}).`);
        return true;
    }

    /**
     * Forgets a job. A running execution is aborted and its completion is
     * ignored.
     */
    remove(jobId: string): boolean {
        const job = this.jobs.get(jobId);
        if (!job) return false;
        job.controller?.abort(new CancelledError(jobId));
        this.jobs.delete(jobId);
        log.info(`[Scheduler] Removed ${job.name} (${jobId}).`);
        return true;
    }

    setEnabled(jobId: string, enabled: boolean): void {
        this.require(jobId).enabled = enabled;
    }

    // ─── Dispatch ─────────────────────────────────────────────────────────────

    /**
     * Dispatches every due, enabled Idle job, earliest first, up to the
     * concurrency limit. Returns the number of jobs started.
     */
    tick(): number {
        const now = this.now();
        const due: Job<TTarget, TResult>[] = [];

        for (const job of this.jobs.values()) {
            if (job.state === 'Running') {
                if (!job.overdue && job.nextDue.getTime() <= now.getTime()) {
                    job.overdue = true;
                    recordOverdueSkip();
                    log.warning(`[Scheduler] ${job.name} (${job.id}) is overdue; previous run still in flight.`);
                }
                continue;
            }
            if (job.state === 'Idle' && job.enabled && job.nextDue.getTime() <= now.getTime()) {
                due.push(job);
            }
        }

        due.sort((a, b) => a.nextDue.getTime() - b.nextDue.getTime());

        let started = 0;
        for (const job of due) {
            if (this.inFlight >= this.maxConcurrency) {
                log.debug(`[Scheduler] Concurrency limit ${this.maxConcurrency} reached; ${due.length - started} job(s) wait.`);
                break;
            }
            if (this.launch(job, now)) started++;
        }
        return started;
    }

    /**
     * Runs a job now regardless of its due time. Returns false when it is
     * not Idle (already running, failed, cancelled) or no slot is free.
     */
    trigger(jobId: string): boolean {
        const job = this.require(jobId);
        if (job.state !== 'Idle') {
            log.debug(`[Scheduler] Trigger ignored for ${job.name} (${jobId}): ${job.state}.`);
            return false;
        }
        if (this.inFlight >= this.maxConcurrency) {
            log.debug(`[Scheduler] Trigger deferred for ${job.name} (${jobId}): no free slot.`);
            return false;
        }
        return this.launch(job, this.now());
    }

    private transition(job: Job<TTarget, TResult>, from: JobState, to: JobState): boolean {
        if (job.state !== from) return false;
        job.state = to;
        return true;
    }

    private launch(job: Job<TTarget, TResult>, now: Date): boolean {
        if (!this.transition(job, 'Idle', 'Running')) return false;

        const controller = new AbortController();
        job.controller = controller;
        job.overdue = false;
        // Provisional; replaced when the run completes.
        job.nextDue = new Date(now.getTime() + job.intervalMs);
        this.inFlight++;
        recordJobDispatched();

        const ctx: JobContext<TTarget> = {
            jobId: job.id,
            name: job.name,
            target: job.target,
            attempt: job.retryCount + 1,
            signal: controller.signal,
        };
        const startedAt = new Date(now.getTime());

        log.debug(`[Scheduler] ▶ ${job.name} (${job.id}) attempt ${ctx.attempt}`);

        const task: Promise<void> = Promise.resolve()
            .then(() => this.executor(ctx))
            .then(
                (value) => {
                    this.channel.post({ jobId: job.id, controller, startedAt, completedAt: this.now(), outcome: { ok: true, value } });
                },
                (error: unknown) => {
                    this.channel.post({ jobId: job.id, controller, startedAt, completedAt: this.now(), outcome: { ok: false, error } });
                },
            )
            .finally(() => {
                this.tasks.delete(task);
            });
        this.tasks.add(task);
        return true;
    }

    // ─── Completion ───────────────────────────────────────────────────────────

    private handleCompletion(completion: Completion<TResult>): void {
        this.inFlight = Math.max(0, this.inFlight - 1);

        const job = this.jobs.get(completion.jobId);
        if (!job || job.controller !== completion.controller) {
            log.debug(`[Scheduler] Completion for removed job ${completion.jobId} ignored.`);
            return;
        }

        const { outcome, completedAt } = completion;
        const durationMs = completedAt.getTime() - completion.startedAt.getTime();
        const suppressed = job.state === 'Cancelled';

        job.controller = null;
        job.runCount++;
        job.lastRunAt = completedAt;
        recordJobCompleted(outcome.ok, durationMs);

        if (outcome.ok) {
            job.lastResult = outcome.value;
            job.lastError = null;
        } else {
            job.errorCount++;
            job.lastError = toErrorMessage(outcome.error);
        }
        this.pushHistory(job, {
            timestamp: completedAt.toISOString(),
            success: outcome.ok,
            result: outcome.ok ? outcome.value : null,
            error: outcome.ok ? null : toErrorMessage(outcome.error),
            durationMs,
            suppressed,
        });

        if (suppressed) {
            recordCompletionSuppressed();
            log.info(`[Scheduler] ${job.name} (${job.id}) finished after cancel; result recorded, no callbacks.`);
            return;
        }
        if (job.state !== 'Running') return;

        job.overdue = false;
        if (outcome.ok) {
            this.onSuccess(job, outcome.value, completion.startedAt, completedAt, durationMs);
        } else {
            this.onFailure(job, outcome.error, completedAt);
        }
    }

    private onSuccess(
        job: Job<TTarget, TResult>,
        value: TResult,
        startedAt: Date,
        completedAt: Date,
        durationMs: number,
    ): void {
        job.retryCount = 0;
        job.nextDue = new Date(completedAt.getTime() + job.intervalMs);
        job.state = 'Idle';

        log.info(`[Scheduler] ✓ ${job.name} (${job.id}) in ${durationMs}ms; next ${job.nextDue.toISOString()}`);

        const event = {
            jobId: job.id,
            name: job.name,
            result: value,
            startedAt,
            completedAt,
            durationMs,
            nextDue: new Date(job.nextDue.getTime()),
        };
        this.notify(job.id, (dispatcher) => dispatcher.dispatch('JobSucceeded', event));
    }

    private onFailure(job: Job<TTarget, TResult>, error: unknown, completedAt: Date): void {
        const retryable = isRetryable(error);
        const priorFailures = job.retryCount;
        job.retryCount++;

        const terminal = !retryable || job.retryCount >= job.maxRetries;
        let nextDue: Date | null = null;

        if (terminal) {
            job.state = 'Failed';
            if (retryable) recordJobExhausted();
            log.error(
                `[Scheduler] ✗ ${job.name} (${job.id}) failed` +
                `${retryable ? ` ${job.retryCount}/${job.maxRetries} times` : ' (not retryable)'}: ` +
                `${toErrorMessage(error)}. Requires reset().`,
            );
        } else {
            const delay = computeBackoff(priorFailures, this.backoffBaseMs, this.backoffMaxMs);
            nextDue = new Date(completedAt.getTime() + delay);
            job.nextDue = nextDue;
            job.state = 'Idle';
            recordJobRetried();
            log.warning(
                `[Scheduler] ${job.name} (${job.id}) failed (${job.retryCount}/${job.maxRetries}): ` +
                `${toErrorMessage(error)}. Retrying in ${delay}ms.`,
            );
        }

        const event = {
            jobId: job.id,
            name: job.name,
            error: toErrorMessage(error),
            errorCode: error instanceof PagewatchError ? error.code : null,
            retryable,
            retryCount: job.retryCount,
            maxRetries: job.maxRetries,
            terminal,
            nextDue,
            completedAt,
        };
        this.notify(job.id, (dispatcher) => dispatcher.dispatch('JobFailed', event));
    }

    /** Queues an event behind the earlier events of the same job. */
    private notify(jobId: string, send: (dispatcher: CallbackDispatcher) => Promise<unknown>): void {
        const dispatcher = this.dispatcher;
        if (!dispatcher) return;

        const previous = this.eventChains.get(jobId) ?? Promise.resolve();
        const next: Promise<void> = previous
            .then(() => send(dispatcher))
            .then(
                () => undefined,
                (err: unknown) => {
                    log.error(`[Scheduler] Event delivery for ${jobId} failed: ${toErrorMessage(err)}`);
                },
            );
        this.eventChains.set(jobId, next);
        void next.finally(() => {
            if (this.eventChains.get(jobId) === next) this.eventChains.delete(jobId);
        });
    }

    private pushHistory(job: Job<TTarget, TResult>, entry: JobHistoryEntry<TResult>): void {
        job.history.push(entry);
        if (job.history.length > this.historySize) {
            job.history.splice(0, job.history.length - this.historySize);
        }
    }

    // ─── Lifecycle ────────────────────────────────────────────────────────────

    start(): void {
        if (this.timer !== null) return;
        log.info(`[Scheduler] Started: ${this.jobs.size} job(s), tick ${this.tickMs}ms, concurrency ${this.maxConcurrency}.`);
        this.safeTick();
        this.timer = setInterval(() => this.safeTick(), this.tickMs);
    }

    private safeTick(): void {
        try {
            this.tick();
        } catch (err) {
            log.error(`[Scheduler] Tick failed: ${toErrorMessage(err)}`);
        }
    }

    /**
     * Stops dispatching and waits for in-flight runs to be recorded. Events
     * still being delivered are not waited for; use whenIdle() for that.
     */
    async stop(): Promise<void> {
        if (this.timer !== null) {
            clearInterval(this.timer);
            this.timer = null;
        }
        await this.whenRunsSettled();
        log.info('[Scheduler] Stopped.');
    }

    /** Resolves once no task is running and every completion and event has been handled. */
    async whenIdle(): Promise<void> {
        await this.whenRunsSettled();
        while (this.eventChains.size > 0) {
            await Promise.allSettled([...this.eventChains.values()]);
            await this.whenRunsSettled();
        }
    }

    private async whenRunsSettled(): Promise<void> {
        while (this.tasks.size > 0 || this.channel.busy || this.channel.pending > 0) {
            await Promise.allSettled([...this.tasks]);
            await this.channel.idle();
        }
    }

    get isStarted(): boolean {
        return this.timer !== null;
    }

    // ─── Queries (never throw) ────────────────────────────────────────────────

    getStatus(): JobStatus<TTarget, TResult>[] {
        return [...this.jobs.values()].map((job) => this.toStatus(job));
    }

    getJob(jobId: string): JobStatus<TTarget, TResult> | undefined {
        const job = this.jobs.get(jobId);
        return job ? this.toStatus(job) : undefined;
    }

    /** Most recent entries last; unknown ids give an empty list. */
    history(jobId: string, limit = this.historySize): JobHistoryEntry<TResult>[] {
        const entries = this.jobs.get(jobId)?.history ?? [];
        return limit <= 0 ? [] : entries.slice(-limit).map((e) => ({ ...e }));
    }

    getSummary(): SchedulerSummary {
        const byState: Record<JobState, number> = { Idle: 0, Running: 0, Failed: 0, Cancelled: 0 };
        let overdue = 0;
        for (const job of this.jobs.values()) {
            byState[job.state]++;
            if (job.overdue) overdue++;
        }
        return {
            total: this.jobs.size,
            byState,
            inFlight: this.inFlight,
            overdue,
            started: this.timer !== null,
        };
    }

    private toStatus(job: Job<TTarget, TResult>): JobStatus<TTarget, TResult> {
        return {
            id: job.id,
            name: job.name,
            target: job.target,
            state: job.state,
            nextDue: job.nextDue.toISOString(),
            intervalSeconds: job.intervalMs / 1000,
            cron: job.cron,
            retryCount: job.retryCount,
            maxRetries: job.maxRetries,
            enabled: job.enabled,
            overdue: job.overdue,
            runCount: job.runCount,
            errorCount: job.errorCount,
            lastResult: job.lastResult,
            lastError: job.lastError,
            lastRunAt: job.lastRunAt ? job.lastRunAt.toISOString() : null,
        };
    }

    // ─── Definitions Round Trip ───────────────────────────────────────────────

    /** Definitions of every job that is not Cancelled. */
    exportJobs(): ExportedJob<TTarget>[] {
        return [...this.jobs.values()]
            .filter((job) => job.state !== 'Cancelled')
            .map((job) => ({
                id: job.id,
                name: job.name,
                target: job.target,
                intervalSeconds: job.intervalMs / 1000,
                cron: job.cron,
                maxRetries: job.maxRetries,
                enabled: job.enabled,
            }));
    }

    /** Schedules each definition whose id is not taken; returns the new ids. */
    importJobs(defs: Iterable<JobDefinition<TTarget>>): string[] {
        const ids: string[] = [];
        for (const def of defs) {
            if (def.id !== undefined && this.jobs.has(def.id)) {
                log.warning(`[Scheduler] Import skipped ${def.id}: already scheduled.`);
                continue;
            }
            ids.push(this.schedule(def));
        }
        return ids;
    }

    private require(jobId: string): Job<TTarget, TResult> {
        const job = this.jobs.get(jobId);
        if (!job) throw new NotFoundError('Job', jobId);
        return job;
    }
}

/** Abort reason passed to a job's signal on cancel() or remove(). */
export class CancelledError extends Error {
    constructor(readonly jobId: string) {
        super(`Job ${jobId} was cancelled`);
        this.name = 'CancelledError';
    }
}
