/**
 * src/utils/metrics.ts
 *
 * In-memory counters for the scrape pipeline.
 *
 * Every counter is a plain number in module scope; the record* functions are
 * synchronous so they can sit on the hot path of the scheduler and the
 * dispatcher. `startMetricsReporter()` logs a summary on an interval.
 */

import { log } from 'crawlee';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface MetricsSnapshot {
    snapshotAt: string;
    uptimeSeconds: number;
    jobsDispatched: number;
    jobsSucceeded: number;
    jobsFailed: number;
    /** Failures that were rescheduled with backoff. */
    jobsRetried: number;
    /** Jobs that reached max retries and stopped. */
    jobsExhausted: number;
    /** Completions recorded after the job was cancelled. */
    completionsSuppressed: number;
    /** Ticks that found a job still running past its due time. */
    overdueSkips: number;
    changesDetected: number;
    diffsComputed: number;
    priceObservations: number;
    priceAlerts: number;
    priceParseErrors: number;
    handlerFailures: number;
    /** Success rate 0–100 over completed runs. */
    successRatePct: number;
    /** Average job run time over the last 100 completions. */
    avgRunMs: number;
}

// ─── Internal State ───────────────────────────────────────────────────────────

let startedAt = Date.now();
let jobsDispatched = 0;
let jobsSucceeded = 0;
let jobsFailed = 0;
let jobsRetried = 0;
let jobsExhausted = 0;
let completionsSuppressed = 0;
let overdueSkips = 0;
let changesDetected = 0;
let diffsComputed = 0;
let priceObservations = 0;
let priceAlerts = 0;
let priceParseErrors = 0;
let handlerFailures = 0;

const runTimes: number[] = [];
const RUN_TIME_RING_SIZE = 100;

let reporterId: ReturnType<typeof setInterval> | null = null;

// ─── Recording ────────────────────────────────────────────────────────────────

export function recordJobDispatched(): void { jobsDispatched++; }
export function recordJobRetried(): void { jobsRetried++; }
export function recordJobExhausted(): void { jobsExhausted++; }
export function recordCompletionSuppressed(): void { completionsSuppressed++; }
export function recordOverdueSkip(): void { overdueSkips++; }
export function recordChangeDetected(): void { changesDetected++; }
export function recordDiffComputed(): void { diffsComputed++; }
export function recordPriceObservation(): void { priceObservations++; }
export function recordPriceAlert(): void { priceAlerts++; }
export function recordPriceParseError(): void { priceParseErrors++; }
export function recordHandlerFailure(): void { handlerFailures++; }

export function recordJobCompleted(ok: boolean, durationMs: number): void {
    if (ok) jobsSucceeded++;
    else jobsFailed++;
    runTimes.push(durationMs);
    if (runTimes.length > RUN_TIME_RING_SIZE) runTimes.shift();
}

// ─── Reading ──────────────────────────────────────────────────────────────────

export function getMetricsSnapshot(now: number = Date.now()): MetricsSnapshot {
    const completed = jobsSucceeded + jobsFailed;
    const avgRunMs = runTimes.length === 0
        ? 0
        : Math.round(runTimes.reduce((sum, t) => sum + t, 0) / runTimes.length);

    return {
        snapshotAt: new Date(now).toISOString(),
        uptimeSeconds: Math.round((now - startedAt) / 1000),
        jobsDispatched,
        jobsSucceeded,
        jobsFailed,
        jobsRetried,
        jobsExhausted,
        completionsSuppressed,
        overdueSkips,
        changesDetected,
        diffsComputed,
        priceObservations,
        priceAlerts,
        priceParseErrors,
        handlerFailures,
        successRatePct: completed === 0 ? 100 : Math.round((jobsSucceeded / completed) * 1000) / 10,
        avgRunMs,
    };
}

export function logMetricsSummary(): void {
    const s = getMetricsSnapshot();
    log.info('─'.repeat(60));
    log.info('  PIPELINE METRICS');
    log.info(`  Uptime            : ${s.uptimeSeconds}s`);
    log.info(`  Runs              : ${s.jobsSucceeded} ok / ${s.jobsFailed} failed (${s.successRatePct}%)`);
    log.info(`  Retried/Exhausted : ${s.jobsRetried} / ${s.jobsExhausted}`);
    log.info(`  Avg run time      : ${s.avgRunMs}ms`);
    log.info(`  Changes / Diffs   : ${s.changesDetected} / ${s.diffsComputed}`);
    log.info(`  Prices / Alerts   : ${s.priceObservations} / ${s.priceAlerts} (parse errors: ${s.priceParseErrors})`);
    log.info(`  Handler failures  : ${s.handlerFailures}`);
    log.info('─'.repeat(60));
}

export function startMetricsReporter(intervalMs: number): void {
    if (reporterId !== null || intervalMs <= 0) return;
    reporterId = setInterval(logMetricsSummary, intervalMs);
    reporterId.unref();
}

export function stopMetricsReporter(): void {
    if (reporterId !== null) {
        clearInterval(reporterId);
        reporterId = null;
    }
}

export function __resetMetricsForTests(): void {
    startedAt = Date.now();
    jobsDispatched = 0;
    jobsSucceeded = 0;
    jobsFailed = 0;
    jobsRetried = 0;
    jobsExhausted = 0;
    completionsSuppressed = 0;
    overdueSkips = 0;
    changesDetected = 0;
    diffsComputed = 0;
    priceObservations = 0;
    priceAlerts = 0;
    priceParseErrors = 0;
    handlerFailures = 0;
    runTimes.length = 0;
}
