/**
 * src/main.ts
 *
 * ENTRY POINT: recurring scrape monitor
 *
 * Loads job definitions from JOBS_FILE, wires
 *
 *   JobScheduler → ScrapePipeline (HttpFetcher + CheerioExtractor)
 *                    → ChangeTracker / SnapshotStore + DiffEngine / PriceMonitor
 *                    → CallbackDispatcher → alert channels
 *
 * and runs until SIGINT / SIGTERM.
 *
 * LOGGING
 * ───────
 *  • LOG_LEVEL (or --verbose) sets the level; LOG_JSON switches to JSON lines.
 *  • All stdout/stderr is mirrored to LOG_FILE (truncated at start).
 *
 * SHUTDOWN
 * ────────
 *  • Stops dispatching, waits for in-flight runs, logs the metrics summary
 *    and, when PRICE_EXPORT_PATH is set, writes the price history CSV.
 */

import * as fs from 'fs/promises';
import { log } from 'crawlee';
import { env } from './config/env.js';
import { loadJobsFile } from './config/jobsFile.js';
import { CheerioExtractor } from './extractors/cheerioExtractor.js';
import { createScrapePipeline, type ScrapeRunSummary, type ScrapeTarget } from './pipeline.js';
import { JobScheduler } from './scheduler.js';
import { HttpFetcher } from './sources/httpFetcher.js';
import { AlertNotifier, attachAlertChannels } from './utils/alerts.js';
import { CallbackDispatcher } from './utils/callbackDispatcher.js';
import { toErrorMessage } from './utils/errors.js';
import { closeFileLogger, initFileLogger } from './utils/fileLogger.js';
import { configureLogging, isVerboseArgv } from './utils/logging.js';
import { logMetricsSummary, startMetricsReporter, stopMetricsReporter } from './utils/metrics.js';
import { PriceMonitor } from './utils/priceMonitor.js';
import { SnapshotStore } from './utils/snapshotStore.js';

// ─── File Logger (first, it truncates the log file) ──────────────────────────
if (env.LOG_FILE) {
    initFileLogger(env.LOG_FILE);
}

// ─── Logging ──────────────────────────────────────────────────────────────────
configureLogging({ level: env.LOG_LEVEL, json: env.LOG_JSON, verbose: isVerboseArgv() });

// ─── Main ─────────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
    const dispatcher = new CallbackDispatcher();
    const snapshots = new SnapshotStore();
    const priceMonitor = new PriceMonitor({
        dispatcher,
        defaultThresholdPct: env.PRICE_ALERT_THRESHOLD_PCT,
    });

    const pipeline = createScrapePipeline({
        fetcher: new HttpFetcher({
            userAgent: env.USER_AGENT || undefined,
            proxyUrl: env.PROXY_URL || undefined,
        }),
        extractor: new CheerioExtractor(),
        snapshots,
        priceMonitor,
        dispatcher,
        fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    });

    const scheduler = new JobScheduler<ScrapeTarget, ScrapeRunSummary>(pipeline, {
        dispatcher,
        tickMs: env.SCHEDULER_TICK_MS,
        maxConcurrency: env.SCHEDULER_MAX_CONCURRENCY,
        backoffBaseMs: env.BACKOFF_BASE_MS,
        backoffMaxMs: env.BACKOFF_MAX_MS,
        defaultIntervalSeconds: env.DEFAULT_INTERVAL_SECONDS,
        defaultMaxRetries: env.DEFAULT_MAX_RETRIES,
    });

    attachAlertChannels(dispatcher, new AlertNotifier({
        slackWebhook: env.ALERT_SLACK_WEBHOOK,
        webhookUrl: env.ALERT_WEBHOOK_URL,
        cooldownMin: env.ALERT_COOLDOWN_MIN,
        enabled: env.ENABLE_ALERTS,
    }));

    const ids = scheduler.importJobs(await loadJobsFile(env.JOBS_FILE));
    if (ids.length === 0) {
        log.warning(`[Main] No jobs scheduled. Add targets to ${env.JOBS_FILE}.`);
    }

    // ── Termination Handling ──────────────────────────────────────────────────
    let isShuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        log.info(`[Main] 🛑 Received ${signal}. Shutting down gracefully...`);

        let exitCode = 0;
        try {
            await scheduler.stop();
            stopMetricsReporter();
            logMetricsSummary();

            const snap = snapshots.changeSummary();
            log.info(
                `[Main] Snapshots: ${snap.totalSnapshots} across ${snap.sourcesTracked} source(s), ` +
                `${snap.sourcesWithChanges} changed.`,
            );

            if (env.PRICE_EXPORT_PATH) {
                await fs.writeFile(env.PRICE_EXPORT_PATH, priceMonitor.exportHistoryCsv(), 'utf-8');
                log.info(`[Main] Price history written to ${env.PRICE_EXPORT_PATH}`);
            }
            log.info('[Main] Cleanup complete. Exiting.');
        } catch (err) {
            exitCode = 1;
            log.error(`[Main] Cleanup failed during shutdown: ${toErrorMessage(err)}`);
        }
        closeFileLogger();
        process.exit(exitCode);
    };

    process.on('SIGINT', () => void shutdown('SIGINT (Ctrl+C)'));
    process.on('SIGTERM', () => void shutdown('SIGTERM'));

    startMetricsReporter(env.METRICS_SUMMARY_INTERVAL_MS);
    scheduler.start();
}

main().catch((err: unknown) => {
    log.error(`[Main] Fatal: ${toErrorMessage(err)}`);
    closeFileLogger();
    process.exit(1);
});
