/**
 * src/pipeline.ts
 *
 * SCRAPE PIPELINE
 *
 * The job body the scheduler runs for every scrape target:
 *
 *   fetch (bounded by timeout)
 *     → extract items
 *     → change tracking          ChangeDetected when the item set moved
 *     → snapshot + line diff     DiffComputed when the raw content moved
 *     → price ingest             PriceAlertFired from the monitor
 *     → run summary (the job's result)
 *
 * Everything after extraction runs under a per-source lock, so two targets
 * sharing a source key never interleave their snapshot and price writes.
 * A cancelled job stops at the next step boundary and emits nothing more;
 * price ingest also checks between items.
 */

import { log } from 'crawlee';
import { ChangeTracker } from './utils/changeDetector.js';
import type { CallbackDispatcher } from './utils/callbackDispatcher.js';
import { DiffEngine, type DiffResult } from './utils/diffEngine.js';
import { ExtractionError, FetchError, PagewatchError, toErrorMessage } from './utils/errors.js';
import { KeyedMutex } from './utils/keyedMutex.js';
import { recordChangeDetected, recordDiffComputed } from './utils/metrics.js';
import type { PriceMonitor } from './utils/priceMonitor.js';
import type { SnapshotStore } from './utils/snapshotStore.js';
import { withTimeout } from './utils/timeout.js';
import type { JobContext, JobExecutor } from './scheduler.js';
import type { ExtractionResult, Extractor, Fetcher, SelectorSpec } from './sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PriceTracking {
    /** Source id for the price series (default: the target's source key). */
    sourceId?: string;
    priceField?: string;
    nameField?: string;
}

export interface ScrapeTarget {
    name: string;
    url: string;
    selector: SelectorSpec;
    headers?: Record<string, string>;
    /** Snapshot / change-tracking key (default: name). */
    sourceKey?: string;
    price?: PriceTracking;
}

export interface ScrapeRunSummary {
    sourceKey: string;
    url: string;
    extractedAt: string;
    itemCount: number;
    fingerprint: string;
    initial: boolean;
    changed: boolean;
    added: number;
    removed: number;
    snapshotLabel: string;
    diff: Pick<DiffResult, 'fromLabel' | 'toLabel' | 'addedLines' | 'removedLines' | 'similarity'> | null;
    prices: { tracked: number; alerts: number; errors: number } | null;
}

export interface PipelineDeps {
    fetcher: Fetcher;
    extractor: Extractor;
    snapshots: SnapshotStore;
    priceMonitor: PriceMonitor;
    changeTracker?: ChangeTracker;
    diffEngine?: DiffEngine;
    dispatcher?: CallbackDispatcher;
    fetchTimeoutMs?: number;
}

export type ScrapePipeline = JobExecutor<ScrapeTarget, ScrapeRunSummary>;

// ─── Pipeline ─────────────────────────────────────────────────────────────────

export function createScrapePipeline(deps: PipelineDeps): ScrapePipeline {
    const changeTracker = deps.changeTracker ?? new ChangeTracker();
    const diffEngine = deps.diffEngine ?? new DiffEngine(deps.snapshots);
    const fetchTimeoutMs = deps.fetchTimeoutMs ?? 30_000;
    const dispatcher = deps.dispatcher ?? null;
    const mutex = new KeyedMutex();

    async function fetchContent(target: ScrapeTarget): Promise<string> {
        try {
            return await withTimeout(
                deps.fetcher.fetch(target.url, target.headers ?? {}, fetchTimeoutMs),
                fetchTimeoutMs,
                target.url,
            );
        } catch (err) {
            if (err instanceof PagewatchError) throw err;
            throw new FetchError(`Request failed for ${target.url}: ${toErrorMessage(err)}`, target.url, null, { cause: err });
        }
    }

    async function extract(content: string, target: ScrapeTarget, sourceKey: string): Promise<ExtractionResult> {
        try {
            return await deps.extractor.extract(content, target.selector, sourceKey);
        } catch (err) {
            if (err instanceof PagewatchError) throw err;
            throw new ExtractionError(`Extraction failed for ${sourceKey}: ${toErrorMessage(err)}`, false, { cause: err });
        }
    }

    return async (ctx: JobContext<ScrapeTarget>): Promise<ScrapeRunSummary> => {
        const { target, signal, jobId } = ctx;
        const sourceKey = target.sourceKey ?? target.name;

        log.debug(`[Pipeline] ${sourceKey}: fetching ${target.url}`);
        const content = await fetchContent(target);
        signal.throwIfAborted();

        const result = await extract(content, target, sourceKey);
        signal.throwIfAborted();

        return mutex.runExclusive(sourceKey, async () => {
            // Cancelled while waiting for the lock.
            signal.throwIfAborted();

            // ── Item-level change detection, raw snapshot and line diff.
            // All three are written before any handler runs.
            const report = changeTracker.observe(result);
            const label = result.extractedAt.toISOString();
            const previous = deps.snapshots.latest(sourceKey);
            deps.snapshots.snapshot(sourceKey, label, content, result.extractedAt);
            const diff: DiffResult | null = previous && previous.label !== label
                ? diffEngine.compare(sourceKey, previous.label, label)
                : null;

            if (report.changed && !signal.aborted) {
                recordChangeDetected();
                if (dispatcher) await dispatcher.dispatch('ChangeDetected', { jobId, report });
            }
            if (diff && diff.addedLines + diff.removedLines > 0 && !signal.aborted) {
                recordDiffComputed();
                if (dispatcher) await dispatcher.dispatch('DiffComputed', { jobId, diff });
            }

            // ── Prices
            signal.throwIfAborted();
            const prices = target.price
                ? await deps.priceMonitor.ingestScrapeResults(
                    result,
                    target.price.sourceId ?? sourceKey,
                    target.price.priceField,
                    target.price.nameField,
                    signal,
                )
                : null;

            log.info(
                `[Pipeline] ${sourceKey}: ${result.items.length} items` +
                `${report.initial ? ' (baseline)' : report.changed ? `, +${report.added.length}/-${report.removed.length}` : ', unchanged'}` +
                `${prices ? `, ${prices.tracked} prices, ${prices.alerts.length} alerts` : ''}`,
            );

            return {
                sourceKey,
                url: target.url,
                extractedAt: label,
                itemCount: result.items.length,
                fingerprint: report.fingerprint,
                initial: report.initial,
                changed: report.changed,
                added: report.added.length,
                removed: report.removed.length,
                snapshotLabel: label,
                diff: diff
                    ? {
                        fromLabel: diff.fromLabel,
                        toLabel: diff.toLabel,
                        addedLines: diff.addedLines,
                        removedLines: diff.removedLines,
                        similarity: diff.similarity,
                    }
                    : null,
                prices: prices
                    ? { tracked: prices.tracked, alerts: prices.alerts.length, errors: prices.errors.length }
                    : null,
            };
        });
    };
}
