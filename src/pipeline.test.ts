import { describe, it, expect, beforeEach } from 'vitest';
import { createScrapePipeline, type ScrapeTarget } from './pipeline.js';
import type { JobContext } from './scheduler.js';
import { createExtractionResult, createItem } from './sources/itemRecord.js';
import type { ExtractionResult, Extractor, Fetcher } from './sources/types.js';
import {
    CallbackDispatcher,
    type ChangeDetectedEvent,
    type DiffComputedEvent,
} from './utils/callbackDispatcher.js';
import { ExtractionError, FetchError } from './utils/errors.js';
import type { PriceAlert } from './utils/priceMonitor.js';
import { PriceMonitor } from './utils/priceMonitor.js';
import { SnapshotStore } from './utils/snapshotStore.js';

const T0 = Date.parse('2026-03-01T08:00:00.000Z');

const target: ScrapeTarget = {
    name: 'shop',
    url: 'https://shop.test/catalog',
    selector: { container: '.product', fields: { name: '.title', price: '.price' } },
    price: {},
};

/** Serves queued bodies in order. */
class QueueFetcher implements Fetcher {
    readonly requested: string[] = [];
    constructor(private readonly bodies: string[]) {}

    async fetch(url: string): Promise<string> {
        this.requested.push(url);
        const body = this.bodies.shift();
        if (body === undefined) throw new FetchError('no more bodies', url);
        return body;
    }
}

/** One "name|price" item per line, stamped one minute apart. */
class LineExtractor implements Extractor {
    private runs = 0;

    async extract(content: string, _spec: unknown, sourceKey: string): Promise<ExtractionResult> {
        const items = content
            .split('\n')
            .filter((line) => line !== '')
            .map((line) => {
                const [name, price] = line.split('|');
                return createItem({ name, price });
            });
        return createExtractionResult(sourceKey, items, new Date(T0 + 60_000 * this.runs++));
    }
}

function context(signal: AbortSignal = new AbortController().signal): JobContext<ScrapeTarget> {
    return { jobId: 'job-1', name: 'shop', target, attempt: 1, signal };
}

describe('createScrapePipeline', () => {
    let dispatcher: CallbackDispatcher;
    let snapshots: SnapshotStore;
    let priceMonitor: PriceMonitor;
    let events: string[];
    let changes: ChangeDetectedEvent[];
    let diffs: DiffComputedEvent[];
    let alerts: PriceAlert[];

    beforeEach(() => {
        dispatcher = new CallbackDispatcher();
        snapshots = new SnapshotStore();
        priceMonitor = new PriceMonitor({ dispatcher });
        events = [];
        changes = [];
        diffs = [];
        alerts = [];
        dispatcher.register('ChangeDetected', (e) => {
            events.push('ChangeDetected');
            changes.push(e);
        });
        dispatcher.register('DiffComputed', (e) => {
            events.push('DiffComputed');
            diffs.push(e);
        });
        dispatcher.register('PriceAlertFired', (e) => {
            events.push('PriceAlertFired');
            alerts.push(e);
        });
    });

    function pipelineFor(bodies: string[], extractor: Extractor = new LineExtractor()) {
        return createScrapePipeline({
            fetcher: new QueueFetcher(bodies),
            extractor,
            snapshots,
            priceMonitor,
            dispatcher,
        });
    }

    it('records a silent baseline on the first run', async () => {
        const run = pipelineFor(['Widget|10.00\nGadget|20.00\n']);

        const summary = await run(context());

        expect(summary).toEqual({
            sourceKey: 'shop',
            url: 'https://shop.test/catalog',
            extractedAt: new Date(T0).toISOString(),
            itemCount: 2,
            fingerprint: summary.fingerprint,
            initial: true,
            changed: false,
            added: 2,
            removed: 0,
            snapshotLabel: new Date(T0).toISOString(),
            diff: null,
            prices: { tracked: 2, alerts: 0, errors: 0 },
        });
        expect(events).toEqual([]);
        expect(snapshots.labels('shop')).toEqual([new Date(T0).toISOString()]);
    });

    it('emits change, diff and price events when the page moves', async () => {
        const run = pipelineFor(['Widget|10.00\nGadget|20.00\n', 'Widget|9.00\nGadget|20.00\n']);

        await run(context());
        const summary = await run(context());

        expect(events).toEqual(['ChangeDetected', 'DiffComputed', 'PriceAlertFired']);
        expect(summary).toMatchObject({
            initial: false,
            changed: true,
            added: 1,
            removed: 1,
            diff: { addedLines: 1, removedLines: 1, similarity: 0.5 },
            prices: { tracked: 2, alerts: 1, errors: 0 },
        });
        expect(changes[0].report.sourceKey).toBe('shop');
        expect(diffs[0].diff.fromLabel).toBe(new Date(T0).toISOString());
        expect(diffs[0].diff.toLabel).toBe(new Date(T0 + 60_000).toISOString());
        expect(alerts[0]).toMatchObject({
            productId: 'Widget',
            sourceId: 'shop',
            previousPrice: 10,
            newPrice: 9,
            pctChange: -10,
            direction: 'drop',
        });
        expect(priceMonitor.summary('Widget', 'shop').observationCount).toBe(2);
    });

    it('stays quiet when nothing changed', async () => {
        const body = 'Widget|10.00\n';
        const run = pipelineFor([body, body]);

        await run(context());
        const summary = await run(context());

        expect(events).toEqual([]);
        expect(summary.changed).toBe(false);
        expect(summary.diff).toMatchObject({ addedLines: 0, removedLines: 0, similarity: 1 });
    });

    it('reports unreadable prices without failing the run', async () => {
        const run = pipelineFor(['Widget|call us\nGadget|5.00\n']);
        const summary = await run(context());
        expect(summary.prices).toEqual({ tracked: 1, alerts: 0, errors: 1 });
    });

    it('skips price tracking for targets without a price block', async () => {
        const run = createScrapePipeline({
            fetcher: new QueueFetcher(['Widget|10.00\n']),
            extractor: new LineExtractor(),
            snapshots,
            priceMonitor,
        });
        const summary = await run({ ...context(), target: { ...target, price: undefined } });
        expect(summary.prices).toBeNull();
        expect(priceMonitor.products()).toEqual([]);
    });

    it('wraps unexpected extractor failures in a retryable ExtractionError', async () => {
        const broken: Extractor = {
            extract: async () => {
                throw new TypeError('boom');
            },
        };
        const run = pipelineFor(['<html></html>'], broken);

        const failure = run(context());
        await expect(failure).rejects.toBeInstanceOf(ExtractionError);
        await expect(failure).rejects.toMatchObject({ message: 'Extraction failed for shop: boom', retryable: true });
    });

    it('passes fetch failures through untouched', async () => {
        const run = pipelineFor([]);
        await expect(run(context())).rejects.toBeInstanceOf(FetchError);
    });

    it('wraps unexpected fetcher failures in a retryable FetchError', async () => {
        const run = createScrapePipeline({
            fetcher: {
                fetch: async () => {
                    throw new Error('socket hang up');
                },
            },
            extractor: new LineExtractor(),
            snapshots,
            priceMonitor,
        });

        const failure = run(context());
        await expect(failure).rejects.toBeInstanceOf(FetchError);
        await expect(failure).rejects.toMatchObject({
            message: 'Request failed for https://shop.test/catalog: socket hang up',
            url: 'https://shop.test/catalog',
            statusCode: null,
            retryable: true,
        });
    });

    it('times out a fetch that never answers', async () => {
        const run = createScrapePipeline({
            fetcher: { fetch: () => new Promise<string>(() => undefined) },
            extractor: new LineExtractor(),
            snapshots,
            priceMonitor,
            fetchTimeoutMs: 20,
        });
        await expect(run(context())).rejects.toMatchObject({
            message: 'Timed out after 20ms: https://shop.test/catalog',
        });
    });

    it('stops before touching state once the job is cancelled', async () => {
        const controller = new AbortController();
        controller.abort(new Error('cancelled'));
        const run = pipelineFor(['Widget|10.00\n']);

        await expect(run(context(controller.signal))).rejects.toThrow('cancelled');
        expect(snapshots.sourceKeys()).toEqual([]);
        expect(events).toEqual([]);
    });

    it('keeps its snapshot when a change handler cancels the job', async () => {
        const controller = new AbortController();
        dispatcher.register('ChangeDetected', () => {
            controller.abort(new Error('cancelled'));
        });
        const run = pipelineFor(['Widget|10.00\n', 'Widget|9.00\n']);

        await run(context(controller.signal));
        await expect(run(context(controller.signal))).rejects.toThrow('cancelled');

        expect(events).toEqual(['ChangeDetected']);
        expect(snapshots.labels('shop')).toEqual([new Date(T0).toISOString(), new Date(T0 + 60_000).toISOString()]);
        expect(priceMonitor.history('Widget', 'shop')).toHaveLength(1);
    });

    it('stops tracking prices once an alert handler cancels the job', async () => {
        const controller = new AbortController();
        dispatcher.register('PriceAlertFired', () => {
            controller.abort(new Error('cancelled'));
        });
        const run = pipelineFor(['Widget|10.00\nGadget|20.00\n', 'Widget|9.00\nGadget|18.00\n']);

        await run(context(controller.signal));
        await expect(run(context(controller.signal))).rejects.toThrow('cancelled');

        expect(events).toEqual(['ChangeDetected', 'DiffComputed', 'PriceAlertFired']);
        expect(alerts).toHaveLength(1);
        expect(priceMonitor.history('Widget', 'shop')).toHaveLength(2);
        expect(priceMonitor.history('Gadget', 'shop')).toHaveLength(1);
    });
});
