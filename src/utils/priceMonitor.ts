/**
 * src/utils/priceMonitor.ts
 *
 * Threshold alerting on top of PriceSeries.
 *
 * track() appends an observation and compares it with the previous one for
 * the same (product, source). A relative move of at least the threshold
 * (per-product override, else the global default) produces a PriceAlert,
 * which is dispatched as PriceAlertFired and also returned to the caller.
 *
 * Writes to one series are serialized through a KeyedMutex; alerts are
 * dispatched after the lock is released so a handler may call track() again.
 */

import { stringify } from 'csv-stringify/sync';
import { log } from 'crawlee';
import { getField } from '../sources/itemRecord.js';
import type { ExtractionResult, ItemValue } from '../sources/types.js';
import type { CallbackDispatcher } from './callbackDispatcher.js';
import { NotFoundError, OutOfOrderError, ParseError } from './errors.js';
import { KeyedMutex } from './keyedMutex.js';
import { recordPriceAlert, recordPriceObservation, recordPriceParseError } from './metrics.js';
import { centsToPrice, parsePriceCents, toCents } from './priceParser.js';
import { PriceSeries, seriesKey, type PricePoint } from './priceSeries.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type PriceDirection = 'drop' | 'increase';

export interface PriceAlert {
    productId: string;
    sourceId: string;
    previousPrice: number;
    newPrice: number;
    /** Signed, rounded to two decimals. */
    pctChange: number;
    direction: PriceDirection;
    timestamp: Date;
}

export interface PriceSummary {
    productId: string;
    sourceId: string | null;
    current: number;
    min: number;
    max: number;
    average: number;
    observationCount: number;
    firstSeen: Date;
    lastSeen: Date;
}

export interface LatestPrice {
    productId: string;
    sourceId: string;
    price: number;
    timestamp: Date;
}

export type IngestError = ParseError | OutOfOrderError;

export interface IngestReport {
    tracked: number;
    alerts: PriceAlert[];
    errors: IngestError[];
}

export interface PriceMonitorOptions {
    dispatcher?: CallbackDispatcher;
    /** Global alert threshold in percent (default 5). */
    defaultThresholdPct?: number;
    now?: () => Date;
}

export const CSV_HEADER = ['product_id', 'source_id', 'price', 'timestamp'] as const;

// ─── Monitor ──────────────────────────────────────────────────────────────────

export class PriceMonitor {
    private readonly series: PriceSeries;
    private readonly mutex = new KeyedMutex();
    private readonly thresholds = new Map<string, number>();
    private readonly dispatcher: CallbackDispatcher | null;
    private readonly defaultThresholdPct: number;

    constructor(options: PriceMonitorOptions = {}) {
        this.series = new PriceSeries({ now: options.now });
        this.dispatcher = options.dispatcher ?? null;
        this.defaultThresholdPct = options.defaultThresholdPct ?? 5.0;
    }

    setThreshold(productId: string, pct: number): void {
        if (!Number.isFinite(pct) || pct < 0) {
            throw new RangeError(`Threshold must be a non-negative percentage, got ${pct}`);
        }
        this.thresholds.set(productId, pct);
    }

    thresholdFor(productId: string): number {
        return this.thresholds.get(productId) ?? this.defaultThresholdPct;
    }

    /**
     * Records one observation. Resolves to the alert it raised, or null.
     * Rejects with OutOfOrderError when `timestamp` is not after the last
     * observation of the same (product, source).
     */
    async track(productId: string, sourceId: string, price: number, timestamp?: Date): Promise<PriceAlert | null> {
        if (!Number.isFinite(price) || price < 0) {
            throw new RangeError(`Price must be a non-negative number, got ${price}`);
        }
        const cents = toCents(price);

        const alert = await this.mutex.runExclusive(seriesKey(productId, sourceId), () => {
            const prior = this.series.last(productId, sourceId);
            const point = this.series.append(productId, sourceId, cents, timestamp);
            recordPriceObservation();
            return prior ? this.evaluate(prior, point) : null;
        });

        if (alert) {
            recordPriceAlert();
            log.info(
                `[PriceMonitor] ${alert.productId}@${alert.sourceId}: ` +
                `${alert.previousPrice} → ${alert.newPrice} (${alert.pctChange > 0 ? '+' : ''}${alert.pctChange}%)`,
            );
            if (this.dispatcher) {
                await this.dispatcher.dispatch('PriceAlertFired', alert);
            }
        }
        return alert;
    }

    private evaluate(prior: PricePoint, point: PricePoint): PriceAlert | null {
        // A move away from zero has no meaningful percentage.
        if (prior.cents === 0) return null;

        const pct = ((point.cents - prior.cents) / prior.cents) * 100;
        if (Math.abs(pct) < this.thresholdFor(point.productId)) return null;

        return {
            productId: point.productId,
            sourceId: point.sourceId,
            previousPrice: centsToPrice(prior.cents),
            newPrice: centsToPrice(point.cents),
            pctChange: Math.round(pct * 100) / 100,
            direction: pct < 0 ? 'drop' : 'increase',
            timestamp: new Date(point.timestamp.getTime()),
        };
    }

    /**
     * Feeds every item of an extraction run to track(), stamped with the
     * run's extraction time. Items with a missing name or an unreadable
     * price are skipped and reported; they never abort the batch.
     * An aborted `signal` stops the batch before the next item.
     */
    async ingestScrapeResults(
        result: ExtractionResult,
        sourceId: string,
        priceField = 'price',
        nameField = 'name',
        signal?: AbortSignal,
    ): Promise<IngestReport> {
        const report: IngestReport = { tracked: 0, alerts: [], errors: [] };

        for (const [index, item] of result.items.entries()) {
            signal?.throwIfAborted();
            const name = readName(getField(item, nameField));
            if (name === null) {
                report.errors.push(new ParseError(
                    `Item ${index} has no usable "${nameField}"`, index, nameField, rawText(getField(item, nameField)),
                ));
                recordPriceParseError();
                continue;
            }

            const priceValue = getField(item, priceField);
            const cents = readCents(priceValue);
            if (cents === null) {
                report.errors.push(new ParseError(
                    `Item ${index} (${name}) has an unparsable "${priceField}"`, index, priceField, rawText(priceValue),
                ));
                recordPriceParseError();
                continue;
            }

            try {
                const alert = await this.track(name, sourceId, centsToPrice(cents), result.extractedAt);
                report.tracked++;
                if (alert) report.alerts.push(alert);
            } catch (err) {
                if (!(err instanceof OutOfOrderError)) throw err;
                report.errors.push(err);
            }
        }

        if (report.errors.length > 0) {
            log.warning(
                `[PriceMonitor] ${result.sourceKey}: ${report.errors.length} item(s) skipped, ${report.tracked} tracked.`,
            );
        }
        return report;
    }

    /** Throws NotFoundError when the product (or product/source) has no observations. */
    summary(productId: string, sourceId?: string): PriceSummary {
        const points = this.series.points(productId, sourceId);
        if (points.length === 0) {
            throw new NotFoundError('Price history', sourceId === undefined ? productId : `${productId}/${sourceId}`);
        }

        const first = points[0];
        const last = points[points.length - 1];
        let min = first.cents;
        let max = first.cents;
        let total = 0;
        for (const { cents } of points) {
            if (cents < min) min = cents;
            if (cents > max) max = cents;
            total += cents;
        }

        return {
            productId,
            sourceId: sourceId ?? null,
            current: centsToPrice(last.cents),
            min: centsToPrice(min),
            max: centsToPrice(max),
            average: Math.round(total / points.length) / 100,
            observationCount: points.length,
            firstSeen: new Date(first.timestamp.getTime()),
            lastSeen: new Date(last.timestamp.getTime()),
        };
    }

    history(productId: string, sourceId?: string): PricePoint[] {
        return this.series.points(productId, sourceId);
    }

    products(): string[] {
        return [...new Set(this.series.keys().map((k) => k.productId))];
    }

    latestPrices(): LatestPrice[] {
        const out: LatestPrice[] = [];
        for (const { productId, sourceId } of this.series.keys()) {
            const head = this.series.last(productId, sourceId);
            if (head) {
                out.push({ productId, sourceId, price: centsToPrice(head.cents), timestamp: new Date(head.timestamp.getTime()) });
            }
        }
        return out;
    }

    /**
     * Every observation as CSV, ordered by product, source and time.
     * The output depends only on the stored observations.
     */
    exportHistoryCsv(): string {
        const rows: string[][] = [[...CSV_HEADER]];
        for (const { productId, sourceId } of this.series.keys()) {
            for (const point of this.series.points(productId, sourceId)) {
                rows.push([
                    productId,
                    sourceId,
                    centsToPrice(point.cents).toFixed(2),
                    point.timestamp.toISOString(),
                ]);
            }
        }
        return stringify(rows);
    }

    get observationCount(): number {
        return this.series.size;
    }
}

// ─── Item Readers ─────────────────────────────────────────────────────────────

function readName(value: ItemValue | undefined): string | null {
    if (!value) return null;
    if (value.kind === 'string') {
        const trimmed = value.value.trim();
        return trimmed === '' ? null : trimmed;
    }
    if (value.kind === 'number') return String(value.value);
    return null;
}

function readCents(value: ItemValue | undefined): number | null {
    if (!value) return null;
    if (value.kind === 'number') {
        return Number.isFinite(value.value) && value.value >= 0 ? toCents(value.value) : null;
    }
    if (value.kind === 'string') return parsePriceCents(value.value);
    return null;
}

function rawText(value: ItemValue | undefined): string {
    return value ? String(value.value) : '';
}
