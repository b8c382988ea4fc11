/**
 * src/utils/priceSeries.ts
 *
 * Append-only price observations per (productId, sourceId).
 *
 * Each series is strictly increasing in time. An explicit timestamp that is
 * not later than the series head is rejected; an omitted timestamp that
 * would collide with the head (same-millisecond observations) is moved to
 * head + 1 ms.
 */

import { OutOfOrderError } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface PricePoint {
    readonly productId: string;
    readonly sourceId: string;
    /** Whole cents; the price is stored fixed-point. */
    readonly cents: number;
    readonly timestamp: Date;
}

export interface SeriesKey {
    productId: string;
    sourceId: string;
}

interface Series extends SeriesKey {
    points: PricePoint[];
}

export interface PriceSeriesOptions {
    now?: () => Date;
}

/** Collision-free composite key for the series map. */
export function seriesKey(productId: string, sourceId: string): string {
    return JSON.stringify([productId, sourceId]);
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class PriceSeries {
    private readonly series = new Map<string, Series>();
    private readonly now: () => Date;

    constructor(options: PriceSeriesOptions = {}) {
        this.now = options.now ?? (() => new Date());
    }

    append(productId: string, sourceId: string, cents: number, timestamp?: Date): PricePoint {
        if (!Number.isInteger(cents) || cents < 0) {
            throw new RangeError(`Price must be a non-negative whole number of cents, got ${cents}`);
        }

        const key = seriesKey(productId, sourceId);
        const head = this.last(productId, sourceId);

        let at: Date;
        if (timestamp) {
            if (Number.isNaN(timestamp.getTime())) {
                throw new RangeError(`Invalid timestamp for ${productId}/${sourceId}`);
            }
            if (head && timestamp.getTime() <= head.timestamp.getTime()) {
                throw new OutOfOrderError(
                    `Observation for ${productId}/${sourceId} at ${timestamp.toISOString()} ` +
                    `is not after ${head.timestamp.toISOString()}`,
                );
            }
            at = new Date(timestamp.getTime());
        } else {
            const nowMs = this.now().getTime();
            at = new Date(head ? Math.max(nowMs, head.timestamp.getTime() + 1) : nowMs);
        }

        const point: PricePoint = Object.freeze({ productId, sourceId, cents, timestamp: at });
        let entry = this.series.get(key);
        if (!entry) {
            entry = { productId, sourceId, points: [] };
            this.series.set(key, entry);
        }
        entry.points.push(point);
        return point;
    }

    last(productId: string, sourceId: string): PricePoint | undefined {
        const points = this.series.get(seriesKey(productId, sourceId))?.points;
        return points?.[points.length - 1];
    }

    /**
     * Observations of one series, or of every source for the product
     * (ordered by timestamp, then source id) when sourceId is omitted.
     */
    points(productId: string, sourceId?: string): PricePoint[] {
        if (sourceId !== undefined) {
            return [...(this.series.get(seriesKey(productId, sourceId))?.points ?? [])];
        }
        const all: PricePoint[] = [];
        for (const entry of this.series.values()) {
            if (entry.productId === productId) all.push(...entry.points);
        }
        return all.sort((a, b) =>
            a.timestamp.getTime() - b.timestamp.getTime() || compareCodeUnits(a.sourceId, b.sourceId));
    }

    /** Series keys ordered by (productId, sourceId). */
    keys(): SeriesKey[] {
        return [...this.series.values()]
            .map(({ productId, sourceId }) => ({ productId, sourceId }))
            .sort((a, b) => compareCodeUnits(a.productId, b.productId) || compareCodeUnits(a.sourceId, b.sourceId));
    }

    get size(): number {
        let total = 0;
        for (const entry of this.series.values()) total += entry.points.length;
        return total;
    }
}

/** Locale-independent string order. */
export function compareCodeUnits(a: string, b: string): number {
    if (a < b) return -1;
    if (a > b) return 1;
    return 0;
}
