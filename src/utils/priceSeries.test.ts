import { describe, it, expect } from 'vitest';
import { OutOfOrderError } from './errors.js';
import { PriceSeries, seriesKey } from './priceSeries.js';

const T = Date.parse('2026-02-01T00:00:00.000Z');

describe('PriceSeries', () => {
    it('rejects an explicit timestamp that is not after the head', () => {
        const series = new PriceSeries();
        series.append('widget', 'shop', 1000, new Date(T));

        expect(() => series.append('widget', 'shop', 1100, new Date(T))).toThrow(OutOfOrderError);
        expect(() => series.append('widget', 'shop', 1100, new Date(T - 1))).toThrow(OutOfOrderError);
        expect(series.append('widget', 'other', 1100, new Date(T - 1)).cents).toBe(1100);
        expect(series.size).toBe(2);
    });

    it('moves a same-millisecond observation past the head', () => {
        const series = new PriceSeries({ now: () => new Date(T) });
        const first = series.append('widget', 'shop', 1000);
        const second = series.append('widget', 'shop', 1000);

        expect(first.timestamp.getTime()).toBe(T);
        expect(second.timestamp.getTime()).toBe(T + 1);
    });

    it('only stores whole, non-negative cents at valid times', () => {
        const series = new PriceSeries();
        expect(() => series.append('widget', 'shop', 10.5)).toThrow(RangeError);
        expect(() => series.append('widget', 'shop', -1)).toThrow(RangeError);
        expect(() => series.append('widget', 'shop', 100, new Date('not a date'))).toThrow(RangeError);
        expect(series.size).toBe(0);
    });

    it('merges sources of a product by time, then source id', () => {
        const series = new PriceSeries();
        series.append('widget', 'zeta', 300, new Date(T));
        series.append('widget', 'alpha', 100, new Date(T));
        series.append('widget', 'alpha', 200, new Date(T + 5000));
        series.append('gadget', 'alpha', 999, new Date(T));

        expect(series.points('widget').map((p) => [p.sourceId, p.cents])).toEqual([
            ['alpha', 100],
            ['zeta', 300],
            ['alpha', 200],
        ]);
        expect(series.points('widget', 'zeta').map((p) => p.cents)).toEqual([300]);
        expect(series.points('unknown')).toEqual([]);
    });

    it('lists series keys in order', () => {
        const series = new PriceSeries();
        series.append('widget', 'shop', 1, new Date(T));
        series.append('gadget', 'zeta', 1, new Date(T));
        series.append('gadget', 'alpha', 1, new Date(T));

        expect(series.keys()).toEqual([
            { productId: 'gadget', sourceId: 'alpha' },
            { productId: 'gadget', sourceId: 'zeta' },
            { productId: 'widget', sourceId: 'shop' },
        ]);
    });

    it('keeps ids containing separators apart', () => {
        expect(seriesKey('a|b', 'c')).not.toBe(seriesKey('a', 'b|c'));
    });
});
