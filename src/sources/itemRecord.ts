/**
 * src/sources/itemRecord.ts
 *
 * Builds frozen item records and extraction results, and reads fields back
 * out of them by name.
 */

import type { ExtractionResult, ItemField, ItemRecord, ItemValue } from './types.js';

export type PlainValue = string | number | boolean | Date;

type PairSource = Iterable<readonly [string, PlainValue]> | Record<string, PlainValue>;

function isPairIterable(entries: PairSource): entries is Iterable<readonly [string, PlainValue]> {
    return Symbol.iterator in entries;
}

export function toItemValue(v: PlainValue): ItemValue {
    if (typeof v === 'string') return { kind: 'string', value: v };
    if (typeof v === 'number') return { kind: 'number', value: v };
    if (typeof v === 'boolean') return { kind: 'boolean', value: v };
    return { kind: 'date', value: new Date(v.getTime()) };
}

/**
 * Builds an item record from (name, value) pairs, keeping their order.
 * Field names must be unique within a record.
 */
export function createItem(entries: PairSource): ItemRecord {
    const pairs = isPairIterable(entries) ? [...entries] : Object.entries(entries);
    const seen = new Set<string>();
    const fields: ItemField[] = [];
    for (const [name, value] of pairs) {
        if (seen.has(name)) {
            throw new TypeError(`Duplicate field "${name}" in item record`);
        }
        seen.add(name);
        fields.push(Object.freeze([name, Object.freeze(toItemValue(value))] as const));
    }
    return Object.freeze(fields);
}

export function getField(item: ItemRecord, name: string): ItemValue | undefined {
    return item.find(([fieldName]) => fieldName === name)?.[1];
}

export function formatValue(v: ItemValue): string {
    switch (v.kind) {
        case 'string':
            return v.value;
        case 'number':
            return String(v.value);
        case 'boolean':
            return v.value ? 'true' : 'false';
        case 'date':
            return v.value.toISOString();
    }
}

/** Plain-object view for logs and JSON payloads. */
export function itemToObject(item: ItemRecord): Record<string, string> {
    const out: Record<string, string> = {};
    for (const [name, value] of item) out[name] = formatValue(value);
    return out;
}

export function createExtractionResult(
    sourceKey: string,
    items: readonly ItemRecord[],
    extractedAt: Date = new Date(),
): ExtractionResult {
    return Object.freeze({
        sourceKey,
        items: Object.freeze([...items]),
        extractedAt: new Date(extractedAt.getTime()),
    });
}
