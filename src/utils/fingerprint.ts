/**
 * src/utils/fingerprint.ts
 *
 * Generates stable content fingerprints for extracted item records.
 *
 * CANONICAL FORM
 * ──────────────
 * Each record is reduced to a JSON array of [field, tag, value] triples
 * sorted by field name, where the tag is one of s / n / b / d:
 *
 *   { price: "1" }   →  [["price","s","1"]]
 *   { price: 1.0 }   →  [["price","n","1"]]
 *
 * so values that merely print alike never collide. JSON encoding keeps a
 * comma or quote inside a value from bleeding into the next field.
 *
 * SET FINGERPRINT
 * ───────────────
 * The fingerprint of a whole extraction is the SHA-256 of the sorted,
 * de-duplicated per-item digests. Reordering items, or repeating an exact
 * duplicate, leaves it unchanged.
 */

import { createHash } from 'crypto';
import type { ItemRecord, ItemValue } from '../sources/types.js';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Lowercase hex SHA-256, 64 characters. */
export type Digest = string;

// ─── Canonicalisation ─────────────────────────────────────────────────────────

const TAGS: Record<ItemValue['kind'], string> = {
    string: 's',
    number: 'n',
    boolean: 'b',
    date: 'd',
};

function canonicalValue(v: ItemValue): string {
    switch (v.kind) {
        case 'string':
            return v.value;
        case 'number':
            return String(v.value);
        case 'boolean':
            return v.value ? 'true' : 'false';
        case 'date':
            return Number.isNaN(v.value.getTime()) ? 'invalid' : v.value.toISOString();
    }
}

/**
 * Returns the canonical string for one record. Field order in the record
 * does not matter.
 */
export function canonicalizeItem(item: ItemRecord): string {
    const triples = item
        .map(([name, value]) => [name, TAGS[value.kind], canonicalValue(value)] as const)
        .sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
    return JSON.stringify(triples);
}

// ─── Hash Helpers ─────────────────────────────────────────────────────────────

function sha256(input: string): Digest {
    return createHash('sha256').update(input, 'utf8').digest('hex');
}

// ─── Public Entry Points ──────────────────────────────────────────────────────

export function fingerprintItem(item: ItemRecord): Digest {
    return sha256(canonicalizeItem(item));
}

/** Distinct per-item digests, sorted. */
export function itemDigests(items: readonly ItemRecord[]): Digest[] {
    return [...new Set(items.map(fingerprintItem))].sort();
}

/**
 * Order-insensitive fingerprint of an item set. An empty set has a
 * fingerprint too (the digest of the empty string).
 */
export function fingerprint(items: readonly ItemRecord[]): Digest {
    return sha256(itemDigests(items).join('\n'));
}
