/**
 * src/utils/changeDetector.ts
 *
 * Set-based change detection between two extraction runs.
 *
 * An item's identity is its full field-value tuple: there is no designated
 * key, so a price change on an otherwise identical row shows up as one
 * removal plus one addition, never as a "modification".
 */

import { log } from 'crawlee';
import type { ExtractionResult, ItemRecord } from '../sources/types.js';
import { fingerprint, fingerprintItem, type Digest } from './fingerprint.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface ChangeSet<T> {
    added: T[];
    removed: T[];
}

export interface ChangeReport extends ChangeSet<ItemRecord> {
    sourceKey: string;
    /** First observation of this source in the process; nothing to compare with. */
    initial: boolean;
    changed: boolean;
    previousFingerprint: Digest | null;
    fingerprint: Digest;
    observedAt: Date;
}

// ─── Digest Sets ──────────────────────────────────────────────────────────────

/**
 * added = current ∖ previous, removed = previous ∖ current.
 * Output keeps the iteration order of the inputs, duplicates collapsed.
 */
export function detectChanges(
    previousDigests: Iterable<Digest>,
    currentDigests: Iterable<Digest>,
): ChangeSet<Digest> {
    const previous = new Set(previousDigests);
    const current = new Set(currentDigests);
    return {
        added: [...current].filter((d) => !previous.has(d)),
        removed: [...previous].filter((d) => !current.has(d)),
    };
}

function indexItems(items: readonly ItemRecord[]): Map<Digest, ItemRecord> {
    const index = new Map<Digest, ItemRecord>();
    for (const item of items) {
        const digest = fingerprintItem(item);
        if (!index.has(digest)) index.set(digest, item);
    }
    return index;
}

// Records are arrays themselves, so flatMap would splice their fields in.
function pick(index: Map<Digest, ItemRecord>, digests: readonly Digest[]): ItemRecord[] {
    const out: ItemRecord[] = [];
    for (const digest of digests) {
        const item = index.get(digest);
        if (item) out.push(item);
    }
    return out;
}

/** Same as detectChanges but over item records; returns the records themselves. */
export function detectItemChanges(
    previous: readonly ItemRecord[],
    current: readonly ItemRecord[],
): ChangeSet<ItemRecord> {
    if (fingerprint(previous) === fingerprint(current)) {
        return { added: [], removed: [] };
    }
    const before = indexItems(previous);
    const after = indexItems(current);
    const { added, removed } = detectChanges(before.keys(), after.keys());
    return {
        added: pick(after, added),
        removed: pick(before, removed),
    };
}

// ─── Per-Source Tracker ───────────────────────────────────────────────────────

interface TrackedRun {
    fingerprint: Digest;
    items: Map<Digest, ItemRecord>;
}

/**
 * Remembers the latest item set per source key for the lifetime of the
 * process and reports what changed between consecutive runs.
 */
export class ChangeTracker {
    private readonly runs = new Map<string, TrackedRun>();

    observe(result: ExtractionResult): ChangeReport {
        const items = indexItems(result.items);
        const current: TrackedRun = { fingerprint: fingerprint(result.items), items };
        const previous = this.runs.get(result.sourceKey);
        this.runs.set(result.sourceKey, current);

        if (!previous) {
            log.debug(`[ChangeTracker] Baseline for ${result.sourceKey}: ${items.size} items.`);
            return {
                sourceKey: result.sourceKey,
                initial: true,
                changed: false,
                previousFingerprint: null,
                fingerprint: current.fingerprint,
                added: [...items.values()],
                removed: [],
                observedAt: result.extractedAt,
            };
        }

        const diff: ChangeSet<Digest> = previous.fingerprint === current.fingerprint
            ? { added: [], removed: [] }
            : detectChanges(previous.items.keys(), items.keys());

        const report: ChangeReport = {
            sourceKey: result.sourceKey,
            initial: false,
            changed: diff.added.length > 0 || diff.removed.length > 0,
            previousFingerprint: previous.fingerprint,
            fingerprint: current.fingerprint,
            added: pick(items, diff.added),
            removed: pick(previous.items, diff.removed),
            observedAt: result.extractedAt,
        };

        if (report.changed) {
            log.info(
                `[ChangeTracker] ${result.sourceKey}: +${report.added.length} / -${report.removed.length} items.`,
            );
        }
        return report;
    }

    fingerprintOf(sourceKey: string): Digest | undefined {
        return this.runs.get(sourceKey)?.fingerprint;
    }

    forget(sourceKey: string): boolean {
        return this.runs.delete(sourceKey);
    }
}
