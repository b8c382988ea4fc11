/**
 * src/utils/snapshotStore.ts
 *
 * Labeled raw-content snapshots per source key, held in memory for the life
 * of the process.
 *
 * Labels are unique within a source key. Writing an existing label replaces
 * its content in place: the label keeps its original position in the
 * chronological order, so export/diff history stays stable. Nothing is
 * evicted automatically.
 */

import { createHash } from 'crypto';
import { log } from 'crawlee';
import { NotFoundError } from './errors.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface Snapshot {
    readonly label: string;
    readonly sourceKey: string;
    readonly content: string;
    readonly takenAt: Date;
    /** First 16 hex chars of the content's SHA-256. */
    readonly contentHash: string;
}

export interface SnapshotChangeSummary {
    sourcesTracked: number;
    totalSnapshots: number;
    /** Sources with at least two snapshots whose content differs. */
    sourcesWithChanges: number;
}

function shortHash(content: string): string {
    return createHash('sha256').update(content, 'utf8').digest('hex').substring(0, 16);
}

// ─── Store ────────────────────────────────────────────────────────────────────

export class SnapshotStore {
    /** sourceKey → label → snapshot (Map preserves first-insertion order). */
    private readonly sources = new Map<string, Map<string, Snapshot>>();

    snapshot(sourceKey: string, label: string, content: string, takenAt: Date = new Date()): Snapshot {
        let labels = this.sources.get(sourceKey);
        if (!labels) {
            labels = new Map();
            this.sources.set(sourceKey, labels);
        }

        const snap: Snapshot = Object.freeze({
            label,
            sourceKey,
            content,
            takenAt: new Date(takenAt.getTime()),
            contentHash: shortHash(content),
        });
        const replaced = labels.has(label);
        labels.set(label, snap);

        log.debug(
            `[SnapshotStore] ${replaced ? 'Replaced' : 'Stored'} ${sourceKey}@${label} (${content.length} chars).`,
        );
        return snap;
    }

    get(sourceKey: string, label: string): Snapshot | undefined {
        return this.sources.get(sourceKey)?.get(label);
    }

    /** Like get(), but a missing label is a NotFoundError. */
    require(sourceKey: string, label: string): Snapshot {
        const snap = this.get(sourceKey, label);
        if (!snap) throw new NotFoundError('Snapshot', `${sourceKey}@${label}`);
        return snap;
    }

    has(sourceKey: string, label: string): boolean {
        return this.get(sourceKey, label) !== undefined;
    }

    /** Labels in chronological insertion order. */
    labels(sourceKey: string): string[] {
        return [...(this.sources.get(sourceKey)?.keys() ?? [])];
    }

    history(sourceKey: string): Snapshot[] {
        return [...(this.sources.get(sourceKey)?.values() ?? [])];
    }

    latest(sourceKey: string): Snapshot | undefined {
        const all = this.history(sourceKey);
        return all[all.length - 1];
    }

    sourceKeys(): string[] {
        return [...this.sources.keys()];
    }

    changeSummary(): SnapshotChangeSummary {
        let totalSnapshots = 0;
        let sourcesWithChanges = 0;
        for (const labels of this.sources.values()) {
            totalSnapshots += labels.size;
            const hashes = new Set([...labels.values()].map((s) => s.contentHash));
            if (labels.size >= 2 && hashes.size > 1) sourcesWithChanges++;
        }
        return {
            sourcesTracked: this.sources.size,
            totalSnapshots,
            sourcesWithChanges,
        };
    }
}
