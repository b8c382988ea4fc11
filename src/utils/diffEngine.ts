/**
 * src/utils/diffEngine.ts
 *
 * Line-level unified diffs between two snapshots of the same source.
 *
 * Lines are matched with a longest-common-subsequence table. On a tie the
 * walk prefers deleting from the old side first, so the output for a given
 * pair of inputs is always the same, and compare(a, b) / compare(b, a)
 * report mirrored added/removed counts.
 *
 * The common head and tail are matched directly and only the lines between
 * them go into the table. A middle larger than MAX_TABLE_CELLS is reported
 * as a block replacement: every old line deleted, every new line inserted.
 *
 * Output follows the classic unified format:
 *
 *   --- products@2026-01-01T00:00:00.000Z
 *   +++ products@2026-01-02T00:00:00.000Z
 *   @@ -3,4 +3,4 @@
 *    context
 *   -old line
 *   +new line
 */

import { log } from 'crawlee';
import type { SnapshotStore } from './snapshotStore.js';

// ─── Types ────────────────────────────────────────────────────────────────────

export type DiffOp =
    | { type: 'equal'; line: string; oldIndex: number; newIndex: number }
    | { type: 'delete'; line: string; oldIndex: number }
    | { type: 'insert'; line: string; newIndex: number };

export interface DiffResult {
    sourceKey: string;
    fromLabel: string;
    toLabel: string;
    /** Empty string when both snapshots have identical lines. */
    unifiedDiff: string;
    addedLines: number;
    removedLines: number;
    /** 2·matched / (old + new), 1 for two empty snapshots. */
    similarity: number;
}

export interface DiffEngineOptions {
    /** Unchanged lines shown around each change (default 3). */
    contextLines?: number;
}

// ─── Line Matching ────────────────────────────────────────────────────────────

export function splitLines(content: string): string[] {
    if (content === '') return [];
    const lines = content.split(/\r?\n/);
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
}

const MAX_TABLE_CELLS = 25_000_000;

/** Edit script turning `a` into `b`. */
export function diffLines(a: readonly string[], b: readonly string[]): DiffOp[] {
    let head = 0;
    while (head < a.length && head < b.length && a[head] === b[head]) head++;
    let tail = 0;
    while (
        tail < a.length - head &&
        tail < b.length - head &&
        a[a.length - 1 - tail] === b[b.length - 1 - tail]
    ) {
        tail++;
    }

    const ops: DiffOp[] = [];
    for (let k = 0; k < head; k++) {
        ops.push({ type: 'equal', line: a[k], oldIndex: k, newIndex: k });
    }
    diffMiddle(a, b, head, a.length - tail, head, b.length - tail, ops);
    for (let k = tail; k > 0; k--) {
        const i = a.length - k;
        const j = b.length - k;
        ops.push({ type: 'equal', line: a[i], oldIndex: i, newIndex: j });
    }
    return ops;
}

/** Appends the edit script for a[aStart..aEnd) → b[bStart..bEnd). */
function diffMiddle(
    a: readonly string[],
    b: readonly string[],
    aStart: number,
    aEnd: number,
    bStart: number,
    bEnd: number,
    ops: DiffOp[],
): void {
    const n = aEnd - aStart;
    const m = bEnd - bStart;

    if (n > 0 && m > 0 && n * m > MAX_TABLE_CELLS) {
        log.debug(`[DiffEngine] ${n}×${m} changed region; reporting it as a block replacement.`);
        for (let i = aStart; i < aEnd; i++) ops.push({ type: 'delete', line: a[i], oldIndex: i });
        for (let j = bStart; j < bEnd; j++) ops.push({ type: 'insert', line: b[j], newIndex: j });
        return;
    }

    // lcs[i][j] = LCS length of a[aStart + i..aEnd) and b[bStart + j..bEnd)
    const lcs: Uint32Array[] = [];
    for (let i = 0; i <= n; i++) lcs.push(new Uint32Array(m + 1));
    for (let i = n - 1; i >= 0; i--) {
        const row = lcs[i];
        const below = lcs[i + 1];
        for (let j = m - 1; j >= 0; j--) {
            row[j] = a[aStart + i] === b[bStart + j] ? below[j + 1] + 1 : Math.max(below[j], row[j + 1]);
        }
    }

    let i = 0;
    let j = 0;
    while (i < n && j < m) {
        const oldLine = a[aStart + i];
        const newLine = b[bStart + j];
        if (oldLine === newLine) {
            ops.push({ type: 'equal', line: oldLine, oldIndex: aStart + i, newIndex: bStart + j });
            i++;
            j++;
        } else if (lcs[i + 1][j] >= lcs[i][j + 1]) {
            ops.push({ type: 'delete', line: oldLine, oldIndex: aStart + i });
            i++;
        } else {
            ops.push({ type: 'insert', line: newLine, newIndex: bStart + j });
            j++;
        }
    }
    for (; i < n; i++) ops.push({ type: 'delete', line: a[aStart + i], oldIndex: aStart + i });
    for (; j < m; j++) ops.push({ type: 'insert', line: b[bStart + j], newIndex: bStart + j });
}

// ─── Formatting ───────────────────────────────────────────────────────────────

/** `start,len` with the conventions of `diff -u`: len 1 is omitted, len 0 points before. */
function formatRange(start: number, length: number): string {
    if (length === 1) return String(start + 1);
    if (length === 0) return `${start},0`;
    return `${start + 1},${length}`;
}

/**
 * Groups an edit script into hunks. Changes separated by at most
 * 2 × context equal lines share a hunk.
 */
function buildHunks(ops: readonly DiffOp[], context: number): Array<[number, number]> {
    const changed: number[] = [];
    ops.forEach((op, idx) => {
        if (op.type !== 'equal') changed.push(idx);
    });
    if (changed.length === 0) return [];

    const hunks: Array<[number, number]> = [];
    let start = Math.max(0, changed[0] - context);
    let end = Math.min(ops.length, changed[0] + context + 1);
    for (const idx of changed.slice(1)) {
        if (idx - context <= end) {
            end = Math.min(ops.length, idx + context + 1);
        } else {
            hunks.push([start, end]);
            start = Math.max(0, idx - context);
            end = Math.min(ops.length, idx + context + 1);
        }
    }
    hunks.push([start, end]);
    return hunks;
}

export function formatUnifiedDiff(
    ops: readonly DiffOp[],
    fromFile: string,
    toFile: string,
    context = 3,
): string {
    const hunks = buildHunks(ops, context);
    if (hunks.length === 0) return '';

    // Running line positions before each op, so hunk headers can be computed.
    const oldPos: number[] = [];
    const newPos: number[] = [];
    let o = 0;
    let p = 0;
    for (const op of ops) {
        oldPos.push(o);
        newPos.push(p);
        if (op.type !== 'insert') o++;
        if (op.type !== 'delete') p++;
    }

    const out: string[] = [`--- ${fromFile}`, `+++ ${toFile}`];
    for (const [start, end] of hunks) {
        const slice = ops.slice(start, end);
        const oldLen = slice.filter((op) => op.type !== 'insert').length;
        const newLen = slice.filter((op) => op.type !== 'delete').length;
        out.push(`@@ -${formatRange(oldPos[start], oldLen)} +${formatRange(newPos[start], newLen)} @@`);
        for (const op of slice) {
            const prefix = op.type === 'equal' ? ' ' : op.type === 'delete' ? '-' : '+';
            out.push(prefix + op.line);
        }
    }
    return out.join('\n') + '\n';
}

// ─── Engine ───────────────────────────────────────────────────────────────────

export class DiffEngine {
    private readonly contextLines: number;

    constructor(
        private readonly store: SnapshotStore,
        options: DiffEngineOptions = {},
    ) {
        this.contextLines = options.contextLines ?? 3;
    }

    /** Throws NotFoundError when either label is missing for the source. */
    compare(sourceKey: string, fromLabel: string, toLabel: string): DiffResult {
        const from = this.store.require(sourceKey, fromLabel);
        const to = this.store.require(sourceKey, toLabel);

        const a = splitLines(from.content);
        const b = splitLines(to.content);
        const ops = diffLines(a, b);

        let added = 0;
        let removed = 0;
        for (const op of ops) {
            if (op.type === 'insert') added++;
            else if (op.type === 'delete') removed++;
        }
        const matched = ops.length - added - removed;
        const total = a.length + b.length;

        const result: DiffResult = {
            sourceKey,
            fromLabel,
            toLabel,
            unifiedDiff: formatUnifiedDiff(
                ops,
                `${sourceKey}@${fromLabel}`,
                `${sourceKey}@${toLabel}`,
                this.contextLines,
            ),
            addedLines: added,
            removedLines: removed,
            similarity: total === 0 ? 1 : Math.round((2 * matched / total) * 10_000) / 10_000,
        };

        log.debug(`[DiffEngine] ${sourceKey} ${fromLabel} → ${toLabel}: +${added} -${removed}`);
        return result;
    }

    /** Diffs of consecutive snapshots, oldest pair first. */
    exportHistory(sourceKey: string): DiffResult[] {
        const labels = this.store.labels(sourceKey);
        const results: DiffResult[] = [];
        for (let idx = 1; idx < labels.length; idx++) {
            results.push(this.compare(sourceKey, labels[idx - 1], labels[idx]));
        }
        return results;
    }
}
