/**
 * src/sources/types.ts
 *
 * Shared types for fetching and extracting scrape targets.
 *
 * An item record is a fixed, ordered list of (field name, tagged value)
 * pairs. Values carry their type so that the string "1" and the number 1
 * never compare equal once fingerprinted.
 */

// ─── Item Records ─────────────────────────────────────────────────────────────

export type ItemValue =
    | { readonly kind: 'string'; readonly value: string }
    | { readonly kind: 'number'; readonly value: number }
    | { readonly kind: 'boolean'; readonly value: boolean }
    | { readonly kind: 'date'; readonly value: Date };

export type ItemField = readonly [name: string, value: ItemValue];

export type ItemRecord = readonly ItemField[];

// ─── Extraction ───────────────────────────────────────────────────────────────

export interface ExtractionResult {
    sourceKey: string;
    items: readonly ItemRecord[];
    extractedAt: Date;
}

export interface SelectorSpec {
    /** CSS selector matching one element per item. */
    container: string;
    /** field name → CSS selector relative to the container. */
    fields?: Record<string, string>;
    /** Treat zero matches as a failure (default true). */
    required?: boolean;
}

export interface Extractor {
    extract(content: string, spec: SelectorSpec, sourceKey: string): Promise<ExtractionResult>;
}

// ─── Fetching ─────────────────────────────────────────────────────────────────

export interface Fetcher {
    /** Resolves with the raw body or rejects with a FetchError. */
    fetch(url: string, headers: Record<string, string>, timeoutMs: number): Promise<string>;
}
