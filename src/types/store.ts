import type { Analysis } from './analysis.js';
import type { PaperRecord } from './paper.js';

/**
 * An entry already present in the external store, as read by the index loader.
 */
export interface StoredEntry {
    title: string | null;
    url: string | null;
}

/**
 * External structured store holding one row per recorded paper.
 */
export interface PaperStore {
    /**
     * Read every stored entry. Throws PersistenceError on any failure.
     */
    listEntries(): Promise<StoredEntry[]>;

    /**
     * Create exactly one new row. Never upserts.
     * @returns The store's identifier for the new row
     */
    createEntry(paper: PaperRecord, analysis: Analysis): Promise<string>;
}
