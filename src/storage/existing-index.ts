import type { PaperRecord, PaperStore, StoredEntry } from '../types/index.js';
import { canonicalizeIdentifier, normalizeTitle } from '../sources/identifiers.js';
import { PersistenceError, toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Identifiers already recorded in the store, built fresh on every run.
 *
 * The canonical identifier (from the URL column) is authoritative; the
 * normalized title is a secondary key for rows written without a URL.
 */
export class ExistingIndex {
    private readonly ids = new Set<string>();
    private readonly titles = new Set<string>();

    static fromEntries(entries: readonly StoredEntry[]): ExistingIndex {
        const index = new ExistingIndex();
        for (const entry of entries) {
            if (entry.url) index.ids.add(canonicalizeIdentifier(entry.url));
            if (entry.title) {
                const title = normalizeTitle(entry.title);
                if (title) index.titles.add(title);
            }
        }
        return index;
    }

    has(paper: PaperRecord): boolean {
        if (this.ids.has(paper.id)) return true;
        const title = normalizeTitle(paper.title);
        return title !== '' && this.titles.has(title);
    }

    add(paper: PaperRecord): void {
        this.ids.add(paper.id);
        const title = normalizeTitle(paper.title);
        if (title) this.titles.add(title);
    }

    /** Number of distinct identifiers */
    get size(): number {
        return this.ids.size;
    }
}

/**
 * Read the whole store into an ExistingIndex. Any failure is fatal for the run.
 */
export async function loadExistingIndex(store: PaperStore): Promise<ExistingIndex> {
    let entries: StoredEntry[];
    try {
        entries = await store.listEntries();
    } catch (error) {
        if (error instanceof PersistenceError) throw error;
        throw new PersistenceError(`Failed to read existing entries: ${toError(error).message}`, toError(error));
    }

    const index = ExistingIndex.fromEntries(entries);
    getLogger().info({ entries: entries.length, identifiers: index.size }, 'Loaded existing entries');
    return index;
}
