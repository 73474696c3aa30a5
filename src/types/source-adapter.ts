import type { PaperRecord } from './paper.js';

/**
 * Inclusive date range searched on one run.
 */
export interface DateWindow {
    from: Date;
    to: Date;
}

/**
 * One search against a paper source.
 */
export interface SearchRequest {
    /** Query expression built by the query builder */
    query: string;

    /** Only papers published inside this window are yielded */
    window: DateWindow;

    /** Upper bound on entries read from the source */
    maxResults: number;

    /** Subject filter; empty means no filter */
    categories?: readonly string[];
}

/**
 * Interface for paper search sources (arXiv).
 */
export interface SourceAdapter {
    /** Human-readable source name */
    readonly name: string;

    /**
     * Lazily yield papers matching the request.
     * Throws SourceUnavailableError once retries are exhausted.
     */
    search(request: SearchRequest): AsyncIterable<PaperRecord>;
}
