/**
 * PaperRecord: a paper as fetched from the search source.
 * Immutable once fetched; `id` is already the canonical identifier.
 */
export interface PaperRecord {
    /** Canonical identifier used as the dedup key (e.g. "arxiv:2401.01234") */
    readonly id: string;

    /** Paper title, whitespace collapsed */
    readonly title: string;

    /** Author names in publication order */
    readonly authors: readonly string[];

    /** Publication date (YYYY-MM-DD) */
    readonly published: string;

    /** Date of the latest revision (YYYY-MM-DD) */
    readonly updated: string;

    /** Raw abstract text, whitespace collapsed */
    readonly abstract: string;

    /** Abstract page URL */
    readonly url: string;

    /** PDF URL, when the source lists one */
    readonly pdfUrl: string | null;

    /** Subject categories (e.g. "cs.CL") */
    readonly categories: readonly string[];
}

/**
 * Raw entry from the search backend before normalization.
 */
export interface RawPaperEntry {
    id: string;
    title: string;
    summary: string;
    published: string;
    updated: string;
    authors: string[];
    categories: string[];
    links: Array<{ href: string; rel?: string; type?: string; title?: string }>;
}
