import { parseStringPromise } from 'xml2js';
import { z } from 'zod';
import type { DateWindow, PaperRecord, RawPaperEntry, SearchRequest, SourceAdapter } from '../types/index.js';
import { SourceUnavailableError, toError } from '../utils/errors.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { canonicalizeIdentifier, collapseWhitespace } from './identifiers.js';

const ARXIV_BASE = 'http://export.arxiv.org/api/query';

/** arXiv caps a single response at 2000 entries; smaller pages keep memory flat */
const DEFAULT_PAGE_SIZE = 100;

/**
 * Atom feed as produced by xml2js with default options
 * (every child element is an array, attributes live under `$`).
 */
const textNode = z.union([z.string(), z.object({ _: z.string() }).passthrough()]);
const textList = z.array(textNode).min(1);

const atomEntrySchema = z
    .object({
        id: textList,
        title: textList,
        summary: textList,
        published: textList,
        updated: textList,
        author: z.array(z.object({ name: textList }).passthrough()).optional(),
        category: z.array(z.object({ $: z.object({ term: z.string() }).passthrough() }).passthrough()).optional(),
        link: z
            .array(
                z
                    .object({
                        $: z
                            .object({
                                href: z.string(),
                                rel: z.string().optional(),
                                type: z.string().optional(),
                                title: z.string().optional(),
                            })
                            .passthrough(),
                    })
                    .passthrough()
            )
            .optional(),
    })
    .passthrough();

const atomFeedSchema = z.object({
    feed: z
        .object({
            entry: z.array(atomEntrySchema).optional(),
        })
        .passthrough(),
});

type AtomEntry = z.infer<typeof atomEntrySchema>;

export interface ArxivAdapterOptions {
    httpClient?: HttpClient;
    pageSize?: number;
}

/**
 * arXiv source adapter.
 * Searches by submission date, newest first, and yields papers page by page.
 *
 * @see https://info.arxiv.org/help/api/user-manual.html
 */
export class ArxivAdapter implements SourceAdapter {
    readonly name = 'arXiv';
    private readonly httpClient: HttpClient;
    private readonly pageSize: number;

    constructor(options?: ArxivAdapterOptions) {
        this.httpClient = options?.httpClient ?? getHttpClient();
        this.pageSize = options?.pageSize ?? DEFAULT_PAGE_SIZE;
    }

    async *search(request: SearchRequest): AsyncGenerator<PaperRecord> {
        const { window, maxResults } = request;
        const categories = new Set(request.categories ?? []);
        const searchQuery = `(${request.query}) AND submittedDate:[${formatArxivDate(window.from)} TO ${formatArxivDate(window.to)}]`;

        let read = 0;
        while (read < maxResults) {
            const pageSize = Math.min(this.pageSize, maxResults - read);
            const entries = await this.fetchPage(searchQuery, read, pageSize);
            if (entries.length === 0) return;

            for (const entry of entries) {
                read++;
                const paper = normalizeEntry(entry);

                // Sorted newest first: everything after this is older still
                if (new Date(paper.published) < startOfDay(window.from)) return;
                if (!isWithinWindow(paper.published, window)) continue;
                if (categories.size > 0 && !paper.categories.some((c) => categories.has(c))) {
                    getLogger().debug({ paperId: paper.id, categories: paper.categories }, 'Skipping paper outside subject filter');
                    continue;
                }

                yield paper;
            }

            if (entries.length < pageSize) return;
        }
    }

    // ─── Private helpers ──────────────────────────────────────

    private async fetchPage(searchQuery: string, start: number, pageSize: number): Promise<RawPaperEntry[]> {
        const params = new URLSearchParams({
            search_query: searchQuery,
            start: String(start),
            max_results: String(pageSize),
            sortBy: 'submittedDate',
            sortOrder: 'descending',
        });

        const url = `${ARXIV_BASE}?${params.toString()}`;
        getLogger().debug({ url }, 'arXiv search');

        let xml: string;
        try {
            const response = await this.httpClient.get<string>(url, { source: 'arxiv' });
            xml = response.data;
        } catch (error) {
            throw new SourceUnavailableError(`arXiv search failed: ${toError(error).message}`, toError(error));
        }

        return parseAtomFeed(xml);
    }
}

/**
 * Parse an arXiv Atom response into raw entries.
 */
export async function parseAtomFeed(xml: string): Promise<RawPaperEntry[]> {
    let parsed: unknown;
    try {
        parsed = await parseStringPromise(xml);
    } catch (error) {
        throw new SourceUnavailableError(`arXiv returned malformed XML: ${toError(error).message}`, toError(error));
    }

    const result = atomFeedSchema.safeParse(parsed);
    if (!result.success) {
        throw new SourceUnavailableError(`Unexpected arXiv feed shape: ${result.error.issues[0]?.message ?? 'unknown'}`);
    }

    return (result.data.feed.entry ?? [])
        .filter((entry) => !text(entry.id).includes('/api/errors'))
        .map(toRawEntry);
}

/**
 * Normalize a raw entry into a PaperRecord.
 */
export function normalizeEntry(entry: RawPaperEntry): PaperRecord {
    const pdfLink = entry.links.find((link) => link.title === 'pdf' || link.type === 'application/pdf');
    const absLink = entry.links.find((link) => link.rel === 'alternate');

    return {
        id: canonicalizeIdentifier(entry.id),
        title: collapseWhitespace(entry.title) || 'Untitled',
        authors: entry.authors,
        published: entry.published.slice(0, 10),
        updated: entry.updated.slice(0, 10),
        abstract: collapseWhitespace(entry.summary),
        url: absLink?.href ?? entry.id,
        pdfUrl: pdfLink?.href ?? null,
        categories: entry.categories,
    };
}

/**
 * Window covering the last `days` days up to `now`.
 */
export function lookbackWindow(days: number, now: Date = new Date()): DateWindow {
    return {
        from: new Date(now.getTime() - days * 24 * 60 * 60 * 1000),
        to: now,
    };
}

/**
 * arXiv date filter format: YYYYMMDDHHMM in GMT.
 */
export function formatArxivDate(date: Date): string {
    return date.toISOString().slice(0, 16).replace(/[-T:]/g, '');
}

function isWithinWindow(day: string, window: DateWindow): boolean {
    const date = new Date(day);
    return date >= startOfDay(window.from) && date <= window.to;
}

function startOfDay(date: Date): Date {
    return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
}

function toRawEntry(entry: AtomEntry): RawPaperEntry {
    return {
        id: text(entry.id).trim(),
        title: text(entry.title),
        summary: text(entry.summary),
        published: text(entry.published).trim(),
        updated: text(entry.updated).trim(),
        authors: (entry.author ?? []).map((author) => collapseWhitespace(text(author.name))).filter((name) => name !== ''),
        categories: (entry.category ?? []).map((category) => category.$.term),
        links: (entry.link ?? []).map((link) => ({
            href: link.$.href,
            rel: link.$.rel,
            type: link.$.type,
            title: link.$.title,
        })),
    };
}

function text(nodes: z.infer<typeof textList>): string {
    const node = nodes[0];
    if (node === undefined) return '';
    return typeof node === 'string' ? node : node._;
}
