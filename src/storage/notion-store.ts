import { z } from 'zod';
import type { Analysis, PaperRecord, PaperStore, StoredEntry } from '../types/index.js';
import { PersistenceError, toError } from '../utils/errors.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const NOTION_BASE = 'https://api.notion.com/v1';
const NOTION_VERSION = '2022-06-28';

/** Notion rejects text objects over 2000 characters and arrays over 100 items */
const MAX_TEXT_LENGTH = 2000;
const MAX_TEXT_ITEMS = 100;

/**
 * Database column names.
 */
export const COLUMNS = {
    title: 'Paper',
    abstract: 'Abstract',
    relatedness: 'Relatedness',
    date: 'Date',
    url: 'URL',
    author: 'Author',
    motivation: 'Motivation',
    differences: 'Differences from Prior Work',
    contributions: 'Contributions and Novelty',
    method: 'Proposed Method',
    results: 'Results',
} as const;

export interface RichTextItem {
    type: 'text';
    text: { content: string };
}

export type PropertyValue =
    | { title: RichTextItem[] }
    | { rich_text: RichTextItem[] }
    | { select: { name: string } }
    | { date: { start: string } }
    | { url: string | null };

const queryResponseSchema = z.object({
    results: z.array(
        z
            .object({
                id: z.string(),
                properties: z.record(z.unknown()),
            })
            .passthrough()
    ),
    has_more: z.boolean(),
    next_cursor: z.string().nullable(),
});

const createResponseSchema = z.object({ id: z.string() }).passthrough();

const titlePropertySchema = z.object({
    title: z.array(z.object({ plain_text: z.string() }).passthrough()),
});

const urlPropertySchema = z.object({ url: z.string().nullable() });

export interface NotionStoreOptions {
    token: string;
    databaseId: string;
    httpClient?: HttpClient;
    pageSize?: number;
}

/**
 * Notion database as the paper store.
 *
 * @see https://developers.notion.com/reference/post-database-query
 * @see https://developers.notion.com/reference/post-page
 */
export class NotionStore implements PaperStore {
    private readonly httpClient: HttpClient;
    private readonly token: string;
    private readonly databaseId: string;
    private readonly pageSize: number;

    constructor(options: NotionStoreOptions) {
        this.token = options.token;
        this.databaseId = options.databaseId;
        this.pageSize = options.pageSize ?? 100;
        this.httpClient = options.httpClient ?? getHttpClient();
    }

    async listEntries(): Promise<StoredEntry[]> {
        const url = `${NOTION_BASE}/databases/${encodeURIComponent(this.databaseId)}/query`;
        const entries: StoredEntry[] = [];
        let cursor: string | null = null;

        do {
            const body: { page_size: number; start_cursor?: string } = { page_size: this.pageSize };
            if (cursor) body.start_cursor = cursor;

            let data: unknown;
            try {
                const response = await this.httpClient.post<unknown>(url, body, { source: 'notion', headers: this.headers() });
                data = response.data;
            } catch (error) {
                throw new PersistenceError(`Notion database query failed: ${describeError(error)}`, toError(error));
            }

            const page = queryResponseSchema.safeParse(data);
            if (!page.success) {
                throw new PersistenceError(`Unexpected Notion query response: ${page.error.issues[0]?.message ?? 'unknown'}`);
            }

            for (const row of page.data.results) {
                entries.push(readEntry(row.properties));
            }

            getLogger().debug({ rows: page.data.results.length, hasMore: page.data.has_more }, 'Read Notion page');
            cursor = page.data.has_more ? page.data.next_cursor : null;
        } while (cursor);

        return entries;
    }

    async createEntry(paper: PaperRecord, analysis: Analysis): Promise<string> {
        const body = {
            parent: { database_id: this.databaseId },
            properties: buildPageProperties(paper, analysis),
        };

        let data: unknown;
        try {
            // A lost response may still have created the page; never resend
            const response = await this.httpClient.post<unknown>(`${NOTION_BASE}/pages`, body, {
                source: 'notion',
                headers: this.headers(),
                retries: 0,
            });
            data = response.data;
        } catch (error) {
            throw new PersistenceError(`Notion page creation failed for ${paper.id}: ${describeError(error)}`, toError(error));
        }

        const created = createResponseSchema.safeParse(data);
        if (!created.success) {
            throw new PersistenceError(`Unexpected Notion create response for ${paper.id}`);
        }
        return created.data.id;
    }

    private headers(): Record<string, string> {
        return {
            Authorization: `Bearer ${this.token}`,
            'Notion-Version': NOTION_VERSION,
        };
    }
}

/**
 * Map a paper and its analysis onto the database columns.
 * The summary fills the Abstract column; the raw abstract is used when the
 * summary is empty.
 */
export function buildPageProperties(paper: PaperRecord, analysis: Analysis): Record<string, PropertyValue> {
    return {
        [COLUMNS.title]: { title: toRichText(paper.title) },
        [COLUMNS.abstract]: { rich_text: toRichText(analysis.summary || paper.abstract) },
        [COLUMNS.relatedness]: { select: { name: analysis.relatedness } },
        [COLUMNS.date]: { date: { start: paper.published } },
        [COLUMNS.url]: { url: paper.url || null },
        [COLUMNS.author]: { rich_text: toRichText(paper.authors.join(', ')) },
        [COLUMNS.motivation]: { rich_text: toRichText(analysis.motivation) },
        [COLUMNS.differences]: { rich_text: toRichText(analysis.differences) },
        [COLUMNS.contributions]: { rich_text: toRichText(analysis.contributions) },
        [COLUMNS.method]: { rich_text: toRichText(analysis.method) },
        [COLUMNS.results]: { rich_text: toRichText(analysis.results) },
    };
}

/**
 * Split text into Notion text objects of at most 2000 characters.
 * A cut never falls inside a surrogate pair.
 */
export function toRichText(content: string): RichTextItem[] {
    const items: RichTextItem[] = [];
    let start = 0;
    while (start < content.length && items.length < MAX_TEXT_ITEMS) {
        let end = Math.min(start + MAX_TEXT_LENGTH, content.length);
        if (end < content.length && isHighSurrogate(content.charCodeAt(end - 1))) end--;
        items.push({ type: 'text', text: { content: content.slice(start, end) } });
        start = end;
    }
    return items;
}

function isHighSurrogate(code: number): boolean {
    return code >= 0xd800 && code <= 0xdbff;
}

function readEntry(properties: Record<string, unknown>): StoredEntry {
    const title = titlePropertySchema.safeParse(properties[COLUMNS.title]);
    const url = urlPropertySchema.safeParse(properties[COLUMNS.url]);

    return {
        title: title.success ? title.data.title.map((part) => part.plain_text).join('') || null : null,
        url: url.success ? url.data.url : null,
    };
}

function describeError(error: unknown): string {
    if (error instanceof HttpError) {
        const detail = notionMessage(error.response);
        return detail ? `${error.message} (${detail})` : error.message;
    }
    return toError(error).message;
}

function notionMessage(response: unknown): string | undefined {
    const parsed = z.object({ message: z.string() }).safeParse(response);
    return parsed.success ? parsed.data.message : undefined;
}
