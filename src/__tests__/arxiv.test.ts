import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ArxivAdapter, formatArxivDate, lookbackWindow, parseAtomFeed } from '../sources/arxiv.js';
import { HttpClient, HttpError } from '../utils/http-client.js';
import { SourceUnavailableError } from '../utils/errors.js';
import type { PaperRecord, SearchRequest } from '../types/index.js';

interface TestEntry {
    id: string;
    published: string;
    categories: string[];
    title?: string;
}

function entryXml(entry: TestEntry): string {
    const title = entry.title ?? `Paper ${entry.id}`;
    return `
  <entry>
    <id>http://arxiv.org/abs/${entry.id}</id>
    <updated>${entry.published}</updated>
    <published>${entry.published}</published>
    <title>${title}</title>
    <summary>  We study things.
      Results are good.
    </summary>
    <author><name>Alice Example</name></author>
    <author><name>Bob Example</name></author>
    <link href="http://arxiv.org/abs/${entry.id}" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/${entry.id}" rel="related" type="application/pdf"/>
    <arxiv:primary_category xmlns:arxiv="http://arxiv.org/schemas/atom" term="${entry.categories[0]}" scheme="http://arxiv.org/schemas/atom"/>
    ${entry.categories.map((c) => `<category term="${c}" scheme="http://arxiv.org/schemas/atom"/>`).join('\n    ')}
  </entry>`;
}

function feedXml(...entries: TestEntry[]): string {
    return `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title type="html">ArXiv Query</title>
  ${entries.map(entryXml).join('\n')}
</feed>`;
}

const NEWEST: TestEntry = {
    id: '2403.05001v1',
    published: '2024-03-09T17:59:00Z',
    categories: ['cs.CL', 'cs.SD'],
    title: 'Speech  Style\n      Transfer with Audio LMs',
};
const VISION: TestEntry = { id: '2403.04002v2', published: '2024-03-08T10:00:00Z', categories: ['cs.CV'] };
const EDGE_OF_WINDOW: TestEntry = { id: '2403.03003v1', published: '2024-03-07T01:00:00Z', categories: ['cs.AI'] };
const TOO_OLD: TestEntry = { id: '2403.01004v1', published: '2024-03-05T09:00:00Z', categories: ['cs.CL'] };

const NOW = new Date('2024-03-10T12:00:00Z');

async function collect(papers: AsyncIterable<PaperRecord>): Promise<PaperRecord[]> {
    const result: PaperRecord[] = [];
    for await (const paper of papers) result.push(paper);
    return result;
}

function okResponse(xml: string) {
    return { status: 200, headers: {}, data: xml, ok: true };
}

describe('ArxivAdapter', () => {
    let client: HttpClient;
    let request: SearchRequest;

    beforeEach(() => {
        client = new HttpClient();
        request = {
            query: 'all:"speech style"',
            window: lookbackWindow(3, NOW),
            maxResults: 50,
        };
    });

    it('should yield normalized papers inside the window', async () => {
        vi.spyOn(client, 'get').mockResolvedValue(okResponse(feedXml(NEWEST)));
        const adapter = new ArxivAdapter({ httpClient: client });

        const papers = await collect(adapter.search(request));

        expect(papers).toEqual([
            {
                id: 'arxiv:2403.05001',
                title: 'Speech Style Transfer with Audio LMs',
                authors: ['Alice Example', 'Bob Example'],
                published: '2024-03-09',
                updated: '2024-03-09',
                abstract: 'We study things. Results are good.',
                url: 'http://arxiv.org/abs/2403.05001v1',
                pdfUrl: 'http://arxiv.org/pdf/2403.05001v1',
                categories: ['cs.CL', 'cs.SD'],
            },
        ]);
    });

    it('should send the query with a submission date range, newest first', async () => {
        const get = vi.spyOn(client, 'get').mockResolvedValue(okResponse(feedXml()));
        const adapter = new ArxivAdapter({ httpClient: client });

        await collect(adapter.search(request));

        const url = new URL(String(get.mock.calls[0]?.[0]));
        expect(url.searchParams.get('search_query')).toBe('(all:"speech style") AND submittedDate:[202403071200 TO 202403101200]');
        expect(url.searchParams.get('sortBy')).toBe('submittedDate');
        expect(url.searchParams.get('sortOrder')).toBe('descending');
        expect(url.searchParams.get('start')).toBe('0');
        expect(url.searchParams.get('max_results')).toBe('50');
        expect(get.mock.calls[0]?.[1]).toEqual({ source: 'arxiv' });
    });

    it('should stop at the first entry older than the window', async () => {
        vi.spyOn(client, 'get').mockResolvedValue(okResponse(feedXml(NEWEST, VISION, EDGE_OF_WINDOW, TOO_OLD)));
        const adapter = new ArxivAdapter({ httpClient: client });

        const papers = await collect(adapter.search(request));

        expect(papers.map((p) => p.id)).toEqual(['arxiv:2403.05001', 'arxiv:2403.04002', 'arxiv:2403.03003']);
    });

    it('should apply the subject filter', async () => {
        vi.spyOn(client, 'get').mockResolvedValue(okResponse(feedXml(NEWEST, VISION, EDGE_OF_WINDOW)));
        const adapter = new ArxivAdapter({ httpClient: client });

        const papers = await collect(adapter.search({ ...request, categories: ['cs.CL', 'cs.AI'] }));

        expect(papers.map((p) => p.id)).toEqual(['arxiv:2403.05001', 'arxiv:2403.03003']);
    });

    it('should page through results lazily', async () => {
        const get = vi.spyOn(client, 'get')
            .mockResolvedValueOnce(okResponse(feedXml(NEWEST, VISION)))
            .mockResolvedValueOnce(okResponse(feedXml(EDGE_OF_WINDOW, TOO_OLD)));
        const adapter = new ArxivAdapter({ httpClient: client, pageSize: 2 });

        const papers = await collect(adapter.search({ ...request, maxResults: 10 }));

        expect(papers).toHaveLength(3);
        expect(get).toHaveBeenCalledTimes(2);
        const second = new URL(String(get.mock.calls[1]?.[0]));
        expect(second.searchParams.get('start')).toBe('2');
        expect(second.searchParams.get('max_results')).toBe('2');
    });

    it('should not read past maxResults', async () => {
        const get = vi.spyOn(client, 'get').mockResolvedValue(okResponse(feedXml(NEWEST, VISION)));
        const adapter = new ArxivAdapter({ httpClient: client, pageSize: 2 });

        const papers = await collect(adapter.search({ ...request, maxResults: 2 }));

        expect(papers).toHaveLength(2);
        expect(get).toHaveBeenCalledTimes(1);
    });

    it('should raise SourceUnavailableError when the request fails', async () => {
        vi.spyOn(client, 'get').mockRejectedValue(new HttpError('HTTP 503: Service Unavailable', 503, true));
        const adapter = new ArxivAdapter({ httpClient: client });

        await expect(collect(adapter.search(request))).rejects.toThrow(SourceUnavailableError);
    });

    it('should raise SourceUnavailableError on malformed XML', async () => {
        vi.spyOn(client, 'get').mockResolvedValue(okResponse('not xml <'));
        const adapter = new ArxivAdapter({ httpClient: client });

        await expect(collect(adapter.search(request))).rejects.toThrow(SourceUnavailableError);
    });
});

describe('parseAtomFeed', () => {
    it('should return no entries for an empty feed', async () => {
        await expect(parseAtomFeed(feedXml())).resolves.toEqual([]);
    });

    it('should drop API error entries', async () => {
        const xml = `<feed xmlns="http://www.w3.org/2005/Atom">
  <entry>
    <id>http://arxiv.org/api/errors#incorrect_id_format</id>
    <title>Error</title>
    <summary>incorrect id format</summary>
    <updated>2024-03-10T00:00:00-05:00</updated>
    <published>2024-03-10T00:00:00-05:00</published>
  </entry>
</feed>`;
        await expect(parseAtomFeed(xml)).resolves.toEqual([]);
    });
});

describe('date helpers', () => {
    it('should format dates for the submittedDate filter', () => {
        expect(formatArxivDate(new Date('2024-03-07T09:05:00Z'))).toBe('202403070905');
    });

    it('should build a window ending now', () => {
        const window = lookbackWindow(3, NOW);
        expect(window.to).toEqual(NOW);
        expect(window.from.toISOString()).toBe('2024-03-07T12:00:00.000Z');
    });
});
