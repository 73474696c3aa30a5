import type {
    DateWindow,
    EnrichmentOutcome,
    PaperRecord,
    PaperStore,
    RunResult,
    SearchField,
    SourceAdapter,
} from '../types/index.js';
import { lookbackWindow } from '../sources/arxiv.js';
import { buildSearchQuery } from '../sources/query-builder.js';
import { loadExistingIndex } from '../storage/existing-index.js';
import { toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';

/**
 * Anything that turns a paper into an enrichment outcome.
 */
export interface Enricher {
    enrich(paper: PaperRecord): Promise<EnrichmentOutcome>;
}

export interface IngestionDeps {
    source: SourceAdapter;
    store: PaperStore;
    enricher: Enricher;
}

export interface IngestionOptions {
    keywords: readonly string[];
    lookbackDays: number;
    maxResults: number;
    categories?: readonly string[];
    searchField?: SearchField;
    /** Reference time for the lookback window */
    now?: Date;
}

export function emptyRunResult(): RunResult {
    return {
        found: 0,
        skipped: 0,
        enriched: 0,
        persisted: 0,
        duplicates: 0,
        enrichmentFailed: 0,
        writeFailed: 0,
        degraded: 0,
    };
}

/**
 * One ingestion pass:
 *
 * 1. Load the existing-entry index (fatal on failure)
 * 2. Build the keyword query
 * 3. Stream candidates from the source (fatal on failure)
 * 4. Per new candidate: enrich, then write one row
 *
 * Per-paper failures are logged and counted; they never stop the loop.
 */
export async function runIngestion(deps: IngestionDeps, options: IngestionOptions): Promise<RunResult> {
    const logger = getLogger();
    const result = emptyRunResult();
    const startTime = Date.now();

    // ──────────────────────────────────────────────────
    // Step 1: Existing entries
    // ──────────────────────────────────────────────────
    const index = await loadExistingIndex(deps.store);

    // ──────────────────────────────────────────────────
    // Step 2: Query + window
    // ──────────────────────────────────────────────────
    const query = buildSearchQuery(options.keywords, { field: options.searchField });
    const window: DateWindow = lookbackWindow(options.lookbackDays, options.now);
    logger.info(
        { query, from: window.from.toISOString(), to: window.to.toISOString(), source: deps.source.name },
        'Searching for new papers'
    );

    // ──────────────────────────────────────────────────
    // Step 3 + 4: Candidates, strictly one at a time
    // ──────────────────────────────────────────────────
    const candidates = deps.source.search({
        query,
        window,
        maxResults: options.maxResults,
        categories: options.categories,
    });

    for await (const paper of candidates) {
        result.found++;

        if (index.has(paper)) {
            logger.debug({ paperId: paper.id }, 'Already recorded, skipping');
            result.duplicates++;
            continue;
        }

        logger.info({ paperId: paper.id, title: paper.title.slice(0, 80) }, `Processing paper ${result.found}`);
        if (await processPaper(deps, paper, result)) {
            index.add(paper);
        }
    }

    result.skipped = result.duplicates + result.enrichmentFailed + result.writeFailed;

    logger.info({ ...result, elapsedMs: Date.now() - startTime }, 'Run complete');
    return result;
}

/**
 * Enrich and record one paper. Returns whether a row was written.
 */
async function processPaper(deps: IngestionDeps, paper: PaperRecord, result: RunResult): Promise<boolean> {
    const logger = getLogger();

    let outcome: EnrichmentOutcome;
    try {
        outcome = await deps.enricher.enrich(paper);
    } catch (error) {
        outcome = { status: 'skipped', reason: toError(error).message };
    }

    if (outcome.status === 'skipped') {
        logger.warn({ paperId: paper.id, reason: outcome.reason }, 'Enrichment failed, paper not recorded');
        result.enrichmentFailed++;
        return false;
    }

    result.enriched++;
    if (outcome.status === 'degraded') {
        result.degraded++;
    }

    try {
        const pageId = await deps.store.createEntry(paper, outcome.analysis);
        result.persisted++;
        logger.info({ paperId: paper.id, pageId, relatedness: outcome.analysis.relatedness }, 'Paper recorded');
        return true;
    } catch (error) {
        result.writeFailed++;
        logger.error({ paperId: paper.id, error: toError(error).message }, 'Failed to record paper');
        return false;
    }
}
