import { loadCredentials, resolveConfig } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { getHttpClient } from '../utils/http-client.js';
import { PaperFeedError, toError } from '../utils/errors.js';
import { ArxivAdapter } from '../sources/arxiv.js';
import { buildSearchQuery } from '../sources/query-builder.js';
import { NotionStore } from '../storage/notion-store.js';
import { GeminiProvider } from '../llm/gemini.js';
import { EnrichmentEngine } from '../llm/enrichment.js';
import { runIngestion } from '../pipeline/ingest.js';
import type { LogLevel, PaperFeedConfig } from '../types/index.js';

export const VERSION = '1.0.0';

export interface RunOptions {
    config?: string;
    lookbackDays?: number;
    maxResults?: number;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

export interface QueryOptions {
    config?: string;
}

/**
 * Seams for tests: credentials source and the pipeline entry point.
 */
export interface CommandDeps {
    env?: NodeJS.ProcessEnv;
    ingest?: typeof runIngestion;
    print?: (line: string) => void;
}

function reportFatal(error: unknown, message: string): number {
    const err = toError(error);
    getLogger().error({ code: err instanceof PaperFeedError ? err.code : undefined, error: err.message }, message);
    return 1;
}

/**
 * One ingestion pass. Resolves to the process exit code:
 * 0 once orchestration completes, 1 on a fatal error.
 */
export async function runCommand(opts: RunOptions, deps: CommandDeps = {}): Promise<number> {
    const cliConfig: Partial<PaperFeedConfig> = {};
    if (opts.lookbackDays !== undefined) cliConfig.lookbackDays = opts.lookbackDays;
    if (opts.maxResults !== undefined) cliConfig.maxResults = opts.maxResults;
    if (opts.logLevel !== undefined) cliConfig.logLevel = opts.logLevel;
    if (opts.jsonLogs !== undefined) cliConfig.jsonLogs = opts.jsonLogs;

    try {
        const config = await resolveConfig(cliConfig, opts.config);
        initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
        const credentials = loadCredentials(deps.env);
        const logger = getLogger();

        const httpClient = getHttpClient({ timeout: 30000, version: VERSION });
        const engine = new EnrichmentEngine(
            new GeminiProvider({ apiKey: credentials.googleApiKey, timeoutMs: config.llm.timeoutMs }),
            {
                researchArea: config.researchArea,
                summaryLanguage: config.summaryLanguage,
                backends: config.llm.backends,
                temperature: config.llm.temperature,
                cooldownMs: config.llm.cooldownMs,
            }
        );

        logger.info(
            { keywords: config.keywords.length, lookbackDays: config.lookbackDays, backends: config.llm.backends.map((b) => b.model) },
            'Starting run'
        );

        const ingest = deps.ingest ?? runIngestion;
        await ingest(
            {
                source: new ArxivAdapter({ httpClient }),
                store: new NotionStore({ token: credentials.notionToken, databaseId: credentials.notionDatabaseId, httpClient }),
                enricher: engine,
            },
            {
                keywords: config.keywords,
                lookbackDays: config.lookbackDays,
                maxResults: config.maxResults,
                categories: config.categories,
                searchField: config.searchField,
            }
        );

        logger.debug({ backends: engine.backendUsage(), requests: httpClient.getAllRequestCounts() }, 'Usage');
        return 0;
    } catch (error) {
        return reportFatal(error, 'Run failed');
    }
}

/**
 * Print the search query a run would send. No credentials needed.
 */
export async function queryCommand(opts: QueryOptions, deps: CommandDeps = {}): Promise<number> {
    const print = deps.print ?? ((line: string) => console.log(line));
    try {
        const config = await resolveConfig({}, opts.config);
        print(buildSearchQuery(config.keywords, { field: config.searchField }));
        return 0;
    } catch (error) {
        return reportFatal(error, 'Query failed');
    }
}
