import type { LlmBackend } from './llm-provider.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'silent';

/**
 * arXiv search field prefix applied to every keyword clause.
 */
export type SearchField = 'all' | 'ti' | 'abs';

/**
 * LLM enrichment configuration.
 */
export interface LlmConfig {
    /** Backends in priority order */
    backends: LlmBackend[];
    temperature: number;
    /** How long a rate-limited backend is left alone */
    cooldownMs: number;
    /** Per-request timeout */
    timeoutMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface PaperFeedConfig {
    // Search
    keywords: string[];
    lookbackDays: number;
    maxResults: number;
    categories: string[];
    searchField: SearchField;

    // Enrichment
    researchArea: string;
    summaryLanguage: string;
    llm: LlmConfig;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;
}

/**
 * Secrets, read from the environment only.
 */
export interface Credentials {
    notionToken: string;
    notionDatabaseId: string;
    googleApiKey: string;
}

/**
 * Default configuration values. `keywords` and `researchArea` must come
 * from the config file.
 */
export const DEFAULT_CONFIG: PaperFeedConfig = {
    keywords: [],
    lookbackDays: 3,
    maxResults: 200,
    categories: [],
    searchField: 'all',
    researchArea: '',
    summaryLanguage: 'English',
    llm: {
        backends: [
            { model: 'gemini-2.5-pro', rpm: 5, rpd: 100 },
            { model: 'gemini-2.5-flash', rpm: 10, rpd: 250 },
            { model: 'gemini-2.0-flash', rpm: 15, rpd: 200 },
            { model: 'gemini-2.5-flash-lite', rpm: 15, rpd: 1000 },
        ],
        temperature: 0.2,
        cooldownMs: 60_000,
        timeoutMs: 120_000,
    },
    logLevel: 'info',
    jsonLogs: false,
};
