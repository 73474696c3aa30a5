/**
 * Barrel export for all shared types.
 */
export type { PaperRecord, RawPaperEntry } from './paper.js';
export { RELATEDNESS_LABELS } from './analysis.js';
export type { Analysis, Relatedness, EnrichmentOutcome, RunResult } from './analysis.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    PaperFeedConfig,
    LogLevel,
    LlmConfig,
    SearchField,
    Credentials,
} from './config.js';
export type { SourceAdapter, SearchRequest, DateWindow } from './source-adapter.js';
export type { PaperStore, StoredEntry } from './store.js';
export type {
    LlmProvider,
    LlmBackend,
    LlmCompletionParams,
    LlmCompletionResult,
} from './llm-provider.js';
