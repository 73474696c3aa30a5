import type { Analysis, EnrichmentOutcome, LlmBackend, LlmProvider, PaperRecord } from '../types/index.js';
import { LlmRateLimitError, toError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { BackendPacer, systemClock, type Clock } from './pacing.js';
import { buildAnalysisPrompt, SYSTEM_PROMPT } from './prompts.js';
import { fallbackAnalysis, parseAnalysisResponse } from './response-parser.js';

export interface EnrichmentOptions {
    researchArea: string;
    summaryLanguage: string;
    /** Backends in priority order */
    backends: readonly LlmBackend[];
    temperature: number;
    /** How long a rate-limited backend is skipped */
    cooldownMs: number;
    clock?: Clock;
}

/**
 * Result of a single call to one backend.
 */
type AttemptResult =
    | { kind: 'ok'; analysis: Analysis }
    | { kind: 'malformed'; reason: string }
    | { kind: 'rate-limited'; reason: string }
    | { kind: 'failed'; reason: string };

/**
 * Turns a paper into an Analysis through a prioritized list of LLM backends.
 *
 * Per paper:
 *   - rate limited → block that backend for `cooldownMs`, try the next one
 *   - no backend left → skipped
 *   - malformed output → one retry with a stricter prompt, then degraded
 *   - any other failure → skipped
 */
export class EnrichmentEngine {
    private readonly pacer: BackendPacer;

    constructor(
        private readonly provider: LlmProvider,
        private readonly options: EnrichmentOptions
    ) {
        this.pacer = new BackendPacer(options.backends, options.clock ?? systemClock);
    }

    async enrich(paper: PaperRecord): Promise<EnrichmentOutcome> {
        const logger = getLogger();
        const tried = new Set<string>();
        let strict = false;

        for (;;) {
            const backend = this.pacer.select(tried);
            if (!backend) {
                logger.warn({ paperId: paper.id, tried: [...tried] }, 'No LLM backend available, skipping paper');
                return { status: 'skipped', reason: 'all LLM backends exhausted' };
            }

            await this.pacer.acquire(backend);
            logger.debug({ paperId: paper.id, model: backend.model, strict }, 'Analyzing paper');
            const result = await this.attempt(paper, backend, strict);

            switch (result.kind) {
                case 'ok':
                    return { status: 'enriched', analysis: result.analysis, model: backend.model };

                case 'rate-limited':
                    logger.warn({ paperId: paper.id, model: backend.model }, 'LLM backend rate limited, switching backend');
                    this.pacer.block(backend, this.options.cooldownMs);
                    tried.add(backend.model);
                    continue;

                case 'malformed':
                    if (!strict) {
                        logger.warn({ paperId: paper.id, model: backend.model, reason: result.reason }, 'Unparseable analysis, retrying with strict prompt');
                        strict = true;
                        continue;
                    }
                    logger.warn({ paperId: paper.id, model: backend.model, reason: result.reason }, 'Unparseable analysis after retry, recording as Unrelated');
                    return { status: 'degraded', analysis: fallbackAnalysis(), reason: result.reason };

                case 'failed':
                    logger.error({ paperId: paper.id, model: backend.model, reason: result.reason }, 'LLM call failed, skipping paper');
                    return { status: 'skipped', reason: result.reason };
            }
        }
    }

    /**
     * Pacing state, for end-of-run logging.
     */
    backendUsage(): ReturnType<BackendPacer['snapshot']> {
        return this.pacer.snapshot();
    }

    private async attempt(paper: PaperRecord, backend: LlmBackend, strict: boolean): Promise<AttemptResult> {
        const prompt = buildAnalysisPrompt(paper, this.options, strict);

        let text: string;
        try {
            const completion = await this.provider.complete(prompt, {
                model: backend.model,
                systemPrompt: SYSTEM_PROMPT,
                temperature: strict ? 0 : this.options.temperature,
                jsonMode: true,
            });
            text = completion.text;
            getLogger().debug({ paperId: paper.id, model: backend.model, usage: completion.usage }, 'LLM usage');
        } catch (error) {
            if (error instanceof LlmRateLimitError) {
                return { kind: 'rate-limited', reason: error.message };
            }
            return { kind: 'failed', reason: toError(error).message };
        }

        const parsed = parseAnalysisResponse(text);
        return parsed.ok ? { kind: 'ok', analysis: parsed.analysis } : { kind: 'malformed', reason: parsed.error };
    }
}
