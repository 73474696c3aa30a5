import { GoogleGenAI } from '@google/genai';
import type { LlmCompletionParams, LlmCompletionResult, LlmProvider } from '../types/index.js';
import { LlmError, LlmRateLimitError, toError } from '../utils/errors.js';
import { sleep } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

const MAX_RETRIES = 2;
const INITIAL_DELAY_MS = 2000;
const BACKOFF_FACTOR = 2;

export interface GeminiProviderOptions {
    apiKey: string;
    /** Per-request timeout */
    timeoutMs?: number;
    /** Retries for transient (5xx / network) failures */
    maxRetries?: number;
    initialDelayMs?: number;
}

/**
 * Gemini provider over the @google/genai SDK.
 * Rate-limit and quota failures are surfaced as LlmRateLimitError without
 * retrying, so the caller can move on to another model.
 */
export class GeminiProvider implements LlmProvider {
    readonly name = 'gemini';
    private readonly ai: GoogleGenAI;
    private readonly maxRetries: number;
    private readonly initialDelayMs: number;

    constructor(options: GeminiProviderOptions) {
        this.ai = new GoogleGenAI({
            apiKey: options.apiKey,
            httpOptions: { timeout: options.timeoutMs ?? 120_000 },
        });
        this.maxRetries = options.maxRetries ?? MAX_RETRIES;
        this.initialDelayMs = options.initialDelayMs ?? INITIAL_DELAY_MS;
    }

    async complete(prompt: string, params: LlmCompletionParams): Promise<LlmCompletionResult> {
        try {
            const response = await this.withRetry(() =>
                this.ai.models.generateContent({
                    model: params.model,
                    contents: prompt,
                    config: {
                        systemInstruction: params.systemPrompt,
                        temperature: params.temperature,
                        maxOutputTokens: params.maxTokens,
                        responseMimeType: params.jsonMode ? 'application/json' : undefined,
                    },
                })
            );

            const usage = response.usageMetadata;
            return {
                text: response.text ?? '',
                usage: {
                    promptTokens: usage?.promptTokenCount ?? 0,
                    completionTokens: usage?.candidatesTokenCount ?? 0,
                    totalTokens: usage?.totalTokenCount ?? 0,
                },
                model: params.model,
                provider: this.name,
            };
        } catch (error) {
            const cause = toError(error);
            if (isRateLimitError(error)) {
                throw new LlmRateLimitError(`Gemini model ${params.model} is rate limited: ${cause.message}`, params.model, cause);
            }
            throw new LlmError(`Gemini call to ${params.model} failed: ${cause.message}`, cause);
        }
    }

    private async withRetry<T>(fn: () => Promise<T>): Promise<T> {
        for (let attempt = 0; ; attempt++) {
            try {
                return await fn();
            } catch (error) {
                if (attempt >= this.maxRetries || !isTransientError(error)) throw error;
                const delay = this.initialDelayMs * BACKOFF_FACTOR ** attempt;
                getLogger().warn({ attempt: attempt + 1, delayMs: delay, error: toError(error).message }, 'Transient Gemini error, backing off');
                await sleep(delay);
            }
        }
    }
}

function errorStatus(error: unknown): number | undefined {
    if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
        return error.status;
    }
    return undefined;
}

/**
 * 429, RESOURCE_EXHAUSTED and quota messages all mean "try another model".
 */
export function isRateLimitError(error: unknown): boolean {
    if (errorStatus(error) === 429) return true;
    const message = toError(error).message.toLowerCase();
    return message.includes('resource_exhausted') || message.includes('quota') || /\b429\b/.test(message);
}

/**
 * Server-side and network failures worth a retry on the same model.
 */
export function isTransientError(error: unknown): boolean {
    if (isRateLimitError(error)) return false;
    const status = errorStatus(error);
    if (status !== undefined) return status >= 500 && status < 600;
    const message = toError(error).message.toLowerCase();
    return /\b5\d{2}\b/.test(message) || message.includes('fetch failed') || message.includes('timeout');
}
