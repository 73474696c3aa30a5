/**
 * Interface for LLM provider adapters (Gemini).
 * One provider serves several backends; a backend is a model name.
 */
export interface LlmProvider {
    /** Provider name */
    readonly name: string;

    /**
     * Send a completion request to the LLM.
     * Throws LlmRateLimitError on rate-limit or quota errors, LlmError otherwise.
     */
    complete(prompt: string, params: LlmCompletionParams): Promise<LlmCompletionResult>;
}

/**
 * Parameters for LLM completion requests.
 */
export interface LlmCompletionParams {
    /** Model (backend) to use */
    model: string;
    /** Temperature (0.0 to 2.0) */
    temperature?: number;
    /** Maximum tokens in response */
    maxTokens?: number;
    /** Whether to request JSON response format */
    jsonMode?: boolean;
    /** System prompt */
    systemPrompt?: string;
}

/**
 * Result from an LLM completion request.
 */
export interface LlmCompletionResult {
    /** Raw response text */
    text: string;
    /** Token usage */
    usage: {
        promptTokens: number;
        completionTokens: number;
        totalTokens: number;
    };
    /** Model used */
    model: string;
    /** Provider name */
    provider: string;
}

/**
 * Backend descriptor with its nominal rate budget.
 */
export interface LlmBackend {
    /** Model name sent to the provider */
    model: string;
    /** Requests per minute */
    rpm: number;
    /** Requests per day (capped per run, since runs are daily) */
    rpd: number;
}
