/**
 * Base class for errors raised by paperfeed. `code` is stable and safe to log.
 */
export class PaperFeedError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public override readonly cause?: Error
    ) {
        super(message);
        this.name = 'PaperFeedError';
    }
}

/**
 * Invalid or missing configuration / credentials. Fatal.
 */
export class ConfigurationError extends PaperFeedError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
        this.name = 'ConfigurationError';
    }
}

/**
 * The external store could not be read or written.
 * Fatal at index-load time, per-paper when writing.
 */
export class PersistenceError extends PaperFeedError {
    constructor(message: string, cause?: Error) {
        super(message, 'PERSISTENCE_ERROR', cause);
        this.name = 'PersistenceError';
    }
}

/**
 * The search source stayed unreachable after retries. Fatal.
 */
export class SourceUnavailableError extends PaperFeedError {
    constructor(message: string, cause?: Error) {
        super(message, 'SOURCE_UNAVAILABLE', cause);
        this.name = 'SourceUnavailableError';
    }
}

/**
 * LLM call failed for a reason other than rate limiting.
 */
export class LlmError extends PaperFeedError {
    constructor(message: string, cause?: Error) {
        super(message, 'LLM_ERROR', cause);
        this.name = 'LlmError';
    }
}

/**
 * LLM backend refused the call because of a rate limit or exhausted quota.
 */
export class LlmRateLimitError extends PaperFeedError {
    constructor(
        message: string,
        public readonly model: string,
        cause?: Error
    ) {
        super(message, 'LLM_RATE_LIMIT', cause);
        this.name = 'LlmRateLimitError';
    }
}

/**
 * Coerce an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
