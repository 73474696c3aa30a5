import { describe, it, expect } from 'vitest';
import { ConfigurationError, LlmRateLimitError, PaperFeedError, PersistenceError, toError } from '../utils/errors.js';

describe('errors', () => {
    it('should keep the cause and a stable code', () => {
        const cause = new Error('socket hang up');
        const error = new PersistenceError('Notion database query failed: socket hang up', cause);

        expect(error).toBeInstanceOf(PaperFeedError);
        expect(error.cause).toBe(cause);
        expect(error.code).toBe('PERSISTENCE_ERROR');
        expect(error.name).toBe('PersistenceError');
    });

    it('should leave the cause unset when none is given', () => {
        expect(new ConfigurationError('Missing environment variables: NOTION_TOKEN').cause).toBeUndefined();
    });

    it('should carry the rate-limited model', () => {
        const error = new LlmRateLimitError('quota exceeded', 'gemini-2.5-pro');
        expect(error.model).toBe('gemini-2.5-pro');
        expect(error.code).toBe('LLM_RATE_LIMIT');
    });

    it('should wrap non-Error values', () => {
        expect(toError('boom').message).toBe('boom');
    });
});
