import type { Clock } from '../llm/pacing.js';
import type { Analysis, LlmCompletionResult, PaperRecord } from '../types/index.js';

/**
 * Manually advanced clock; `sleep` moves time forward instantly.
 */
export class FakeClock implements Clock {
    readonly sleeps: number[] = [];

    constructor(private time = 0) {}

    now(): number {
        return this.time;
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.time += ms;
    }

    advance(ms: number): void {
        this.time += ms;
    }
}

export function makePaper(overrides: Partial<PaperRecord> = {}): PaperRecord {
    return {
        id: 'arxiv:2403.05001',
        title: 'Speech Style Transfer with Audio LMs',
        authors: ['Alice Example', 'Bob Example'],
        published: '2024-03-09',
        updated: '2024-03-09',
        abstract: 'We study style transfer for speech.',
        url: 'http://arxiv.org/abs/2403.05001v1',
        pdfUrl: 'http://arxiv.org/pdf/2403.05001v1',
        categories: ['cs.CL'],
        ...overrides,
    };
}

export function makeAnalysis(overrides: Partial<Analysis> = {}): Analysis {
    return {
        relatedness: 'Related',
        summary: 'A summary.',
        motivation: 'A motivation.',
        differences: 'A difference.',
        contributions: 'A contribution.',
        method: 'A method.',
        results: 'A result.',
        ...overrides,
    };
}

export function completion(text: string, model = 'test-model'): LlmCompletionResult {
    return {
        text,
        usage: { promptTokens: 0, completionTokens: 0, totalTokens: 0 },
        model,
        provider: 'fake',
    };
}

export const VALID_RESPONSE = JSON.stringify({
    relatedness: 'Related',
    summary: 'A summary.',
    motivation: 'A motivation.',
    differences_from_prior_work: 'A difference.',
    contributions: 'A contribution.',
    method: 'A method.',
    results: 'A result.',
});
