import type { PaperRecord } from '../types/index.js';

export interface PromptContext {
    researchArea: string;
    summaryLanguage: string;
}

/**
 * JSON keys the model must return, mapped onto Analysis fields by the parser.
 */
export const RESPONSE_KEYS = [
    'relatedness',
    'summary',
    'motivation',
    'differences_from_prior_work',
    'contributions',
    'method',
    'results',
] as const;

export const SYSTEM_PROMPT =
    'You are a research assistant who reads paper abstracts and reports, as a single JSON object, ' +
    'what the paper does and whether it matters to a specific researcher.';

/**
 * Build the analysis prompt for one paper.
 * The strict variant is used after a response that could not be parsed.
 */
export function buildAnalysisPrompt(paper: PaperRecord, context: PromptContext, strict = false): string {
    const lines = [
        'My research area:',
        `"${context.researchArea}"`,
        '',
        'Paper title:',
        paper.title,
        '',
        'Abstract:',
        paper.abstract || '(no abstract available)',
        '',
        'Instructions:',
        `1. Write every text field in ${context.summaryLanguage}, as complete sentences without emoji or markdown.`,
        '2. "summary": a short paragraph covering the problem, the approach and the main result.',
        '3. "motivation": the problem the paper addresses and why it matters.',
        '4. "differences_from_prior_work": how the approach differs from existing methods.',
        '5. "contributions": the main contributions and what is novel.',
        '6. "method": the proposed method or approach.',
        '7. "results": the key results supporting the method.',
        '8. "relatedness": "Related" if the contribution bears directly on my research area, otherwise "Unrelated".',
        '   No other value is allowed.',
        '',
        'If the abstract does not say enough for a field, use an empty string for that field.',
        '',
        'Respond with exactly this JSON shape:',
        '{',
        ...RESPONSE_KEYS.map((key, i) => {
            const value = key === 'relatedness' ? '"Related" | "Unrelated"' : '"..."';
            return `  "${key}": ${value}${i < RESPONSE_KEYS.length - 1 ? ',' : ''}`;
        }),
        '}',
    ];

    if (strict) {
        lines.push(
            '',
            'Your previous answer could not be parsed.',
            'Return ONLY the JSON object: no code fences, no commentary, no trailing text.',
            'Every key above must be present and every value must be a string.',
            '"relatedness" must be exactly "Related" or "Unrelated".'
        );
    }

    return lines.join('\n');
}
