import type { SearchField } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';

export interface QueryOptions {
    /** Field prefix applied to every clause (arXiv: all, ti, abs) */
    field?: SearchField;
}

/**
 * Build an OR query in which every keyword is an exact phrase.
 *
 * Quoting keeps hyphenated and multi-word terms intact: "few-shot" is never
 * split into few OR shot. Keywords are trimmed, internal double quotes
 * removed, and case-insensitive duplicates dropped keeping first occurrence.
 *
 *   buildSearchQuery(['few-shot', 'LLM'])                  → "few-shot" OR "LLM"
 *   buildSearchQuery(['few-shot', 'LLM'], { field: 'all' }) → all:"few-shot" OR all:"LLM"
 */
export function buildSearchQuery(keywords: readonly string[], options: QueryOptions = {}): string {
    const phrases = uniquePhrases(keywords);

    if (phrases.length === 0) {
        throw new ConfigurationError('Cannot build a search query without keywords');
    }

    const prefix = options.field ? `${options.field}:` : '';
    return phrases.map((phrase) => `${prefix}"${phrase}"`).join(' OR ');
}

function uniquePhrases(keywords: readonly string[]): string[] {
    const seen = new Set<string>();
    const phrases: string[] = [];

    for (const keyword of keywords) {
        const phrase = keyword.replace(/"/g, ' ').replace(/\s+/g, ' ').trim();
        if (!phrase) continue;

        const key = phrase.toLowerCase();
        if (seen.has(key)) continue;

        seen.add(key);
        phrases.push(phrase);
    }

    return phrases;
}
