import { z } from 'zod';
import type { Analysis, Relatedness } from '../types/index.js';

export type ParseResult =
    | { ok: true; analysis: Analysis }
    | { ok: false; error: string };

/**
 * Map a free-form verdict onto the two allowed labels, or null.
 */
export function coerceRelatedness(value: string): Relatedness | null {
    const normalized = value.trim().toLowerCase().replace(/[.!]+$/, '').trim();
    switch (normalized) {
        case 'related':
        case 'yes':
            return 'Related';
        case 'unrelated':
        case 'not related':
        case 'no':
            return 'Unrelated';
        default:
            return null;
    }
}

const optionalText = z.unknown().transform((value) => (typeof value === 'string' ? value.trim() : ''));

const responseSchema = z.object({
    relatedness: z.string().transform((value, ctx) => {
        const label = coerceRelatedness(value);
        if (!label) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: `relatedness must be "Related" or "Unrelated", got "${value}"`,
            });
            return z.NEVER;
        }
        return label;
    }),
    summary: optionalText,
    motivation: optionalText,
    differences_from_prior_work: optionalText,
    contributions: optionalText,
    method: optionalText,
    results: optionalText,
});

/**
 * Parse a model response into an Analysis.
 *
 * Tolerates code fences and text around the JSON object. Fails only when no
 * JSON object can be read or the verdict is not one of the two labels.
 */
export function parseAnalysisResponse(text: string): ParseResult {
    const json = extractJsonObject(text);
    if (json === null) {
        return { ok: false, error: 'no JSON object in response' };
    }

    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        return { ok: false, error: `invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
    }

    const result = responseSchema.safeParse(raw);
    if (!result.success) {
        return { ok: false, error: result.error.issues.map((issue) => issue.message).join('; ') };
    }

    const data = result.data;
    return {
        ok: true,
        analysis: {
            relatedness: data.relatedness,
            summary: data.summary,
            motivation: data.motivation,
            differences: data.differences_from_prior_work,
            contributions: data.contributions,
            method: data.method,
            results: data.results,
        },
    };
}

/**
 * Analysis recorded when the model never produced parseable output.
 */
export function fallbackAnalysis(): Analysis {
    return {
        relatedness: 'Unrelated',
        summary: '',
        motivation: '',
        differences: '',
        contributions: '',
        method: '',
        results: '',
    };
}

function extractJsonObject(text: string): string | null {
    const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
    const body = fenced?.[1] ?? text;

    const start = body.indexOf('{');
    const end = body.lastIndexOf('}');
    if (start === -1 || end <= start) return null;

    return body.slice(start, end + 1);
}
