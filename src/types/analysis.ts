/**
 * Relatedness verdict. Only these two labels ever reach the store.
 */
export type Relatedness = 'Related' | 'Unrelated';

export const RELATEDNESS_LABELS: readonly Relatedness[] = ['Related', 'Unrelated'];

/**
 * Structured analysis of one paper produced by the enrichment engine.
 * Sub-sections the model could not produce are empty strings.
 */
export interface Analysis {
    relatedness: Relatedness;
    summary: string;
    motivation: string;
    differences: string;
    contributions: string;
    method: string;
    results: string;
}

/**
 * Outcome of enriching one paper.
 *
 *   enriched: the model returned a valid analysis
 *   degraded: output stayed unparseable after the strict retry; the
 *              analysis is the empty Unrelated fallback
 *   skipped:  no backend could serve the paper; nothing is written
 */
export type EnrichmentOutcome =
    | { status: 'enriched'; analysis: Analysis; model: string }
    | { status: 'degraded'; analysis: Analysis; reason: string }
    | { status: 'skipped'; reason: string };

/**
 * Summary counters for one pipeline run.
 * `found === skipped + persisted`; `skipped` is the sum of the breakdown fields.
 */
export interface RunResult {
    found: number;
    skipped: number;
    enriched: number;
    persisted: number;

    duplicates: number;
    enrichmentFailed: number;
    writeFailed: number;
    degraded: number;
}
