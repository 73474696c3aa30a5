/**
 * Identifier and title normalization shared by the search client and the
 * existing-entry index. Both sides must go through these functions, or
 * stored rows stop matching freshly fetched papers.
 */

const NEW_STYLE_ID = String.raw`\d{4}\.\d{4,5}`;
const OLD_STYLE_ID = String.raw`[a-z][a-z-]*(?:\.[A-Z]{2})?\/\d{7}`;

const ARXIV_PATTERNS = [
    new RegExp(String.raw`arxiv\.org\/(?:abs|pdf|html)\/(${NEW_STYLE_ID}|${OLD_STYLE_ID})(?:v\d+)?`, 'i'),
    new RegExp(String.raw`^arxiv:\s*(${NEW_STYLE_ID}|${OLD_STYLE_ID})(?:v\d+)?$`, 'i'),
    new RegExp(String.raw`^(${NEW_STYLE_ID}|${OLD_STYLE_ID})(?:v\d+)?$`, 'i'),
];

/**
 * Extract a version-less arXiv ID from various formats.
 * "https://arxiv.org/abs/2401.01234v2" → "2401.01234"
 * "arXiv:hep-th/9901001v3" → "hep-th/9901001"
 * "http://arxiv.org/pdf/2401.01234v1.pdf" → "2401.01234"
 */
export function extractArxivId(input: string | null | undefined): string | null {
    if (!input) return null;
    const trimmed = input.trim();

    for (const pattern of ARXIV_PATTERNS) {
        const match = trimmed.match(pattern);
        if (match?.[1]) return match[1];
    }

    return null;
}

const VERSION_SUFFIX = /(\d)v\d+$/i;

/**
 * Canonical dedup key for a paper identifier or URL.
 *
 * arXiv identifiers become "arxiv:<id>" without version suffix. Other URLs
 * lose scheme, query, fragment, trailing slash and a trailing version
 * suffix; the host is lowercased. Plain identifiers lose a trailing version
 * suffix ("paper.123v2" → "paper.123"). Anything else is returned trimmed,
 * so no paper is ever dropped.
 */
export function canonicalizeIdentifier(raw: string): string {
    const arxivId = extractArxivId(raw);
    if (arxivId) return `arxiv:${arxivId}`;

    const trimmed = raw.trim();
    if (!/^https?:\/\//i.test(trimmed)) {
        return trimmed.replace(VERSION_SUFFIX, '$1');
    }

    let url: URL;
    try {
        url = new URL(trimmed);
    } catch {
        return trimmed;
    }

    const path = url.pathname.replace(/\/+$/, '').replace(VERSION_SUFFIX, '$1');
    return `${url.host.toLowerCase()}${path}`;
}

/**
 * Clean and normalize a paper title for comparison.
 */
export function normalizeTitle(title: string): string {
    return title
        .toLowerCase()
        .replace(/[^\p{L}\p{N}\s]/gu, ' ')  // Remove punctuation
        .replace(/\s+/g, ' ')              // Collapse whitespace
        .trim();
}

/**
 * Collapse runs of whitespace (including newlines) into single spaces.
 */
export function collapseWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
}
