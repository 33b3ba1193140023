/**
 * ExtractedIntent Domain Entity
 *
 * Structured visual-search intent derived once per request from slide text.
 */

export type Orientation = 'landscape' | 'portrait' | 'square';

export interface IntentConstraints {
    orientation?: Orientation;
    color?: string;
}

export interface ExtractedIntent {
    /** Slide content is not worth illustrating (agenda, bare numbers) */
    readonly skip: boolean;

    /** English search keywords, in extraction order, no duplicates */
    readonly keywords: readonly string[];

    /** Short topic labels in the slide's own language */
    readonly topics: readonly string[];

    readonly styleTags: readonly string[];

    readonly negativeKeywords: readonly string[];

    readonly constraints: IntentConstraints;

    /** Refined 2-3 term query used for stock search and generation */
    readonly searchQuery: string;
}

/**
 * Builds an intent straight from explicit keywords. Keyword order is kept as given.
 */
export function createIntentFromKeywords(keywords: readonly string[]): ExtractedIntent {
    const usable = keywords.filter((k) => k.length > 0);
    return Object.freeze({
        skip: false,
        keywords: Object.freeze([...usable]),
        topics: Object.freeze([]),
        styleTags: Object.freeze([]),
        negativeKeywords: Object.freeze([]),
        constraints: Object.freeze({}),
        searchQuery: usable.slice(0, 3).join(', '),
    });
}

/**
 * Removes duplicates (case-insensitive) and blanks, preserving first occurrence.
 */
export function uniqueTerms(terms: readonly string[]): string[] {
    const seen = new Set<string>();
    const result: string[] = [];
    for (const raw of terms) {
        const term = raw.trim();
        const key = term.toLowerCase();
        if (term.length === 0 || seen.has(key)) continue;
        seen.add(key);
        result.push(term);
    }
    return result;
}
