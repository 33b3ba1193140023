/**
 * StockCandidate Domain Entity
 *
 * Candidate images returned by stock providers, and their scored form.
 * Both only live for the duration of one request's scoring pass.
 */

/**
 * Known stock providers. Order is the query order and the tie-break priority.
 */
export type StockProvider = 'unsplash' | 'pexels';

export const STOCK_PROVIDERS: readonly StockProvider[] = ['unsplash', 'pexels'];

export interface StockCandidate {
    provider: StockProvider;

    /** Provider-native id */
    id: string;

    /** Full-size image URL returned to the caller */
    sourceUrl: string;

    /** Smaller rendition used for scoring */
    previewUrl: string;

    width?: number;
    height?: number;
    description?: string;
    photographer?: string;
    photographerUrl?: string;
}

export interface CandidateScores {
    /** 0..1 */
    quality: number;
    /** 0..1, higher is safer */
    safety: number;
    /** 0..1, absent when no fit scorer is configured or it failed */
    presentationFit?: number;
}

export interface ScoredCandidate {
    candidate: StockCandidate;
    scores: CandidateScores;
    suitable: boolean;
}

export interface SuitabilityThresholds {
    minQualityScore: number;
    minNuditySafeScore: number;
    minPresentationScore: number;
}

/**
 * A missing fit score is not penalized; it is left out of the test.
 */
export function isSuitable(scores: CandidateScores, thresholds: SuitabilityThresholds): boolean {
    if (scores.quality < thresholds.minQualityScore) return false;
    if (scores.safety < thresholds.minNuditySafeScore) return false;
    if (scores.presentationFit !== undefined && scores.presentationFit < thresholds.minPresentationScore) {
        return false;
    }
    return true;
}

export function providerPriority(provider: StockProvider, order: readonly StockProvider[] = STOCK_PROVIDERS): number {
    const index = order.indexOf(provider);
    return index === -1 ? order.length : index;
}

/**
 * Quality descending, then provider priority. Used with a stable sort so equal
 * candidates keep first-seen order.
 */
export function compareScoredCandidates(
    a: ScoredCandidate,
    b: ScoredCandidate,
    order: readonly StockProvider[] = STOCK_PROVIDERS
): number {
    if (a.scores.quality !== b.scores.quality) {
        return b.scores.quality - a.scores.quality;
    }
    return providerPriority(a.candidate.provider, order) - providerPriority(b.candidate.provider, order);
}

/**
 * Normalizes a source URL for deduplication: host lowercased, query, hash and
 * trailing slash dropped.
 */
export function normalizeSourceUrl(url: string): string {
    try {
        const parsed = new URL(url);
        const path = parsed.pathname.replace(/\/+$/, '');
        return `${parsed.host.toLowerCase()}${path}`;
    } catch {
        return url.trim().toLowerCase();
    }
}
