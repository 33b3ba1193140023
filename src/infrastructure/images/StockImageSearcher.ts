import { ExtractedIntent } from '../../domain/entities/ExtractedIntent';
import { StockCandidate, StockProvider, normalizeSourceUrl } from '../../domain/entities/StockCandidate';
import { IStockSearchClient } from '../../domain/ports/IStockSearchClient';
import { isolate } from '../resilience/IsolatedCall';

export interface StockImageSearcherOptions {
    /** Results requested from each provider */
    perProvider?: number;
    /** Budget of a single provider call */
    providerTimeoutMs?: number;
    /** Overall budget of one search; no provider call may outlive it */
    deadlineMs?: number;
}

/**
 * Queries every configured stock provider concurrently and merges the results.
 *
 * Providers are merged in registration order, so the output is deterministic
 * for identical provider responses. A failing or slow provider contributes
 * zero candidates.
 */
export class StockImageSearcher {
    private readonly perProvider: number;
    private readonly providerTimeoutMs: number;
    private readonly deadlineMs: number;

    constructor(
        private readonly clients: readonly IStockSearchClient[],
        options: StockImageSearcherOptions = {}
    ) {
        this.perProvider = options.perProvider ?? 10;
        this.providerTimeoutMs = options.providerTimeoutMs ?? 10000;
        this.deadlineMs = options.deadlineMs ?? 15000;
    }

    /** Provider order used for querying, merging and tie-breaking */
    get providerOrder(): StockProvider[] {
        return this.clients.map((client) => client.provider);
    }

    async search(intent: ExtractedIntent): Promise<StockCandidate[]> {
        const query = intent.searchQuery || intent.keywords.slice(0, 3).join(', ');
        if (!query || this.clients.length === 0) {
            return [];
        }

        const timeoutMs = Math.min(this.providerTimeoutMs, this.deadlineMs);
        console.log(`[StockSearch] Searching ${this.providerOrder.join(', ')} for "${query}"`);

        const responses = await Promise.all(
            this.clients.map((client) =>
                isolate(
                    `${client.provider} search`,
                    (signal) => client.search(query, {
                        perPage: this.perProvider,
                        orientation: intent.constraints.orientation,
                        signal,
                    }),
                    timeoutMs
                )
            )
        );

        const seen = new Set<string>();
        const merged: StockCandidate[] = [];
        for (const response of responses) {
            if (!response.ok) continue;
            for (const candidate of response.value) {
                const key = normalizeSourceUrl(candidate.sourceUrl);
                if (seen.has(key)) continue;
                seen.add(key);
                merged.push(candidate);
            }
        }

        console.log(`[StockSearch] ${merged.length} unique candidates`);
        return merged;
    }
}
