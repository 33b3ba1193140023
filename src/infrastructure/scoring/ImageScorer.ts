import { ExtractedIntent } from '../../domain/entities/ExtractedIntent';
import {
    CandidateScores,
    ScoredCandidate,
    STOCK_PROVIDERS,
    StockCandidate,
    StockProvider,
    SuitabilityThresholds,
    compareScoredCandidates,
    isSuitable,
} from '../../domain/entities/StockCandidate';
import { IImageAnalysisClient } from '../../domain/ports/IImageAnalysisClient';
import { IPresentationFitClient } from '../../domain/ports/IPresentationFitClient';
import { isolate, mapWithConcurrency } from '../resilience/IsolatedCall';

export interface ImageScorerOptions {
    thresholds: SuitabilityThresholds;
    /** Optional fit scorer; without it fit scores are simply absent */
    fitClient?: IPresentationFitClient;
    concurrency?: number;
    scoringTimeoutMs?: number;
    fitTimeoutMs?: number;
    /** Tie-break order of providers */
    providerOrder?: readonly StockProvider[];
}

/**
 * Scores stock candidates and ranks the suitable ones.
 */
export class ImageScorer {
    private readonly thresholds: SuitabilityThresholds;
    private readonly fitClient?: IPresentationFitClient;
    private readonly concurrency: number;
    private readonly scoringTimeoutMs: number;
    private readonly fitTimeoutMs: number;
    private readonly providerOrder: readonly StockProvider[];

    constructor(
        private readonly analysisClient: IImageAnalysisClient,
        options: ImageScorerOptions
    ) {
        this.thresholds = options.thresholds;
        this.fitClient = options.fitClient;
        this.concurrency = options.concurrency ?? 4;
        this.scoringTimeoutMs = options.scoringTimeoutMs ?? 20000;
        this.fitTimeoutMs = options.fitTimeoutMs ?? 30000;
        this.providerOrder = options.providerOrder ?? STOCK_PROVIDERS;
    }

    /**
     * Scores every candidate with bounded concurrency. Candidates whose
     * quality/safety call fails are dropped; output keeps input order.
     */
    async score(candidates: readonly StockCandidate[], intent: ExtractedIntent): Promise<ScoredCandidate[]> {
        const topic = intent.topics[0] ?? intent.searchQuery;

        const scored = await mapWithConcurrency(candidates, this.concurrency, (candidate) =>
            this.scoreCandidate(candidate, topic)
        );

        const kept = scored.filter((entry): entry is ScoredCandidate => entry !== null);
        console.log(`[ImageScorer] Scored ${kept.length}/${candidates.length} candidates`);
        return kept;
    }

    /**
     * Keeps suitable candidates, best first.
     */
    filterAndSort(scored: readonly ScoredCandidate[]): ScoredCandidate[] {
        // Array.prototype.sort is stable, so ties keep first-seen order.
        return scored
            .filter((entry) => entry.suitable)
            .sort((a, b) => compareScoredCandidates(a, b, this.providerOrder));
    }

    private async scoreCandidate(candidate: StockCandidate, topic: string): Promise<ScoredCandidate | null> {
        const label = `${candidate.provider}:${candidate.id}`;

        const [analysis, fit] = await Promise.all([
            isolate(`scoring ${label}`, (signal) => this.analysisClient.analyze(candidate.previewUrl, signal), this.scoringTimeoutMs),
            this.scoreFit(candidate, topic),
        ]);

        if (!analysis.ok) {
            return null;
        }

        const scores: CandidateScores = {
            quality: analysis.value.quality,
            safety: analysis.value.safety,
            ...(fit !== undefined ? { presentationFit: fit } : {}),
        };

        return {
            candidate,
            scores,
            suitable: isSuitable(scores, this.thresholds),
        };
    }

    private async scoreFit(candidate: StockCandidate, topic: string): Promise<number | undefined> {
        const fitClient = this.fitClient;
        if (!fitClient || !topic) {
            return undefined;
        }
        const result = await isolate(
            `fit scoring ${candidate.provider}:${candidate.id}`,
            (signal) => fitClient.scoreFit(candidate.previewUrl, topic, signal),
            this.fitTimeoutMs
        );
        return result.ok ? result.value : undefined;
    }
}
