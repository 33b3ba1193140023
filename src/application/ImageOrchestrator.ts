import { AiModel, parseAiModelSelector } from '../domain/entities/AiModel';
import { ExtractedIntent } from '../domain/entities/ExtractedIntent';
import { GeneratedImage, GenerationOutcome } from '../domain/entities/GenerationRequest';
import {
    ImageResult,
    failedResult,
    generatedSource,
    noneResult,
    stockSource,
} from '../domain/entities/ImageResult';
import { SlideInput, hasExplicitKeywords, isIllustrationStyle, slideText } from '../domain/entities/SlideInput';
import { ScoredCandidate } from '../domain/entities/StockCandidate';
import { errorMessage } from '../domain/errors/PipelineErrors';
import { IImageAnalysisClient } from '../domain/ports/IImageAnalysisClient';
import { GeneratedImageCache } from '../infrastructure/cache/GeneratedImageCache';
import { GenerationParams, ImageGenerator } from '../infrastructure/images/ImageGenerator';
import { StockImageSearcher } from '../infrastructure/images/StockImageSearcher';
import { KeywordExtractor } from '../infrastructure/llm/KeywordExtractor';
import { isolate } from '../infrastructure/resilience/IsolatedCall';
import { ImageScorer } from '../infrastructure/scoring/ImageScorer';

export type OrchestratorState =
    | 'Start'
    | 'Extracting'
    | 'Skipped'
    | 'Routing'
    | 'StockPath'
    | 'Suitable'
    | 'NoneFound'
    | 'AiPath'
    | 'Generating'
    | 'Generated'
    | 'Failed'
    | 'SafetyCheck'
    | 'Safe'
    | 'Retry'
    | 'Done';

export interface OrchestratorRun {
    result: ImageResult;
    /** Visited states, in order */
    states: OrchestratorState[];
}

export interface ImageOrchestratorDependencies {
    keywordExtractor: Pick<KeywordExtractor, 'extract'>;
    imageSearcher: Pick<StockImageSearcher, 'search'>;
    imageScorer: Pick<ImageScorer, 'score' | 'filterAndSort'>;
    imageGenerator: Pick<ImageGenerator, 'generate' | 'runWithFallbackModel'>;
    cache: GeneratedImageCache;
    /** Safety check for generated images; without it every generated image is accepted */
    safetyClient?: Pick<IImageAnalysisClient, 'checkSafety'>;
}

export interface ImageOrchestratorOptions {
    minNuditySafeScore: number;
    /** Base of served-path references for cached bytes */
    publicBaseUrl: string;
    /** URL of `failed` results */
    errorPlaceholderUrl?: string | null;
    safetyCheckTimeoutMs?: number;
}

/**
 * Tracks the visited states of one run and logs every transition.
 */
class RunTrace {
    readonly states: OrchestratorState[] = ['Start'];

    enter(state: OrchestratorState): void {
        const from = this.states[this.states.length - 1];
        console.log(`[Orchestrator] ${from} → ${state}`);
        this.states.push(state);
    }

    finish(result: ImageResult): OrchestratorRun {
        this.enter('Done');
        return { result, states: this.states };
    }
}

/**
 * ImageOrchestrator runs the image-selection state machine for one slide.
 *
 * Start → Extracting → Routing → StockPath / AiPath → Done. The stock path
 * falls back to the AI path in auto mode. A generated image that fails the
 * safety check is regenerated exactly once with the safe fallback model, and
 * that second result is final.
 */
export class ImageOrchestrator {
    private readonly deps: ImageOrchestratorDependencies;
    private readonly minNuditySafeScore: number;
    private readonly publicBaseUrl: string;
    private readonly errorPlaceholderUrl: string | null;
    private readonly safetyCheckTimeoutMs: number;

    constructor(deps: ImageOrchestratorDependencies, options: ImageOrchestratorOptions) {
        this.deps = deps;
        this.minNuditySafeScore = options.minNuditySafeScore;
        this.publicBaseUrl = options.publicBaseUrl.replace(/\/+$/, '');
        this.errorPlaceholderUrl = options.errorPlaceholderUrl ?? null;
        this.safetyCheckTimeoutMs = options.safetyCheckTimeoutMs ?? 20000;
    }

    async processSlide(slide: SlideInput): Promise<ImageResult> {
        const { result } = await this.run(slide);
        return result;
    }

    /**
     * Runs the state machine once. Only ExtractionError escapes; every other
     * failure ends in a `none` or `failed` result.
     */
    async run(slide: SlideInput): Promise<OrchestratorRun> {
        const trace = new RunTrace();
        console.log(`[Orchestrator] Processing slide: "${slide.title}"`);

        if (!hasExplicitKeywords(slide)) {
            trace.enter('Extracting');
        }
        const intent = await this.deps.keywordExtractor.extract(slide);
        const keywords = intent.searchQuery;

        if (intent.skip) {
            trace.enter('Skipped');
            return trace.finish(noneResult(keywords));
        }

        trace.enter('Routing');
        const mode = slide.imageMode ?? 'auto';
        const aiForced = isIllustrationStyle(slide.style) || mode === 'ai_only';

        if (!aiForced) {
            trace.enter('StockPath');
            const best = await this.findStockImage(intent);

            if (best) {
                trace.enter('Suitable');
                console.log(`[Orchestrator] Selected ${best.candidate.provider} image (quality ${best.scores.quality.toFixed(2)})`);
                return trace.finish({
                    url: best.candidate.sourceUrl,
                    source: stockSource(best.candidate.provider),
                    keywords,
                });
            }

            trace.enter('NoneFound');
            if (mode === 'stock_only') {
                return trace.finish(noneResult(keywords));
            }
            console.log('[Orchestrator] No suitable stock image, falling back to generation');
        }

        trace.enter('AiPath');
        return this.runAiPath(trace, intent, this.generationParams(slide));
    }

    private async findStockImage(intent: ExtractedIntent): Promise<ScoredCandidate | undefined> {
        const candidates = await this.deps.imageSearcher.search(intent);
        if (candidates.length === 0) {
            return undefined;
        }
        const scored = await this.deps.imageScorer.score(candidates, intent);
        return this.deps.imageScorer.filterAndSort(scored)[0];
    }

    private async runAiPath(trace: RunTrace, intent: ExtractedIntent, params: GenerationParams): Promise<OrchestratorRun> {
        const keywords = intent.searchQuery;

        trace.enter('Generating');
        const first = await this.deps.imageGenerator.generate(intent, params);
        if (!first.ok) {
            return this.fail(trace, keywords, first);
        }
        trace.enter('Generated');

        trace.enter('SafetyCheck');
        const safe = await this.isSafe(first.image);
        if (safe) {
            trace.enter('Safe');
            return this.publish(trace, keywords, first.image, first.request.model);
        }

        trace.enter('Retry');
        console.warn(`[Orchestrator] Generated image failed the safety check, regenerating once with the fallback model`);

        trace.enter('Generating');
        const second = await this.deps.imageGenerator.runWithFallbackModel(first.request);
        if (!second.ok) {
            return this.fail(trace, keywords, second);
        }
        trace.enter('Generated');
        return this.publish(trace, keywords, second.image, second.request.model);
    }

    /**
     * Best-effort: a check that errors, times out or is not configured
     * counts as safe.
     */
    private async isSafe(image: GeneratedImage): Promise<boolean> {
        const safetyClient = this.deps.safetyClient;
        if (!safetyClient) {
            return true;
        }

        const check = await isolate(
            'safety check',
            (signal) => safetyClient.checkSafety(image, signal),
            this.safetyCheckTimeoutMs
        );
        if (!check.ok) {
            console.warn('[Orchestrator] Safety check unavailable, accepting image');
            return true;
        }

        console.log(`[Orchestrator] Safety score ${check.value}`);
        return check.value >= this.minNuditySafeScore;
    }

    /**
     * Inline bytes go to the cache and are replaced by a served path; URLs pass through.
     */
    private publish(
        trace: RunTrace,
        keywords: string,
        image: GeneratedImage,
        model: AiModel
    ): OrchestratorRun {
        if (image.kind === 'url') {
            return trace.finish({ url: image.url, source: generatedSource(model), keywords });
        }

        let id: string;
        try {
            id = this.deps.cache.store(image.bytes, image.mediaType);
        } catch (error) {
            console.error(`[Orchestrator] Caching generated image failed: ${errorMessage(error)}`);
            trace.enter('Failed');
            return trace.finish(failedResult(keywords, errorMessage(error), this.errorPlaceholderUrl));
        }

        return trace.finish({
            url: `${this.publicBaseUrl}/generated/${id}`,
            source: generatedSource(model),
            keywords,
        });
    }

    private fail(
        trace: RunTrace,
        keywords: string,
        outcome: Extract<GenerationOutcome, { ok: false }>
    ): OrchestratorRun {
        console.error(`[Orchestrator] Generation with ${outcome.model} failed: ${outcome.reason}`);
        trace.enter('Failed');
        return trace.finish(failedResult(keywords, outcome.reason, this.errorPlaceholderUrl));
    }

    private generationParams(slide: SlideInput): GenerationParams {
        const selector = parseAiModelSelector(slide.aiModel);
        if (selector === undefined) {
            console.warn(`[Orchestrator] Unknown AI model "${slide.aiModel ?? ''}", using the default`);
        }
        return {
            selector: selector ?? 'auto',
            style: slide.style,
            colors: slide.colors,
            slideText: slideText(slide),
        };
    }
}
