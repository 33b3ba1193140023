import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config, fluxPollOptions, getModelRouting } from '../config';
import { ImageOrchestrator } from '../application/ImageOrchestrator';
import { IStockSearchClient } from '../domain/ports/IStockSearchClient';
import { IImageGenerationBackend } from '../domain/ports/IImageGenerationBackend';

// Infrastructure imports
import { GeneratedImageCache } from '../infrastructure/cache/GeneratedImageCache';
import { OpenRouterLlmClient } from '../infrastructure/llm/OpenRouterLlmClient';
import { KeywordExtractor } from '../infrastructure/llm/KeywordExtractor';
import { UnsplashSearchClient } from '../infrastructure/images/UnsplashSearchClient';
import { PexelsSearchClient } from '../infrastructure/images/PexelsSearchClient';
import { StockImageSearcher } from '../infrastructure/images/StockImageSearcher';
import { FluxImageBackend } from '../infrastructure/images/FluxImageBackend';
import { GeminiImageBackend } from '../infrastructure/images/GeminiImageBackend';
import { ImagenImageBackend } from '../infrastructure/images/ImagenImageBackend';
import { ImageGenerator } from '../infrastructure/images/ImageGenerator';
import { SightengineClient } from '../infrastructure/scoring/SightengineClient';
import { PresentationFitClient } from '../infrastructure/scoring/PresentationFitClient';
import { ImageScorer } from '../infrastructure/scoring/ImageScorer';
import { IImageAnalysisClient, ImageAnalysis } from '../domain/ports/IImageAnalysisClient';
import { ProviderError, SafetyCheckUnavailable } from '../domain/errors/PipelineErrors';

// Route imports
import { createImageRoutes } from './routes/imageRoutes';
import { createGeneratedImageRoutes } from './routes/generatedRoutes';
import { errorHandler } from './middleware/errorHandler';

export const SERVICE_NAME = 'slide-image-selector';
export const SERVICE_VERSION = '1.0.0';

export interface AppDependencies {
    orchestrator: Pick<ImageOrchestrator, 'processSlide'>;
    keywordExtractor: Pick<KeywordExtractor, 'extract'>;
    cache: GeneratedImageCache;
}

/**
 * Stands in for SightEngine when no credentials are configured: stock
 * candidates cannot be scored and the safety check reports itself unavailable.
 */
class UnconfiguredAnalysisClient implements IImageAnalysisClient {
    async analyze(): Promise<ImageAnalysis> {
        throw new ProviderError('sightengine', 'not configured');
    }

    async checkSafety(): Promise<number> {
        throw new SafetyCheckUnavailable('SightEngine is not configured');
    }
}

/**
 * Creates and configures the Express application.
 */
export function createApp(config: Config, deps: AppDependencies = createDependencies(config)): Application {
    const app = express();

    // Middleware
    app.use(cors());
    app.use(express.json({ limit: '1mb' }));

    // Liveness
    app.get('/', (req: Request, res: Response) => {
        res.json({
            service: SERVICE_NAME,
            status: 'running',
            version: SERVICE_VERSION,
        });
    });

    // Health check
    app.get('/health', (req: Request, res: Response) => {
        res.json({
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: SERVICE_VERSION,
        });
    });

    // Routes
    app.use(createImageRoutes(deps.orchestrator, deps.keywordExtractor));
    app.use(createGeneratedImageRoutes(deps.cache));

    // Error handler (must be last)
    app.use(errorHandler);

    return app;
}

/**
 * Creates all dependencies with proper wiring.
 */
export function createDependencies(config: Config): AppDependencies {
    const routing = getModelRouting(config);

    const llmClient = new OpenRouterLlmClient(
        config.openrouterApiKey,
        config.keywordModel,
        config.openrouterBaseUrl,
        { referer: config.openrouterReferer, title: config.openrouterTitle }
    );

    const keywordExtractor = new KeywordExtractor(llmClient, {
        model: config.keywordModel,
        timeoutMs: config.timeouts.extractionMs,
    });

    // Stock providers in priority order; a provider without credentials is skipped
    const stockClients: IStockSearchClient[] = [];
    if (config.unsplashAccessKey) {
        stockClients.push(new UnsplashSearchClient(config.unsplashAccessKey));
    } else {
        console.warn('[Setup] UNSPLASH_ACCESS_KEY not set, Unsplash search disabled');
    }
    if (config.pexelsApiKey) {
        stockClients.push(new PexelsSearchClient(config.pexelsApiKey));
    } else {
        console.warn('[Setup] PEXELS_API_KEY not set, Pexels search disabled');
    }

    const imageSearcher = new StockImageSearcher(stockClients, {
        perProvider: config.stockResultsPerProvider,
        providerTimeoutMs: config.timeouts.searchProviderMs,
        deadlineMs: config.timeouts.searchDeadlineMs,
    });

    const analysisClient: IImageAnalysisClient = config.sightengineApiUser && config.sightengineApiSecret
        ? new SightengineClient(config.sightengineApiUser, config.sightengineApiSecret)
        : new UnconfiguredAnalysisClient();

    const imageScorer = new ImageScorer(analysisClient, {
        thresholds: {
            minQualityScore: config.minQualityScore,
            minNuditySafeScore: config.minNuditySafeScore,
            minPresentationScore: config.minPresentationScore,
        },
        fitClient: config.scoringServiceUrl ? new PresentationFitClient(config.scoringServiceUrl) : undefined,
        concurrency: config.scoringConcurrency,
        scoringTimeoutMs: config.timeouts.scoringMs,
        fitTimeoutMs: config.timeouts.fitScoringMs,
        providerOrder: imageSearcher.providerOrder,
    });

    const backends: IImageGenerationBackend[] = [
        new GeminiImageBackend(config.openrouterApiKey, config.geminiImageModel, config.openrouterBaseUrl),
        new ImagenImageBackend(config.openrouterApiKey, config.imagenModel, config.openrouterBaseUrl),
    ];
    if (config.fluxApiKey) {
        backends.push(new FluxImageBackend(config.fluxApiKey, config.fluxBaseUrl, config.fluxModel, fluxPollOptions(config)));
    } else {
        console.warn('[Setup] FLUX_API_KEY not set, flux requests will fail');
    }

    const imageGenerator = new ImageGenerator(llmClient, backends, {
        routing,
        promptModel: config.promptModel,
        promptTimeoutMs: config.timeouts.promptMs,
        generationTimeoutMs: config.timeouts.generationMs,
    });

    const cache = new GeneratedImageCache({
        maxEntries: config.generatedCacheMaxEntries,
        ttlSeconds: config.generatedCacheTtlSeconds,
    });

    const orchestrator = new ImageOrchestrator(
        {
            keywordExtractor,
            imageSearcher,
            imageScorer,
            imageGenerator,
            cache,
            safetyClient: analysisClient,
        },
        {
            minNuditySafeScore: config.minNuditySafeScore,
            publicBaseUrl: config.publicBaseUrl,
            errorPlaceholderUrl: config.errorPlaceholderUrl,
            safetyCheckTimeoutMs: config.timeouts.safetyCheckMs,
        }
    );

    return { orchestrator, keywordExtractor, cache };
}
