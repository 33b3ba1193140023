import dotenv from 'dotenv';
import { AI_MODELS, AiModel, ModelRoutingTable, isAiModel } from '../domain/entities/AiModel';
import { FluxPollOptions, pollScheduleMs } from '../infrastructure/images/FluxImageBackend';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    publicBaseUrl: string;

    // OpenRouter (LLM, Gemini and Imagen backends)
    openrouterApiKey: string;
    openrouterBaseUrl: string;
    openrouterReferer?: string;
    openrouterTitle?: string;
    keywordModel: string;
    promptModel: string;

    // Stock providers (empty = provider disabled)
    unsplashAccessKey: string;
    pexelsApiKey: string;
    stockResultsPerProvider: number;

    // SightEngine
    sightengineApiUser: string;
    sightengineApiSecret: string;

    // Presentation-fit scorer (unset = fit scoring off)
    scoringServiceUrl?: string;
    scoringConcurrency: number;

    // Generation backends
    fluxApiKey: string;
    fluxBaseUrl: string;
    fluxModel: string;
    geminiImageModel: string;
    imagenModel: string;
    fluxPollInitialDelayMs: number;
    fluxPollIntervalMs: number;
    fluxMaxPollAttempts: number;
    fluxMaxPollIntervalMs: number;

    // Model routing (validated against the known backends)
    defaultAiModel: string;
    illustrationAiModel: string;
    safeFallbackAiModel: string;

    // Suitability thresholds, 0..1
    minPresentationScore: number;
    minQualityScore: number;
    minNuditySafeScore: number;

    errorPlaceholderUrl: string | null;

    // Generated image cache
    generatedCacheMaxEntries: number;
    generatedCacheTtlSeconds: number;

    // Per-call timeouts
    timeouts: {
        extractionMs: number;
        searchProviderMs: number;
        searchDeadlineMs: number;
        scoringMs: number;
        fitScoringMs: number;
        promptMs: number;
        generationMs: number;
        safetyCheckMs: number;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getOptionalEnvVar(key: string): string | undefined {
    const value = getEnvVar(key, '');
    return value.length > 0 ? value : undefined;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    const port = getEnvVarNumber('PORT', 8080);

    return {
        // Server
        port,
        environment: getEnvVar('NODE_ENV', 'development'),
        publicBaseUrl: getEnvVar('PUBLIC_BASE_URL', `http://localhost:${port}`),

        // OpenRouter
        openrouterApiKey: getEnvVar('OPENROUTER_API_KEY', ''),
        openrouterBaseUrl: getEnvVar('OPENROUTER_BASE_URL', 'https://openrouter.ai/api/v1'),
        openrouterReferer: getOptionalEnvVar('OPENROUTER_REFERER'),
        openrouterTitle: getOptionalEnvVar('OPENROUTER_TITLE'),
        keywordModel: getEnvVar('KEYWORD_MODEL', 'google/gemini-2.0-flash-001'),
        promptModel: getEnvVar('PROMPT_MODEL', 'anthropic/claude-3.5-haiku'),

        // Stock providers
        unsplashAccessKey: getEnvVar('UNSPLASH_ACCESS_KEY', ''),
        pexelsApiKey: getEnvVar('PEXELS_API_KEY', ''),
        stockResultsPerProvider: getEnvVarNumber('STOCK_RESULTS_PER_PROVIDER', 10),

        // SightEngine
        sightengineApiUser: getEnvVar('SIGHTENGINE_API_USER', ''),
        sightengineApiSecret: getEnvVar('SIGHTENGINE_API_SECRET', ''),

        // Presentation-fit scorer
        scoringServiceUrl: getOptionalEnvVar('SCORING_SERVICE_URL'),
        scoringConcurrency: getEnvVarNumber('SCORING_CONCURRENCY', 4),

        // Generation backends
        fluxApiKey: getEnvVar('FLUX_API_KEY', ''),
        fluxBaseUrl: getEnvVar('FLUX_BASE_URL', 'https://api.bfl.ai/v1'),
        fluxModel: getEnvVar('FLUX_MODEL', 'flux-2-pro'),
        geminiImageModel: getEnvVar('GEMINI_IMAGE_MODEL', 'google/gemini-3-pro-image-preview'),
        imagenModel: getEnvVar('IMAGEN_MODEL', 'google/imagen-3.0-generate-001'),
        fluxPollInitialDelayMs: getEnvVarNumber('FLUX_POLL_INITIAL_DELAY_MS', 5000),
        fluxPollIntervalMs: getEnvVarNumber('FLUX_POLL_INTERVAL_MS', 2000),
        fluxMaxPollAttempts: getEnvVarNumber('FLUX_MAX_POLL_ATTEMPTS', 15),
        fluxMaxPollIntervalMs: getEnvVarNumber('FLUX_MAX_POLL_INTERVAL_MS', 10000),

        // Model routing
        defaultAiModel: getEnvVar('DEFAULT_AI_MODEL', 'flux').toLowerCase(),
        illustrationAiModel: getEnvVar('ILLUSTRATION_AI_MODEL', 'gemini').toLowerCase(),
        safeFallbackAiModel: getEnvVar('SAFE_FALLBACK_AI_MODEL', 'gemini').toLowerCase(),

        // Thresholds
        minPresentationScore: getEnvVarNumber('MIN_PRESENTATION_SCORE', 0.6),
        minQualityScore: getEnvVarNumber('MIN_QUALITY_SCORE', 0.7),
        minNuditySafeScore: getEnvVarNumber('MIN_NUDITY_SAFE_SCORE', 0.99),

        errorPlaceholderUrl: getOptionalEnvVar('ERROR_PLACEHOLDER_URL') ?? null,

        // Cache
        generatedCacheMaxEntries: getEnvVarNumber('GENERATED_CACHE_MAX_ENTRIES', 200),
        generatedCacheTtlSeconds: getEnvVarNumber('GENERATED_CACHE_TTL_SECONDS', 3600),

        timeouts: {
            extractionMs: getEnvVarNumber('EXTRACTION_TIMEOUT_MS', 30000),
            searchProviderMs: getEnvVarNumber('SEARCH_PROVIDER_TIMEOUT_MS', 10000),
            searchDeadlineMs: getEnvVarNumber('SEARCH_DEADLINE_TIMEOUT_MS', 15000),
            scoringMs: getEnvVarNumber('SCORING_TIMEOUT_MS', 20000),
            fitScoringMs: getEnvVarNumber('FIT_SCORING_TIMEOUT_MS', 30000),
            promptMs: getEnvVarNumber('PROMPT_TIMEOUT_MS', 30000),
            generationMs: getEnvVarNumber('GENERATION_TIMEOUT_MS', 180000),
            safetyCheckMs: getEnvVarNumber('SAFETY_CHECK_TIMEOUT_MS', 20000),
        },
    };
}

/**
 * Validates that required configuration is present.
 * Returns a list of problems; empty means the configuration is usable.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.openrouterApiKey) {
        errors.push('OPENROUTER_API_KEY is required for keyword extraction and prompt building');
    }

    const thresholds: Array<[string, number]> = [
        ['MIN_PRESENTATION_SCORE', config.minPresentationScore],
        ['MIN_QUALITY_SCORE', config.minQualityScore],
        ['MIN_NUDITY_SAFE_SCORE', config.minNuditySafeScore],
    ];
    for (const [key, value] of thresholds) {
        if (value < 0 || value > 1) {
            errors.push(`${key} must be between 0 and 1, got: ${value}`);
        }
    }

    for (const [key, value] of Object.entries(config.timeouts)) {
        if (value <= 0) {
            errors.push(`Timeout ${key} must be positive, got: ${value}`);
        }
    }
    if (config.scoringConcurrency < 1) {
        errors.push(`SCORING_CONCURRENCY must be at least 1, got: ${config.scoringConcurrency}`);
    }
    if (config.stockResultsPerProvider < 1) {
        errors.push(`STOCK_RESULTS_PER_PROVIDER must be at least 1, got: ${config.stockResultsPerProvider}`);
    }

    if (config.fluxApiKey) {
        const schedule = pollScheduleMs(fluxPollOptions(config));
        if (schedule >= config.timeouts.generationMs) {
            errors.push(
                `Flux poll schedule (${schedule}ms) must fit inside GENERATION_TIMEOUT_MS (${config.timeouts.generationMs}ms)`
            );
        }
    }

    const routing: Array<[string, string]> = [
        ['DEFAULT_AI_MODEL', config.defaultAiModel],
        ['ILLUSTRATION_AI_MODEL', config.illustrationAiModel],
        ['SAFE_FALLBACK_AI_MODEL', config.safeFallbackAiModel],
    ];
    for (const [key, value] of routing) {
        if (!isAiModel(value)) {
            errors.push(`${key} must be one of ${AI_MODELS.join(', ')}, got: ${value}`);
        }
    }

    return errors;
}

/**
 * Poll settings of the Flux backend.
 */
export function fluxPollOptions(config: Config): FluxPollOptions {
    return {
        initialDelayMs: config.fluxPollInitialDelayMs,
        intervalMs: config.fluxPollIntervalMs,
        maxAttempts: config.fluxMaxPollAttempts,
        maxIntervalMs: config.fluxMaxPollIntervalMs,
    };
}

function requireAiModel(key: string, value: string): AiModel {
    if (!isAiModel(value)) {
        throw new Error(`${key} must be one of ${AI_MODELS.join(', ')}, got: ${value}`);
    }
    return value;
}

/**
 * Routing table of the configured backends. Throws on unknown identifiers.
 */
export function getModelRouting(config: Config): ModelRoutingTable {
    return {
        defaultModel: requireAiModel('DEFAULT_AI_MODEL', config.defaultAiModel),
        illustrationModel: requireAiModel('ILLUSTRATION_AI_MODEL', config.illustrationAiModel),
        safeFallbackModel: requireAiModel('SAFE_FALLBACK_AI_MODEL', config.safeFallbackAiModel),
    };
}
