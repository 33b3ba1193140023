/**
 * Error taxonomy of the image-selection pipeline.
 *
 * Only ExtractionError and CacheMiss ever reach the HTTP boundary. The others
 * are absorbed inside the pipeline and degrade the result instead.
 */

/**
 * Transport or parse failure of the keyword-extraction LLM call.
 */
export class ExtractionError extends Error {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
        this.name = 'ExtractionError';
    }
}

/**
 * Stock search or scoring failure of a single provider or candidate.
 */
export class ProviderError extends Error {
    constructor(public readonly provider: string, message: string, public readonly status?: number) {
        super(`${provider}: ${message}`);
        this.name = 'ProviderError';
    }
}

/**
 * Prompt building or backend failure while generating an image.
 */
export class GenerationFailure extends Error {
    constructor(message: string, public readonly model?: string) {
        super(message);
        this.name = 'GenerationFailure';
    }
}

/**
 * Safety check errored or reported quota exhaustion.
 */
export class SafetyCheckUnavailable extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SafetyCheckUnavailable';
    }
}

/**
 * Unknown or expired id on cache retrieval.
 */
export class CacheMiss extends Error {
    constructor(public readonly id: string) {
        super(`Generated image not found: ${id}`);
        this.name = 'CacheMiss';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
