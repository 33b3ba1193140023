import { SlideStyle, isIllustrationStyle } from './SlideInput';

/**
 * AI image-generation backends the service can drive.
 * - flux: submit/poll backend, primary
 * - gemini: synchronous, illustration-capable
 * - imagen: synchronous, returns hosted URLs
 */
export type AiModel = 'flux' | 'gemini' | 'imagen';

export const AI_MODELS: readonly AiModel[] = ['flux', 'gemini', 'imagen'];

/** Selector accepted from callers */
export type AiModelSelector = AiModel | 'auto';

export interface ModelRoutingTable {
    /** Backend used for 'auto' */
    defaultModel: AiModel;
    /** Backend forced for illustration styles */
    illustrationModel: AiModel;
    /** Backend used for the single regeneration after a failed safety check */
    safeFallbackModel: AiModel;
}

export function isAiModel(value: unknown): value is AiModel {
    return typeof value === 'string' && (AI_MODELS as readonly string[]).includes(value);
}

/**
 * Parses a caller-supplied selector. Empty or missing means 'auto';
 * unknown identifiers return undefined.
 */
export function parseAiModelSelector(value: string | undefined): AiModelSelector | undefined {
    if (value === undefined) return 'auto';
    const normalized = value.trim().toLowerCase();
    if (normalized === '' || normalized === 'auto' || normalized === 'default') return 'auto';
    return isAiModel(normalized) ? normalized : undefined;
}

/**
 * Pure routing: illustration styles win over any requested model, 'auto' goes
 * to the primary backend, explicit identifiers go to their own backend.
 */
export function resolveModel(
    selector: AiModelSelector,
    style: SlideStyle | undefined,
    routing: ModelRoutingTable
): AiModel {
    if (isIllustrationStyle(style)) {
        return routing.illustrationModel;
    }
    switch (selector) {
        case 'auto':
            return routing.defaultModel;
        case 'flux':
        case 'gemini':
        case 'imagen':
            return selector;
    }
}
