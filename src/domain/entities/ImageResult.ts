import { AiModel } from './AiModel';
import { StockProvider } from './StockCandidate';

/**
 * Closed set of result sources.
 * `none` means no candidate existed; `failed` means generation errored.
 */
export type ImageSource =
    | `stock_${StockProvider}`
    | `generated_${AiModel}`
    | 'none'
    | 'failed';

/**
 * Terminal artifact of one orchestrator run. Exactly one per request.
 */
export interface ImageResult {
    url: string | null;
    source: ImageSource;
    /** Resolved keyword string the pipeline searched/generated with */
    keywords: string;
    error?: string;
}

export function stockSource(provider: StockProvider): ImageSource {
    return `stock_${provider}`;
}

export function generatedSource(model: AiModel): ImageSource {
    return `generated_${model}`;
}

export function noneResult(keywords: string): ImageResult {
    return { url: null, source: 'none', keywords };
}

export function failedResult(keywords: string, error: string, placeholderUrl: string | null = null): ImageResult {
    return { url: placeholderUrl, source: 'failed', keywords, error };
}
