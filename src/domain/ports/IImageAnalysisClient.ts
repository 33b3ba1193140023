import { GeneratedImage } from '../entities/GenerationRequest';

/**
 * Quality and safety of one image, both in 0..1.
 */
export interface ImageAnalysis {
    quality: number;
    safety: number;
}

/**
 * IImageAnalysisClient - Port for the external quality/nudity scorer.
 * Implementations: SightengineClient
 */
export interface IImageAnalysisClient {
    /**
     * Scores quality and safety of a hosted image in one call.
     * Throws ProviderError when the image cannot be scored.
     */
    analyze(imageUrl: string, signal?: AbortSignal): Promise<ImageAnalysis>;

    /**
     * Safety score of a generated image (hosted or inline).
     * Throws SafetyCheckUnavailable on errors or exhausted quota.
     */
    checkSafety(image: GeneratedImage, signal?: AbortSignal): Promise<number>;
}
