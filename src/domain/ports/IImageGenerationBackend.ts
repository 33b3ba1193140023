import { AiModel } from '../entities/AiModel';
import { GeneratedImage, GenerationRequest } from '../entities/GenerationRequest';

/**
 * IImageGenerationBackend - Port for one AI image-generation backend.
 * Implementations: FluxImageBackend, GeminiImageBackend, ImagenImageBackend
 */
export interface IImageGenerationBackend {
    readonly model: AiModel;

    /**
     * Generates one image. Throws on any failure; callers convert throws into
     * GenerationFailure outcomes.
     */
    generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedImage>;
}
