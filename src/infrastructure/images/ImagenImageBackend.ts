import axios from 'axios';
import { GeneratedImage, GenerationRequest, toGeneratedImage } from '../../domain/entities/GenerationRequest';
import { GenerationFailure } from '../../domain/errors/PipelineErrors';
import { IImageGenerationBackend } from '../../domain/ports/IImageGenerationBackend';
import { describeHttpError } from '../resilience/HttpErrors';

interface ImagesResponse {
    data?: Array<{ url?: string; b64_json?: string }>;
}

/**
 * Google Imagen through OpenRouter's images endpoint.
 */
export class ImagenImageBackend implements IImageGenerationBackend {
    readonly model = 'imagen' as const;
    private readonly apiKey: string;
    private readonly modelId: string;
    private readonly baseUrl: string;

    constructor(
        apiKey: string,
        modelId: string = 'google/imagen-3.0-generate-001',
        baseUrl: string = 'https://openrouter.ai/api/v1'
    ) {
        if (!apiKey) {
            throw new Error('OpenRouter API key is required');
        }
        this.apiKey = apiKey;
        this.modelId = modelId;
        this.baseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
    }

    async generate(request: GenerationRequest, signal?: AbortSignal): Promise<GeneratedImage> {
        console.log(`[Imagen] Generating image with ${this.modelId}...`);

        let data: ImagesResponse;
        try {
            const response = await axios.post<ImagesResponse>(
                `${this.baseUrl}/images/generations`,
                {
                    model: this.modelId,
                    prompt: request.prompt,
                    ...(request.negativePrompt ? { negative_prompt: request.negativePrompt } : {}),
                    n: 1,
                    size: `${request.width}x${request.height}`,
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    signal,
                }
            );
            data = response.data;
        } catch (error) {
            throw new GenerationFailure(`Imagen generation failed ${describeHttpError(error).message}`, this.model);
        }

        const image = data?.data?.[0];
        if (image?.url) {
            return { kind: 'url', url: image.url };
        }
        if (image?.b64_json) {
            return toGeneratedImage(image.b64_json);
        }
        throw new GenerationFailure('Imagen response contained no image', this.model);
    }
}
