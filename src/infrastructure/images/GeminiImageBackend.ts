import axios from 'axios';
import { GeneratedImage, GenerationRequest, toGeneratedImage } from '../../domain/entities/GenerationRequest';
import { GenerationFailure } from '../../domain/errors/PipelineErrors';
import { IImageGenerationBackend } from '../../domain/ports/IImageGenerationBackend';
import { describeHttpError } from '../resilience/HttpErrors';

interface ImageChatResponse {
    choices?: Array<{
        message?: {
            content?: string | null;
            images?: Array<{ image_url?: { url?: string } } | string>;
        };
    }>;
}

/**
 * Gemini image model through OpenRouter chat completions.
 * Image models return the picture in `message.images[]`, usually as a base64 data URL.
 */
export class GeminiImageBackend implements IImageGenerationBackend {
    readonly model = 'gemini' as const;
    private readonly apiKey: string;
    private readonly modelId: string;
    private readonly baseUrl: string;

    constructor(
        apiKey: string,
        modelId: string = 'google/gemini-3-pro-image-preview',
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
        console.log(`[Gemini] Generating image with ${this.modelId}...`);

        let data: ImageChatResponse;
        try {
            const response = await axios.post<ImageChatResponse>(
                `${this.baseUrl}/chat/completions`,
                {
                    model: this.modelId,
                    modalities: ['image', 'text'],
                    messages: [{
                        role: 'user',
                        content: this.buildMessage(request),
                    }],
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
            throw new GenerationFailure(`Gemini image generation failed ${describeHttpError(error).message}`, this.model);
        }

        return toGeneratedImage(this.extractImage(data));
    }

    private buildMessage(request: GenerationRequest): string {
        const lines = [
            `Generate an image: ${request.prompt}`,
            `Aspect ratio: ${request.width}:${request.height}.`,
        ];
        if (request.negativePrompt) {
            lines.push(`Avoid: ${request.negativePrompt}.`);
        }
        return lines.join('\n');
    }

    /**
     * Image from `message.images[]`, else a data URL or http URL found in the text content.
     */
    private extractImage(data: ImageChatResponse): string {
        const message = data?.choices?.[0]?.message;

        const first = message?.images?.[0];
        if (typeof first === 'string' && first.length > 0) {
            return first;
        }
        if (typeof first === 'object' && first.image_url?.url) {
            return first.image_url.url;
        }

        const content = message?.content ?? '';
        const dataUrl = content.match(/data:image\/[^;]+;base64,[A-Za-z0-9+/=]+/);
        if (dataUrl) return dataUrl[0];
        const url = content.match(/https?:\/\/[^\s"')]+/);
        if (url) return url[0];

        throw new GenerationFailure('Gemini response contained no image', this.model);
    }
}
