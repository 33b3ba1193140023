import { AiModel, AiModelSelector, ModelRoutingTable, resolveModel } from '../../domain/entities/AiModel';
import { ExtractedIntent, uniqueTerms } from '../../domain/entities/ExtractedIntent';
import {
    DEFAULT_IMAGE_SIZE,
    DEFAULT_NEGATIVE_TERMS,
    GenerationOutcome,
    GenerationRequest,
} from '../../domain/entities/GenerationRequest';
import { ColorHints, SlideStyle } from '../../domain/entities/SlideInput';
import { ILlmClient } from '../../domain/ports/ILlmClient';
import { IImageGenerationBackend } from '../../domain/ports/IImageGenerationBackend';
import {
    CONTENT_PROMPTS,
    CONTENT_PROMPT_INPUT,
    NO_TEXT_INSTRUCTION,
    STYLE_BLOCKS,
    fillTemplate,
} from '../llm/Prompts';
import { isolate } from '../resilience/IsolatedCall';

/**
 * Per-request generation parameters taken from the slide.
 */
export interface GenerationParams {
    selector: AiModelSelector;
    style?: SlideStyle;
    colors?: ColorHints;
    /** Slide title and bullets, used as context for the content prompt */
    slideText?: string;
}

export type PromptOutcome =
    | { ok: true; request: GenerationRequest }
    | { ok: false; reason: string; model: AiModel };

export interface ImageGeneratorOptions {
    routing: ModelRoutingTable;
    /** LLM model used to write the content prompt */
    promptModel?: string;
    promptTimeoutMs?: number;
    generationTimeoutMs?: number;
    width?: number;
    height?: number;
}

/**
 * Builds generation prompts and drives the configured backends.
 *
 * Never throws: prompt-building and backend failures come back as
 * `{ ok: false }` outcomes and the caller decides what to do with them.
 */
export class ImageGenerator {
    private readonly backends: ReadonlyMap<AiModel, IImageGenerationBackend>;
    private readonly routing: ModelRoutingTable;
    private readonly promptModel?: string;
    private readonly promptTimeoutMs: number;
    private readonly generationTimeoutMs: number;
    private readonly width: number;
    private readonly height: number;

    constructor(
        private readonly llmClient: ILlmClient,
        backends: readonly IImageGenerationBackend[],
        options: ImageGeneratorOptions
    ) {
        this.backends = new Map(backends.map((backend) => [backend.model, backend]));
        this.routing = options.routing;
        this.promptModel = options.promptModel;
        this.promptTimeoutMs = options.promptTimeoutMs ?? 30000;
        this.generationTimeoutMs = options.generationTimeoutMs ?? 180000;
        this.width = options.width ?? DEFAULT_IMAGE_SIZE.width;
        this.height = options.height ?? DEFAULT_IMAGE_SIZE.height;
    }

    /** Model used for the regeneration after a failed safety check */
    get safeFallbackModel(): AiModel {
        return this.routing.safeFallbackModel;
    }

    resolveModel(params: GenerationParams): AiModel {
        return resolveModel(params.selector, params.style, this.routing);
    }

    /**
     * Routes, builds the prompt and runs the backend.
     */
    async generate(intent: ExtractedIntent, params: GenerationParams): Promise<GenerationOutcome> {
        const built = await this.buildRequest(intent, params);
        if (!built.ok) {
            return built;
        }
        return this.run(built.request);
    }

    /**
     * One LLM call for the content description, then composition of the final
     * prompt: content, style block, colour sentence, no-text instruction.
     */
    async buildRequest(intent: ExtractedIntent, params: GenerationParams): Promise<PromptOutcome> {
        const model = this.resolveModel(params);
        const style = params.style ?? 'photorealistic';

        const content = await isolate(
            'content prompt',
            (signal) => this.llmClient.chatCompletion(
                fillTemplate(CONTENT_PROMPT_INPUT, {
                    topic: intent.topics[0] ?? intent.searchQuery,
                    keywords: intent.keywords.join(', '),
                    text: params.slideText ?? '',
                }),
                CONTENT_PROMPTS[style],
                { model: this.promptModel, temperature: 0.7, signal }
            ),
            this.promptTimeoutMs
        );

        if (!content.ok) {
            return { ok: false, reason: `Prompt building failed: ${content.error.message}`, model };
        }
        const description = content.value.trim();
        if (description.length === 0) {
            return { ok: false, reason: 'Prompt building returned an empty description', model };
        }

        const prompt = [
            description,
            this.styleBlock(style, intent.styleTags),
            colorSentence(params.colors),
            NO_TEXT_INSTRUCTION,
        ].filter((part) => part.length > 0).join(' ');

        const negativePrompt = uniqueTerms([...intent.negativeKeywords, ...DEFAULT_NEGATIVE_TERMS]).join(', ');

        console.log(`[ImageGenerator] Prompt for ${model}: ${prompt}`);

        return {
            ok: true,
            request: {
                model,
                prompt,
                negativePrompt,
                colors: params.colors,
                style: params.style,
                width: this.width,
                height: this.height,
            },
        };
    }

    /**
     * Runs one backend call within the generation timeout.
     */
    async run(request: GenerationRequest): Promise<GenerationOutcome> {
        const backend = this.backends.get(request.model);
        if (!backend) {
            return { ok: false, reason: `No backend configured for model ${request.model}`, model: request.model };
        }

        const result = await isolate(
            `${request.model} generation`,
            (signal) => backend.generate(request, signal),
            this.generationTimeoutMs
        );
        if (!result.ok) {
            return { ok: false, reason: result.error.message, model: request.model };
        }
        return { ok: true, image: result.value, request };
    }

    /**
     * Same prompt, safe fallback model.
     */
    async runWithFallbackModel(request: GenerationRequest): Promise<GenerationOutcome> {
        return this.run({ ...request, model: this.routing.safeFallbackModel });
    }

    private styleBlock(style: SlideStyle, styleTags: readonly string[]): string {
        // Free-form style tags would contradict the fixed illustration looks.
        if (style === 'photorealistic' && styleTags.length > 0) {
            return `${STYLE_BLOCKS[style]} Mood: ${styleTags.join(', ')}.`;
        }
        return STYLE_BLOCKS[style];
    }
}

function colorSentence(colors: ColorHints | undefined): string {
    const parts: string[] = [];
    if (colors?.primary) parts.push(`primary color ${colors.primary}`);
    if (colors?.secondary) parts.push(`secondary color ${colors.secondary}`);
    return parts.length > 0 ? `Color palette: ${parts.join(' and ')}.` : '';
}
