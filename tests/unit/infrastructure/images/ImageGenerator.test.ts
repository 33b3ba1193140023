import { ImageGenerator } from '../../../../src/infrastructure/images/ImageGenerator';
import { ExtractedIntent } from '../../../../src/domain/entities/ExtractedIntent';
import { AiModel, ModelRoutingTable } from '../../../../src/domain/entities/AiModel';
import { GeneratedImage, GenerationRequest } from '../../../../src/domain/entities/GenerationRequest';
import { ChatCompletionOptions, ILlmClient } from '../../../../src/domain/ports/ILlmClient';
import { IImageGenerationBackend } from '../../../../src/domain/ports/IImageGenerationBackend';

type FakeLlm = ILlmClient & {
    chatCompletion: jest.Mock<Promise<string>, [string, string, ChatCompletionOptions | undefined]>;
};
type FakeBackend = IImageGenerationBackend & {
    generate: jest.Mock<Promise<GeneratedImage>, [GenerationRequest, AbortSignal | undefined]>;
};

describe('ImageGenerator', () => {
    const routing: ModelRoutingTable = {
        defaultModel: 'flux',
        illustrationModel: 'gemini',
        safeFallbackModel: 'gemini',
    };

    const intent: ExtractedIntent = {
        skip: false,
        keywords: ['teamwork', 'office'],
        topics: ['Zusammenarbeit'],
        styleTags: ['warm', 'bright'],
        negativeKeywords: ['Text', 'crowds'],
        constraints: {},
        searchQuery: 'teamwork office',
    };

    const urlImage: GeneratedImage = { kind: 'url', url: 'https://cdn.test/out.png' };

    let llm: FakeLlm;
    let flux: FakeBackend;
    let gemini: FakeBackend;

    const fakeBackend = (model: AiModel): FakeBackend => ({
        model,
        generate: jest.fn<Promise<GeneratedImage>, [GenerationRequest, AbortSignal | undefined]>()
            .mockResolvedValue(urlImage),
    });

    const createGenerator = (backends: IImageGenerationBackend[] = [flux, gemini]) =>
        new ImageGenerator(llm, backends, { routing, promptModel: 'test/prompt-model', width: 1024, height: 768 });

    beforeEach(() => {
        llm = {
            chatCompletion: jest.fn<Promise<string>, [string, string, ChatCompletionOptions | undefined]>()
                .mockResolvedValue('  Two colleagues sketching ideas on a whiteboard.  '),
        };
        flux = fakeBackend('flux');
        gemini = fakeBackend('gemini');
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('buildRequest', () => {
        it('composes content, style, colours and the no-text instruction', async () => {
            const outcome = await createGenerator().buildRequest(intent, {
                selector: 'auto',
                colors: { primary: '#003366', secondary: 'orange' },
                slideText: 'Working together',
            });

            expect(outcome).toEqual({
                ok: true,
                request: {
                    model: 'flux',
                    prompt: 'Two colleagues sketching ideas on a whiteboard. '
                        + 'Style: photorealistic, natural lighting, professional stock photography, clean composition. Mood: warm, bright. '
                        + 'Color palette: primary color #003366 and secondary color orange. '
                        + 'No text in the image.',
                    negativePrompt: 'Text, crowds, watermark, logo',
                    colors: { primary: '#003366', secondary: 'orange' },
                    style: undefined,
                    width: 1024,
                    height: 768,
                },
            });
        });

        it('sends topic, keywords and slide text to the prompt model', async () => {
            await createGenerator().buildRequest(intent, { selector: 'auto', slideText: 'Working together' });

            const [prompt, , options] = llm.chatCompletion.mock.calls[0];
            expect(prompt).toBe('Topic: Zusammenarbeit\nKeywords: teamwork, office\nSlide text: Working together');
            expect(options).toMatchObject({ model: 'test/prompt-model', temperature: 0.7 });
        });

        it('drops style tags and routes to the illustration model for illustration styles', async () => {
            const outcome = await createGenerator().buildRequest(intent, { selector: 'flux', style: 'fine_line' });

            expect(outcome.ok).toBe(true);
            if (outcome.ok) {
                expect(outcome.request.model).toBe('gemini');
                expect(outcome.request.prompt).toBe(
                    'Two colleagues sketching ideas on a whiteboard. '
                    + 'Style: minimalist fine line drawing, thin uniform strokes, mostly monochrome, plain white background. '
                    + 'No text in the image.'
                );
            }
        });

        it('fails when the prompt model errors', async () => {
            llm.chatCompletion.mockRejectedValue(new Error('rate limited'));

            const outcome = await createGenerator().buildRequest(intent, { selector: 'imagen' });

            expect(outcome).toEqual({ ok: false, reason: 'Prompt building failed: rate limited', model: 'imagen' });
        });

        it('fails on an empty description', async () => {
            llm.chatCompletion.mockResolvedValue('   ');

            const outcome = await createGenerator().buildRequest(intent, { selector: 'auto' });

            expect(outcome).toEqual({ ok: false, reason: 'Prompt building returned an empty description', model: 'flux' });
        });
    });

    describe('generate', () => {
        it('runs the routed backend with the built request', async () => {
            const outcome = await createGenerator().generate(intent, { selector: 'auto' });

            expect(outcome.ok).toBe(true);
            if (outcome.ok) {
                expect(outcome.image).toEqual(urlImage);
                expect(outcome.request.model).toBe('flux');
            }
            expect(flux.generate).toHaveBeenCalledTimes(1);
            expect(gemini.generate).not.toHaveBeenCalled();
        });

        it('does not call any backend when prompt building fails', async () => {
            llm.chatCompletion.mockRejectedValue(new Error('down'));

            const outcome = await createGenerator().generate(intent, { selector: 'auto' });

            expect(outcome.ok).toBe(false);
            expect(flux.generate).not.toHaveBeenCalled();
        });

        it('reports a backend failure as an outcome', async () => {
            flux.generate.mockRejectedValue(new Error('Flux generation failed: Content Moderated'));

            const outcome = await createGenerator().generate(intent, { selector: 'auto' });

            expect(outcome).toEqual({ ok: false, reason: 'Flux generation failed: Content Moderated', model: 'flux' });
        });

        it('reports a missing backend', async () => {
            const outcome = await createGenerator([gemini]).generate(intent, { selector: 'auto' });

            expect(outcome).toEqual({ ok: false, reason: 'No backend configured for model flux', model: 'flux' });
        });
    });

    describe('runWithFallbackModel', () => {
        it('reuses the request with the safe fallback model', async () => {
            const request: GenerationRequest = {
                model: 'flux',
                prompt: 'A prompt',
                negativePrompt: 'text',
                width: 1024,
                height: 768,
            };

            const outcome = await createGenerator().runWithFallbackModel(request);

            expect(outcome.ok).toBe(true);
            expect(gemini.generate).toHaveBeenCalledTimes(1);
            expect(gemini.generate.mock.calls[0][0]).toEqual({ ...request, model: 'gemini' });
            expect(flux.generate).not.toHaveBeenCalled();
        });

        it('exposes the safe fallback model', () => {
            expect(createGenerator().safeFallbackModel).toBe('gemini');
        });
    });
});
