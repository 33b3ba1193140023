import express from 'express';
import request from 'supertest';
import { createImageRoutes } from '../../../../src/presentation/routes/imageRoutes';
import { errorHandler } from '../../../../src/presentation/middleware/errorHandler';
import { SlideInput } from '../../../../src/domain/entities/SlideInput';
import { ImageResult } from '../../../../src/domain/entities/ImageResult';
import { ExtractedIntent, createIntentFromKeywords } from '../../../../src/domain/entities/ExtractedIntent';
import { ExtractionError } from '../../../../src/domain/errors/PipelineErrors';

describe('Image routes', () => {
    let processSlide: jest.Mock<Promise<ImageResult>, [SlideInput]>;
    let extract: jest.Mock<Promise<ExtractedIntent>, [SlideInput]>;

    const createTestApp = () => {
        const app = express();
        app.use(express.json());
        app.use(createImageRoutes({ processSlide }, { extract }));
        app.use(errorHandler);
        return app;
    };

    beforeEach(() => {
        processSlide = jest.fn<Promise<ImageResult>, [SlideInput]>().mockResolvedValue({
            url: 'https://unsplash.test/u1.jpg',
            source: 'stock_unsplash',
            keywords: 'teamwork office',
        });
        extract = jest.fn<Promise<ExtractedIntent>, [SlideInput]>()
            .mockResolvedValue(createIntentFromKeywords(['teamwork', 'office']));
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('POST /generate-image', () => {
        it('returns the orchestrator result', async () => {
            const response = await request(createTestApp())
                .post('/generate-image')
                .send({
                    title: 'Working together',
                    bullets: ['Shared goals', { bullet: 'Rituals', sub: ['Weekly sync'] }],
                    style: 'photorealistic',
                    image_mode: 'auto',
                    ai_model: 'flux',
                    colors: { primary: '#003366' },
                });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                url: 'https://unsplash.test/u1.jpg',
                source: 'stock_unsplash',
                keywords: 'teamwork office',
            });
            expect(processSlide).toHaveBeenCalledWith({
                title: 'Working together',
                bullets: ['Shared goals', 'Rituals', 'Weekly sync'],
                style: 'photorealistic',
                imageMode: 'auto',
                aiModel: 'flux',
                colors: { primary: '#003366', secondary: undefined },
            });
        });

        it('returns degraded results with status 200', async () => {
            processSlide.mockResolvedValue({ url: null, source: 'failed', keywords: 'x', error: 'boom' });

            const response = await request(createTestApp())
                .post('/generate-image')
                .send({ title: 'Anything' });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({ url: null, source: 'failed', keywords: 'x', error: 'boom' });
        });

        it('rejects an invalid style with 400', async () => {
            const response = await request(createTestApp())
                .post('/generate-image')
                .send({ title: 'Anything', style: 'watercolor' });

            expect(response.status).toBe(400);
            expect(response.body).toEqual({
                error: {
                    message: 'style must be one of: photorealistic, flat_illustration, fine_line',
                    code: 'BadRequestError',
                },
            });
            expect(processSlide).not.toHaveBeenCalled();
        });

        it('rejects malformed JSON with 400', async () => {
            const response = await request(createTestApp())
                .post('/generate-image')
                .set('Content-Type', 'application/json')
                .send('{"title": ');

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe('Malformed JSON body');
        });

        it('maps extraction failures to 502', async () => {
            processSlide.mockRejectedValue(new ExtractionError('Keyword extraction failed: (500) upstream'));

            const response = await request(createTestApp())
                .post('/generate-image')
                .send({ title: 'Anything' });

            expect(response.status).toBe(502);
            expect(response.body.error.code).toBe('UpstreamError');
        });
    });

    describe('GET /generate-image-simple', () => {
        it('reads the slide from the query', async () => {
            const response = await request(createTestApp())
                .get('/generate-image-simple')
                .query({ title: 'Growth', bullets: 'Revenue, Reach', image_mode: 'stock_only', primary_color: 'green' });

            expect(response.status).toBe(200);
            expect(processSlide).toHaveBeenCalledWith({
                title: 'Growth',
                bullets: ['Revenue', 'Reach'],
                style: undefined,
                imageMode: 'stock_only',
                aiModel: undefined,
                colors: { primary: 'green', secondary: undefined },
            });
        });

        it('requires a title or keywords', async () => {
            const response = await request(createTestApp()).get('/generate-image-simple');

            expect(response.status).toBe(400);
            expect(response.body.error.message).toBe('title is required when no keywords are given');
        });
    });

    describe('POST /extract-keywords', () => {
        it('returns the detailed intent and the refined query', async () => {
            const response = await request(createTestApp())
                .post('/extract-keywords')
                .send({ title: '', keywords: ['teamwork', 'office'] });

            expect(response.status).toBe(200);
            expect(response.body).toEqual({
                detailed: {
                    skip: false,
                    keywords: ['teamwork', 'office'],
                    topics: [],
                    styleTags: [],
                    negativeKeywords: [],
                    constraints: {},
                    searchQuery: 'teamwork, office',
                },
                refined: 'teamwork, office',
            });
            expect(processSlide).not.toHaveBeenCalled();
        });
    });
});
