import nock from 'nock';
import { PresentationFitClient } from '../../../../src/infrastructure/scoring/PresentationFitClient';
import { ProviderError } from '../../../../src/domain/errors/PipelineErrors';

describe('PresentationFitClient', () => {
    const SERVICE = 'https://scoring.test';

    beforeEach(() => {
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should throw if the service URL is missing', () => {
        expect(() => new PresentationFitClient('')).toThrow('Scoring service URL is required');
    });

    it('posts the image and topic and returns the score', async () => {
        nock(SERVICE)
            .post('/score', { image_url: 'https://images.test/a.jpg', topic: 'Teamwork' })
            .reply(200, { presentation_score: 0.74 });

        const client = new PresentationFitClient(`${SERVICE}/`);

        await expect(client.scoreFit('https://images.test/a.jpg', 'Teamwork')).resolves.toBe(0.74);
    });

    it('rejects a response without a score', async () => {
        nock(SERVICE).post('/score').reply(200, {});

        const error = await new PresentationFitClient(SERVICE)
            .scoreFit('https://images.test/a.jpg', 'Teamwork')
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ProviderError);
        expect(error).toHaveProperty('message', 'presentation-fit: response contained no presentation_score');
    });

    it('wraps HTTP errors', async () => {
        nock(SERVICE).post('/score').reply(503, { message: 'Model loading' });

        const error = await new PresentationFitClient(SERVICE)
            .scoreFit('https://images.test/a.jpg', 'Teamwork')
            .catch((e: unknown) => e);

        expect(error).toHaveProperty('status', 503);
        expect(error).toHaveProperty('message', 'presentation-fit: (503) Model loading');
    });
});
