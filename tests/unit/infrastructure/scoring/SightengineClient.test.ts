import nock from 'nock';
import { SightengineClient, safetyScore } from '../../../../src/infrastructure/scoring/SightengineClient';
import { ProviderError, SafetyCheckUnavailable } from '../../../../src/domain/errors/PipelineErrors';

describe('SightengineClient', () => {
    const API = 'https://api.sightengine.test';
    const client = new SightengineClient('test-user', 'test-secret', `${API}/1.0`);

    beforeEach(() => {
        nock.cleanAll();
    });

    afterEach(() => {
        nock.cleanAll();
    });

    it('should throw if credentials are missing', () => {
        expect(() => new SightengineClient('', 'test-secret')).toThrow('SightEngine API user and secret are required');
        expect(() => new SightengineClient('test-user', '')).toThrow('SightEngine API user and secret are required');
    });

    describe('analyze', () => {
        it('returns quality and safety from one call', async () => {
            nock(API)
                .get('/1.0/check.json')
                .query({
                    url: 'https://images.test/a.jpg',
                    models: 'quality,nudity-2.1',
                    api_user: 'test-user',
                    api_secret: 'test-secret',
                })
                .reply(200, { status: 'success', quality: { score: 0.91 }, nudity: { none: 0.995 } });

            const analysis = await client.analyze('https://images.test/a.jpg');

            expect(analysis).toEqual({ quality: 0.91, safety: 0.995 });
        });

        it('rejects a failure status', async () => {
            nock(API)
                .get('/1.0/check.json').query(true)
                .reply(200, { status: 'failure', error: { type: 'media_error', message: 'Image could not be fetched' } });

            const error = await client.analyze('https://images.test/broken.jpg').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toHaveProperty('message', 'sightengine: Image could not be fetched');
        });

        it('rejects a response without a quality score', async () => {
            nock(API)
                .get('/1.0/check.json').query(true)
                .reply(200, { status: 'success', nudity: { none: 1 } });

            await expect(client.analyze('https://images.test/a.jpg'))
                .rejects.toThrow('sightengine: response contained no quality score');
        });

        it('wraps HTTP errors with the status', async () => {
            nock(API)
                .get('/1.0/check.json').query(true)
                .reply(500, { error: { message: 'Internal error' } });

            const error = await client.analyze('https://images.test/a.jpg').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ProviderError);
            expect(error).toHaveProperty('status', 500);
            expect(error).toHaveProperty('message', 'sightengine: analysis failed (500) Internal error');
        });
    });

    describe('checkSafety', () => {
        it('checks hosted images by URL', async () => {
            nock(API)
                .get('/1.0/check.json')
                .query({
                    url: 'https://cdn.test/generated.png',
                    models: 'nudity-2.1',
                    api_user: 'test-user',
                    api_secret: 'test-secret',
                })
                .reply(200, { status: 'success', nudity: { none: 0.42 } });

            await expect(client.checkSafety({ kind: 'url', url: 'https://cdn.test/generated.png' })).resolves.toBe(0.42);
        });

        it('uploads inline bytes as multipart', async () => {
            let body = '';
            nock(API)
                .post('/1.0/check.json', (b: string) => {
                    body = b;
                    return true;
                })
                .reply(200, { status: 'success', nudity: { none: 0.999 } });

            const score = await client.checkSafety({ kind: 'inline', bytes: Buffer.from('png-bytes'), mediaType: 'image/png' });

            expect(score).toBe(0.999);
            expect(body).toContain('name="media"');
            expect(body).toContain('png-bytes');
            expect(body).toContain('name="models"');
        });

        it('reports exhausted quota', async () => {
            nock(API)
                .get('/1.0/check.json').query(true)
                .reply(200, { status: 'failure', error: { type: 'usage_limit', code: 32, message: 'Daily usage limit reached' } });

            const error = await client.checkSafety({ kind: 'url', url: 'https://cdn.test/g.png' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(SafetyCheckUnavailable);
            expect(error).toHaveProperty('message', 'Safety check quota exhausted');
        });

        it('reports transport errors as unavailable', async () => {
            nock(API)
                .get('/1.0/check.json').query(true)
                .reply(503, 'unavailable');

            const error = await client.checkSafety({ kind: 'url', url: 'https://cdn.test/g.png' }).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(SafetyCheckUnavailable);
            expect(error).toHaveProperty('message', 'Safety check failed: (503) unavailable');
        });
    });

    describe('safetyScore', () => {
        it('prefers the none class', () => {
            expect(safetyScore({ none: 0.3, suggestive_classes: { cleavage_categories: { none: 0.9 } } })).toBe(0.3);
        });

        it('falls back to the cleavage none class', () => {
            expect(safetyScore({ suggestive_classes: { cleavage_categories: { none: 0.8 } } })).toBe(0.8);
        });

        it('treats a missing nudity block as safe', () => {
            expect(safetyScore(undefined)).toBe(1);
        });
    });
});
