import { parseSlideBody, parseSlideQuery, splitList } from '../../../../src/presentation/routes/slideInputParser';
import { BadRequestError } from '../../../../src/presentation/middleware/errorHandler';

describe('slideInputParser', () => {
    describe('parseSlideBody', () => {
        it('parses a full slide', () => {
            const slide = parseSlideBody({
                title: 'Quarterly results',
                bullets: ['Revenue up', { bullet: 'Costs', sub: 'Flat' }],
                keywords: [' finance ', '', 'growth chart'],
                style: 'fine_line',
                image_mode: 'ai_only',
                ai_model: 'gemini',
                colors: { primary: 'navy', secondary: 'gold' },
            });

            expect(slide).toEqual({
                title: 'Quarterly results',
                bullets: ['Revenue up', 'Costs', 'Flat'],
                keywords: ['finance', 'growth chart'],
                style: 'fine_line',
                imageMode: 'ai_only',
                aiModel: 'gemini',
                colors: { primary: 'navy', secondary: 'gold' },
            });
            expect(Object.isFrozen(slide)).toBe(true);
        });

        it('accepts unsplashSearchTerms as keywords', () => {
            const slide = parseSlideBody({ unsplashSearchTerms: 'beach, sunset' });

            expect(slide.keywords).toEqual(['beach', 'sunset']);
            expect(slide.title).toBe('');
        });

        it('leaves keywords out when none are usable', () => {
            const slide = parseSlideBody({ title: 'Intro', keywords: ['  '] });

            expect(slide).not.toHaveProperty('keywords');
        });

        it('drops empty colour hints', () => {
            expect(parseSlideBody({ title: 'Intro', colors: {} }).colors).toBeUndefined();
        });

        it.each([
            [[], 'Request body must be a JSON object'],
            [{ title: 42 }, 'title must be a string'],
            [{ title: 'x', bullets: 'one' }, 'bullets must be an array'],
            [{ title: 'x', bullets: [7] }, 'bullets must contain strings or { bullet, sub } objects'],
            [{ title: 'x', keywords: [1, 2] }, 'keywords must be an array of strings'],
            [{ title: 'x', image_mode: 'stock' }, 'image_mode must be one of: stock_only, ai_only, auto'],
            [{ title: 'x', ai_model: 'dalle' }, 'Unknown ai_model: dalle'],
            [{ title: 'x', colors: 'red' }, 'colors must be an object'],
            [{ bullets: ['only bullets'] }, 'title is required when no keywords are given'],
        ])('rejects %j', (body, message) => {
            const parse = () => parseSlideBody(body);

            expect(parse).toThrow(BadRequestError);
            expect(parse).toThrow(message);
        });
    });

    describe('parseSlideQuery', () => {
        it('splits comma-separated lists', () => {
            const slide = parseSlideQuery({
                keywords: 'ocean, , waves',
                bullets: 'A,B',
                secondary_color: 'teal',
                ai_model: 'auto',
            });

            expect(slide).toEqual({
                title: '',
                bullets: ['A', 'B'],
                keywords: ['ocean', 'waves'],
                aiModel: 'auto',
                colors: { secondary: 'teal' },
            });
        });

        it('rejects repeated parameters', () => {
            expect(() => parseSlideQuery({ title: ['a', 'b'] })).toThrow('title must be a string');
        });
    });

    describe('splitList', () => {
        it('trims and drops empty parts', () => {
            expect(splitList(' a ,b,, c ')).toEqual(['a', 'b', 'c']);
        });
    });
});
