import { decodeDataUrl, toGeneratedImage } from '../../../../src/domain/entities/GenerationRequest';

describe('GenerationRequest helpers', () => {
    describe('decodeDataUrl', () => {
        it('decodes a base64 payload and its media type', () => {
            const { bytes, mediaType } = decodeDataUrl('data:image/png;base64,aGVsbG8=');
            expect(mediaType).toBe('image/png');
            expect(bytes.toString('utf8')).toBe('hello');
        });

        it('decodes a percent-encoded payload', () => {
            const { bytes, mediaType } = decodeDataUrl('data:text/plain,hi%20there');
            expect(mediaType).toBe('text/plain');
            expect(bytes.toString('utf8')).toBe('hi there');
        });

        it('defaults the media type', () => {
            expect(decodeDataUrl('data:;base64,AA==').mediaType).toBe('application/octet-stream');
        });

        it('rejects anything that is not a data URL', () => {
            expect(() => decodeDataUrl('https://example.com/a.png')).toThrow('Not a data URL');
            expect(() => decodeDataUrl('data:image/png;base64')).toThrow('Invalid data URL format');
            expect(() => decodeDataUrl('data:image/png;base64,@@@')).toThrow('Invalid base64 data');
        });
    });

    describe('toGeneratedImage', () => {
        it('keeps http URLs as URLs', () => {
            expect(toGeneratedImage('https://cdn.test/img.jpg')).toEqual({ kind: 'url', url: 'https://cdn.test/img.jpg' });
        });

        it('turns data URLs into inline bytes', () => {
            const image = toGeneratedImage('data:image/webp;base64,aGVsbG8=');
            expect(image.kind).toBe('inline');
            if (image.kind === 'inline') {
                expect(image.mediaType).toBe('image/webp');
                expect(image.bytes.toString('utf8')).toBe('hello');
            }
        });

        it('treats bare base64 as inline bytes with the fallback media type', () => {
            const image = toGeneratedImage('aGVsbG8=', 'image/jpeg');
            expect(image).toEqual({ kind: 'inline', bytes: Buffer.from('hello'), mediaType: 'image/jpeg' });
        });
    });
});
