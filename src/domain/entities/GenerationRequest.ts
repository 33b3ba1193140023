import { AiModel } from './AiModel';
import { ColorHints, SlideStyle } from './SlideInput';

/**
 * One generation attempt. A safety regeneration produces a second request
 * with a different model and the same prompt.
 */
export interface GenerationRequest {
    readonly model: AiModel;
    readonly prompt: string;
    readonly negativePrompt: string;
    readonly colors?: ColorHints;
    readonly style?: SlideStyle;
    readonly width: number;
    readonly height: number;
}

/**
 * Output of a backend: inline bytes to be cached, or a directly servable URL.
 */
export type GeneratedImage =
    | { kind: 'inline'; bytes: Buffer; mediaType: string }
    | { kind: 'url'; url: string };

export type GenerationOutcome =
    | { ok: true; image: GeneratedImage; request: GenerationRequest }
    | { ok: false; reason: string; model: AiModel };

export const DEFAULT_IMAGE_SIZE = { width: 1024, height: 1024 } as const;

export const DEFAULT_NEGATIVE_TERMS: readonly string[] = ['text', 'watermark', 'logo'];

/**
 * Decodes a base64 data URL (data:image/png;base64,...).
 * Throws on anything else.
 */
export function decodeDataUrl(dataUrl: string): { bytes: Buffer; mediaType: string } {
    if (!dataUrl.startsWith('data:')) {
        throw new Error('Not a data URL');
    }
    const comma = dataUrl.indexOf(',');
    if (comma === -1) {
        throw new Error('Invalid data URL format');
    }
    const header = dataUrl.substring(5, comma);
    const payload = dataUrl.substring(comma + 1);
    const [mediaPart, ...params] = header.split(';');
    const mediaType = mediaPart || 'application/octet-stream';

    if (!params.includes('base64')) {
        return { bytes: Buffer.from(decodeURIComponent(payload), 'utf8'), mediaType };
    }
    if (!/^[A-Za-z0-9+/=\s]*$/.test(payload)) {
        throw new Error('Invalid base64 data');
    }
    return { bytes: Buffer.from(payload, 'base64'), mediaType };
}

/**
 * Normalizes a backend payload that may be a data URL, an http(s) URL or bare base64.
 */
export function toGeneratedImage(payload: string, fallbackMediaType: string = 'image/png'): GeneratedImage {
    if (payload.startsWith('data:')) {
        const { bytes, mediaType } = decodeDataUrl(payload);
        return { kind: 'inline', bytes, mediaType };
    }
    if (/^https?:\/\//i.test(payload)) {
        return { kind: 'url', url: payload };
    }
    return { kind: 'inline', bytes: Buffer.from(payload, 'base64'), mediaType: fallbackMediaType };
}
