import axios from 'axios';
import { Orientation } from '../../domain/entities/ExtractedIntent';
import { StockCandidate } from '../../domain/entities/StockCandidate';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IStockSearchClient, StockSearchOptions } from '../../domain/ports/IStockSearchClient';
import { describeHttpError } from '../resilience/HttpErrors';

interface UnsplashPhoto {
    id: string;
    width?: number;
    height?: number;
    description?: string | null;
    alt_description?: string | null;
    urls: { raw?: string; full?: string; regular?: string; small?: string };
    user?: { name?: string; links?: { html?: string } };
}

interface UnsplashSearchResponse {
    results?: UnsplashPhoto[];
}

const ORIENTATION_PARAM: Record<Orientation, string> = {
    landscape: 'landscape',
    portrait: 'portrait',
    square: 'squarish',
};

/**
 * Unsplash photo search.
 */
export class UnsplashSearchClient implements IStockSearchClient {
    readonly provider = 'unsplash' as const;
    private readonly accessKey: string;
    private readonly baseUrl: string;

    constructor(accessKey: string, baseUrl: string = 'https://api.unsplash.com') {
        if (!accessKey) {
            throw new Error('Unsplash access key is required');
        }
        this.accessKey = accessKey;
        this.baseUrl = baseUrl;
    }

    async search(query: string, options: StockSearchOptions): Promise<StockCandidate[]> {
        try {
            const response = await axios.get<UnsplashSearchResponse>(`${this.baseUrl}/search/photos`, {
                params: {
                    query,
                    per_page: options.perPage,
                    content_filter: 'high',
                    ...(options.orientation ? { orientation: ORIENTATION_PARAM[options.orientation] } : {}),
                },
                headers: {
                    Authorization: `Client-ID ${this.accessKey}`,
                },
                signal: options.signal,
            });

            const photos = response.data?.results ?? [];
            console.log(`[Unsplash] ${photos.length} results for "${query}"`);
            return photos.flatMap((photo) => this.toCandidate(photo));
        } catch (error) {
            const { status, message } = describeHttpError(error);
            throw new ProviderError('unsplash', `search failed ${message}`, status);
        }
    }

    private toCandidate(photo: UnsplashPhoto): StockCandidate[] {
        const sourceUrl = photo.urls.full ?? photo.urls.raw ?? photo.urls.regular;
        if (!sourceUrl) return [];

        return [{
            provider: this.provider,
            id: photo.id,
            sourceUrl,
            previewUrl: photo.urls.regular ?? sourceUrl,
            width: photo.width,
            height: photo.height,
            description: photo.alt_description ?? photo.description ?? undefined,
            photographer: photo.user?.name,
            photographerUrl: photo.user?.links?.html,
        }];
    }
}
