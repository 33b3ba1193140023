import axios from 'axios';
import { StockCandidate } from '../../domain/entities/StockCandidate';
import { ProviderError } from '../../domain/errors/PipelineErrors';
import { IStockSearchClient, StockSearchOptions } from '../../domain/ports/IStockSearchClient';
import { describeHttpError } from '../resilience/HttpErrors';

interface PexelsPhoto {
    id: number;
    width?: number;
    height?: number;
    alt?: string | null;
    photographer?: string;
    photographer_url?: string;
    src: { original?: string; large2x?: string; large?: string; medium?: string };
}

interface PexelsSearchResponse {
    photos?: PexelsPhoto[];
}

/**
 * Pexels photo search.
 */
export class PexelsSearchClient implements IStockSearchClient {
    readonly provider = 'pexels' as const;
    private readonly apiKey: string;
    private readonly baseUrl: string;

    constructor(apiKey: string, baseUrl: string = 'https://api.pexels.com/v1') {
        if (!apiKey) {
            throw new Error('Pexels API key is required');
        }
        this.apiKey = apiKey;
        this.baseUrl = baseUrl;
    }

    async search(query: string, options: StockSearchOptions): Promise<StockCandidate[]> {
        try {
            const response = await axios.get<PexelsSearchResponse>(`${this.baseUrl}/search`, {
                params: {
                    query,
                    per_page: options.perPage,
                    ...(options.orientation ? { orientation: options.orientation } : {}),
                },
                headers: {
                    Authorization: this.apiKey,
                },
                signal: options.signal,
            });

            const photos = response.data?.photos ?? [];
            console.log(`[Pexels] ${photos.length} results for "${query}"`);
            return photos.flatMap((photo) => this.toCandidate(photo));
        } catch (error) {
            const { status, message } = describeHttpError(error);
            throw new ProviderError('pexels', `search failed ${message}`, status);
        }
    }

    private toCandidate(photo: PexelsPhoto): StockCandidate[] {
        const sourceUrl = photo.src.original ?? photo.src.large2x ?? photo.src.large;
        if (!sourceUrl) return [];

        return [{
            provider: this.provider,
            id: String(photo.id),
            sourceUrl,
            previewUrl: photo.src.large2x ?? photo.src.large ?? sourceUrl,
            width: photo.width,
            height: photo.height,
            description: photo.alt ?? undefined,
            photographer: photo.photographer,
            photographerUrl: photo.photographer_url,
        }];
    }
}
