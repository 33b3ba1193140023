import { Orientation } from '../entities/ExtractedIntent';
import { StockCandidate, StockProvider } from '../entities/StockCandidate';

export interface StockSearchOptions {
    perPage: number;
    orientation?: Orientation;
    signal?: AbortSignal;
}

/**
 * IStockSearchClient - Port for a single stock-photo provider.
 * Implementations: UnsplashSearchClient, PexelsSearchClient
 */
export interface IStockSearchClient {
    readonly provider: StockProvider;

    /**
     * Searches the provider. Throws ProviderError on any failure.
     */
    search(query: string, options: StockSearchOptions): Promise<StockCandidate[]>;
}
