import type { GeoTile, ListingDetails, ReviewRecord, SearchFilters, TileQueryResult } from './types.js';

export interface RequestOptions {
    signal?: AbortSignal;
}

/**
 * The listing platform as the core sees it. Implementations throw `RetryableError`
 * subclasses for transient failures; callers retry them.
 */
export interface SourceClient {
    /** Returns the listings found in `tile`; `saturated` when the count reached `resultCap`. */
    queryTile(tile: GeoTile, filters: SearchFilters, resultCap: number, options?: RequestOptions): Promise<TileQueryResult>;
    fetchReviews(listingId: string, options?: RequestOptions): Promise<ReviewRecord[]>;
    fetchDetails(listingId: string, options?: RequestOptions): Promise<ListingDetails>;
}
