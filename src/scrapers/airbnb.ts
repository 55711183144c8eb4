import { log, type ProxyConfiguration } from 'apify';
import { gotScraping } from 'crawlee';
import { z } from 'zod';

import { DEFAULT_MAX_REVIEWS, FETCH_HEADERS, REVIEWS_PAGE_SIZE } from '../constants.js';
import { errorMessage, MalformedResponseError, RateLimitedError, RetryableError, TimeoutError, TransportError } from '../errors.js';
import type { RequestOptions, SourceClient } from '../source.js';
import type { GeoTile, ListingDetails, ListingRecord, ReviewRecord, SearchFilters, TileQueryResult } from '../types.js';
import { normalizeCurrency, parsePriceAmount } from '../utils.js';

// The map search returns at most 50 items per page and stops paginating around 300 results,
// which is why large areas have to be tiled.
const BASE_URL = 'https://www.airbnb.com';
const EXPLORE_API = `${BASE_URL}/api/v2/explore_tabs`;
const REVIEWS_API = `${BASE_URL}/api/v2/reviews`;
const DETAILS_API = `${BASE_URL}/api/v2/pdp_listing_details`;
const PER_PAGE = 50;
const SOURCE = 'airbnb' as const;
const LOG_PREFIX = `[${SOURCE}]`;

const exploreListingSchema = z.object({
    listing: z.object({
        id: z.union([z.number(), z.string()]),
        name: z.string().nullish(),
        lat: z.number().nullish(),
        lng: z.number().nullish(),
        person_capacity: z.number().nullish(),
        avg_rating: z.number().nullish(),
        reviews_count: z.number().nullish(),
        room_and_property_type: z.string().nullish(),
        preview_amenity_names: z.array(z.string()).nullish(),
    }),
    pricing_quote: z
        .object({
            rate: z.object({ amount: z.number(), currency: z.string() }).nullish(),
            price_string: z.string().nullish(),
        })
        .nullish(),
});

const exploreResponseSchema = z.object({
    explore_tabs: z
        .array(
            z.object({
                sections: z.array(z.object({ listings: z.array(exploreListingSchema).nullish() })),
                pagination_metadata: z
                    .object({ has_next_page: z.boolean(), items_offset: z.number().nullish() })
                    .nullish(),
                home_tab_metadata: z.object({ listings_count: z.number().nullish() }).nullish(),
            }),
        )
        .min(1),
});

const reviewsResponseSchema = z.object({
    reviews: z.array(
        z.object({
            id: z.union([z.number(), z.string()]),
            comments: z.string().nullish(),
            created_at: z.string().nullish(),
            rating: z.number().nullish(),
        }),
    ),
    metadata: z.object({ reviews_count: z.number().nullish() }).nullish(),
});

const detailsResponseSchema = z.object({
    pdp_listing_detail: z.object({
        sectioned_description: z
            .object({
                description: z.string().nullish(),
                summary: z.string().nullish(),
                neighborhood_overview: z.string().nullish(),
                transit: z.string().nullish(),
            })
            .nullish(),
        highlights: z.array(z.object({ headline: z.string().nullish(), message: z.string().nullish() })).nullish(),
        location_title: z.string().nullish(),
    }),
});

export interface ExplorePage {
    listings: ListingRecord[];
    hasNextPage: boolean;
    nextOffset: number;
    totalCount: number | null;
}

export interface AirbnbClientOptions {
    apiKey: string;
    locale?: string;
    proxyConfiguration?: ProxyConfiguration;
    requestTimeoutMs: number;
    maxReviews?: number;
}

const describeIssues = (error: z.ZodError): string =>
    error.issues
        .slice(0, 3)
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');

export const parseExplorePage = (data: unknown, currency: string, offset: number, seenAt: string): ExplorePage => {
    const parsed = exploreResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedResponseError(`${LOG_PREFIX} Unexpected search response: ${describeIssues(parsed.error)}`);
    }

    const [tab] = parsed.data.explore_tabs;
    const items = tab.sections.flatMap((section) => section.listings ?? []);
    const listings = items.map(({ listing, pricing_quote: quote }): ListingRecord => {
        const id = String(listing.id);
        const amount = quote?.rate?.amount ?? parsePriceAmount(quote?.price_string);
        return {
            id,
            name: listing.name ?? '',
            lat: listing.lat ?? null,
            lng: listing.lng ?? null,
            price: amount === null ? null : { amount, currency: normalizeCurrency(quote?.rate?.currency ?? currency) },
            capacity: listing.person_capacity ?? null,
            rating: listing.avg_rating ?? null,
            reviewCount: listing.reviews_count ?? 0,
            available: true,
            description: listing.room_and_property_type ?? '',
            highlights: listing.preview_amenity_names ?? [],
            url: `${BASE_URL}/rooms/${id}`,
            lastSeenAt: seenAt,
        };
    });

    return {
        listings,
        hasNextPage: tab.pagination_metadata?.has_next_page ?? false,
        nextOffset: tab.pagination_metadata?.items_offset ?? offset + items.length,
        totalCount: tab.home_tab_metadata?.listings_count ?? null,
    };
};

export const parseReviewsPage = (data: unknown, listingId: string): ReviewRecord[] => {
    const parsed = reviewsResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedResponseError(`${LOG_PREFIX} Unexpected reviews response: ${describeIssues(parsed.error)}`);
    }
    return parsed.data.reviews
        .filter((review) => review.comments?.trim())
        .map((review) => ({
            id: String(review.id),
            listingId,
            text: (review.comments ?? '').trim(),
            date: review.created_at ?? null,
            rating: review.rating ?? null,
        }));
};

const joinText = (parts: (string | null | undefined)[], separator: string): string =>
    parts
        .map((part) => part?.trim() ?? '')
        .filter((part) => part.length > 0)
        .join(separator);

export const parseDetailsPage = (data: unknown, listingId: string): ListingDetails => {
    const parsed = detailsResponseSchema.safeParse(data);
    if (!parsed.success) {
        throw new MalformedResponseError(`${LOG_PREFIX} Unexpected details response: ${describeIssues(parsed.error)}`);
    }
    const detail = parsed.data.pdp_listing_detail;
    const sections = detail.sectioned_description;
    return {
        listingId,
        description: joinText([sections?.description ?? sections?.summary], ''),
        highlights: (detail.highlights ?? [])
            .map((highlight) => joinText([highlight.headline, highlight.message], ': '))
            .filter((highlight) => highlight.length > 0),
        locationDescription: joinText([detail.location_title, sections?.neighborhood_overview, sections?.transit], ' '),
    };
};

export const buildExploreUrl = (tile: GeoTile, filters: SearchFilters, apiKey: string, offset: number, locale = 'en'): string => {
    const params = new URLSearchParams({
        version: '1.3.9',
        _format: 'for_explore_search_web',
        key: apiKey,
        locale,
        currency: filters.currency,
        search_by_map: 'true',
        ne_lat: String(tile.north),
        ne_lng: String(tile.east),
        sw_lat: String(tile.south),
        sw_lng: String(tile.west),
        adults: String(filters.occupants),
        price_min: String(filters.price.min),
        price_max: String(filters.price.max),
        items_per_grid: String(PER_PAGE),
        items_offset: String(offset),
    });
    params.append('refinement_paths[]', '/homes');
    if (filters.checkIn) params.set('checkin', filters.checkIn);
    if (filters.checkOut) params.set('checkout', filters.checkOut);
    return `${EXPLORE_API}?${params.toString()}`;
};

const isTimeout = (error: unknown): boolean =>
    error instanceof Error && (error.name === 'TimeoutError' || ('code' in error && error.code === 'ETIMEDOUT'));

const isAbort = (error: unknown): boolean =>
    error instanceof Error && (error.name === 'AbortError' || ('code' in error && error.code === 'ERR_ABORTED'));

/** Maps a failed `gotScraping` call onto the retryable error family. */
export const mapRequestError = (error: unknown): RetryableError => {
    const message = errorMessage(error);
    if (isTimeout(error)) return new TimeoutError(`${LOG_PREFIX} Request timed out: ${message}`, { cause: error });
    if (isAbort(error)) return new TimeoutError(`${LOG_PREFIX} Request aborted: ${message}`, { cause: error });
    return new TransportError(`${LOG_PREFIX} Request failed: ${message}`, { cause: error });
};

export class AirbnbClient implements SourceClient {
    private readonly maxReviews: number;

    constructor(private readonly options: AirbnbClientOptions) {
        this.maxReviews = options.maxReviews ?? DEFAULT_MAX_REVIEWS;
    }

    async queryTile(
        tile: GeoTile,
        filters: SearchFilters,
        resultCap: number,
        options: RequestOptions = {},
    ): Promise<TileQueryResult> {
        const seenAt = new Date().toISOString();
        const byId = new Map<string, ListingRecord>();
        let offset = 0;
        let totalCount: number | null = null;
        let hasNextPage = true;

        while (hasNextPage && byId.size < resultCap && !options.signal?.aborted) {
            const url = buildExploreUrl(tile, filters, this.options.apiKey, offset, this.options.locale);
            const data = await this.getJson(url, options.signal);
            const page = parseExplorePage(data, filters.currency, offset, seenAt);
            for (const listing of page.listings) byId.set(listing.id, listing);

            totalCount = page.totalCount ?? totalCount;
            hasNextPage = page.hasNextPage && page.listings.length > 0 && page.nextOffset > offset;
            offset = page.nextOffset;
        }

        const listings = [...byId.values()];
        const saturated = listings.length >= resultCap || (totalCount ?? 0) >= resultCap;
        log.debug(`${LOG_PREFIX} Tile returned ${listings.length} listings`, { totalCount, saturated });
        return { listings, saturated };
    }

    async fetchReviews(listingId: string, options: RequestOptions = {}): Promise<ReviewRecord[]> {
        const reviews: ReviewRecord[] = [];
        let offset = 0;

        while (reviews.length < this.maxReviews && !options.signal?.aborted) {
            const params = new URLSearchParams({
                key: this.options.apiKey,
                listing_id: listingId,
                role: 'guest',
                _format: 'for_mobile_client',
                _limit: String(REVIEWS_PAGE_SIZE),
                _offset: String(offset),
            });
            const page = parseReviewsPage(await this.getJson(`${REVIEWS_API}?${params.toString()}`, options.signal), listingId);
            reviews.push(...page);
            offset += REVIEWS_PAGE_SIZE;
            if (page.length < REVIEWS_PAGE_SIZE) break;
        }

        return reviews.slice(0, this.maxReviews);
    }

    async fetchDetails(listingId: string, options: RequestOptions = {}): Promise<ListingDetails> {
        const params = new URLSearchParams({
            key: this.options.apiKey,
            _format: 'for_rooms_show',
            locale: this.options.locale ?? 'en',
        });
        const url = `${DETAILS_API}/${encodeURIComponent(listingId)}?${params.toString()}`;
        return parseDetailsPage(await this.getJson(url, options.signal), listingId);
    }

    private async getJson(url: string, signal?: AbortSignal): Promise<unknown> {
        const proxyUrl = await this.options.proxyConfiguration?.newUrl();
        let statusCode: number;
        let body: string;
        try {
            ({ statusCode, body } = await gotScraping({
                url,
                headers: FETCH_HEADERS,
                proxyUrl,
                throwHttpErrors: false,
                retry: { limit: 0 },
                timeout: { request: this.options.requestTimeoutMs },
                signal,
            }));
        } catch (error) {
            throw mapRequestError(error);
        }

        if (statusCode === 429) throw new RateLimitedError(`${LOG_PREFIX} Rate limited (HTTP 429)`);
        if (statusCode >= 400) throw new MalformedResponseError(`${LOG_PREFIX} HTTP ${statusCode} from ${new URL(url).pathname}`);

        try {
            return JSON.parse(body);
        } catch {
            throw new MalformedResponseError(`${LOG_PREFIX} Response is not JSON (${body.length} bytes)`);
        }
    }
}
