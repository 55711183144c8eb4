import { log } from 'apify';

import { ConfigInvalidError, errorMessage, SourceUnavailableError } from './errors.js';
import { describeTile, isAtFloor, subdivide, validateTile } from './geo.js';
import { drainQueue } from './pool.js';
import { RetriesExhaustedError, withRetry, withTimeout } from './retry.js';
import type { SourceClient } from './source.js';
import type {
    DiscoveredListing,
    DiscoveryConstraints,
    DiscoveryStats,
    GeoTile,
    ListingRecord,
    ListingSet,
    PriceRange,
    RetryPolicy,
    TileFailure,
    TileQueryResult,
} from './types.js';

const LOG_PREFIX = '[discovery]';

export interface DiscoverOptions {
    retry: RetryPolicy;
    timeoutMs: number;
    signal?: AbortSignal;
}

interface TileJob {
    tile: GeoTile;
    depth: number;
}

export const withinPriceRange = (listing: ListingRecord, range: PriceRange): boolean =>
    listing.price === null || (listing.price.amount >= range.min && listing.price.amount <= range.max);

/**
 * Picks the observation to keep when the same id comes back from several tiles. The choice depends
 * only on the two records, never on which arrived first: rated beats unrated, then the later
 * `lastSeenAt`, then the higher review count, then a fixed ordering of the serialized record.
 */
export const mergeListing = (a: DiscoveredListing, b: DiscoveredListing): DiscoveredListing => {
    const possiblyIncomplete = a.possiblyIncomplete && b.possiblyIncomplete;
    const pick = (winner: DiscoveredListing): DiscoveredListing => ({ ...winner, possiblyIncomplete });

    if ((a.rating === null) !== (b.rating === null)) return pick(a.rating !== null ? a : b);
    if (a.lastSeenAt !== b.lastSeenAt) return pick(a.lastSeenAt > b.lastSeenAt ? a : b);
    if (a.reviewCount !== b.reviewCount) return pick(a.reviewCount > b.reviewCount ? a : b);

    const keyA = JSON.stringify({ ...a, possiblyIncomplete: false });
    const keyB = JSON.stringify({ ...b, possiblyIncomplete: false });
    return pick(keyA >= keyB ? a : b);
};

const validateConstraints = (root: GeoTile, constraints: DiscoveryConstraints): void => {
    const issues = validateTile(root).map((issue) => `search area: ${issue}`);
    if (!(constraints.minTileSizeDeg > 0)) issues.push('minTileSizeDeg must be positive');
    if (!Number.isInteger(constraints.resultCap) || constraints.resultCap < 1) {
        issues.push('resultCap must be a positive integer');
    }
    if (constraints.price.min > constraints.price.max) issues.push('minPrice must not exceed maxPrice');
    if (issues.length > 0) throw new ConfigInvalidError(issues);
};

/**
 * Finds every listing the source will return inside `root`. Tiles whose query hits the result cap
 * are split into quadrants and queried again until the counts fall below the cap or the tile
 * reaches `minTileSizeDeg`. Tiles are processed from an explicit queue by a bounded pool.
 */
export const discover = async (
    root: GeoTile,
    constraints: DiscoveryConstraints,
    client: SourceClient,
    options: DiscoverOptions,
): Promise<ListingSet> => {
    validateConstraints(root, constraints);

    const { resultCap, minTileSizeDeg } = constraints;
    const filters = {
        checkIn: constraints.checkIn,
        checkOut: constraints.checkOut,
        currency: constraints.currency,
        price: constraints.price,
        occupants: constraints.occupants,
    };
    const merged = new Map<string, DiscoveredListing>();
    const failures: TileFailure[] = [];
    const stats: DiscoveryStats = { tilesQueried: 0, tilesSubdivided: 0, floorTiles: 0, tilesSkipped: 0, maxDepth: 0 };

    log.info(`${LOG_PREFIX} Starting discovery in ${describeTile(root)}`, { resultCap, minTileSizeDeg });

    const handleTile = async ({ tile, depth }: TileJob, enqueue: (...next: TileJob[]) => void): Promise<void> => {
        stats.tilesQueried++;
        stats.maxDepth = Math.max(stats.maxDepth, depth);
        const label = `tile ${describeTile(tile)}`;

        let result: TileQueryResult;
        try {
            result = await withRetry(
                () =>
                    withTimeout(
                        (signal) => client.queryTile(tile, filters, resultCap, { signal }),
                        options.timeoutMs,
                        label,
                    ),
                { ...options.retry, label, signal: options.signal },
            );
        } catch (error) {
            const attempts = error instanceof RetriesExhaustedError ? error.attempts : 1;
            const unavailable = new SourceUnavailableError(`${label} unavailable: ${errorMessage(error)}`, attempts, {
                cause: error,
            });
            log.error(`${LOG_PREFIX} ${unavailable.message}`, { depth, attempts });
            failures.push({ tile, depth, attempts, error: unavailable.message });
            return;
        }

        const saturated = result.saturated || result.listings.length >= resultCap;
        if (saturated && !isAtFloor(tile, minTileSizeDeg)) {
            stats.tilesSubdivided++;
            log.debug(`${LOG_PREFIX} ${label} saturated with ${result.listings.length} results, subdividing`, { depth });
            enqueue(...subdivide(tile).map((child) => ({ tile: child, depth: depth + 1 })));
            return;
        }
        if (saturated) {
            stats.floorTiles++;
            log.warning(`${LOG_PREFIX} ${label} still saturated at the size floor, results may be incomplete`, {
                depth,
                count: result.listings.length,
            });
        }

        for (const listing of result.listings) {
            if (!withinPriceRange(listing, constraints.price)) continue;
            const observed: DiscoveredListing = { ...listing, possiblyIncomplete: saturated };
            const existing = merged.get(listing.id);
            merged.set(listing.id, existing ? mergeListing(existing, observed) : observed);
        }
    };

    const { pending } = await drainQueue([{ tile: root, depth: 0 }], constraints.maxConcurrency, handleTile, options.signal);
    stats.tilesSkipped = pending.length;

    const aborted = options.signal?.aborted ?? false;
    const listings = [...merged.values()].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const complete = !aborted && failures.length === 0 && stats.floorTiles === 0;

    log.info(`${LOG_PREFIX} Done. Found ${listings.length} unique listings.`, {
        ...stats,
        failedTiles: failures.length,
        aborted,
    });

    return { listings, failures, stats, complete, aborted };
};
