export interface GeoTile {
    north: number;
    south: number;
    east: number;
    west: number;
}

export interface Money {
    amount: number;
    currency: string; // ISO 4217, normalized upper-case
}

export interface ListingRecord {
    id: string; // source-assigned listing id
    name: string;
    lat: number | null;
    lng: number | null;
    price: Money | null; // nightly
    capacity: number | null;
    rating: number | null; // platform user rating, null = unrated
    reviewCount: number;
    available: boolean;
    description: string;
    highlights: string[];
    url: string;
    lastSeenAt: string; // ISO date
}

export interface DiscoveredListing extends ListingRecord {
    possiblyIncomplete: boolean; // only seen in tiles that stayed saturated at the size floor
}

export interface ReviewRecord {
    id: string;
    listingId: string;
    text: string;
    date: string | null; // as shown to guests
    rating: number | null;
}

/** Text from the listing's own page, fuller than the search card's. */
export interface ListingDetails {
    listingId: string;
    description: string;
    highlights: string[];
    locationDescription: string;
}

/** The listing text appended to a review batch. */
export type ListingContext = Omit<ListingDetails, 'listingId'>;

export interface PriceRange {
    min: number;
    max: number;
}

export interface SearchFilters {
    checkIn: string | null;
    checkOut: string | null;
    currency: string;
    price: PriceRange;
    occupants: number;
}

export interface DiscoveryConstraints extends SearchFilters {
    resultCap: number;
    minTileSizeDeg: number;
    maxConcurrency: number;
}

export interface TileQueryResult {
    listings: ListingRecord[];
    saturated: boolean;
}

export interface TileFailure {
    tile: GeoTile;
    depth: number;
    attempts: number;
    error: string;
}

export interface DiscoveryStats {
    tilesQueried: number;
    tilesSubdivided: number;
    floorTiles: number;
    tilesSkipped: number; // queued but never queried because the run was aborted
    maxDepth: number;
}

export interface ListingSet {
    listings: DiscoveredListing[]; // sorted by id, unique
    failures: TileFailure[];
    stats: DiscoveryStats;
    complete: boolean; // no failed tiles, no floor tiles, not aborted
    aborted: boolean;
}

export interface Snapshot {
    readonly id: string;
    readonly searchId: string;
    readonly takenAt: string;
    readonly complete: boolean;
    readonly listings: readonly DiscoveredListing[];
    readonly failures: readonly TileFailure[];
}

export interface SnapshotIndexEntry {
    id: string;
    takenAt: string;
    listingCount: number;
    complete: boolean;
}

export type ListingStatus = 'new' | 'removed' | 'unchanged' | 'changed';

export type ListingChange =
    | { field: 'price'; from: Money | null; to: Money | null }
    | { field: 'available'; from: boolean; to: boolean }
    | { field: 'rating'; from: number | null; to: number | null };

export type ChangedField = ListingChange['field'];

export interface DeltaEntry {
    id: string;
    status: ListingStatus;
    before: ListingRecord | null;
    after: ListingRecord | null;
    changes: ListingChange[];
}

export interface Delta {
    fromSnapshot: string | null;
    toSnapshot: string | null;
    entries: DeltaEntry[]; // sorted by id
}

export interface TimelinePoint {
    snapshotId: string;
    takenAt: string;
    present: boolean;
    price: Money | null;
    available: boolean | null;
    rating: number | null;
}

export interface SummarySection {
    focus: string;
    points: string[];
    missing: boolean; // the model left this focus area out
}

export interface SummaryResult {
    kind: 'summary';
    sections: SummarySection[];
}

export interface RatingResult {
    kind: 'rating';
    rating: number;
    rationale: string | null;
}

export type AIResult = SummaryResult | RatingResult;

export interface RatingBounds {
    min: number;
    max: number;
}

export interface PromptTemplate {
    rolePrompt: string;
    questions: string[];
}

export interface ModelSettings {
    model: string;
    maxTokens: number;
    temperature: number;
}

export interface RetryPolicy {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitter: number; // 0..1 fraction of the delay
}

export interface AnalysisConfig extends ModelSettings {
    focusAreas: string[]; // 1..5
    summaryTemplate: PromptTemplate;
    ratingTemplate: PromptTemplate;
    ratingBounds: RatingBounds;
    maxConcurrency: number;
    requestTimeoutMs: number;
    retry: RetryPolicy;
    maxReviewsPerListing: number;
    maxReviewChars: number;
}

export interface ListingAnalysis {
    listingId: string;
    summary: SummaryResult | null;
    rating: RatingResult | null;
    failures: { task: 'summary' | 'rating'; reason: string; message: string }[];
}

export interface AnalysisReport {
    results: ListingAnalysis[]; // sorted by listing id
    aborted: boolean;
}

export interface RunReport {
    searchId: string;
    snapshotId: string;
    previousSnapshotId: string | null;
    complete: boolean;
    aborted: boolean;
    listingCount: number;
    tileFailures: TileFailure[];
    floorTiles: number;
    delta: DeltaStats;
    analysis: {
        analysed: number;
        failed: { listingId: string; task: 'summary' | 'rating'; reason: string; message: string }[];
    } | null;
}

export interface DeltaStats {
    new: number;
    removed: number;
    changed: number;
    unchanged: number;
    priceDrops: number;
    priceRises: number;
}
