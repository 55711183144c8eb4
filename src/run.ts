import { log } from 'apify';

import { AnalysisPipeline } from './analysis.js';
import type { Settings } from './config.js';
import { diffSnapshots, logDeltaStats } from './diff.js';
import { discover } from './discovery.js';
import { type KeyValueStoreLike, SnapshotStore } from './history.js';
import type { LlmClient } from './llm/client.js';
import type { SourceClient } from './source.js';
import type {
    AnalysisReport,
    Delta,
    DiscoveredListing,
    ListingAnalysis,
    ListingChange,
    ListingStatus,
    RatingResult,
    RunReport,
    Snapshot,
    SummarySection,
} from './types.js';

export interface RunDependencies {
    settings: Settings;
    source: SourceClient;
    llm: LlmClient | null;
    store: KeyValueStoreLike;
    signal?: AbortSignal;
    now?: () => Date;
}

export interface RunOutput {
    report: RunReport;
    snapshot: Snapshot;
    delta: Delta;
    analysis: AnalysisReport | null;
}

export type DatasetItem = DiscoveredListing & {
    searchId: string;
    snapshotId: string;
    status: ListingStatus;
    changes: ListingChange[];
    summary: SummarySection[] | null;
    aiRating: RatingResult['rating'] | null;
    aiRatingRationale: string | null;
    analysisFailures: ListingAnalysis['failures'];
};

/**
 * One monitoring run: discover the area, commit the result as a new snapshot, diff it against the
 * previous one and analyse the reviews of every listing found. Tile and listing failures end up in
 * the report; only invalid configuration makes the run throw.
 */
export async function runSearch(deps: RunDependencies): Promise<RunOutput> {
    const { settings, source, store, signal } = deps;
    const now = deps.now ?? (() => new Date());
    const snapshots = new SnapshotStore(store, settings.searchId);
    const previous = await snapshots.latest();

    const listingSet = await discover(settings.area, settings.discovery, source, {
        retry: settings.sourceRetry,
        timeoutMs: settings.sourceTimeoutMs,
        signal,
    });
    const snapshot = await snapshots.commit(listingSet, now());
    const delta = diffSnapshots(previous, snapshot);
    const deltaStats = logDeltaStats(delta);

    let analysis: AnalysisReport | null = null;
    if (settings.analysis && deps.llm && !signal?.aborted) {
        const pipeline = new AnalysisPipeline({
            config: settings.analysis,
            source,
            llm: deps.llm,
            store,
            sourceRetry: settings.sourceRetry,
            sourceTimeoutMs: settings.sourceTimeoutMs,
        });
        analysis = await pipeline.analyzeAll(snapshot.listings, signal);
    } else if (settings.analysis) {
        log.warning('Skipping review analysis', { aborted: signal?.aborted ?? false, hasLlmClient: deps.llm !== null });
    }

    const aborted = listingSet.aborted || (analysis?.aborted ?? false) || (signal?.aborted ?? false);
    const analysisFailures = (analysis?.results ?? []).flatMap((result) =>
        result.failures.map((failure) => ({ listingId: result.listingId, ...failure })),
    );

    const report: RunReport = {
        searchId: settings.searchId,
        snapshotId: snapshot.id,
        previousSnapshotId: previous?.id ?? null,
        complete: listingSet.complete && !aborted && analysisFailures.length === 0,
        aborted,
        listingCount: snapshot.listings.length,
        tileFailures: listingSet.failures,
        floorTiles: listingSet.stats.floorTiles,
        delta: deltaStats,
        analysis: analysis ? { analysed: analysis.results.length, failed: analysisFailures } : null,
    };

    if (!report.complete) {
        log.warning('Run finished with partial results', {
            failedTiles: report.tileFailures.length,
            floorTiles: report.floorTiles,
            failedAnalyses: analysisFailures.length,
            aborted,
        });
    }
    return { report, snapshot, delta, analysis };
}

/** Flattens a run into one dataset row per listing in the snapshot. */
export const toDatasetItems = ({ snapshot, delta, analysis }: RunOutput): DatasetItem[] => {
    const entries = new Map(delta.entries.map((entry) => [entry.id, entry]));
    const analyses = new Map((analysis?.results ?? []).map((result) => [result.listingId, result]));

    return snapshot.listings.map((listing): DatasetItem => {
        const entry = entries.get(listing.id);
        const result = analyses.get(listing.id);
        return {
            ...listing,
            searchId: snapshot.searchId,
            snapshotId: snapshot.id,
            status: entry?.status ?? 'unchanged',
            changes: entry?.changes ?? [],
            summary: result?.summary?.sections ?? null,
            aiRating: result?.rating?.rating ?? null,
            aiRatingRationale: result?.rating?.rationale ?? null,
            analysisFailures: result?.failures ?? [],
        };
    });
};
