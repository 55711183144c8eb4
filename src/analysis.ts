import { log } from 'apify';

import { AnalysisError, errorMessage, ResponseParseError, SourceUnavailableError } from './errors.js';
import type { KeyValueStoreLike } from './history.js';
import type { LlmClient, LlmRequest } from './llm/client.js';
import { mapConcurrent } from './pool.js';
import { buildRatingRequest, buildSummaryRequest, promptVersion } from './prompts.js';
import { parseRating, parseSummary, ratingResultSchema, summaryResultSchema } from './responses.js';
import { RetriesExhaustedError, withRetry, withTimeout } from './retry.js';
import { type CacheKey, fingerprintBatch, ReviewCache } from './review-cache.js';
import type { SourceClient } from './source.js';
import type {
    AIResult,
    AnalysisConfig,
    AnalysisReport,
    ListingAnalysis,
    ListingDetails,
    ListingRecord,
    RatingResult,
    RetryPolicy,
    ReviewRecord,
    SummaryResult,
} from './types.js';
import { formatReviewBatch, listingContext, selectReviewBatch } from './utils.js';

const LOG_PREFIX = '[analysis]';

export interface AnalysisPipelineOptions {
    config: AnalysisConfig;
    source: SourceClient;
    llm: LlmClient;
    store: KeyValueStoreLike;
    sourceRetry: RetryPolicy;
    sourceTimeoutMs: number;
}

interface PreparedBatch {
    reviews: ReviewRecord[];
    text: string;
    fingerprint: string;
}

type Task = 'summary' | 'rating';

/**
 * Turns each listing's reviews into a summary per focus area and a bounded rating. Results are
 * cached by (listing, review batch fingerprint, prompt version, model), so unchanged listings cost
 * nothing on later runs.
 */
export class AnalysisPipeline {
    readonly summaries: ReviewCache<SummaryResult>;
    readonly ratings: ReviewCache<RatingResult>;
    private readonly config: AnalysisConfig;
    private readonly versions: Record<Task, string>;
    private readonly batches = new Map<string, Promise<PreparedBatch>>();

    constructor(private readonly options: AnalysisPipelineOptions) {
        this.config = options.config;
        this.summaries = new ReviewCache({ store: options.store, kind: 'summary', schema: summaryResultSchema });
        this.ratings = new ReviewCache({ store: options.store, kind: 'rating', schema: ratingResultSchema });
        this.versions = { summary: promptVersion(this.config, 'summary'), rating: promptVersion(this.config, 'rating') };
    }

    async summarize(listing: ListingRecord): Promise<SummaryResult> {
        const batch = await this.prepare(listing);
        return this.summaries.getOrCompute(this.keyFor(listing, batch, 'summary'), () =>
            this.ask(listing, 'summary', (strict) => buildSummaryRequest(this.config, batch.text, strict), (text) =>
                parseSummary(text, this.config.focusAreas),
            ),
        );
    }

    async rate(listing: ListingRecord): Promise<RatingResult> {
        const batch = await this.prepare(listing);
        return this.ratings.getOrCompute(this.keyFor(listing, batch, 'rating'), () =>
            this.ask(listing, 'rating', (strict) => buildRatingRequest(this.config, batch.text, strict), (text) =>
                parseRating(text, this.config.ratingBounds),
            ),
        );
    }

    /**
     * Analyses listings under the configured worker limit. A failure is recorded against its listing
     * and never stops the others; on abort, listings not yet started are left out.
     */
    async analyzeAll(listings: readonly ListingRecord[], signal?: AbortSignal): Promise<AnalysisReport> {
        log.info(`${LOG_PREFIX} Analysing ${listings.length} listings`, {
            model: this.config.model,
            concurrency: this.config.maxConcurrency,
        });

        const outcomes = await mapConcurrent(
            listings,
            this.config.maxConcurrency,
            async (listing): Promise<ListingAnalysis> => {
                const analysis: ListingAnalysis = { listingId: listing.id, summary: null, rating: null, failures: [] };
                const record = (task: Task, error: unknown): void => {
                    const reason = error instanceof AnalysisError ? error.reason : 'llm';
                    analysis.failures.push({ task, reason, message: errorMessage(error) });
                    log.error(`${LOG_PREFIX} ${task} failed for listing ${listing.id}: ${errorMessage(error)}`, { reason });
                };

                const [summary, rating] = await Promise.allSettled([this.summarize(listing), this.rate(listing)]);
                if (summary.status === 'fulfilled') analysis.summary = summary.value;
                else record('summary', summary.reason);
                if (rating.status === 'fulfilled') analysis.rating = rating.value;
                else record('rating', rating.reason);
                return analysis;
            },
            signal,
        );

        const results = outcomes
            .filter((outcome): outcome is ListingAnalysis => outcome !== undefined)
            .sort((a, b) => (a.listingId < b.listingId ? -1 : a.listingId > b.listingId ? 1 : 0));
        const aborted = results.length < listings.length;

        log.info(`${LOG_PREFIX} Done.`, {
            analysed: results.length,
            failed: results.filter((result) => result.failures.length > 0).length,
            summaryCache: this.summaries.counters,
            ratingCache: this.ratings.counters,
            aborted,
        });
        return { results, aborted };
    }

    private keyFor(listing: ListingRecord, batch: PreparedBatch, task: Task): CacheKey {
        return {
            listingId: listing.id,
            fingerprint: batch.fingerprint,
            promptVersion: this.versions[task],
            model: this.config.model,
        };
    }

    /** Reviews and page details are fetched once per listing per pipeline, shared by summary and rating. */
    private prepare(listing: ListingRecord): Promise<PreparedBatch> {
        const existing = this.batches.get(listing.id);
        if (existing) return existing;

        const fetched = Promise.all([this.fetchReviews(listing), this.fetchDetails(listing)]);
        const pending = fetched.then(([reviews, details]): PreparedBatch => {
            const selected = selectReviewBatch(reviews, this.config.maxReviewsPerListing, this.config.maxReviewChars);
            const context = listingContext(listing, details);
            return {
                reviews: selected,
                text: formatReviewBatch(selected, context),
                fingerprint: fingerprintBatch(selected, context),
            };
        });
        this.batches.set(listing.id, pending);
        return pending;
    }

    private callSource<T>(label: string, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
        return withRetry(() => withTimeout(call, this.options.sourceTimeoutMs, label), { ...this.options.sourceRetry, label });
    }

    private async fetchReviews(listing: ListingRecord): Promise<ReviewRecord[]> {
        const label = `reviews of listing ${listing.id}`;
        try {
            return await this.callSource(label, (signal) => this.options.source.fetchReviews(listing.id, { signal }));
        } catch (error) {
            const attempts = error instanceof RetriesExhaustedError ? error.attempts : 1;
            const unavailable = new SourceUnavailableError(`${label} unavailable: ${errorMessage(error)}`, attempts, {
                cause: error,
            });
            throw new AnalysisError(listing.id, 'source', unavailable.message, { cause: unavailable });
        }
    }

    /** Without page details the search card's text goes to the model instead. */
    private async fetchDetails(listing: ListingRecord): Promise<ListingDetails | null> {
        const label = `details of listing ${listing.id}`;
        try {
            return await this.callSource(label, (signal) => this.options.source.fetchDetails(listing.id, { signal }));
        } catch (error) {
            log.warning(`${LOG_PREFIX} Using search card text for listing ${listing.id}: ${errorMessage(error)}`);
            return null;
        }
    }

    /**
     * One LLM round trip with transport retries, then parsing. A parse failure gets exactly one more
     * attempt with the stricter instruction before it becomes an `AnalysisError`.
     */
    private async ask<R extends AIResult>(
        listing: ListingRecord,
        task: Task,
        buildRequest: (strict: boolean) => LlmRequest,
        parse: (text: string) => R,
    ): Promise<R> {
        let lastParseError: ResponseParseError | null = null;

        for (const strict of [false, true]) {
            const text = await this.complete(listing, task, buildRequest(strict));
            try {
                return parse(text);
            } catch (error) {
                if (!(error instanceof ResponseParseError)) throw error;
                lastParseError = error;
                log.warning(`${LOG_PREFIX} Unusable ${task} response for listing ${listing.id}`, {
                    strict,
                    error: error.message,
                });
            }
        }

        throw new AnalysisError(listing.id, 'parse', `${task}: ${lastParseError?.message ?? 'unparseable response'}`, {
            cause: lastParseError,
        });
    }

    private async complete(listing: ListingRecord, task: Task, request: LlmRequest): Promise<string> {
        const label = `${task} of listing ${listing.id}`;
        try {
            return await withRetry(
                () => withTimeout((signal) => this.options.llm.complete(request, { signal }), this.config.requestTimeoutMs, label),
                { ...this.config.retry, label },
            );
        } catch (error) {
            throw new AnalysisError(listing.id, 'llm', `${label}: ${errorMessage(error)}`, { cause: error });
        }
    }
}
