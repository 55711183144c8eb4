import { createHash } from 'node:crypto';

import { log } from 'apify';
import type { z } from 'zod';

import { MEMORY_CACHE_ENTRIES } from './constants.js';
import { CacheCorruptionError, errorMessage } from './errors.js';
import type { KeyValueStoreLike } from './history.js';
import type { AIResult, ListingContext, ReviewRecord } from './types.js';

const LOG_PREFIX = '[review-cache]';

export interface CacheKey {
    listingId: string;
    fingerprint: string;
    promptVersion: string;
    model: string;
}

const sha256 = (input: string): string => createHash('sha256').update(input).digest('hex');

/**
 * Hash of a review batch: the reviews ordered by id, each contributing its id and text, plus the
 * listing text that is sent alongside them. Fetch order does not change the fingerprint.
 */
export const fingerprintBatch = (reviews: readonly ReviewRecord[], context?: ListingContext): string => {
    const ordered = [...reviews].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    const hash = createHash('sha256');
    for (const review of ordered) {
        hash.update(`${review.id}\u0000${review.text}\u0000`);
    }
    if (context) {
        hash.update(`\u0001${context.description}\u0000${context.highlights.join('\u0000')}`);
        hash.update(`\u0001${context.locationDescription}`);
    }
    return hash.digest('hex');
};

/** Short content hash used as a prompt template version. */
export const contentVersion = (...parts: unknown[]): string => sha256(JSON.stringify(parts)).slice(0, 16);

export const cacheKeyId = (key: CacheKey): string =>
    sha256(JSON.stringify([key.listingId, key.fingerprint, key.promptVersion, key.model]));

export interface ReviewCacheOptions<R extends AIResult> {
    store: KeyValueStoreLike;
    kind: R['kind'];
    schema: z.ZodType<R, z.ZodTypeDef, unknown>;
    maxMemoryEntries?: number;
}

/**
 * Content-addressed store of AI results. Each key is computed at most once per process: concurrent
 * callers share the in-flight promise, later callers read the persisted entry. The memory layer is
 * bounded and may evict; a valid persisted entry is never rewritten, so an evicted key resolves to
 * the same stored value.
 */
export class ReviewCache<R extends AIResult> {
    private readonly inFlight = new Map<string, Promise<R>>();
    private readonly memory = new Map<string, R>();
    private readonly store: KeyValueStoreLike;
    private readonly schema: z.ZodType<R, z.ZodTypeDef, unknown>;
    private readonly maxMemoryEntries: number;
    readonly kind: R['kind'];
    readonly counters = { hits: 0, misses: 0, corrupted: 0 };

    constructor(options: ReviewCacheOptions<R>) {
        this.store = options.store;
        this.schema = options.schema;
        this.kind = options.kind;
        this.maxMemoryEntries = options.maxMemoryEntries ?? MEMORY_CACHE_ENTRIES;
    }

    storageKey(key: CacheKey): string {
        return `AI-${this.kind}-${cacheKeyId(key)}`;
    }

    getOrCompute(key: CacheKey, compute: () => Promise<R>): Promise<R> {
        const id = this.storageKey(key);
        const running = this.inFlight.get(id);
        if (running) return running;

        const promise = this.resolve(id, key, compute).finally(() => {
            this.inFlight.delete(id);
        });
        this.inFlight.set(id, promise);
        return promise;
    }

    private async resolve(id: string, key: CacheKey, compute: () => Promise<R>): Promise<R> {
        const remembered = this.memory.get(id);
        if (remembered) {
            this.counters.hits++;
            this.remember(id, remembered);
            return remembered;
        }

        const stored = await this.load(id);
        if (stored) {
            this.counters.hits++;
            log.debug(`${LOG_PREFIX} Hit for ${this.kind} of listing ${key.listingId}`);
            this.remember(id, stored);
            return stored;
        }

        this.counters.misses++;
        log.debug(`${LOG_PREFIX} Miss for ${this.kind} of listing ${key.listingId}`, { model: key.model });
        const result = await compute();
        await this.store.setValue(id, result);
        this.remember(id, result);
        return result;
    }

    private async load(id: string): Promise<R | null> {
        let raw: unknown;
        try {
            raw = await this.store.getValue<unknown>(id);
        } catch (error) {
            return this.discard(new CacheCorruptionError(id, `Stored ${this.kind} entry could not be read: ${errorMessage(error)}`));
        }
        if (raw === null) return null;

        const parsed = this.schema.safeParse(raw);
        if (parsed.success) return parsed.data;

        return this.discard(new CacheCorruptionError(id, `Stored ${this.kind} entry failed validation: ${parsed.error.message}`));
    }

    private discard(corruption: CacheCorruptionError): null {
        this.counters.corrupted++;
        log.warning(`${LOG_PREFIX} ${corruption.message}, recomputing`, { key: corruption.key });
        return null;
    }

    private remember(id: string, result: R): void {
        this.memory.delete(id);
        this.memory.set(id, result);
        while (this.memory.size > this.maxMemoryEntries) {
            const oldest = this.memory.keys().next();
            if (oldest.done) break;
            this.memory.delete(oldest.value);
        }
    }
}
