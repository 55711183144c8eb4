import { log } from 'apify';

import type { ListingSet, Snapshot, SnapshotIndexEntry, TimelinePoint } from './types.js';

const LOG_PREFIX = '[snapshots]';

/** The subset of an Apify `KeyValueStore` the core persists through. */
export interface KeyValueStoreLike {
    getValue<T>(key: string): Promise<T | null>;
    setValue<T>(key: string, value: T): Promise<void>;
}

const indexKey = (searchId: string): string => `SNAPSHOTS-${searchId}`;
const snapshotKey = (snapshotId: string): string => `SNAPSHOT-${snapshotId}`;

export const snapshotIdFor = (searchId: string, takenAt: string): string =>
    `${searchId}-${takenAt.replace(/[^0-9A-Za-z]/g, '')}`;

/**
 * Append-only history of discovery runs for one search. Snapshots are written once and never
 * edited or deleted; the index lists them in commit order.
 */
export class SnapshotStore {
    private pending: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly store: KeyValueStoreLike,
        readonly searchId: string,
    ) {}

    async list(): Promise<SnapshotIndexEntry[]> {
        return (await this.store.getValue<SnapshotIndexEntry[]>(indexKey(this.searchId))) ?? [];
    }

    async get(snapshotId: string): Promise<Snapshot | null> {
        return this.store.getValue<Snapshot>(snapshotKey(snapshotId));
    }

    async latest(): Promise<Snapshot | null> {
        const entries = await this.list();
        const last = entries.at(-1);
        return last ? this.get(last.id) : null;
    }

    /** Commits are serialized so concurrent callers cannot interleave index updates. */
    commit(listingSet: ListingSet, takenAt: Date = new Date()): Promise<Snapshot> {
        const next = this.pending.then(() => this.append(listingSet, takenAt.toISOString()));
        // keep the chain alive after a failed commit; the caller still receives the rejection
        this.pending = next.catch(() => undefined);
        return next;
    }

    async timeline(listingId: string): Promise<TimelinePoint[]> {
        const points: TimelinePoint[] = [];
        for (const entry of await this.list()) {
            const snapshot = await this.get(entry.id);
            if (!snapshot) {
                log.warning(`${LOG_PREFIX} Snapshot ${entry.id} is listed in the index but missing from the store`);
                continue;
            }
            const listing = snapshot.listings.find((candidate) => candidate.id === listingId);
            points.push({
                snapshotId: snapshot.id,
                takenAt: snapshot.takenAt,
                present: listing !== undefined,
                price: listing?.price ?? null,
                available: listing?.available ?? null,
                rating: listing?.rating ?? null,
            });
        }
        return points;
    }

    private async append(listingSet: ListingSet, takenAt: string): Promise<Snapshot> {
        const entries = await this.list();
        const baseId = snapshotIdFor(this.searchId, takenAt);
        let id = baseId;
        for (let n = 2; entries.some((entry) => entry.id === id); n++) id = `${baseId}-${n}`;

        const snapshot: Snapshot = Object.freeze({
            id,
            searchId: this.searchId,
            takenAt,
            complete: listingSet.complete,
            listings: Object.freeze(listingSet.listings.map((listing) => Object.freeze({ ...listing }))),
            failures: Object.freeze(listingSet.failures.map((failure) => Object.freeze({ ...failure }))),
        });

        await this.store.setValue(snapshotKey(id), snapshot);
        await this.store.setValue(indexKey(this.searchId), [
            ...entries,
            { id, takenAt, listingCount: snapshot.listings.length, complete: snapshot.complete },
        ]);

        log.info(`${LOG_PREFIX} Committed snapshot ${id}`, {
            listings: snapshot.listings.length,
            complete: snapshot.complete,
        });
        return snapshot;
    }
}
