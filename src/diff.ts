import { log } from 'apify';

import type { Delta, DeltaEntry, DeltaStats, ListingChange, ListingRecord, Snapshot } from './types.js';
import { normalizeCurrency, sameMoney } from './utils.js';

const compareIds = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Field-level changes between two observations of one listing, always in price, available, rating order. */
export const compareListings = (before: ListingRecord, after: ListingRecord): ListingChange[] => {
    const changes: ListingChange[] = [];
    if (!sameMoney(before.price, after.price)) {
        changes.push({
            field: 'price',
            from: before.price && { amount: before.price.amount, currency: normalizeCurrency(before.price.currency) },
            to: after.price && { amount: after.price.amount, currency: normalizeCurrency(after.price.currency) },
        });
    }
    if (before.available !== after.available) {
        changes.push({ field: 'available', from: before.available, to: after.available });
    }
    if (before.rating !== after.rating) {
        changes.push({ field: 'rating', from: before.rating, to: after.rating });
    }
    return changes;
};

/**
 * Classifies every id present on either side. Swapping the arguments swaps `new` and `removed`
 * and the `from`/`to` of each change; the set of changed fields stays the same.
 */
export const diffListings = (before: readonly ListingRecord[], after: readonly ListingRecord[]): DeltaEntry[] => {
    const beforeById = new Map(before.map((listing) => [listing.id, listing]));
    const afterById = new Map(after.map((listing) => [listing.id, listing]));
    const ids = [...new Set([...beforeById.keys(), ...afterById.keys()])].sort(compareIds);

    return ids.map((id): DeltaEntry => {
        const prev = beforeById.get(id) ?? null;
        const next = afterById.get(id) ?? null;
        if (prev === null) return { id, status: 'new', before: null, after: next, changes: [] };
        if (next === null) return { id, status: 'removed', before: prev, after: null, changes: [] };

        const changes = compareListings(prev, next);
        return { id, status: changes.length > 0 ? 'changed' : 'unchanged', before: prev, after: next, changes };
    });
};

export const diffSnapshots = (from: Snapshot | null, to: Snapshot | null): Delta => ({
    fromSnapshot: from?.id ?? null,
    toSnapshot: to?.id ?? null,
    entries: diffListings(from?.listings ?? [], to?.listings ?? []),
});

export const deltaStats = (delta: Delta): DeltaStats => {
    const stats: DeltaStats = { new: 0, removed: 0, changed: 0, unchanged: 0, priceDrops: 0, priceRises: 0 };
    for (const entry of delta.entries) {
        stats[entry.status]++;
        for (const change of entry.changes) {
            if (change.field !== 'price' || change.from === null || change.to === null) continue;
            if (change.from.currency !== change.to.currency) continue;
            if (change.to.amount < change.from.amount) stats.priceDrops++;
            else if (change.to.amount > change.from.amount) stats.priceRises++;
        }
    }
    return stats;
};

export function logDeltaStats(delta: Delta): DeltaStats {
    const stats = deltaStats(delta);
    log.info('Snapshot delta', { from: delta.fromSnapshot, to: delta.toSnapshot, ...stats });
    return stats;
}
