import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { Settings } from '../config.js';
import { runSearch, toDatasetItems } from '../run.js';
import type { ListingRecord } from '../types.js';
import { analysisConfig, answeringLlm, constraints, makeListing, makeReview, MemoryStore, NO_WAIT, pointSource } from './fakes.js';

const FOCUS = ['cleanliness', 'location'];

const settings = (overrides: Partial<Settings> = {}): Settings => ({
    searchId: 'lisbon',
    storeName: 'test-store',
    area: { north: 1, south: 0, east: 1, west: 0 },
    discovery: constraints(),
    sourceRetry: NO_WAIT,
    sourceTimeoutMs: 1_000,
    analysis: analysisConfig({ focusAreas: FOCUS }),
    airbnbApiKey: 'test-secret',
    locale: 'en',
    openai: { apiKey: 'test-secret' },
    proxyConfiguration: undefined,
    ...overrides,
});

const priced = (id: string, amount: number): ListingRecord =>
    makeListing(id, { lat: 0.5, lng: 0.5, price: { amount, currency: 'EUR' } });

const reviews = { A: [makeReview('r1', 'A', { text: 'Bright and clean' })] };

describe('runSearch', () => {
    beforeEach(() => {
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should commit a snapshot, diff it against the previous run and analyse listings', async () => {
        const store = new MemoryStore();
        await runSearch({
            settings: settings(),
            source: pointSource([priced('A', 100)], reviews),
            llm: answeringLlm(FOCUS),
            store,
            now: () => new Date('2026-05-01T00:00:00.000Z'),
        });
        const llm = answeringLlm(FOCUS);

        const output = await runSearch({
            settings: settings(),
            source: pointSource([priced('A', 80), priced('B', 60)], reviews),
            llm,
            store,
            now: () => new Date('2026-05-02T00:00:00.000Z'),
        });

        expect(output.report).toEqual({
            searchId: 'lisbon',
            snapshotId: 'lisbon-20260502T000000000Z',
            previousSnapshotId: 'lisbon-20260501T000000000Z',
            complete: true,
            aborted: false,
            listingCount: 2,
            tileFailures: [],
            floorTiles: 0,
            delta: { new: 1, removed: 0, changed: 1, unchanged: 0, priceDrops: 1, priceRises: 0 },
            analysis: { analysed: 2, failed: [] },
        });
        // A kept its reviews, so only B reaches the model
        expect(llm.requests).toHaveLength(2);
    });

    it('should skip analysis when no LLM client is given', async () => {
        const output = await runSearch({
            settings: settings(),
            source: pointSource([priced('A', 100)]),
            llm: null,
            store: new MemoryStore(),
        });

        expect(output.analysis).toBeNull();
        expect(output.report.analysis).toBeNull();
        expect(log.warning).toHaveBeenCalledWith('Skipping review analysis', { aborted: false, hasLlmClient: false });
    });

    it('should commit what was found and report an aborted run', async () => {
        const controller = new AbortController();
        controller.abort();
        const store = new MemoryStore();

        const output = await runSearch({
            settings: settings(),
            source: pointSource([priced('A', 100)]),
            llm: answeringLlm(FOCUS),
            store,
            signal: controller.signal,
        });

        expect(output.report).toMatchObject({ aborted: true, complete: false, listingCount: 0, analysis: null });
        expect(await store.getValue('SNAPSHOTS-lisbon')).toHaveLength(1);
    });
});

describe('toDatasetItems', () => {
    beforeEach(() => {
        vi.spyOn(log, 'info').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should emit one row per listing with its status, changes and analysis', async () => {
        const output = await runSearch({
            settings: settings(),
            source: pointSource([priced('A', 100)], reviews),
            llm: answeringLlm(FOCUS, 5),
            store: new MemoryStore(),
            now: () => new Date('2026-05-01T00:00:00.000Z'),
        });

        const [row] = toDatasetItems(output);

        expect(row).toMatchObject({
            id: 'A',
            searchId: 'lisbon',
            snapshotId: 'lisbon-20260501T000000000Z',
            status: 'new',
            changes: [],
            aiRating: 5,
            aiRatingRationale: 'Consistent praise.',
            analysisFailures: [],
            possiblyIncomplete: false,
        });
        expect(row.summary?.map((section) => section.focus)).toEqual(FOCUS);
    });
});
