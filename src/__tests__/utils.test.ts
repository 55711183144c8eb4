import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { NO_REVIEWS_TEXT } from '../constants.js';
import { formatReview, formatReviewBatch, listingContext, parsePriceAmount, sameMoney, selectReviewBatch } from '../utils.js';
import { makeListing, makeReview } from './fakes.js';

describe('parsePriceAmount', () => {
    it('should return a number given a number', () => {
        expect(parsePriceAmount(85)).toBe(85);
    });

    it('should strip currency symbols and thousands separators', () => {
        expect(parsePriceAmount('€1,234')).toBe(1234);
        expect(parsePriceAmount('$85 night')).toBe(85);
    });

    it('should read a decimal comma', () => {
        expect(parsePriceAmount('1.234,50 €')).toBe(1234.5);
        expect(parsePriceAmount('12,5')).toBe(12.5);
    });

    it('should return null for missing or non-numeric values', () => {
        expect(parsePriceAmount(undefined)).toBeNull();
        expect(parsePriceAmount('price on request')).toBeNull();
        expect(parsePriceAmount(Number.NaN)).toBeNull();
    });
});

describe('sameMoney', () => {
    it('should compare amounts at cent precision and currencies case-insensitively', () => {
        expect(sameMoney({ amount: 10.001, currency: 'eur' }, { amount: 10, currency: 'EUR' })).toBe(true);
        expect(sameMoney({ amount: 10.01, currency: 'EUR' }, { amount: 10, currency: 'EUR' })).toBe(false);
        expect(sameMoney({ amount: 10, currency: 'USD' }, { amount: 10, currency: 'EUR' })).toBe(false);
    });

    it('should treat two missing prices as equal', () => {
        expect(sameMoney(null, null)).toBe(true);
        expect(sameMoney(null, { amount: 1, currency: 'EUR' })).toBe(false);
    });
});

describe('formatReviewBatch', () => {
    const context = { highlights: ['Wifi', 'Kitchen'], locationDescription: 'Old town', description: 'Loft' };

    it('should join reviews and append the listing text', () => {
        const reviews = [
            makeReview('r1', '1', { text: 'Great stay', date: '2026-01-02', rating: 5 }),
            makeReview('r2', '1', { text: 'Noisy', date: null, rating: null }),
        ];

        expect(formatReviewBatch(reviews, context)).toBe(
            '2026-01-02 Great stay Rating: 5; N/A Noisy Rating: N/A\nHighlights: Wifi, Kitchen\nLocation Description: Old town\nDescription: Loft',
        );
    });

    it('should use the placeholder text when there are no reviews', () => {
        expect(formatReviewBatch([], context)).toBe(
            `${NO_REVIEWS_TEXT}\nHighlights: Wifi, Kitchen\nLocation Description: Old town\nDescription: Loft`,
        );
    });
});

describe('listingContext', () => {
    const listing = makeListing('1', { highlights: ['Wifi'], description: 'Entire apartment' });

    it('should prefer the page details', () => {
        const details = { listingId: '1', description: 'Sunny loft', highlights: ['Self check-in'], locationDescription: 'Near the river' };

        expect(listingContext(listing, details)).toEqual({
            description: 'Sunny loft',
            highlights: ['Self check-in'],
            locationDescription: 'Near the river',
        });
    });

    it('should fall back to the search card when details are missing or empty', () => {
        const empty = { listingId: '1', description: '', highlights: [], locationDescription: '' };

        expect(listingContext(listing, null)).toEqual({ description: 'Entire apartment', highlights: ['Wifi'], locationDescription: '' });
        expect(listingContext(listing, empty)).toEqual({ description: 'Entire apartment', highlights: ['Wifi'], locationDescription: '' });
    });
});

describe('selectReviewBatch', () => {
    beforeEach(() => {
        vi.spyOn(log, 'debug').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should keep the newest reviews first and undated ones last', () => {
        const reviews = [
            makeReview('b', '1', { date: null }),
            makeReview('a', '1', { date: '2026-01-01' }),
            makeReview('c', '1', { date: '2026-03-01' }),
        ];

        expect(selectReviewBatch(reviews, 10, 10_000).map((review) => review.id)).toEqual(['c', 'a', 'b']);
    });

    it('should stop at the review count limit', () => {
        const reviews = ['1', '2', '3'].map((id) => makeReview(id, 'x'));

        expect(selectReviewBatch(reviews, 2, 10_000).map((review) => review.id)).toEqual(['1', '2']);
    });

    it('should stop at the character budget but always keep one review', () => {
        const long = makeReview('long', 'x', { text: 'a'.repeat(100) });
        const short = makeReview('short', 'x', { text: 'b' });
        const budget = formatReview(long).length;

        expect(selectReviewBatch([long, short], 10, budget).map((review) => review.id)).toEqual(['long']);
        expect(selectReviewBatch([long], 10, 5).map((review) => review.id)).toEqual(['long']);
    });
});
