import { log } from 'apify';

import { NO_REVIEWS_TEXT } from './constants.js';
import type { ListingContext, ListingDetails, ListingRecord, Money, ReviewRecord } from './types.js';

export const normalizeCurrency = (currency: string): string => currency.trim().toUpperCase();

const toCents = (amount: number): number => Math.round(amount * 100);

/** Equal when both the normalized currency and the amount at cent precision match. */
export const sameMoney = (a: Money | null, b: Money | null): boolean => {
    if (a === null || b === null) return a === b;
    return normalizeCurrency(a.currency) === normalizeCurrency(b.currency) && toCents(a.amount) === toCents(b.amount);
};

/** Parses platform price labels such as "€1,234", "1.234,50 €" or 85 into a number. */
export const parsePriceAmount = (value: string | number | null | undefined): number | null => {
    if (value == null) return null;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;

    const digits = value.replace(/[^\d.,]/g, '');
    if (!digits) return null;

    const lastComma = digits.lastIndexOf(',');
    const lastDot = digits.lastIndexOf('.');
    let normalized: string;
    if (lastComma > lastDot) {
        // "1.234,50": comma is the decimal separator only when followed by 1-2 digits
        const decimals = digits.length - lastComma - 1;
        normalized = decimals > 0 && decimals <= 2 ? digits.replace(/\./g, '').replace(',', '.') : digits.replace(/,/g, '');
    } else {
        normalized = digits.replace(/,/g, '');
    }

    const amount = Number.parseFloat(normalized);
    return Number.isNaN(amount) ? null : amount;
};

export const formatReview = (review: ReviewRecord): string =>
    `${review.date ?? 'N/A'} ${review.text} Rating: ${review.rating ?? 'N/A'}`;

/**
 * Renders a review batch plus the listing's own text into the block handed to the model.
 * A listing without reviews still gets an entry so the model sees its description.
 */
export const formatReviewBatch = (reviews: readonly ReviewRecord[], context: ListingContext): string => {
    const reviewsText = reviews.length > 0 ? reviews.map(formatReview).join('; ') : NO_REVIEWS_TEXT;
    return [
        reviewsText,
        `Highlights: ${context.highlights.join(', ')}`,
        `Location Description: ${context.locationDescription}`,
        `Description: ${context.description}`,
    ].join('\n');
};

/** Page details win where they have text; otherwise the search card's fields are used. */
export const listingContext = (listing: ListingRecord, details: ListingDetails | null): ListingContext => ({
    description: details?.description || listing.description,
    highlights: details && details.highlights.length > 0 ? details.highlights : listing.highlights,
    locationDescription: details?.locationDescription ?? '',
});

/**
 * Keeps the most recent reviews (undated ones last) until either the count or the character
 * budget runs out. Ties are broken by review id so the selection is stable.
 */
export const selectReviewBatch = (
    reviews: readonly ReviewRecord[],
    maxReviews: number,
    maxChars: number,
): ReviewRecord[] => {
    const ordered = [...reviews].sort((a, b) => {
        if (a.date !== b.date) {
            if (a.date === null) return 1;
            if (b.date === null) return -1;
            return a.date > b.date ? -1 : 1;
        }
        return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    });

    const batch: ReviewRecord[] = [];
    let used = 0;
    for (const review of ordered) {
        if (batch.length >= maxReviews) break;
        const size = formatReview(review).length;
        if (batch.length > 0 && used + size > maxChars) break;
        batch.push(review);
        used += size;
    }

    if (batch.length < reviews.length) {
        log.debug(`[reviews] Trimmed review batch from ${reviews.length} to ${batch.length}`, { maxReviews, maxChars });
    }
    return batch;
};
