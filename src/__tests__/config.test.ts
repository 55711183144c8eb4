import { describe, expect, it } from 'vitest';

import { parseInput, redactInput } from '../config.js';
import { DEFAULT_RESULT_CAP, INPUT_DEFAULTS, LLM_RETRY, SOURCE_RETRY } from '../constants.js';
import { ConfigInvalidError } from '../errors.js';

const env = { AIRBNB_API_KEY: 'test-secret', OPENAI_API_KEY: 'test-secret' };
const boundingBox = { north: 52.6, south: 52.3, east: 13.8, west: 13.1 };

const issuesOf = (raw: unknown, environment: Record<string, string | undefined> = env): string[] => {
    try {
        parseInput(raw, environment);
    } catch (error) {
        if (error instanceof ConfigInvalidError) return error.issues;
        throw error;
    }
    return [];
};

describe('parseInput', () => {
    it('should apply defaults to a minimal input', () => {
        const settings = parseInput({ boundingBox }, env);

        expect(settings.searchId).toBe('default');
        expect(settings.area).toEqual(boundingBox);
        expect(settings.discovery).toEqual({
            checkIn: null,
            checkOut: null,
            currency: 'EUR',
            price: { min: 0, max: 5000 },
            occupants: 1,
            resultCap: DEFAULT_RESULT_CAP,
            minTileSizeDeg: 0.005,
            maxConcurrency: 4,
        });
        expect(settings.sourceRetry).toEqual(SOURCE_RETRY);
        expect(settings.analysis).toMatchObject({
            focusAreas: INPUT_DEFAULTS.focusAreas,
            model: 'gpt-4o-mini',
            ratingBounds: { min: 1, max: 5 },
            requestTimeoutMs: 60_000,
            retry: LLM_RETRY,
        });
        expect(settings.openai).toEqual({ apiKey: 'test-secret' });
    });

    it('should prefer keys given in the input over the environment', () => {
        const settings = parseInput({ boundingBox, airbnbApiKey: 'input-key', openaiBaseUrl: 'http://localhost:8080/v1' }, env);

        expect(settings.airbnbApiKey).toBe('input-key');
        expect(settings.openai).toEqual({ apiKey: 'test-secret', baseURL: 'http://localhost:8080/v1' });
    });

    it('should read decimal settings given as text', () => {
        const settings = parseInput({ boundingBox, minTileSizeDeg: '0.01', temperature: '0.3' }, env);

        expect(settings.discovery.minTileSizeDeg).toBe(0.01);
        expect(settings.analysis?.temperature).toBe(0.3);
    });

    it('should normalize the currency', () => {
        expect(parseInput({ boundingBox, currency: 'usd' }, env).discovery.currency).toBe('USD');
    });

    it('should skip analysis settings and the LLM key when analysis is disabled', () => {
        const settings = parseInput({ boundingBox, enableAnalysis: false }, { AIRBNB_API_KEY: 'test-secret' });

        expect(settings.analysis).toBeNull();
        expect(settings.openai).toBeNull();
    });

    it('should report every problem at once', () => {
        expect(
            issuesOf({
                boundingBox: { north: 1, south: 2, east: 1, west: 0 },
                minPrice: 300,
                maxPrice: 100,
                checkIn: '2026-05-03',
                minAiRating: 5,
                maxAiRating: 1,
            }),
        ).toEqual([
            'boundingBox: north must be greater than south',
            'minPrice must not exceed maxPrice',
            'checkIn and checkOut must be given together',
            'minAiRating must be lower than maxAiRating',
        ]);
    });

    it('should reject schema violations before semantic checks', () => {
        expect(issuesOf({ boundingBox, focusAreas: [], currency: 'euro' })).toEqual([
            'currency: expected a 3-letter currency code',
            'focusAreas: Array must contain at least 1 element(s)',
        ]);
    });

    it('should reject a missing bounding box', () => {
        expect(issuesOf({})).toEqual(['boundingBox: Required']);
    });

    it('should require the API keys', () => {
        expect(issuesOf({ boundingBox }, {})).toEqual([
            'airbnbApiKey is required (input or AIRBNB_API_KEY)',
            'openaiApiKey is required when analysis is enabled (input or OPENAI_API_KEY)',
        ]);
    });

    it('should reject duplicate focus areas and templates that reference missing ones', () => {
        expect(
            issuesOf({
                boundingBox,
                focusAreas: ['Noise', 'noise'],
                summaryQuestions: ['Focus on {{ focus_3 }}'],
            }),
        ).toEqual([
            'focusAreas must be unique',
            'summary template references focus area 3 but only 2 are configured',
        ]);
    });

    it('should compare focus areas the way summary headings are matched', () => {
        expect(issuesOf({ boundingBox, focusAreas: ['Noise!', 'noise', '清洁', '**'] })).toEqual([
            'focusAreas must contain letters or digits',
            'focusAreas must be unique',
        ]);
        expect(issuesOf({ boundingBox, focusAreas: ['清洁', '交通'] })).toEqual([]);
    });

    it('should reject a checkOut that is not after checkIn', () => {
        expect(issuesOf({ boundingBox, checkIn: '2026-05-03', checkOut: '2026-05-03' })).toEqual([
            'checkOut must be after checkIn',
        ]);
    });
});

describe('redactInput', () => {
    it('should hide credentials', () => {
        const redacted = redactInput(parseInput({ boundingBox }, env));

        expect(redacted).toMatchObject({ airbnbApiKey: '***', openaiApiKey: '***' });
        expect(JSON.stringify(redacted)).not.toContain('test-secret');
    });
});
