import { z } from 'zod';

import {
    DEFAULT_ANALYSIS_CONCURRENCY,
    DEFAULT_MAX_REVIEW_CHARS,
    DEFAULT_MAX_REVIEWS,
    DEFAULT_MIN_TILE_SIZE_DEG,
    DEFAULT_RATING_BOUNDS,
    DEFAULT_RATING_TEMPLATE,
    DEFAULT_RESULT_CAP,
    DEFAULT_STORE_NAME,
    DEFAULT_SUMMARY_TEMPLATE,
    DEFAULT_TILE_CONCURRENCY,
    INPUT_DEFAULTS,
    LLM_RETRY,
    LLM_TIMEOUT_MS,
    MAX_FOCUS_AREAS,
    SOURCE_RETRY,
    SOURCE_TIMEOUT_MS,
} from './constants.js';
import { ConfigInvalidError } from './errors.js';
import { validateTile } from './geo.js';
import { templateIssues } from './prompts.js';
import { normalizeFocus } from './responses.js';
import type { AnalysisConfig, DiscoveryConstraints, GeoTile, RetryPolicy } from './types.js';
import { normalizeCurrency } from './utils.js';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const inputSchema = z.object({
    searchId: z
        .string()
        .regex(/^[A-Za-z0-9_-]{1,64}$/, 'use letters, digits, "-" or "_" (max 64)')
        .default(INPUT_DEFAULTS.searchId),
    storeName: z.string().min(1).default(DEFAULT_STORE_NAME),
    boundingBox: z.object({
        north: z.number(),
        south: z.number(),
        east: z.number(),
        west: z.number(),
    }),
    checkIn: isoDate.nullish(),
    checkOut: isoDate.nullish(),
    currency: z
        .string()
        .regex(/^[A-Za-z]{3}$/, 'expected a 3-letter currency code')
        .default(INPUT_DEFAULTS.currency),
    minPrice: z.number().min(0).default(INPUT_DEFAULTS.minPrice),
    maxPrice: z.number().positive().default(INPUT_DEFAULTS.maxPrice),
    occupants: z.number().int().min(1).default(INPUT_DEFAULTS.occupants),
    resultCap: z.number().int().min(1).default(DEFAULT_RESULT_CAP),
    // The Console sends these two as text fields
    minTileSizeDeg: z.coerce.number().positive().default(DEFAULT_MIN_TILE_SIZE_DEG),
    maxConcurrency: z.number().int().min(1).max(32).default(DEFAULT_TILE_CONCURRENCY),
    proxyConfiguration: z
        .object({
            useApifyProxy: z.boolean().optional(),
            apifyProxyGroups: z.array(z.string()).optional(),
            apifyProxyCountry: z.string().optional(),
            proxyUrls: z.array(z.string()).optional(),
        })
        .optional(),
    airbnbApiKey: z.string().optional(),
    locale: z.string().default('en'),

    enableAnalysis: z.boolean().default(true),
    focusAreas: z
        .array(z.string().trim().min(1, 'focus area names must not be empty'))
        .min(1)
        .max(MAX_FOCUS_AREAS)
        .default(INPUT_DEFAULTS.focusAreas),
    model: z.string().min(1).default(INPUT_DEFAULTS.model),
    maxTokens: z.number().int().min(1).max(16_384).default(INPUT_DEFAULTS.maxTokens),
    temperature: z.coerce.number().min(0).max(2).default(INPUT_DEFAULTS.temperature),
    summaryRolePrompt: z.string().default(DEFAULT_SUMMARY_TEMPLATE.rolePrompt),
    summaryQuestions: z.array(z.string()).default(DEFAULT_SUMMARY_TEMPLATE.questions),
    ratingRolePrompt: z.string().default(DEFAULT_RATING_TEMPLATE.rolePrompt),
    ratingQuestions: z.array(z.string()).default(DEFAULT_RATING_TEMPLATE.questions),
    minAiRating: z.number().default(DEFAULT_RATING_BOUNDS.min),
    maxAiRating: z.number().default(DEFAULT_RATING_BOUNDS.max),
    analysisConcurrency: z.number().int().min(1).max(16).default(DEFAULT_ANALYSIS_CONCURRENCY),
    llmTimeoutSecs: z.number().positive().default(LLM_TIMEOUT_MS / 1000),
    maxReviewsPerListing: z.number().int().min(1).default(DEFAULT_MAX_REVIEWS),
    maxReviewChars: z.number().int().min(500).default(DEFAULT_MAX_REVIEW_CHARS),
    openaiApiKey: z.string().optional(),
    openaiBaseUrl: z.string().url().optional(),
});

export type Input = z.infer<typeof inputSchema>;

export interface Settings {
    searchId: string;
    storeName: string;
    area: GeoTile;
    discovery: DiscoveryConstraints;
    sourceRetry: RetryPolicy;
    sourceTimeoutMs: number;
    analysis: AnalysisConfig | null;
    airbnbApiKey: string;
    locale: string;
    openai: { apiKey: string; baseURL?: string } | null;
    proxyConfiguration: Input['proxyConfiguration'];
}

type Env = Record<string, string | undefined>;

const formatIssue = (issue: z.ZodIssue): string => `${issue.path.join('.') || 'input'}: ${issue.message}`;

/**
 * Validates the Actor input and turns it into the settings every component is built from.
 * All problems are collected and reported together before any request is made.
 */
export const parseInput = (raw: unknown, env: Env = process.env): Settings => {
    const parsed = inputSchema.safeParse(raw ?? {});
    if (!parsed.success) throw new ConfigInvalidError(parsed.error.issues.map(formatIssue));
    const input = parsed.data;

    const analysis: AnalysisConfig = {
        focusAreas: input.focusAreas,
        model: input.model,
        maxTokens: input.maxTokens,
        temperature: input.temperature,
        summaryTemplate: { rolePrompt: input.summaryRolePrompt, questions: input.summaryQuestions },
        ratingTemplate: { rolePrompt: input.ratingRolePrompt, questions: input.ratingQuestions },
        ratingBounds: { min: input.minAiRating, max: input.maxAiRating },
        maxConcurrency: input.analysisConcurrency,
        requestTimeoutMs: Math.round(input.llmTimeoutSecs * 1000),
        retry: LLM_RETRY,
        maxReviewsPerListing: input.maxReviewsPerListing,
        maxReviewChars: input.maxReviewChars,
    };

    const issues = validateTile(input.boundingBox).map((issue) => `boundingBox: ${issue}`);
    if (input.minPrice > input.maxPrice) issues.push('minPrice must not exceed maxPrice');
    if (input.checkIn && input.checkOut && input.checkIn >= input.checkOut) issues.push('checkOut must be after checkIn');
    if ((input.checkIn == null) !== (input.checkOut == null)) issues.push('checkIn and checkOut must be given together');

    const airbnbApiKey = input.airbnbApiKey ?? env.AIRBNB_API_KEY ?? '';
    if (!airbnbApiKey) issues.push('airbnbApiKey is required (input or AIRBNB_API_KEY)');

    const openaiApiKey = input.openaiApiKey ?? env.OPENAI_API_KEY ?? '';
    if (input.enableAnalysis) {
        if (!(input.minAiRating < input.maxAiRating)) issues.push('minAiRating must be lower than maxAiRating');
        const focusLabels = input.focusAreas.map(normalizeFocus);
        if (focusLabels.some((label) => label.length === 0)) issues.push('focusAreas must contain letters or digits');
        if (new Set(focusLabels).size !== focusLabels.length) issues.push('focusAreas must be unique');
        issues.push(...templateIssues(analysis));
        if (!openaiApiKey) issues.push('openaiApiKey is required when analysis is enabled (input or OPENAI_API_KEY)');
    }

    if (issues.length > 0) throw new ConfigInvalidError(issues);

    const baseURL = input.openaiBaseUrl ?? env.OPENAI_BASE_URL;
    return {
        searchId: input.searchId,
        storeName: input.storeName,
        area: input.boundingBox,
        discovery: {
            checkIn: input.checkIn ?? null,
            checkOut: input.checkOut ?? null,
            currency: normalizeCurrency(input.currency),
            price: { min: input.minPrice, max: input.maxPrice },
            occupants: input.occupants,
            resultCap: input.resultCap,
            minTileSizeDeg: input.minTileSizeDeg,
            maxConcurrency: input.maxConcurrency,
        },
        sourceRetry: SOURCE_RETRY,
        sourceTimeoutMs: SOURCE_TIMEOUT_MS,
        analysis: input.enableAnalysis ? analysis : null,
        airbnbApiKey,
        locale: input.locale,
        openai: input.enableAnalysis ? { apiKey: openaiApiKey, ...(baseURL ? { baseURL } : {}) } : null,
        proxyConfiguration: input.proxyConfiguration,
    };
};

/** Input for logging: everything except credentials. */
export const redactInput = (settings: Settings): Record<string, unknown> => {
    const { airbnbApiKey, openai, ...rest } = settings;
    return { ...rest, airbnbApiKey: airbnbApiKey ? '***' : 'missing', openaiApiKey: openai?.apiKey ? '***' : 'missing' };
};
