import type { PromptTemplate, RatingBounds, RetryPolicy } from './types.js';

export const RUN_REPORT_KEY = 'RUN_REPORT';

export const DEFAULT_STORE_NAME = 'stay-scout';

export const DEFAULT_RESULT_CAP = 300;
export const DEFAULT_MIN_TILE_SIZE_DEG = 0.005;
export const DEFAULT_TILE_CONCURRENCY = 4;
export const DEFAULT_ANALYSIS_CONCURRENCY = 3;

export const SOURCE_TIMEOUT_MS = 30_000;
export const LLM_TIMEOUT_MS = 60_000;

export const SOURCE_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 5_000, maxDelayMs: 60_000, jitter: 0.2 };
export const LLM_RETRY: RetryPolicy = { maxAttempts: 3, baseDelayMs: 2_000, maxDelayMs: 30_000, jitter: 0.2 };

export const MAX_FOCUS_AREAS = 5;

export const REVIEWS_PAGE_SIZE = 50;
export const DEFAULT_MAX_REVIEWS = 100;
export const DEFAULT_MAX_REVIEW_CHARS = 12_000;

export const NO_REVIEWS_TEXT = 'No reviews available for this property.';

export const MEMORY_CACHE_ENTRIES = 500;

export const INPUT_DEFAULTS = {
    searchId: 'default',
    currency: 'EUR',
    minPrice: 0,
    maxPrice: 5000,
    occupants: 1,
    focusAreas: ['cleanliness', 'transportation', 'bathroom', 'sleeping', 'unexpected points'],
    model: 'gpt-4o-mini',
    maxTokens: 500,
    temperature: 0.1,
};

export const DEFAULT_RATING_BOUNDS: RatingBounds = { min: 1, max: 5 };

export const DEFAULT_SUMMARY_TEMPLATE: PromptTemplate = {
    rolePrompt:
        'You are a review summarizer specializing in extracting concise, focused summaries from short-term ' +
        'rental reviews. Your task is to summarize guest reviews by categorizing feedback into specific areas, ' +
        'providing 1 or 2 bullet points for each category. Each bullet point should be succinct and convey ' +
        'only essential information.',
    questions: [
        'Summarize the following reviews into concise bullet points focusing on these areas:\n{{ focus_list }}',
    ],
};

export const DEFAULT_RATING_TEMPLATE: PromptTemplate = {
    rolePrompt:
        'You are an expert rating analyst. Your task is to provide a numerical rating between {{ min_rating }} ' +
        'and {{ max_rating }} based on the text you are given. Please provide a rating based on the following ' +
        'criteria:\n{{ focus_list }}\nA lack of specific mentions should lower the rating.',
    questions: ['Provide a numerical rating between {{ min_rating }} and {{ max_rating }} based on the text you are given.'],
};

export const STRICT_SUMMARY_INSTRUCTION =
    'Respond with a single JSON object only: {"sections":[{"focus":"<area>","points":["<bullet>"]}]}, ' +
    'one entry per focus area, in the order given.';

export const STRICT_RATING_INSTRUCTION =
    'Respond only by calling the rating function. The "rating" field is required and must be a number ' +
    'between {{ min_rating }} and {{ max_rating }} inclusive.';

export const FETCH_HEADERS = {
    Accept: 'application/json',
    'Accept-Language': 'en-US,en;q=0.9',
};
