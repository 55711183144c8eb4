import { setTimeout as delay } from 'node:timers/promises';

import { log } from 'apify';

import { RateLimitedError, RetryableError, TimeoutError } from './errors.js';
import type { RetryPolicy } from './types.js';

export interface RetryOptions extends RetryPolicy {
    label: string;
    signal?: AbortSignal;
    isRetryable?: (error: unknown) => boolean;
}

export class RetriesExhaustedError extends Error {
    constructor(
        readonly attempts: number,
        readonly lastError: unknown,
        label: string,
    ) {
        super(`${label} failed after ${attempts} attempt(s): ${lastError instanceof Error ? lastError.message : String(lastError)}`, {
            cause: lastError,
        });
        this.name = 'RetriesExhaustedError';
    }
}

const isRetryableByDefault = (error: unknown): boolean => error instanceof RetryableError;

/**
 * Exponential backoff: `baseDelayMs * 2^(attempt - 1)`, capped at `maxDelayMs`, then spread by ±`jitter`.
 * A rate limit that names its own wait time is honoured when that is longer.
 */
export const backoffDelay = (policy: RetryPolicy, attempt: number, error?: unknown, random = Math.random): number => {
    const exponential = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
    const spread = exponential * policy.jitter * (random() * 2 - 1);
    const computed = Math.max(0, Math.round(exponential + spread));
    if (error instanceof RateLimitedError && error.retryAfterMs !== null) {
        return Math.max(computed, error.retryAfterMs);
    }
    return computed;
};

/**
 * Runs `fn` until it succeeds, a non-retryable error is thrown, or `maxAttempts` is used up.
 * Non-retryable errors are rethrown as-is; exhausting the attempts throws {@link RetriesExhaustedError}.
 */
export const withRetry = async <T>(fn: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> => {
    const isRetryable = options.isRetryable ?? isRetryableByDefault;
    const maxAttempts = Math.max(1, options.maxAttempts);

    for (let attempt = 1; ; attempt++) {
        try {
            return await fn(attempt);
        } catch (error) {
            if (!isRetryable(error)) throw error;
            if (attempt >= maxAttempts || options.signal?.aborted) {
                throw new RetriesExhaustedError(attempt, error, options.label);
            }

            const waitMs = backoffDelay(options, attempt, error);
            log.warning(`[retry] ${options.label} failed (attempt ${attempt}/${maxAttempts}), retrying in ${waitMs} ms`, {
                error: error instanceof Error ? error.message : String(error),
            });
            if (waitMs > 0) await delay(waitMs);
        }
    }
};

/**
 * Races `fn` against a timer. The signal handed to `fn` is aborted when the timer fires,
 * so clients that honour it can stop their request.
 */
export const withTimeout = async <T>(
    fn: (signal: AbortSignal) => Promise<T>,
    timeoutMs: number,
    label: string,
): Promise<T> => {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            controller.abort();
            reject(new TimeoutError(`${label} timed out after ${timeoutMs} ms`));
        }, timeoutMs);
    });

    try {
        return await Promise.race([fn(controller.signal), expired]);
    } finally {
        clearTimeout(timer);
    }
};
