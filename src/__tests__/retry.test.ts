import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { MalformedResponseError, RateLimitedError, TimeoutError } from '../errors.js';
import { backoffDelay, RetriesExhaustedError, withRetry, withTimeout } from '../retry.js';
import { NO_WAIT } from './fakes.js';

const policy = { maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 5_000, jitter: 0.2 };

describe('backoffDelay', () => {
    it('should double the delay per attempt up to the cap', () => {
        const noJitter = { ...policy, jitter: 0 };

        expect(backoffDelay(noJitter, 1)).toBe(1_000);
        expect(backoffDelay(noJitter, 2)).toBe(2_000);
        expect(backoffDelay(noJitter, 4)).toBe(5_000);
    });

    it('should spread the delay by the jitter fraction', () => {
        expect(backoffDelay(policy, 1, undefined, () => 0)).toBe(800);
        expect(backoffDelay(policy, 1, undefined, () => 1)).toBe(1_200);
    });

    it('should honour a longer retry-after from a rate limit', () => {
        const error = new RateLimitedError('slow down', 9_000);

        expect(backoffDelay(policy, 1, error, () => 0.5)).toBe(9_000);
    });
});

describe('withRetry', () => {
    beforeEach(() => {
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should retry retryable errors until success', async () => {
        const fn = vi
            .fn<(attempt: number) => Promise<string>>()
            .mockRejectedValueOnce(new TimeoutError('slow'))
            .mockResolvedValueOnce('ok');

        await expect(withRetry(fn, { ...NO_WAIT, label: 'test' })).resolves.toBe('ok');
        expect(fn).toHaveBeenCalledTimes(2);
        expect(fn).toHaveBeenLastCalledWith(2);
    });

    it('should throw RetriesExhaustedError carrying the attempt count', async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new MalformedResponseError('bad body'));

        const error = await withRetry(fn, { ...NO_WAIT, label: 'tile' }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RetriesExhaustedError);
        expect(error).toMatchObject({ attempts: 3, message: 'tile failed after 3 attempt(s): bad body' });
        expect(fn).toHaveBeenCalledTimes(3);
    });

    it('should rethrow non-retryable errors immediately', async () => {
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TypeError('bug'));

        await expect(withRetry(fn, { ...NO_WAIT, label: 'test' })).rejects.toThrow(TypeError);
        expect(fn).toHaveBeenCalledTimes(1);
    });

    it('should stop retrying once the signal is aborted', async () => {
        const controller = new AbortController();
        controller.abort();
        const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new TimeoutError('slow'));

        await expect(withRetry(fn, { ...NO_WAIT, label: 'test', signal: controller.signal })).rejects.toBeInstanceOf(
            RetriesExhaustedError,
        );
        expect(fn).toHaveBeenCalledTimes(1);
    });
});

describe('withTimeout', () => {
    it('should resolve with the value when the call is fast enough', async () => {
        await expect(withTimeout(async () => 'done', 1_000, 'fast')).resolves.toBe('done');
    });

    it('should reject with TimeoutError and abort the signal when the timer fires', async () => {
        let seen: AbortSignal | undefined;
        const never = (signal: AbortSignal): Promise<string> => {
            seen = signal;
            return new Promise(() => undefined);
        };

        await expect(withTimeout(never, 5, 'stuck call')).rejects.toThrow('stuck call timed out after 5 ms');
        expect(seen?.aborted).toBe(true);
    });
});
