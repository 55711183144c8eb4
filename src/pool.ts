/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight. Items not yet started when
 * `signal` aborts are skipped and left `undefined` in the result.
 */
export async function mapConcurrent<T, R>(
    items: readonly T[],
    concurrency: number,
    fn: (item: T) => Promise<R>,
    signal?: AbortSignal,
): Promise<(R | undefined)[]> {
    const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
    let index = 0;

    async function worker(): Promise<void> {
        while (index < items.length && !signal?.aborted) {
            const i = index++;
            results[i] = await fn(items[i]);
        }
    }

    await Promise.all(Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, () => worker()));
    return results;
}

/**
 * Processes a work queue that can grow while it drains: `handle` receives each item and an
 * `enqueue` callback for follow-up work. At most `concurrency` handlers run at once. On abort no
 * further items are started; items already running finish.
 */
export async function drainQueue<T>(
    initial: readonly T[],
    concurrency: number,
    handle: (item: T, enqueue: (...next: T[]) => void) => Promise<void>,
    signal?: AbortSignal,
): Promise<{ pending: T[] }> {
    const queue: T[] = [...initial];
    const active = new Set<Promise<void>>();
    const limit = Math.max(1, concurrency);
    const enqueue = (...next: T[]): void => {
        queue.push(...next);
    };

    while (queue.length > 0 || active.size > 0) {
        while (active.size < limit && !signal?.aborted) {
            const item = queue.shift();
            if (item === undefined) break;
            const task: Promise<void> = handle(item, enqueue).finally(() => {
                active.delete(task);
            });
            active.add(task);
        }
        if (active.size === 0) break;

        try {
            await Promise.race(active);
        } catch (error) {
            await Promise.allSettled(active);
            throw error;
        }
    }

    return { pending: queue };
}
